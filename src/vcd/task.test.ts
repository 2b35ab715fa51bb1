import { describe, expect, it } from 'vitest';
import { entityWithTaskXml, taskXml } from '../testing.js';
import { firstQueuedTask } from './task.js';
import { parseXml } from './xml.js';

describe('firstQueuedTask', () => {
  it('reads a task returned as the response root', async () => {
    const task = firstQueuedTask(await parseXml(taskXml({ id: 'urn:vcloud:task:d1', operation: 'Deleting' })));

    expect(task).toEqual({
      id: 'urn:vcloud:task:d1',
      href: 'https://vcd.example.com/api/task/d1',
      name: 'task',
      operation: 'Deleting',
      operationName: 'Deleting',
      status: 'queued',
      owner: 'owner-entity',
    });
  });

  it('reads the first task embedded in a created entity', async () => {
    const task = firstQueuedTask(await parseXml(entityWithTaskXml('OrgVdcNetwork', 'net1', 'urn:vcloud:task:c1')));

    expect(task.id).toBe('urn:vcloud:task:c1');
    expect(task.status).toBe('running');
  });

  it('falls back to the href tail when the task has no id', async () => {
    const task = firstQueuedTask(
      await parseXml('<Task xmlns="http://www.vmware.com/vcloud/v1.5" href="https://vcd.example.com/api/task/t9"/>')
    );

    expect(task).toMatchObject({ id: 't9', status: 'unknown', name: 'task' });
  });

  it('fails when the entity carries no task', async () => {
    const entity = await parseXml('<OrgVdcNetwork xmlns="http://www.vmware.com/vcloud/v1.5" name="net1"/>');

    expect(() => firstQueuedTask(entity)).toThrow('Server returned OrgVdcNetwork without a queued task');
  });
});
