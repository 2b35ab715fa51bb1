import { describe, expect, it } from 'vitest';
import { main } from '../cli.js';
import {
  TEST_BASE_URL,
  TEST_VDC_HREF,
  createHarness,
  entityWithTaskXml,
  externalNetworkReferencesXml,
  queryResultXml,
  requestBody,
  taskXml,
  type Harness,
} from '../testing.js';
import { childText } from '../vcd/xml.js';

const NETWORKS_PATH = '/api/admin/vdc/11111111-2222-3333-4444-555555555555/networks';

function createHarnessWithParent(): Harness {
  const harness = createHarness({ selectedVdcHref: TEST_VDC_HREF });
  harness.transport
    .on('GET', '/api/admin/extension/externalNetworkReferences', externalNetworkReferencesXml(['ext-net1']))
    .on('POST', NETWORKS_PATH, entityWithTaskXml('OrgVdcNetwork', 'direct-net1', 'urn:vcloud:task:c1'));
  return harness;
}

async function sharedFlagSent(flags: string[]): Promise<string | undefined> {
  const harness = createHarnessWithParent();
  const code = await main(['network', 'direct', 'create', 'direct-net1', '--parent', 'ext-net1', ...flags], harness.deps);
  expect(code).toBe(0);
  return childText(await requestBody(harness.transport.callsTo('POST')[0]), 'IsShared');
}

describe('network direct create', () => {
  it('creates the network in the selected vdc', async () => {
    const harness = createHarnessWithParent();

    const code = await main(
      ['network', 'direct', 'create', 'direct-net1', '-p', 'ext-net1', '-d', 'Directly connected VDC network'],
      harness.deps
    );

    expect(code).toBe(0);
    expect(harness.sessionRequests).toEqual([{ requireVdcSelected: true }]);
    expect(harness.output.tasks.map((task) => task.id)).toEqual(['urn:vcloud:task:c1']);
    const body = await requestBody(harness.transport.callsTo('POST')[0]);
    expect(childText(body, 'Description')).toBe('Directly connected VDC network');
  });

  it('is not shared by default', async () => {
    expect(await sharedFlagSent([])).toBe('false');
  });

  it('lets the last sharing flag win', async () => {
    expect(await sharedFlagSent(['--shared'])).toBe('true');
    expect(await sharedFlagSent(['--shared', '--not-shared'])).toBe('false');
    expect(await sharedFlagSent(['-n', '-s'])).toBe('true');
  });

  it('requires --parent', async () => {
    const harness = createHarnessWithParent();

    expect(await main(['network', 'direct', 'create', 'direct-net1'], harness.deps)).toBe(1);
    expect(harness.output.errors[0]).toMatchObject({ kind: 'ValidationError', message: 'Missing option --parent' });
    expect(harness.transport.calls).toHaveLength(0);
  });

  it('fails without a selected vdc before contacting the server', async () => {
    const harness = createHarness();

    expect(await main(['network', 'direct', 'create', 'direct-net1', '-p', 'ext-net1'], harness.deps)).toBe(1);
    expect(harness.output.errors.map((error) => error.kind)).toEqual(['NoVdcSelected']);
    expect(harness.transport.calls).toHaveLength(0);
  });
});

describe('network direct list', () => {
  it('lists direct networks of the selected vdc', async () => {
    const harness = createHarness({ selectedVdcHref: TEST_VDC_HREF });
    harness.transport.on('GET', '/api/query', queryResultXml('OrgVdcNetworkRecord', [{ name: 'direct-net1' }]));

    expect(await main(['network', 'direct', 'list'], harness.deps)).toBe(0);
    expect(harness.output.listings).toEqual([[{ name: 'direct-net1' }]]);
    expect(harness.transport.calls[0]?.params?.filter).toBe(`vdc==${TEST_VDC_HREF};linkType==0`);
  });

  it('fails without a selected vdc', async () => {
    const harness = createHarness();

    expect(await main(['network', 'direct', 'list'], harness.deps)).toBe(1);
    expect(harness.output.errors[0]?.kind).toBe('NoVdcSelected');
    expect(harness.transport.calls).toHaveLength(0);
  });
});

describe('network direct delete', () => {
  function deleteHarness(options: { confirmAnswer?: boolean; selectedVdcHref?: string } = {}): Harness {
    const harness = createHarness({ selectedVdcHref: TEST_VDC_HREF, ...options });
    harness.transport
      .on(
        'GET',
        '/api/query',
        queryResultXml('OrgVdcNetworkRecord', [{ name: 'direct-net1', href: `${TEST_BASE_URL}/api/network/n1` }])
      )
      .on('DELETE', '/api/admin/network/n1', taskXml({ id: 'urn:vcloud:task:d1', operation: 'Deleting' }));
    return harness;
  }

  it('asks before deleting and stops when declined', async () => {
    const harness = deleteHarness({ confirmAnswer: false });

    expect(await main(['network', 'direct', 'delete', 'direct-net1'], harness.deps)).toBe(0);
    expect(harness.prompts).toEqual(["Are you sure you want to delete the OrgVdc Network 'direct-net1'?"]);
    expect(harness.output.messages).toEqual(['Aborted.']);
    expect(harness.transport.calls).toHaveLength(0);
  });

  it('deletes once confirmed', async () => {
    const harness = deleteHarness({ confirmAnswer: true });

    expect(await main(['network', 'direct', 'delete', 'direct-net1'], harness.deps)).toBe(0);
    const deletes = harness.transport.callsTo('DELETE');
    expect(deletes).toHaveLength(1);
    expect(deletes[0]?.params).toBeUndefined();
    expect(harness.output.tasks.map((task) => task.id)).toEqual(['urn:vcloud:task:d1']);
  });

  it('forces the delete without asking', async () => {
    const harness = deleteHarness();

    expect(await main(['network', 'direct', 'delete', 'direct-net1', '--force'], harness.deps)).toBe(0);
    expect(harness.prompts).toEqual([]);
    expect(harness.transport.callsTo('DELETE')[0]?.params).toEqual({ force: 'true' });
  });

  it('fails without a selected vdc even when confirmation is skipped', async () => {
    const harness = deleteHarness({ selectedVdcHref: undefined });

    expect(await main(['network', 'direct', 'delete', 'direct-net1', '--yes'], harness.deps)).toBe(1);
    expect(harness.output.errors[0]?.kind).toBe('NoVdcSelected');
    expect(harness.transport.calls).toHaveLength(0);
  });
});
