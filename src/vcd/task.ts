import { remoteRejected } from '../errors.js';
import { findChild, findChildren, localName, type XmlElement } from './xml.js';

export interface TaskSummary {
  id: string;
  href: string;
  name: string;
  operation: string;
  operationName: string;
  status: string;
  startTime?: string;
  owner?: string;
}

export function toTaskSummary(task: XmlElement): TaskSummary {
  const attrs = task.attributes;
  const summary: TaskSummary = {
    id: attrs.id || attrs.href?.split('/').pop() || 'N/A',
    href: attrs.href ?? '',
    name: attrs.name ?? 'task',
    operation: attrs.operation ?? '',
    operationName: attrs.operationName ?? '',
    status: attrs.status ?? 'unknown',
  };
  if (attrs.startTime) {
    summary.startTime = attrs.startTime;
  }
  const owner = findChild(task, 'Owner')?.attributes.name;
  if (owner) {
    summary.owner = owner;
  }
  return summary;
}

/**
 * Returns the task of a response whose root is a Task, or the first entry
 * of the Tasks list embedded in a returned entity.
 */
export function firstQueuedTask(response: XmlElement): TaskSummary {
  if (localName(response.name) === 'Task') {
    return toTaskSummary(response);
  }
  const tasks = findChild(response, 'Tasks');
  const [task] = tasks ? findChildren(tasks, 'Task') : [];
  if (!task) {
    throw remoteRejected(`Server returned ${localName(response.name)} without a queued task`);
  }
  return toTaskSummary(task);
}
