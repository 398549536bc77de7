import type { TaskRecord } from '../../record_types';
import { uniqueValues } from '../../utils/array_utils';

type TaskParties = Pick<TaskRecord, 'creatorId' | 'assigneeId'>;

export function assignmentRecipients(assigneeId: string): string[] {
  return [assigneeId];
}

/**
 * Creator and assignee, once each. The principal who changed the status
 * is notified too.
 */
export function statusChangeRecipients(task: TaskParties): string[] {
  return uniqueValues([task.creatorId, task.assigneeId]);
}

/**
 * Creator and assignee, once each, except the commenter.
 */
export function commentRecipients(task: TaskParties, commenterId: string): string[] {
  return uniqueValues([task.creatorId, task.assigneeId]).filter((userId) => userId !== commenterId);
}
