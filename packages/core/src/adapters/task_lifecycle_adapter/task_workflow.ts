import type { TaskStatus } from '../../record_types';

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'cancelled'];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

/**
 * Single gate for status changes. Every transition between the four
 * statuses is currently allowed, including out of a terminal status.
 */
export function isTransitionAllowed(_from: TaskStatus, _to: TaskStatus): boolean {
  return true;
}
