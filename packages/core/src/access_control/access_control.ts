import { PermissionDeniedError } from '../errors';
import type {
  AccessAction,
  AccessContext,
  AccessDecision,
  AccessRule,
  AccessSubject,
} from './access_control.types';

function isSelf(subject: AccessSubject, userId: string | null | undefined): boolean {
  return userId !== null && userId !== undefined && userId === subject.userId;
}

function isDepartmentHead(subject: AccessSubject, context: AccessContext): boolean {
  return Boolean(context.departmentId) && isSelf(subject, context.departmentHeadId);
}

const TASK_VIEW_ACTIONS = ['task.view', 'task.view_comments'] as const;

/**
 * Ordered rule table. Rules are tried top to bottom for the requested
 * action; the first match allows. No match denies.
 */
export const ACCESS_RULES: readonly AccessRule[] = [
  {
    name: 'admin-creates-department-with-admin-head',
    actions: ['department.create'],
    matches: (subject, context) => subject.isAdmin && context.proposedHeadIsAdmin === true,
  },
  {
    name: 'admin-manages-membership',
    actions: ['department.add_member', 'department.remove_member'],
    matches: (subject) => subject.isAdmin,
  },
  {
    name: 'authenticated-creates-task-without-department',
    actions: ['task.create'],
    matches: (_subject, context) => !context.departmentId,
  },
  {
    name: 'admin',
    actions: [
      'task.create',
      'task.assign',
      'task.change_status',
      ...TASK_VIEW_ACTIONS,
      'department.view_tasks',
      'user.view_tasks',
      'user.view_statistics',
    ],
    matches: (subject) => subject.isAdmin,
  },
  {
    name: 'department-head',
    actions: ['task.create', 'task.assign', 'task.change_status', ...TASK_VIEW_ACTIONS, 'department.view_tasks'],
    matches: isDepartmentHead,
  },
  {
    name: 'task-creator',
    actions: ['task.assign', 'task.change_status', ...TASK_VIEW_ACTIONS],
    matches: (subject, context) => isSelf(subject, context.creatorId),
  },
  {
    name: 'task-assignee',
    actions: ['task.change_status', ...TASK_VIEW_ACTIONS],
    matches: (subject, context) => isSelf(subject, context.assigneeId),
  },
  {
    name: 'department-member',
    actions: [...TASK_VIEW_ACTIONS, 'department.view_tasks'],
    matches: (_subject, context) => Boolean(context.departmentId) && context.isDepartmentMember === true,
  },
  {
    name: 'authenticated-comments-on-existing-task',
    actions: ['task.comment'],
    matches: (_subject, context) => context.taskExists === true,
  },
  {
    name: 'self',
    actions: ['user.view_tasks', 'user.view_statistics'],
    matches: (subject, context) => isSelf(subject, context.subjectUserId),
  },
];

function denyReason(action: AccessAction, subject: AccessSubject, context: AccessContext): string {
  switch (action) {
    case 'department.create':
      return subject.isAdmin ? 'department head must be an admin' : 'only administrators can create departments';
    case 'department.add_member':
    case 'department.remove_member':
      return 'only administrators can change department membership';
    case 'department.view_tasks':
      return 'requires admin, department head or department membership';
    case 'task.create':
      return 'only an admin or the department head can create tasks in a department';
    case 'task.assign':
      return 'requires admin, task creator or department head';
    case 'task.change_status':
      return 'requires admin, task creator, task assignee or department head';
    case 'task.comment':
      return context.taskExists === true ? 'comment not permitted' : 'task does not exist';
    case 'task.view':
    case 'task.view_comments':
      return 'requires admin, task creator, task assignee, department head or department membership';
    case 'user.view_tasks':
    case 'user.view_statistics':
      return "only administrators can view another user's data";
  }
}

/**
 * Pure decision function: the first rule in ACCESS_RULES that covers
 * `action` and matches allows; otherwise denies with a reason.
 */
export function evaluate(subject: AccessSubject, action: AccessAction, context: AccessContext = {}): AccessDecision {
  for (const rule of ACCESS_RULES) {
    if (rule.actions.includes(action) && rule.matches(subject, context)) {
      return { allowed: true, rule: rule.name };
    }
  }
  return { allowed: false, reason: denyReason(action, subject, context) };
}

/**
 * Evaluates and throws PermissionDeniedError on Deny.
 * @param resource Identifies the resource in the error, e.g. `task:<id>`
 */
export function assertAllowed(
  subject: AccessSubject,
  action: AccessAction,
  context: AccessContext,
  resource: string
): void {
  const decision = evaluate(subject, action, context);
  if (!decision.allowed) {
    throw new PermissionDeniedError(action, resource, decision.reason);
  }
}
