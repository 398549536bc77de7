/**
 * Actions the access control engine decides on.
 */
export const ACCESS_ACTIONS = [
  'department.create',
  'department.add_member',
  'department.remove_member',
  'department.view_tasks',
  'task.create',
  'task.assign',
  'task.change_status',
  'task.comment',
  'task.view',
  'task.view_comments',
  'user.view_tasks',
  'user.view_statistics',
] as const;

export type AccessAction = typeof ACCESS_ACTIONS[number];

/**
 * The identity facts a decision needs. Any session principal satisfies it.
 */
export type AccessSubject = {
  userId: string;
  isAdmin: boolean;
};

/**
 * Ownership and department facts about the resource, gathered by the caller.
 * Absent fields count as "no relationship".
 */
export type AccessContext = {
  creatorId?: string | null;
  assigneeId?: string | null;
  departmentId?: string | null;
  departmentHeadId?: string | null;
  /** Principal belongs to the resource's department */
  isDepartmentMember?: boolean;
  /** department.create only */
  proposedHeadIsAdmin?: boolean;
  /** user.view_* only: whose tasks or statistics are requested */
  subjectUserId?: string | null;
  taskExists?: boolean;
};

export type AccessDecision =
  | { allowed: true; rule: string }
  | { allowed: false; reason: string };

export type AccessRule = {
  /** Reported back on Allow */
  name: string;
  actions: readonly AccessAction[];
  matches: (subject: AccessSubject, context: AccessContext) => boolean;
};
