export { DEFAULT_NOTIFICATION_PREFERENCES } from './user_record';
export type { UserRecord, NotificationPreferences } from './user_record';
export type { DepartmentRecord, DepartmentMembershipRecord } from './department_record';
export { TASK_STATUSES, TASK_PRIORITIES, isTaskStatus } from './task_record';
export type { TaskRecord, TaskStatus, TaskPriority } from './task_record';
export type { CommentRecord } from './comment_record';
export { NOTIFICATION_CATEGORIES } from './notification_record';
export type { NotificationRecord, NotificationCategory } from './notification_record';
