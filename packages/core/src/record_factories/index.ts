export { createUserRecord } from './user_factory';
export { createDepartmentRecord } from './department_factory';
export { createTaskRecord } from './task_factory';
export { createCommentRecord } from './comment_factory';
export { createNotificationRecord } from './notification_factory';
