export { emptyStatusCounts } from './persistence.types';
export type {
  CommentStore,
  DepartmentStore,
  NotificationListQuery,
  NotificationStore,
  PersistenceGateway,
  PersistenceStores,
  StatusCounts,
  TaskDeadline,
  TaskListQuery,
  TaskRole,
  TaskStore,
  UserStore,
} from './persistence.types';
