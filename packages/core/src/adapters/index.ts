export * from './identity_adapter';
export * from './department_adapter';
export * from './task_lifecycle_adapter';
export * from './notification_adapter';
export * from './statistics_adapter';
