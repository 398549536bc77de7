export { TaskLifecycleAdapter } from './task_lifecycle_adapter';
export { TERMINAL_TASK_STATUSES, isTerminalStatus, isTransitionAllowed } from './task_workflow';
export type {
  CreateTaskInput,
  ITaskLifecycleAdapter,
  TaskLifecycleAdapterDependencies,
  TaskPageOptions,
  UserTaskListOptions,
} from './task_lifecycle_adapter.types';
