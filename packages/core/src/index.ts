export * as Adapters from "./adapters";
export * as AccessControl from "./access_control";
export * as Config from "./config_manager";
export * as Crypto from "./crypto";
export * as Errors from "./errors";
export * as EventBus from "./event_bus";
export * as Factories from "./record_factories";
export * as Logger from "./logger";
export * as Mail from "./mail";
export * as Persistence from "./persistence";
export * as Records from "./record_types";
export * as Schemas from "./record_schemas";
export * as Validation from "./record_validations";

// adapters
export * as IdentityAdapter from "./adapters/identity_adapter";
export * as DepartmentAdapter from "./adapters/department_adapter";
export * as TaskLifecycleAdapter from "./adapters/task_lifecycle_adapter";
export * as NotificationAdapter from "./adapters/notification_adapter";
export * as StatisticsAdapter from "./adapters/statistics_adapter";

// Composition root
export { createTaskEngine, createTaskEngineFromConfig } from "./task_engine";
export type { TaskEngine, TaskEngineOptions, TaskEngineFromConfigOptions } from "./task_engine";

export type { ConfigStore } from "./config_store";
