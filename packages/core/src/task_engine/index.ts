export { createTaskEngine, createTaskEngineFromConfig } from './task_engine';
export type { TaskEngine, TaskEngineFromConfigOptions, TaskEngineOptions } from './task_engine.types';
