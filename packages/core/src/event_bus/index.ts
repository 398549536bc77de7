export { EventBus } from './event_bus';
export type { IEventStream, EventBusDependencies } from './event_bus';
export type {
  BaseEvent,
  EventActor,
  EventHandler,
  EventOfType,
  EventSubscription,
  TaskDeskEvent,
  TaskDeskEventType,
  TaskCreatedEvent,
  TaskAssignedEvent,
  TaskStatusChangedEvent,
  TaskCommentAddedEvent,
  NotificationCreatedEvent,
} from './types';
