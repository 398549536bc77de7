/**
 * Event Bus types for the task engine's event-driven side channels
 */
import type { CommentRecord, NotificationCategory, TaskRecord, TaskStatus } from '../record_types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp (epoch ms) */
  timestamp: number;
  payload: unknown;
  /** Adapter that emitted the event */
  source: string;
};

/**
 * Who caused a lifecycle event. Carried so consumers need not re-read the user.
 */
export type EventActor = {
  userId: string;
  displayName: string;
};

export type TaskCreatedEvent = BaseEvent & {
  type: 'task.created';
  payload: {
    /** Snapshot of the committed task */
    task: TaskRecord;
    actor: EventActor;
  };
};

export type TaskAssignedEvent = BaseEvent & {
  type: 'task.assigned';
  payload: {
    task: TaskRecord;
    assigneeId: string;
    previousAssigneeId: string | null;
    actor: EventActor;
  };
};

export type TaskStatusChangedEvent = BaseEvent & {
  type: 'task.status.changed';
  payload: {
    task: TaskRecord;
    oldStatus: TaskStatus;
    newStatus: TaskStatus;
    actor: EventActor;
  };
};

export type TaskCommentAddedEvent = BaseEvent & {
  type: 'task.comment.added';
  payload: {
    task: TaskRecord;
    comment: CommentRecord;
    actor: EventActor;
  };
};

export type NotificationCreatedEvent = BaseEvent & {
  type: 'notification.created';
  payload: {
    notificationId: string;
    recipientId: string;
    category: NotificationCategory;
    relatedId: string | null;
  };
};

export type TaskDeskEvent =
  | TaskCreatedEvent
  | TaskAssignedEvent
  | TaskStatusChangedEvent
  | TaskCommentAddedEvent
  | NotificationCreatedEvent;

export type TaskDeskEventType = TaskDeskEvent['type'];

export type EventOfType<K extends TaskDeskEventType> = Extract<TaskDeskEvent, { type: K }>;

export type EventHandler<T extends BaseEvent = TaskDeskEvent> = (event: T) => void | Promise<void>;

export type EventSubscription = {
  id: string;
  /** Event type, or '*' for every event */
  eventType: TaskDeskEventType | '*';
  /** Listener registered on the emitter (wraps the caller's handler) */
  listener: (event: TaskDeskEvent) => void;
  metadata: {
    createdAt: number;
  };
};
