/**
 * Error taxonomy for the task engine.
 *
 * Every failure an operation reports is a subclass of TaskDeskError and
 * carries a `kind` discriminator, so callers can branch with a switch
 * instead of matching message strings.
 */

export type TaskDeskErrorKind =
  | 'NotAuthenticated'
  | 'InvalidCredentials'
  | 'DuplicateIdentity'
  | 'PermissionDenied'
  | 'NotFound'
  | 'ValidationError'
  | 'Conflict'
  | 'PersistenceFailure'
  | 'NotificationDeliveryFailure';

export type EntityKind = 'user' | 'department' | 'membership' | 'task' | 'comment' | 'notification';

/**
 * Base class for all engine errors.
 */
export class TaskDeskError extends Error {
  public readonly kind: TaskDeskErrorKind;
  public readonly retryable: boolean;

  constructor(kind: TaskDeskErrorKind, message: string, retryable: boolean = false) {
    super(message);
    this.name = 'TaskDeskError';
    this.kind = kind;
    this.retryable = retryable;
    Object.setPrototypeOf(this, TaskDeskError.prototype);
  }
}

/**
 * Thrown when an operation requires a session principal and none is present.
 */
export class NotAuthenticatedError extends TaskDeskError {
  constructor(message: string = 'An authenticated session is required') {
    super('NotAuthenticated', message);
    this.name = 'NotAuthenticatedError';
    Object.setPrototypeOf(this, NotAuthenticatedError.prototype);
  }
}

export class InvalidCredentialsError extends TaskDeskError {
  constructor() {
    super('InvalidCredentials', 'Invalid username or secret');
    this.name = 'InvalidCredentialsError';
    Object.setPrototypeOf(this, InvalidCredentialsError.prototype);
  }
}

export class DuplicateIdentityError extends TaskDeskError {
  public readonly username: string;

  constructor(username: string) {
    super('DuplicateIdentity', `A user named ${username} already exists`);
    this.name = 'DuplicateIdentityError';
    this.username = username;
    Object.setPrototypeOf(this, DuplicateIdentityError.prototype);
  }
}

/**
 * Thrown when the access control engine denies an action.
 */
export class PermissionDeniedError extends TaskDeskError {
  public readonly action: string;
  public readonly resource: string;
  public readonly reason: string;

  constructor(action: string, resource: string, reason: string) {
    super('PermissionDenied', `Permission denied for ${action} on ${resource}: ${reason}`);
    this.name = 'PermissionDeniedError';
    this.action = action;
    this.resource = resource;
    this.reason = reason;
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

export class RecordNotFoundError extends TaskDeskError {
  public readonly entityKind: EntityKind;
  public readonly entityId: string;

  constructor(entityKind: EntityKind, entityId: string) {
    super('NotFound', `${entityKind} with id ${entityId} not found`);
    this.name = 'RecordNotFoundError';
    this.entityKind = entityKind;
    this.entityId = entityId;
    Object.setPrototypeOf(this, RecordNotFoundError.prototype);
  }
}

export type FieldError = {
  field: string;
  message: string;
  value?: unknown;
};

/**
 * Thrown for input that fails validation before any mutation happens.
 * `details` lists every field error when more than one was found.
 */
export class ValidationError extends TaskDeskError {
  public readonly field: string;
  public readonly reason: string;
  public readonly details: FieldError[];

  constructor(field: string, reason: string, details: FieldError[] = []) {
    super('ValidationError', `Invalid ${field}: ${reason}`);
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
    this.details = details.length > 0 ? details : [{ field, message: reason }];
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Concurrent modification detected during an atomic mutation.
 * The caller may retry with fresh state.
 */
export class ConflictError extends TaskDeskError {
  public readonly entityKind: EntityKind;
  public readonly entityId: string;

  constructor(entityKind: EntityKind, entityId: string, message?: string) {
    super('Conflict', message ?? `${entityKind} ${entityId} was modified concurrently`, true);
    this.name = 'ConflictError';
    this.entityKind = entityKind;
    this.entityId = entityId;
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class PersistenceFailureError extends TaskDeskError {
  public readonly operation: string;
  public override readonly cause: unknown;

  constructor(operation: string, cause: unknown, transient: boolean = false) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PersistenceFailure', `Persistence failure during ${operation}: ${detail}`, transient);
    this.name = 'PersistenceFailureError';
    this.operation = operation;
    this.cause = cause;
    Object.setPrototypeOf(this, PersistenceFailureError.prototype);
  }
}

/**
 * Confined to the notification dispatcher; never surfaces from a task operation.
 */
export class NotificationDeliveryError extends TaskDeskError {
  public readonly recipientId: string;

  constructor(recipientId: string, message: string) {
    super('NotificationDeliveryFailure', `Notification delivery to ${recipientId} failed: ${message}`);
    this.name = 'NotificationDeliveryError';
    this.recipientId = recipientId;
    Object.setPrototypeOf(this, NotificationDeliveryError.prototype);
  }
}

export function isTaskDeskError(value: unknown): value is TaskDeskError {
  return value instanceof TaskDeskError;
}

export function isRetryable(error: unknown): boolean {
  return isTaskDeskError(error) && error.retryable;
}

/**
 * Passes engine errors through and wraps anything else as a persistence failure.
 */
export function toPersistenceFailure(operation: string, error: unknown): TaskDeskError {
  if (isTaskDeskError(error)) return error;
  return new PersistenceFailureError(operation, error);
}
