export {
  TaskDeskError,
  NotAuthenticatedError,
  InvalidCredentialsError,
  DuplicateIdentityError,
  PermissionDeniedError,
  RecordNotFoundError,
  ValidationError,
  ConflictError,
  PersistenceFailureError,
  NotificationDeliveryError,
  isTaskDeskError,
  isRetryable,
  toPersistenceFailure,
} from './errors';
export type { TaskDeskErrorKind, EntityKind, FieldError } from './errors';
