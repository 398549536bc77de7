export { NotificationAdapter } from './notification_adapter';
export { assignmentRecipients, commentRecipients, statusChangeRecipients } from './notification_recipients';
export { assignmentContent, commentContent, escapeHtml, statusChangeContent } from './notification_templates';
export type { NotificationContent } from './notification_templates';
export type {
  DeliveryFailureReason,
  DeliveryResult,
  INotificationAdapter,
  NotificationAdapterDependencies,
  NotificationListOptions,
} from './notification_adapter.types';
