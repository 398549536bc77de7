export const NOTIFICATION_CATEGORIES = ['task-assignment', 'status-change', 'new-comment'] as const;

export type NotificationCategory = typeof NOTIFICATION_CATEGORIES[number];

export interface NotificationRecord {
  id: string;
  recipientId: string;
  message: string;
  category: NotificationCategory;
  /** Id of the entity the notification is about (a task id for every current category) */
  relatedId: string | null;
  /** ISO 8601 timestamp */
  createdAt: string;
  read: boolean;
}
