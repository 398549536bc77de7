import type { NotificationRecord } from "../record_types";
import { assertValidRecord } from "../record_validations";
import { generateRecordId } from "../utils/id_generator";

/**
 * Creates an unread NotificationRecord with validation.
 */
export async function createNotificationRecord(payload: Partial<NotificationRecord>): Promise<NotificationRecord> {
  const notification: NotificationRecord = {
    id: payload.id ?? generateRecordId(),
    recipientId: payload.recipientId ?? '',
    message: payload.message ?? '',
    category: payload.category ?? 'task-assignment',
    relatedId: payload.relatedId ?? null,
    createdAt: payload.createdAt ?? new Date().toISOString(),
    read: payload.read ?? false,
  };

  return assertValidRecord("notification_record_schema", notification);
}
