import type { UserRecord } from "../record_types";
import { DEFAULT_NOTIFICATION_PREFERENCES } from "../record_types";
import { assertValidRecord } from "../record_validations";
import { generateRecordId } from "../utils/id_generator";

/**
 * Creates a new, fully-formed UserRecord with validation.
 * The caller hashes the secret; the factory only checks the digest shape.
 */
export async function createUserRecord(payload: Partial<UserRecord>): Promise<UserRecord> {
  const user: UserRecord = {
    id: payload.id ?? generateRecordId(),
    username: payload.username ?? '',
    secretHash: payload.secretHash ?? '',
    displayName: payload.displayName ?? payload.username ?? '',
    isAdmin: payload.isAdmin ?? false,
    email: payload.email ?? null,
    notificationPreferences: {
      ...DEFAULT_NOTIFICATION_PREFERENCES,
      ...payload.notificationPreferences,
    },
  };

  return assertValidRecord("user_record_schema", user);
}
