import { randomUUID } from 'crypto';

/**
 * Generates a record ID (UUID v4), used for every record kind.
 */
export function generateRecordId(): string {
  return randomUUID();
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/**
 * Validates the format of a record ID.
 */
export function isValidRecordId(id: unknown): id is string {
  return typeof id === 'string' && UUID_PATTERN.test(id);
}
