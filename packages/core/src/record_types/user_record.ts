/**
 * Per-user switches for the notification side channels.
 */
export type NotificationPreferences = {
  email: boolean;
  inApp: boolean;
};

export const DEFAULT_NOTIFICATION_PREFERENCES: NotificationPreferences = {
  email: true,
  inApp: true,
};

export interface UserRecord {
  id: string;
  /** Unique login name */
  username: string;
  /** Hex SHA-256 digest of the secret; the secret itself is never stored */
  secretHash: string;
  displayName: string;
  isAdmin: boolean;
  email: string | null;
  notificationPreferences: NotificationPreferences;
}
