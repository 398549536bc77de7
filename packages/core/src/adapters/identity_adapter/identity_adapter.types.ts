import type { NotificationPreferences, UserRecord } from '../../record_types';
import type { PersistenceGateway } from '../../persistence';
import type { Logger } from '../../logger';
import type { SessionsConfig } from '../../config_manager';

/**
 * An authenticated identity, passed explicitly to every engine operation.
 * Satisfies the access control engine's AccessSubject.
 */
export type Principal = {
  userId: string;
  username: string;
  displayName: string;
  isAdmin: boolean;
  email: string | null;
  notificationPreferences: NotificationPreferences;
  sessionId: string;
  /** ISO 8601 timestamp */
  authenticatedAt: string;
};

/**
 * A user as other adapters and callers see it: never carries the secret hash.
 */
export type UserProfile = Omit<UserRecord, 'secretHash'>;

export type RegisterPrincipalOptions = {
  email?: string | null;
  notificationPreferences?: Partial<NotificationPreferences>;
};

/**
 * IdentityAdapter Interface - credential verification and sessions
 */
export interface IIdentityAdapter {
  registerPrincipal(
    username: string,
    secret: string,
    displayName: string,
    isAdmin: boolean,
    options?: RegisterPrincipalOptions
  ): Promise<string>;
  authenticate(username: string, secret: string): Promise<Principal>;
  endSession(principal: Principal): void;
  getSession(sessionId: string): Principal | null;
  requireSession(sessionId: string): Principal;
  pruneExpiredSessions(): number;
  getSessionCount(): number;
  getUser(userId: string): Promise<UserProfile | null>;
}

/**
 * IdentityAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export type IdentityAdapterDependencies = {
  gateway: PersistenceGateway;
  logger?: Logger;
  /** Defaults to DEFAULT_ENGINE_CONFIG.sessions */
  sessions?: SessionsConfig;
  /** Defaults to the system clock */
  clock?: () => Date;
};
