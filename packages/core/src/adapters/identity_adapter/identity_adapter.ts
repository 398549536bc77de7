import { DEFAULT_ENGINE_CONFIG } from '../../config_manager';
import type { SessionsConfig } from '../../config_manager';
import { hashSecret, verifySecret } from '../../crypto';
import {
  DuplicateIdentityError,
  InvalidCredentialsError,
  NotAuthenticatedError,
  ValidationError,
  toPersistenceFailure,
} from '../../errors';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { PersistenceGateway } from '../../persistence';
import { createUserRecord } from '../../record_factories';
import type { UserRecord } from '../../record_types';
import { generateRecordId } from '../../utils/id_generator';
import type {
  IIdentityAdapter,
  IdentityAdapterDependencies,
  Principal,
  RegisterPrincipalOptions,
  UserProfile,
} from './identity_adapter.types';

type SessionEntry = {
  principal: Principal;
  /** epoch milliseconds */
  expiresAt: number;
};

function toProfile(user: UserRecord): UserProfile {
  const { secretHash: _secretHash, ...profile } = user;
  return profile;
}

/**
 * Throws NotAuthenticatedError unless a principal is present.
 */
export function requirePrincipal(principal: Principal | null | undefined): Principal {
  if (!principal) {
    throw new NotAuthenticatedError();
  }
  return principal;
}

/**
 * IdentityAdapter - registration, credential checks and session principals.
 *
 * Sessions live only in this process and expire `sessions.ttlMs` after
 * authentication. Ending one drops it from the session table; nothing is
 * persisted.
 */
export class IdentityAdapter implements IIdentityAdapter {
  private gateway: PersistenceGateway;
  private logger: Logger;
  private clock: () => Date;
  private sessionConfig: SessionsConfig;
  private sessions = new Map<string, SessionEntry>();

  constructor(dependencies: IdentityAdapterDependencies) {
    this.gateway = dependencies.gateway;
    this.logger = dependencies.logger ?? createLogger('[Identity] ');
    this.clock = dependencies.clock ?? (() => new Date());
    this.sessionConfig = dependencies.sessions ?? DEFAULT_ENGINE_CONFIG.sessions;
  }

  /**
   * Persists a new user. Only the digest of `secret` is stored.
   * @returns the new user id
   */
  async registerPrincipal(
    username: string,
    secret: string,
    displayName: string,
    isAdmin: boolean,
    options: RegisterPrincipalOptions = {}
  ): Promise<string> {
    if (secret.length === 0) {
      throw new ValidationError('secret', 'must not be empty');
    }

    const user = await createUserRecord({
      username,
      secretHash: hashSecret(secret),
      displayName: displayName.trim() || username,
      isAdmin,
      email: options.email ?? null,
      notificationPreferences: {
        email: options.notificationPreferences?.email ?? true,
        inApp: options.notificationPreferences?.inApp ?? true,
      },
    });

    try {
      await this.gateway.transaction(async (stores) => {
        if (await stores.users.findByUsername(username)) {
          throw new DuplicateIdentityError(username);
        }
        await stores.users.create(user);
      });
    } catch (error) {
      throw toPersistenceFailure('registerPrincipal', error);
    }

    this.logger.info(`Registered user ${username} (${user.id})${isAdmin ? ' as admin' : ''}`);
    return user.id;
  }

  async authenticate(username: string, secret: string): Promise<Principal> {
    let user: UserRecord | null;
    try {
      user = await this.gateway.stores.users.findByUsername(username);
    } catch (error) {
      throw toPersistenceFailure('authenticate', error);
    }

    if (!user || !verifySecret(secret, user.secretHash)) {
      this.logger.warn(`Failed authentication for ${username}`);
      throw new InvalidCredentialsError();
    }

    this.pruneExpiredSessions();
    const now = this.clock();
    const principal: Principal = {
      userId: user.id,
      username: user.username,
      displayName: user.displayName,
      isAdmin: user.isAdmin,
      email: user.email,
      notificationPreferences: { ...user.notificationPreferences },
      sessionId: generateRecordId(),
      authenticatedAt: now.toISOString(),
    };
    this.sessions.set(principal.sessionId, {
      principal,
      expiresAt: now.getTime() + this.sessionConfig.ttlMs,
    });
    this.logger.debug(`Session ${principal.sessionId} opened for ${username}`);
    return principal;
  }

  endSession(principal: Principal): void {
    if (this.sessions.delete(principal.sessionId)) {
      this.logger.debug(`Session ${principal.sessionId} ended for ${principal.username}`);
    }
  }

  /**
   * @returns null once the session ended or expired
   */
  getSession(sessionId: string): Principal | null {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.clock().getTime()) {
      this.sessions.delete(sessionId);
      this.logger.debug(`Session ${sessionId} expired for ${entry.principal.username}`);
      return null;
    }
    return entry.principal;
  }

  requireSession(sessionId: string): Principal {
    const principal = this.getSession(sessionId);
    if (!principal) {
      throw new NotAuthenticatedError(`Session ${sessionId} is not active`);
    }
    return principal;
  }

  /**
   * Drops every expired session. Runs on each successful authentication.
   * @returns how many sessions were dropped
   */
  pruneExpiredSessions(): number {
    const now = this.clock().getTime();
    let pruned = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (entry.expiresAt <= now) {
        this.sessions.delete(sessionId);
        pruned++;
      }
    }
    if (pruned > 0) {
      this.logger.debug(`Pruned ${pruned} expired session(s)`);
    }
    return pruned;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  async getUser(userId: string): Promise<UserProfile | null> {
    try {
      const user = await this.gateway.stores.users.get(userId);
      return user ? toProfile(user) : null;
    } catch (error) {
      throw toPersistenceFailure('getUser', error);
    }
  }
}
