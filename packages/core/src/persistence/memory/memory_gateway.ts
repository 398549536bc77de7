import { toPersistenceFailure } from '../../errors';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { PersistenceGateway, PersistenceStores } from '../persistence.types';
import { MemoryState } from './memory_state';
import type { MemoryWrite } from './memory_state';
import { createMemoryStores } from './memory_stores';

export type MemoryPersistenceGatewayDependencies = {
  logger?: Logger;
};

/**
 * In-process Persistence Gateway for tests, demos and embedding.
 *
 * A transaction works on a private copy of the state and logs its writes.
 * On commit the log is replayed onto a fresh copy of the committed state,
 * which then replaces it in one synchronous step. A task version that moved
 * since the transaction read it fails the replay with ConflictError, and
 * nothing of that transaction becomes visible.
 *
 * @example
 * const gateway = new MemoryPersistenceGateway();
 * await gateway.transaction(async (stores) => {
 *   const task = await stores.tasks.get(taskId);
 *   ...
 * });
 */
export class MemoryPersistenceGateway implements PersistenceGateway {
  readonly stores: PersistenceStores;
  private state = new MemoryState();
  private readonly logger: Logger;
  private commits = 0;

  constructor(dependencies: MemoryPersistenceGatewayDependencies = {}) {
    this.logger = dependencies.logger ?? createLogger('[MemoryGateway] ');
    this.stores = createMemoryStores({
      read: () => this.state,
      write: (op) => op(this.state),
    });
  }

  async transaction<T>(work: (stores: PersistenceStores) => Promise<T>): Promise<T> {
    const working = this.state.clone();
    const writes: MemoryWrite[] = [];
    const stores = createMemoryStores({
      read: () => working,
      write: (op) => {
        op(working);
        writes.push(op);
      },
    });

    let result: T;
    try {
      result = await work(stores);
    } catch (error) {
      this.logger.debug(`Transaction rolled back after ${writes.length} write(s)`);
      throw toPersistenceFailure('transaction', error);
    }

    try {
      const next = this.state.clone();
      for (const write of writes) {
        write(next);
      }
      this.state = next;
      this.commits += 1;
    } catch (error) {
      this.logger.debug('Transaction failed at commit');
      throw toPersistenceFailure('commit', error);
    }

    return result;
  }

  async close(): Promise<void> {
    // nothing to release
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of PersistenceGateway)
  // ─────────────────────────────────────────────────────────

  /** Number of committed transactions */
  getCommitCount(): number {
    return this.commits;
  }

  /** Drops every record */
  clear(): void {
    this.state = new MemoryState();
    this.commits = 0;
  }
}
