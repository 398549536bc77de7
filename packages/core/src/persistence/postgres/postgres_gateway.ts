import * as fs from 'fs';
import * as path from 'path';
import { Pool } from 'pg';
import { PersistenceFailureError } from '../../errors';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { PersistenceGateway, PersistenceStores } from '../persistence.types';
import type { PostgresPersistenceGatewayOptions, SqlClient, SqlPool } from './postgres_gateway.types';
import { mapPgError } from './postgres_rows';
import { createPostgresStores } from './postgres_stores';

export const SCHEMA_SQL_PATH = path.resolve(__dirname, '..', '..', '..', 'sql', 'schema.sql');

export type PostgresPersistenceGatewayDependencies = {
  pool: SqlPool;
  logger?: Logger;
};

/**
 * PostgreSQL Persistence Gateway over a `pg` pool.
 *
 * Each transaction holds one pooled client between BEGIN and COMMIT.
 * Task updates are conditional on the stored version, so a concurrent
 * update of the same row makes the later one fail with ConflictError.
 *
 * @example
 * const gateway = PostgresPersistenceGateway.connect({ connectionString: process.env.TASKDESK_DATABASE_URL });
 * await gateway.migrate();
 */
export class PostgresPersistenceGateway implements PersistenceGateway {
  readonly stores: PersistenceStores;
  private readonly pool: SqlPool;
  private readonly logger: Logger;

  constructor(dependencies: PostgresPersistenceGatewayDependencies) {
    this.pool = dependencies.pool;
    this.logger = dependencies.logger ?? createLogger('[PostgresGateway] ');
    this.stores = createPostgresStores(this.pool);
  }

  static connect(options: PostgresPersistenceGatewayOptions, logger?: Logger): PostgresPersistenceGateway {
    const pool = new Pool(
      options.maxConnections !== undefined
        ? { connectionString: options.connectionString, max: options.maxConnections }
        : { connectionString: options.connectionString }
    );
    return new PostgresPersistenceGateway(logger ? { pool, logger } : { pool });
  }

  /**
   * Creates the tables and indexes from sql/schema.sql when missing.
   */
  async migrate(schemaPath: string = SCHEMA_SQL_PATH): Promise<void> {
    const sql = fs.readFileSync(schemaPath, 'utf8');
    try {
      await this.pool.query(sql);
    } catch (error) {
      throw mapPgError('migrate', error);
    }
    this.logger.info(`Schema applied from ${schemaPath}`);
  }

  async transaction<T>(work: (stores: PersistenceStores) => Promise<T>): Promise<T> {
    let client: SqlClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new PersistenceFailureError('connect', error, true);
    }

    try {
      await client.query('BEGIN');
      const result = await work(createPostgresStores(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('Rollback failed:', rollbackError);
      }
      throw mapPgError('transaction', error);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
