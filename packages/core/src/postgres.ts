/**
 * PostgreSQL implementations (requires a reachable database)
 */

export { PostgresPersistenceGateway, SCHEMA_SQL_PATH, mapPgError } from './persistence/postgres';
export type {
  PostgresPersistenceGatewayDependencies,
  PostgresPersistenceGatewayOptions,
  SqlClient,
  SqlPool,
  SqlQueryable,
  SqlResult,
  SqlRow,
} from './persistence/postgres';
