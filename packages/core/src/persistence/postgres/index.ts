export { PostgresPersistenceGateway, SCHEMA_SQL_PATH } from './postgres_gateway';
export type { PostgresPersistenceGatewayDependencies } from './postgres_gateway';
export type {
  PostgresPersistenceGatewayOptions,
  SqlClient,
  SqlPool,
  SqlQueryable,
  SqlResult,
  SqlRow,
} from './postgres_gateway.types';
export { mapPgError } from './postgres_rows';
