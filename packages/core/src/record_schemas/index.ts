export { SchemaValidationCache, SCHEMAS_DIR, RECORD_SCHEMA_NAMES } from './schema_cache';
export type { RecordSchemaName } from './schema_cache';
