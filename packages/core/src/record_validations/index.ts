export { validateRecordDetailed, assertValidRecord, formatFieldPath } from './record_validator';
export type { RecordValidationResult } from './record_validator';
