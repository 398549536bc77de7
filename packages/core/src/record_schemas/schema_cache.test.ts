import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RECORD_SCHEMA_NAMES, SchemaValidationCache } from './schema_cache';

describe('SchemaValidationCache', () => {
  beforeEach(() => {
    SchemaValidationCache.clearCache();
  });

  afterEach(() => {
    SchemaValidationCache.clearCache();
  });

  it('should cache validators and avoid recompilation', () => {
    const first = SchemaValidationCache.getValidator('task_record_schema');
    const second = SchemaValidationCache.getValidator('task_record_schema');

    expect(typeof first).toBe('function');
    expect(second).toBe(first);
  });

  it('should report the schemas it has loaded', () => {
    SchemaValidationCache.getValidator('user_record_schema');
    SchemaValidationCache.getValidator('task_record_schema');

    expect(SchemaValidationCache.getCacheStats()).toEqual({
      cachedSchemas: 2,
      schemasLoaded: ['user_record_schema', 'task_record_schema'],
    });
  });

  it('should compile every bundled schema', () => {
    for (const name of RECORD_SCHEMA_NAMES) {
      expect(() => SchemaValidationCache.getValidator(name)).not.toThrow();
    }
    expect(SchemaValidationCache.getCacheStats().cachedSchemas).toBe(RECORD_SCHEMA_NAMES.length);
  });

  it('should start empty after clearCache', () => {
    SchemaValidationCache.getValidator('comment_record_schema');
    SchemaValidationCache.clearCache();

    expect(SchemaValidationCache.getCacheStats().cachedSchemas).toBe(0);
  });

  it('should reject a schema file that is not a mapping', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskdesk-schema-'));
    const schemaPath = path.join(dir, 'scalar.yaml');
    fs.writeFileSync(schemaPath, 'just a string\n');

    try {
      expect(() => SchemaValidationCache.getValidatorFromFile(schemaPath)).toThrow(
        `Schema at ${schemaPath} is not a YAML mapping`
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
