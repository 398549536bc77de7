import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";

export const RECORD_SCHEMA_NAMES = [
  "user_record_schema",
  "department_record_schema",
  "task_record_schema",
  "comment_record_schema",
  "notification_record_schema",
  "engine_config_schema",
  "stored_config_schema",
] as const;

export type RecordSchemaName = typeof RECORD_SCHEMA_NAMES[number];

/**
 * Directory holding the YAML schemas. Resolves the same way from `src/` and `dist/`.
 */
export const SCHEMAS_DIR = path.resolve(__dirname, "..", "..", "schemas");

/**
 * Singleton cache for schema validators to avoid repeated I/O and AJV compilation.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a named schema under SCHEMAS_DIR.
   */
  static getValidator(schemaName: RecordSchemaName): ValidateFunction {
    return this.getValidatorFromFile(path.join(SCHEMAS_DIR, `${schemaName}.yaml`));
  }

  /**
   * Gets or creates a cached validator for the YAML schema at `schemaPath`.
   */
  static getValidatorFromFile(schemaPath: string): ValidateFunction {
    const cached = this.validators.get(schemaPath);
    if (cached) {
      return cached;
    }

    const schemaContent = fs.readFileSync(schemaPath, "utf8");
    const schema = yaml.load(schemaContent);
    if (typeof schema !== "object" || schema === null) {
      throw new Error(`Schema at ${schemaPath} is not a YAML mapping`);
    }

    const validator = this.getAjv().compile(schema);
    this.validators.set(schemaPath, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size,
      schemasLoaded: Array.from(this.validators.keys()).map((schemaPath) => path.basename(schemaPath, ".yaml")),
    };
  }
}
