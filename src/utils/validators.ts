import { Ajv } from 'ajv';
import type { ErrorObject, Schema, ValidateFunction } from 'ajv';
import { ConfigurationError } from './errors.js';

/**
 * JSON Schema Validator
 *
 * Validates the JSON configuration files (taxonomy, courts) before a run
 * starts. A failed validation is a configuration error.
 */

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false,
});

export class SchemaValidator {
  private validators: Map<string, ValidateFunction> = new Map();

  /**
   * Compile a schema, typed by the shape it describes
   * @param schemaId Unique identifier, used in error messages and logs
   */
  compileSchema<T>(schemaId: string, schema: Schema): ValidateFunction<T> {
    const validate = ajv.compile<T>(schema);
    this.validators.set(schemaId, validate);
    return validate;
  }

  /**
   * Validate data and return it typed, or throw a ConfigurationError
   * listing every violation
   */
  parse<T>(validate: ValidateFunction<T>, data: unknown, source: string): T {
    if (validate(data)) {
      return data;
    }
    throw new ConfigurationError(
      `${source} failed validation:\n${this.formatErrors(validate.errors)}`
    );
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[] | null): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  • ${path}: ${message} ${params}`;
      })
      .join('\n');
  }

  /**
   * Schema ids compiled so far
   */
  compiledSchemas(): string[] {
    return [...this.validators.keys()];
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();
