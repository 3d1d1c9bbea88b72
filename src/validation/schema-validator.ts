/**
 * Schema Validator
 *
 * JSON Schema validation using ajv for action payloads.
 * Compiles schemas once per action.
 *
 * @module bastion/validation/schema-validator
 */

import Ajv, {
  type ErrorObject,
  type SchemaObject,
  type ValidateFunction,
} from "ajv";

/**
 * Validation error with formatted message
 */
export interface ValidationError {
  /** Error message */
  message: string;
  /** Path to invalid property */
  path: string;
  /** Expected type or constraint */
  expected?: string;
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Per-action payload schema validator with compiled schema caching
 *
 * @example
 * ```typescript
 * const validator = new SchemaValidator();
 *
 * validator.addSchema("move", {
 *   type: "object",
 *   properties: { x: { type: "integer" }, y: { type: "integer" } },
 *   required: ["x", "y"],
 * });
 *
 * const result = validator.validate("move", { x: 1 });
 * // result.valid === false
 * ```
 */
export class SchemaValidator {
  private ajv: Ajv;
  private validators = new Map<string, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({
      allErrors: true, // Report all errors, not just first
      strict: false, // Allow additional keywords
      useDefaults: false, // Payloads are never rewritten
      coerceTypes: false, // Strict validation
    });
  }

  /**
   * Add (or replace) the payload schema for an action
   */
  addSchema(action: string, schema: SchemaObject): void {
    this.validators.set(action, this.ajv.compile(schema));
  }

  /**
   * Remove a schema
   */
  removeSchema(action: string): void {
    this.validators.delete(action);
  }

  /**
   * Check if a schema exists
   */
  hasSchema(action: string): boolean {
    return this.validators.has(action);
  }

  /**
   * Validate a payload against an action's schema.
   * Actions without a schema pass.
   */
  validate(action: string, payload: unknown): ValidationResult {
    const validate = this.validators.get(action);
    if (!validate || validate(payload)) {
      return { valid: true, errors: [] };
    }
    return { valid: false, errors: this.formatErrors(validate.errors ?? []) };
  }

  /**
   * Format ajv errors into readable messages
   */
  private formatErrors(errors: ErrorObject[]): ValidationError[] {
    return errors.map((error) => {
      const path = error.instancePath || "/";
      const param = error.params;

      switch (error.keyword) {
        case "required":
          return {
            message: `Missing required property: ${param.missingProperty}`,
            path,
          };
        case "type":
          return {
            message: `Property ${path} must be ${param.type}`,
            path,
            expected: String(param.type),
          };
        case "enum": {
          const allowed = Array.isArray(param.allowedValues)
            ? param.allowedValues.join(", ")
            : "";
          return {
            message: `Property ${path} must be one of: ${allowed}`,
            path,
            expected: allowed,
          };
        }
        case "minimum":
        case "maximum": {
          const op = error.keyword === "minimum" ? ">=" : "<=";
          return {
            message: `Property ${path} must be ${op} ${param.limit}`,
            path,
            expected: `${op} ${param.limit}`,
          };
        }
        case "maxLength":
          return {
            message: `Property ${path} must have at most ${param.limit} characters`,
            path,
            expected: `length <= ${param.limit}`,
          };
        case "additionalProperties":
          return {
            message: `Unknown property: ${param.additionalProperty}`,
            path,
          };
        default:
          return { message: error.message ?? `Validation failed at ${path}`, path };
      }
    });
  }

  /**
   * Get number of registered schemas
   */
  get count(): number {
    return this.validators.size;
  }
}
