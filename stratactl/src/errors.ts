export type ErrorCode =
  | "NOT_INITIALIZED"
  | "INVALID_NAME"
  | "INVALID_ARGS"
  | "MODULE_NOT_FOUND"
  | "KEY_NOT_FOUND"
  | "ENVIRONMENT_NOT_FOUND"
  | "ENVIRONMENT_EXISTS"
  | "ENVIRONMENT_PROTECTED"
  | "VALIDATION_FAILED"
  | "SCHEMA_INVALID"
  | "SCHEMA_NOT_FOUND"
  | "STORE_NOT_FOUND"
  | "STORE_CORRUPT"
  | "STORE_LOCKED"
  | "BACKUP_NOT_FOUND"
  | "IMPORT_INVALID"
  | "SETTINGS_INVALID";

/**
 * Base class for every error the store raises on purpose.
 * Anything else reaching the CLI is reported as UNEXPECTED.
 */
export class StrataError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends StrataError {}

export class StoreError extends StrataError {}

export class SchemaError extends StrataError {
  constructor(
    message: string,
    readonly errors: string[] = [],
  ) {
    super("SCHEMA_INVALID", message);
  }
}

/** Settings failed validation against a module schema. */
export class ValidationError extends StrataError {
  constructor(
    message: string,
    readonly errors: string[],
  ) {
    super("VALIDATION_FAILED", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** stratactl's own settings files or STRATA_* variables are invalid. */
export class SettingsError extends StrataError {
  constructor(
    message: string,
    readonly errors: string[],
  ) {
    super("SETTINGS_INVALID", message);
  }
}
