import { SchemaError, SettingsError, StrataError, ValidationError, errorMessage } from "../errors.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type CommandResult<T> = { ok: true; value: T } | { ok: false; error: Diagnostic; exitCode: ExitCode };

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

const NOT_FOUND_CODES: ReadonlySet<string> = new Set([
  "MODULE_NOT_FOUND",
  "KEY_NOT_FOUND",
  "ENVIRONMENT_NOT_FOUND",
  "BACKUP_NOT_FOUND",
  "STORE_NOT_FOUND",
  "SCHEMA_NOT_FOUND",
]);

const INVALID_ARGS_CODES: ReadonlySet<string> = new Set(["INVALID_NAME", "INVALID_ARGS"]);

export function exitCodeFor(code: string): ExitCode {
  if (code === "VALIDATION_FAILED") return EXIT.VALIDATION_FAILED;
  if (NOT_FOUND_CODES.has(code)) return EXIT.NOT_FOUND;
  if (INVALID_ARGS_CODES.has(code)) return EXIT.INVALID_ARGS;
  return EXIT.FAILURE;
}

/** Map a thrown error to a failed result. Unknown errors become UNEXPECTED. */
export function failure(err: unknown): { ok: false; error: Diagnostic; exitCode: ExitCode } {
  if (err instanceof StrataError) {
    const details =
      err instanceof ValidationError || err instanceof SchemaError || err instanceof SettingsError
        ? { errors: err.errors }
        : undefined;
    return { ok: false, error: diag("error", err.code, err.message, details ? { details } : undefined), exitCode: exitCodeFor(err.code) };
  }
  return { ok: false, error: diag("error", "UNEXPECTED", errorMessage(err)), exitCode: EXIT.FAILURE };
}
