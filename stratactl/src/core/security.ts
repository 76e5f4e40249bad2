import { isAbsolute, resolve, sep } from "node:path";
import { isPlainObject, type ConfigDifference } from "./merge.js";

export const SECRET_KEY_PATTERN = /(password|passwd|secret|token|api[_-]?key|credential|private[_-]?key)/i;
export const REDACTED = "[REDACTED]";

/**
 * Sanitize a file name component to prevent path traversal.
 * @throws Error if the component is empty or reaches outside its directory
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component.trim();
}

/**
 * Join components under `base`, refusing anything that resolves outside it.
 * @throws Error if path traversal is detected
 */
export function safePath(base: string, ...components: string[]): string {
  if (!isAbsolute(base)) {
    throw new Error(`Base path must be absolute: ${base}`);
  }

  const sanitized = components.map(sanitizePathComponent);
  const fullPath = resolve(base, ...sanitized);
  const normalizedBase = resolve(base);

  if (!fullPath.startsWith(normalizedBase + sep) && fullPath !== normalizedBase) {
    throw new Error(`Path traversal detected: ${fullPath}`);
  }

  return fullPath;
}

/** Copy of `value` with every non-null value under a secret-looking key replaced. */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((v) => redactSecrets(v));
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    out[key] = SECRET_KEY_PATTERN.test(key) && v !== null && v !== undefined ? REDACTED : redactSecrets(v);
  }
  return out;
}

export function redactSettings(settings: Record<string, unknown>): Record<string, unknown> {
  const out = redactSecrets(settings);
  return isPlainObject(out) ? out : {};
}

/** True when any segment of a dotted settings path looks secret. */
export function isSecretPath(dotted: string): boolean {
  return dotted.split(".").some((part) => SECRET_KEY_PATTERN.test(part));
}

/** Redact `left`/`right` of differences whose path looks secret. */
export function redactDifferences(changes: ConfigDifference[]): ConfigDifference[] {
  return changes.map((change) => {
    const hide = isSecretPath(change.path);
    const redact = (v: unknown): unknown => (hide ? REDACTED : redactSecrets(v));
    const out: ConfigDifference = { path: change.path, kind: change.kind };
    if ("left" in change) out.left = redact(change.left);
    if ("right" in change) out.right = redact(change.right);
    return out;
  });
}

/**
 * Event payloads as they may be logged or printed: secret keys redacted and
 * `changes` differences redacted by path.
 */
export function redactEventData(data: Record<string, unknown>): Record<string, unknown> {
  const out = redactSettings(data);
  const changes = data.changes;
  if (Array.isArray(changes) && changes.every(isDifference)) {
    out.changes = redactDifferences(changes);
  }
  return out;
}

function isDifference(value: unknown): value is ConfigDifference {
  return isPlainObject(value) && typeof value.path === "string" && typeof value.kind === "string";
}
