import { isDeepStrictEqual } from "node:util";
import type { Settings } from "../types/store.js";

export type ConfigDifference = {
  path: string;
  kind: "added" | "removed" | "changed";
  left?: unknown;
  right?: unknown;
};

/** Path segments that would reach an object's prototype chain. */
export const UNSAFE_KEYS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

export function isPlainObject(value: unknown): value is Settings {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Deep copy of a JSON-shaped value. */
export function cloneSettings<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Deep merge two settings objects. `override` values take precedence.
 * Arrays are replaced, not concatenated; `undefined` never overwrites.
 */
export function mergeConfiguration(base: Settings, override: Settings): Settings {
  const result: Settings = cloneSettings(base);
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || UNSAFE_KEYS.has(key)) continue;
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = mergeConfiguration(current, val);
    } else {
      result[key] = cloneSettings(val);
    }
  }
  return result;
}

export function mergeAll(...layers: Settings[]): Settings {
  return layers.reduce<Settings>((acc, layer) => mergeConfiguration(acc, layer), {});
}

/** Leaf-level differences between two settings objects, sorted by dotted path. */
export function compareConfiguration(left: Settings, right: Settings): ConfigDifference[] {
  const out: ConfigDifference[] = [];
  walk(left, right, "", out);
  return out.sort((a, b) => a.path.localeCompare(b.path));
}

function walk(left: Settings, right: Settings, prefix: string, out: ConfigDifference[]): void {
  const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
  for (const key of keys) {
    const p = prefix ? `${prefix}.${key}` : key;
    const inLeft = Object.prototype.hasOwnProperty.call(left, key);
    const inRight = Object.prototype.hasOwnProperty.call(right, key);
    const l = left[key];
    const r = right[key];

    if (!inLeft) {
      out.push({ path: p, kind: "added", right: r });
    } else if (!inRight) {
      out.push({ path: p, kind: "removed", left: l });
    } else if (isPlainObject(l) && isPlainObject(r)) {
      walk(l, r, p, out);
    } else if (!isDeepStrictEqual(l, r)) {
      out.push({ path: p, kind: "changed", left: l, right: r });
    }
  }
}

export function isUnsafePath(dotted: string): boolean {
  return dotted.split(".").some((part) => UNSAFE_KEYS.has(part));
}

/** Own-property lookup of a dotted path. */
export function getPath(obj: Settings, dotted: string): unknown {
  let cur: unknown = obj;
  for (const part of dotted.split(".")) {
    if (!isPlainObject(cur) || !Object.prototype.hasOwnProperty.call(cur, part)) return undefined;
    cur = cur[part];
  }
  return cur;
}

/**
 * Set a dotted path, creating intermediate objects. Mutates `obj`.
 * @throws Error for `__proto__`, `constructor` or `prototype` segments
 */
export function setPath(obj: Settings, dotted: string, value: unknown): Settings {
  if (isUnsafePath(dotted)) {
    throw new Error(`Refusing to set prototype path: ${dotted}`);
  }
  const parts = dotted.split(".");
  const last = parts.pop();
  if (!last) return obj;

  let cur = obj;
  for (const part of parts) {
    const next = Object.prototype.hasOwnProperty.call(cur, part) ? cur[part] : undefined;
    if (isPlainObject(next)) {
      cur = next;
    } else {
      const created: Settings = {};
      cur[part] = created;
      cur = created;
    }
  }
  cur[last] = value;
  return obj;
}
