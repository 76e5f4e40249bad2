import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { SchemaError } from "../errors.js";
import { formatAjvErrors, loadAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry: discovers and loads the JSON Schemas shipped in `schemas/`
 * (store document, module schema, export bundle).
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new SchemaError(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const raw = fs.readFileSync(filePath, "utf8");
      const schema: unknown = JSON.parse(raw);

      // "module-schema.schema.json" → "module-schema"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Compile and cache a validator for the given schema name. */
  async getValidator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new SchemaError(`Schema not found: ${name}`);
    }

    if (!this.ajv) {
      this.ajv = await loadAjv();
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Validate data against a named schema. */
  async validate(name: string, data: unknown): Promise<{ valid: boolean; errors: string[] }> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    return { valid, errors: valid ? [] : formatAjvErrors(validate.errors) };
  }
}

/** Extract a semver-like version from the schema's `$id` (e.g. "...store@1.0.0"). */
function extractVersion(schema: unknown): string | null {
  if (typeof schema === "object" && schema !== null && "$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

let shared: Promise<SchemaRegistry> | null = null;

/** Create and load a registry; without `schemaDir` the shipped registry is loaded once and shared. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  if (schemaDir) {
    const registry = new SchemaRegistry(schemaDir);
    await registry.load();
    return registry;
  }

  if (shared) return shared;

  const registry = new SchemaRegistry(SCHEMA_DIR);
  const pending = registry.load().then(() => registry);
  // A failed load is retried on the next call.
  pending.catch(() => {
    if (shared === pending) shared = null;
  });
  shared = pending;
  return pending;
}
