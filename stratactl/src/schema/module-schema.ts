import { SchemaError } from "../errors.js";
import type { ModuleSchema, PropertySchema, SettingsValidation } from "../types/schema.js";
import type { Settings } from "../types/store.js";
import { formatAjvErrors, loadAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";
import { createRegistry } from "./registry.js";

/** Check a module schema document against `module-schema.schema.json`. */
export async function assertModuleSchema(schema: unknown): Promise<ModuleSchema> {
  const registry = await createRegistry();
  const { valid, errors } = await registry.validate("module-schema", schema);
  if (!valid || !isModuleSchema(schema)) {
    throw new SchemaError(`Invalid module schema: ${errors.join("; ")}`, errors);
  }

  for (const [name, prop] of Object.entries(schema.properties)) {
    if (prop.pattern === undefined) continue;
    try {
      new RegExp(prop.pattern, "u");
    } catch {
      throw new SchemaError(`Invalid pattern for property ${name}: ${prop.pattern}`, [`/properties/${name}/pattern`]);
    }
  }
  return schema;
}

function isModuleSchema(value: unknown): value is ModuleSchema {
  return typeof value === "object" && value !== null && "properties" in value && typeof value.properties === "object";
}

/**
 * Translate to JSON Schema 2020-12. Only keywords applicable to the declared
 * type are carried over, since Ajv's strict mode rejects the rest.
 */
export function toJsonSchema(schema: ModuleSchema, opts: { partial?: boolean } = {}): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [name, prop] of Object.entries(schema.properties)) {
    properties[name] = propertyToJsonSchema(prop);
    if (prop.required) required.push(name);
  }

  const out: Record<string, unknown> = {
    type: "object",
    properties,
    additionalProperties: schema.additionalProperties ?? true,
  };
  if (!opts.partial && required.length > 0) out.required = required;
  return out;
}

function propertyToJsonSchema(prop: PropertySchema): Record<string, unknown> {
  const out: Record<string, unknown> = { type: prop.type };
  if (prop.enum) out.enum = prop.enum;

  switch (prop.type) {
    case "integer":
    case "number":
      if (prop.minimum !== undefined) out.minimum = prop.minimum;
      if (prop.maximum !== undefined) out.maximum = prop.maximum;
      break;
    case "string":
      if (prop.minLength !== undefined) out.minLength = prop.minLength;
      if (prop.maxLength !== undefined) out.maxLength = prop.maxLength;
      if (prop.pattern !== undefined) out.pattern = prop.pattern;
      break;
    case "array":
      if (prop.items) out.items = { type: prop.items.type };
      break;
    default:
      break;
  }
  return out;
}

/** Each property's declared `default`. */
export function schemaDefaults(schema: ModuleSchema): Settings {
  const out: Settings = {};
  for (const [name, prop] of Object.entries(schema.properties)) {
    if (prop.default !== undefined) out[name] = structuredClone(prop.default);
  }
  return out;
}

export const MAX_CACHED_VALIDATORS = 256;

let ajvPromise: Promise<AjvInstance> | null = null;
const compiled = new Map<string, { validate: AjvValidateFn; schema: Record<string, unknown> }>();

/** Number of compiled validators currently held. */
export function cachedValidatorCount(): number {
  return compiled.size;
}

async function validatorFor(jsonSchema: Record<string, unknown>): Promise<AjvValidateFn> {
  const key = JSON.stringify(jsonSchema);
  const cached = compiled.get(key);
  if (cached) {
    // Re-insert so eviction drops the least recently used entry.
    compiled.delete(key);
    compiled.set(key, cached);
    return cached.validate;
  }

  ajvPromise ??= loadAjv();
  const ajv = await ajvPromise;
  const validate = ajv.compile(jsonSchema);
  compiled.set(key, { validate, schema: jsonSchema });
  for (const [oldKey, entry] of compiled) {
    if (compiled.size <= MAX_CACHED_VALIDATORS) break;
    compiled.delete(oldKey);
    ajv.removeSchema(entry.schema);
  }
  return validate;
}

/**
 * Validate settings against a module schema.
 * With `partial`, required properties may be absent (used for registration defaults).
 */
export async function validateSettings(
  schema: ModuleSchema,
  settings: Settings,
  opts: { partial?: boolean } = {},
): Promise<SettingsValidation> {
  const validate = await validatorFor(toJsonSchema(schema, opts));
  const valid = validate(settings);
  return { valid, errors: valid ? [] : formatAjvErrors(validate.errors) };
}
