import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import {
  MAX_CACHED_VALIDATORS,
  assertModuleSchema,
  cachedValidatorCount,
  schemaDefaults,
  toJsonSchema,
  validateSettings,
} from "../src/schema/module-schema.js";
import { SchemaError } from "../src/errors.js";
import type { ModuleSchema } from "../src/types/schema.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

const webSchema: ModuleSchema = {
  description: "Web front end",
  properties: {
    host: { type: "string", required: true, minLength: 1 },
    port: { type: "integer", minimum: 1, maximum: 65535, default: 8080 },
    mode: { type: "string", enum: ["dev", "prod"], default: "dev" },
    name: { type: "string", pattern: "^[a-z]+$" },
    tags: { type: "array", items: { type: "string" }, default: [] },
    debug: { type: "boolean", default: false },
  },
};

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["export", "module-schema", "store"]);
  });

  it("reads versions from $id", () => {
    expect(registry.versions()).toEqual({ export: "1.0.0", "module-schema": "1.0.0", store: "1.0.0" });
  });

  it("rejects unknown schema names", async () => {
    await expect(registry.validate("nope", {})).rejects.toThrow("Schema not found: nope");
  });

  it("accepts a minimal store document", async () => {
    const { valid, errors } = await registry.validate("store", {
      version: "1.0",
      modules: {},
      environments: { default: { name: "default", settings: {} } },
      schemas: {},
      currentEnvironment: "default",
      hotReload: { enabled: false, watchedPaths: [] },
      lastModified: null,
    });
    expect(errors).toEqual([]);
    expect(valid).toBe(true);
  });

  it("rejects a store without environments", async () => {
    const { valid, errors } = await registry.validate("store", {
      version: "1.0",
      modules: {},
      schemas: {},
      currentEnvironment: "default",
      hotReload: { enabled: false, watchedPaths: [] },
    });
    expect(valid).toBe(false);
    expect(errors).toContain("/: must have required property 'environments'");
  });

  it("rejects an export bundle with the wrong format tag", async () => {
    const { valid } = await registry.validate("export", {
      format: "other",
      version: "1.0",
      modules: {},
      environments: {},
    });
    expect(valid).toBe(false);
  });
});

describe("module schemas", () => {
  it("accepts a well-formed schema", async () => {
    await expect(assertModuleSchema(webSchema)).resolves.toEqual(webSchema);
  });

  it("rejects an unknown property type", async () => {
    await expect(assertModuleSchema({ properties: { a: { type: "date" } } })).rejects.toBeInstanceOf(SchemaError);
  });

  it("rejects unknown keywords on a property", async () => {
    await expect(assertModuleSchema({ properties: { a: { type: "string", format: "email" } } })).rejects.toThrow(
      "Invalid module schema",
    );
  });

  it("rejects a schema without properties", async () => {
    await expect(assertModuleSchema({ description: "x" })).rejects.toThrow("must have required property 'properties'");
  });

  it("translates to JSON Schema, keeping only keywords for the declared type", () => {
    const json = toJsonSchema({
      properties: {
        port: { type: "integer", required: true, minimum: 1, pattern: "^x$" },
        name: { type: "string", minLength: 2, maximum: 5 },
      },
      additionalProperties: false,
    });
    expect(json).toEqual({
      type: "object",
      properties: {
        port: { type: "integer", minimum: 1 },
        name: { type: "string", minLength: 2 },
      },
      additionalProperties: false,
      required: ["port"],
    });
  });

  it("drops the required list for partial validation", () => {
    expect(toJsonSchema(webSchema, { partial: true })).not.toHaveProperty("required");
  });

  it("collects declared defaults", () => {
    expect(schemaDefaults(webSchema)).toEqual({ port: 8080, mode: "dev", tags: [], debug: false });
  });
});

describe("validateSettings", () => {
  it("passes valid settings", async () => {
    const result = await validateSettings(webSchema, { host: "web01", port: 443, mode: "prod", name: "shop" });
    expect(result).toEqual({ valid: true, errors: [] });
  });

  it("reports every violation with its path", async () => {
    const result = await validateSettings(webSchema, { port: 0, mode: "staging", name: "Shop1", tags: [1] });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(
      expect.arrayContaining([
        "/: must have required property 'host'",
        "/port: must be >= 1",
        "/mode: must be equal to one of the allowed values",
        '/name: must match pattern "^[a-z]+$"',
        "/tags/0: must be string",
      ]),
    );
    expect(result.errors).toHaveLength(5);
  });

  it("checks types", async () => {
    const result = await validateSettings(webSchema, { host: "h", port: "80" });
    expect(result.errors).toEqual(["/port: must be integer"]);
  });

  it("allows missing required properties in partial mode", async () => {
    const result = await validateSettings(webSchema, { port: 80 }, { partial: true });
    expect(result.valid).toBe(true);
  });

  it("names the extra key when additional properties are closed", async () => {
    const closed: ModuleSchema = { properties: { a: { type: "string" } }, additionalProperties: false };
    const result = await validateSettings(closed, { a: "x", b: 1 });
    expect(result.errors).toEqual(["/: must NOT have additional properties 'b'"]);
  });

  it("holds a bounded number of compiled validators", async () => {
    const limited = (max: number): ModuleSchema => ({ properties: { n: { type: "integer", maximum: max } } });
    for (let max = 1; max <= MAX_CACHED_VALIDATORS + 50; max++) {
      await validateSettings(limited(max), { n: 0 });
    }
    expect(cachedValidatorCount()).toBe(MAX_CACHED_VALIDATORS);

    const result = await validateSettings(limited(1), { n: 2 });
    expect(result.errors).toEqual(["/n: must be <= 1"]);
    expect(cachedValidatorCount()).toBe(MAX_CACHED_VALIDATORS);
  });
});
