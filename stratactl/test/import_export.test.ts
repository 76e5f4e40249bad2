import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import YAML from "yaml";
import { ConfigurationCore } from "../src/core/configuration-core.js";
import { ValidationError } from "../src/errors.js";
import type { ExportBundle } from "../src/types/store.js";

const webSchema = {
  properties: {
    port: { type: "integer", minimum: 1, default: 80 },
    host: { type: "string" },
  },
};

describe("export and import", () => {
  let tmpDir: string;
  let source: ConfigurationCore;
  let target: ConfigurationCore;
  let targetPath: string;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "strata-transfer-"));
    source = new ConfigurationCore({ storePath: path.join(tmpDir, "source", "configuration.json") });
    await source.initialize();
    await source.registerModule("web", webSchema, { defaults: { host: "localhost" } });
    await source.newEnvironment("lab", { description: "Lab rack" });
    await source.setModuleConfiguration("web", { port: 8080 }, { environment: "lab" });

    targetPath = path.join(tmpDir, "target", "configuration.json");
    target = new ConfigurationCore({ storePath: targetPath });
    await target.initialize();
  });

  afterEach(() => {
    source.close();
    target.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("exports modules, schemas and environments as JSON", async () => {
    const file = path.join(tmpDir, "export.json");
    const bundle = await source.exportConfiguration(file);
    const onDisk: ExportBundle = JSON.parse(fs.readFileSync(file, "utf8"));

    expect(onDisk).toEqual(bundle);
    expect(onDisk.format).toBe("strata-export");
    expect(Object.keys(onDisk.modules)).toEqual(["web"]);
    expect(onDisk.schemas?.web).toEqual(webSchema);
    expect(onDisk.environments.lab).toMatchObject({ description: "Lab rack", settings: { web: { port: 8080 } } });
    expect(onDisk.environments.default.settings).toEqual({});
  });

  it("picks YAML from the extension and honours filters", async () => {
    const file = path.join(tmpDir, "out", "lab.yml");
    await source.exportConfiguration(file, { environments: ["lab"], includeSchemas: false });
    const doc = YAML.parse(fs.readFileSync(file, "utf8"));

    expect(doc.format).toBe("strata-export");
    expect(Object.keys(doc.environments)).toEqual(["lab"]);
    expect(doc).not.toHaveProperty("schemas");
  });

  it("refuses to export unknown modules", async () => {
    await expect(
      source.exportConfiguration(path.join(tmpDir, "x.json"), { modules: ["nope"] }),
    ).rejects.toMatchObject({ code: "MODULE_NOT_FOUND" });
  });

  it("merges an export into another store", async () => {
    const file = path.join(tmpDir, "export.yaml");
    await source.exportConfiguration(file);

    const result = await target.importConfiguration(file);

    expect(result).toEqual({ mode: "merge", modules: ["web"], environments: ["default", "lab"], backup: null });
    expect(target.getModuleConfiguration("web", { environment: "lab" })).toEqual({ host: "localhost", port: 8080 });
    expect(target.getModuleSchema("web")).toEqual(webSchema);
    expect(target.eventHistory({ event: "ConfigurationImported" })).toHaveLength(1);
  });

  it("keeps existing modules on merge and drops them on replace", async () => {
    const file = path.join(tmpDir, "export.json");
    await source.exportConfiguration(file);
    await target.registerModule("legacy", { properties: {} });

    await target.importConfiguration(file);
    expect(target.listModules()).toEqual(["legacy", "web"]);

    const replaced = await target.importConfiguration(file, { mode: "replace" });
    expect(target.listModules()).toEqual(["web"]);
    expect(replaced.backup?.reason).toBe("pre-import");
  });

  it("rejects invalid settings and leaves the store untouched", async () => {
    const file = path.join(tmpDir, "bad.json");
    const bundle = await source.exportConfiguration(file);
    bundle.environments.lab.settings.web = { port: 0 };
    fs.writeFileSync(file, JSON.stringify(bundle));

    const err = await target.importConfiguration(file).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ errors: ["web@lab /port: must be >= 1"] });
    expect(target.listModules()).toEqual([]);
    expect(fs.existsSync(targetPath)).toBe(false);
  });

  it("rejects settings for modules the bundle does not define", async () => {
    const file = path.join(tmpDir, "orphan.json");
    const bundle = await source.exportConfiguration(file);
    bundle.environments.lab.settings.ghost = { on: true };
    fs.writeFileSync(file, JSON.stringify(bundle));

    await expect(target.importConfiguration(file)).rejects.toMatchObject({ code: "IMPORT_INVALID" });
  });

  it("rejects files that are not exports", async () => {
    const file = path.join(tmpDir, "random.json");
    fs.writeFileSync(file, JSON.stringify({ hello: "world" }));
    await expect(target.importConfiguration(file)).rejects.toMatchObject({ code: "IMPORT_INVALID" });
    await expect(target.importConfiguration(path.join(tmpDir, "missing.json"))).rejects.toMatchObject({
      code: "IMPORT_INVALID",
    });
  });
});
