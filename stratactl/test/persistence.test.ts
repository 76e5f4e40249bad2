import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  acquireFsLock,
  createEmptyStore,
  loadStore,
  saveStore,
  serializeStore,
} from "../src/store/persistence.js";
import { defaultBackupDir, defaultStorePath } from "../src/core/paths.js";
import { StoreError } from "../src/errors.js";

describe("store persistence", () => {
  let tmpDir: string;
  let storePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "strata-store-"));
    storePath = path.join(tmpDir, "nested", "configuration.json");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns an empty store for a missing file without writing it", async () => {
    const store = await loadStore(storePath);
    expect(store.environments.default.name).toBe("default");
    expect(store.currentEnvironment).toBe("default");
    expect(store.modules).toEqual({});
    expect(store.hotReload).toEqual({ enabled: false, watchedPaths: [] });
    expect(store.lastModified).toBeNull();
    expect(fs.existsSync(storePath)).toBe(false);
  });

  it("throws STORE_NOT_FOUND when a missing file is not allowed", async () => {
    await expect(loadStore(storePath, { allowMissing: false })).rejects.toMatchObject({ code: "STORE_NOT_FOUND" });
  });

  it("saves atomically and loads back the same document", async () => {
    const store = createEmptyStore(storePath);
    store.modules.web = { name: "web", registeredAt: "2026-01-01T00:00:00.000Z", defaults: { port: 80 } };
    store.schemas.web = { properties: { port: { type: "integer" } } };
    await saveStore(store);

    expect(store.lastModified).not.toBeNull();
    expect(fs.readFileSync(storePath, "utf8")).toBe(serializeStore(store));
    expect(fs.existsSync(`${storePath}.lock`)).toBe(false);
    expect(fs.readdirSync(path.dirname(storePath))).toEqual(["configuration.json"]);

    const loaded = await loadStore(storePath);
    expect(loaded).toEqual(store);
  });

  it("rejects invalid JSON as STORE_CORRUPT", async () => {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    fs.writeFileSync(storePath, "{ not json");
    const err = await loadStore(storePath).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreError);
    expect(err).toMatchObject({ code: "STORE_CORRUPT" });
  });

  it("rejects a document that fails the store schema", async () => {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    fs.writeFileSync(storePath, JSON.stringify({ version: "1.0", modules: [] }));
    await expect(loadStore(storePath)).rejects.toThrow("Store failed schema validation");
  });

  it("repairs a missing default environment and a dangling current environment", async () => {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    fs.writeFileSync(
      storePath,
      JSON.stringify({
        version: "1.0",
        modules: {},
        schemas: {},
        environments: { lab: { name: "lab", settings: {} } },
        currentEnvironment: "gone",
        hotReload: { enabled: false, watchedPaths: [] },
      }),
    );
    const store = await loadStore(storePath);
    expect(Object.keys(store.environments).sort()).toEqual(["default", "lab"]);
    expect(store.currentEnvironment).toBe("default");
    expect(store.environments.lab.description).toBe("");
    expect(store.storePath).toBe(storePath);
  });

  it("times out while another live process holds the lock", async () => {
    fs.mkdirSync(tmpDir, { recursive: true });
    const lockPath = path.join(tmpDir, "held.lock");
    fs.writeFileSync(lockPath, `${process.pid}\n${Date.now()}\n`);
    await expect(acquireFsLock(lockPath, 100)).rejects.toMatchObject({ code: "STORE_LOCKED" });
  });

  it("takes over a lock whose owner is gone", async () => {
    const lockPath = path.join(tmpDir, "orphan.lock");
    fs.writeFileSync(lockPath, `999999999\n${Date.now()}\n`);
    const release = await acquireFsLock(lockPath, 1000);
    expect(fs.readFileSync(lockPath, "utf8").split("\n")[0]).toBe(String(process.pid));
    await release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });
});

describe("default paths", () => {
  it("uses ~/.strata on POSIX", () => {
    expect(defaultStorePath("linux", {}, "/home/ops")).toBe("/home/ops/.strata/configuration.json");
  });

  it("uses APPDATA on Windows", () => {
    expect(defaultStorePath("win32", { APPDATA: "C:\\Users\\ops\\AppData\\Roaming" }, "C:\\Users\\ops")).toBe(
      "C:\\Users\\ops\\AppData\\Roaming\\strata\\configuration.json",
    );
  });

  it("falls back to the roaming profile when APPDATA is unset", () => {
    expect(defaultStorePath("win32", {}, "C:\\Users\\ops")).toBe(
      "C:\\Users\\ops\\AppData\\Roaming\\strata\\configuration.json",
    );
  });

  it("lets STRATA_STORE_PATH win", () => {
    expect(defaultStorePath("linux", { STRATA_STORE_PATH: "/srv/strata.json" }, "/home/ops")).toBe("/srv/strata.json");
  });

  it("puts backups beside the store", () => {
    expect(defaultBackupDir("/srv/strata/configuration.json")).toBe(path.join("/srv/strata", "backups"));
  });
});
