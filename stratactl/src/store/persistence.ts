import { mkdir, open, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { StoreError, errorMessage } from "../errors.js";
import { createRegistry } from "../schema/registry.js";
import {
  DEFAULT_ENVIRONMENT,
  STORE_VERSION,
  type ConfigurationStore,
  type Environment,
} from "../types/store.js";

export const STALE_LOCK_AGE_MS = 300000; // 5 minutes
export const LOCK_TIMEOUT_MS = 5000;

export function createDefaultEnvironment(now: string = new Date().toISOString()): Environment {
  return {
    name: DEFAULT_ENVIRONMENT,
    description: "Default environment",
    createdAt: now,
    settings: {},
  };
}

export function createEmptyStore(storePath: string): ConfigurationStore {
  return {
    version: STORE_VERSION,
    modules: {},
    environments: { [DEFAULT_ENVIRONMENT]: createDefaultEnvironment() },
    schemas: {},
    currentEnvironment: DEFAULT_ENVIRONMENT,
    hotReload: { enabled: false, watchedPaths: [] },
    storePath,
    lastModified: null,
  };
}

/**
 * Parse and check a serialized store. Repairs the two invariants a hand-edited
 * file most often breaks: a missing `default` environment and a current
 * environment that no longer exists.
 */
export async function parseStore(raw: string, storePath: string): Promise<ConfigurationStore> {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (e) {
    throw new StoreError("STORE_CORRUPT", `Store is not valid JSON (${storePath}): ${errorMessage(e)}`);
  }

  const registry = await createRegistry();
  const { valid, errors } = await registry.validate("store", doc);
  if (!valid || !isStoreDocument(doc)) {
    throw new StoreError("STORE_CORRUPT", `Store failed schema validation (${storePath}): ${errors.join("; ")}`);
  }

  const store: ConfigurationStore = {
    ...doc,
    storePath,
    lastModified: doc.lastModified ?? null,
  };

  for (const [name, env] of Object.entries(store.environments)) {
    env.name = name;
    env.description ??= "";
    env.createdAt ??= new Date(0).toISOString();
  }
  if (!store.environments[DEFAULT_ENVIRONMENT]) {
    store.environments[DEFAULT_ENVIRONMENT] = createDefaultEnvironment();
  }
  if (!store.environments[store.currentEnvironment]) {
    store.currentEnvironment = DEFAULT_ENVIRONMENT;
  }
  return store;
}

function isStoreDocument(doc: unknown): doc is ConfigurationStore {
  return typeof doc === "object" && doc !== null && "modules" in doc && "environments" in doc;
}

/**
 * Load the store from disk. A missing file yields an empty store (nothing is
 * written) unless `allowMissing` is false.
 */
export async function loadStore(
  storePath: string,
  opts: { allowMissing?: boolean } = {},
): Promise<ConfigurationStore> {
  let raw: string;
  try {
    raw = await readFile(storePath, "utf8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      if (opts.allowMissing === false) {
        throw new StoreError("STORE_NOT_FOUND", `Store not found: ${storePath}`);
      }
      return createEmptyStore(storePath);
    }
    throw e;
  }
  return parseStore(raw, storePath);
}

export function serializeStore(store: ConfigurationStore): string {
  return JSON.stringify(store, null, 2) + "\n";
}

/** Stamp `lastModified` and write the store atomically under the store lock. */
export async function saveStore(store: ConfigurationStore): Promise<void> {
  const release = await acquireFsLock(`${store.storePath}.lock`, LOCK_TIMEOUT_MS);
  try {
    store.lastModified = new Date().toISOString();
    await atomicWriteFile(store.storePath, serializeStore(store));
  } finally {
    await release();
  }
}

export async function atomicWriteFile(path: string, payload: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}`;

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Exclusive lock file holding `<pid>\n<timestamp>`. Stale (older than
 * STALE_LOCK_AGE_MS) and orphaned (owner pid gone) locks are taken over.
 */
export async function acquireFsLock(lockPath: string, timeoutMs: number): Promise<() => Promise<void>> {
  await mkdir(dirname(lockPath), { recursive: true });
  const started = Date.now();
  const pid = process.pid;
  let retries = 0;

  for (;;) {
    await clearAbandonedLock(lockPath, pid);

    try {
      const fh = await open(lockPath, "wx");
      try {
        await fh.writeFile(`${pid}\n${Date.now()}\n`, "utf8");
        await fh.sync();
      } finally {
        await fh.close();
      }

      return async () => {
        const content = await readFile(lockPath, "utf8").catch(() => "");
        const [lockPid] = content.split("\n");
        if (lockPid === String(pid)) {
          await unlink(lockPath);
        }
      };
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "EEXIST") throw e;

      retries++;
      if (Date.now() - started > timeoutMs) {
        throw new StoreError("STORE_LOCKED", `Timed out acquiring store lock after ${retries} retries: ${lockPath}`);
      }

      // Exponential backoff with jitter
      const backoff = Math.min(50 * Math.pow(1.5, retries), 1000);
      const jitter = Math.random() * backoff * 0.1;
      await new Promise((r) => setTimeout(r, backoff + jitter));
    }
  }
}

async function clearAbandonedLock(lockPath: string, pid: number): Promise<void> {
  let age: number;
  try {
    age = Date.now() - (await stat(lockPath)).mtimeMs;
  } catch {
    return; // no lock
  }

  if (age > STALE_LOCK_AGE_MS) {
    await unlink(lockPath).catch(() => undefined);
    return;
  }

  const content = await readFile(lockPath, "utf8").catch(() => "");
  const [lockPid] = content.split("\n");
  if (!lockPid || lockPid === String(pid)) return;
  try {
    process.kill(Number(lockPid), 0); // Signal 0 checks existence
  } catch {
    await unlink(lockPath).catch(() => undefined);
  }
}
