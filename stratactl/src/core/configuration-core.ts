import fs, { type FSWatcher } from "node:fs";
import path from "node:path";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import YAML from "yaml";
import type { Logger } from "pino";
import { ConfigurationError, StoreError, ValidationError, errorMessage } from "../errors.js";
import { assertModuleSchema, schemaDefaults, validateSettings } from "../schema/module-schema.js";
import { createRegistry } from "../schema/registry.js";
import { loadStore, saveStore, serializeStore } from "../store/persistence.js";
import type { ModuleSchema, SettingsValidation } from "../types/schema.js";
import {
  DEFAULT_ENVIRONMENT,
  STORE_VERSION,
  type ConfigurationStore,
  type Environment,
  type ExportBundle,
  type ModuleEntry,
  type Settings,
} from "../types/store.js";
import { BackupManager, type BackupInfo } from "./backup.js";
import { EventBus, type EventHandler, type StrataEvent, type StrataEventName, type WILDCARD } from "./events.js";
import { defaultExpansionContext, expandVariables, type ExpansionContext } from "./expand.js";
import { cloneSettings, compareConfiguration, isPlainObject, mergeConfiguration, type ConfigDifference } from "./merge.js";
import { defaultBackupDir } from "./paths.js";

export const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]*$/;

export type ReloadCallback = (settings: Settings) => void | Promise<void>;

export type ConfigurationCoreOptions = {
  storePath: string;
  backupDir?: string;
  maxBackups?: number;
  historyLimit?: number;
  logger?: Logger;
  /** Keep the process alive while watching (the CLI's `watch`). */
  persistentWatch?: boolean;
  expansion?: Partial<ExpansionContext>;
};

export type RegisterOptions = {
  defaults?: Settings;
  description?: string;
  onReload?: ReloadCallback;
};

export type SetOptions = {
  environment?: string;
  /** Merge onto the existing overlay (default) or replace it. */
  merge?: boolean;
  validate?: boolean;
};

export type ValidationReport = {
  valid: boolean;
  environment: string;
  results: Record<string, SettingsValidation>;
};

export type EnvironmentSummary = {
  name: string;
  description: string;
  createdAt: string;
  current: boolean;
};

export type ReloadResult = {
  reloaded: boolean;
  changedModules: string[];
};

export type ExportOptions = {
  format?: "json" | "yaml";
  modules?: string[];
  environments?: string[];
  includeSchemas?: boolean;
};

export type ImportOptions = {
  mode?: "merge" | "replace";
  validate?: boolean;
  backupFirst?: boolean;
};

export type ImportResult = {
  mode: "merge" | "replace";
  modules: string[];
  environments: string[];
  backup: BackupInfo | null;
};

const EMPTY_SCHEMA: ModuleSchema = { properties: {} };

/**
 * The layered store service.
 *
 * Effective settings for a module are its registered defaults with the
 * environment's overlay merged on top. Every mutation builds the next store
 * on a copy, checks it, persists it, then publishes an event.
 */
export class ConfigurationCore {
  private store: ConfigurationStore | null = null;
  private watcher: FSWatcher | null = null;
  private reloadChain: Promise<unknown> = Promise.resolve();
  private lastWritten: string | null = null;
  private readonly callbacks = new Map<string, ReloadCallback>();
  private readonly events: EventBus;
  private readonly backups: BackupManager;
  private readonly logger: Logger | undefined;

  constructor(private readonly options: ConfigurationCoreOptions) {
    this.logger = options.logger;
    this.events = new EventBus(options.historyLimit ?? 100, options.logger);
    this.backups = new BackupManager(
      options.backupDir ?? defaultBackupDir(options.storePath),
      options.maxBackups ?? 10,
    );
  }

  // --- lifecycle ---

  /** Load the store. Resumes watching when the store has hot reload enabled. */
  async initialize(): Promise<ConfigurationStore> {
    this.store = await loadStore(this.options.storePath);
    if (this.store.hotReload.enabled) this.startWatcher();
    this.logger?.info(
      { storePath: this.store.storePath, environment: this.store.currentEnvironment },
      "configuration store loaded",
    );
    this.events.publish("StoreInitialized", {
      storePath: this.store.storePath,
      modules: Object.keys(this.store.modules).length,
      environments: Object.keys(this.store.environments).length,
    });
    return this.getStore();
  }

  getStore(): ConfigurationStore {
    return cloneSettings(this.requireStore());
  }

  /**
   * Replace the whole store; the result keeps this instance's store path.
   * The store must pass the store schema, every module needs a schema and every
   * overlay a module. Unless `validate` is false, every module's effective
   * settings are checked in every environment before anything is written.
   */
  async setStore(store: ConfigurationStore, opts: { validate?: boolean } = {}): Promise<void> {
    const next = cloneSettings(store);
    next.storePath = this.requireStore().storePath;

    const registry = await createRegistry();
    const checked = await registry.validate("store", JSON.parse(serializeStore(next)));
    if (!checked.valid) {
      throw new StoreError("STORE_CORRUPT", `Store failed schema validation: ${checked.errors.join("; ")}`);
    }
    for (const name of Object.keys(next.modules)) {
      assertName(name, "module");
      const schema = next.schemas[name];
      if (!schema) throw new StoreError("STORE_CORRUPT", `Module ${name} has no schema`);
      next.schemas[name] = await assertModuleSchema(schema);
    }
    for (const name of Object.keys(next.schemas)) {
      if (!next.modules[name]) throw new StoreError("STORE_CORRUPT", `Schema ${name} has no module`);
    }
    for (const [envName, env] of Object.entries(next.environments)) {
      for (const moduleName of Object.keys(env.settings)) {
        if (!next.modules[moduleName]) {
          throw new StoreError(
            "STORE_CORRUPT",
            `Environment ${envName} has settings for unknown module ${moduleName}`,
          );
        }
      }
    }
    if (!next.environments[DEFAULT_ENVIRONMENT] || !next.environments[next.currentEnvironment]) {
      throw new ConfigurationError("ENVIRONMENT_NOT_FOUND", "Store must contain the default and current environments");
    }

    if (opts.validate !== false) {
      const errors = await validateAcross(next, Object.keys(next.modules));
      if (errors.length > 0) {
        throw new ValidationError(`Store configuration is invalid: ${errors.join("; ")}`, errors);
      }
    }
    await this.commit(next);
  }

  /** Persist the current store as is (creates the file on first use). */
  async save(): Promise<void> {
    await this.commit(this.getStore());
  }

  storeExists(): boolean {
    return fs.existsSync(this.requireStore().storePath);
  }

  close(): void {
    this.stopWatcher();
    this.events.clear();
  }

  // --- events ---

  subscribe(event: StrataEventName | typeof WILDCARD, handler: EventHandler): () => void {
    return this.events.subscribe(event, handler);
  }

  publish(event: StrataEventName, data: Record<string, unknown> = {}): StrataEvent {
    return this.events.publish(event, data);
  }

  eventHistory(opts: { event?: StrataEventName; limit?: number } = {}): StrataEvent[] {
    return this.events.history(opts);
  }

  // --- modules ---

  async registerModule(name: string, schema: unknown, opts: RegisterOptions = {}): Promise<ModuleEntry> {
    assertName(name, "module");
    const checked = await assertModuleSchema(schema);
    const defaults = mergeConfiguration(schemaDefaults(checked), opts.defaults ?? {});

    const result = await validateSettings(checked, defaults, { partial: true });
    if (!result.valid) {
      throw new ValidationError(`Defaults for module ${name} are invalid: ${result.errors.join("; ")}`, result.errors);
    }

    const next = this.getStore();
    const existing = next.modules[name];
    const entry: ModuleEntry = {
      name,
      registeredAt: existing?.registeredAt ?? new Date().toISOString(),
      defaults,
    };
    const description = opts.description ?? existing?.description ?? checked.description;
    if (description !== undefined) entry.description = description;

    next.modules[name] = entry;
    next.schemas[name] = cloneSettings(checked);
    await this.commit(next);

    if (opts.onReload) this.callbacks.set(name, opts.onReload);
    this.logger?.info({ module: name, replaced: existing !== undefined }, "module registered");
    this.events.publish("ModuleRegistered", { module: name, replaced: existing !== undefined });
    return cloneSettings(entry);
  }

  async unregisterModule(name: string): Promise<void> {
    const next = this.getStore();
    this.requireModule(next, name);
    delete next.modules[name];
    delete next.schemas[name];
    for (const env of Object.values(next.environments)) {
      delete env.settings[name];
    }
    await this.commit(next);

    this.callbacks.delete(name);
    this.events.publish("ModuleUnregistered", { module: name });
  }

  listModules(): string[] {
    return Object.keys(this.requireStore().modules).sort();
  }

  getModuleSchema(name: string): ModuleSchema {
    const store = this.requireStore();
    this.requireModule(store, name);
    return cloneSettings(store.schemas[name] ?? EMPTY_SCHEMA);
  }

  /** Effective settings: module defaults with the environment overlay on top. */
  getModuleConfiguration(name: string, opts: { environment?: string; expand?: boolean } = {}): Settings {
    const store = this.requireStore();
    const envName = opts.environment ?? store.currentEnvironment;
    const effective = effectiveSettings(store, name, envName);
    if (!opts.expand) return effective;

    const expanded = expandVariables(effective, this.expansionContext(store));
    return isPlainObject(expanded) ? expanded : effective;
  }

  /** The environment's own overlay for a module, without defaults. */
  getModuleOverlay(name: string, opts: { environment?: string } = {}): Settings {
    const store = this.requireStore();
    this.requireModule(store, name);
    const env = this.requireEnvironment(store, opts.environment ?? store.currentEnvironment);
    return cloneSettings(env.settings[name] ?? {});
  }

  async setModuleConfiguration(name: string, settings: Settings, opts: SetOptions = {}): Promise<Settings> {
    const next = this.getStore();
    const envName = opts.environment ?? next.currentEnvironment;
    this.requireModule(next, name);
    const env = this.requireEnvironment(next, envName);

    const before = effectiveSettings(next, name, envName);
    const previousOverlay = env.settings[name] ?? {};
    const overlay = opts.merge === false ? cloneSettings(settings) : mergeConfiguration(previousOverlay, settings);
    env.settings[name] = overlay;
    const after = effectiveSettings(next, name, envName);

    if (opts.validate !== false) {
      const result = await validateSettings(next.schemas[name] ?? EMPTY_SCHEMA, after);
      if (!result.valid) {
        throw new ValidationError(
          `Configuration for module ${name} in environment ${envName} is invalid: ${result.errors.join("; ")}`,
          result.errors,
        );
      }
    }

    await this.commit(next);
    const changes = compareConfiguration(before, after);
    this.logger?.info({ module: name, environment: envName, changes: changes.length }, "configuration changed");
    this.events.publish("ConfigurationChanged", { module: name, environment: envName, changes });
    return after;
  }

  /** Drop the environment's overlay so the module falls back to its defaults. */
  async resetModuleConfiguration(name: string, opts: { environment?: string } = {}): Promise<Settings> {
    const next = this.getStore();
    const envName = opts.environment ?? next.currentEnvironment;
    this.requireModule(next, name);
    const env = this.requireEnvironment(next, envName);

    const before = effectiveSettings(next, name, envName);
    delete env.settings[name];
    const after = effectiveSettings(next, name, envName);
    await this.commit(next);

    this.events.publish("ConfigurationChanged", {
      module: name,
      environment: envName,
      changes: compareConfiguration(before, after),
      reset: true,
    });
    return after;
  }

  /** Validate one module, or every module, in an environment. */
  async validateConfiguration(name?: string, opts: { environment?: string } = {}): Promise<ValidationReport> {
    const store = this.requireStore();
    const envName = opts.environment ?? store.currentEnvironment;
    this.requireEnvironment(store, envName);
    if (name !== undefined) this.requireModule(store, name);

    const names = name !== undefined ? [name] : this.listModules();
    const results: Record<string, SettingsValidation> = {};
    for (const module of names) {
      results[module] = await validateSettings(
        store.schemas[module] ?? EMPTY_SCHEMA,
        effectiveSettings(store, module, envName),
      );
    }
    return {
      valid: Object.values(results).every((r) => r.valid),
      environment: envName,
      results,
    };
  }

  // --- environments ---

  listEnvironments(): EnvironmentSummary[] {
    const store = this.requireStore();
    return Object.values(store.environments)
      .map((env) => ({
        name: env.name,
        description: env.description,
        createdAt: env.createdAt,
        current: env.name === store.currentEnvironment,
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  getCurrentEnvironment(): string {
    return this.requireStore().currentEnvironment;
  }

  async newEnvironment(name: string, opts: { description?: string; copyFrom?: string } = {}): Promise<Environment> {
    assertName(name, "environment");
    const next = this.getStore();
    if (next.environments[name]) {
      throw new ConfigurationError("ENVIRONMENT_EXISTS", `Environment already exists: ${name}`);
    }
    const source = opts.copyFrom !== undefined ? this.requireEnvironment(next, opts.copyFrom) : null;

    const env: Environment = {
      name,
      description: opts.description ?? "",
      createdAt: new Date().toISOString(),
      settings: source ? cloneSettings(source.settings) : {},
    };
    next.environments[name] = env;
    await this.commit(next);

    this.events.publish("EnvironmentCreated", { environment: name, copyFrom: opts.copyFrom ?? null });
    return cloneSettings(env);
  }

  async switchEnvironment(name: string): Promise<void> {
    const next = this.getStore();
    this.requireEnvironment(next, name);
    const from = next.currentEnvironment;
    if (from === name) return;

    next.currentEnvironment = name;
    await this.commit(next);
    this.logger?.info({ from, to: name }, "environment switched");
    this.events.publish("EnvironmentChanged", { from, to: name });
  }

  async removeEnvironment(name: string): Promise<void> {
    const next = this.getStore();
    this.requireEnvironment(next, name);
    if (name === DEFAULT_ENVIRONMENT || name === next.currentEnvironment) {
      throw new ConfigurationError(
        "ENVIRONMENT_PROTECTED",
        `Environment ${name} cannot be removed (default or current environment)`,
      );
    }
    delete next.environments[name];
    await this.commit(next);
    this.events.publish("EnvironmentRemoved", { environment: name });
  }

  /** Differences in effective settings between two environments, per module. */
  compareEnvironments(
    left: string,
    right: string,
    opts: { module?: string } = {},
  ): Record<string, ConfigDifference[]> {
    const store = this.requireStore();
    this.requireEnvironment(store, left);
    this.requireEnvironment(store, right);
    const names = opts.module !== undefined ? [opts.module] : this.listModules();

    const out: Record<string, ConfigDifference[]> = {};
    for (const name of names) {
      const diff = compareConfiguration(effectiveSettings(store, name, left), effectiveSettings(store, name, right));
      if (diff.length > 0) out[name] = diff;
    }
    return out;
  }

  // --- hot reload ---

  async enableHotReload(): Promise<void> {
    const next = this.getStore();
    if (!this.watcher) this.startWatcher();
    if (next.hotReload.enabled && next.hotReload.watchedPaths.includes(next.storePath)) return;

    next.hotReload = { enabled: true, watchedPaths: [next.storePath] };
    await this.commit(next);
    this.events.publish("HotReloadEnabled", { watchedPaths: next.hotReload.watchedPaths });
  }

  async disableHotReload(): Promise<void> {
    this.stopWatcher();
    const next = this.getStore();
    if (!next.hotReload.enabled) return;

    next.hotReload = { enabled: false, watchedPaths: [] };
    await this.commit(next);
    this.events.publish("HotReloadDisabled", {});
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  getWatchers(): string[] {
    return [...this.requireStore().hotReload.watchedPaths];
  }

  /**
   * Re-read the store file. Modules whose effective settings changed get their
   * reload callback. A corrupt or missing file leaves the in-memory store as it was.
   */
  reload(): Promise<ReloadResult> {
    const run = this.reloadChain.then(() => this.doReload());
    this.reloadChain = run.catch(() => undefined);
    return run;
  }

  private async doReload(): Promise<ReloadResult> {
    const current = this.requireStore();

    let loaded: ConfigurationStore;
    try {
      loaded = await loadStore(current.storePath, { allowMissing: false });
    } catch (err) {
      this.logger?.error({ err: errorMessage(err), storePath: current.storePath }, "reload failed");
      this.events.publish("ReloadFailed", { storePath: current.storePath, error: errorMessage(err) });
      return { reloaded: false, changedModules: [] };
    }

    // A watcher event may arrive after a newer write is already in memory.
    const serialized = serializeStore(loaded);
    if (serialized === serializeStore(current) || serialized === this.lastWritten) {
      return { reloaded: false, changedModules: [] };
    }

    const names = new Set([...Object.keys(current.modules), ...Object.keys(loaded.modules)]);
    const changedModules = [...names]
      .filter((name) => {
        const before = current.modules[name] ? effectiveSettings(current, name, current.currentEnvironment) : {};
        const after = loaded.modules[name] ? effectiveSettings(loaded, name, loaded.currentEnvironment) : {};
        return compareConfiguration(before, after).length > 0;
      })
      .sort();

    this.store = loaded;
    if (loaded.hotReload.enabled && !this.watcher) this.startWatcher();

    for (const name of changedModules) {
      const callback = this.callbacks.get(name);
      if (!callback || !loaded.modules[name]) continue;
      try {
        await callback(effectiveSettings(loaded, name, loaded.currentEnvironment));
      } catch (err) {
        this.logger?.warn({ module: name, err: errorMessage(err) }, "reload callback failed");
        this.events.publish("ReloadCallbackFailed", { module: name, error: errorMessage(err) });
      }
    }

    this.logger?.info({ changedModules }, "configuration reloaded");
    this.events.publish("ConfigurationReloaded", { changedModules });
    return { reloaded: true, changedModules };
  }

  private startWatcher(): void {
    const storePath = this.requireStore().storePath;
    const dir = path.dirname(storePath);
    const fileName = path.basename(storePath);
    fs.mkdirSync(dir, { recursive: true });

    this.watcher = fs.watch(dir, { persistent: this.options.persistentWatch ?? false }, (_eventType, changed) => {
      if (changed !== null && changed.toString() !== fileName) return;
      this.reload().catch((err: unknown) => {
        this.logger?.error({ err: errorMessage(err) }, "reload failed");
      });
    });
    this.watcher.on("error", (err: Error) => {
      this.logger?.warn({ err: err.message, dir }, "store watcher error");
    });
    this.logger?.debug({ dir }, "watching store directory");
  }

  private stopWatcher(): void {
    if (!this.watcher) return;
    this.watcher.close();
    this.watcher = null;
  }

  // --- backup / restore ---

  async backup(opts: { reason?: string } = {}): Promise<BackupInfo> {
    const store = this.requireStore();
    if (!fs.existsSync(store.storePath)) await this.save();

    const info = await this.backups.create(store.storePath, opts.reason);
    this.logger?.info({ backup: info.name }, "configuration backed up");
    this.events.publish("ConfigurationBackedUp", { name: info.name, path: info.path, reason: info.reason });
    return info;
  }

  listBackups(): Promise<BackupInfo[]> {
    return this.backups.list();
  }

  getBackupDir(): string {
    return this.backups.getBackupDir();
  }

  async restore(nameOrPath: string, opts: { backupCurrent?: boolean } = {}): Promise<BackupInfo | null> {
    const store = this.requireStore();
    const restored = await this.backups.read(nameOrPath, store.storePath);

    let safety: BackupInfo | null = null;
    if (opts.backupCurrent !== false && fs.existsSync(store.storePath)) {
      safety = await this.backups.create(store.storePath, "pre-restore");
    }

    restored.hotReload = cloneSettings(store.hotReload);
    await this.commit(restored);
    this.logger?.info({ backup: nameOrPath }, "configuration restored");
    this.events.publish("ConfigurationRestored", { from: nameOrPath, safetyBackup: safety?.name ?? null });
    return safety;
  }

  // --- import / export ---

  async exportConfiguration(filePath: string, opts: ExportOptions = {}): Promise<ExportBundle> {
    const store = this.requireStore();
    const moduleNames = opts.modules ?? Object.keys(store.modules);
    for (const name of moduleNames) this.requireModule(store, name);
    const envNames = opts.environments ?? Object.keys(store.environments);
    for (const name of envNames) this.requireEnvironment(store, name);

    const bundle: ExportBundle = {
      format: "strata-export",
      version: STORE_VERSION,
      exportedAt: new Date().toISOString(),
      currentEnvironment: store.currentEnvironment,
      modules: {},
      environments: {},
    };
    for (const name of moduleNames) bundle.modules[name] = cloneSettings(store.modules[name]);
    if (opts.includeSchemas !== false) {
      bundle.schemas = {};
      for (const name of moduleNames) bundle.schemas[name] = cloneSettings(store.schemas[name] ?? EMPTY_SCHEMA);
    }
    for (const envName of envNames) {
      const env = store.environments[envName];
      const settings: Record<string, Settings> = {};
      for (const name of moduleNames) {
        const overlay = env.settings[name];
        if (overlay) settings[name] = cloneSettings(overlay);
      }
      bundle.environments[envName] = { ...cloneSettings(env), settings };
    }

    const format = opts.format ?? formatFromPath(filePath);
    const payload = format === "yaml" ? YAML.stringify(bundle) : JSON.stringify(bundle, null, 2) + "\n";
    await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await writeFile(filePath, payload, "utf8");

    this.logger?.info({ file: filePath, format, modules: moduleNames.length }, "configuration exported");
    this.events.publish("ConfigurationExported", {
      path: filePath,
      format,
      modules: moduleNames,
      environments: envNames,
    });
    return bundle;
  }

  async importConfiguration(filePath: string, opts: ImportOptions = {}): Promise<ImportResult> {
    const mode = opts.mode ?? "merge";
    const bundle = await readBundle(filePath);
    const current = this.requireStore();
    const next = this.getStore();

    for (const name of Object.keys(bundle.modules)) assertName(name, "module");
    for (const name of Object.keys(bundle.environments)) assertName(name, "environment");

    const schemas: Record<string, ModuleSchema> = {};
    for (const name of Object.keys(bundle.modules)) {
      const incoming = bundle.schemas?.[name] ?? current.schemas[name] ?? EMPTY_SCHEMA;
      schemas[name] = await assertModuleSchema(incoming);
    }

    const now = new Date().toISOString();
    if (mode === "replace") {
      next.modules = {};
      next.schemas = {};
      next.environments = {};
    }

    for (const [name, entry] of Object.entries(bundle.modules)) {
      next.modules[name] = {
        ...cloneSettings(entry),
        name,
        registeredAt: entry.registeredAt ?? now,
      };
      next.schemas[name] = schemas[name];
    }

    for (const [envName, env] of Object.entries(bundle.environments)) {
      const target: Environment = next.environments[envName] ?? {
        name: envName,
        description: env.description ?? "",
        createdAt: env.createdAt ?? now,
        settings: {},
      };
      for (const [moduleName, overlay] of Object.entries(env.settings)) {
        if (!next.modules[moduleName]) {
          throw new ConfigurationError(
            "IMPORT_INVALID",
            `Environment ${envName} has settings for unknown module ${moduleName}`,
          );
        }
        target.settings[moduleName] = mergeConfiguration(target.settings[moduleName] ?? {}, overlay);
      }
      next.environments[envName] = target;
    }

    if (!next.environments[DEFAULT_ENVIRONMENT]) {
      next.environments[DEFAULT_ENVIRONMENT] = {
        name: DEFAULT_ENVIRONMENT,
        description: "Default environment",
        createdAt: now,
        settings: {},
      };
    }
    if (mode === "replace") {
      const wanted = bundle.currentEnvironment;
      next.currentEnvironment = wanted !== undefined && next.environments[wanted] ? wanted : DEFAULT_ENVIRONMENT;
    } else if (!next.environments[next.currentEnvironment]) {
      next.currentEnvironment = DEFAULT_ENVIRONMENT;
    }

    if (opts.validate !== false) {
      const touched = new Set(Object.keys(bundle.modules));
      for (const env of Object.values(bundle.environments)) {
        for (const moduleName of Object.keys(env.settings)) touched.add(moduleName);
      }
      const errors = await validateAcross(next, [...touched]);
      if (errors.length > 0) {
        throw new ValidationError(`Imported configuration is invalid: ${errors.join("; ")}`, errors);
      }
    }

    let backup: BackupInfo | null = null;
    if (opts.backupFirst !== false && fs.existsSync(current.storePath)) {
      backup = await this.backups.create(current.storePath, "pre-import");
    }

    await this.commit(next);
    const result: ImportResult = {
      mode,
      modules: Object.keys(bundle.modules).sort(),
      environments: Object.keys(bundle.environments).sort(),
      backup,
    };
    this.logger?.info({ file: filePath, mode, modules: result.modules.length }, "configuration imported");
    this.events.publish("ConfigurationImported", {
      path: filePath,
      mode,
      modules: result.modules,
      environments: result.environments,
    });
    return result;
  }

  // --- internals ---

  private requireStore(): ConfigurationStore {
    if (!this.store) {
      throw new ConfigurationError("NOT_INITIALIZED", "Configuration store is not initialized; call initialize() first");
    }
    return this.store;
  }

  private requireModule(store: ConfigurationStore, name: string): ModuleEntry {
    const entry = store.modules[name];
    if (!entry) throw new ConfigurationError("MODULE_NOT_FOUND", `Module not registered: ${name}`);
    return entry;
  }

  private requireEnvironment(store: ConfigurationStore, name: string): Environment {
    const env = store.environments[name];
    if (!env) throw new ConfigurationError("ENVIRONMENT_NOT_FOUND", `Environment not found: ${name}`);
    return env;
  }

  private expansionContext(store: ConfigurationStore): ExpansionContext {
    return { ...defaultExpansionContext(path.dirname(store.storePath)), ...this.options.expansion };
  }

  /** Install `next` as the live store and persist it; roll back if the write fails. */
  private async commit(next: ConfigurationStore): Promise<void> {
    const previous = this.store;
    this.store = next;
    try {
      await saveStore(next);
    } catch (err) {
      this.store = previous;
      throw err;
    }
    this.lastWritten = serializeStore(next);
  }
}

/** Validate each named module's effective settings in every environment. */
async function validateAcross(store: ConfigurationStore, moduleNames: string[]): Promise<string[]> {
  const errors: string[] = [];
  for (const moduleName of [...moduleNames].sort()) {
    for (const envName of Object.keys(store.environments)) {
      const result = await validateSettings(
        store.schemas[moduleName] ?? EMPTY_SCHEMA,
        effectiveSettings(store, moduleName, envName),
      );
      for (const e of result.errors) errors.push(`${moduleName}@${envName} ${e}`);
    }
  }
  return errors;
}

export function assertName(name: string, kind: "module" | "environment"): void {
  if (!NAME_PATTERN.test(name)) {
    throw new ConfigurationError("INVALID_NAME", `Invalid ${kind} name: ${JSON.stringify(name)}`);
  }
}

export function effectiveSettings(store: ConfigurationStore, name: string, envName: string): Settings {
  const entry = store.modules[name];
  if (!entry) throw new ConfigurationError("MODULE_NOT_FOUND", `Module not registered: ${name}`);
  const env = store.environments[envName];
  if (!env) throw new ConfigurationError("ENVIRONMENT_NOT_FOUND", `Environment not found: ${envName}`);
  return mergeConfiguration(entry.defaults, env.settings[name] ?? {});
}

export function formatFromPath(filePath: string): "json" | "yaml" {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "json";
}

type ImportedModule = Omit<ModuleEntry, "registeredAt"> & { registeredAt?: string };
type ImportedEnvironment = {
  name?: string;
  description?: string;
  createdAt?: string;
  settings: Record<string, Settings>;
};
type ImportedBundle = Omit<ExportBundle, "modules" | "environments" | "currentEnvironment"> & {
  currentEnvironment?: string;
  modules: Record<string, ImportedModule>;
  environments: Record<string, ImportedEnvironment>;
};

function isImportedBundle(doc: unknown): doc is ImportedBundle {
  return isPlainObject(doc) && doc.format === "strata-export" && isPlainObject(doc.modules) && isPlainObject(doc.environments);
}

async function readBundle(filePath: string): Promise<ImportedBundle> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError("IMPORT_INVALID", `Import file not found: ${filePath}`);
  }
  const raw = await readFile(filePath, "utf8");

  let doc: unknown;
  try {
    doc = formatFromPath(filePath) === "yaml" ? YAML.parse(raw) : JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError("IMPORT_INVALID", `Cannot parse ${filePath}: ${errorMessage(e)}`);
  }

  const registry = await createRegistry();
  const { valid, errors } = await registry.validate("export", doc);
  if (!valid || !isImportedBundle(doc)) {
    throw new ConfigurationError("IMPORT_INVALID", `Not a strata export (${filePath}): ${errors.join("; ")}`);
  }
  return doc;
}
