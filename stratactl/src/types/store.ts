/** Store model: one JSON document holding every module, schema and environment. */
import type { ModuleSchema } from "./schema.js";

export type Settings = Record<string, unknown>;

export type ModuleEntry = {
  name: string;
  description?: string;
  registeredAt: string;
  /** Base layer every environment overlays. */
  defaults: Settings;
};

export type Environment = {
  name: string;
  description: string;
  createdAt: string;
  /** Overlay per module name. */
  settings: Record<string, Settings>;
};

export type HotReloadState = {
  enabled: boolean;
  watchedPaths: string[];
};

export type ConfigurationStore = {
  version: string;
  modules: Record<string, ModuleEntry>;
  environments: Record<string, Environment>;
  schemas: Record<string, ModuleSchema>;
  currentEnvironment: string;
  hotReload: HotReloadState;
  storePath: string;
  lastModified: string | null;
};

export type ExportBundle = {
  format: "strata-export";
  version: string;
  exportedAt: string;
  currentEnvironment: string;
  modules: Record<string, ModuleEntry>;
  schemas?: Record<string, ModuleSchema>;
  environments: Record<string, Environment>;
};

export const STORE_VERSION = "1.0";
export const DEFAULT_ENVIRONMENT = "default";
