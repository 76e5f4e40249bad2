import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { loadSettings, resolveSettings } from "../config/loader.js";
import { assertSettings } from "../config/validator.js";
import { ConfigurationCore } from "../core/configuration-core.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { failure, type CommandResult } from "./result.js";

/** Options every command takes: where the store lives and which settings profile applies. */
export type GlobalOptions = {
  store?: string;
  profile?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

export async function openCore(
  opts: GlobalOptions,
  extra: { persistentWatch?: boolean } = {},
): Promise<ConfigurationCore> {
  const env = opts.env ?? process.env;
  const settings = await assertSettings(loadSettings(opts.profile, opts.configDir, env));
  const resolved = resolveSettings(settings, env, opts.store);

  const core = new ConfigurationCore({
    storePath: resolved.storePath,
    backupDir: resolved.backupDir,
    maxBackups: resolved.maxBackups,
    historyLimit: resolved.historyLimit,
    logger: createLogger("stratactl", resolved.logLevel),
    persistentWatch: extra.persistentWatch,
  });
  await core.initialize();
  return core;
}

/** Open the store, run `fn`, close the store. Errors become a failed result. */
export async function withCore<T>(
  opts: GlobalOptions,
  fn: (core: ConfigurationCore) => Promise<T>,
): Promise<CommandResult<T>> {
  let core: ConfigurationCore | null = null;
  try {
    core = await openCore(opts);
    return { ok: true, value: await fn(core) };
  } catch (err) {
    return failure(err);
  } finally {
    core?.close();
  }
}

/** Read a JSON or YAML document (by extension) from disk. */
export function readDocument(filePath: string): unknown {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError("INVALID_ARGS", `File not found: ${filePath}`);
  }
  const raw = fs.readFileSync(resolved, "utf8");
  const ext = path.extname(resolved).toLowerCase();
  try {
    return ext === ".yaml" || ext === ".yml" ? YAML.parse(raw) : JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError("INVALID_ARGS", `Cannot parse ${filePath}: ${errorMessage(e)}`);
  }
}
