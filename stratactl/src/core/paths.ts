import os from "node:os";
import path from "node:path";

export const STORE_FILE = "configuration.json";
export const APP_DIR = "strata";

/**
 * Platform-specific store location:
 * `%APPDATA%/strata/configuration.json` on Windows, `~/.strata/configuration.json` elsewhere.
 * `STRATA_STORE_PATH` wins over both.
 */
export function defaultStorePath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string {
  if (env.STRATA_STORE_PATH) return path.resolve(env.STRATA_STORE_PATH);

  if (platform === "win32") {
    const appData = env.APPDATA || path.win32.join(home, "AppData", "Roaming");
    return path.win32.join(appData, APP_DIR, STORE_FILE);
  }
  return path.posix.join(home, `.${APP_DIR}`, STORE_FILE);
}

export function defaultBackupDir(storePath: string): string {
  return path.join(path.dirname(storePath), "backups");
}
