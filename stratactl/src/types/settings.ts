/** stratactl's own settings, layered from config/*.yaml and STRATA_* variables. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type StrataSettings = {
  schema_version: string;
  /** Empty means the platform default. */
  store_path: string;
  /** Empty means `<store dir>/backups`. */
  backup_dir: string;
  max_backups: number;
  history_limit: number;
  log_level: LogLevel;
};
