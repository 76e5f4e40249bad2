import type { BackupInfo } from "../core/backup.js";
import { withCore, type GlobalOptions } from "./context.js";
import type { CommandResult } from "./result.js";

export function createBackup(opts: GlobalOptions, reason?: string): Promise<CommandResult<BackupInfo>> {
  return withCore(opts, (core) => core.backup({ reason }));
}

/** Newest first. */
export function listBackups(opts: GlobalOptions): Promise<CommandResult<BackupInfo[]>> {
  return withCore(opts, (core) => core.listBackups());
}

export function restoreBackup(
  opts: GlobalOptions,
  args: { backup: string; backupCurrent?: boolean },
): Promise<CommandResult<{ restored: string; safetyBackup: string | null }>> {
  return withCore(opts, async (core) => {
    const safety = await core.restore(args.backup, { backupCurrent: args.backupCurrent });
    return { restored: args.backup, safetyBackup: safety?.name ?? null };
  });
}
