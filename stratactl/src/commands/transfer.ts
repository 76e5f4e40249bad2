import type { ImportResult } from "../core/configuration-core.js";
import { withCore, type GlobalOptions } from "./context.js";
import type { CommandResult } from "./result.js";

export type ExportArgs = {
  file: string;
  format?: "json" | "yaml";
  modules?: string[];
  environments?: string[];
  includeSchemas?: boolean;
};

export function exportStore(
  opts: GlobalOptions,
  args: ExportArgs,
): Promise<CommandResult<{ file: string; modules: string[]; environments: string[] }>> {
  return withCore(opts, async (core) => {
    const bundle = await core.exportConfiguration(args.file, {
      format: args.format,
      modules: args.modules && args.modules.length > 0 ? args.modules : undefined,
      environments: args.environments && args.environments.length > 0 ? args.environments : undefined,
      includeSchemas: args.includeSchemas,
    });
    return {
      file: args.file,
      modules: Object.keys(bundle.modules).sort(),
      environments: Object.keys(bundle.environments).sort(),
    };
  });
}

export function importStore(
  opts: GlobalOptions,
  args: { file: string; mode?: "merge" | "replace"; validate?: boolean; backupFirst?: boolean },
): Promise<CommandResult<ImportResult>> {
  return withCore(opts, (core) =>
    core.importConfiguration(args.file, {
      mode: args.mode,
      validate: args.validate,
      backupFirst: args.backupFirst,
    }),
  );
}
