import type { EnvironmentSummary } from "../core/configuration-core.js";
import type { ConfigDifference } from "../core/merge.js";
import { redactDifferences } from "../core/security.js";
import type { Environment } from "../types/store.js";
import { withCore, type GlobalOptions } from "./context.js";
import type { CommandResult } from "./result.js";

export function listEnvironments(opts: GlobalOptions): Promise<CommandResult<EnvironmentSummary[]>> {
  return withCore(opts, async (core) => core.listEnvironments());
}

export function newEnvironment(
  opts: GlobalOptions,
  args: { name: string; description?: string; copyFrom?: string; use?: boolean },
): Promise<CommandResult<Environment>> {
  return withCore(opts, async (core) => {
    const env = await core.newEnvironment(args.name, { description: args.description, copyFrom: args.copyFrom });
    if (args.use) await core.switchEnvironment(args.name);
    return env;
  });
}

export function useEnvironment(
  opts: GlobalOptions,
  name: string,
): Promise<CommandResult<{ from: string; to: string }>> {
  return withCore(opts, async (core) => {
    const from = core.getCurrentEnvironment();
    await core.switchEnvironment(name);
    return { from, to: name };
  });
}

export function removeEnvironment(opts: GlobalOptions, name: string): Promise<CommandResult<{ removed: string }>> {
  return withCore(opts, async (core) => {
    await core.removeEnvironment(name);
    return { removed: name };
  });
}

export function diffEnvironments(
  opts: GlobalOptions,
  args: { left: string; right: string; module?: string; showSecrets?: boolean },
): Promise<CommandResult<Record<string, ConfigDifference[]>>> {
  return withCore(opts, async (core) => {
    const diff = core.compareEnvironments(args.left, args.right, { module: args.module });
    if (args.showSecrets) return diff;
    const out: Record<string, ConfigDifference[]> = {};
    for (const [name, changes] of Object.entries(diff)) out[name] = redactDifferences(changes);
    return out;
  });
}
