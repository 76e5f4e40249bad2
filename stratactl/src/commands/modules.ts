import { isPlainObject } from "../core/merge.js";
import { ConfigurationError } from "../errors.js";
import type { ModuleEntry } from "../types/store.js";
import { readDocument, withCore, type GlobalOptions } from "./context.js";
import type { CommandResult } from "./result.js";

export type ModuleSummary = {
  name: string;
  description: string | null;
  registeredAt: string;
  properties: number;
};

export function listModules(opts: GlobalOptions): Promise<CommandResult<ModuleSummary[]>> {
  return withCore(opts, async (core) => {
    const store = core.getStore();
    return core.listModules().map((name) => ({
      name,
      description: store.modules[name].description ?? null,
      registeredAt: store.modules[name].registeredAt,
      properties: Object.keys(store.schemas[name]?.properties ?? {}).length,
    }));
  });
}

/**
 * Register a module from a schema file (JSON or YAML), optionally with a
 * defaults file layered over the schema's own defaults.
 */
export function registerModule(
  opts: GlobalOptions,
  args: { module: string; schemaFile: string; defaultsFile?: string; description?: string },
): Promise<CommandResult<ModuleEntry>> {
  return withCore(opts, async (core) => {
    const schema = readDocument(args.schemaFile);
    let defaults: Record<string, unknown> | undefined;
    if (args.defaultsFile) {
      const doc = readDocument(args.defaultsFile);
      if (!isPlainObject(doc)) {
        throw new ConfigurationError("INVALID_ARGS", `Defaults file must contain an object: ${args.defaultsFile}`);
      }
      defaults = doc;
    }
    return core.registerModule(args.module, schema, { defaults, description: args.description });
  });
}

export function unregisterModule(opts: GlobalOptions, module: string): Promise<CommandResult<{ module: string }>> {
  return withCore(opts, async (core) => {
    await core.unregisterModule(module);
    return { module };
  });
}
