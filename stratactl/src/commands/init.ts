import type { GlobalOptions } from "./context.js";
import { withCore } from "./context.js";
import type { CommandResult } from "./result.js";

export type InitValue = { storePath: string; created: boolean; environment: string };

/** Create the store file if it does not exist yet. */
export function init(opts: GlobalOptions): Promise<CommandResult<InitValue>> {
  return withCore(opts, async (core) => {
    const created = !core.storeExists();
    if (created) await core.save();
    const store = core.getStore();
    return { storePath: store.storePath, created, environment: store.currentEnvironment };
  });
}
