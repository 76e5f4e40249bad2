import type { StrataEvent } from "../core/events.js";
import { redactEventData } from "../core/security.js";
import { openCore, type GlobalOptions } from "./context.js";
import { failure, type CommandResult } from "./result.js";

/**
 * Watch the store file until `signal` aborts, reporting every event.
 * Hot reload is switched back off on exit if it was off before. Event data
 * arrives with secrets redacted.
 */
export async function watch(
  opts: GlobalOptions,
  args: { signal: AbortSignal; onEvent: (event: StrataEvent) => void },
): Promise<CommandResult<{ events: number; storePath: string }>> {
  let events = 0;
  try {
    const core = await openCore(opts, { persistentWatch: true });
    const storePath = core.getStore().storePath;
    const wasEnabled = core.getStore().hotReload.enabled;
    const unsubscribe = core.subscribe("*", (event) => {
      events++;
      args.onEvent({ ...event, data: redactEventData(event.data) });
    });

    try {
      await core.enableHotReload();
      if (!args.signal.aborted) {
        await new Promise<void>((resolve) => {
          args.signal.addEventListener("abort", () => resolve(), { once: true });
        });
      }
      unsubscribe();
      if (!wasEnabled) await core.disableHotReload();
    } finally {
      core.close();
    }
    return { ok: true, value: { events, storePath } };
  } catch (err) {
    return failure(err);
  }
}
