import { getPath, isUnsafePath, setPath } from "../core/merge.js";
import { redactSettings } from "../core/security.js";
import { ConfigurationError } from "../errors.js";
import type { Settings } from "../types/store.js";
import { withCore, type GlobalOptions } from "./context.js";
import type { CommandResult } from "./result.js";

/**
 * Parse `key=value`. The value is taken as JSON when it parses
 * (`port=8080`, `debug=true`, `tags=["a"]`), otherwise as a plain string.
 */
export function parseAssignment(assignment: string): { key: string; value: unknown } {
  const eq = assignment.indexOf("=");
  const key = eq === -1 ? "" : assignment.slice(0, eq).trim();
  if (!key || key.split(".").some((part) => part.length === 0)) {
    throw new ConfigurationError("INVALID_ARGS", `Expected key=value, got: ${assignment}`);
  }
  if (isUnsafePath(key)) {
    throw new ConfigurationError("INVALID_ARGS", `Key may not contain __proto__, constructor or prototype: ${key}`);
  }

  const raw = assignment.slice(eq + 1);
  try {
    return { key, value: JSON.parse(raw) };
  } catch {
    return { key, value: raw };
  }
}

export function buildOverlay(assignments: string[]): Settings {
  const overlay: Settings = {};
  for (const a of assignments) {
    const { key, value } = parseAssignment(a);
    setPath(overlay, key, value);
  }
  return overlay;
}

export type GetArgs = {
  module: string;
  key?: string;
  environment?: string;
  expand?: boolean;
  showSecrets?: boolean;
};

/** Effective settings of a module, or one dotted key of them. Secrets are redacted unless asked. */
export function getSettings(opts: GlobalOptions, args: GetArgs): Promise<CommandResult<unknown>> {
  return withCore(opts, async (core) => {
    const effective = core.getModuleConfiguration(args.module, {
      environment: args.environment,
      expand: args.expand,
    });
    if (args.key === undefined) return args.showSecrets ? effective : redactSettings(effective);

    const value = getPath(effective, args.key);
    if (value === undefined) {
      throw new ConfigurationError("KEY_NOT_FOUND", `Key not found in ${args.module}: ${args.key}`);
    }
    return args.showSecrets ? value : getPath(redactSettings(effective), args.key);
  });
}

export type SetArgs = {
  module: string;
  assignments: string[];
  environment?: string;
  replace?: boolean;
  validate?: boolean;
  showSecrets?: boolean;
};

export function setSettings(opts: GlobalOptions, args: SetArgs): Promise<CommandResult<Settings>> {
  return withCore(opts, async (core) => {
    if (args.assignments.length === 0) {
      throw new ConfigurationError("INVALID_ARGS", "Nothing to set: pass at least one key=value");
    }
    const overlay = buildOverlay(args.assignments);
    const effective = await core.setModuleConfiguration(args.module, overlay, {
      environment: args.environment,
      merge: !args.replace,
      validate: args.validate,
    });
    return args.showSecrets ? effective : redactSettings(effective);
  });
}

export function resetSettings(
  opts: GlobalOptions,
  args: { module: string; environment?: string; showSecrets?: boolean },
): Promise<CommandResult<Settings>> {
  return withCore(opts, async (core) => {
    const effective = await core.resetModuleConfiguration(args.module, { environment: args.environment });
    return args.showSecrets ? effective : redactSettings(effective);
  });
}
