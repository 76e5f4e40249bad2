import os from "node:os";
import { isPlainObject } from "./merge.js";

export type ExpansionContext = {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  home: string;
  storeDir: string;
};

const TOKEN = /\$\{([^}]+)\}/g;

export function defaultExpansionContext(storeDir: string): ExpansionContext {
  return { env: process.env, platform: process.platform, home: os.homedir(), storeDir };
}

/**
 * Expand `${env:NAME}`, `${env:NAME:-fallback}`, `${platform}`, `${home}` and
 * `${storeDir}` in a string. Unknown tokens are left untouched.
 */
export function expandString(input: string, ctx: ExpansionContext): string {
  return input.replace(TOKEN, (whole: string, body: string) => {
    if (body.startsWith("env:")) {
      const ref = body.slice(4);
      const sep = ref.indexOf(":-");
      const name = sep === -1 ? ref : ref.slice(0, sep);
      const value = ctx.env[name];
      if (sep === -1) return value ?? "";
      return value ? value : ref.slice(sep + 2);
    }
    switch (body) {
      case "platform":
        return ctx.platform;
      case "home":
        return ctx.home;
      case "storeDir":
        return ctx.storeDir;
      default:
        return whole;
    }
  });
}

/** Expand every string inside a JSON value, recursing into objects and arrays. */
export function expandVariables(value: unknown, ctx: ExpansionContext): unknown {
  if (typeof value === "string") return expandString(value, ctx);
  if (Array.isArray(value)) return value.map((v) => expandVariables(v, ctx));
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandVariables(v, ctx);
    return out;
  }
  return value;
}
