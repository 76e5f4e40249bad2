import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { ConfigurationCore } from "../src/core/configuration-core.js";
import { createLogger } from "../src/logging/logger.js";

function captureLogger(level = "debug") {
  const lines: string[] = [];
  const logger = createLogger("test", level, { write: (msg: string) => void lines.push(msg) });
  return { lines, logger };
}

function records(lines: string[]): Record<string, unknown>[] {
  return lines.map((line) => JSON.parse(line));
}

describe("logger redaction", () => {
  let tmpDir: string;
  let storePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "strata-logger-"));
    storePath = path.join(tmpDir, "configuration.json");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("censors secret fields logged directly", () => {
    const { lines, logger } = captureLogger();
    logger.info({ data: { token: "test-token", host: "db.lab" }, settings: { db: { password: "test-secret" } } }, "hi");

    const [record] = records(lines);
    expect(record.data).toEqual({ token: "[REDACTED]", host: "db.lab" });
    expect(record.settings).toEqual({ db: { password: "[REDACTED]" } });
  });

  it("keeps secret values out of published change events", async () => {
    const { lines, logger } = captureLogger();
    const core = new ConfigurationCore({ storePath, logger });
    try {
      await core.initialize();
      await core.registerModule("db", { properties: { password: { type: "string" } } });
      await core.setModuleConfiguration("db", { password: "test-secret" });
    } finally {
      core.close();
    }

    expect(lines.some((line) => line.includes("test-secret"))).toBe(false);
    const published = records(lines).filter((r) => r.msg === "event published" && r.event === "ConfigurationChanged");
    expect(published).toHaveLength(1);
    expect(published[0].data).toMatchObject({
      changes: [{ path: "password", kind: "added", right: "[REDACTED]" }],
    });
  });
});
