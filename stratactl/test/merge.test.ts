import { describe, expect, it } from "vitest";
import {
  cloneSettings,
  compareConfiguration,
  getPath,
  mergeAll,
  mergeConfiguration,
  setPath,
} from "../src/core/merge.js";

describe("mergeConfiguration", () => {
  it("overrides leaves and keeps base keys absent from the override", () => {
    const base = { host: "localhost", port: 80, tls: { enabled: false, ciphers: ["a"] } };
    const merged = mergeConfiguration(base, { port: 8080, tls: { enabled: true } });
    expect(merged).toEqual({ host: "localhost", port: 8080, tls: { enabled: true, ciphers: ["a"] } });
  });

  it("replaces arrays instead of concatenating", () => {
    const merged = mergeConfiguration({ tags: ["a", "b"] }, { tags: ["c"] });
    expect(merged.tags).toEqual(["c"]);
  });

  it("lets a scalar override an object and the other way round", () => {
    expect(mergeConfiguration({ db: { host: "x" } }, { db: "sqlite" })).toEqual({ db: "sqlite" });
    expect(mergeConfiguration({ db: "sqlite" }, { db: { host: "x" } })).toEqual({ db: { host: "x" } });
  });

  it("ignores undefined override values but honours null", () => {
    const merged = mergeConfiguration({ a: 1, b: 2 }, { a: undefined, b: null });
    expect(merged).toEqual({ a: 1, b: null });
  });

  it("never mutates or aliases its inputs", () => {
    const base = { nested: { x: 1 } };
    const override = { nested: { y: 2 }, list: [1] };
    const merged = mergeConfiguration(base, override);

    expect(base).toEqual({ nested: { x: 1 } });
    expect(merged.list).not.toBe(override.list);
    expect(merged.nested).not.toBe(base.nested);
  });

  it("does not let a __proto__ key reach the prototype", () => {
    const override: Record<string, unknown> = JSON.parse('{"__proto__": {"polluted": true}, "ok": 1}');
    const merged = mergeConfiguration({}, override);
    expect(merged).toEqual({ ok: 1 });
    expect(Object.prototype).not.toHaveProperty("polluted");
  });

  it("folds several layers left to right", () => {
    expect(mergeAll({ a: 1, b: 1 }, { b: 2, c: 2 }, { c: 3 })).toEqual({ a: 1, b: 2, c: 3 });
  });
});

describe("compareConfiguration", () => {
  it("reports added, removed and changed leaves by dotted path", () => {
    const diff = compareConfiguration(
      { port: 80, db: { host: "a", user: "x" }, tags: ["a"] },
      { port: 81, db: { host: "a", pool: 5 }, tags: ["a"] },
    );
    expect(diff).toEqual([
      { path: "db.pool", kind: "added", right: 5 },
      { path: "db.user", kind: "removed", left: "x" },
      { path: "port", kind: "changed", left: 80, right: 81 },
    ]);
  });

  it("compares arrays as leaves", () => {
    expect(compareConfiguration({ tags: ["a"] }, { tags: ["a", "b"] })).toEqual([
      { path: "tags", kind: "changed", left: ["a"], right: ["a", "b"] },
    ]);
  });

  it("is empty for equal settings", () => {
    expect(compareConfiguration({ a: { b: [1, 2] } }, cloneSettings({ a: { b: [1, 2] } }))).toEqual([]);
  });
});

describe("dotted paths", () => {
  it("reads nested values", () => {
    expect(getPath({ a: { b: { c: 3 } } }, "a.b.c")).toBe(3);
    expect(getPath({ a: 1 }, "a.b")).toBeUndefined();
  });

  it("creates intermediate objects when setting", () => {
    const obj = setPath({ a: 1 }, "b.c.d", true);
    expect(obj).toEqual({ a: 1, b: { c: { d: true } } });
  });

  it("replaces a scalar on the way with an object", () => {
    expect(setPath({ a: 1 }, "a.b", 2)).toEqual({ a: { b: 2 } });
  });

  it("refuses prototype segments when setting", () => {
    expect(() => setPath({}, "__proto__.polluted", 1)).toThrow("Refusing to set prototype path: __proto__.polluted");
    expect(() => setPath({}, "constructor.prototype.polluted", 1)).toThrow("Refusing to set prototype path");
    const fresh: Record<string, unknown> = {};
    expect(fresh.polluted).toBeUndefined();
    expect(Object.prototype).not.toHaveProperty("polluted");
  });

  it("reads own properties only", () => {
    expect(getPath({ a: 1 }, "constructor")).toBeUndefined();
    expect(getPath({ a: {} }, "a.toString")).toBeUndefined();
  });
});
