import { describe, expect, it } from "vitest";
import { EventBus, type StrataEvent } from "../src/core/events.js";

describe("EventBus", () => {
  it("delivers to named and wildcard subscribers", () => {
    const bus = new EventBus();
    const named: string[] = [];
    const all: string[] = [];
    bus.subscribe("ModuleRegistered", (e) => named.push(e.event));
    bus.subscribe("*", (e) => all.push(e.event));

    bus.publish("ModuleRegistered", { module: "web" });
    bus.publish("EnvironmentCreated", { environment: "lab" });

    expect(named).toEqual(["ModuleRegistered"]);
    expect(all).toEqual(["ModuleRegistered", "EnvironmentCreated"]);
  });

  it("stamps id, timestamp and source", () => {
    const bus = new EventBus();
    const event = bus.publish("StoreInitialized");
    expect(event.source).toBe("strata");
    expect(event.data).toEqual({});
    expect(event.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new EventBus();
    const seen: StrataEvent[] = [];
    const off = bus.subscribe("*", (e) => seen.push(e));
    bus.publish("HotReloadEnabled");
    off();
    bus.publish("HotReloadDisabled");
    expect(seen.map((e) => e.event)).toEqual(["HotReloadEnabled"]);
    expect(bus.listenerCount()).toBe(0);
  });

  it("keeps publishing when a handler throws", () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.subscribe("ConfigurationChanged", () => {
      throw new Error("boom");
    });
    bus.subscribe("ConfigurationChanged", (e) => seen.push(e.event));

    expect(() => bus.publish("ConfigurationChanged")).not.toThrow();
    expect(seen).toEqual(["ConfigurationChanged"]);
  });

  it("bounds the history and filters it", () => {
    const bus = new EventBus(3);
    bus.publish("ModuleRegistered", { n: 1 });
    bus.publish("EnvironmentCreated", { n: 2 });
    bus.publish("ModuleRegistered", { n: 3 });
    bus.publish("ModuleRegistered", { n: 4 });

    expect(bus.history().map((e) => e.data.n)).toEqual([2, 3, 4]);
    expect(bus.history({ event: "ModuleRegistered" }).map((e) => e.data.n)).toEqual([3, 4]);
    expect(bus.history({ limit: 1 }).map((e) => e.data.n)).toEqual([4]);
    expect(bus.history({ limit: 0 })).toEqual([]);
  });

  it("clear() drops every subscriber", () => {
    const bus = new EventBus();
    bus.subscribe("*", () => undefined);
    bus.subscribe("ReloadFailed", () => undefined);
    expect(bus.listenerCount()).toBe(2);
    bus.clear();
    expect(bus.listenerCount()).toBe(0);
  });
});
