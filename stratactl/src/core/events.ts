import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { errorMessage } from "../errors.js";
import { redactEventData } from "./security.js";

export const EVENT_NAMES = [
  "StoreInitialized",
  "ModuleRegistered",
  "ModuleUnregistered",
  "ConfigurationChanged",
  "EnvironmentCreated",
  "EnvironmentChanged",
  "EnvironmentRemoved",
  "HotReloadEnabled",
  "HotReloadDisabled",
  "ConfigurationReloaded",
  "ReloadFailed",
  "ReloadCallbackFailed",
  "ConfigurationBackedUp",
  "ConfigurationRestored",
  "ConfigurationExported",
  "ConfigurationImported",
] as const;

export type StrataEventName = (typeof EVENT_NAMES)[number];

export type StrataEvent = {
  id: string;
  event: StrataEventName;
  data: Record<string, unknown>;
  timestamp: string;
  source: "strata";
};

export type EventHandler = (event: StrataEvent) => void;

export const WILDCARD = "*";

/**
 * In-process event bus with a bounded history.
 * A throwing handler is logged; other handlers and the publisher carry on.
 */
export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly entries: StrataEvent[] = [];

  constructor(
    private readonly historyLimit: number = 100,
    private readonly logger?: Logger,
  ) {
    this.emitter.setMaxListeners(0);
  }

  subscribe(event: StrataEventName | typeof WILDCARD, handler: EventHandler): () => void {
    const wrapped = (e: StrataEvent): void => {
      try {
        handler(e);
      } catch (err) {
        this.logger?.warn({ event: e.event, err: errorMessage(err) }, "event handler failed");
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  publish(event: StrataEventName, data: Record<string, unknown> = {}): StrataEvent {
    const entry: StrataEvent = {
      id: randomUUID(),
      event,
      data,
      timestamp: new Date().toISOString(),
      source: "strata",
    };

    this.entries.push(entry);
    if (this.entries.length > this.historyLimit) {
      this.entries.splice(0, this.entries.length - this.historyLimit);
    }

    this.logger?.debug({ event, data: redactEventData(data) }, "event published");
    this.emitter.emit(event, entry);
    this.emitter.emit(WILDCARD, entry);
    return entry;
  }

  /** Oldest first; `limit` keeps the newest entries. */
  history(opts: { event?: StrataEventName; limit?: number } = {}): StrataEvent[] {
    const matching = opts.event ? this.entries.filter((e) => e.event === opts.event) : [...this.entries];
    if (opts.limit === undefined) return matching;
    return opts.limit > 0 ? matching.slice(-opts.limit) : [];
  }

  listenerCount(): number {
    return this.emitter.eventNames().reduce((n, name) => n + this.emitter.listenerCount(name), 0);
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}
