/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded in-memory history
 */

import { ulid } from "ulid";

export interface ShellEventMap {
  VfsLoadEvent: { origin: "file" | "default"; source?: string; reason?: string };
  CommandEvent: { verb: string; args: string[]; cwd: string };
  CommandErrorEvent: { verb?: string; code: string; message: string };
  CwdChangeEvent: { from: string; to: string };
  ScriptEvent: { path: string; status: "started" | "finished" | "missing"; commands?: number };
}

export type EventType = keyof ShellEventMap;

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: ShellEventMap[K];
}

type Listener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // oldest entries are dropped beyond this
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 1000,
    };
  }

  on(type: EventType | "any", listener: Listener) {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
  }

  off(type: EventType | "any", listener: Listener) {
    this.listeners.get(type)?.delete(listener);
  }

  emit<K extends EventType>(type: K, payload: ShellEventMap[K]): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      this.history.shift();
    }

    this.notify(this.listeners.get(type), envelope, type);
    this.notify(this.listeners.get("any"), envelope, "any");

    return envelope;
  }

  private notify(listeners: Set<Listener> | undefined, envelope: EventEnvelope, channel: string) {
    if (!listeners) return;
    for (const l of listeners) {
      try {
        l(envelope);
      } catch (e) {
        // reported, never rethrown into the emitter
        console.error(`[EventBus] Listener error for ${channel}:`, e);
      }
    }
  }
}
