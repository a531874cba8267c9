import type { EventBus, Subscription } from "../../domain/events/EventBus";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { ConsoleLogger } from "./ConsoleLogger";

type Handler = (payload: unknown) => void;

type TopicMap = Map<string, Set<Handler>>;

export class SimpleEventBus implements EventBus {
  private readonly handlers: TopicMap = new Map();

  constructor(private readonly logger: LoggerPort = new ConsoleLogger()) {}

  publish<T>(topic: string, payload: T): void {
    const listeners = this.handlers.get(topic);
    if (!listeners) return;
    for (const handler of Array.from(listeners)) {
      try {
        handler(payload);
      } catch (err) {
        this.logger.warn(`Event handler for topic ${topic} failed`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  subscribe<T>(topic: string, handler: (payload: T) => void): Subscription {
    let listeners = this.handlers.get(topic);
    if (!listeners) {
      listeners = new Set();
      this.handlers.set(topic, listeners);
    }
    // Publishers on a topic agree on its payload type; the map itself is untyped.
    const erased = handler as Handler;
    listeners.add(erased);

    return {
      unsubscribe: () => {
        listeners?.delete(erased);
        if (listeners && listeners.size === 0) {
          this.handlers.delete(topic);
        }
      },
    };
  }

  listenerCount(topic: string): number {
    return this.handlers.get(topic)?.size ?? 0;
  }
}
