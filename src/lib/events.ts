import type { Logger } from "./logger";

type Handler<T> = (payload: T) => void;

type HandlerSets<Events> = { [K in keyof Events]?: Set<Handler<Events[K]>> };

/**
 * Small typed event emitter. `on()` returns the unsubscribe function; a
 * throwing handler is logged and does not stop delivery to the others.
 */
export class TypedEmitter<Events extends Record<string, unknown>> {
  private handlers: HandlerSets<Events> = {};

  constructor(private readonly logger?: Logger) {}

  on<K extends keyof Events>(event: K, handler: Handler<Events[K]>): () => void {
    const set = this.handlers[event] ?? new Set<Handler<Events[K]>>();
    this.handlers[event] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of set) {
      try {
        handler(payload);
      } catch (error) {
        this.logger?.error(`Error in "${String(event)}" handler:`, error);
      }
    }
  }

  clear(): void {
    this.handlers = {};
  }
}
