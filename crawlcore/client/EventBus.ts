//crawlcore/client/EventBus.ts

export type EventHandler<P> = (payload: P) => void;

type HandlerSets<E> = { [K in keyof E]?: Set<EventHandler<E[K]>> };

/**
 * Synchronous typed event bus: one payload shape per event kind, zero or more
 * handlers per kind, called in registration order.
 *
 * A throwing handler is reported through `onHandlerError` and does not stop
 * the remaining handlers.
 */
export class TypedEventBus<E extends object> {
  private readonly handlers: HandlerSets<E> = {};

  constructor(
    private readonly onHandlerError: (kind: keyof E, err: unknown) => void = () => {},
  ) {}

  /** Register a handler; the returned function unregisters it. */
  on<K extends keyof E>(kind: K, handler: EventHandler<E[K]>): () => void {
    const set = this.handlers[kind] ?? new Set<EventHandler<E[K]>>();
    set.add(handler);
    this.handlers[kind] = set;
    return () => this.off(kind, handler);
  }

  /** Register a handler that unregisters itself after its first call. */
  once<K extends keyof E>(kind: K, handler: EventHandler<E[K]>): () => void {
    const wrapper: EventHandler<E[K]> = (payload) => {
      this.off(kind, wrapper);
      handler(payload);
    };
    return this.on(kind, wrapper);
  }

  off<K extends keyof E>(kind: K, handler: EventHandler<E[K]>): void {
    this.handlers[kind]?.delete(handler);
  }

  /** Call every handler for `kind`; returns how many ran. */
  emit<K extends keyof E>(kind: K, payload: E[K]): number {
    const set = this.handlers[kind];
    if (!set || set.size === 0) return 0;

    let ran = 0;
    for (const handler of Array.from(set)) {
      ran++;
      try {
        handler(payload);
      } catch (err) {
        this.onHandlerError(kind, err);
      }
    }
    return ran;
  }

  listenerCount(kind: keyof E): number {
    return this.handlers[kind]?.size ?? 0;
  }
}
