export type EventMap = Record<string, unknown[]>;

export type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerTable<Events extends EventMap> = {
  [K in keyof Events]?: Array<Listener<Events[K]>>;
};

/**
 * Minimal emitter keyed by an event map, e.g.
 * `EventEmitter<{ listening: [port: number]; close: [] }>`.
 * Emitting an event nobody listens to is a no-op, including "error".
 */
export class EventEmitter<Events extends EventMap> {
  private listeners: ListenerTable<Events> = {};

  public on<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const list: Array<Listener<Events[K]>> = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return this;
  }

  public off<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const list = this.listeners[event];
    if (!list) return this;
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
    return this;
  }

  public once<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ): this {
    const onceWrapper: Listener<Events[K]> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const list = this.listeners[event];
    if (!list || list.length === 0) return false;
    for (const listener of [...list]) {
      listener(...args);
    }
    return true;
  }

  public removeAllListeners(event?: keyof Events): this {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
    return this;
  }

  public listenerCount(event: keyof Events): number {
    return this.listeners[event]?.length ?? 0;
  }
}
