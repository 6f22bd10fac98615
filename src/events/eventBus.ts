type Listener<T> = (event: T) => void | Promise<void>;

/**
 * Single-process typed channel. Listeners run in registration order and are
 * awaited, so a producer that awaits `emit` observes back-pressure.
 */
export class EventBus<EventMap extends { [event: string]: unknown }> {
  private listeners: { [K in keyof EventMap]?: Listener<EventMap[K]>[] } = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    (this.listeners[event] ||= []).push(listener);
    return () => this.off(event, listener);
  }

  off<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    this.listeners[event] = list.filter((l) => l !== listener);
  }

  async emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): Promise<void> {
    const list = this.listeners[event];
    if (!list) return;
    for (const l of list.slice()) {
      await l(payload);
    }
  }
}
