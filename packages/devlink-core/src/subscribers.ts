// Subscriber registry for unsolicited data and event messages.

/** Opaque handle returned by register(), used to unregister exactly that registration. */
export type SubscriptionId = string;

/** Receives messages of the type it was registered for. */
export interface MessageListener<M> {
  onMessage(message: M): void | Promise<void>;
}

/** A listener object, or a plain function standing in for `onMessage`. */
export type Subscriber<M> = MessageListener<M> | ((message: M) => void | Promise<void>);

/** Event type that matches every event. */
export const ALL_EVENTS = "all";

export function toListener<M>(subscriber: Subscriber<M>): MessageListener<M> {
  return typeof subscriber === "function" ? { onMessage: subscriber } : subscriber;
}

/**
 * Registry of listeners keyed by message type.
 *
 * Listeners of one type keep their registration order. Dispatch works on a
 * snapshot, so registering or unregistering during a dispatch only affects
 * later dispatches.
 */
export class SubscriberRegistry<M> {
  private byType = new Map<string, Map<SubscriptionId, MessageListener<M>>>();
  private typeOf = new Map<SubscriptionId, string>();
  private nextSeq = 1;

  constructor(private readonly prefix: string) {}

  register(type: string, subscriber: Subscriber<M>): SubscriptionId {
    const id = `${this.prefix}:${type}#${this.nextSeq++}`;
    let listeners = this.byType.get(type);
    if (!listeners) {
      listeners = new Map();
      this.byType.set(type, listeners);
    }
    listeners.set(id, toListener(subscriber));
    this.typeOf.set(id, type);
    return id;
  }

  /** Remove a registration. Returns false for unknown or already removed IDs. */
  unregister(id: SubscriptionId): boolean {
    const type = this.typeOf.get(id);
    if (type === undefined) return false;
    this.typeOf.delete(id);

    const listeners = this.byType.get(type);
    if (!listeners) return false;
    listeners.delete(id);
    if (listeners.size === 0) {
      this.byType.delete(type);
    }
    return true;
  }

  /**
   * Point-in-time copy of the listeners for the given types, in the order
   * the types are given. A type listed twice contributes once.
   */
  snapshot(...types: string[]): Array<[SubscriptionId, MessageListener<M>]> {
    const result: Array<[SubscriptionId, MessageListener<M>]> = [];
    for (const type of new Set(types)) {
      const listeners = this.byType.get(type);
      if (listeners) {
        result.push(...listeners.entries());
      }
    }
    return result;
  }

  /** Number of registrations, for one type or overall. */
  count(type?: string): number {
    if (type === undefined) return this.typeOf.size;
    return this.byType.get(type)?.size ?? 0;
  }

  clear(): void {
    this.byType.clear();
    this.typeOf.clear();
  }
}
