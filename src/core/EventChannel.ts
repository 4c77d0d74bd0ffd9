import { DEFAULT_LISTENER_PRIORITY } from "../config/defaults";
import { NOOP_LOGGER, type Logger, type Unsubscribe } from "../types/contracts";

/** Return `true` to consume the event and stop the remaining listeners. */
export type ChannelListener<T> = (args: T) => boolean | void;

interface Subscription<T> {
  readonly listener: ChannelListener<T>;
  readonly priority: number;
  readonly order: number;
}

export interface EventChannelOptions {
  logger?: Logger;
  strictListenerErrors?: boolean;
}

function compareSubscriptions<T>(a: Subscription<T>, b: Subscription<T>): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.order - b.order;
}

/**
 * Ordered, short-circuiting listener list.
 *
 * Listeners run in ascending priority; equal priorities run in the order they
 * were subscribed. Subscribing or unsubscribing while `notify` is running
 * takes effect on the next `notify`.
 */
export class EventChannel<T> {
  readonly name: string;
  private readonly logger: Logger;
  private readonly strictListenerErrors: boolean;
  private subscriptions: Subscription<T>[] = [];
  private nextOrder = 0;

  constructor(name: string, options: EventChannelOptions = {}) {
    this.name = name;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.strictListenerErrors = options.strictListenerErrors ?? true;
  }

  get size(): number {
    return this.subscriptions.length;
  }

  subscribe(listener: ChannelListener<T>, priority: number = DEFAULT_LISTENER_PRIORITY): Unsubscribe {
    const subscription: Subscription<T> = { listener, priority, order: this.nextOrder };
    this.nextOrder += 1;
    this.subscriptions = [...this.subscriptions, subscription].sort(compareSubscriptions);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== subscription);
    };
  }

  /** Removes the first subscription matching both the listener and the priority. */
  unsubscribe(listener: ChannelListener<T>, priority: number = DEFAULT_LISTENER_PRIORITY): boolean {
    const index = this.subscriptions.findIndex((s) => s.listener === listener && s.priority === priority);
    if (index < 0) return false;
    this.subscriptions = this.subscriptions.filter((_, i) => i !== index);
    return true;
  }

  has(listener: ChannelListener<T>, priority: number = DEFAULT_LISTENER_PRIORITY): boolean {
    return this.subscriptions.some((s) => s.listener === listener && s.priority === priority);
  }

  notify(args: T): boolean {
    const snapshot = this.subscriptions;
    for (const subscription of snapshot) {
      if (this.invoke(subscription, args)) return true;
    }
    return false;
  }

  clear(): void {
    this.subscriptions = [];
  }

  private invoke(subscription: Subscription<T>, args: T): boolean {
    try {
      return subscription.listener(args) === true;
    } catch (error) {
      this.logger.error("Channel listener failed", {
        channel: this.name,
        priority: subscription.priority,
        error,
      });
      if (this.strictListenerErrors) {
        throw error;
      }
      return false;
    }
  }
}
