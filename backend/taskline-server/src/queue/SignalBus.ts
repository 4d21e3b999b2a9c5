/**
 * SignalBus
 *
 * Typed publish/subscribe channel for lifecycle signals. Workers publish a
 * signal when a task changes state; the LifecycleHandler subscribes and
 * applies it to the shared stores.
 *
 * Design:
 * - Signals form a discriminated union on `type`; subscribers get the
 *   narrowed member for the type they asked for
 * - Multiple subscribers per type
 * - publish() waits for every handler with Promise.allSettled and reports
 *   failures in the result instead of throwing
 *
 * Example usage:
 * ```typescript
 * const bus = new SignalBus<TaskSignal>();
 * bus.subscribe("task.started", (signal) => console.log(signal.taskId));
 * await bus.publish({ type: "task.started", taskId, timestamp: new Date() });
 * ```
 */

/**
 * Fields every signal carries
 */
export interface BaseSignal {
  type: string;
  timestamp: Date;
}

export type SignalOfType<TSignal extends BaseSignal, K extends TSignal["type"]> = Extract<
  TSignal,
  { type: K }
>;

export type SignalHandler<TSignal> = (signal: TSignal) => void | Promise<void>;

/**
 * Subscription handle returned from subscribe()
 */
export interface Subscription {
  id: string;
  signalType: string;
  unsubscribe: () => void;
}

/**
 * Result of a publish operation
 */
export interface PublishResult<TSignal> {
  signal: TSignal;
  /** Number of handlers that were invoked */
  handlerCount: number;
  /** Number of handlers that completed successfully */
  successCount: number;
  /** Errors from handlers that failed */
  errors: Error[];
}

interface SubscriptionRecord<TSignal> {
  id: string;
  /** Runs the handler if the signal matches, returns false otherwise */
  invoke: (signal: TSignal) => false | Promise<void>;
}

function hasType<TSignal extends BaseSignal, K extends TSignal["type"]>(
  signal: TSignal,
  type: K
): signal is SignalOfType<TSignal, K> {
  return signal.type === type;
}

export class SignalBus<TSignal extends BaseSignal> {
  /** Map of signal type to subscriptions */
  private subscriptions: Map<string, SubscriptionRecord<TSignal>[]> = new Map();

  private subscriptionCounter: number = 0;

  private generateSubscriptionId(): string {
    return `sub-${Date.now()}-${(++this.subscriptionCounter).toString(16)}`;
  }

  /**
   * Subscribe to one signal type.
   *
   * @returns Subscription handle with unsubscribe function
   */
  subscribe<K extends TSignal["type"]>(
    signalType: K,
    handler: SignalHandler<SignalOfType<TSignal, K>>
  ): Subscription {
    const id = this.generateSubscriptionId();
    const subs = this.subscriptions.get(signalType) ?? [];
    subs.push({
      id,
      invoke: (signal) => {
        if (!hasType(signal, signalType)) {
          return false;
        }
        return (async () => handler(signal))();
      },
    });
    this.subscriptions.set(signalType, subs);

    return {
      id,
      signalType,
      unsubscribe: () => this.unsubscribe(signalType, id),
    };
  }

  /**
   * Remove a subscription.
   *
   * @returns true if subscription was found and removed
   */
  unsubscribe(signalType: string, subscriptionId: string): boolean {
    const subs = this.subscriptions.get(signalType);
    if (!subs) {
      return false;
    }

    const index = subs.findIndex((s) => s.id === subscriptionId);
    if (index === -1) {
      return false;
    }

    subs.splice(index, 1);
    if (subs.length === 0) {
      this.subscriptions.delete(signalType);
    }
    return true;
  }

  /**
   * Deliver a signal to all matching subscribers and wait for them.
   */
  async publish(signal: TSignal): Promise<PublishResult<TSignal>> {
    const pending: Promise<void>[] = [];
    for (const sub of this.subscriptions.get(signal.type) ?? []) {
      const run = sub.invoke(signal);
      if (run !== false) {
        pending.push(run);
      }
    }

    const results = await Promise.allSettled(pending);
    const errors: Error[] = [];
    let successCount = 0;
    for (const result of results) {
      if (result.status === "fulfilled") {
        successCount++;
      } else {
        errors.push(
          result.reason instanceof Error ? result.reason : new Error(String(result.reason))
        );
      }
    }

    return {
      signal,
      handlerCount: pending.length,
      successCount,
      errors,
    };
  }
}
