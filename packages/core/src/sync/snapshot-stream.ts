/**
 * Snapshot streams
 *
 * A snapshot stream emits the entire current collection on every change,
 * never a diff. Consumers attach with consumeSerially(), which guarantees a
 * single in-flight handler per stream and FIFO processing of emissions.
 */

export type Unsubscribe = () => void;

export interface SnapshotObserver<T> {
  next: (snapshot: T) => void;
  error?: (err: unknown) => void;
}

export interface SnapshotStream<T> {
  subscribe: (observer: SnapshotObserver<T>) => Unsubscribe;
}

// --- Broadcast channel ---

export interface SnapshotChannel<T> extends SnapshotStream<T> {
  publish: (snapshot: T) => void;
  fail: (err: unknown) => void;
  close: () => void;
  subscriberCount: () => number;
}

/**
 * Broadcast channel that replays the latest snapshot to new subscribers.
 */
export function createSnapshotChannel<T>(): SnapshotChannel<T> {
  const observers = new Set<SnapshotObserver<T>>();
  let latest: { value: T } | null = null;

  function subscribe(observer: SnapshotObserver<T>): Unsubscribe {
    observers.add(observer);
    if (latest) {
      observer.next(latest.value);
    }
    return () => {
      observers.delete(observer);
    };
  }

  function publish(snapshot: T): void {
    latest = { value: snapshot };
    for (const observer of Array.from(observers)) {
      observer.next(snapshot);
    }
  }

  function fail(err: unknown): void {
    for (const observer of Array.from(observers)) {
      observer.error?.(err);
    }
  }

  function close(): void {
    observers.clear();
  }

  return {
    subscribe,
    publish,
    fail,
    close,
    subscriberCount: () => observers.size,
  };
}

// --- Serial consumer ---

export interface SerialConsumerHandlers<T> {
  /** Called once per emission, never concurrently with itself */
  onSnapshot: (snapshot: T) => Promise<void>;
  /** Error reported by the stream itself */
  onStreamError: (err: unknown) => void;
  /** onSnapshot threw or rejected; the consumer keeps running */
  onHandlerError: (err: unknown) => void;
}

export interface SerialConsumer {
  cancel: () => void;
  isCancelled: () => boolean;
  /** True when no emission is queued or being handled */
  isIdle: () => boolean;
  /** Resolves once every queued emission has been handled */
  drained: () => Promise<void>;
}

/**
 * Attach to a stream and process its emissions one at a time, in order.
 *
 * Emissions that arrive while a handler is running are queued. cancel()
 * unsubscribes, clears the queue and lets the loop finish its current
 * handler and exit. Errors thrown by subscribe() propagate to the caller.
 */
export function consumeSerially<T>(
  stream: SnapshotStream<T>,
  handlers: SerialConsumerHandlers<T>
): SerialConsumer {
  const queue: T[] = [];
  let running: Promise<void> | null = null;
  let cancelled = false;

  async function drain(): Promise<void> {
    // Yield first so subscribe() returns before the first handler runs
    await Promise.resolve();
    while (!cancelled && queue.length > 0) {
      const [snapshot] = queue.splice(0, 1);
      try {
        await handlers.onSnapshot(snapshot);
      } catch (err) {
        handlers.onHandlerError(err);
      }
    }
    running = null;
  }

  const unsubscribe = stream.subscribe({
    next: (snapshot) => {
      if (cancelled) return;
      queue.push(snapshot);
      if (!running) {
        running = drain();
      }
    },
    error: (err) => {
      if (cancelled) return;
      handlers.onStreamError(err);
    },
  });

  function cancel(): void {
    if (cancelled) return;
    cancelled = true;
    queue.length = 0;
    unsubscribe();
  }

  return {
    cancel,
    isCancelled: () => cancelled,
    isIdle: () => running === null,
    drained: () => running ?? Promise.resolve(),
  };
}

// --- Observable value ---

export interface ValueStore<T> {
  get: () => T;
  set: (value: T) => void;
  subscribe: (listener: (value: T) => void) => Unsubscribe;
}

/**
 * Observable single value. Listeners fire only when the value changes.
 */
export function createValueStore<T>(initial: T): ValueStore<T> {
  let current = initial;
  const listeners = new Set<(value: T) => void>();

  return {
    get: () => current,
    set: (value) => {
      if (Object.is(value, current)) return;
      current = value;
      for (const listener of Array.from(listeners)) {
        listener(value);
      }
    },
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
