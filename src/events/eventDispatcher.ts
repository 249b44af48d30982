import { HandlerError } from '../errors.js';
import { logger } from '../logger.js';
import type { DispatcherConfig, HandlerErrorPolicy } from '../types.js';
import { describeHandlerId, EventHandler, type EventCallbackLike, type HandlerId } from './handler.js';
import { TryLock } from './tryLock.js';

export interface DispatcherOptions {
  name?: string;
  /**
   * What a throwing callback does to the rest of the dispatch.
   *
   * - `isolate`: log it and keep invoking the remaining handlers
   * - `propagate`: stop, reconcile, and rethrow as a {@link HandlerError}
   */
  handlerErrors?: HandlerErrorPolicy;
  trace?: boolean;
}

export interface DispatcherStats {
  dispatched: number;
  dropped: number;
  deferredAdds: number;
  deferredRemoves: number;
  handlerErrors: number;
}

// Queued requests carry the order they were made in, shared across both queues.
interface QueuedAdd<T> {
  seq: number;
  handler: EventHandler<T>;
}

interface QueuedRemove {
  seq: number;
  id: HandlerId;
}

export function dispatcherOptionsFromConfig(config: DispatcherConfig): DispatcherOptions {
  return { name: config.name, handlerErrors: config.handler_errors, trace: config.trace };
}

/**
 * Removes the first handler with `id` by moving the last handler into its slot.
 * Constant time, and the reason list order is not stable across removals.
 */
function swapRemove<T>(handlers: EventHandler<T>[], id: HandlerId): boolean {
  const index = handlers.findIndex(h => h.id === id);
  if (index === -1) return false;
  const last = handlers.pop();
  if (last !== undefined && index < handlers.length) {
    handlers[index] = last;
  }
  return true;
}

/**
 * Synchronous fan-out of one event type to registered handlers.
 *
 * The live handler list sits behind a {@link TryLock}. Whoever cannot take it
 * never waits:
 * - `register` / `unregister` queue the request, applied when the current holder
 *   finishes its dispatch
 * - `dispatch` returns without delivering the event to anyone
 *
 * Callbacks may therefore call `register` / `unregister` on the dispatcher that is
 * invoking them; the change lands after the in-flight pass. A `dispatch` from
 * inside a callback is dropped.
 *
 * Delivery is best effort. Order follows registration until a removal swaps the
 * last handler into the freed slot.
 */
export class EventDispatcher<T> {
  readonly name: string;
  // Read only outside `live`; see size/has/handlerIds.
  private readonly handlers: EventHandler<T>[] = [];
  private readonly live = new TryLock<EventHandler<T>[]>(this.handlers);
  private readonly pendingAdd: QueuedAdd<T>[] = [];
  private readonly pendingRemove: QueuedRemove[] = [];
  private nextSeq = 0;
  private readonly handlerErrorPolicy: HandlerErrorPolicy;
  private readonly trace: boolean;
  private readonly counters: DispatcherStats = {
    dispatched: 0,
    dropped: 0,
    deferredAdds: 0,
    deferredRemoves: 0,
    handlerErrors: 0,
  };

  constructor(options: DispatcherOptions = {}) {
    this.name = options.name ?? 'dispatcher';
    this.handlerErrorPolicy = options.handlerErrors ?? 'isolate';
    this.trace = options.trace ?? false;
  }

  register(id: HandlerId, callback: EventCallbackLike<T>): void {
    const handler = new EventHandler(id, callback);
    const guard = this.live.tryAcquire();
    if (!guard) {
      this.pendingAdd.push({ seq: this.nextSeq++, handler });
      this.counters.deferredAdds++;
      this.debug(`Deferred register of ${describeHandlerId(id)}`);
      return;
    }
    try {
      guard.value.push(handler);
    } finally {
      guard.release();
    }
  }

  /** Unknown ids are ignored. */
  unregister(id: HandlerId): void {
    const guard = this.live.tryAcquire();
    if (!guard) {
      this.pendingRemove.push({ seq: this.nextSeq++, id });
      this.counters.deferredRemoves++;
      this.debug(`Deferred unregister of ${describeHandlerId(id)}`);
      return;
    }
    try {
      swapRemove(guard.value, id);
    } finally {
      guard.release();
    }
  }

  dispatch(event: T): void {
    const guard = this.live.tryAcquire();
    if (!guard) {
      this.counters.dropped++;
      this.debug('Dropped event: dispatcher busy');
      return;
    }

    const handlers = guard.value;
    this.counters.dispatched++;
    try {
      // Reentrant register/unregister only touch the pending queues, so this
      // pass sees exactly the handlers that were live when it started.
      for (const handler of handlers) {
        this.invoke(handler, event);
      }
    } finally {
      this.reconcile(handlers);
      guard.release();
    }
  }

  get size(): number {
    return this.handlers.length;
  }

  has(id: HandlerId): boolean {
    return this.handlers.some(h => h.id === id);
  }

  handlerIds(): HandlerId[] {
    return this.handlers.map(h => h.id);
  }

  get pendingCount(): { add: number; remove: number } {
    return { add: this.pendingAdd.length, remove: this.pendingRemove.length };
  }

  stats(): DispatcherStats {
    return { ...this.counters };
  }

  private invoke(handler: EventHandler<T>, event: T): void {
    try {
      handler.call(event);
    } catch (cause) {
      this.counters.handlerErrors++;
      const error = new HandlerError(this.name, handler.id, cause);
      if (this.handlerErrorPolicy === 'propagate') throw error;
      logger.warn(error.message, this.name, { handlerId: describeHandlerId(handler.id) });
    }
  }

  /**
   * Replays queued requests in the order they were made. A handler registered and
   * then unregistered during the same pass never becomes live, while an unregister
   * of an id that is not live at that point changes nothing.
   */
  private reconcile(handlers: EventHandler<T>[]): void {
    const removals = this.pendingRemove.splice(0);
    const additions = this.pendingAdd.splice(0);
    if (removals.length === 0 && additions.length === 0) return;

    let r = 0;
    let a = 0;
    while (r < removals.length || a < additions.length) {
      const removal = removals[r];
      const addition = additions[a];
      if (removal !== undefined && (addition === undefined || removal.seq < addition.seq)) {
        swapRemove(handlers, removal.id);
        r++;
      } else if (addition !== undefined) {
        handlers.push(addition.handler);
        a++;
      }
    }
    this.debug(`Reconciled ${removals.length} removal(s), ${additions.length} addition(s)`);
  }

  private debug(message: string): void {
    if (this.trace) logger.debug(message, this.name);
  }
}
