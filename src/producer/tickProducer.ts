import { EventDispatcher, type DispatcherOptions } from '../events/eventDispatcher.js';
import type { EventCallbackLike, HandlerId } from '../events/handler.js';
import { logger } from '../logger.js';
import type { TickEvent } from '../types.js';

/**
 * Owns one dispatcher for {@link TickEvent} and dispatches once per tick, either
 * when `tick()` is called or on a timer between `start()` and `stop()`.
 */
export class TickProducer {
  readonly dispatcher: EventDispatcher<TickEvent>;

  private tickCount = 0;
  private timer: NodeJS.Timeout | undefined;

  constructor(options: DispatcherOptions = {}) {
    this.dispatcher = new EventDispatcher<TickEvent>({ name: 'ticks', ...options });
  }

  get ticks(): number {
    return this.tickCount;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  subscribe(id: HandlerId, callback: EventCallbackLike<TickEvent>): void {
    this.dispatcher.register(id, callback);
  }

  unsubscribe(id: HandlerId): void {
    this.dispatcher.unregister(id);
  }

  tick(): TickEvent {
    this.tickCount++;
    const event: TickEvent = { tick: this.tickCount, timestamp: new Date().toISOString() };
    this.dispatcher.dispatch(event);
    return event;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Invalid tick interval: ${intervalMs}`);
    }
    logger.info(`Ticking every ${intervalMs}ms`, this.dispatcher.name);
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        // Only reachable under the `propagate` handler error policy.
        logger.error(`Tick failed: ${error instanceof Error ? error.message : String(error)}`, this.dispatcher.name);
        this.stop();
      }
    }, intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    logger.info(`Stopped after ${this.tickCount} tick(s)`, this.dispatcher.name);
  }
}
