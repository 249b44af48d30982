import { EventDispatcher, type DispatcherOptions } from './eventDispatcher.js';
import { createHandlerId } from './handler.js';

export type Unsubscribe = () => void;

/**
 * Subscribe/emit facade over {@link EventDispatcher} for callers that don't want
 * to manage handler ids.
 *
 * - Subscriptions made while an emit is running start with the next emit
 * - Emits made from inside a subscriber are dropped
 */
export class EventBus<TEvent> {
  private readonly dispatcher: EventDispatcher<TEvent>;

  constructor(options: DispatcherOptions = {}) {
    this.dispatcher = new EventDispatcher<TEvent>(options);
  }

  get subscriberCount(): number {
    return this.dispatcher.size;
  }

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    const id = createHandlerId();
    this.dispatcher.register(id, cb);
    let active = true;
    return () => {
      if (!active) return;
      active = false;
      this.dispatcher.unregister(id);
    };
  }

  emit(event: TEvent): void {
    this.dispatcher.dispatch(event);
  }
}
