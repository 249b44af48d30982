import { randomUUID } from 'node:crypto';

/**
 * Identity of a registered handler.
 *
 * Ids are supplied by the caller and compared with `===`; the dispatcher never
 * allocates them and relies on the caller to keep them unique per dispatcher.
 */
export type HandlerId = string | number | symbol;

export interface EventCallback<T> {
  invoke(event: T): void;
}

export type EventCallbackLike<T> = EventCallback<T> | ((event: T) => void);

export function createHandlerId(): HandlerId {
  return randomUUID();
}

export function toEventCallback<T>(callback: EventCallbackLike<T>): EventCallback<T> {
  if (typeof callback === 'function') {
    return { invoke: callback };
  }
  return callback;
}

/**
 * A registered (id, callback) pair. The callback may close over external state;
 * the handler never looks at it.
 */
export class EventHandler<T> {
  readonly id: HandlerId;
  private readonly callback: EventCallback<T>;

  constructor(id: HandlerId, callback: EventCallbackLike<T>) {
    this.id = id;
    this.callback = toEventCallback(callback);
  }

  call(event: T): void {
    this.callback.invoke(event);
  }
}

export function describeHandlerId(id: HandlerId): string {
  return typeof id === 'symbol' ? (id.description ?? 'symbol') : String(id);
}
