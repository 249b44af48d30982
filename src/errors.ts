import { describeHandlerId, type HandlerId } from './events/handler.js';

/**
 * Message text for any thrown value, including ones `String()` rejects such as
 * objects without a prototype.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  try {
    return String(cause);
  } catch {
    return Object.prototype.toString.call(cause);
  }
}

/**
 * A handler callback threw while an event was being dispatched.
 */
export class HandlerError extends Error {
  readonly dispatcher: string;
  readonly handlerId: HandlerId;

  constructor(dispatcher: string, handlerId: HandlerId, cause: unknown) {
    const reason = describeCause(cause);
    super(`Handler ${describeHandlerId(handlerId)} on ${dispatcher} failed: ${reason}`, { cause });
    this.name = 'HandlerError';
    this.dispatcher = dispatcher;
    this.handlerId = handlerId;
  }
}

export class ConfigError extends Error {
  readonly source: string;

  constructor(source: string, cause: unknown) {
    const reason = describeCause(cause);
    super(`Invalid configuration in ${source}: ${reason}`, { cause });
    this.name = 'ConfigError';
    this.source = source;
  }
}
