export { EventDispatcher, dispatcherOptionsFromConfig } from './eventDispatcher.js';
export type { DispatcherOptions, DispatcherStats } from './eventDispatcher.js';
export { EventBus } from './eventBus.js';
export type { Unsubscribe } from './eventBus.js';
export { EventHandler, createHandlerId, toEventCallback } from './handler.js';
export type { EventCallback, EventCallbackLike, HandlerId } from './handler.js';
export { TryLock } from './tryLock.js';
export type { LockGuard } from './tryLock.js';
export { HandlerError, ConfigError } from '../errors.js';
