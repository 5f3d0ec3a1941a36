/**
 * syncbus - Synchronous priority event dispatcher
 *
 * - Priority-ordered listeners, stable on equal priority
 * - Lazy, cached sorting per event
 * - Propagation stop from any listener
 * - Function listeners, object listeners and bulk subscribers
 * - Zero runtime dependencies
 */

export const VERSION = '1.0.0';

// Core exports
export { EventArgs } from './event-args.js';
export { Dispatcher, createDispatcher } from './dispatcher.js';
export { listenerId } from './listener-identity.js';
export type { SortState } from './event-registry.js';

// Export all types and interfaces
export type {
  EventName,
  EventArgsMap,
  ListenerId,
  ListenerFunction,
  HandlerObject,
  Listener,
  EventSubscriber,
  ListenerEntry,
  ListenerInvocation,
  DispatcherOptions,
} from './types.js';

// Export type guards
export { isListenerFunction } from './types.js';

// Export error classes
export { MissingHandlerError } from './types.js';
