/**
 * Type definitions for the syncbus dispatcher
 *
 * Event names map to payload types through an optional EventArgsMap. A typed
 * dispatcher checks event names at each call site, and the payload of
 * function listeners and dispatched args.
 */

import type { EventArgs } from './event-args.js';

// ============================================================================
// Event Types
// ============================================================================

/**
 * Event name type
 */
export type EventName = string;

/**
 * Type map for events - maps event names to their payload types
 * @example
 * ```ts
 * type Events = {
 *   'user:login': LoginArgs;
 *   'app:ready': EventArgs;
 * };
 * ```
 */
export type EventArgsMap = Record<EventName, EventArgs>;

/**
 * Stable identity token of a registered listener value
 */
export type ListenerId = string;

// ============================================================================
// Listener Types
// ============================================================================

/**
 * Callable listener. The event name is informational, for functions
 * registered on several events.
 */
export type ListenerFunction<T extends EventArgs = EventArgs> = (
  args: T,
  eventName: EventName
) => void;

/**
 * Object listener: dispatch calls its method named after the event,
 * `handler[eventName](args, eventName)`.
 * Functions are excluded, so a function listener is always checked against
 * ListenerFunction.
 */
export type HandlerObject = object & { call?: never };

/**
 * Anything that can be registered on a dispatcher
 */
export type Listener<T extends EventArgs = EventArgs> = ListenerFunction<T> | HandlerObject;

/**
 * Object declaring the events it wants to handle, registered in one call
 */
export interface EventSubscriber {
  getSubscribedEvents(): readonly EventName[];
}

/**
 * How a registered listener is called for one event, resolved at registration
 * @internal
 */
export type ListenerInvocation =
  | { kind: 'callable'; fn: Function }
  | { kind: 'method'; target: HandlerObject; method: Function }
  | { kind: 'missing' };

/**
 * Internal listener entry stored in an event registry
 * @internal
 */
export interface ListenerEntry {
  /** Identity token of the listener value */
  id: ListenerId;

  /** The registered listener value, returned by listeners() */
  listener: Listener;

  /** Resolved call for this entry's event */
  invocation: ListenerInvocation;
}

// ============================================================================
// Dispatcher Options
// ============================================================================

/**
 * Options for creating a dispatcher instance
 */
export interface DispatcherOptions {
  /** Maximum listeners per event before a warning is logged (default: Infinity, 0 = unlimited) */
  maxListeners?: number;

  /** Debug mode - enables lifecycle logging */
  debug?: boolean;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard to check if value is a listener function
 */
export function isListenerFunction(value: unknown): value is Function {
  return typeof value === 'function';
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error thrown at dispatch time when an object listener has no method
 * named after the dispatched event
 */
export class MissingHandlerError extends Error {
  constructor(
    public readonly eventName: EventName,
    public readonly listenerId: ListenerId
  ) {
    super(`Listener "${listenerId}" has no handler method for event "${eventName}"`);
    this.name = 'MissingHandlerError';
  }
}
