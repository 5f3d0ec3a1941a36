/**
 * syncbus Dispatcher
 *
 * Synchronous in-process event dispatch with:
 * - Priority-based listener ordering (higher first, stable on ties)
 * - Lazy sorting, cached per event until the next registration
 * - Propagation stop from any listener
 * - Function listeners and object listeners (method named after the event)
 */

import { EventArgs } from './event-args.js';
import { EventRegistry } from './event-registry.js';
import { listenerId } from './listener-identity.js';
import {
  isListenerFunction,
  MissingHandlerError,
  type DispatcherOptions,
  type EventArgsMap,
  type EventName,
  type EventSubscriber,
  type Listener,
  type ListenerEntry,
  type ListenerId,
  type ListenerInvocation,
} from './types.js';

/**
 * Core Dispatcher class
 *
 * Not safe for re-entrant registration: adding or removing listeners of an
 * event from inside one of its own listeners while it dispatches is
 * unsupported. The running dispatch works on a copy of the ordered entries.
 */
export class Dispatcher<Events extends EventArgsMap = EventArgsMap> {
  private registries = new Map<EventName, EventRegistry>();
  private options: Required<DispatcherOptions>;

  constructor(options: DispatcherOptions = {}) {
    this.options = {
      maxListeners: options.maxListeners ?? Infinity,
      debug: options.debug ?? false,
    };

    if (this.options.debug) {
      console.debug('[syncbus] Dispatcher initialized', {
        maxListeners: this.options.maxListeners,
      });
    }
  }

  /**
   * Register a listener on one or several events
   * Registering the same listener value again for an event replaces its
   * priority instead of adding a second entry.
   *
   * @param priority - Higher values are called earlier (default 0)
   */
  register<K extends keyof Events & EventName>(
    eventNames: K | readonly K[],
    listener: Listener<Events[K]>,
    priority = 0
  ): void {
    this.addListener(toEventNames(eventNames), listener, priority);
  }

  /**
   * Remove a listener from one or several events
   * Unknown events and listeners are ignored.
   */
  unregister<K extends keyof Events & EventName>(
    eventNames: K | readonly K[],
    listener: Listener<Events[K]>
  ): void {
    this.removeListener(toEventNames(eventNames), listener);
  }

  /**
   * Register a subscriber on every event it declares, with one priority
   */
  registerSubscriber(subscriber: EventSubscriber, priority = 0): void {
    this.addListener(subscriber.getSubscribedEvents(), subscriber, priority);
  }

  /**
   * Remove a subscriber from every event it declares
   */
  unregisterSubscriber(subscriber: EventSubscriber): void {
    this.removeListener(subscriber.getSubscribedEvents(), subscriber);
  }

  private addListener(events: readonly EventName[], listener: Listener, priority: number): void {
    const id = listenerId(listener);

    for (const event of events) {
      let registry = this.registries.get(event);
      if (!registry) {
        registry = new EventRegistry();
        this.registries.set(event, registry);
      }

      registry.upsert(
        { id, listener, invocation: resolveInvocation(listener, event) },
        priority
      );

      if (this.options.debug) {
        console.debug('[syncbus] Listener added', {
          event,
          listenerId: id,
          priority,
          totalListeners: registry.size,
        });
      }

      if (this.options.maxListeners > 0 && registry.size > this.options.maxListeners) {
        console.warn(
          `MaxListenersExceeded: Event "${event}" has ${registry.size} listeners (limit: ${this.options.maxListeners})`
        );
      }
    }
  }

  private removeListener(events: readonly EventName[], listener: Listener): void {
    const id = listenerId(listener);

    for (const event of events) {
      const removed = this.registries.get(event)?.remove(id) ?? false;

      if (this.options.debug && removed) {
        console.debug('[syncbus] Listener removed', {
          event,
          listenerId: id,
          remaining: this.registries.get(event)?.size ?? 0,
        });
      }
    }
  }

  /**
   * Check whether an event has at least one listener. Never sorts.
   */
  hasListeners(eventName: keyof Events & EventName): boolean {
    return (this.registries.get(eventName)?.size ?? 0) > 0;
  }

  /**
   * Get listeners in dispatch order
   * With an event name, returns that event's listeners keyed by identity.
   * Without, returns every event that has listeners.
   * The returned maps are snapshots: later registrations do not change them.
   */
  listeners(eventName: keyof Events & EventName): ReadonlyMap<ListenerId, Listener>;
  listeners(): ReadonlyMap<EventName, ReadonlyMap<ListenerId, Listener>>;
  listeners(
    eventName?: keyof Events & EventName
  ): ReadonlyMap<ListenerId, Listener> | ReadonlyMap<EventName, ReadonlyMap<ListenerId, Listener>> {
    if (eventName !== undefined) {
      return this.snapshot(eventName);
    }

    const all = new Map<EventName, ReadonlyMap<ListenerId, Listener>>();
    for (const [event, registry] of this.registries) {
      if (registry.size > 0) {
        all.set(event, this.snapshot(event));
      }
    }
    return all;
  }

  /**
   * Dispatch an event to its listeners, in priority order
   * Stops after the listener that stops propagation. Listener errors and
   * MissingHandlerError propagate to the caller and skip the remaining
   * listeners.
   *
   * @param args - Payload shared by all listeners (default: a fresh EventArgs)
   * @returns The payload, in its final state
   */
  dispatch<K extends keyof Events & EventName>(eventName: K, args?: Events[K]): EventArgs {
    const payload: EventArgs = args ?? new EventArgs();
    const registry = this.registries.get(eventName);

    if (!registry || registry.size === 0) {
      if (this.options.debug) {
        console.debug('[syncbus] Event dispatched (no listeners)', { event: eventName });
      }
      return payload;
    }

    this.sortRegistry(eventName, registry);
    const entries = registry.entries();

    if (this.options.debug) {
      console.debug('[syncbus] Event dispatched', {
        event: eventName,
        listenerCount: entries.length,
      });
    }

    for (const entry of entries) {
      this.invokeListener(entry, eventName, payload);

      if (payload.isPropagationStopped()) {
        if (this.options.debug) {
          console.debug('[syncbus] Propagation stopped', {
            event: eventName,
            listenerId: entry.id,
          });
        }
        break;
      }
    }

    return payload;
  }

  /**
   * Call one listener for an event
   * Subclasses may override this to wrap each listener call.
   */
  protected invokeListener(entry: ListenerEntry, eventName: EventName, args: EventArgs): void {
    const { invocation } = entry;

    switch (invocation.kind) {
      case 'callable':
        Reflect.apply(invocation.fn, undefined, [args, eventName]);
        return;
      case 'method':
        Reflect.apply(invocation.method, invocation.target, [args, eventName]);
        return;
      case 'missing':
        if (this.options.debug) {
          console.debug('[syncbus] Listener has no handler', {
            event: eventName,
            listenerId: entry.id,
          });
        }
        throw new MissingHandlerError(eventName, entry.id);
    }
  }

  /**
   * Get number of listeners for an event, or across all events
   */
  listenerCount(eventName?: keyof Events & EventName): number {
    if (eventName === undefined) {
      let total = 0;
      for (const registry of this.registries.values()) {
        total += registry.size;
      }
      return total;
    }

    return this.registries.get(eventName)?.size ?? 0;
  }

  /**
   * Get all event names with registered listeners
   */
  eventNames(): EventName[] {
    return [...this.registries]
      .filter(([, registry]) => registry.size > 0)
      .map(([event]) => event);
  }

  /**
   * Enable/disable debug logging
   */
  debug(enabled: boolean): void {
    this.options.debug = enabled;
    console.debug(`[syncbus] Debug mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  private snapshot(eventName: EventName): ReadonlyMap<ListenerId, Listener> {
    const registry = this.registries.get(eventName);
    if (!registry) {
      return new Map();
    }

    this.sortRegistry(eventName, registry);
    return new Map(
      registry.entries().map((entry): [ListenerId, Listener] => [entry.id, entry.listener])
    );
  }

  private sortRegistry(eventName: EventName, registry: EventRegistry): void {
    const sorted = registry.ensureSorted();

    if (this.options.debug && sorted) {
      console.debug('[syncbus] Listeners sorted', {
        event: eventName,
        listenerCount: registry.size,
      });
    }
  }
}

/**
 * Normalize one event name or a list of them
 */
const toEventNames = <K extends EventName>(eventNames: K | readonly K[]): readonly K[] =>
  typeof eventNames === 'string' ? [eventNames] : eventNames;

/**
 * Members every object has without declaring them: those inherited from
 * Object.prototype, and the class constructor.
 */
const isBuiltInMember = (listener: object, eventName: EventName, method: Function): boolean =>
  method === Reflect.get(Object.prototype, eventName) ||
  method === Reflect.get(listener, 'constructor');

/**
 * Decide how a listener is called for an event. Object listeners are looked up
 * once here; a missing method surfaces when the event is dispatched.
 */
const resolveInvocation = (listener: Listener, eventName: EventName): ListenerInvocation => {
  if (isListenerFunction(listener)) {
    return { kind: 'callable', fn: listener };
  }

  const method: unknown = Reflect.get(listener, eventName);
  if (isListenerFunction(method) && !isBuiltInMember(listener, eventName, method)) {
    return { kind: 'method', target: listener, method };
  }

  return { kind: 'missing' };
};

/**
 * Factory function to create a Dispatcher instance
 */
export const createDispatcher = <Events extends EventArgsMap = EventArgsMap>(
  options?: DispatcherOptions
): Dispatcher<Events> => {
  return new Dispatcher<Events>(options);
};
