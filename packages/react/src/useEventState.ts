/**
 * useEventState - React hook that maintains state synchronized with an event
 *
 * The state is replaced from the payload each time the event is dispatched.
 */

import { useState, useEffect } from 'react';
import type { EventArgs, EventArgsMap, EventName } from '@syncbus/dispatcher';
import { useDispatcher } from './useDispatcher.js';

/**
 * Selector function to extract a value from the payload
 */
export type EventStateSelector<A extends EventArgs = EventArgs, T = A> = (args: A) => T;

/**
 * Hook to maintain state that updates on an event
 *
 * Without a selector the state is the payload itself.
 * The selector should be stable; a new function re-registers the listener.
 *
 * @example
 * ```tsx
 * const selectCount = (args: CountArgs) => args.count;
 *
 * function Counter() {
 *   const count = useEventState<Events, 'counter:changed', number>('counter:changed', 0, selectCount);
 *   return <div>Count: {count}</div>;
 * }
 * ```
 */
export function useEventState<
  Events extends EventArgsMap = EventArgsMap,
  K extends keyof Events & EventName = keyof Events & EventName,
  T = Events[K]
>(eventName: K, initialValue: T, selector: EventStateSelector<Events[K], T>): T;
export function useEventState<
  Events extends EventArgsMap = EventArgsMap,
  K extends keyof Events & EventName = keyof Events & EventName
>(eventName: K, initialValue: Events[K] | null): Events[K] | null;
export function useEventState<
  Events extends EventArgsMap,
  K extends keyof Events & EventName,
  T
>(
  eventName: K,
  initialValue: T | Events[K] | null,
  selector?: EventStateSelector<Events[K], T>
): T | Events[K] | null {
  const dispatcher = useDispatcher<Events>();
  const [state, setState] = useState<T | Events[K] | null>(initialValue);

  useEffect(() => {
    const listener = (args: Events[K]): void => {
      setState(selector ? selector(args) : args);
    };

    dispatcher.register(eventName, listener);

    return () => {
      dispatcher.unregister(eventName, listener);
    };
  }, [dispatcher, eventName, selector]);

  return state;
}
