/**
 * useListener - React hook registering a listener for a component's lifetime
 *
 * Registers on mount and unregisters on unmount or when inputs change.
 */

import { useEffect } from 'react';
import type { EventArgsMap, EventName, Listener } from '@syncbus/dispatcher';
import { useDispatcher } from './useDispatcher.js';

/**
 * Hook to register a listener with automatic cleanup
 *
 * Pass a stable listener (module-level, useCallback or useMemo): a new value
 * on each render re-registers it on each render. Listeners are keyed by
 * identity, so two mounted components sharing one listener value share one
 * registration: the first to unmount removes it for both.
 *
 * @param eventNames - Event name, or several
 * @param listener - Function or object listener
 * @param priority - Higher values are called earlier (default 0)
 *
 * @example
 * ```tsx
 * function UnsavedBadge() {
 *   const [dirty, setDirty] = useState(false);
 *   const onChange = useCallback(() => setDirty(true), []);
 *
 *   useListener('document:change', onChange, 10);
 *
 *   return dirty ? <span>Unsaved</span> : null;
 * }
 * ```
 */
export function useListener<
  Events extends EventArgsMap = EventArgsMap,
  K extends keyof Events & EventName = keyof Events & EventName
>(
  eventNames: K | readonly K[],
  listener: Listener<Events[K]>,
  priority = 0
): void {
  const dispatcher = useDispatcher<Events>();

  useEffect(() => {
    dispatcher.register(eventNames, listener, priority);

    return () => {
      dispatcher.unregister(eventNames, listener);
    };
  }, [dispatcher, eventNames, listener, priority]);
}
