/**
 * useSubscriber - React hook registering an EventSubscriber for a component's lifetime
 */

import { useEffect } from 'react';
import type { EventSubscriber } from '@syncbus/dispatcher';
import { useDispatcher } from './useDispatcher.js';

/**
 * Hook to register a subscriber on all its declared events
 *
 * @example
 * ```tsx
 * function AuditPanel({ audit }: { audit: AuditSubscriber }) {
 *   useSubscriber(audit, -10);
 *   return <AuditLog entries={audit.entries} />;
 * }
 * ```
 */
export function useSubscriber(subscriber: EventSubscriber, priority = 0): void {
  const dispatcher = useDispatcher();

  useEffect(() => {
    dispatcher.registerSubscriber(subscriber, priority);

    return () => {
      dispatcher.unregisterSubscriber(subscriber);
    };
  }, [dispatcher, subscriber, priority]);
}
