/**
 * useDispatcher - React hook to access the dispatcher from context
 *
 * Must be used inside a DispatcherProvider component.
 */

import { useContext } from 'react';
import type { Dispatcher, EventArgsMap } from '@syncbus/dispatcher';
import { DispatcherContext } from './DispatcherProvider.js';

/**
 * Error thrown when useDispatcher is called outside DispatcherProvider
 */
export class DispatcherProviderError extends Error {
  constructor() {
    super(
      'useDispatcher must be used within a DispatcherProvider. ' +
      'Wrap your component tree with <DispatcherProvider dispatcher={dispatcher}>.'
    );
    this.name = 'DispatcherProviderError';
  }
}

/**
 * Check if code is running during server-side rendering
 * @internal
 */
function isSSR(): boolean {
  return typeof window === 'undefined';
}

/**
 * React hook to access the dispatcher instance from context
 *
 * @throws {DispatcherProviderError} If called outside DispatcherProvider
 *
 * @example
 * ```tsx
 * function SaveButton() {
 *   const dispatcher = useDispatcher();
 *
 *   return <button onClick={() => dispatcher.dispatch('document:save')}>Save</button>;
 * }
 * ```
 */
export function useDispatcher<Events extends EventArgsMap = EventArgsMap>(): Dispatcher<Events> {
  if (isSSR()) {
    console.warn(
      '[syncbus] useDispatcher called during server-side rendering. ' +
      'Listeners registered by hooks only run on the client.'
    );
  }

  const dispatcher = useContext(DispatcherContext);

  if (!dispatcher) {
    throw new DispatcherProviderError();
  }

  return dispatcher as Dispatcher<Events>;
}
