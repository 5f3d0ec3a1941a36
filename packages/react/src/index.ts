/**
 * @syncbus/react - React bindings for the syncbus dispatcher
 *
 * Provides a Context provider and hooks that tie listeners to component
 * lifetimes.
 *
 * @example
 * ```tsx
 * import { createDispatcher } from '@syncbus/dispatcher';
 * import { DispatcherProvider, useListener } from '@syncbus/react';
 *
 * const dispatcher = createDispatcher();
 *
 * function App() {
 *   return (
 *     <DispatcherProvider dispatcher={dispatcher}>
 *       <Toolbar />
 *     </DispatcherProvider>
 *   );
 * }
 * ```
 */

export const VERSION = '1.0.0';

// Components
export { DispatcherProvider, type DispatcherProviderProps } from './DispatcherProvider.js';

// Hooks
export { useDispatcher, DispatcherProviderError } from './useDispatcher.js';
export { useListener } from './useListener.js';
export { useSubscriber } from './useSubscriber.js';
export { useEventState, type EventStateSelector } from './useEventState.js';
