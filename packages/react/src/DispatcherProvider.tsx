/**
 * DispatcherProvider - React Context Provider for a syncbus Dispatcher
 *
 * Provides the dispatcher to child components via React Context.
 * Use useDispatcher() or the listener hooks to reach it.
 */

import { createContext, type ReactNode } from 'react';
import type { Dispatcher, EventArgsMap } from '@syncbus/dispatcher';

/**
 * React Context for the dispatcher instance
 * @internal
 */
export const DispatcherContext = createContext<Dispatcher<any> | null>(null);

/**
 * Props for DispatcherProvider component
 */
export interface DispatcherProviderProps<Events extends EventArgsMap = EventArgsMap> {
  /** Dispatcher instance to provide to children */
  dispatcher: Dispatcher<Events>;

  /** Child components that can access the dispatcher */
  children: ReactNode;
}

/**
 * Provider component that makes a dispatcher available to child components
 *
 * @example
 * ```tsx
 * const dispatcher = createDispatcher();
 *
 * function App() {
 *   return (
 *     <DispatcherProvider dispatcher={dispatcher}>
 *       <MyComponent />
 *     </DispatcherProvider>
 *   );
 * }
 * ```
 */
export function DispatcherProvider<Events extends EventArgsMap = EventArgsMap>({
  dispatcher,
  children,
}: DispatcherProviderProps<Events>) {
  return (
    <DispatcherContext.Provider value={dispatcher}>
      {children}
    </DispatcherContext.Provider>
  );
}
