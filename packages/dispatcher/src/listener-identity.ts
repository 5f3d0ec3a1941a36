/**
 * Identity tokens for listener values
 *
 * Functions and objects are both keyed by reference, so the same value always
 * gets the same token and two distinct values never share one.
 */

import type { Listener, ListenerId } from './types.js';

/**
 * WeakMap storage so identity tracking never keeps a listener alive.
 */
const identities = new WeakMap<Listener, ListenerId>();

let identityCounter = 0;

/**
 * Returns the identity token of a listener, assigning one on first sight
 */
export const listenerId = (listener: Listener): ListenerId => {
  const known = identities.get(listener);
  if (known !== undefined) {
    return known;
  }

  const id = `listener_${++identityCounter}`;
  identities.set(listener, id);
  return id;
};
