/**
 * EventArgs - Payload carried through a dispatch
 *
 * Deliberately minimal: the only state the dispatcher reads is the
 * propagation flag. Applications subclass it to carry their own data.
 */

/**
 * Base payload passed to every listener of a dispatch
 *
 * @example
 * ```ts
 * class UserArgs extends EventArgs {
 *   constructor(readonly userId: string) {
 *     super();
 *   }
 * }
 *
 * dispatcher.dispatch('user:login', new UserArgs('u-1'));
 * ```
 */
export class EventArgs {
  private _propagationStopped = false;

  /**
   * Stop the current dispatch after the calling listener returns.
   * Listeners stay registered for later dispatches.
   */
  stopPropagation = (): void => {
    this._propagationStopped = true;
  };

  isPropagationStopped(): boolean {
    return this._propagationStopped;
  }
}
