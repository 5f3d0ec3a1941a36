/**
 * EventRegistry - Listeners of a single event name
 *
 * Keeps listeners and their priorities under the same identity keys, and
 * tracks whether the listener order currently reflects priority order.
 */

import type { ListenerEntry, ListenerId } from './types.js';

/**
 * Sort state of a registry. Any mutation moves it to 'unsorted'; only
 * ensureSorted() moves it to 'sorted'.
 */
export type SortState = 'unsorted' | 'sorted';

export class EventRegistry {
  private listeners = new Map<ListenerId, ListenerEntry>();
  private priorities = new Map<ListenerId, number>();
  private _state: SortState = 'unsorted';

  get state(): SortState {
    return this._state;
  }

  get size(): number {
    return this.listeners.size;
  }

  /**
   * Insert or replace an entry. A known identity keeps its position in the
   * current order and takes the new priority.
   */
  upsert(entry: ListenerEntry, priority: number): void {
    this.listeners.set(entry.id, entry);
    this.priorities.set(entry.id, priority);
    this._state = 'unsorted';
  }

  /**
   * Remove an entry, returning whether it was present. Marks the registry
   * unsorted either way.
   */
  remove(id: ListenerId): boolean {
    this._state = 'unsorted';
    this.priorities.delete(id);
    return this.listeners.delete(id);
  }

  has(id: ListenerId): boolean {
    return this.listeners.has(id);
  }

  priorityOf(id: ListenerId): number | undefined {
    return this.priorities.get(id);
  }

  /**
   * Reorder entries by descending priority. Equal priorities keep their
   * relative order (Array.prototype.sort is stable).
   * Returns true when a sort actually ran.
   */
  ensureSorted(): boolean {
    if (this._state === 'sorted') {
      return false;
    }

    const priorityOf = (id: ListenerId): number => this.priorities.get(id) ?? 0;
    const ordered = [...this.listeners.values()].sort((a, b) => {
      const pa = priorityOf(a.id);
      const pb = priorityOf(b.id);
      // Compared, not subtracted: Infinity - Infinity is NaN
      if (pa === pb) {
        return 0;
      }
      return pa > pb ? -1 : 1;
    });

    this.listeners = new Map(ordered.map((entry): [ListenerId, ListenerEntry] => [entry.id, entry]));
    this._state = 'sorted';
    return true;
  }

  /**
   * Entries in their current order. Callers wanting dispatch order must
   * call ensureSorted() first.
   */
  entries(): ListenerEntry[] {
    return [...this.listeners.values()];
  }
}
