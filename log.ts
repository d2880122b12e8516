/**
 * The append-only, garbage-collected log every listener type is built on.
 *
 * Each listener owns a cursor: the global index of the next event it has not
 * read yet. Global indices only ever grow, `baseIndex` is the global index of
 * the oldest retained event, and after every cursor change the log trims
 * everything below the slowest cursor.
 *
 * ```
 *  baseIndex            writePosition
 *     v                      v
 *     [ e5 | e6 | e7 | e8 ]
 *       ^         ^
 *    cursor A  cursor B      (A is the slowest, so e5.. is kept)
 * ```
 *
 * @example
 * ```ts
 * const log = new EventLog<number>();
 * const key = log.createListener();
 *
 * log.push(1);
 * log.push(2);
 *
 * log.pull(key);  // [1, 2]
 * log.pull(key);  // []
 * log.length;     // 0, everything was consumed
 * ```
 *
 * @module
 */

import type { Emitter, EventLogOptions, ListenerKey, OrphanPolicy } from "./_types.ts";
import { QueueError, assertCount } from "./error.ts";

/**
 * Validates log options and fills in their defaults.
 *
 * @internal
 */
export function resolveOptions(
  { orphans = 'retain', highWaterMark = Infinity }: EventLogOptions = {}
): Required<EventLogOptions> {
  if (orphans !== 'retain' && orphans !== 'drop') {
    throw new QueueError(
      [],
      `Unknown orphan policy "${String(orphans)}", expected "retain" or "drop"`,
      { operation: 'configure', value: orphans }
    );
  }

  if (typeof highWaterMark !== 'number' || Number.isNaN(highWaterMark) || highWaterMark <= 0) {
    throw new QueueError(
      [],
      `highWaterMark must be a positive number, got ${highWaterMark}`,
      { operation: 'configure', value: highWaterMark }
    );
  }

  return { orphans, highWaterMark };
}

/**
 * Single-producer, multi-listener event log with independent cursors.
 *
 * Not safe to share across threads; every method runs to completion
 * synchronously.
 *
 * @typeParam T - Type of the events stored.
 */
export class EventLog<T> implements Emitter<T> {
  /** Retained events; `#items[0]` has global index `#baseIndex` */
  #items: T[] = [];
  #baseIndex = 0;
  /** Listener key to the global index of its next unread event */
  #cursors = new Map<ListenerKey, number>();
  #nextKey: ListenerKey = 0;

  readonly #orphans: OrphanPolicy;
  readonly #highWaterMark: number;
  #aboveHighWaterMark = false;

  constructor(options?: EventLogOptions) {
    const { orphans, highWaterMark } = resolveOptions(options);
    this.#orphans = orphans;
    this.#highWaterMark = highWaterMark;
  }

  /** Number of retained events. */
  get length(): number {
    return this.#items.length;
  }

  /** Global index of the oldest retained event. */
  get baseIndex(): number {
    return this.#baseIndex;
  }

  /** Global index the next pushed event will get. */
  get writePosition(): number {
    return this.#baseIndex + this.#items.length;
  }

  /** Number of registered cursors. */
  get listenerCount(): number {
    return this.#cursors.size;
  }

  /** The orphan policy this log was configured with. */
  get orphans(): OrphanPolicy {
    return this.#orphans;
  }

  /** Whether no events are retained. */
  isEmpty(): boolean {
    return this.#items.length === 0;
  }

  /**
   * Global index of the next event `key` will read, or `undefined` for a key
   * that was never issued or has been removed.
   */
  cursorOf(key: ListenerKey): number | undefined {
    return this.#cursors.get(key);
  }

  /**
   * Appends an event. Never trims and never throws.
   *
   * @returns `true` when at least one listener will observe the event
   */
  push(event: T): boolean {
    const observed = this.#cursors.size > 0;
    if (!observed && this.#orphans === 'drop') return false;

    this.#items.push(event);
    this.#checkHighWaterMark();
    return observed;
  }

  /** Alias of {@link push}, so a log can stand in for any {@link Emitter}. */
  emit(event: T): boolean {
    return this.push(event);
  }

  /**
   * Pushes every event of `events` in iteration order.
   *
   * @returns `true` when at least one listener will observe them
   */
  extend(events: Iterable<T>): boolean {
    let observed = this.#cursors.size > 0;
    for (const event of events) {
      observed = this.push(event);
    }
    return observed;
  }

  /**
   * Registers a new cursor at the current write position; the listener will
   * only see events pushed from now on. Events retained while nobody was
   * listening are behind every cursor now, so they are collected here.
   */
  createListener(): ListenerKey {
    const key = this.#nextKey++;
    this.#cursors.set(key, this.writePosition);
    this.#collect();
    return key;
  }

  /**
   * Removes a cursor and collects garbage. Unknown keys are ignored, which
   * makes double disposal harmless.
   */
  removeListener(key: ListenerKey): void {
    this.#cursors.delete(key);
    this.#collect();
  }

  /**
   * Returns every event `key` has not read yet, in push order, and moves its
   * cursor to the write position. An unknown key reads `[]`.
   */
  pull(key: ListenerKey): T[] {
    const cursor = this.#cursors.get(key);
    if (cursor === undefined) {
      this.#collect();
      return [];
    }

    const events = this.#items.slice(cursor - this.#baseIndex);
    this.#cursors.set(key, this.writePosition);
    this.#collect();
    return events;
  }

  /**
   * Returns at most `n` of the oldest events `key` has not read yet and
   * advances its cursor by exactly the number returned.
   *
   * `pullN(key, 0)` returns `[]` without reading or collecting anything.
   */
  pullN(key: ListenerKey, n: number): T[] {
    assertCount(n, 'pullN');
    if (n === 0) return [];

    const cursor = this.#cursors.get(key);
    if (cursor === undefined) {
      this.#collect();
      return [];
    }

    const start = cursor - this.#baseIndex;
    const events = this.#items.slice(start, start + n);
    this.#cursors.set(key, cursor + events.length);
    this.#collect();
    return events;
  }

  /**
   * Drops the prefix every cursor has already passed.
   * With no cursors nothing is trimmed, unless the orphan policy is `'drop'`.
   */
  #collect(): void {
    if (this.#cursors.size === 0) {
      if (this.#orphans === 'drop' && this.#items.length > 0) {
        this.#baseIndex = this.writePosition;
        this.#items = [];
        this.#checkHighWaterMark();
      }
      return;
    }

    let min = Infinity;
    for (const cursor of this.#cursors.values()) {
      if (cursor < min) min = cursor;
    }

    const consumed = min - this.#baseIndex;
    if (consumed <= 0) return;

    this.#items.splice(0, consumed);
    this.#baseIndex = min;
    this.#checkHighWaterMark();
  }

  #checkHighWaterMark(): void {
    const above = this.#items.length > this.#highWaterMark;
    if (above && !this.#aboveHighWaterMark) {
      console.warn(
        `EventLog is retaining ${this.#items.length} events (highWaterMark ${this.#highWaterMark}, ${this.#cursors.size} listeners)`
      );
    }
    this.#aboveHighWaterMark = above;
  }
}
