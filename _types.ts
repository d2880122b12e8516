// @filename: _types.ts
/**
 * Identifies one listener's cursor inside an {@link EventLog}.
 *
 * Keys come from a per-log counter and are never handed out twice, so a
 * stale key can only ever miss; it can never alias a newer listener.
 */
export type ListenerKey = number;

/**
 * What a log does with events pushed while nobody is listening.
 *
 * - `'retain'`: store them anyway. A new listener starts at the write
 *   position, so they are collected as soon as the first listener is
 *   created.
 * - `'drop'`:   discard them, and discard every retained event as soon as the
 *   last listener leaves.
 */
export type OrphanPolicy = 'retain' | 'drop';

/**
 * Configuration shared by {@link EventLog}, {@link Queue} and {@link SharedQueue}.
 */
export interface EventLogOptions {
  /**
   * Behaviour of `push` with zero listeners.
   *
   * @default 'retain'
   */
  orphans?: OrphanPolicy;

  /**
   * Number of retained events above which the log warns once (and again
   * each time it climbs back over after falling under). Purely advisory:
   * nothing is blocked or dropped.
   *
   * @default Infinity
   */
  highWaterMark?: number;
}

/**
 * The read side shared by every listener-like object: log listeners, channel
 * ends, merge views and dispatcher filters.
 *
 * All reads are destructive. Whatever `peek` returns will not be returned by
 * this reader again.
 *
 * @typeParam T - Type of the items read.
 */
export interface Listen<T> {
  /** Drains and returns every unread item, oldest first. */
  peek(): T[];

  /**
   * Drains and returns at most `n` of the oldest unread items.
   * `peekN(0)` returns `[]` and leaves all state untouched.
   */
  peekN(n: number): T[];

  /** Drains every unread item and hands them to `fn` in one call. */
  with<R>(fn: (items: readonly T[]) => R): R;

  /** Like {@link with}, limited to at most `n` items. */
  withN<R>(n: number, fn: (items: readonly T[]) => R): R;

  /** Drains every unread item and maps each of them through `fn`. */
  map<R>(fn: (item: T, index: number) => R): R[];

  /** Like {@link map}, limited to at most `n` items. */
  mapN<R>(n: number, fn: (item: T, index: number) => R): R[];
}

/**
 * The write side of a log or channel.
 *
 * @typeParam T - Type of the events written.
 */
export interface Emitter<T> {
  /**
   * Writes one event. Never fails; the result only reports whether
   * anybody can observe it.
   */
  emit(event: T): boolean;
}

/**
 * A listener bound to one cursor. Disposing it removes the cursor exactly
 * once and lets the log reclaim everything only this listener was holding.
 *
 * @example
 * ```ts
 * {
 *   using listener = queue.listen();
 *   queue.push(1);
 *   listener.peek(); // [1]
 * } // cursor removed here
 * ```
 */
export interface ListenerHandle<T> extends Listen<T>, Disposable, AsyncDisposable {
  /** The cursor this handle owns */
  readonly key: ListenerKey;

  /** Whether {@link dispose} has already run */
  readonly disposed: boolean;

  /** Removes the cursor. Safe to call any number of times. */
  dispose(): void;
}
