/**
 * Shared read behaviour for everything that implements {@link Listen}.
 *
 * {@link Listenable} derives `with`, `withN`, `map` and `mapN` from the two
 * draining primitives `peek` and `peekN`, so log listeners, channel ends and
 * merge views only implement those two. {@link Listener} adds the cursor
 * bookkeeping common to both ownership strategies; the scoped and shared
 * variants only decide how the log is reached and what disposal releases.
 *
 * @module
 */

import type { Listen, ListenerHandle, ListenerKey } from "./_types.ts";
import type { EventLog } from "./log.ts";

import { QueueError, assertCount } from "./error.ts";
import { Symbol } from "./symbol.ts";

/**
 * Maps drained items, re-throwing callback failures as a {@link QueueError}
 * that records the operation and the offending item.
 *
 * @internal
 */
function mapItems<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => R,
  operation: string
): R[] {
  return items.map((item, index) => {
    try {
      return fn(item, index);
    } catch (err) {
      throw QueueError.from(err, operation, item);
    }
  });
}

/**
 * Base class for readers: implement `peek` and `peekN`, inherit the rest.
 *
 * @typeParam T - Type of the items read.
 */
export abstract class Listenable<T> implements Listen<T> {
  abstract peek(): T[];

  abstract peekN(n: number): T[];

  with<R>(fn: (items: readonly T[]) => R): R {
    return fn(this.peek());
  }

  withN<R>(n: number, fn: (items: readonly T[]) => R): R {
    return fn(this.peekN(n));
  }

  map<R>(fn: (item: T, index: number) => R): R[] {
    return mapItems(this.peek(), fn, 'map');
  }

  mapN<R>(n: number, fn: (item: T, index: number) => R): R[] {
    return mapItems(this.peekN(n), fn, 'mapN');
  }
}

/**
 * A disposable handle owning one cursor of an {@link EventLog}.
 *
 * Subclasses provide {@link resolveLog} (where the log lives) and may
 * override {@link release} (what else disposal gives up). Disposal removes the
 * cursor exactly once and never throws; afterwards every read returns `[]`.
 *
 * @typeParam T - Type of the events read.
 */
export abstract class Listener<T> extends Listenable<T> implements ListenerHandle<T> {
  readonly key: ListenerKey;
  #disposed = false;

  protected constructor(key: ListenerKey) {
    super();
    this.key = key;
  }

  /**
   * The log this handle reads from, or `null` once it is out of reach.
   */
  protected abstract resolveLog(): EventLog<T> | null;

  /**
   * Hook run once, right after the cursor has been removed.
   */
  protected release(): void {}

  get disposed(): boolean {
    return this.#disposed;
  }

  peek(): T[] {
    if (this.#disposed) return [];
    return this.resolveLog()?.pull(this.key) ?? [];
  }

  peekN(n: number): T[] {
    assertCount(n, 'peekN');
    if (n === 0 || this.#disposed) return [];
    return this.resolveLog()?.pullN(this.key, n) ?? [];
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;

    this.resolveLog()?.removeListener(this.key);
    this.release();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  [Symbol.asyncDispose](): Promise<void> {
    return Promise.resolve(this.dispose());
  }

  get [Symbol.toStringTag](): string {
    return 'Listener';
  }
}
