// merge.ts
// Treats several readers as one logical stream

import type { Listen } from "./_types.ts";

import { Listenable } from "./listener.ts";
import { assertCount } from "./error.ts";

/**
 * Reads several sources as one: each read drains the sources in the order
 * they were given and concatenates the results.
 *
 * @remarks
 * Items are grouped by source, then by emission order within each source.
 * Emissions from different sources are not interleaved by time: if `a`
 * received `[0, 2]` and `b` received `[1, 3]`, `new MergeView([a, b]).peek()`
 * is `[0, 2, 1, 3]`.
 *
 * Any {@link Listen} works as a source, including channel ends and other
 * merge views. The view does not own its sources; dispose them yourself.
 *
 * @typeParam T - Type of the items read.
 *
 * @example
 * ```ts
 * const clicks = new Queue<string>();
 * const keys = new Queue<string>();
 *
 * using a = clicks.listen();
 * using b = keys.listen();
 *
 * clicks.push('click');
 * keys.push('enter');
 *
 * new MergeView([a, b]).with(events => console.log(events)); // ['click', 'enter']
 * ```
 */
export class MergeView<T> extends Listenable<T> {
  readonly #sources: readonly Listen<T>[];

  constructor(sources: Iterable<Listen<T>>) {
    super();
    this.#sources = Array.from(sources);
  }

  /** Number of sources. */
  get size(): number {
    return this.#sources.length;
  }

  peek(): T[] {
    return this.#sources.flatMap(source => source.peek());
  }

  /**
   * Takes up to `n` items, draining sources in order until `n` is reached.
   * Sources after that point are left untouched.
   */
  peekN(n: number): T[] {
    assertCount(n, 'peekN');

    const items: T[] = [];
    for (const source of this.#sources) {
      const remaining = n - items.length;
      if (remaining === 0) break;
      for (const item of source.peekN(remaining)) items.push(item);
    }
    return items;
  }
}

/**
 * Shorthand for `new MergeView(sources)`.
 *
 * @example
 * ```ts
 * merge(a, b, c).map(event => event.type);
 * ```
 */
export function merge<T>(...sources: Listen<T>[]): MergeView<T> {
  return new MergeView(sources);
}
