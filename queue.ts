/**
 * Scoped ownership: one {@link Queue} owns its log outright and hands out
 * {@link ScopedListener}s that borrow it.
 *
 * A borrowed listener must not outlive its queue. The queue enforces that at
 * run time: {@link Queue.close} refuses to run while listeners are attached.
 * With `using`, declare the queue before its listeners and they are disposed
 * first, in the right order.
 *
 * @example
 * ```ts
 * using queue = new Queue<string>();
 * using listener = queue.listen();
 *
 * queue.push('hello');
 * queue.push('world');
 *
 * listener.peek(); // ['hello', 'world']
 * ```
 *
 * @module
 */

import type { Emitter, EventLogOptions } from "./_types.ts";

import { EventLog } from "./log.ts";
import { Listener } from "./listener.ts";
import { QueueError } from "./error.ts";
import { Symbol } from "./symbol.ts";

/**
 * A listener borrowing the log of a {@link Queue}.
 *
 * @typeParam T - Type of the events read.
 */
export class ScopedListener<T> extends Listener<T> {
  readonly #log: EventLog<T>;

  /** @internal Use {@link Queue.listen}. */
  constructor(log: EventLog<T>) {
    super(log.createListener());
    this.#log = log;
  }

  protected resolveLog(): EventLog<T> {
    return this.#log;
  }
}

/**
 * An event queue with a single owner.
 *
 * @typeParam T - Type of the events pushed.
 */
export class Queue<T> implements Emitter<T>, Disposable, AsyncDisposable {
  #log: EventLog<T> | null;

  constructor(options?: EventLogOptions) {
    this.#log = new EventLog<T>(options);
  }

  /** Whether {@link close} has run. */
  get closed(): boolean {
    return this.#log === null;
  }

  /** Number of retained events. */
  get length(): number {
    return this.#log?.length ?? 0;
  }

  /** Number of attached listeners. */
  get listenerCount(): number {
    return this.#log?.listenerCount ?? 0;
  }

  /** Whether no events are retained. */
  isEmpty(): boolean {
    return this.#log?.isEmpty() ?? true;
  }

  /**
   * Appends an event. Ignored once the queue is closed.
   *
   * @returns `true` when at least one listener will observe the event
   */
  push(event: T): boolean {
    return this.#log?.push(event) ?? false;
  }

  /** Alias of {@link push}. */
  emit(event: T): boolean {
    return this.push(event);
  }

  /** Pushes every event of `events` in order. */
  extend(events: Iterable<T>): boolean {
    return this.#log?.extend(events) ?? false;
  }

  /**
   * Attaches a listener that sees every event pushed from now on.
   *
   * @throws {QueueError} if the queue is closed
   */
  listen(): ScopedListener<T> {
    if (!this.#log) {
      throw new QueueError([], 'Cannot listen to a closed queue', { operation: 'listen' });
    }
    return new ScopedListener(this.#log);
  }

  /**
   * Releases every retained event. Idempotent.
   *
   * @throws {QueueError} while listeners are still attached
   */
  close(): void {
    if (!this.#log) return;

    const attached = this.#log.listenerCount;
    if (attached > 0) {
      throw new QueueError(
        [],
        `Cannot close a queue with ${attached} listener(s) still attached, dispose them first`,
        { operation: 'close', value: attached }
      );
    }

    this.#log = null;
  }

  /** Alias for {@link close}. */
  [Symbol.dispose](): void {
    this.close();
  }

  /** Alias for {@link close}. */
  async [Symbol.asyncDispose](): Promise<void> {
    return await this.close();
  }
}
