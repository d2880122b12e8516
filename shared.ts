/**
 * Shared ownership: the log sits in a reference-counted cell held jointly by
 * the producer ({@link SharedQueue}) and every live {@link SharedListener}.
 * It is dropped when the last of them lets go, so a listener may outlive its
 * producer and still drain what was pushed before the producer went away.
 *
 * @example
 * ```ts
 * const queue = new SharedQueue<number>();
 * const listener = queue.listen();
 *
 * queue.push(1);
 * queue.release();    // producer gone, log still alive
 *
 * listener.peek();    // [1]
 * listener.dispose(); // last holder, log dropped
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
 * The reference-counted cell around a shared log.
 *
 * @internal
 */
export interface SharedCell<T> {
  log: EventLog<T> | null;
  refs: number;
}

function retain<T>(cell: SharedCell<T>): EventLog<T> | null {
  if (cell.log) cell.refs++;
  return cell.log;
}

function releaseCell<T>(cell: SharedCell<T>): void {
  if (cell.refs === 0) return;
  cell.refs--;
  if (cell.refs === 0) cell.log = null;
}

/**
 * A listener co-owning the log of a {@link SharedQueue}.
 *
 * @typeParam T - Type of the events read.
 */
export class SharedListener<T> extends Listener<T> {
  readonly #cell: SharedCell<T>;

  /** @internal Use {@link SharedQueue.listen}. */
  constructor(cell: SharedCell<T>, log: EventLog<T>) {
    super(log.createListener());
    this.#cell = cell;
  }

  protected resolveLog(): EventLog<T> | null {
    return this.#cell.log;
  }

  protected override release(): void {
    releaseCell(this.#cell);
  }
}

/**
 * The producer side of a shared event queue.
 *
 * @typeParam T - Type of the events pushed.
 */
export class SharedQueue<T> implements Emitter<T>, Disposable, AsyncDisposable {
  readonly #cell: SharedCell<T>;
  #released = false;

  constructor(options?: EventLogOptions) {
    this.#cell = { log: new EventLog<T>(options), refs: 1 };
  }

  /** Number of holders keeping the log alive, producer included. */
  get refCount(): number {
    return this.#cell.refs;
  }

  /** Whether this producer has released its reference. */
  get released(): boolean {
    return this.#released;
  }

  /** Number of retained events. */
  get length(): number {
    return this.#cell.log?.length ?? 0;
  }

  /** Number of live listeners. */
  get listenerCount(): number {
    return this.#cell.log?.listenerCount ?? 0;
  }

  /** Whether no events are retained. */
  isEmpty(): boolean {
    return this.#cell.log?.isEmpty() ?? true;
  }

  /**
   * Appends an event. Ignored once this producer has been released.
   *
   * @returns `true` when at least one listener will observe the event
   */
  push(event: T): boolean {
    if (this.#released) return false;
    return this.#cell.log?.push(event) ?? false;
  }

  /** Alias of {@link push}. */
  emit(event: T): boolean {
    return this.push(event);
  }

  /** Pushes every event of `events` in order. */
  extend(events: Iterable<T>): boolean {
    if (this.#released) return false;
    return this.#cell.log?.extend(events) ?? false;
  }

  /**
   * Attaches a listener that sees every event pushed from now on and keeps
   * the log alive until it is disposed.
   *
   * @throws {QueueError} once this producer has been released
   */
  listen(): SharedListener<T> {
    const log = this.#released ? null : retain(this.#cell);
    if (!log) {
      throw new QueueError([], 'Cannot listen through a released queue', { operation: 'listen' });
    }
    return new SharedListener(this.#cell, log);
  }

  /** Gives up the producer's reference. Idempotent. */
  release(): void {
    if (this.#released) return;
    this.#released = true;
    releaseCell(this.#cell);
  }

  /** Alias for {@link release}. */
  [Symbol.dispose](): void {
    this.release();
  }

  /** Alias for {@link release}. */
  async [Symbol.asyncDispose](): Promise<void> {
    return await this.release();
  }
}
