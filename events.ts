/**
 * @module EventDispatcher
 */

import type { EventLogOptions, ListenerHandle, ListenerKey } from "./_types.ts";
import type { SharedListener } from "./shared.ts";

import { Listenable } from "./listener.ts";
import { SharedQueue } from "./shared.ts";
import { Symbol } from "./symbol.ts";
import { assertCount } from "./error.ts";

/**
 * A mapping from event names (keys) to their payload types (values).
 *
 * @example
 * ```ts
 * interface MyEvents {
 *   login: { userId: string };
 *   logout: void;
 * }
 * ```
 */
export type EventMap = object;

/**
 * What the dispatcher's queue carries: an event name and its payload.
 */
export interface EventEnvelope<E extends EventMap> {
  type: keyof E;
  payload: E[keyof E];
}

/**
 * Narrows an envelope to a single event name.
 */
export function isEvent<E extends EventMap, Name extends keyof E>(
  event: EventEnvelope<E>,
  name: Name
): event is EventEnvelope<E> & { type: Name; payload: E[Name] } {
  return event.type === name;
}

/**
 * A listener that only yields payloads of one event name.
 *
 * Reads consume envelopes of every name from the underlying listener;
 * non-matching ones are skipped, never returned later.
 *
 * @typeParam E - The event map type.
 * @typeParam Name - The event name this listener yields.
 */
export class NamedListener<E extends EventMap, Name extends keyof E>
  extends Listenable<E[Name]>
  implements ListenerHandle<E[Name]> {
  readonly #inner: SharedListener<EventEnvelope<E>>;
  readonly #name: Name;

  /** @internal Use {@link EventDispatcher.on}. */
  constructor(inner: SharedListener<EventEnvelope<E>>, name: Name) {
    super();
    this.#inner = inner;
    this.#name = name;
  }

  /** The event name this listener yields. */
  get name(): Name {
    return this.#name;
  }

  get key(): ListenerKey {
    return this.#inner.key;
  }

  get disposed(): boolean {
    return this.#inner.disposed;
  }

  #select(events: readonly EventEnvelope<E>[]): E[Name][] {
    const payloads: E[Name][] = [];
    for (const event of events) {
      if (isEvent(event, this.#name)) payloads.push(event.payload);
    }
    return payloads;
  }

  peek(): E[Name][] {
    return this.#select(this.#inner.peek());
  }

  /**
   * Returns up to `n` matching payloads. Envelopes are pulled only as far as
   * needed, so matching events past the `n`th stay unread.
   */
  peekN(n: number): E[Name][] {
    assertCount(n, 'peekN');

    const payloads: E[Name][] = [];
    while (payloads.length < n) {
      const events = this.#inner.peekN(n - payloads.length);
      if (events.length === 0) break;
      payloads.push(...this.#select(events));
    }
    return payloads;
  }

  dispose(): void {
    this.#inner.dispose();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  [Symbol.asyncDispose](): Promise<void> {
    return Promise.resolve(this.dispose());
  }
}

/**
 * The return type of {@link createEventDispatcher}.
 * A strongly-typed facade over a shared event queue.
 *
 * @typeParam E - The event map type, mapping event names to payloads.
 */
export interface EventDispatcher<E extends EventMap> extends Disposable, AsyncDisposable {
  /**
   * Emit an event with the given name and payload.
   * @returns `true` when at least one listener will observe it
   */
  emit<Name extends keyof E>(name: Name, payload: E[Name]): boolean;

  /**
   * Listen to every event as `{ type, payload }` envelopes.
   */
  listen(): SharedListener<EventEnvelope<E>>;

  /**
   * Listen to the payloads of one event name only.
   */
  on<Name extends keyof E>(name: Name): NamedListener<E, Name>;

  /**
   * The underlying queue.
   */
  readonly queue: SharedQueue<EventEnvelope<E>>;

  /**
   * Release the producer. Existing listeners can still drain what was
   * emitted before; no further emits are accepted.
   */
  close(): void;
}

/**
 * Creates a strongly-typed dispatcher whose `emit` and `on` enforce matching
 * event names and payload types.
 *
 * @typeParam E - The event map type, mapping event names to payloads.
 *
 * @example
 * ```ts
 * interface MyEvents {
 *   message: { text: string };
 *   error: { code: number; message: string };
 * }
 *
 * using bus = createEventDispatcher<MyEvents>();
 * using messages = bus.on('message');
 *
 * bus.emit('message', { text: 'Hello World' });
 * bus.emit('error', { code: 500, message: 'oops' });
 *
 * messages.map(payload => payload.text); // ['Hello World']
 * ```
 */
export function createEventDispatcher<E extends EventMap>(
  options?: EventLogOptions
): EventDispatcher<E> {
  const queue = new SharedQueue<EventEnvelope<E>>(options);

  return {
    emit<Name extends keyof E>(name: Name, payload: E[Name]): boolean {
      return queue.push({ type: name, payload });
    },

    listen(): SharedListener<EventEnvelope<E>> {
      return queue.listen();
    },

    on<Name extends keyof E>(name: Name): NamedListener<E, Name> {
      return new NamedListener(queue.listen(), name);
    },

    queue,

    [Symbol.dispose](): void {
      queue[Symbol.dispose]();
    },

    [Symbol.asyncDispose](): Promise<void> {
      return queue[Symbol.asyncDispose]();
    },

    close(): void {
      queue.release();
    }
  };
}
