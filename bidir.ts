/**
 * A one-to-one, two-way channel that holds at most one pending value per
 * direction. Writing overwrites whatever the peer has not picked up yet, so
 * the reader always sees the newest value and nothing older.
 *
 * `Tp` is what the primary end receives, `Ts` what the secondary end
 * receives. Both ends are views over the same pair of mailboxes; calling
 * {@link BidirChannel.secondary} twice yields two views of the same end.
 *
 * @example
 * ```ts
 * const primary = new BidirChannel<number, number>();
 * const secondary = primary.secondary();
 *
 * primary.emit(1);
 * primary.emit(2);
 * secondary.retrieveNewest(); // 2, the 1 was overwritten
 *
 * secondary.emit(4);
 * primary.bounce(x => x + 1); // consumes 4, replies 5
 * secondary.retrieveNewest(); // 5
 * ```
 *
 * @module
 */

import type { Emitter } from "./_types.ts";

import { Listenable } from "./listener.ts";
import { QueueError, assertCount } from "./error.ts";

/**
 * One direction of the channel. `pending` is `null` when empty, so a
 * pending `undefined` is still a value.
 *
 * @internal
 */
export interface Mailbox<T> {
  pending: { readonly value: T } | null;
}

/**
 * Guards the two mailboxes. JavaScript never runs two ends at once, so the
 * only way to collide is re-entering the channel from a `bounce` callback.
 *
 * @internal
 */
export interface ChannelLock {
  held: boolean;
}

/**
 * Behaviour common to both ends; `Tin` is read, `Tout` is written.
 *
 * @typeParam Tin - Type of the values this end receives.
 * @typeParam Tout - Type of the values this end sends.
 */
export abstract class ChannelEnd<Tin, Tout> extends Listenable<Tin> implements Emitter<Tout> {
  readonly #inbound: Mailbox<Tin>;
  readonly #outbound: Mailbox<Tout>;
  readonly #lock: ChannelLock;

  protected constructor(inbound: Mailbox<Tin>, outbound: Mailbox<Tout>, lock: ChannelLock) {
    super();
    this.#inbound = inbound;
    this.#outbound = outbound;
    this.#lock = lock;
  }

  /** The inbound and outbound mailboxes and the lock, for building a mirror end. */
  protected mailboxes(): [Mailbox<Tin>, Mailbox<Tout>, ChannelLock] {
    return [this.#inbound, this.#outbound, this.#lock];
  }

  #exclusive<R>(operation: string, fn: () => R): R {
    if (this.#lock.held) {
      throw new QueueError(
        [],
        `Channel is already in use, ${operation} cannot be called from inside bounce`,
        { operation }
      );
    }

    this.#lock.held = true;
    try {
      return fn();
    } finally {
      this.#lock.held = false;
    }
  }

  #take(): { readonly value: Tin } | null {
    const taken = this.#inbound.pending;
    this.#inbound.pending = null;
    return taken;
  }

  /**
   * Overwrites this end's outbound value, discarding any value the peer has
   * not consumed yet. Always delivers.
   */
  emit(value: Tout): boolean {
    return this.#exclusive('emit', () => {
      this.#outbound.pending = { value };
      return true;
    });
  }

  /**
   * Takes the pending inbound value, leaving the inbound mailbox empty.
   *
   * @returns the value, or `undefined` when nothing was pending
   */
  retrieveNewest(): Tin | undefined {
    return this.#exclusive('retrieveNewest', () => this.#take()?.value);
  }

  /**
   * Request/reply in one step: takes the pending inbound value and, if there
   * was one, passes it to `fn`. A non-`undefined` result overwrites the
   * outbound mailbox. With nothing pending, or an `undefined` result, the
   * outbound mailbox is left as it was.
   *
   * Unlike {@link emit}, `bounce` cannot send `undefined` itself: on a channel
   * whose `Tout` includes `undefined`, reply with `emit(undefined)` after
   * {@link retrieveNewest} instead.
   *
   * @returns `true` when a reply was written
   */
  bounce(fn: (value: Tin) => Tout | undefined): boolean {
    return this.#exclusive('bounce', () => {
      const request = this.#take();
      if (!request) return false;

      const reply = fn(request.value);
      if (reply === undefined) return false;

      this.#outbound.pending = { value: reply };
      return true;
    });
  }

  /**
   * Whether the outbound mailbox is empty, i.e. the peer has consumed the
   * last value sent or nothing was sent at all.
   */
  isEmpty(): boolean {
    return this.#outbound.pending === null;
  }

  /** Takes the pending inbound value as a zero- or one-item array. */
  peek(): Tin[] {
    return this.#exclusive('peek', () => {
      const taken = this.#take();
      return taken ? [taken.value] : [];
    });
  }

  /**
   * Same as {@link peek} for any `n > 0`, since at most one value is ever
   * pending. `peekN(0)` leaves the inbound mailbox untouched.
   */
  peekN(n: number): Tin[] {
    assertCount(n, 'peekN');
    if (n === 0) return [];
    return this.peek();
  }
}

/**
 * The "other" end of a {@link BidirChannel}: receives `Ts`, sends `Tp`.
 */
export class BidirSecondary<Tp, Ts> extends ChannelEnd<Ts, Tp> {
  /** @internal Use {@link BidirChannel.secondary}. */
  constructor(toPrimary: Mailbox<Tp>, toSecondary: Mailbox<Ts>, lock: ChannelLock) {
    super(toSecondary, toPrimary, lock);
  }
}

/**
 * The primary end of a bidirectional single-slot channel: receives `Tp`,
 * sends `Ts`.
 *
 * @typeParam Tp - Type of the values the primary end receives.
 * @typeParam Ts - Type of the values the secondary end receives.
 */
export class BidirChannel<Tp, Ts> extends ChannelEnd<Tp, Ts> {
  constructor() {
    super({ pending: null }, { pending: null }, { held: false });
  }

  /**
   * Returns a view of the other end. Every call is backed by the same
   * mailboxes.
   */
  secondary(): BidirSecondary<Tp, Ts> {
    const [toPrimary, toSecondary, lock] = this.mailboxes();
    return new BidirSecondary(toPrimary, toSecondary, lock);
  }
}
