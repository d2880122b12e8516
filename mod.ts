/**
 * In-process event distribution with per-listener cursors.
 *
 * A producer pushes events into a log; any number of listeners read them at
 * their own pace. Each listener only ever sees events pushed after it was
 * created, never sees an event twice, and the log forgets an event as soon as
 * every listener has read it.
 *
 * ## Pieces
 *
 * - {@link EventLog}: the log itself, keyed by raw listener keys.
 * - {@link Queue} / {@link ScopedListener}: one owner, borrowed listeners.
 * - {@link SharedQueue} / {@link SharedListener}: reference-counted, the log
 *   lives until the producer and every listener have let go.
 * - {@link BidirChannel}: a one-to-one, two-way channel with one slot per
 *   direction and a request/reply `bounce`.
 * - {@link MergeView}: several readers read as one, grouped by reader.
 * - {@link createEventDispatcher}: typed `{ type, payload }` events over a
 *   shared queue.
 *
 * Every reader implements {@link Listen}: `peek`, `with`, `map` and their
 * bounded `peekN`, `withN`, `mapN` counterparts. All reads drain.
 *
 * @example Listeners only see what comes after them
 * ```ts
 * import { Queue } from "./mod.ts";
 *
 * using queue = new Queue<number>();
 * queue.push(0);                 // nobody is listening yet
 *
 * using listener = queue.listen();
 * queue.push(1);
 * queue.push(2);
 *
 * listener.peek();               // [1, 2]
 * listener.peek();               // []
 * ```
 *
 * @example Listeners outliving the producer
 * ```ts
 * import { SharedQueue } from "./mod.ts";
 *
 * const queue = new SharedQueue<string>();
 * const listener = queue.listen();
 *
 * queue.push('last words');
 * queue.release();
 *
 * listener.peek();               // ['last words']
 * listener.dispose();            // log freed
 * ```
 *
 * @example Request/reply
 * ```ts
 * import { BidirChannel } from "./mod.ts";
 *
 * const server = new BidirChannel<number, number>();
 * const client = server.secondary();
 *
 * client.emit(41);
 * server.bounce(n => n + 1);
 * client.retrieveNewest();       // 42
 * ```
 *
 * @module
 */

export type * from "./_types.ts";

export { EventLog } from "./log.ts";
export { Listenable, Listener } from "./listener.ts";
export { Queue, ScopedListener } from "./queue.ts";
export { SharedQueue, SharedListener } from "./shared.ts";
export { BidirChannel, BidirSecondary, ChannelEnd } from "./bidir.ts";
export { MergeView, merge } from "./merge.ts";
export { createEventDispatcher, isEvent, NamedListener } from "./events.ts";
export type { EventDispatcher, EventEnvelope, EventMap } from "./events.ts";
export { QueueError, isQueueError } from "./error.ts";
export type { QueueErrorOptions } from "./error.ts";
export { Symbol } from "./symbol.ts";
