import { test, expect } from "vitest";

import { SharedQueue } from "../shared.ts";
import { QueueError } from "../error.ts";

// -----------------------------------------------------------------------------
// Delivery
// -----------------------------------------------------------------------------

test("SharedQueue - cleanup follows the slowest listener", () => {
  const queue = new SharedQueue<number>();
  const listener1 = queue.listen();

  queue.push(10);
  expect(queue.length).toBe(1);

  const listener2 = queue.listen();
  queue.push(20);

  expect(listener1.peek()).toEqual([10, 20]);
  expect(listener2.peek()).toEqual([20]);
  expect(listener2.peek()).toEqual([]);
  expect(listener2.peek()).toEqual([]);
  expect(queue.length).toBe(0);

  queue.extend(Array(10).fill(30));
  expect(listener2.peek()).toEqual(Array(10).fill(30));

  listener1.dispose();
  expect(queue.length).toBe(0);

  listener2.dispose();
  queue.release();
});

test("SharedQueue - bounded and mapped reads", () => {
  const queue = new SharedQueue<number>();
  const listener = queue.listen();
  queue.extend([1, 2, 3]);

  expect(listener.withN(2, events => [...events])).toEqual([1, 2]);
  expect(listener.map(event => event + 1)).toEqual([4]);
  listener.dispose();
});

// -----------------------------------------------------------------------------
// Reference counting
// -----------------------------------------------------------------------------

test("SharedQueue - every live listener holds a reference", () => {
  const queue = new SharedQueue<number>();
  expect(queue.refCount).toBe(1);

  const a = queue.listen();
  const b = queue.listen();
  expect(queue.refCount).toBe(3);
  expect(queue.listenerCount).toBe(2);

  a.dispose();
  a.dispose();
  expect(queue.refCount).toBe(2);
  expect(queue.listenerCount).toBe(1);

  b.dispose();
  expect(queue.refCount).toBe(1);
});

test("SharedQueue - listener outlives the producer", () => {
  const queue = new SharedQueue<number>();
  const listener = queue.listen();

  queue.push(1);
  queue.push(2);
  queue.release();

  expect(queue.released).toBe(true);
  expect(queue.refCount).toBe(1);
  expect(queue.push(3)).toBe(false);
  expect(queue.extend([4])).toBe(false);

  expect(listener.peek()).toEqual([1, 2]);
  expect(queue.length).toBe(0);

  listener.dispose();
  expect(queue.refCount).toBe(0);
  expect(queue.isEmpty()).toBe(true);
  expect(listener.peek()).toEqual([]);
});

test("SharedQueue - producer stays usable after its listeners leave", () => {
  const queue = new SharedQueue<string>();
  const listener = queue.listen();
  listener.dispose();

  expect(queue.refCount).toBe(1);

  const next = queue.listen();
  expect(queue.push("again")).toBe(true);
  expect(next.peek()).toEqual(["again"]);
  next.dispose();
});

test("SharedQueue - release is idempotent", () => {
  const queue = new SharedQueue<number>();
  const listener = queue.listen();

  queue.release();
  queue[Symbol.dispose]();
  expect(queue.refCount).toBe(1);

  listener.dispose();
  expect(queue.refCount).toBe(0);
});

test("SharedQueue - cannot listen through a released producer", () => {
  const queue = new SharedQueue<number>();
  queue.release();

  expect(() => queue.listen()).toThrow(QueueError);
  expect(queue.refCount).toBe(0);
});
