import { test, expect, vi } from "vitest";

import { EventLog } from "../log.ts";
import { QueueError } from "../error.ts";

// -----------------------------------------------------------------------------
// Cursors
// -----------------------------------------------------------------------------

test("EventLog - new listener starts at the write position", () => {
  const log = new EventLog<number>();
  log.push(0);

  const key = log.createListener();
  expect(log.cursorOf(key)).toBe(1);

  log.push(1);
  log.push(2);
  log.push(3);

  expect(log.pull(key)).toEqual([1, 2, 3]);
});

test("EventLog - pull drains, then reads empty until the next push", () => {
  const log = new EventLog<string>();
  const key = log.createListener();

  log.push("a");
  expect(log.pull(key)).toEqual(["a"]);
  expect(log.pull(key)).toEqual([]);
  expect(log.pull(key)).toEqual([]);

  log.push("b");
  expect(log.pull(key)).toEqual(["b"]);
});

test("EventLog - pullN advances by the number of events returned", () => {
  const log = new EventLog<number>();
  const key = log.createListener();
  log.extend([1, 2, 3, 4, 5]);

  expect(log.pullN(key, 2)).toEqual([1, 2]);
  expect(log.cursorOf(key)).toBe(2);
  expect(log.length).toBe(3);
  expect(log.baseIndex).toBe(2);

  expect(log.pullN(key, 10)).toEqual([3, 4, 5]);
  expect(log.cursorOf(key)).toBe(5);
  expect(log.length).toBe(0);
});

test("EventLog - pullN(0) leaves the cursor and the events alone", () => {
  const log = new EventLog<number>();
  const key = log.createListener();
  log.push(1);

  expect(log.pullN(key, 0)).toEqual([]);
  expect(log.cursorOf(key)).toBe(0);
  expect(log.length).toBe(1);
  expect(log.pull(key)).toEqual([1]);
});

test("EventLog - unknown keys read empty and remove silently", () => {
  const log = new EventLog<number>();
  log.createListener();
  log.push(1);

  expect(log.pull(42)).toEqual([]);
  expect(log.pullN(42, 3)).toEqual([]);
  expect(() => log.removeListener(42)).not.toThrow();
  expect(log.listenerCount).toBe(1);
});

test("EventLog - keys are never reused", () => {
  const log = new EventLog<number>();
  const first = log.createListener();
  log.removeListener(first);

  const second = log.createListener();
  expect(second).not.toBe(first);

  log.push(7);
  expect(log.pull(first)).toEqual([]);
  expect(log.pull(second)).toEqual([7]);
});

// -----------------------------------------------------------------------------
// Garbage collection
// -----------------------------------------------------------------------------

test("EventLog - retains exactly what the slowest cursor has not read", () => {
  const log = new EventLog<number>();
  const fast = log.createListener();
  const slow = log.createListener();
  log.extend([1, 2, 3]);

  expect(log.pullN(slow, 2)).toEqual([1, 2]);
  expect(log.length).toBe(3);

  expect(log.pull(fast)).toEqual([1, 2, 3]);
  expect(log.length).toBe(1);
  expect(log.baseIndex).toBe(2);
  expect(log.writePosition).toBe(3);
});

test("EventLog - removing the slowest listener frees what the others read", () => {
  const log = new EventLog<number>();
  const fast = log.createListener();
  const slow = log.createListener();
  log.extend([1, 2, 3]);

  log.pull(fast);
  expect(log.length).toBe(3);

  log.removeListener(slow);
  expect(log.length).toBe(0);
  expect(log.baseIndex).toBe(3);
});

test("EventLog - each listener reads every event exactly once", () => {
  const log = new EventLog<number>();
  const a = log.createListener();
  log.push(1);
  const b = log.createListener();
  log.push(2);
  log.push(3);

  expect(log.pullN(a, 1)).toEqual([1]);
  expect(log.pull(b)).toEqual([2, 3]);
  log.push(4);
  expect(log.pull(a)).toEqual([2, 3, 4]);
  expect(log.pull(b)).toEqual([4]);
  expect(log.length).toBe(0);
});

// -----------------------------------------------------------------------------
// Orphan policy
// -----------------------------------------------------------------------------

test("EventLog - retains pushes without listeners by default", () => {
  const log = new EventLog<number>();

  expect(log.push(1)).toBe(false);
  expect(log.push(2)).toBe(false);
  expect(log.push(3)).toBe(false);
  expect(log.length).toBe(3);
  expect(log.orphans).toBe("retain");
});

test("EventLog - the first listener frees events retained without listeners", () => {
  const log = new EventLog<number>();
  log.extend([1, 2, 3]);
  expect(log.length).toBe(3);

  const key = log.createListener();
  expect(log.length).toBe(0);
  expect(log.baseIndex).toBe(3);
  expect(log.baseIndex).toBe(log.cursorOf(key));
  expect(log.writePosition).toBe(3);
  expect(log.pull(key)).toEqual([]);
});

test("EventLog - retain keeps unread events after the last listener leaves", () => {
  const log = new EventLog<number>();
  const key = log.createListener();
  expect(log.push(1)).toBe(true);

  log.removeListener(key);
  expect(log.length).toBe(1);
});

test("EventLog - drop discards pushes without listeners", () => {
  const log = new EventLog<number>({ orphans: "drop" });

  expect(log.push(1)).toBe(false);
  expect(log.length).toBe(0);

  const key = log.createListener();
  expect(log.push(2)).toBe(true);
  expect(log.length).toBe(1);

  log.removeListener(key);
  expect(log.length).toBe(0);
  expect(log.baseIndex).toBe(1);
  expect(log.isEmpty()).toBe(true);
});

test("EventLog - a listener created after dropped events sees only new ones", () => {
  const log = new EventLog<number>({ orphans: "drop" });
  log.push(1);
  const key = log.createListener();
  log.push(2);

  expect(log.pull(key)).toEqual([2]);
});

// -----------------------------------------------------------------------------
// Producer surface
// -----------------------------------------------------------------------------

test("EventLog - emit and extend behave like push", () => {
  const log = new EventLog<number>();
  expect(log.extend([])).toBe(false);

  const key = log.createListener();
  expect(log.emit(1)).toBe(true);
  expect(log.extend([2, 3])).toBe(true);
  expect(log.pull(key)).toEqual([1, 2, 3]);
});

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

test("EventLog - rejects a non-positive highWaterMark", () => {
  expect(() => new EventLog({ highWaterMark: 0 })).toThrow(QueueError);
  expect(() => new EventLog({ highWaterMark: Number.NaN })).toThrow(QueueError);
});

test("EventLog - warns once each time the highWaterMark is crossed", () => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

  try {
    const log = new EventLog<number>({ highWaterMark: 2 });
    const key = log.createListener();

    log.extend([1, 2]);
    expect(warn).not.toHaveBeenCalled();

    log.push(3);
    log.push(4);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "EventLog is retaining 3 events (highWaterMark 2, 1 listeners)"
    );

    log.pull(key);
    log.extend([5, 6, 7]);
    expect(warn).toHaveBeenCalledTimes(2);
  } finally {
    warn.mockRestore();
  }
});
