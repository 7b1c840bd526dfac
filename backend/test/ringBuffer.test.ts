import test from "node:test";
import assert from "node:assert/strict";
import { RingBuffer } from "../src/state/ringBuffer.js";

test("RingBuffer keeps insertion order below capacity", () => {
  const buffer = new RingBuffer<string>(3);
  buffer.push("a");
  buffer.push("b");

  assert.equal(buffer.length, 2);
  assert.deepEqual(buffer.toArray(), ["a", "b"]);
});

test("RingBuffer overwrites the oldest item when full", () => {
  const buffer = new RingBuffer<string>(2);
  assert.equal(buffer.push("a"), undefined);
  assert.equal(buffer.push("b"), undefined);
  assert.equal(buffer.push("c"), "a");
  assert.equal(buffer.push("d"), "b");

  assert.equal(buffer.length, 2);
  assert.deepEqual(buffer.toArray(), ["c", "d"]);
});

test("RingBuffer.retain drops non-matching items and keeps order after wrap-around", () => {
  const buffer = new RingBuffer<number>(3);
  for (const n of [1, 2, 3, 4, 5]) {
    buffer.push(n);
  }

  const dropped = buffer.retain((n) => n !== 4);

  assert.equal(dropped, 1);
  assert.deepEqual(buffer.toArray(), [3, 5]);

  buffer.push(6);
  buffer.push(7);
  assert.deepEqual(buffer.toArray(), [5, 6, 7]);
});

test("RingBuffer.retain returns 0 when nothing is removed", () => {
  const buffer = new RingBuffer<number>(2);
  buffer.push(1);

  assert.equal(buffer.retain(() => true), 0);
  assert.deepEqual(buffer.toArray(), [1]);
});

test("RingBuffer rejects a non-positive or fractional capacity", () => {
  assert.throws(() => new RingBuffer(0), RangeError);
  assert.throws(() => new RingBuffer(-1), RangeError);
  assert.throws(() => new RingBuffer(1.5), RangeError);
});
