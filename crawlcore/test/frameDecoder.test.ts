// crawlcore/test/frameDecoder.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { FrameTooLargeError } from "../shared/errors";
import { createMessage } from "../shared/messages";
import { decodeMessage, encodeFrame, encodeMessageFrame, FrameDecoder } from "../protocol/MessageCodec";

test("bodies split across chunks are only surfaced once complete", () => {
  const decoder = new FrameDecoder();
  const frame = encodeFrame(Buffer.from("hello", "utf8"));

  assert.deepEqual(decoder.push(frame.subarray(0, 2)), []);
  assert.deepEqual(decoder.push(frame.subarray(2, 6)), []);
  assert.equal(decoder.pendingBytes, 6);

  const bodies = decoder.push(frame.subarray(6));
  assert.equal(bodies.length, 1);
  assert.equal(bodies[0].toString("utf8"), "hello");
  assert.equal(decoder.pendingBytes, 0);
});

test("several frames in one chunk come out in order", () => {
  const decoder = new FrameDecoder();
  const chunk = Buffer.concat([
    encodeMessageFrame(createMessage("player_joined", { player_id: 0 }, 1)),
    encodeMessageFrame(createMessage("player_joined", { player_id: 1 }, 2)),
    encodeFrame(Buffer.from("partial", "utf8")).subarray(0, 5),
  ]);

  const bodies = decoder.push(chunk);
  assert.deepEqual(
    bodies.map((b) => decodeMessage(b).payload),
    [{ player_id: 0 }, { player_id: 1 }],
  );
  assert.equal(decoder.pendingBytes, 5);
});

test("a byte-at-a-time stream yields the same body", () => {
  const decoder = new FrameDecoder();
  const frame = encodeMessageFrame(createMessage("pickup_item", { item_id: 12 }, 3));

  const bodies: Buffer[] = [];
  for (const byte of frame) {
    bodies.push(...decoder.push(Buffer.from([byte])));
  }

  assert.equal(bodies.length, 1);
  assert.deepEqual(decodeMessage(bodies[0]).payload, { item_id: 12 });
});

test("a zero-length frame is a valid empty body", () => {
  const decoder = new FrameDecoder();
  const bodies = decoder.push(Buffer.from([0, 0, 0, 0]));
  assert.equal(bodies.length, 1);
  assert.equal(bodies[0].length, 0);
});

test("a length prefix above the limit is rejected", () => {
  const decoder = new FrameDecoder(16);
  const header = Buffer.alloc(4);
  header.writeUInt32BE(17, 0);

  assert.throws(
    () => decoder.push(header),
    (err: unknown) => err instanceof FrameTooLargeError && err.length === 17 && err.limit === 16,
  );
});
