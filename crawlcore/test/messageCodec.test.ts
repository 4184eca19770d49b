// crawlcore/test/messageCodec.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { CodecError } from "../shared/errors";
import { createMessage, isMessage, Message } from "../shared/messages";
import {
  decodeMessage,
  encodeFrame,
  encodeMessage,
  encodeMessageFrame,
  FRAME_HEADER_BYTES,
} from "../protocol/MessageCodec";
import { makePlayer, makeSnapshot } from "./testUtils";

function bodyOf(raw: unknown): Buffer {
  return Buffer.from(JSON.stringify(raw), "utf8");
}

test("every catalog message survives encode then decode", () => {
  const samples: Message[] = [
    createMessage("welcome", { player_id: 0, game_state: makeSnapshot() }, 1_000),
    createMessage("player_joined", { player_id: 2 }, 1_001),
    createMessage("player_left", { player_id: 2 }, 1_002),
    createMessage("player_update", makePlayer(1), 1_003),
    createMessage("attack", { x: 10, y: 20, facing_angle: 0.5, weapon: "hammer" }, 1_004),
    createMessage(
      "player_attack",
      { player_id: 1, attack_data: { x: 10, y: 20, facing_angle: 0.5, weapon: null } },
      1_005,
    ),
    createMessage("enemy_damage", { enemy_id: 7, damage: 60, drops: ["sword"] }, 1_006),
    createMessage("enemy_damage", { enemy_id: 7, damage: 20 }, 1_007),
    createMessage("enemy_damaged", { enemy_id: 7, hp: 40 }, 1_008),
    createMessage("enemy_died", { enemy_id: 7, drops: [] }, 1_009),
    createMessage("pickup_item", { item_id: 3 }, 1_010),
    createMessage("item_picked_up", { item_id: 3, player_id: 1 }, 1_011),
    createMessage("game_state", makeSnapshot(), 1_012.5),
  ];

  for (const original of samples) {
    const decoded = decodeMessage(encodeMessage(original));
    assert.equal(decoded.type, original.type);
    assert.deepEqual(decoded.payload, original.payload);
    assert.equal(decoded.timestamp, original.timestamp);
  }
});

test("encoded body is a versioned JSON envelope", () => {
  const body = encodeMessage(createMessage("player_joined", { player_id: 4 }, 42));
  assert.equal(body.toString("utf8"), '{"v":1,"type":"player_joined","payload":{"player_id":4},"timestamp":42}');
});

test("decoded messages are frozen and narrow by tag", () => {
  const decoded = decodeMessage(bodyOf({ v: 1, type: "enemy_damaged", payload: { enemy_id: 7, hp: 40 }, timestamp: 5 }));
  assert.ok(Object.isFrozen(decoded));
  assert.ok(isMessage(decoded, "enemy_damaged"));
  if (isMessage(decoded, "enemy_damaged")) {
    assert.equal(decoded.payload.hp, 40);
  }
});

test("unknown payload keys are stripped on decode", () => {
  const decoded = decodeMessage(
    bodyOf({ v: 1, type: "pickup_item", payload: { item_id: 3, __proto_hack: true }, timestamp: 1 }),
  );
  assert.deepEqual(decoded.payload, { item_id: 3 });
});

test("decode rejects malformed input with CodecError", () => {
  const cases: Buffer[] = [
    Buffer.from("not json", "utf8"),
    Buffer.from([0xff, 0xfe, 0xfd]),
    Buffer.from('{"v":1,"type":"pickup_item","payload":{"item_id":3}', "utf8"),
    bodyOf({ v: 2, type: "pickup_item", payload: { item_id: 3 }, timestamp: 1 }),
    bodyOf({ v: 1, type: "teleport", payload: {}, timestamp: 1 }),
    bodyOf({ v: 1, type: "pickup_item", payload: { item_id: -1 }, timestamp: 1 }),
    bodyOf({ v: 1, type: "pickup_item", payload: { item_id: 1.5 }, timestamp: 1 }),
    bodyOf({ v: 1, type: "enemy_damage", payload: { enemy_id: 7 }, timestamp: 1 }),
    bodyOf({ v: 1, type: "pickup_item", payload: { item_id: 3 } }),
    bodyOf({ v: 1, type: "game_state", payload: { ...makeSnapshot(), enemies: { seven: { hp: 1 } } }, timestamp: 1 }),
    bodyOf([1, 2, 3]),
  ];

  for (const body of cases) {
    assert.throws(() => decodeMessage(body), CodecError, body.toString("utf8"));
  }
});

test("encode refuses payloads the schema cannot represent", () => {
  assert.throws(
    () => encodeMessage(createMessage("enemy_damaged", { enemy_id: 7, hp: Number.NaN })),
    CodecError,
  );
  assert.throws(
    () => encodeMessage(createMessage("enemy_damage", { enemy_id: 7, damage: -5 })),
    CodecError,
  );
  assert.throws(
    () => encodeMessage(createMessage("player_joined", { player_id: 1 }, Number.POSITIVE_INFINITY)),
    CodecError,
  );
});

test("frames carry a 4-byte big-endian length prefix", () => {
  const frame = encodeFrame(Buffer.from("abc", "utf8"));
  assert.deepEqual([...frame], [0, 0, 0, 3, 0x61, 0x62, 0x63]);

  const message = createMessage("pickup_item", { item_id: 9 }, 7);
  const full = encodeMessageFrame(message);
  assert.equal(full.readUInt32BE(0), full.length - FRAME_HEADER_BYTES);
  assert.deepEqual(decodeMessage(full.subarray(FRAME_HEADER_BYTES)).payload, { item_id: 9 });
});
