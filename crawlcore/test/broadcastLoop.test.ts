// crawlcore/test/broadcastLoop.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { tickPeriodMs } from "../config/netConfig";
import { BroadcastLoop } from "../core/BroadcastLoop";
import { SessionManager } from "../core/SessionManager";
import { StateStore } from "../core/StateStore";
import { FakeTransport, makePlayer, makeSnapshot, waitFor } from "./testUtils";

function setup(tickRate: number, onTick?: (tick: number, elapsedMs: number) => void) {
  const store = new StateStore(makeSnapshot());
  const sessions = new SessionManager(store, { maxPlayers: 4 });
  sessions.bindInbound({ handle() {} });
  const loop = new BroadcastLoop(store, sessions, { tickRate, onTick });
  return { store, sessions, loop };
}

test("period follows the tick rate", () => {
  assert.equal(setup(20).loop.periodMs, 50);
  assert.equal(setup(0).loop.periodMs, 1000);
  assert.equal(setup(30).loop.periodMs, tickPeriodMs({ tickRate: 30 }));
});

test("runOnce sends the same snapshot to every session after its welcome", () => {
  const { store, sessions, loop } = setup(30);
  const t0 = new FakeTransport();
  const t1 = new FakeTransport();
  sessions.accept(t0);
  sessions.accept(t1);
  store.putPlayer(0, makePlayer(0));

  const targeted = loop.runOnce();

  assert.equal(targeted, 2);
  assert.equal(loop.tickCount, 1);
  for (const t of [t0, t1]) {
    assert.equal(t.sent[0].type, "welcome");
    const states = t.sentOfType("game_state");
    assert.equal(states.length, 1);
    assert.deepEqual(states[0].payload, store.snapshot());
  }
});

test("runOnce with no sessions still counts the tick", () => {
  const { loop } = setup(30);
  assert.equal(loop.runOnce(), 0);
  assert.equal(loop.tickCount, 1);
});

test("start ticks on its own until stopped", async () => {
  const ticks: number[] = [];
  const { sessions, loop } = setup(200, (tick) => ticks.push(tick));
  const t0 = new FakeTransport();
  sessions.accept(t0);

  loop.start();
  loop.start();
  assert.equal(loop.isRunning, true);

  await waitFor(() => loop.tickCount >= 3);
  loop.stop();
  const stoppedAt = loop.tickCount;

  await new Promise((resolve) => setTimeout(resolve, 30));

  assert.equal(loop.isRunning, false);
  assert.equal(loop.tickCount, stoppedAt);
  assert.deepEqual(ticks.slice(0, 3), [1, 2, 3]);
  assert.equal(t0.sentOfType("game_state").length, stoppedAt);
});

test("a throwing onTick hook does not stop the loop", async () => {
  const { loop } = setup(200, () => {
    throw new Error("hook failed");
  });

  loop.start();
  await waitFor(() => loop.tickCount >= 2);
  loop.stop();

  assert.ok(loop.tickCount >= 2);
});
