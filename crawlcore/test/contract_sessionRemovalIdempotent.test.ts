// crawlcore/test/contract_sessionRemovalIdempotent.test.ts
//
// Contract: however many failure signals arrive for one session, peers hear
// exactly one player_left and the id is never reused.

import assert from "node:assert/strict";
import test from "node:test";

import { SessionManager } from "../core/SessionManager";
import { StateStore } from "../core/StateStore";
import { createMessage } from "../shared/messages";
import { FakeTransport, flush, makeSnapshot } from "./testUtils";

test("[contract] duplicate removal signals produce one player_left", async () => {
  const store = new StateStore(makeSnapshot());
  const sessions = new SessionManager(store, { maxPlayers: 4 });
  sessions.bindInbound({ handle() {} });

  const watcher = new FakeTransport("10.0.0.1:1");
  const flaky = new FakeTransport("10.0.0.2:1");
  sessions.accept(watcher);
  sessions.accept(flaky);

  flaky.failSends = true;

  // Two failed broadcasts, an explicit remove, and the peer closing.
  sessions.broadcast(createMessage("enemy_damaged", { enemy_id: 7, hp: 50 }));
  sessions.broadcast(createMessage("enemy_damaged", { enemy_id: 7, hp: 40 }));
  const first = sessions.remove(1, "test");
  const second = sessions.remove(1, "test");
  flaky.end();
  await flush();
  await sessions.whenClosed(1);

  assert.equal(first, true);
  assert.equal(second, false);
  assert.deepEqual(
    watcher.sentOfType("player_left").map((m) => m.payload.player_id),
    [1],
  );
  assert.deepEqual(sessions.ids(), [0]);
});

test("[contract] ids are monotonic across disconnects", () => {
  const sessions = new SessionManager(new StateStore(makeSnapshot()), { maxPlayers: 1 });
  sessions.bindInbound({ handle() {} });

  const seen: number[] = [];
  for (let i = 0; i < 3; i++) {
    const session = sessions.accept(new FakeTransport());
    assert.ok(session);
    seen.push(session.id);
    sessions.remove(session.id);
  }

  assert.deepEqual(seen, [0, 1, 2]);
});
