// crawlcore/test/contract_singleWriterEnemyDamage.test.ts
//
// Contract: concurrent hits on one enemy from several sessions never lose an
// update, and the enemy dies exactly once.

import assert from "node:assert/strict";
import test from "node:test";

import { MessageRouter } from "../core/MessageRouter";
import { SessionManager } from "../core/SessionManager";
import { StateStore } from "../core/StateStore";
import { createMessage } from "../shared/messages";
import { FakeTransport, flush, makeSnapshot } from "./testUtils";

test("[contract] interleaved enemy_damage from four sessions kills the enemy once", async () => {
  const store = new StateStore(makeSnapshot());
  const sessions = new SessionManager(store, { maxPlayers: 4 });
  const router = new MessageRouter(store, sessions);
  sessions.bindInbound(router);

  const transports = [0, 1, 2, 3].map((i) => new FakeTransport(`10.0.0.${i + 1}:4000`));
  for (const t of transports) sessions.accept(t);

  // Eight hits of 10 against 60 hp, two per session, interleaved.
  for (let round = 0; round < 2; round++) {
    for (const t of transports) {
      t.deliver(createMessage("enemy_damage", { enemy_id: 7, damage: 10, drops: ["sword"] }));
    }
  }
  await flush();

  const observer = transports[0];
  const damaged = observer.sentOfType("enemy_damaged").map((m) => m.payload.hp);
  const died = observer.sentOfType("enemy_died").map((m) => m.payload);

  assert.deepEqual(damaged, [50, 40, 30, 20, 10]);
  assert.deepEqual(died, [{ enemy_id: 7, drops: ["sword"] }]);
  assert.equal(router.staleIntents, 2);
  assert.equal("7" in store.snapshot().enemies, false);

  for (const t of transports) {
    assert.equal(t.sentOfType("enemy_died").length, 1);
    assert.equal(t.sentOfType("enemy_damaged").length, 5);
  }
});

test("[contract] a retired enemy is not resurrected by a later state merge", () => {
  const store = new StateStore(makeSnapshot());
  assert.equal(store.applyEnemyDamage(7, 60).kind, "died");

  store.merge({ enemies: { "7": { hp: 60 } } });

  assert.deepEqual(store.snapshot().enemies, {});
  assert.deepEqual(store.applyEnemyDamage(7, 10), { kind: "missing" });
});
