//crawlcore/core/MessageRouter.ts

import { Session } from "../shared/Session";
import {
  AttackData,
  createMessage,
  EnemyDamagePayload,
  isClientMessageType,
  isMessage,
  Message,
  PickupItemPayload,
} from "../shared/messages";
import type { PlayerView } from "../shared/GameState";
import { Logger } from "../utils/logger";
import type { InboundHandler, SessionManager } from "./SessionManager";
import type { StateStore } from "./StateStore";

const log = Logger.scope("ROUTER");

/**
 * Applies client intents to the canonical snapshot.
 *
 * Each intent is checked against current snapshot membership and applied in
 * one store critical section; broadcasts go out after the lock is released.
 * The router relays combat outcomes computed elsewhere and never resolves
 * hits itself.
 */
export class MessageRouter implements InboundHandler {
  /** Intents dropped because their target was already gone. */
  staleIntents = 0;

  constructor(
    private readonly store: StateStore,
    private readonly sessions: SessionManager,
  ) {}

  handle(session: Session, message: Message): void {
    if (!isClientMessageType(message.type)) {
      log.warn("Host-only message from client; dropped", {
        playerId: session.id,
        type: message.type,
      });
      return;
    }

    log.debug("Routing message", { playerId: session.id, type: message.type });

    if (isMessage(message, "player_update")) {
      this.onPlayerUpdate(session, message.payload);
    } else if (isMessage(message, "attack")) {
      this.onAttack(session, message.payload);
    } else if (isMessage(message, "enemy_damage")) {
      this.onEnemyDamage(session, message.payload);
    } else if (isMessage(message, "pickup_item")) {
      this.onPickupItem(session, message.payload);
    }
  }

  // Absorbed into the next periodic broadcast; no reactive message.
  private onPlayerUpdate(session: Session, view: PlayerView): void {
    if (!this.sessions.get(session.id)) {
      log.debug("player_update from departed session; dropped", { playerId: session.id });
      return;
    }

    if (!this.store.putPlayer(session.id, view)) {
      log.debug("player_update for retired id; dropped", { playerId: session.id });
    }
  }

  // Cosmetic only; damage arrives separately as enemy_damage.
  private onAttack(session: Session, attack: AttackData): void {
    this.sessions.broadcast(
      createMessage("player_attack", { player_id: session.id, attack_data: attack }),
    );
  }

  private onEnemyDamage(session: Session, hit: EnemyDamagePayload): void {
    const outcome = this.store.applyEnemyDamage(hit.enemy_id, hit.damage);

    switch (outcome.kind) {
      case "missing":
        this.staleIntents++;
        log.debug("enemy_damage for absent enemy; dropped", {
          playerId: session.id,
          enemyId: hit.enemy_id,
        });
        return;

      case "died":
        log.info("Enemy died", { enemyId: hit.enemy_id, killer: session.id });
        this.sessions.broadcast(
          createMessage("enemy_died", { enemy_id: hit.enemy_id, drops: hit.drops ?? [] }),
        );
        return;

      case "damaged":
        this.sessions.broadcast(
          createMessage("enemy_damaged", { enemy_id: hit.enemy_id, hp: outcome.hp }),
        );
        return;
    }
  }

  private onPickupItem(session: Session, pickup: PickupItemPayload): void {
    if (!this.store.takeItem(pickup.item_id)) {
      this.staleIntents++;
      log.debug("pickup_item for absent item; dropped", {
        playerId: session.id,
        itemId: pickup.item_id,
      });
      return;
    }

    this.sessions.broadcast(
      createMessage("item_picked_up", { item_id: pickup.item_id, player_id: session.id }),
    );
  }
}
