//crawlcore/core/StateStore.ts

import {
  cloneSnapshot,
  emptySnapshot,
  entityKey,
  EntityMap,
  GameStateSnapshot,
  GameStateUpdate,
  PlayerView,
} from "../shared/GameState";
import { CodecError } from "../shared/errors";
import { describeIssues, gameStateSchema } from "../protocol/MessageSchemas";
import { Logger } from "../utils/logger";

const log = Logger.scope("STORE");

export type EnemyDamageOutcome =
  | { kind: "missing" }
  | { kind: "damaged"; hp: number }
  | { kind: "died"; hp: number };

type RetiredKind = "players" | "enemies" | "items";

export type DroppedIds = Record<RetiredKind, number[]>;

// Anything stored must stay encodable, or every welcome and game_state after
// it would fail.
function assertEncodable(state: GameStateSnapshot, what: string): void {
  const checked = gameStateSchema.safeParse(state);
  if (!checked.success) {
    throw new CodecError(`${what} rejected: ${describeIssues(checked.error)}`, checked.error);
  }
}

/**
 * The canonical snapshot on the host.
 *
 * Every read-modify-write goes through `withLock`. Effects are synchronous,
 * so one effect always runs to completion before another starts; the lock
 * also refuses re-entry and effects that return a promise, which keeps I/O
 * and awaits out of the critical section.
 *
 * Ids removed from the snapshot are retired per kind and never accepted
 * again, including from external merges.
 */
export class StateStore {
  private state: GameStateSnapshot;
  private held = false;

  private readonly retired: Record<RetiredKind, Set<string>> = {
    players: new Set(),
    enemies: new Set(),
    items: new Set(),
  };

  /** Throws CodecError when the initial snapshot could not be sent to a peer. */
  constructor(initial: GameStateSnapshot = emptySnapshot()) {
    assertEncodable(initial, "Initial snapshot");
    this.state = cloneSnapshot(initial);
  }

  withLock<T>(effect: (state: GameStateSnapshot) => T): T {
    if (this.held) {
      throw new Error("StateStore lock is not re-entrant");
    }

    this.held = true;
    try {
      const result = effect(this.state);
      if (result instanceof Promise) {
        throw new Error("StateStore effects must be synchronous");
      }
      return result;
    } finally {
      this.held = false;
    }
  }

  /** Deep copy for readers outside the lock (welcome payloads, host game loop). */
  snapshot(): GameStateSnapshot {
    return this.withLock((s) => cloneSnapshot(s));
  }

  isRetired(kind: RetiredKind, id: number): boolean {
    return this.retired[kind].has(entityKey(id));
  }

  // ---------------------------------------------------------------------------
  // Router effects
  // ---------------------------------------------------------------------------

  /** Replace a player's view. Returns false for a retired id. */
  putPlayer(playerId: number, view: PlayerView): boolean {
    return this.withLock((s) => {
      const key = entityKey(playerId);
      if (this.retired.players.has(key)) return false;
      s.players[key] = { ...view, player_id: playerId };
      return true;
    });
  }

  /** Delete a player entry and retire the id. Returns whether an entry existed. */
  removePlayer(playerId: number): boolean {
    return this.withLock((s) => {
      const key = entityKey(playerId);
      this.retired.players.add(key);
      if (!(key in s.players)) return false;
      delete s.players[key];
      return true;
    });
  }

  /**
   * Subtract damage from an enemy; delete and retire it at hp <= 0.
   *
   * The read, the subtraction and the delete happen in one critical section,
   * so concurrent hits on the same enemy never lose an update and the enemy
   * dies exactly once.
   */
  applyEnemyDamage(enemyId: number, damage: number): EnemyDamageOutcome {
    return this.withLock((s) => {
      const key = entityKey(enemyId);
      const enemy = s.enemies[key];
      if (!enemy) return { kind: "missing" };

      enemy.hp -= damage;
      if (enemy.hp <= 0) {
        delete s.enemies[key];
        this.retired.enemies.add(key);
        return { kind: "died", hp: enemy.hp };
      }
      return { kind: "damaged", hp: enemy.hp };
    });
  }

  /** Delete an item if present and retire its id. Returns whether this call removed it. */
  takeItem(itemId: number): boolean {
    return this.withLock((s) => {
      const key = entityKey(itemId);
      if (!(key in s.items)) return false;
      delete s.items[key];
      this.retired.items.add(key);
      return true;
    });
  }

  // ---------------------------------------------------------------------------
  // Collaborator merges
  // ---------------------------------------------------------------------------

  /**
   * Replace top-level snapshot fields with the ones given.
   *
   * Entity maps are replaced wholesale, minus any retired id; the dropped ids
   * are returned so the caller can stop re-sending them. An update whose
   * result would not encode throws CodecError and leaves the snapshot as it was.
   */
  merge(update: GameStateUpdate): { droppedIds: DroppedIds } {
    return this.withLock((s) => {
      const droppedIds: DroppedIds = { players: [], enemies: [], items: [] };

      const next: GameStateSnapshot = {
        players: update.players
          ? this.withoutRetired("players", update.players, droppedIds.players)
          : s.players,
        enemies: update.enemies
          ? this.withoutRetired("enemies", update.enemies, droppedIds.enemies)
          : s.enemies,
        items: update.items
          ? this.withoutRetired("items", update.items, droppedIds.items)
          : s.items,
        dungeon:
          update.dungeon === undefined
            ? s.dungeon
            : update.dungeon === null
              ? null
              : structuredClone(update.dungeon),
        level: update.level ?? s.level,
      };

      assertEncodable(next, "State update");
      Object.assign(s, next);

      const dropped =
        droppedIds.players.length + droppedIds.enemies.length + droppedIds.items.length;
      if (dropped > 0) {
        log.warn("Ignored retired ids in external state update", droppedIds);
      }

      return { droppedIds };
    });
  }

  private withoutRetired<T>(kind: RetiredKind, incoming: EntityMap<T>, dropped: number[]): EntityMap<T> {
    const out: EntityMap<T> = {};
    for (const [key, value] of Object.entries(incoming)) {
      if (this.retired[kind].has(key)) {
        dropped.push(Number(key));
        continue;
      }
      out[key] = structuredClone(value);
    }
    return out;
  }
}
