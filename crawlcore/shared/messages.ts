//crawlcore/shared/messages.ts

import type { GameStateSnapshot, PlayerView } from "./GameState";

// -------------------------
// Message type tags
// -------------------------

/** Intents a client may submit to the host. */
export type ClientMessageType =
  | "player_update"
  | "attack"
  | "enemy_damage"
  | "pickup_item";

/** Messages only the host emits. */
export type ServerMessageType =
  | "welcome"
  | "player_joined"
  | "player_left"
  | "player_attack"
  | "enemy_damaged"
  | "enemy_died"
  | "item_picked_up"
  | "game_state";

export type MessageType = ClientMessageType | ServerMessageType;

export const CLIENT_MESSAGE_TYPES: readonly ClientMessageType[] = [
  "player_update",
  "attack",
  "enemy_damage",
  "pickup_item",
];

export function isClientMessageType(type: MessageType): type is ClientMessageType {
  return CLIENT_MESSAGE_TYPES.some((t) => t === type);
}

// -------------------------
// Payload shapes
// -------------------------

export interface AttackData {
  x: number;
  y: number;
  facing_angle: number;
  weapon: string | null;
}

export interface WelcomePayload {
  player_id: number;
  game_state: GameStateSnapshot;
}

export interface PlayerRefPayload {
  player_id: number;
}

export interface PlayerAttackPayload {
  player_id: number;
  attack_data: AttackData;
}

export interface EnemyDamagePayload {
  enemy_id: number;
  damage: number;
  drops?: string[];
}

export interface EnemyDamagedPayload {
  enemy_id: number;
  hp: number;
}

export interface EnemyDiedPayload {
  enemy_id: number;
  drops: string[];
}

export interface PickupItemPayload {
  item_id: number;
}

export interface ItemPickedUpPayload {
  item_id: number;
  player_id: number;
}

export interface MessagePayloads {
  welcome: WelcomePayload;
  player_joined: PlayerRefPayload;
  player_left: PlayerRefPayload;
  player_update: PlayerView;
  attack: AttackData;
  player_attack: PlayerAttackPayload;
  enemy_damage: EnemyDamagePayload;
  enemy_damaged: EnemyDamagedPayload;
  enemy_died: EnemyDiedPayload;
  pickup_item: PickupItemPayload;
  item_picked_up: ItemPickedUpPayload;
  game_state: GameStateSnapshot;
}

// -------------------------
// Envelope
// -------------------------

export interface Message<T extends MessageType = MessageType> {
  readonly type: T;
  readonly payload: MessagePayloads[T];
  /** Wall-clock milliseconds at construction. */
  readonly timestamp: number;
}

/** Discriminated union over every tag; narrow with `switch (msg.type)`. */
export type AnyMessage = { [K in MessageType]: Message<K> }[MessageType];

export function createMessage<T extends MessageType>(
  type: T,
  payload: MessagePayloads[T],
  timestamp: number = Date.now(),
): Message<T> {
  return Object.freeze({ type, payload, timestamp });
}

/** Narrow a decoded message by tag without a cast. */
export function isMessage<T extends MessageType>(message: Message, type: T): message is Message<T> {
  return message.type === type;
}
