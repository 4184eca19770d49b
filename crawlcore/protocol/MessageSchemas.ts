//crawlcore/protocol/MessageSchemas.ts

import { z } from "zod";

import type {
  DungeonDescriptor,
  EnemyView,
  GameStateSnapshot,
  ItemDescriptor,
  ItemView,
  PlayerView,
  RoomView,
} from "../shared/GameState";
import type { AttackData, MessagePayloads, MessageType } from "../shared/messages";

/** Bump when any payload shape changes incompatibly. */
export const SCHEMA_VERSION = 1;

const id = z.number().int().nonnegative();
const num = z.number().finite();
const vec2 = z.tuple([num, num]);
const entityMapKey = z.string().regex(/^\d+$/, "entity map keys are integer ids");

export const itemDescriptorSchema: z.ZodType<ItemDescriptor> = z.object({
  item_type: z.string(),
  item_class: z.string(),
  name: z.string(),
});

export const playerViewSchema: z.ZodType<PlayerView> = z.object({
  player_id: id,
  name: z.string(),
  x: num,
  y: num,
  hp: num,
  max_hp: num,
  stamina: num,
  max_stamina: num,
  facing_angle: num,
  is_attacking: z.boolean(),
  is_blocking: z.boolean(),
  is_sprinting: z.boolean(),
  equipped: z.record(z.string(), itemDescriptorSchema.nullable()),
});

export const enemyViewSchema: z.ZodType<EnemyView> = z.object({
  hp: num,
  id: id.optional(),
  type: z.string().optional(),
  x: num.optional(),
  y: num.optional(),
  max_hp: num.optional(),
  state: z.string().optional(),
  target: id.nullable().optional(),
  room_id: id.nullable().optional(),
  spawn_pos: vec2.optional(),
  last_attack: num.optional(),
  velocity: vec2.optional(),
  has_bow: z.boolean().optional(),
  last_shot: num.optional(),
  last_jump: num.optional(),
});

export const itemViewSchema: z.ZodType<ItemView> = z.object({
  item_id: id,
  item_type: z.string(),
  item_class: z.string(),
  name: z.string(),
  x: num,
  y: num,
});

const roomViewSchema: z.ZodType<RoomView> = z.object({
  room_id: id,
  x: num,
  y: num,
  width: num,
  height: num,
  cleared: z.boolean(),
  connected_rooms: z.array(id),
  center: vec2,
});

const dungeonSchema: z.ZodType<DungeonDescriptor> = z.object({
  level: z.number().int().positive(),
  room_count: z.number().int().nonnegative(),
  rooms: z.array(roomViewSchema),
  spawn_pos: vec2,
});

export const gameStateSchema: z.ZodType<GameStateSnapshot> = z.object({
  players: z.record(entityMapKey, playerViewSchema),
  enemies: z.record(entityMapKey, enemyViewSchema),
  items: z.record(entityMapKey, itemViewSchema),
  dungeon: dungeonSchema.nullable(),
  level: z.number().int().positive(),
});

const attackDataSchema: z.ZodType<AttackData> = z.object({
  x: num,
  y: num,
  facing_angle: num,
  weapon: z.string().nullable(),
});

const playerRef = z.object({ player_id: id });

type PayloadSchemaTable = { [K in MessageType]: z.ZodType<MessagePayloads[K]> };

/** One payload schema per tag; the codec accepts nothing outside this table. */
export const PAYLOAD_SCHEMAS: PayloadSchemaTable = {
  welcome: z.object({ player_id: id, game_state: gameStateSchema }),
  player_joined: playerRef,
  player_left: playerRef,
  player_update: playerViewSchema,
  attack: attackDataSchema,
  player_attack: z.object({ player_id: id, attack_data: attackDataSchema }),
  enemy_damage: z.object({
    enemy_id: id,
    damage: num.nonnegative(),
    drops: z.array(z.string()).optional(),
  }),
  enemy_damaged: z.object({ enemy_id: id, hp: num }),
  enemy_died: z.object({ enemy_id: id, drops: z.array(z.string()) }),
  pickup_item: z.object({ item_id: id }),
  item_picked_up: z.object({ item_id: id, player_id: id }),
  game_state: gameStateSchema,
};

export const envelopeSchema = z.object({
  v: z.literal(SCHEMA_VERSION),
  type: z.string(),
  payload: z.unknown(),
  timestamp: num,
});

export function isMessageType(type: string): type is MessageType {
  return Object.prototype.hasOwnProperty.call(PAYLOAD_SCHEMAS, type);
}

/** Short, single-line rendering of zod issues for log lines and error messages. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    .join("; ");
}
