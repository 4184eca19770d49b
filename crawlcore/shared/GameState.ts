//crawlcore/shared/GameState.ts

// Snapshot records are flat and carry no back-references, so they can be
// serialized verbatim. Field names are the wire names.

export type Vec2 = [number, number];

/** Map keyed by the decimal string of a non-negative integer id. */
export type EntityMap<T> = Record<string, T>;

export interface ItemDescriptor {
  item_type: string;
  item_class: string;
  name: string;
}

export interface PlayerView {
  player_id: number;
  name: string;
  x: number;
  y: number;
  hp: number;
  max_hp: number;
  stamina: number;
  max_stamina: number;
  facing_angle: number;
  is_attacking: boolean;
  is_blocking: boolean;
  is_sprinting: boolean;
  equipped: Record<string, ItemDescriptor | null>;
}

export interface EnemyView {
  hp: number;
  id?: number;
  type?: string;
  x?: number;
  y?: number;
  max_hp?: number;
  state?: string;
  target?: number | null;
  room_id?: number | null;
  spawn_pos?: Vec2;
  last_attack?: number;
  velocity?: Vec2;
  has_bow?: boolean;
  last_shot?: number;
  last_jump?: number;
}

export interface ItemView {
  item_id: number;
  item_type: string;
  item_class: string;
  name: string;
  x: number;
  y: number;
}

export interface RoomView {
  room_id: number;
  x: number;
  y: number;
  width: number;
  height: number;
  cleared: boolean;
  connected_rooms: number[];
  center: Vec2;
}

export interface DungeonDescriptor {
  level: number;
  room_count: number;
  rooms: RoomView[];
  spawn_pos: Vec2;
}

export interface GameStateSnapshot {
  players: EntityMap<PlayerView>;
  enemies: EntityMap<EnemyView>;
  items: EntityMap<ItemView>;
  dungeon: DungeonDescriptor | null;
  level: number;
}

/** Fields a world-generation or combat collaborator may replace wholesale. */
export type GameStateUpdate = Partial<GameStateSnapshot>;

export function emptySnapshot(level = 1): GameStateSnapshot {
  return { players: {}, enemies: {}, items: {}, dungeon: null, level };
}

export function entityKey(id: number): string {
  return String(id);
}

export function cloneSnapshot(state: GameStateSnapshot): GameStateSnapshot {
  return structuredClone(state);
}
