// rulecore/state/StateTypes.ts

import type { Concept } from "../concepts/ConceptTypes";
import type { JsonObject, JsonValue } from "../utils/types";

export const ABILITIES = ["str", "dex", "con", "int", "wis", "cha"] as const;
export type Ability = (typeof ABILITIES)[number];
export type AbilityScores = Record<Ability, number>;

export const EQUIPMENT_SLOTS = ["weapon", "armor", "shield", "accessory"] as const;
export type EquipmentSlot = (typeof EQUIPMENT_SLOTS)[number];

/** Item name -> quantity. Names resolve against "item" concepts. */
export type Inventory = Record<string, number>;

/** Status effect by name; the name resolves against "status" concepts at read time. */
export interface ActiveStatusEffect {
  name: string;
  // null = until removed
  remainingTurns: number | null;
  stacks: number;
}

export interface PlayerState {
  name: string;
  attributes: AbilityScores;
  hp: number;
  maxHp: number;
  mp: number;
  maxMp: number;
  ac: number;
  level: number;
  xp: number;
  gold: number;
  statusEffects: ActiveStatusEffect[];
  inventory: Inventory;
  equipment: Record<EquipmentSlot, string | null>;
  location: string;
}

export const NPC_DISPOSITIONS = ["hostile", "neutral", "friendly", "merchant"] as const;
export type NpcDisposition = (typeof NPC_DISPOSITIONS)[number];

export interface NpcState {
  id: string;
  name: string;
  disposition: NpcDisposition;
  hp: number;
  maxHp: number;
  ac: number;
  location: string;
  inventory: Inventory;
  statusEffects: ActiveStatusEffect[];
  properties: JsonObject;
}

export interface LocationState {
  id: string;
  name: string;
  description: string;
  connections: string[];
  items: Inventory;
  properties: JsonObject;
}

export interface WorldClock {
  day: number;
  hour: number;
  minute: number;
}

export interface WorldState {
  currentLocation: string;
  locations: Record<string, LocationState>;
  npcs: Record<string, NpcState>;
  flags: Record<string, boolean>;
  variables: JsonObject;
  clock: WorldClock;
}

export type GameEventKind = "action" | "system";

export interface GameEvent {
  turn: number;
  kind: GameEventKind;
  summary: string;
  success: boolean;
  functionName: string | null;
  clock: WorldClock;
}

// ---------------------------------------------------------------------------
// State changes
// ---------------------------------------------------------------------------

export type StateChangeAction = "add" | "remove" | "modify" | "set";

/**
 * One proposed mutation. Pure data: nothing happens until a transaction
 * commits it.
 *
 * target: "player" | "world" | "npc:<id>" | "concept:<type>"
 * modify on a numeric property adds `value` as a delta; set assigns it.
 */
export interface StateChange {
  target: string;
  action: StateChangeAction;
  property: string;
  value: JsonValue;
}

/** Payload for inventory / location-item add and remove. */
export interface ItemDelta {
  item: string;
  quantity: number;
}

/** Payload for statusEffects add. */
export interface StatusEffectInput {
  name: string;
  turns: number | null;
  stacks?: number;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export const SNAPSHOT_VERSION = 1;

/** Plain JSON mapping produced by GameState.snapshot(). */
export interface GameSnapshot {
  version: typeof SNAPSHOT_VERSION;
  sessionId: string;
  turn: number;
  player: PlayerState;
  world: WorldState;
  concepts: Concept[];
  history: GameEvent[];
}

export interface GameStateInit {
  sessionId?: string;
  turn?: number;
  player: PlayerState;
  world: WorldState;
  concepts?: Concept[];
  history?: GameEvent[];
}
