// rulecore/state/StateSchemas.ts
//
// zod shapes for everything that crosses the core boundary as plain data:
// snapshots handed back to restore(), seed files, and the structured values
// carried by StateChange entries.

import { z } from "zod";

import { CONCEPT_TYPES, type Concept } from "../concepts/ConceptTypes";
import type { JsonObject, JsonValue } from "../utils/types";
import {
  SNAPSHOT_VERSION,
  type ActiveStatusEffect,
  type GameEvent,
  type GameSnapshot,
  type ItemDelta,
  type LocationState,
  type NpcState,
  type PlayerState,
  type StatusEffectInput,
  type WorldClock,
  type WorldState,
} from "./StateTypes";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

const int = () => z.number().int();

export const InventorySchema = z.record(int());

export const ActiveStatusEffectSchema: z.ZodType<ActiveStatusEffect> = z.object({
  name: z.string().min(1),
  remainingTurns: int().nullable(),
  stacks: int(),
});

export const PlayerStateSchema: z.ZodType<PlayerState> = z.object({
  name: z.string(),
  attributes: z.object({
    str: int(),
    dex: int(),
    con: int(),
    int: int(),
    wis: int(),
    cha: int(),
  }),
  hp: int(),
  maxHp: int(),
  mp: int(),
  maxMp: int(),
  ac: int(),
  level: int(),
  xp: int(),
  gold: int(),
  statusEffects: z.array(ActiveStatusEffectSchema),
  inventory: InventorySchema,
  equipment: z.object({
    weapon: z.string().nullable(),
    armor: z.string().nullable(),
    shield: z.string().nullable(),
    accessory: z.string().nullable(),
  }),
  location: z.string().min(1),
});

export const NpcStateSchema: z.ZodType<NpcState> = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  disposition: z.enum(["hostile", "neutral", "friendly", "merchant"]),
  hp: int(),
  maxHp: int(),
  ac: int(),
  location: z.string().min(1),
  inventory: InventorySchema,
  statusEffects: z.array(ActiveStatusEffectSchema),
  properties: JsonObjectSchema,
});

export const LocationStateSchema: z.ZodType<LocationState> = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  connections: z.array(z.string()),
  items: InventorySchema,
  properties: JsonObjectSchema,
});

export const WorldClockSchema: z.ZodType<WorldClock> = z.object({
  day: int().min(1),
  hour: int().min(0).max(23),
  minute: int().min(0).max(59),
});

export const WorldStateSchema: z.ZodType<WorldState> = z.object({
  currentLocation: z.string().min(1),
  locations: z.record(LocationStateSchema),
  npcs: z.record(NpcStateSchema),
  flags: z.record(z.boolean()),
  variables: JsonObjectSchema,
  clock: WorldClockSchema,
});

export const ConceptSchema: z.ZodType<Concept> = z.object({
  type: z.enum(CONCEPT_TYPES),
  name: z.string().min(1),
  description: z.string(),
  properties: JsonObjectSchema,
  createdTurn: int().min(0),
});

export const GameEventSchema: z.ZodType<GameEvent> = z.object({
  turn: int().min(0),
  kind: z.enum(["action", "system"]),
  summary: z.string(),
  success: z.boolean(),
  functionName: z.string().nullable(),
  clock: WorldClockSchema,
});

export const GameSnapshotSchema: z.ZodType<GameSnapshot> = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  sessionId: z.string().min(1),
  turn: int().min(0),
  player: PlayerStateSchema,
  world: WorldStateSchema,
  concepts: z.array(ConceptSchema),
  history: z.array(GameEventSchema),
});

// StateChange payloads

export const ItemDeltaSchema: z.ZodType<ItemDelta> = z.object({
  item: z.string().min(1),
  quantity: int().positive(),
});

export const StatusEffectInputSchema: z.ZodType<StatusEffectInput> = z.object({
  name: z.string().min(1),
  turns: int().positive().nullable(),
  stacks: int().positive().optional(),
});

export const ConceptBodySchema = z.object({
  description: z.string(),
  properties: JsonObjectSchema.optional(),
});
