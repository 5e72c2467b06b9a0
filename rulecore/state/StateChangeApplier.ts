// rulecore/state/StateChangeApplier.ts
//
// Applies StateChange entries to a mutable draft. Only transactions call this,
// and only ever on a private copy: live state is never touched here.
//
// Structural problems (unknown target, wrong payload shape, missing NPC) throw
// StateInvariantViolation straight away. Bounds are left to the invariant
// pass, so a change that pushes hp below zero applies here and fails there.

import { ConceptRegistry } from "../concepts/ConceptRegistry";
import { isConceptType, type ConceptEvent, type ConceptType } from "../concepts/ConceptTypes";
import { StateInvariantViolation } from "../errors/EngineErrors";
import { isJsonObject, ownValue } from "../utils/types";
import {
  ConceptBodySchema,
  ItemDeltaSchema,
  LocationStateSchema,
  NpcStateSchema,
  StatusEffectInputSchema,
} from "./StateSchemas";
import { formatZodIssues } from "../utils/zodIssues";
import {
  ABILITIES,
  EQUIPMENT_SLOTS,
  NPC_DISPOSITIONS,
  type Ability,
  type ActiveStatusEffect,
  type EquipmentSlot,
  type Inventory,
  type NpcState,
  type PlayerState,
  type StateChange,
  type WorldState,
} from "./StateTypes";

export interface StateDraft {
  player: PlayerState;
  world: WorldState;
  concepts: ConceptRegistry;
}

export type ChangeTarget =
  | { kind: "player" }
  | { kind: "world" }
  | { kind: "npc"; id: string }
  | { kind: "concept"; type: ConceptType };

export function parseChangeTarget(target: string): ChangeTarget | null {
  if (target === "player") return { kind: "player" };
  if (target === "world") return { kind: "world" };

  const sep = target.indexOf(":");
  if (sep <= 0) return null;
  const head = target.slice(0, sep);
  const rest = target.slice(sep + 1);
  if (!rest) return null;

  if (head === "npc") return { kind: "npc", id: rest };
  if (head === "concept" && isConceptType(rest)) return { kind: "concept", type: rest };
  return null;
}

export function describeChange(change: StateChange): string {
  return `${change.action} ${change.target}.${change.property} = ${JSON.stringify(change.value)}`;
}

function fail(message: string): never {
  throw new StateInvariantViolation([message]);
}

const FORBIDDEN_KEYS = new Set(["__proto__", "prototype", "constructor"]);

function splitPath(change: StateChange): { head: string; key: string | null } {
  const dot = change.property.indexOf(".");
  if (dot === -1) return { head: change.property, key: null };

  const key = change.property.slice(dot + 1);
  if (!key || FORBIDDEN_KEYS.has(key)) fail(`invalid property key in ${describeChange(change)}`);
  return { head: change.property.slice(0, dot), key };
}

function nextNumber(current: number, change: StateChange): number {
  const v = change.value;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    fail(`${describeChange(change)}: numeric property needs a finite number`);
  }
  if (change.action === "modify") return current + v;
  if (change.action === "set") return v;
  return fail(`${describeChange(change)}: "${change.action}" does not apply to a number`);
}

function requireString(change: StateChange): string {
  if (change.action !== "set" || typeof change.value !== "string" || !change.value) {
    fail(`${describeChange(change)}: expected set with a non-empty string`);
  }
  return change.value;
}

function applyItemDelta(inv: Inventory, change: StateChange): void {
  if (change.action !== "add" && change.action !== "remove") {
    fail(`${describeChange(change)}: items only support add/remove`);
  }
  const parsed = ItemDeltaSchema.safeParse(change.value);
  if (!parsed.success) {
    fail(`${describeChange(change)}: ${formatZodIssues(parsed.error).join(", ")}`);
  }
  const { item, quantity } = parsed.data;
  if (FORBIDDEN_KEYS.has(item)) fail(`invalid item name "${item}"`);

  const next = (ownValue(inv, item) ?? 0) + (change.action === "add" ? quantity : -quantity);
  if (next === 0) {
    delete inv[item];
  } else {
    // Negative counts stay visible so the invariant pass rejects them.
    inv[item] = next;
  }
}

function applyStatusChange(effects: ActiveStatusEffect[], change: StateChange): ActiveStatusEffect[] {
  if (change.action === "remove") {
    if (typeof change.value !== "string") fail(`${describeChange(change)}: expected a status name`);
    const name = change.value;
    return effects.filter((e) => e.name !== name);
  }
  if (change.action !== "add") fail(`${describeChange(change)}: status effects only support add/remove`);

  const parsed = StatusEffectInputSchema.safeParse(change.value);
  if (!parsed.success) {
    fail(`${describeChange(change)}: ${formatZodIssues(parsed.error).join(", ")}`);
  }
  const input = parsed.data;
  const stacks = input.stacks ?? 1;

  const existing = effects.find((e) => e.name === input.name);
  if (!existing) {
    return [...effects, { name: input.name, remainingTurns: input.turns, stacks }];
  }

  // Refresh: merge stacks, keep the longer duration (null = permanent).
  const remainingTurns =
    existing.remainingTurns === null || input.turns === null
      ? null
      : Math.max(existing.remainingTurns, input.turns);
  return effects.map((e) =>
    e.name === input.name ? { ...e, stacks: e.stacks + stacks, remainingTurns } : e,
  );
}

// ---------------------------------------------------------------------------
// player
// ---------------------------------------------------------------------------

const PLAYER_NUMERIC = ["hp", "maxHp", "mp", "maxMp", "ac", "level", "xp", "gold"] as const;
type PlayerNumericKey = (typeof PLAYER_NUMERIC)[number];

function isPlayerNumeric(prop: string): prop is PlayerNumericKey {
  return PLAYER_NUMERIC.some((p) => p === prop);
}

function isAbility(key: string): key is Ability {
  return ABILITIES.some((a) => a === key);
}

function isSlot(key: string): key is EquipmentSlot {
  return EQUIPMENT_SLOTS.some((s) => s === key);
}

function applyToPlayer(player: PlayerState, change: StateChange): void {
  const prop = change.property;
  if (isPlayerNumeric(prop)) {
    player[prop] = nextNumber(player[prop], change);
    return;
  }

  const { head, key } = splitPath(change);
  switch (head) {
    case "attributes":
      if (!key || !isAbility(key)) fail(`${describeChange(change)}: unknown ability`);
      player.attributes[key] = nextNumber(player.attributes[key], change);
      return;
    case "location":
      player.location = requireString(change);
      return;
    case "name":
      player.name = requireString(change);
      return;
    case "equipment": {
      if (!key || !isSlot(key)) fail(`${describeChange(change)}: unknown equipment slot`);
      const v = change.value;
      if (change.action !== "set" || (v !== null && typeof v !== "string")) {
        fail(`${describeChange(change)}: expected set with an item name or null`);
      }
      player.equipment[key] = v;
      return;
    }
    case "inventory":
      applyItemDelta(player.inventory, change);
      return;
    case "statusEffects":
      player.statusEffects = applyStatusChange(player.statusEffects, change);
      return;
    default:
      fail(`${describeChange(change)}: unknown player property`);
  }
}

// ---------------------------------------------------------------------------
// npc
// ---------------------------------------------------------------------------

function applyToNpc(npc: NpcState, change: StateChange): void {
  const { head, key } = splitPath(change);
  switch (head) {
    case "hp":
    case "maxHp":
    case "ac":
      npc[head] = nextNumber(npc[head], change);
      return;
    case "name":
      npc.name = requireString(change);
      return;
    case "location":
      npc.location = requireString(change);
      return;
    case "disposition": {
      const v = requireString(change);
      const disposition = NPC_DISPOSITIONS.find((d) => d === v);
      if (!disposition) fail(`${describeChange(change)}: unknown disposition`);
      npc.disposition = disposition;
      return;
    }
    case "inventory":
      applyItemDelta(npc.inventory, change);
      return;
    case "statusEffects":
      npc.statusEffects = applyStatusChange(npc.statusEffects, change);
      return;
    case "properties":
      if (!key) fail(`${describeChange(change)}: missing property key`);
      if (change.action === "remove") delete npc.properties[key];
      else if (change.action === "set") npc.properties[key] = change.value;
      else fail(`${describeChange(change)}: properties support set/remove`);
      return;
    default:
      fail(`${describeChange(change)}: unknown npc property`);
  }
}

// ---------------------------------------------------------------------------
// world
// ---------------------------------------------------------------------------

function applyToWorld(world: WorldState, change: StateChange): void {
  const { head, key } = splitPath(change);
  switch (head) {
    case "currentLocation":
      world.currentLocation = requireString(change);
      return;

    case "flags":
      if (!key) fail(`${describeChange(change)}: missing flag name`);
      if (change.action === "remove") {
        delete world.flags[key];
      } else if (change.action === "set" && typeof change.value === "boolean") {
        world.flags[key] = change.value;
      } else {
        fail(`${describeChange(change)}: flags take set <boolean> or remove`);
      }
      return;

    case "variables":
      if (!key) fail(`${describeChange(change)}: missing variable name`);
      if (change.action === "remove") delete world.variables[key];
      else if (change.action === "set") world.variables[key] = change.value;
      else fail(`${describeChange(change)}: variables take set or remove`);
      return;

    case "npcs":
      if (change.action === "add") {
        const parsed = NpcStateSchema.safeParse(change.value);
        if (!parsed.success) fail(`${describeChange(change)}: ${formatZodIssues(parsed.error).join(", ")}`);
        if (FORBIDDEN_KEYS.has(parsed.data.id)) fail(`invalid npc id "${parsed.data.id}"`);
        if (ownValue(world.npcs, parsed.data.id)) fail(`npc "${parsed.data.id}" already exists`);
        world.npcs[parsed.data.id] = parsed.data;
      } else if (change.action === "remove" && typeof change.value === "string") {
        if (!ownValue(world.npcs, change.value)) fail(`unknown npc "${change.value}"`);
        delete world.npcs[change.value];
      } else {
        fail(`${describeChange(change)}: npcs take add <npc> or remove <id>`);
      }
      return;

    case "locations": {
      if (change.action !== "add") fail(`${describeChange(change)}: locations only support add`);
      const parsed = LocationStateSchema.safeParse(change.value);
      if (!parsed.success) fail(`${describeChange(change)}: ${formatZodIssues(parsed.error).join(", ")}`);
      if (FORBIDDEN_KEYS.has(parsed.data.id)) fail(`invalid location id "${parsed.data.id}"`);
      if (ownValue(world.locations, parsed.data.id)) fail(`location "${parsed.data.id}" already exists`);
      world.locations[parsed.data.id] = parsed.data;
      return;
    }

    case "items": {
      const loc = key ? ownValue(world.locations, key) : undefined;
      if (!loc) fail(`${describeChange(change)}: unknown location`);
      applyItemDelta(loc.items, change);
      return;
    }

    case "connections": {
      const loc = key ? ownValue(world.locations, key) : undefined;
      if (!loc) fail(`${describeChange(change)}: unknown location`);
      const to = change.value;
      if (typeof to !== "string") fail(`${describeChange(change)}: expected a location id`);
      if (change.action === "add") {
        if (!loc.connections.includes(to)) loc.connections.push(to);
      } else if (change.action === "remove") {
        loc.connections = loc.connections.filter((c) => c !== to);
      } else {
        fail(`${describeChange(change)}: connections take add/remove`);
      }
      return;
    }

    default:
      fail(`${describeChange(change)}: unknown world property`);
  }
}

// ---------------------------------------------------------------------------
// concepts
// ---------------------------------------------------------------------------

/**
 * Concept changes: property is the concept name.
 * add <{description, properties}> | modify <properties> | remove
 */
export function applyConceptChange(
  concepts: ConceptRegistry,
  type: ConceptType,
  change: StateChange,
  turn: number,
): ConceptEvent | null {
  const name = change.property.trim();
  if (!name) fail(`${describeChange(change)}: concept name is empty`);

  switch (change.action) {
    case "add": {
      const parsed = ConceptBodySchema.safeParse(change.value);
      if (!parsed.success) fail(`${describeChange(change)}: ${formatZodIssues(parsed.error).join(", ")}`);
      const { concept } = concepts.create(
        { type, name, description: parsed.data.description, properties: parsed.data.properties },
        turn,
      );
      return { kind: "created", concept };
    }
    case "modify": {
      if (!isJsonObject(change.value)) fail(`${describeChange(change)}: expected a properties object`);
      return { kind: "updated", concept: concepts.update(name, change.value, type) };
    }
    case "remove": {
      const removed = concepts.delete(name, type);
      return removed ? { kind: "deleted", concept: removed } : null;
    }
    default:
      return fail(`${describeChange(change)}: concepts take add/modify/remove`);
  }
}

/** Apply one change to the draft; concept events are returned for notification. */
export function applyStateChange(draft: StateDraft, change: StateChange, turn: number): ConceptEvent | null {
  const target = parseChangeTarget(change.target);
  if (!target) fail(`unknown change target "${change.target}"`);

  switch (target.kind) {
    case "player":
      applyToPlayer(draft.player, change);
      return null;
    case "world":
      applyToWorld(draft.world, change);
      return null;
    case "npc": {
      const npc = ownValue(draft.world.npcs, target.id);
      if (!npc) fail(`unknown npc "${target.id}"`);
      applyToNpc(npc, change);
      return null;
    }
    case "concept":
      return applyConceptChange(draft.concepts, target.type, change, turn);
  }
}
