// rulecore/state/StateInvariants.ts
//
// The commit-time gate. Every transaction draft goes through
// collectViolations() before it replaces live state; restore() runs the same
// checks on incoming snapshots.

import type { ReadonlyConceptRegistry } from "../concepts/ConceptTypes";
import { ownValue, type DeepReadonly } from "../utils/types";
import {
  ABILITIES,
  EQUIPMENT_SLOTS,
  type ActiveStatusEffect,
  type Inventory,
  type PlayerState,
  type WorldState,
} from "./StateTypes";

export const MIN_ABILITY_SCORE = 1;
export const MAX_ABILITY_SCORE = 30;

export interface InvariantSubject {
  player: DeepReadonly<PlayerState>;
  world: DeepReadonly<WorldState>;
  concepts: ReadonlyConceptRegistry;
}

function isInt(n: number): boolean {
  return Number.isInteger(n);
}

function checkBounded(
  out: string[],
  label: string,
  value: number,
  max: number,
): void {
  if (!isInt(value) || !isInt(max)) {
    out.push(`${label} must be an integer (got ${value}/${max})`);
    return;
  }
  if (value < 0 || value > max) {
    out.push(`${label} out of bounds: ${value} not in [0, ${max}]`);
  }
}

function checkInventory(
  out: string[],
  owner: string,
  inv: DeepReadonly<Inventory>,
  concepts: ReadonlyConceptRegistry,
): void {
  for (const [item, qty] of Object.entries(inv)) {
    if (!isInt(qty) || qty <= 0) {
      out.push(`${owner} holds invalid quantity ${qty} of "${item}"`);
    }
    if (!concepts.has(item, "item")) {
      out.push(`${owner} references unknown item "${item}"`);
    }
  }
}

function checkStatusEffects(
  out: string[],
  owner: string,
  effects: ReadonlyArray<DeepReadonly<ActiveStatusEffect>>,
  concepts: ReadonlyConceptRegistry,
): void {
  const seen = new Set<string>();
  for (const effect of effects) {
    if (seen.has(effect.name)) {
      out.push(`${owner} has status "${effect.name}" more than once`);
    }
    seen.add(effect.name);

    if (!concepts.has(effect.name, "status")) {
      out.push(`${owner} references unknown status "${effect.name}"`);
    }
    if (effect.remainingTurns !== null && (!isInt(effect.remainingTurns) || effect.remainingTurns <= 0)) {
      out.push(`${owner} status "${effect.name}" has invalid duration ${effect.remainingTurns}`);
    }
    if (!isInt(effect.stacks) || effect.stacks < 1) {
      out.push(`${owner} status "${effect.name}" has invalid stacks ${effect.stacks}`);
    }
  }
}

/** Returns every violated invariant; an empty list means the state is valid. */
export function collectViolations(subject: InvariantSubject): string[] {
  const { player, world, concepts } = subject;
  const out: string[] = [];

  // Player bounds
  if (!isInt(player.maxHp) || player.maxHp < 1) out.push(`player maxHp must be >= 1 (got ${player.maxHp})`);
  if (!isInt(player.maxMp) || player.maxMp < 0) out.push(`player maxMp must be >= 0 (got ${player.maxMp})`);
  checkBounded(out, "player hp", player.hp, player.maxHp);
  checkBounded(out, "player mp", player.mp, player.maxMp);

  for (const ability of ABILITIES) {
    const score = player.attributes[ability];
    if (!isInt(score) || score < MIN_ABILITY_SCORE || score > MAX_ABILITY_SCORE) {
      out.push(`player ${ability} out of bounds: ${score}`);
    }
  }
  if (!isInt(player.level) || player.level < 1) out.push(`player level must be >= 1 (got ${player.level})`);
  if (!isInt(player.xp) || player.xp < 0) out.push(`player xp must be >= 0 (got ${player.xp})`);
  if (!isInt(player.gold) || player.gold < 0) out.push(`player gold must be >= 0 (got ${player.gold})`);
  if (!isInt(player.ac) || player.ac < 0) out.push(`player ac must be >= 0 (got ${player.ac})`);

  checkInventory(out, "player", player.inventory, concepts);
  checkStatusEffects(out, "player", player.statusEffects, concepts);

  for (const slot of EQUIPMENT_SLOTS) {
    const item = player.equipment[slot];
    if (item === null) continue;
    if (!ownValue(player.inventory, item)) {
      out.push(`player equips "${item}" in ${slot} but does not carry it`);
    }
  }

  // References
  if (!ownValue(world.locations, player.location)) {
    out.push(`player location "${player.location}" does not exist`);
  }
  if (!ownValue(world.locations, world.currentLocation)) {
    out.push(`world currentLocation "${world.currentLocation}" does not exist`);
  }
  if (player.location !== world.currentLocation) {
    out.push(`player location "${player.location}" differs from world currentLocation "${world.currentLocation}"`);
  }

  for (const [key, loc] of Object.entries(world.locations)) {
    if (key !== loc.id) out.push(`location keyed "${key}" has id "${loc.id}"`);
    for (const to of loc.connections) {
      if (!ownValue(world.locations, to)) out.push(`location "${key}" connects to unknown "${to}"`);
    }
    checkInventory(out, `location "${key}"`, loc.items, concepts);
  }

  for (const [key, npc] of Object.entries(world.npcs)) {
    const owner = `npc "${key}"`;
    if (key !== npc.id) out.push(`npc keyed "${key}" has id "${npc.id}"`);
    if (!isInt(npc.maxHp) || npc.maxHp < 1) out.push(`${owner} maxHp must be >= 1 (got ${npc.maxHp})`);
    checkBounded(out, `${owner} hp`, npc.hp, npc.maxHp);
    if (!ownValue(world.locations, npc.location)) {
      out.push(`${owner} location "${npc.location}" does not exist`);
    }
    checkInventory(out, owner, npc.inventory, concepts);
    checkStatusEffects(out, owner, npc.statusEffects, concepts);
  }

  return out;
}
