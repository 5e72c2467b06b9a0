// rulecore/functions/WorldQueries.ts
//
// Read-only lookups shared by the built-in functions.

import { abilityModifier } from "../dice/Dice";
import type { GameState } from "../state/GameState";
import type { Ability, LocationState, NpcState } from "../state/StateTypes";
import { ownValue, type DeepReadonly } from "../utils/types";

export type NpcView = DeepReadonly<NpcState>;
export type LocationView = DeepReadonly<LocationState>;

export function npcsAt(state: GameState, locationId: string): NpcView[] {
  return Object.values(state.world.npcs).filter((n) => n.location === locationId);
}

export function livingNpcsHere(state: GameState): NpcView[] {
  return npcsAt(state, state.player.location).filter((n) => n.hp > 0);
}

export function hostilesHere(state: GameState): NpcView[] {
  return livingNpcsHere(state).filter((n) => n.disposition === "hostile");
}

/**
 * Resolve an NPC at the player's location: exact id, then case-insensitive
 * name, then a partial name match.
 */
export function findNpcHere(state: GameState, target: string): NpcView | undefined {
  const here = npcsAt(state, state.player.location);
  const t = target.trim().toLowerCase();
  if (!t) return undefined;

  return (
    here.find((n) => n.id === target.trim()) ??
    here.find((n) => n.name.toLowerCase() === t) ??
    here.find((n) => n.name.toLowerCase().includes(t) || n.id.toLowerCase().includes(t))
  );
}

/** Resolve a location by id or case-insensitive name. */
export function resolveLocation(state: GameState, target: string): LocationView | undefined {
  const t = target.trim().toLowerCase();
  if (!t) return undefined;
  const all = Object.values(state.world.locations);
  return all.find((l) => l.id.toLowerCase() === t) ?? all.find((l) => l.name.toLowerCase() === t);
}

export function currentLocation(state: GameState): LocationView | undefined {
  return ownValue(state.world.locations, state.player.location);
}

export function playerModifier(state: GameState, ability: Ability): number {
  return abilityModifier(state.player.attributes[ability]);
}

/** Item names are stored with underscores; "silvered blade" finds silvered_blade. */
export function normalizeName(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, "_");
}

/** Case-insensitive inventory lookup; returns the stored key. */
export function findInventoryItem(inventory: DeepReadonly<Record<string, number>>, target: string): string | undefined {
  const wanted = normalizeName(target);
  if (!wanted) return undefined;
  return Object.keys(inventory).find((k) => k.toLowerCase() === wanted);
}

type PropertyBag = { readonly [key: string]: unknown };

export function numberProp(props: PropertyBag, key: string, fallback: number): number {
  const v = props[key];
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

export function stringProp(props: PropertyBag, key: string): string | undefined {
  const v = props[key];
  return typeof v === "string" && v ? v : undefined;
}

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}
