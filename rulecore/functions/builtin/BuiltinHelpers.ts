// rulecore/functions/builtin/BuiltinHelpers.ts

import type { Concept } from "../../concepts/ConceptTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome } from "../FunctionTypes";
import { clamp, numberProp, type NpcView } from "../WorldQueries";
import type { JsonObject } from "../../utils/types";

const DEFAULT_XP_REWARD = 10;

export function failed(actionTaken: string, failureReason: string, details?: JsonObject): FunctionOutcome {
  return details ? { success: false, actionTaken, failureReason, details } : { success: false, actionTaken, failureReason };
}

/**
 * Resolve a dice expression or flat number stored on a concept property.
 * Returns 0 when the property is absent.
 */
export function rollAmount(ctx: ExecutionContext, props: Readonly<JsonObject>, key: string, label: string): number {
  const raw = props[key];
  if (typeof raw === "number" && Number.isFinite(raw)) return raw;
  if (typeof raw === "string" && raw) return ctx.dice.roll(raw, { label }).total;
  return 0;
}

/** Heal the player by up to `amount`, clamped to the missing hp. Returns what was applied. */
export function healPlayer(state: GameState, ctx: ExecutionContext, amount: number): number {
  const applied = clamp(amount, 0, state.player.maxHp - state.player.hp);
  if (applied > 0) ctx.tx.addChange({ target: "player", action: "modify", property: "hp", value: applied });
  return applied;
}

export function restoreMana(state: GameState, ctx: ExecutionContext, amount: number): number {
  const applied = clamp(amount, 0, state.player.maxMp - state.player.mp);
  if (applied > 0) ctx.tx.addChange({ target: "player", action: "modify", property: "mp", value: applied });
  return applied;
}

/** Status concepts are created on first use so the name always resolves. */
export function ensureStatusConcept(ctx: ExecutionContext, name: string, description: string): Concept {
  return ctx.tx.concepts.getOrCreate({ type: "status", name, description }).concept;
}

/**
 * Deal damage to an NPC, clamped to its remaining hp. On a kill the NPC's
 * inventory drops at its location and the player collects xp and gold.
 */
export function damageNpc(
  ctx: ExecutionContext,
  npc: NpcView,
  rawDamage: number,
): { damage: number; defeated: boolean; worldChanges: string[] } {
  const damage = clamp(Math.max(1, rawDamage), 0, npc.hp);
  ctx.tx.addChange({ target: `npc:${npc.id}`, action: "modify", property: "hp", value: -damage });

  if (damage < npc.hp) return { damage, defeated: false, worldChanges: [] };

  const worldChanges = [`${npc.name} was defeated`];
  for (const [item, quantity] of Object.entries(npc.inventory)) {
    ctx.tx.addChange({ target: `npc:${npc.id}`, action: "remove", property: "inventory", value: { item, quantity } });
    ctx.tx.addChange({ target: "world", action: "add", property: `items.${npc.location}`, value: { item, quantity } });
    worldChanges.push(`${npc.name} dropped ${quantity} ${item}`);
  }

  const xp = numberProp(npc.properties, "xp", DEFAULT_XP_REWARD);
  if (xp > 0) ctx.tx.addChange({ target: "player", action: "modify", property: "xp", value: xp });

  const gold = numberProp(npc.properties, "gold", 0);
  if (gold > 0) {
    ctx.tx.addChange({ target: "player", action: "modify", property: "gold", value: gold });
    worldChanges.push(`found ${gold} gold`);
  }

  return { damage, defeated: true, worldChanges };
}
