// rulecore/functions/builtin/AttackFunction.ts
//
// Melee attack: d20 + STR against the target's AC, then weapon damage + STR.
// A miss is a normal game outcome and still ends the turn.

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { findNpcHere, hostilesHere, playerModifier, stringProp, type NpcView } from "../WorldQueries";
import { damageNpc, failed } from "./BuiltinHelpers";

export const UNARMED_DAMAGE = "1d6+2";

export class AttackFunction implements GameFunction {
  readonly name = "attack";

  private pickTarget(intent: Intent, state: GameState): NpcView | undefined {
    if (!intent.target.trim()) return hostilesHere(state)[0];
    const npc = findNpcHere(state, intent.target);
    return npc && npc.hp > 0 ? npc : undefined;
  }

  canExecute(intent: Intent, state: GameState): boolean {
    return this.pickTarget(intent, state) !== undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const npc = this.pickTarget(intent, state);
    if (!npc) return failed("attack", "no valid target");

    const str = playerModifier(state, "str");
    const hit = ctx.dice.check(str, npc.ac, "attack");
    if (!hit.success) {
      return failed(`attack ${npc.name}`, "attack missed", { roll: hit.roll.total, ac: npc.ac });
    }

    const weaponName = state.player.equipment.weapon;
    const weapon = weaponName ? state.concepts.get(weaponName, "item") : undefined;
    const expression = (weapon && stringProp(weapon.properties, "damage")) ?? UNARMED_DAMAGE;

    const roll = ctx.dice.roll(expression, { label: "damage", extraModifier: str });
    const result = damageNpc(ctx, npc, roll.total);

    const worldChanges = [...result.worldChanges];
    if (npc.disposition !== "hostile" && !result.defeated) {
      ctx.tx.addChange({ target: `npc:${npc.id}`, action: "set", property: "disposition", value: "hostile" });
      worldChanges.push(`${npc.name} turns hostile`);
    }

    return {
      success: true,
      actionTaken: `attack ${npc.name} for ${result.damage} damage`,
      worldChanges,
      details: { target: npc.id, remainingHp: npc.hp - result.damage, defeated: result.defeated },
    };
  }

  priority(): number {
    return 10;
  }

  description(): string {
    return "Attack a creature at your location with your weapon or bare hands.";
  }
}
