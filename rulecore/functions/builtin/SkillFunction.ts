// rulecore/functions/builtin/SkillFunction.ts
//
// Use a skill by name. Unknown skills are learned on first use: the content
// generator (or a name heuristic) supplies the mechanics and the concept is
// get-or-created in the turn's transaction.
//
// Skill concept properties:
//   mpCost  number, default 1
//   effect  "heal" | "damage" | "status"
//   power   dice expression or number (heal/damage)
//   status  status name, turns (status)

import { inferSkillProperties } from "../../content/ContentGenerator";
import type { Concept } from "../../concepts/ConceptTypes";
import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import {
  findNpcHere,
  hostilesHere,
  normalizeName,
  numberProp,
  playerModifier,
  stringProp,
  type NpcView,
} from "../WorldQueries";
import { damageNpc, ensureStatusConcept, failed, healPlayer, rollAmount } from "./BuiltinHelpers";

export const SKILL_DC = 10;
const DEFAULT_STATUS_TURNS = 3;

function skillName(intent: Intent): string {
  return normalizeName(stringProp(intent.parameters, "skill") ?? intent.target);
}

export class SkillFunction implements GameFunction {
  readonly name = "skill";

  canExecute(intent: Intent, _state: GameState): boolean {
    return skillName(intent).length > 0;
  }

  private learn(intent: Intent, state: GameState, ctx: ExecutionContext, name: string): { skill: Concept; learned: boolean } {
    const known = ctx.tx.concepts.get(name, "skill");
    if (known) return { skill: known, learned: false };

    const generated = ctx.content?.generate({
      type: "skill",
      hint: name,
      locationId: state.player.location,
      action: intent.action,
    });
    const { concept, created } = ctx.tx.concepts.getOrCreate({
      type: "skill",
      name,
      description: generated?.description ?? `The ${name.replace(/_/g, " ")} technique.`,
      properties: generated?.properties ?? inferSkillProperties(name),
    });
    return { skill: concept, learned: created };
  }

  private skillTarget(intent: Intent, state: GameState): NpcView | undefined {
    const named = stringProp(intent.parameters, "target");
    const npc = named ? findNpcHere(state, named) : hostilesHere(state)[0];
    return npc && npc.hp > 0 ? npc : undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const name = skillName(intent);
    const { skill, learned } = this.learn(intent, state, ctx, name);
    const worldChanges = learned ? [`learned ${skill.name}`] : [];

    const effect = stringProp(skill.properties, "effect") ?? "status";
    const cost = Math.max(0, numberProp(skill.properties, "mpCost", 1));
    if (state.player.mp < cost) {
      return { ...failed(`use ${skill.name}`, "not enough mana", { cost, mp: state.player.mp }), worldChanges };
    }

    const target = effect === "damage" ? this.skillTarget(intent, state) : undefined;
    if (effect === "damage" && !target) {
      return { ...failed(`use ${skill.name}`, "no target for skill"), worldChanges };
    }

    if (cost > 0) ctx.tx.addChange({ target: "player", action: "modify", property: "mp", value: -cost });

    const check = ctx.dice.check(playerModifier(state, "int"), SKILL_DC, skill.name);
    if (!check.success) {
      return { ...failed(`use ${skill.name}`, "skill failed", { roll: check.roll.total, dc: SKILL_DC }), worldChanges };
    }

    if (effect === "heal") {
      const healed = healPlayer(state, ctx, rollAmount(ctx, skill.properties, "power", skill.name));
      return { success: true, actionTaken: `use ${skill.name} and heal ${healed} hp`, worldChanges, details: { healed } };
    }

    if (effect === "damage" && target) {
      const hit = damageNpc(ctx, target, rollAmount(ctx, skill.properties, "power", skill.name));
      return {
        success: true,
        actionTaken: `use ${skill.name} on ${target.name} for ${hit.damage} damage`,
        worldChanges: [...worldChanges, ...hit.worldChanges],
        details: { target: target.id, damage: hit.damage, defeated: hit.defeated },
      };
    }

    const status = normalizeName(stringProp(skill.properties, "status") ?? skill.name);
    ensureStatusConcept(ctx, status, `Granted by ${skill.name}.`);
    const turns = numberProp(skill.properties, "turns", DEFAULT_STATUS_TURNS);
    ctx.tx.addChange({ target: "player", action: "add", property: "statusEffects", value: { name: status, turns } });

    return { success: true, actionTaken: `use ${skill.name} and gain ${status}`, worldChanges, details: { status, turns } };
  }

  description(): string {
    return "Use a skill or spell, learning it on first use.";
  }
}
