// rulecore/functions/builtin/RestFunction.ts

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { hostilesHere, playerModifier } from "../WorldQueries";
import { failed, healPlayer, restoreMana } from "./BuiltinHelpers";

export class RestFunction implements GameFunction {
  readonly name = "rest";

  canExecute(_intent: Intent, _state: GameState): boolean {
    return true;
  }

  execute(_intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const threats = hostilesHere(state);
    if (threats.length) {
      return failed("rest", "cannot rest with enemies nearby", { hostiles: threats.map((n) => n.id) });
    }

    const hpRoll = ctx.dice.roll("1d8", { label: "rest hp", extraModifier: playerModifier(state, "con") });
    const mpRoll = ctx.dice.roll("1d6", { label: "rest mp" });

    const hp = healPlayer(state, ctx, hpRoll.total);
    const mp = restoreMana(state, ctx, mpRoll.total);

    return { success: true, actionTaken: `rest and recover ${hp} hp and ${mp} mp`, details: { hp, mp } };
  }

  description(): string {
    return "Rest to recover health and mana when no enemies are around.";
  }
}
