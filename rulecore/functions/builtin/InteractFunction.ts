// rulecore/functions/builtin/InteractFunction.ts

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { normalizeName } from "../WorldQueries";
import { failed } from "./BuiltinHelpers";

export const INTERACT_DC = 12;

/** Generic "do something to an object" check. Success leaves a world flag behind. */
export class InteractFunction implements GameFunction {
  readonly name = "interact";

  canExecute(intent: Intent, _state: GameState): boolean {
    return normalizeName(intent.target).length > 0;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const object = normalizeName(intent.target);
    const verb = intent.action.trim() || "interact with";
    const check = ctx.dice.check(0, INTERACT_DC, "interact");

    if (!check.success) {
      return failed(`${verb} ${intent.target}`, `could not ${verb} ${intent.target}`, { roll: check.roll.total, dc: INTERACT_DC });
    }

    const flag = `interacted_${state.player.location}_${object}`;
    ctx.tx.addChange({ target: "world", action: "set", property: `flags.${flag}`, value: true });

    return { success: true, actionTaken: `${verb} ${intent.target}`, details: { flag } };
  }

  description(): string {
    return "Interact with an object in the world.";
  }
}
