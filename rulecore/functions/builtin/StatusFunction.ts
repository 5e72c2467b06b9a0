// rulecore/functions/builtin/StatusFunction.ts

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import type { JsonObject } from "../../utils/types";

/** Read-only character sheet. Changes nothing but still takes a turn. */
export class StatusFunction implements GameFunction {
  readonly name = "status";

  canExecute(_intent: Intent, _state: GameState): boolean {
    return true;
  }

  execute(_intent: Intent, state: GameState, _ctx: ExecutionContext): FunctionOutcome {
    const p = state.player;

    const statusEffects = p.statusEffects.map((e) => ({
      name: e.name,
      remainingTurns: e.remainingTurns,
      stacks: e.stacks,
    }));
    const inventory: JsonObject = { ...p.inventory };
    const equipment: JsonObject = { ...p.equipment };

    return {
      success: true,
      actionTaken: "check status",
      details: {
        name: p.name,
        hp: p.hp,
        maxHp: p.maxHp,
        mp: p.mp,
        maxMp: p.maxMp,
        ac: p.ac,
        level: p.level,
        xp: p.xp,
        gold: p.gold,
        location: p.location,
        attributes: { ...p.attributes },
        statusEffects,
        inventory,
        equipment,
        clock: { ...state.world.clock },
      },
    };
  }

  description(): string {
    return "Show your health, resources, inventory and equipment.";
  }
}
