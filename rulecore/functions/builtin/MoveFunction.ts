// rulecore/functions/builtin/MoveFunction.ts

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { currentLocation, resolveLocation, stringProp, type LocationView } from "../WorldQueries";
import { failed } from "./BuiltinHelpers";

export class MoveFunction implements GameFunction {
  readonly name = "move";

  private destination(intent: Intent, state: GameState): LocationView | undefined {
    return resolveLocation(state, stringProp(intent.parameters, "destination") ?? intent.target);
  }

  canExecute(intent: Intent, state: GameState): boolean {
    return this.destination(intent, state) !== undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const to = this.destination(intent, state);
    if (!to) return failed("move", "unknown destination");

    const from = currentLocation(state);
    if (from && from.id === to.id) return failed(`go to ${to.name}`, `already at ${to.name}`);
    if (!from || !from.connections.includes(to.id)) {
      return failed(`go to ${to.name}`, `no path to ${to.name}`);
    }

    ctx.tx.addChange({ target: "player", action: "set", property: "location", value: to.id });
    ctx.tx.addChange({ target: "world", action: "set", property: "currentLocation", value: to.id });

    return {
      success: true,
      actionTaken: `go to ${to.name}`,
      worldChanges: [`moved from ${from.name} to ${to.name}`],
      details: { from: from.id, to: to.id, description: to.description },
    };
  }

  description(): string {
    return "Travel to a connected location.";
  }
}
