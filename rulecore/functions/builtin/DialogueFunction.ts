// rulecore/functions/builtin/DialogueFunction.ts

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { findNpcHere, stringProp } from "../WorldQueries";
import { failed } from "./BuiltinHelpers";

export class DialogueFunction implements GameFunction {
  readonly name = "dialogue";

  canExecute(intent: Intent, state: GameState): boolean {
    const npc = findNpcHere(state, intent.target);
    return npc !== undefined && npc.hp > 0;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const npc = findNpcHere(state, intent.target);
    if (!npc || npc.hp <= 0) return failed("talk", "nobody to talk to");

    if (npc.disposition === "hostile") {
      return failed(`talk to ${npc.name}`, `${npc.name} refuses to talk`);
    }

    const flag = `met_${npc.id}`;
    const firstMeeting = state.world.flags[flag] !== true;
    if (firstMeeting) {
      ctx.tx.addChange({ target: "world", action: "set", property: `flags.${flag}`, value: true });
    }

    const greeting = stringProp(npc.properties, "greeting") ?? `${npc.name} nods at you.`;
    const topic = stringProp(intent.parameters, "topic");

    return {
      success: true,
      actionTaken: `talk to ${npc.name}`,
      worldChanges: firstMeeting ? [`met ${npc.name}`] : [],
      details: topic
        ? { npc: npc.id, greeting, firstMeeting, topic }
        : { npc: npc.id, greeting, firstMeeting },
    };
  }

  description(): string {
    return "Talk to someone at your location.";
  }
}
