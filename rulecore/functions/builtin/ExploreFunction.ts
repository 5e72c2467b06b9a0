// rulecore/functions/builtin/ExploreFunction.ts
//
// Grow the world from where the player stands. By default this uncovers a
// location next to the current one: a new place is added together with the
// path to it and its "location" concept, all in the turn's transaction. A
// place that already exists but was not reachable gets connected instead.
// With parameters.kind = "npc" someone new shows up here.
//
// The content generator names what is found, taking the intent target as a
// hint. Without a generator the target alone names it; with neither there is
// nothing to find.

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import { NPC_DISPOSITIONS, type NpcDisposition } from "../../state/StateTypes";
import { ownValue, type JsonObject } from "../../utils/types";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { currentLocation, normalizeName, numberProp, stringProp, type LocationView } from "../WorldQueries";
import { failed } from "./BuiltinHelpers";

const DEFAULT_NPC_HP = 8;
const DEFAULT_NPC_AC = 10;

// Generated npc properties that become NpcState fields rather than properties.
const NPC_FIELDS = new Set(["disposition", "hp", "ac"]);

/** "hidden_glade" -> "Hidden Glade" */
export function displayName(id: string): string {
  return id
    .split("_")
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

function dispositionOf(props: JsonObject): NpcDisposition {
  const raw = props["disposition"];
  return NPC_DISPOSITIONS.find((d) => d === raw) ?? "neutral";
}

export class ExploreFunction implements GameFunction {
  readonly name = "explore";

  canExecute(_intent: Intent, state: GameState): boolean {
    return currentLocation(state) !== undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const here = currentLocation(state);
    if (!here) return failed("explore", "nowhere to explore");

    return stringProp(intent.parameters, "kind") === "npc"
      ? this.meetSomeone(intent, state, ctx, here)
      : this.uncoverLocation(intent, state, ctx, here);
  }

  private uncoverLocation(intent: Intent, state: GameState, ctx: ExecutionContext, here: LocationView): FunctionOutcome {
    const hint = normalizeName(intent.target);
    const generated = ctx.content?.generate({ type: "location", hint, locationId: here.id, action: intent.action });
    const id = generated ? normalizeName(generated.name) : hint;
    if (!id) return failed(`explore ${here.name}`, "nothing new to find");

    const known = ownValue(state.world.locations, id);
    if (known) {
      if (known.id === here.id || here.connections.includes(known.id)) {
        return failed(`explore ${here.name}`, "nothing new to find");
      }
      ctx.tx.addChange({ target: "world", action: "add", property: `connections.${here.id}`, value: known.id });
      ctx.tx.addChange({ target: "world", action: "add", property: `connections.${known.id}`, value: here.id });
      return {
        success: true,
        actionTaken: `explore ${here.name} and find a path to ${known.name}`,
        worldChanges: [`found a path to ${known.name}`],
        details: { location: known.id, discovered: false },
      };
    }

    const name = displayName(id);
    const description = generated?.description ?? `Uncharted ground beyond ${here.name}.`;
    const properties = generated?.properties ?? {};

    ctx.tx.concepts.getOrCreate({ type: "location", name: id, description, properties });
    ctx.tx.addChange({
      target: "world",
      action: "add",
      property: "locations",
      value: { id, name, description, connections: [here.id], items: {}, properties },
    });
    ctx.tx.addChange({ target: "world", action: "add", property: `connections.${here.id}`, value: id });

    return {
      success: true,
      actionTaken: `explore ${here.name} and discover ${name}`,
      worldChanges: [`discovered ${name}`],
      details: { location: id, discovered: true },
    };
  }

  private meetSomeone(intent: Intent, state: GameState, ctx: ExecutionContext, here: LocationView): FunctionOutcome {
    const hint = normalizeName(intent.target);
    const generated = ctx.content?.generate({ type: "npc", hint, locationId: here.id, action: intent.action });
    const base = generated ? normalizeName(generated.name) : hint;
    if (!base) return failed(`explore ${here.name}`, "nobody around");

    let id = base;
    for (let n = 2; ownValue(state.world.npcs, id); n++) id = `${base}_${n}`;

    const props = generated?.properties ?? {};
    const hp = Math.max(1, Math.floor(numberProp(props, "hp", DEFAULT_NPC_HP)));
    const properties: JsonObject = Object.fromEntries(Object.entries(props).filter(([k]) => !NPC_FIELDS.has(k)));
    if (generated?.description) properties["description"] = generated.description;

    const name = displayName(base);
    const disposition = dispositionOf(props);
    const ac = Math.max(0, Math.floor(numberProp(props, "ac", DEFAULT_NPC_AC)));
    ctx.tx.addChange({
      target: "world",
      action: "add",
      property: "npcs",
      value: { id, name, disposition, hp, maxHp: hp, ac, location: here.id, inventory: {}, statusEffects: [], properties },
    });

    return {
      success: true,
      actionTaken: `explore ${here.name} and meet ${name}`,
      worldChanges: [`${name} appears`],
      details: { npc: id, disposition },
    };
  }

  description(): string {
    return "Venture beyond the known paths: uncover a new place or meet someone new.";
  }
}
