// rulecore/functions/builtin/SearchFunction.ts
//
// Search the current location: d20 + WIS against the location's searchDc.
// A success picks up the first item lying there; with nothing lying around
// the player discovers something new (named by the intent, or invented by
// the content generator). Discovered items are get-or-create concepts, so
// searching twice never produces two concepts with the same name.

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { currentLocation, normalizeName, numberProp, playerModifier, stringProp } from "../WorldQueries";
import { failed } from "./BuiltinHelpers";

export const DEFAULT_SEARCH_DC = 10;

export class SearchFunction implements GameFunction {
  readonly name = "search";

  canExecute(_intent: Intent, state: GameState): boolean {
    return currentLocation(state) !== undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const location = currentLocation(state);
    if (!location) return failed("search", "nowhere to search");

    const dc = numberProp(location.properties, "searchDc", DEFAULT_SEARCH_DC);
    const check = ctx.dice.check(playerModifier(state, "wis"), dc, "search");
    if (!check.success) {
      return failed(`search ${location.name}`, "found nothing", { roll: check.roll.total, dc });
    }

    const lying = Object.keys(location.items).sort()[0];
    if (lying) {
      ctx.tx.addChange({ target: "world", action: "remove", property: `items.${location.id}`, value: { item: lying, quantity: 1 } });
      ctx.tx.addChange({ target: "player", action: "add", property: "inventory", value: { item: lying, quantity: 1 } });
      return { success: true, actionTaken: `search ${location.name} and find ${lying}`, details: { item: lying } };
    }

    const requested = stringProp(intent.parameters, "discovery");
    const generated = ctx.content?.generate({
      type: "item",
      hint: requested ? normalizeName(requested) : "",
      locationId: location.id,
      action: intent.action,
    });

    const name = generated?.name ? normalizeName(generated.name) : requested ? normalizeName(requested) : "";
    if (!name) {
      return failed(`search ${location.name}`, "found nothing", { roll: check.roll.total, dc });
    }

    const { concept, created } = ctx.tx.concepts.getOrCreate({
      type: "item",
      name,
      description: generated?.description ?? `Something found while searching ${location.name}.`,
      properties: generated?.properties ?? {},
    });
    ctx.tx.addChange({ target: "player", action: "add", property: "inventory", value: { item: concept.name, quantity: 1 } });

    return {
      success: true,
      actionTaken: `search ${location.name} and find ${concept.name}`,
      worldChanges: created ? [`discovered ${concept.name}`] : [],
      details: { item: concept.name, discovered: created },
    };
  }

  description(): string {
    return "Search your surroundings for items.";
  }
}
