// rulecore/functions/builtin/UseItemFunction.ts
//
// Consume one item from the inventory. Only item concepts flagged
// `consumable` can be used; `heal`, `mana` and `status` describe the effect.

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { findInventoryItem, normalizeName, numberProp, stringProp } from "../WorldQueries";
import { ensureStatusConcept, failed, healPlayer, restoreMana, rollAmount } from "./BuiltinHelpers";

function wantedItem(intent: Intent): string {
  return stringProp(intent.parameters, "item") ?? intent.target;
}

export class UseItemFunction implements GameFunction {
  readonly name = "use_item";

  canExecute(intent: Intent, state: GameState): boolean {
    return findInventoryItem(state.player.inventory, wantedItem(intent)) !== undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const item = findInventoryItem(state.player.inventory, wantedItem(intent));
    if (!item) return failed("use item", "you do not have that");

    const concept = state.concepts.get(item, "item");
    if (!concept || concept.properties["consumable"] !== true) {
      return failed(`use ${item}`, `${item} cannot be used`);
    }

    const healed = healPlayer(state, ctx, rollAmount(ctx, concept.properties, "heal", `${item} heal`));
    const restored = restoreMana(state, ctx, rollAmount(ctx, concept.properties, "mana", `${item} mana`));

    const status = stringProp(concept.properties, "status");
    const effects: string[] = [];
    if (healed > 0) effects.push(`${healed} hp`);
    if (restored > 0) effects.push(`${restored} mp`);
    if (status) {
      const name = normalizeName(status);
      ensureStatusConcept(ctx, name, `Caused by ${item}.`);
      const turns = numberProp(concept.properties, "turns", 3);
      ctx.tx.addChange({ target: "player", action: "add", property: "statusEffects", value: { name, turns } });
      effects.push(name);
    }

    ctx.tx.addChange({ target: "player", action: "remove", property: "inventory", value: { item, quantity: 1 } });

    return {
      success: true,
      actionTaken: effects.length ? `use ${item} (${effects.join(", ")})` : `use ${item}`,
      details: { item, healed, restored },
    };
  }

  priority(): number {
    return 6;
  }

  description(): string {
    return "Use a consumable item from your inventory.";
  }
}
