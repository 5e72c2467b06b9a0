// rulecore/functions/builtin/EquipFunction.ts

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import { EQUIPMENT_SLOTS, type EquipmentSlot } from "../../state/StateTypes";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import { findInventoryItem, numberProp, stringProp } from "../WorldQueries";
import { failed } from "./BuiltinHelpers";

function asSlot(value: string | undefined): EquipmentSlot | undefined {
  return EQUIPMENT_SLOTS.find((s) => s === value);
}

/** Equip an item into the slot its concept names, swapping any AC bonus. */
export class EquipFunction implements GameFunction {
  readonly name = "equip";

  canExecute(intent: Intent, state: GameState): boolean {
    return findInventoryItem(state.player.inventory, stringProp(intent.parameters, "item") ?? intent.target) !== undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const item = findInventoryItem(state.player.inventory, stringProp(intent.parameters, "item") ?? intent.target);
    if (!item) return failed("equip", "you do not have that");

    const concept = state.concepts.get(item, "item");
    const slot = concept ? asSlot(stringProp(concept.properties, "slot")) : undefined;
    if (!concept || !slot) return failed(`equip ${item}`, `${item} cannot be equipped`);

    const previous = state.player.equipment[slot];
    if (previous === item) return failed(`equip ${item}`, `${item} is already equipped`);

    const previousConcept = previous ? state.concepts.get(previous, "item") : undefined;
    const acDelta =
      numberProp(concept.properties, "acBonus", 0) - (previousConcept ? numberProp(previousConcept.properties, "acBonus", 0) : 0);

    ctx.tx.addChange({ target: "player", action: "set", property: `equipment.${slot}`, value: item });
    if (acDelta !== 0) ctx.tx.addChange({ target: "player", action: "modify", property: "ac", value: acDelta });

    return {
      success: true,
      actionTaken: previous ? `equip ${item} in place of ${previous}` : `equip ${item}`,
      details: { item, slot, acDelta },
    };
  }

  description(): string {
    return "Equip a weapon, armor, shield or accessory you carry.";
  }
}
