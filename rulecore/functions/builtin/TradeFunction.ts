// rulecore/functions/builtin/TradeFunction.ts
//
// Buy from / sell to a merchant at the player's location. Prices come from
// the item concept's `value`; merchants buy back at half price.

import type { Intent } from "../../engine/EngineTypes";
import type { GameState } from "../../state/GameState";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../FunctionTypes";
import {
  findInventoryItem,
  findNpcHere,
  livingNpcsHere,
  numberProp,
  stringProp,
  type NpcView,
} from "../WorldQueries";
import { failed } from "./BuiltinHelpers";
import { tokenize } from "../FunctionRegistry";

type TradeMode = "buy" | "sell" | "browse";

function tradeMode(intent: Intent): TradeMode {
  const explicit = stringProp(intent.parameters, "mode");
  if (explicit === "buy" || explicit === "sell" || explicit === "browse") return explicit;

  const tokens = tokenize(intent.action);
  if (tokens.includes("sell")) return "sell";
  if (tokens.includes("buy") || tokens.includes("purchase")) return "buy";
  return "browse";
}

export class TradeFunction implements GameFunction {
  readonly name = "trade";

  private merchant(intent: Intent, state: GameState): NpcView | undefined {
    const named = findNpcHere(state, intent.target);
    if (named && named.disposition === "merchant" && named.hp > 0) return named;
    return livingNpcsHere(state).find((n) => n.disposition === "merchant");
  }

  private itemName(intent: Intent, merchant: NpcView): string {
    const param = stringProp(intent.parameters, "item");
    if (param) return param;

    // A target naming the merchant is not an item.
    const t = intent.target.trim().toLowerCase();
    if (!t || merchant.id.toLowerCase() === t || merchant.name.toLowerCase().includes(t)) return "";
    return intent.target;
  }

  canExecute(intent: Intent, state: GameState): boolean {
    return this.merchant(intent, state) !== undefined;
  }

  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome {
    const merchant = this.merchant(intent, state);
    if (!merchant) return failed("trade", "no merchant here");

    const mode = tradeMode(intent);
    const wanted = this.itemName(intent, merchant);

    if (mode === "browse" || !wanted) {
      const wares: Record<string, number> = {};
      for (const item of Object.keys(merchant.inventory).sort()) {
        wares[item] = this.price(state, item);
      }
      return { success: true, actionTaken: `browse ${merchant.name}'s wares`, details: { merchant: merchant.id, wares } };
    }

    return mode === "buy" ? this.buy(state, ctx, merchant, wanted) : this.sell(state, ctx, merchant, wanted);
  }

  private price(state: GameState, item: string): number {
    const concept = state.concepts.get(item, "item");
    return concept ? numberProp(concept.properties, "value", 1) : 1;
  }

  private buy(state: GameState, ctx: ExecutionContext, merchant: NpcView, wanted: string): FunctionOutcome {
    const item = findInventoryItem(merchant.inventory, wanted);
    if (!item) return failed(`buy ${wanted}`, `${merchant.name} does not sell ${wanted}`);

    const price = this.price(state, item);
    if (state.player.gold < price) {
      return failed(`buy ${item}`, "not enough gold", { price, gold: state.player.gold });
    }

    ctx.tx.addChange({ target: "player", action: "modify", property: "gold", value: -price });
    ctx.tx.addChange({ target: `npc:${merchant.id}`, action: "remove", property: "inventory", value: { item, quantity: 1 } });
    ctx.tx.addChange({ target: "player", action: "add", property: "inventory", value: { item, quantity: 1 } });

    return { success: true, actionTaken: `buy ${item} for ${price} gold`, details: { item, price } };
  }

  private sell(state: GameState, ctx: ExecutionContext, merchant: NpcView, wanted: string): FunctionOutcome {
    const item = findInventoryItem(state.player.inventory, wanted);
    if (!item) return failed(`sell ${wanted}`, `you do not have ${wanted}`);

    const held = state.player.inventory[item] ?? 0;
    const equipped = Object.values(state.player.equipment).filter((e) => e === item).length;
    if (held <= equipped) return failed(`sell ${item}`, `${item} is equipped`);

    const price = Math.floor(this.price(state, item) / 2);
    if (price > 0) ctx.tx.addChange({ target: "player", action: "modify", property: "gold", value: price });
    ctx.tx.addChange({ target: "player", action: "remove", property: "inventory", value: { item, quantity: 1 } });
    ctx.tx.addChange({ target: `npc:${merchant.id}`, action: "add", property: "inventory", value: { item, quantity: 1 } });

    return { success: true, actionTaken: `sell ${item} for ${price} gold`, details: { item, price } };
  }

  description(): string {
    return "Buy from or sell to a merchant.";
  }
}
