// rulecore/functions/builtin/index.ts

import type { FunctionRegistry } from "../FunctionRegistry";
import type { FunctionMetadata, FunctionRegistration, GameFunction } from "../FunctionTypes";
import { AttackFunction } from "./AttackFunction";
import { DialogueFunction } from "./DialogueFunction";
import { EquipFunction } from "./EquipFunction";
import { ExploreFunction } from "./ExploreFunction";
import { InteractFunction } from "./InteractFunction";
import { MoveFunction } from "./MoveFunction";
import { RestFunction } from "./RestFunction";
import { SearchFunction } from "./SearchFunction";
import { SkillFunction } from "./SkillFunction";
import { StatusFunction } from "./StatusFunction";
import { TradeFunction } from "./TradeFunction";
import { UseItemFunction } from "./UseItemFunction";

export {
  AttackFunction,
  DialogueFunction,
  EquipFunction,
  ExploreFunction,
  InteractFunction,
  MoveFunction,
  RestFunction,
  SearchFunction,
  SkillFunction,
  StatusFunction,
  TradeFunction,
  UseItemFunction,
};

const starterFunctions = (): Array<[GameFunction, FunctionRegistration]> => [
  [new AttackFunction(), { category: "attack", keywords: ["attack", "hit", "strike", "fight", "kill", "stab", "slash"] }],
  [new SearchFunction(), { category: "search", keywords: ["search", "investigate", "scavenge"] }],
  [new DialogueFunction(), { category: "dialogue", keywords: ["talk", "speak", "ask", "greet", "chat"] }],
  [new TradeFunction(), { category: "trade", keywords: ["trade", "buy", "sell", "shop", "browse", "purchase"] }],
  [new StatusFunction(), { category: "status", keywords: ["status", "stats", "health", "inventory"] }],
  [new RestFunction(), { category: "rest", keywords: ["rest", "sleep", "camp"] }],
  [new MoveFunction(), { category: "move", keywords: ["go", "move", "walk", "travel", "enter"] }],
  [new InteractFunction(), { category: "interact", keywords: ["open", "pull", "push", "touch", "interact"] }],
  [new SkillFunction(), { category: "skill", keywords: ["cast", "skill", "spell", "ability"] }],
  [new UseItemFunction(), { category: "use_item", keywords: ["use", "drink", "eat", "consume", "quaff"] }],
  [new EquipFunction(), { category: "equip", keywords: ["equip", "wield", "wear"] }],
  [new ExploreFunction(), { category: "explore", keywords: ["explore", "wander", "venture", "discover"] }],
];

/** Register the built-in mechanics. Fresh instances per call. */
export function registerStarterFunctions(registry: FunctionRegistry): FunctionMetadata[] {
  return starterFunctions().map(([fn, registration]) => registry.register(fn, registration));
}
