// rulecore/session/KeywordIntentClassifier.ts
//
// Deterministic classifier for tests and offline play: the first word that
// names a known verb picks the category, the remaining words are the target.

import type { Intent, IntentType } from "../engine/EngineTypes";
import { tokenize } from "../functions/FunctionRegistry";
import type { GameState } from "../state/GameState";
import type { IntentClassifier } from "./SessionTypes";

interface VerbRule {
  category: string;
  type: IntentType;
}

const VERBS: Record<string, VerbRule> = {
  attack: { category: "attack", type: "Execute" },
  hit: { category: "attack", type: "Execute" },
  strike: { category: "attack", type: "Execute" },
  fight: { category: "attack", type: "Execute" },
  search: { category: "search", type: "Explore" },
  explore: { category: "explore", type: "Imagine" },
  wander: { category: "explore", type: "Imagine" },
  talk: { category: "dialogue", type: "Execute" },
  speak: { category: "dialogue", type: "Execute" },
  greet: { category: "dialogue", type: "Execute" },
  buy: { category: "trade", type: "Execute" },
  sell: { category: "trade", type: "Execute" },
  trade: { category: "trade", type: "Execute" },
  status: { category: "status", type: "Query" },
  stats: { category: "status", type: "Query" },
  inventory: { category: "status", type: "Query" },
  rest: { category: "rest", type: "Execute" },
  sleep: { category: "rest", type: "Execute" },
  go: { category: "move", type: "Execute" },
  walk: { category: "move", type: "Execute" },
  travel: { category: "move", type: "Execute" },
  open: { category: "interact", type: "Execute" },
  pull: { category: "interact", type: "Execute" },
  push: { category: "interact", type: "Execute" },
  cast: { category: "skill", type: "Execute" },
  use: { category: "use_item", type: "Execute" },
  drink: { category: "use_item", type: "Execute" },
  eat: { category: "use_item", type: "Execute" },
  equip: { category: "equip", type: "Execute" },
  wield: { category: "equip", type: "Execute" },
  wear: { category: "equip", type: "Execute" },
};

const FILLER = new Set(["the", "a", "an", "to", "at", "with", "on", "into", "for", "my", "some"]);

export class KeywordIntentClassifier implements IntentClassifier {
  classify(text: string, _state: GameState): Promise<unknown> {
    return Promise.resolve(this.classifySync(text));
  }

  classifySync(text: string): Intent {
    const tokens = tokenize(text);
    const verbAt = tokens.findIndex((t) => Object.prototype.hasOwnProperty.call(VERBS, t));
    const rule = verbAt === -1 ? undefined : VERBS[tokens[verbAt] ?? ""];
    const rest = (verbAt === -1 ? tokens : tokens.slice(verbAt + 1)).filter((t) => !FILLER.has(t));

    if (!rule) {
      return {
        type: "Imagine",
        category: tokens[0] ?? "unknown",
        action: text.trim(),
        target: rest.slice(1).join(" "),
        parameters: {},
        confidence: 0.3,
      };
    }

    return {
      type: rule.type,
      category: rule.category,
      action: text.trim(),
      target: rest.join(" "),
      parameters: {},
      confidence: 0.9,
    };
  }
}
