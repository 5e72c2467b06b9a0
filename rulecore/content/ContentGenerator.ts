// rulecore/content/ContentGenerator.ts
//
// Optional collaborator that fills in description/properties for concepts a
// function is about to create, and for NPCs that explore brings into the
// world. Synchronous; whatever it returns is stored as data and never
// interpreted by the engine itself.

import type { ConceptType } from "../concepts/ConceptTypes";
import type { JsonObject } from "../utils/types";

/** Concepts, plus NPCs, which live in the world rather than the registry. */
export type ContentKind = ConceptType | "npc";

export interface ContentRequest {
  type: ContentKind;
  // Requested name, or "" to let the generator pick one.
  hint: string;
  locationId: string;
  action: string;
}

export interface GeneratedContent {
  name: string;
  description: string;
  properties: JsonObject;
}

export interface ContentGenerator {
  generate(request: ContentRequest): GeneratedContent | null;
}

const DEFAULT_TEMPLATES: Record<ContentKind, GeneratedContent[]> = {
  item: [
    { name: "tarnished_ring", description: "A ring gone dark with age.", properties: { value: 8 } },
    { name: "healing_herb", description: "A bitter leaf that knits small wounds.", properties: { value: 3, consumable: true, heal: "1d4" } },
    { name: "old_map_fragment", description: "Half a map, the ink badly faded.", properties: { value: 2 } },
  ],
  skill: [
    { name: "focus", description: "A moment of perfect concentration.", properties: { mpCost: 1, effect: "status", status: "focused", turns: 3 } },
  ],
  status: [
    { name: "focused", description: "Thoughts sharp and clear.", properties: { bonus: 1 } },
  ],
  location: [
    { name: "hidden_glade", description: "A quiet clearing off the beaten path.", properties: {} },
    { name: "collapsed_watchtower", description: "Stones from an older war, half swallowed by ivy.", properties: { searchDc: 12 } },
  ],
  npc: [
    { name: "Wandering Peddler", description: "A stooped figure under a pack of oddments.", properties: { disposition: "merchant", hp: 8, ac: 10 } },
    { name: "Lost Scout", description: "Muddy and tired, but still alert.", properties: { disposition: "neutral", hp: 10, ac: 12 } },
  ],
  rule: [
    { name: "house_rule", description: "A rule agreed at the table.", properties: {} },
  ],
};

/** Guess a skill's mechanics from its name when nothing better is known. */
export function inferSkillProperties(name: string): JsonObject {
  const n = name.toLowerCase();
  if (/(heal|cure|mend)/.test(n)) return { mpCost: 2, effect: "heal", power: "1d8" };
  if (/(fire|bolt|strike|blast|shock)/.test(n)) return { mpCost: 2, effect: "damage", power: "1d8" };
  return { mpCost: 1, effect: "status", status: "inspired", turns: 3 };
}

/**
 * Deterministic stand-in for a model-backed generator. Named requests get a
 * templated description; unnamed ones cycle through a fixed table per type.
 */
export class TemplateContentGenerator implements ContentGenerator {
  private readonly cursor: Record<ContentKind, number> = { item: 0, skill: 0, status: 0, location: 0, rule: 0, npc: 0 };

  constructor(private readonly templates: Record<ContentKind, GeneratedContent[]> = DEFAULT_TEMPLATES) {}

  generate(request: ContentRequest): GeneratedContent | null {
    const hint = request.hint.trim();
    if (hint) {
      const spoken = hint.replace(/_/g, " ");
      return {
        name: hint,
        description: request.type === "npc" ? `Someone who goes by ${spoken}.` : `A ${request.type} known as ${spoken}.`,
        properties: request.type === "skill" ? inferSkillProperties(hint) : {},
      };
    }

    const pool = this.templates[request.type];
    if (!pool.length) return null;

    const picked = pool[this.cursor[request.type] % pool.length];
    this.cursor[request.type] += 1;
    return picked ? structuredClone(picked) : null;
  }
}
