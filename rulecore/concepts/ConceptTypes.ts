// rulecore/concepts/ConceptTypes.ts

import type { JsonObject } from "../utils/types";

export const CONCEPT_TYPES = ["item", "skill", "status", "location", "rule"] as const;

export type ConceptType = (typeof CONCEPT_TYPES)[number];

/**
 * A runtime-discovered entity tracked by name. Names are unique per type;
 * world entities refer to concepts by name, never by object reference.
 */
export interface Concept {
  type: ConceptType;
  name: string;
  description: string;
  properties: JsonObject;
  createdTurn: number;
}

export interface NewConceptInput {
  type: ConceptType;
  name: string;
  description: string;
  properties?: JsonObject;
}

export interface CreateConceptOptions {
  /** Return the existing concept instead of failing on a duplicate name. */
  reuseExisting?: boolean;
}

export type ConceptEventKind = "created" | "updated" | "deleted";

export interface ConceptEvent {
  kind: ConceptEventKind;
  concept: Concept;
}

export type ConceptListener = (concept: Concept) => void;

/** Read side handed to game functions through GameState. */
export interface ReadonlyConceptRegistry {
  get(name: string, type?: ConceptType): Concept | undefined;
  has(name: string, type?: ConceptType): boolean;
  byType(type: ConceptType): Concept[];
  search(query: string): Concept[];
  list(): Concept[];
  readonly size: number;
}

export function isConceptType(value: string): value is ConceptType {
  return CONCEPT_TYPES.some((t) => t === value);
}
