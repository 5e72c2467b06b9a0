// rulecore/concepts/ConceptRegistry.ts
//
// Per-session concept table. One instance per GameState; there is no
// process-wide registry. Game code never calls the mutators directly: they
// run on a transaction's shadow copy and on the commit draft.

import { ConceptNotFoundError, DuplicateConceptError } from "../errors/EngineErrors";
import type { JsonObject } from "../utils/types";
import {
  CONCEPT_TYPES,
  type Concept,
  type ConceptType,
  type CreateConceptOptions,
  type NewConceptInput,
  type ReadonlyConceptRegistry,
} from "./ConceptTypes";

function keyOf(type: ConceptType, name: string): string {
  return `${type}:${name}`;
}

function copyConcept(c: Concept): Concept {
  return { ...c, properties: structuredClone(c.properties) };
}

export class ConceptRegistry implements ReadonlyConceptRegistry {
  private readonly concepts = new Map<string, Concept>();

  constructor(initial: Iterable<Concept> = []) {
    for (const c of initial) {
      this.insert(copyConcept(c));
    }
  }

  get size(): number {
    return this.concepts.size;
  }

  /**
   * Create a concept. A duplicate (type, name) pair fails with
   * DuplicateConceptError unless `reuseExisting` is set, in which case the
   * existing concept comes back untouched.
   */
  create(
    input: NewConceptInput,
    createdTurn: number,
    opts: CreateConceptOptions = {},
  ): { concept: Concept; created: boolean } {
    const name = input.name.trim();
    const existing = this.concepts.get(keyOf(input.type, name));
    if (existing) {
      if (opts.reuseExisting) return { concept: copyConcept(existing), created: false };
      throw new DuplicateConceptError(input.type, name);
    }

    const concept: Concept = {
      type: input.type,
      name,
      description: input.description,
      properties: structuredClone(input.properties ?? {}),
      createdTurn,
    };
    this.insert(concept);
    return { concept: copyConcept(concept), created: true };
  }

  /**
   * Lookup by name. Without a type the first match in CONCEPT_TYPES order wins
   * (item, skill, status, location, rule).
   */
  get(name: string, type?: ConceptType): Concept | undefined {
    const found = this.find(name, type);
    return found ? copyConcept(found) : undefined;
  }

  has(name: string, type?: ConceptType): boolean {
    return this.find(name, type) !== undefined;
  }

  /** Shallow-merge properties into an existing concept. */
  update(name: string, properties: JsonObject, type?: ConceptType): Concept {
    const found = this.find(name, type);
    if (!found) throw new ConceptNotFoundError(name, type);

    found.properties = { ...found.properties, ...structuredClone(properties) };
    return copyConcept(found);
  }

  /** Idempotent; returns the removed concept when there was one. */
  delete(name: string, type?: ConceptType): Concept | undefined {
    const found = this.find(name, type);
    if (!found) return undefined;
    this.concepts.delete(keyOf(found.type, found.name));
    return found;
  }

  byType(type: ConceptType): Concept[] {
    return this.list().filter((c) => c.type === type);
  }

  search(query: string): Concept[] {
    const q = query.trim().toLowerCase();
    if (!q) return [];
    return this.list().filter(
      (c) =>
        c.name.toLowerCase().includes(q) ||
        c.description.toLowerCase().includes(q) ||
        c.type === q,
    );
  }

  list(): Concept[] {
    return [...this.concepts.values()].map(copyConcept);
  }

  clone(): ConceptRegistry {
    return new ConceptRegistry(this.concepts.values());
  }

  private find(name: string, type?: ConceptType): Concept | undefined {
    const trimmed = name.trim();
    if (type) return this.concepts.get(keyOf(type, trimmed));

    for (const t of CONCEPT_TYPES) {
      const hit = this.concepts.get(keyOf(t, trimmed));
      if (hit) return hit;
    }
    return undefined;
  }

  private insert(concept: Concept): void {
    const key = keyOf(concept.type, concept.name);
    if (this.concepts.has(key)) {
      throw new DuplicateConceptError(concept.type, concept.name);
    }
    this.concepts.set(key, concept);
  }
}
