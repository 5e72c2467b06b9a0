// rulecore/functions/FunctionRegistry.ts
//
// Catalog of game functions. Lookup is by category or keyword overlap with
// the intent text; ordering is priority desc, then registration sequence.
// The registry never reads or writes GameState.

import { loadRulecoreConfig } from "../config/config";
import { DuplicateRegistrationError } from "../errors/EngineErrors";
import type { Intent } from "../engine/EngineTypes";
import { Logger } from "../utils/logger";
import type { FunctionMetadata, FunctionRegistration, GameFunction } from "./FunctionTypes";

const log = Logger.scope("REGISTRY");

interface Entry {
  fn: GameFunction;
  meta: FunctionMetadata;
}

export interface FunctionRegistryOptions {
  defaultPriority?: number;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((t) => t.length > 0);
}

function compareEntries(a: Entry, b: Entry): number {
  if (a.meta.priority !== b.meta.priority) return b.meta.priority - a.meta.priority;
  if (a.meta.sequence !== b.meta.sequence) return a.meta.sequence - b.meta.sequence;
  return a.meta.name < b.meta.name ? -1 : a.meta.name > b.meta.name ? 1 : 0;
}

export class FunctionRegistry {
  private readonly entries = new Map<string, Entry>();
  private nextSequence = 0;
  private readonly defaultPriority: number;

  constructor(opts: FunctionRegistryOptions = {}) {
    this.defaultPriority = opts.defaultPriority ?? loadRulecoreConfig().defaultPriority;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Add a function. Throws DuplicateRegistrationError if the name or the
   * same instance is already registered.
   */
  register(fn: GameFunction, registration: FunctionRegistration): FunctionMetadata {
    this.assertNotRegistered(fn);

    const meta: FunctionMetadata = {
      name: fn.name,
      category: registration.category.trim().toLowerCase(),
      keywords: new Set([...(registration.keywords ?? [])].map((k) => k.trim().toLowerCase()).filter(Boolean)),
      priority: registration.priority ?? fn.priority?.() ?? this.defaultPriority,
      sequence: this.nextSequence++,
    };
    this.entries.set(fn.name, { fn, meta });

    log.debug("registered", { name: meta.name, category: meta.category, priority: meta.priority });
    return meta;
  }

  /** No-op for unknown names. */
  unregister(name: string): boolean {
    const removed = this.entries.delete(name);
    if (removed) log.debug("unregistered", { name });
    return removed;
  }

  /**
   * Candidates for an intent: category match (case-insensitive) or any
   * keyword found among the action/target tokens.
   */
  query(intent: Pick<Intent, "category" | "action" | "target">): GameFunction[] {
    const category = intent.category.trim().toLowerCase();
    const tokens = new Set([...tokenize(intent.action), ...tokenize(intent.target)]);

    const hits: Entry[] = [];
    for (const entry of this.entries.values()) {
      if (entry.meta.category === category || [...entry.meta.keywords].some((k) => tokens.has(k))) {
        hits.push(entry);
      }
    }
    return hits.sort(compareEntries).map((e) => e.fn);
  }

  categories(): Set<string> {
    return new Set([...this.entries.values()].map((e) => e.meta.category));
  }

  get(name: string): GameFunction | undefined {
    return this.entries.get(name)?.fn;
  }

  metadataOf(name: string): FunctionMetadata | undefined {
    return this.entries.get(name)?.meta;
  }

  /** All functions in query order. */
  list(): GameFunction[] {
    return [...this.entries.values()].sort(compareEntries).map((e) => e.fn);
  }

  /**
   * Merge another registry into this one. Its entries keep their relative
   * order and are sequenced after everything already here. All-or-nothing:
   * any name clash throws before anything is added.
   */
  absorb(other: FunctionRegistry): void {
    const incoming = [...other.entries.values()].sort((a, b) => a.meta.sequence - b.meta.sequence);
    for (const { fn } of incoming) this.assertNotRegistered(fn);

    for (const { fn, meta } of incoming) {
      this.entries.set(fn.name, { fn, meta: { ...meta, sequence: this.nextSequence++ } });
    }
    log.info("absorbed registry", { added: incoming.length, total: this.entries.size });
  }

  private assertNotRegistered(fn: GameFunction): void {
    if (this.entries.has(fn.name)) throw new DuplicateRegistrationError(fn.name);
    for (const entry of this.entries.values()) {
      if (entry.fn === fn) throw new DuplicateRegistrationError(fn.name);
    }
  }
}
