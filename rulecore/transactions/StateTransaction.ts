// rulecore/transactions/StateTransaction.ts
//
// Atomic batch of StateChanges against one GameState.
//
// - addChange() only buffers.
// - commit() clones live state into a draft, replays every buffered change on
//   it, runs the invariant pass, and installs the draft only when it is clean.
//   A failed commit leaves live state untouched and the transaction rolled back.
// - rollback() discards the buffer. Nothing was ever applied, so there is
//   nothing to undo.
//
// Concept work goes through `tx.concepts`, which keeps a shadow registry so a
// function sees the concepts it created earlier in the same transaction.

import { randomUUID } from "node:crypto";

import { ConceptRegistry } from "../concepts/ConceptRegistry";
import type {
  Concept,
  ConceptEvent,
  ConceptType,
  CreateConceptOptions,
  NewConceptInput,
} from "../concepts/ConceptTypes";
import {
  ConceptNotFoundError,
  EngineError,
  StateInvariantViolation,
  ValidationError,
  describeError,
} from "../errors/EngineErrors";
import {
  applyConceptChange,
  applyStateChange,
  describeChange,
  parseChangeTarget,
  type StateDraft,
} from "../state/StateChangeApplier";
import { collectViolations } from "../state/StateInvariants";
import type { StateChange } from "../state/StateTypes";
import { Logger } from "../utils/logger";
import type { JsonObject } from "../utils/types";

const log = Logger.scope("TX");

export type TransactionStatus = "open" | "committed" | "rolledBack";

/** What a GameState lends its transaction. Keeps install() off the public surface. */
export interface TransactionHost {
  readonly sessionId: string;
  readonly turn: number;
  createDraft(): StateDraft;
  shadowConcepts(): ConceptRegistry;
  install(draft: StateDraft, events: ConceptEvent[]): void;
  release(tx: StateTransaction): void;
}

export type CommitResult =
  | { ok: true; changes: StateChange[]; conceptEvents: ConceptEvent[] }
  | { ok: false; violations: string[] };

/** The buffer side of a transaction, as seen by its concept facade. */
interface ChangeRecorder {
  assertOpen(op: string): void;
  record(change: StateChange): void;
}

/**
 * Transactional facade over the session's concept registry. Mutations are
 * recorded as "concept:<type>" StateChanges and mirrored on a shadow copy.
 * Reads stay available after the transaction closes; mutations do not.
 */
export class TransactionConcepts {
  private shadow: ConceptRegistry | null = null;

  constructor(
    private readonly host: TransactionHost,
    private readonly recorder: ChangeRecorder,
  ) {}

  private registry(): ConceptRegistry {
    if (!this.shadow) this.shadow = this.host.shadowConcepts();
    return this.shadow;
  }

  get(name: string, type?: ConceptType): Concept | undefined {
    return this.registry().get(name, type);
  }

  has(name: string, type?: ConceptType): boolean {
    return this.registry().has(name, type);
  }

  /**
   * Create a concept in this transaction. Duplicate (type, name) throws
   * DuplicateConceptError unless `reuseExisting` is set.
   */
  create(input: NewConceptInput, opts: CreateConceptOptions = {}): { concept: Concept; created: boolean } {
    this.recorder.assertOpen("concepts.create");
    const result = this.registry().create(input, this.host.turn, opts);
    if (result.created) {
      this.recorder.record({
        target: `concept:${input.type}`,
        action: "add",
        property: result.concept.name,
        value: { description: result.concept.description, properties: result.concept.properties },
      });
    }
    return result;
  }

  /** Shorthand for create(..., { reuseExisting: true }). */
  getOrCreate(input: NewConceptInput): { concept: Concept; created: boolean } {
    return this.create(input, { reuseExisting: true });
  }

  update(name: string, properties: JsonObject, type?: ConceptType): Concept {
    this.recorder.assertOpen("concepts.update");
    const existing = this.registry().get(name, type);
    if (!existing) throw new ConceptNotFoundError(name, type);

    const updated = this.registry().update(name, properties, existing.type);
    this.recorder.record({
      target: `concept:${existing.type}`,
      action: "modify",
      property: existing.name,
      value: properties,
    });
    return updated;
  }

  /** Idempotent; returns true when something was removed. */
  delete(name: string, type?: ConceptType): boolean {
    this.recorder.assertOpen("concepts.delete");
    const removed = this.registry().delete(name, type);
    if (!removed) return false;

    this.recorder.record({ target: `concept:${removed.type}`, action: "remove", property: removed.name, value: null });
    return true;
  }

  /** Mirror a raw concept change (added through addChange) on the shadow. */
  mirror(type: ConceptType, change: StateChange): void {
    applyConceptChange(this.registry(), type, change, this.host.turn);
  }
}

export class StateTransaction {
  readonly id = randomUUID();
  readonly concepts: TransactionConcepts;

  private readonly changes: StateChange[] = [];
  private _status: TransactionStatus = "open";

  constructor(private readonly host: TransactionHost) {
    this.concepts = new TransactionConcepts(host, {
      assertOpen: (op) => this.assertOpen(op),
      record: (change) => this.changes.push({ ...change, value: structuredClone(change.value) }),
    });
  }

  get status(): TransactionStatus {
    return this._status;
  }

  get sessionId(): string {
    return this.host.sessionId;
  }

  /** Buffered changes in insertion order. */
  get pending(): readonly StateChange[] {
    return this.changes;
  }

  /**
   * Buffer one change. The target selector is checked now; everything else
   * is checked at commit.
   */
  addChange(change: StateChange): void {
    this.assertOpen("addChange");

    const target = parseChangeTarget(change.target);
    if (!target) {
      throw new ValidationError(`unknown change target "${change.target}"`);
    }

    const copy: StateChange = { ...change, value: structuredClone(change.value) };
    if (target.kind === "concept") {
      this.concepts.mirror(target.type, copy);
    }
    this.changes.push(copy);
  }

  addChanges(changes: Iterable<StateChange>): void {
    for (const change of changes) this.addChange(change);
  }

  commit(): CommitResult {
    this.assertOpen("commit");

    const draft = this.host.createDraft();
    const events: ConceptEvent[] = [];

    for (const change of this.changes) {
      try {
        const event = applyStateChange(draft, change, this.host.turn);
        if (event) events.push(event);
      } catch (err) {
        if (err instanceof StateInvariantViolation) return this.fail(err.violations);
        if (err instanceof EngineError) return this.fail([err.message]);
        // Anything else is still this change's fault; the draft is discarded.
        return this.fail([`cannot apply ${describeChange(change)}: ${describeError(err)}`]);
      }
    }

    const violations = collectViolations(draft);
    if (violations.length) {
      return this.fail(violations);
    }

    this._status = "committed";
    this.host.release(this);
    this.host.install(draft, events);

    log.debug("committed", { tx: this.id, changes: this.changes.length });
    return { ok: true, changes: [...this.changes], conceptEvents: events };
  }

  /** Like commit(), but a violation throws StateInvariantViolation. */
  commitOrThrow(): { changes: StateChange[]; conceptEvents: ConceptEvent[] } {
    const result = this.commit();
    if (!result.ok) throw new StateInvariantViolation(result.violations);
    return { changes: result.changes, conceptEvents: result.conceptEvents };
  }

  /** Discard buffered changes. No-op once rolled back; illegal once committed. */
  rollback(): void {
    if (this._status === "rolledBack") return;
    if (this._status === "committed") {
      throw new Error(`transaction ${this.id} is already committed`);
    }

    this._status = "rolledBack";
    this.changes.length = 0;
    this.host.release(this);
  }

  private fail(violations: string[]): CommitResult {
    log.warn("commit rejected", {
      tx: this.id,
      violations,
      changes: this.changes.map(describeChange),
    });
    this.rollback();
    return { ok: false, violations };
  }

  private assertOpen(op: string): void {
    if (this._status !== "open") {
      throw new Error(`${op} on ${this._status} transaction ${this.id}`);
    }
  }
}
