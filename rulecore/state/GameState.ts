// rulecore/state/GameState.ts
//
// Single unit of truth for one session: player, world, concept registry,
// event history and turn counter.
//
// Reads go through DeepReadonly views. Writes only happen by committing a
// StateTransaction (copy-on-commit: the transaction builds a draft, validates
// it, and installs it here as a whole) or through completeTurn(), which the
// engine calls after a commit to do end-of-turn bookkeeping.

import { randomUUID } from "node:crypto";

import { ConceptRegistry } from "../concepts/ConceptRegistry";
import type {
  ConceptEvent,
  ConceptEventKind,
  ConceptListener,
  ReadonlyConceptRegistry,
} from "../concepts/ConceptTypes";
import { loadRulecoreConfig } from "../config/config";
import { StateInvariantViolation, TransactionConflict, ValidationError } from "../errors/EngineErrors";
import { StateTransaction, type TransactionHost } from "../transactions/StateTransaction";
import { Logger } from "../utils/logger";
import type { DeepReadonly } from "../utils/types";
import type { StateDraft } from "./StateChangeApplier";
import { collectViolations } from "./StateInvariants";
import { GameSnapshotSchema } from "./StateSchemas";
import { formatZodIssues } from "../utils/zodIssues";
import {
  SNAPSHOT_VERSION,
  type ActiveStatusEffect,
  type GameEvent,
  type GameSnapshot,
  type GameStateInit,
  type NpcState,
  type PlayerState,
  type WorldClock,
  type WorldState,
} from "./StateTypes";

const log = Logger.scope("STATE");

export interface GameStateOptions {
  /** Oldest events are dropped past this many entries. */
  historyLimit?: number;
  /** World clock advance per committed turn. */
  minutesPerTurn?: number;
}

export interface TurnRecord {
  summary: string;
  success: boolean;
  functionName: string | null;
}

function advanceClock(clock: WorldClock, minutes: number): WorldClock {
  const total = clock.hour * 60 + clock.minute + minutes;
  const dayOffset = Math.floor(total / (24 * 60));
  const inDay = total % (24 * 60);
  return {
    day: clock.day + dayOffset,
    hour: Math.floor(inDay / 60),
    minute: inDay % 60,
  };
}

/** Decrement timed effects; returns survivors and the names that ran out. */
function tickEffects(effects: ActiveStatusEffect[]): { kept: ActiveStatusEffect[]; expired: string[] } {
  const kept: ActiveStatusEffect[] = [];
  const expired: string[] = [];
  for (const e of effects) {
    if (e.remainingTurns === null) {
      kept.push(e);
    } else if (e.remainingTurns <= 1) {
      expired.push(e.name);
    } else {
      kept.push({ ...e, remainingTurns: e.remainingTurns - 1 });
    }
  }
  return { kept, expired };
}

export class GameState {
  private _sessionId: string;
  private _turn: number;
  private _player: PlayerState;
  private _world: WorldState;
  private _concepts: ConceptRegistry;
  private _history: GameEvent[];

  private openTransaction: StateTransaction | null = null;
  private readonly listeners: Record<ConceptEventKind, Set<ConceptListener>> = {
    created: new Set(),
    updated: new Set(),
    deleted: new Set(),
  };

  private readonly historyLimit: number;
  private readonly minutesPerTurn: number;

  constructor(init: GameStateInit, opts: GameStateOptions = {}) {
    const config = loadRulecoreConfig();
    this.historyLimit = opts.historyLimit ?? config.historyLimit;
    this.minutesPerTurn = opts.minutesPerTurn ?? config.minutesPerTurn;

    this._sessionId = init.sessionId ?? randomUUID();
    this._turn = init.turn ?? 0;
    this._player = structuredClone(init.player);
    this._world = structuredClone(init.world);
    this._concepts = new ConceptRegistry(init.concepts ?? []);
    this._history = structuredClone(init.history ?? []);

    const violations = collectViolations(this.view());
    if (violations.length) {
      throw new StateInvariantViolation(violations);
    }
  }

  /** Build a session from a snapshot mapping (see restore()). */
  static fromSnapshot(mapping: unknown, opts: GameStateOptions = {}): GameState {
    const snapshot = GameState.parseSnapshot(mapping);
    return new GameState(snapshot, opts);
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get sessionId(): string {
    return this._sessionId;
  }

  get turn(): number {
    return this._turn;
  }

  get player(): DeepReadonly<PlayerState> {
    return this._player;
  }

  get world(): DeepReadonly<WorldState> {
    return this._world;
  }

  get concepts(): ReadonlyConceptRegistry {
    return this._concepts;
  }

  get history(): ReadonlyArray<DeepReadonly<GameEvent>> {
    return this._history;
  }

  get hasOpenTransaction(): boolean {
    return this.openTransaction !== null;
  }

  get openTransactionId(): string | null {
    return this.openTransaction?.id ?? null;
  }

  recentHistory(n = 5): ReadonlyArray<DeepReadonly<GameEvent>> {
    return n > 0 ? this._history.slice(-n) : [];
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  /**
   * Open the one transaction this session may have. A second begin() before
   * the first commits or rolls back is an integration bug: TransactionConflict.
   */
  begin(): StateTransaction {
    this.assertNoOpenTransaction();

    const host: TransactionHost = {
      sessionId: this._sessionId,
      turn: this._turn,
      createDraft: () => this.createDraft(),
      shadowConcepts: () => this._concepts.clone(),
      install: (draft, events) => this.install(draft, events),
      release: (tx) => {
        if (this.openTransaction === tx) this.openTransaction = null;
      },
    };

    const tx = new StateTransaction(host);
    this.openTransaction = tx;
    return tx;
  }

  private createDraft(): StateDraft {
    return {
      player: structuredClone(this._player),
      world: structuredClone(this._world),
      concepts: this._concepts.clone(),
    };
  }

  private install(draft: StateDraft, events: ConceptEvent[]): void {
    this._player = draft.player;
    this._world = draft.world;
    this._concepts = draft.concepts;

    for (const event of events) {
      this.emit(event);
    }
  }

  private assertNoOpenTransaction(): void {
    if (this.openTransaction) {
      throw new TransactionConflict(this._sessionId, this.openTransaction.id);
    }
  }

  /**
   * End-of-turn bookkeeping after a committed action: bump the turn counter,
   * tick status durations, advance the clock, record the event.
   */
  completeTurn(record: TurnRecord): GameEvent {
    this.assertNoOpenTransaction();

    this._turn += 1;
    this._world = { ...this._world, clock: advanceClock(this._world.clock, this.minutesPerTurn) };

    const event: GameEvent = {
      turn: this._turn,
      kind: "action",
      summary: record.summary,
      success: record.success,
      functionName: record.functionName,
      clock: { ...this._world.clock },
    };
    this.pushHistory(event);

    const playerTick = tickEffects(this._player.statusEffects);
    this._player = { ...this._player, statusEffects: playerTick.kept };
    for (const name of playerTick.expired) {
      this.pushSystemEvent(`status "${name}" wore off the player`);
    }

    const npcs: Record<string, NpcState> = {};
    for (const [id, npc] of Object.entries(this._world.npcs)) {
      const tick = tickEffects(npc.statusEffects);
      npcs[id] = { ...npc, statusEffects: tick.kept };
      for (const name of tick.expired) {
        this.pushSystemEvent(`status "${name}" wore off ${npc.name}`);
      }
    }
    this._world = { ...this._world, npcs };

    return event;
  }

  private pushSystemEvent(summary: string): void {
    this.pushHistory({
      turn: this._turn,
      kind: "system",
      summary,
      success: true,
      functionName: null,
      clock: { ...this._world.clock },
    });
  }

  private pushHistory(event: GameEvent): void {
    this._history.push(event);
    if (this._history.length > this.historyLimit) {
      this._history = this._history.slice(-this.historyLimit);
    }
  }

  // ---------------------------------------------------------------------------
  // Concept lifecycle notifications (fired only after a successful commit)
  // ---------------------------------------------------------------------------

  onConceptCreated(listener: ConceptListener): () => void {
    return this.subscribe("created", listener);
  }

  onConceptUpdated(listener: ConceptListener): () => void {
    return this.subscribe("updated", listener);
  }

  onConceptDeleted(listener: ConceptListener): () => void {
    return this.subscribe("deleted", listener);
  }

  private subscribe(kind: ConceptEventKind, listener: ConceptListener): () => void {
    this.listeners[kind].add(listener);
    return () => {
      this.listeners[kind].delete(listener);
    };
  }

  private emit(event: ConceptEvent): void {
    for (const listener of this.listeners[event.kind]) {
      try {
        listener(event.concept);
      } catch (err) {
        // State is already committed; a bad subscriber must not undo the turn.
        log.error(`concept ${event.kind} listener failed`, { concept: event.concept.name }, err);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Serialize / deserialize
  // ---------------------------------------------------------------------------

  /** Plain JSON mapping; restore(snapshot()) reproduces every field. */
  snapshot(): GameSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      sessionId: this._sessionId,
      turn: this._turn,
      player: structuredClone(this._player),
      world: structuredClone(this._world),
      concepts: this._concepts.list(),
      history: structuredClone(this._history),
    };
  }

  /**
   * Replace this session's contents with a snapshot. Shape errors throw
   * ValidationError; a well-formed snapshot that breaks an invariant throws
   * StateInvariantViolation. Nothing changes unless the whole snapshot is good.
   */
  restore(mapping: unknown): void {
    this.assertNoOpenTransaction();

    const snapshot = GameState.parseSnapshot(mapping);
    let concepts: ConceptRegistry;
    try {
      concepts = new ConceptRegistry(snapshot.concepts);
    } catch (err) {
      throw new ValidationError("snapshot contains duplicate concepts", [String(err)]);
    }

    const violations = collectViolations({
      player: snapshot.player,
      world: snapshot.world,
      concepts,
    });
    if (violations.length) {
      throw new StateInvariantViolation(violations);
    }

    this._sessionId = snapshot.sessionId;
    this._turn = snapshot.turn;
    this._player = snapshot.player;
    this._world = snapshot.world;
    this._concepts = concepts;
    this._history = snapshot.history;

    log.debug("session restored", { sessionId: this._sessionId, turn: this._turn });
  }

  private static parseSnapshot(mapping: unknown): GameSnapshot {
    const parsed = GameSnapshotSchema.safeParse(mapping);
    if (!parsed.success) {
      throw new ValidationError("invalid snapshot", formatZodIssues(parsed.error));
    }
    // zod hands back fresh objects; nothing aliases the caller's mapping.
    return parsed.data;
  }

  private view() {
    return { player: this._player, world: this._world, concepts: this._concepts };
  }
}
