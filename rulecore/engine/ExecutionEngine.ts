// rulecore/engine/ExecutionEngine.ts
//
// Intent -> ExecutionResult for one turn.
//
//   validate -> query registry -> for each candidate:
//     canExecute? -> begin tx -> execute -> commit -> completeTurn -> done
//
// A candidate that throws, or whose changes fail the commit check, is rolled
// back and recorded as an attempt; the next candidate gets its turn. Game-rule
// failures (a miss, a refusal) commit like any other outcome. The only error
// that escapes process() is TransactionConflict, which means the caller
// re-entered the engine on a session that is mid-turn.

import type { ContentGenerator } from "../content/ContentGenerator";
import { loadRulecoreConfig } from "../config/config";
import { rollCheck, rollDice } from "../dice/Dice";
import type { DiceRoll } from "../dice/DiceTypes";
import { ExecutionFailure, StateInvariantViolation, TransactionConflict, describeError } from "../errors/EngineErrors";
import type { FunctionRegistry } from "../functions/FunctionRegistry";
import type { DiceRoller, ExecutionContext, FunctionOutcome, GameFunction } from "../functions/FunctionTypes";
import type { GameState } from "../state/GameState";
import type { CommitResult } from "../transactions/StateTransaction";
import { Logger } from "../utils/logger";
import { mathRandom, seededRandom, type RandomSource } from "../utils/Rng";
import {
  INVALID_INTENT,
  NO_MATCHING_ACTION,
  type AttemptRecord,
  type ExecutionHook,
  type ExecutionResult,
  type Intent,
} from "./EngineTypes";
import { validateIntent } from "./IntentSchema";

const log = Logger.scope("ENGINE");

export interface ExecutionEngineOptions {
  registry: FunctionRegistry;
  // Defaults to RULECORE_RNG_SEED when set, else Math.random.
  rng?: RandomSource;
  content?: ContentGenerator;
  hooks?: ExecutionHook[];
}

export interface ProcessOptions {
  /** Per-call override of the engine's randomness. */
  rng?: RandomSource;
}

function recordingDice(rng: RandomSource, sink: DiceRoll[]): DiceRoller {
  return {
    roll(expression, opts) {
      const roll = rollDice(expression, rng, opts);
      sink.push(roll);
      return roll;
    },
    check(modifier, dc, label) {
      const result = rollCheck(rng, modifier, dc, label);
      sink.push(result.roll);
      return result;
    },
  };
}

export function failedResult(failureReason: string, attempts: AttemptRecord[] = [], details: ExecutionResult["details"] = {}): ExecutionResult {
  return {
    success: false,
    actionTaken: "",
    stateChanges: [],
    diceResults: [],
    worldChanges: [],
    newConcepts: [],
    failureReason,
    functionName: null,
    attempts,
    details,
  };
}

export class ExecutionEngine {
  readonly registry: FunctionRegistry;
  private readonly rng: RandomSource;
  private readonly content?: ContentGenerator;
  private readonly hooks: ExecutionHook[];

  constructor(opts: ExecutionEngineOptions) {
    this.registry = opts.registry;
    this.content = opts.content;
    this.hooks = [...(opts.hooks ?? [])];

    if (opts.rng) {
      this.rng = opts.rng;
    } else {
      const seed = loadRulecoreConfig().rngSeed;
      this.rng = seed ? seededRandom(seed) : mathRandom;
    }
  }

  addHook(hook: ExecutionHook): () => void {
    this.hooks.push(hook);
    return () => {
      const i = this.hooks.indexOf(hook);
      if (i !== -1) this.hooks.splice(i, 1);
    };
  }

  process(intent: Intent, state: GameState, opts: ProcessOptions = {}): ExecutionResult {
    const openTx = state.openTransactionId;
    if (openTx) {
      throw new TransactionConflict(state.sessionId, openTx);
    }

    this.notify("beforeProcess", (h) => h.beforeProcess?.(intent, state));

    const valid = validateIntent(intent);
    if (!valid.ok) {
      return this.finish(intent, state, failedResult(INVALID_INTENT, [], { error: "ValidationError", issues: valid.issues }));
    }

    const rng = opts.rng ?? this.rng;
    const attempts: AttemptRecord[] = [];

    for (const fn of this.registry.query(valid.intent)) {
      if (!this.accepts(fn, valid.intent, state)) continue;

      const result = this.attempt(fn, valid.intent, state, rng, attempts);
      if (result) return this.finish(intent, state, result);
    }

    return this.finish(intent, state, failedResult(NO_MATCHING_ACTION, attempts));
  }

  private accepts(fn: GameFunction, intent: Intent, state: GameState): boolean {
    try {
      return fn.canExecute(intent, state);
    } catch (err) {
      log.warn(`canExecute threw in ${fn.name}; skipping`, { error: describeError(err) });
      return false;
    }
  }

  /** One candidate inside its own transaction. null = try the next one. */
  private attempt(
    fn: GameFunction,
    intent: Intent,
    state: GameState,
    rng: RandomSource,
    attempts: AttemptRecord[],
  ): ExecutionResult | null {
    const tx = state.begin();
    const rolls: DiceRoll[] = [];
    const ctx: ExecutionContext = {
      tx,
      rng,
      dice: recordingDice(rng, rolls),
      ...(this.content ? { content: this.content } : {}),
    };

    let outcome: FunctionOutcome;
    try {
      outcome = fn.execute(intent, state, ctx);
      if (tx.status !== "open") {
        throw new Error(`transaction was ${tx.status} by the function`);
      }
    } catch (err) {
      if (tx.status === "open") tx.rollback();
      if (err instanceof TransactionConflict) throw err;

      const failure = new ExecutionFailure(fn.name, err);
      attempts.push({ functionName: fn.name, kind: failure.kind, message: failure.message });
      log.warn(failure.message);
      this.notify("onExecutionFailure", (h) => h.onExecutionFailure?.(intent, fn.name, failure));
      return null;
    }

    let commit: CommitResult;
    try {
      commit = tx.commit();
    } catch (err) {
      if (tx.status === "open") tx.rollback();
      const failure = new ExecutionFailure(fn.name, err);
      attempts.push({ functionName: fn.name, kind: failure.kind, message: failure.message });
      log.error(failure.message, err);
      this.notify("onExecutionFailure", (h) => h.onExecutionFailure?.(intent, fn.name, failure));
      return null;
    }
    if (!commit.ok) {
      const violation = new StateInvariantViolation(commit.violations);
      attempts.push({ functionName: fn.name, kind: violation.kind, message: violation.message });
      this.notify("onExecutionFailure", (h) => h.onExecutionFailure?.(intent, fn.name, violation));
      return null;
    }

    state.completeTurn({ summary: outcome.actionTaken, success: outcome.success, functionName: fn.name });

    const result: ExecutionResult = {
      success: outcome.success,
      actionTaken: outcome.actionTaken,
      stateChanges: commit.changes,
      diceResults: rolls,
      worldChanges: [...(outcome.worldChanges ?? [])],
      newConcepts: commit.conceptEvents.filter((e) => e.kind === "created").map((e) => e.concept),
      functionName: fn.name,
      attempts,
      details: outcome.details ?? {},
    };
    if (!outcome.success) {
      result.failureReason = outcome.failureReason ?? "action failed";
    }
    return result;
  }

  private finish(intent: Intent, state: GameState, result: ExecutionResult): ExecutionResult {
    let final = result;
    for (const hook of [...this.hooks]) {
      try {
        const replaced = hook.afterProcess?.(intent, final, state);
        if (replaced) final = replaced;
      } catch (err) {
        log.error("afterProcess hook failed", err);
      }
    }
    return final;
  }

  private notify(phase: keyof ExecutionHook, call: (hook: ExecutionHook) => void): void {
    for (const hook of [...this.hooks]) {
      try {
        call(hook);
      } catch (err) {
        log.error(`${phase} hook failed`, err);
      }
    }
  }
}
