// rulecore/engine/EngineTypes.ts

import type { Concept } from "../concepts/ConceptTypes";
import type { DiceRoll } from "../dice/DiceTypes";
import type { EngineErrorKind } from "../errors/EngineErrors";
import type { StateChange } from "../state/StateTypes";
import type { GameState } from "../state/GameState";
import type { JsonObject } from "../utils/types";

export const INTENT_TYPES = ["Execute", "Query", "Explore", "Imagine"] as const;
export type IntentType = (typeof INTENT_TYPES)[number];

/** Structured action request from the classifier. Read-only to the engine. */
export interface Intent {
  readonly type: IntentType;
  readonly category: string;
  readonly action: string;
  // "" when the action has no target
  readonly target: string;
  readonly parameters: Readonly<JsonObject>;
  readonly confidence: number;
}

/** One candidate that was selected but did not produce a committed turn. */
export interface AttemptRecord {
  functionName: string;
  kind: Extract<EngineErrorKind, "ExecutionFailure" | "StateInvariantViolation">;
  message: string;
}

export interface ExecutionResult {
  success: boolean;
  actionTaken: string;
  // Applied changes, in commit order. Empty unless a transaction committed.
  stateChanges: StateChange[];
  diceResults: DiceRoll[];
  worldChanges: string[];
  newConcepts: Concept[];
  // Present iff success is false.
  failureReason?: string;
  functionName: string | null;
  attempts: AttemptRecord[];
  details: JsonObject;
}

export const NO_MATCHING_ACTION = "no matching action";
export const INVALID_INTENT = "invalid intent";

/**
 * Observers around process(). Every method is optional. A hook that throws
 * is logged and skipped.
 */
export interface ExecutionHook {
  beforeProcess?(intent: Intent, state: GameState): void;
  /** Return a result to replace the one handed in. */
  afterProcess?(intent: Intent, result: ExecutionResult, state: GameState): ExecutionResult | void;
  onExecutionFailure?(intent: Intent, functionName: string, error: unknown): void;
}
