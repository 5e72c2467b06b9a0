// rulecore/functions/FunctionTypes.ts

import type { ContentGenerator } from "../content/ContentGenerator";
import type { CheckResult, DiceRoll } from "../dice/DiceTypes";
import type { Intent } from "../engine/EngineTypes";
import type { GameState } from "../state/GameState";
import type { StateTransaction } from "../transactions/StateTransaction";
import type { RandomSource } from "../utils/Rng";
import type { JsonObject } from "../utils/types";

/** Dice bound to the turn's RandomSource. Every roll lands in the result. */
export interface DiceRoller {
  roll(expression: string, opts?: { label?: string; extraModifier?: number }): DiceRoll;
  check(modifier: number, dc: number, label: string): CheckResult;
}

/** The part of the turn's transaction a function may touch. The engine commits. */
export type TransactionWriter = Pick<StateTransaction, "id" | "status" | "pending" | "concepts" | "addChange" | "addChanges">;

export interface ExecutionContext {
  readonly tx: TransactionWriter;
  readonly rng: RandomSource;
  readonly dice: DiceRoller;
  readonly content?: ContentGenerator;
}

/**
 * What a function hands back. State changes and dice rolls are not listed
 * here: the engine reads them off the transaction and the roller.
 */
export interface FunctionOutcome {
  success: boolean;
  actionTaken: string;
  failureReason?: string;
  worldChanges?: string[];
  details?: JsonObject;
}

/**
 * A game mechanic. Reads GameState freely; every write goes through ctx.tx.
 * A thrown error means an internal fault, never a game-rule failure.
 */
export interface GameFunction {
  readonly name: string;
  canExecute(intent: Intent, state: GameState): boolean;
  execute(intent: Intent, state: GameState, ctx: ExecutionContext): FunctionOutcome;
  priority?(): number;
  description(): string;
}

export interface FunctionRegistration {
  category: string;
  keywords?: Iterable<string>;
  // Falls back to fn.priority(), then the configured default.
  priority?: number;
}

export interface FunctionMetadata {
  readonly name: string;
  readonly category: string;
  readonly keywords: ReadonlySet<string>;
  readonly priority: number;
  // Registration order; only ever used to break priority ties.
  readonly sequence: number;
}
