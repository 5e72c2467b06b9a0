// rulecore/session/SessionTypes.ts
//
// Contracts for the collaborators around the synchronous core. Real
// implementations call out to language models; these interfaces are all the
// turn loop knows about them.

import type { ExecutionResult, Intent } from "../engine/EngineTypes";
import type { GameState } from "../state/GameState";

export interface IntentClassifier {
  /**
   * Raw classifier output. May be an intent-shaped object, JSON text, or JSON
   * inside a fenced code block; the turn loop validates it.
   */
  classify(text: string, state: GameState): Promise<unknown>;
}

export interface NarrationRequest {
  input: string;
  intent: Intent | null;
  result: ExecutionResult;
  state: GameState;
}

export interface Narrator {
  narrate(request: NarrationRequest): Promise<string>;
}

export interface TurnOutcome {
  input: string;
  intent: Intent | null;
  result: ExecutionResult;
  narration: string;
  turn: number;
}
