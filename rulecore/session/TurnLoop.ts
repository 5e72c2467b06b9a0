// rulecore/session/TurnLoop.ts
//
// Outer orchestration for one session: text -> classifier -> engine ->
// narrator. The async collaborators live here so ExecutionEngine.process()
// stays synchronous. Turns are queued; a second playTurn() waits for the
// first to finish instead of interleaving with it.

import { INVALID_INTENT, type ExecutionResult, type Intent } from "../engine/EngineTypes";
import { failedResult, type ExecutionEngine } from "../engine/ExecutionEngine";
import { parseIntentPayload } from "../engine/IntentSchema";
import type { GameState } from "../state/GameState";
import { Logger } from "../utils/logger";
import type { IntentClassifier, Narrator, TurnOutcome } from "./SessionTypes";

const log = Logger.scope("TURN");

export interface TurnLoopDeps {
  engine: ExecutionEngine;
  state: GameState;
  classifier: IntentClassifier;
  narrator: Narrator;
}

export class TurnLoop {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly deps: TurnLoopDeps) {}

  get state(): GameState {
    return this.deps.state;
  }

  playTurn(text: string): Promise<TurnOutcome> {
    const run = this.queue.then(() => this.runTurn(text));
    // Keep the chain alive after a failed turn.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runTurn(text: string): Promise<TurnOutcome> {
    const { engine, state, classifier, narrator } = this.deps;

    const raw = await classifier.classify(text, state);
    const parsed = parseIntentPayload(raw);

    let intent: Intent | null = null;
    let result: ExecutionResult;
    if (parsed.ok) {
      intent = parsed.intent;
      result = engine.process(intent, state);
    } else {
      log.warn("classifier output rejected", { input: text, issues: parsed.issues });
      result = failedResult(INVALID_INTENT, [], { error: "ValidationError", issues: parsed.issues });
    }

    const narration = await narrator.narrate({ input: text, intent, result, state });
    log.debug("turn complete", { session: state.sessionId, turn: state.turn, success: result.success });

    return { input: text, intent, result, narration, turn: state.turn };
  }
}
