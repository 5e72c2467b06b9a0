// rulecore/engine/ExecutionHooks.ts

import type { GameState } from "../state/GameState";
import { describeError } from "../errors/EngineErrors";
import { Logger } from "../utils/logger";
import type { ExecutionHook, ExecutionResult, Intent } from "./EngineTypes";

/** Turn-by-turn trace through the scoped logger. */
export class LoggingHook implements ExecutionHook {
  constructor(private readonly log: Logger = Logger.scope("ENGINE")) {}

  beforeProcess(intent: Intent, state: GameState): void {
    this.log.debug("processing intent", {
      session: state.sessionId,
      turn: state.turn,
      type: intent.type,
      category: intent.category,
      target: intent.target,
    });
  }

  afterProcess(intent: Intent, result: ExecutionResult, state: GameState): void {
    const fields = {
      session: state.sessionId,
      turn: state.turn,
      category: intent.category,
      fn: result.functionName,
      changes: result.stateChanges.length,
    };
    if (result.success) {
      this.log.success(result.actionTaken, fields);
    } else {
      this.log.info(`${result.actionTaken || intent.category} failed: ${result.failureReason ?? "unknown"}`, fields);
    }
  }

  onExecutionFailure(intent: Intent, functionName: string, error: unknown): void {
    this.log.warn(`function ${functionName} failed`, { category: intent.category, error: describeError(error) });
  }
}
