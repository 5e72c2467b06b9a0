// rulecore/index.ts

export * from "./concepts/ConceptTypes";
export { ConceptRegistry } from "./concepts/ConceptRegistry";

export { loadRulecoreConfig, type RulecoreConfig } from "./config/config";
export { logEnabled, parseLevel, type LogLevel } from "./config/logconfig";

export * from "./content/ContentGenerator";
export { createStarterState, loadWorldFile, STARTER_WORLD_FILE } from "./content/StarterWorld";

export * from "./dice/DiceTypes";
export * from "./dice/Dice";

export * from "./engine/EngineTypes";
export { ExecutionEngine, failedResult, type ExecutionEngineOptions, type ProcessOptions } from "./engine/ExecutionEngine";
export { LoggingHook } from "./engine/ExecutionHooks";
export { createIntent, extractJsonText, IntentSchema, parseIntentPayload, validateIntent, type IntentParseResult } from "./engine/IntentSchema";

export * from "./errors/EngineErrors";

export * from "./functions/FunctionTypes";
export { FunctionRegistry, tokenize, type FunctionRegistryOptions } from "./functions/FunctionRegistry";
export * from "./functions/builtin";

export * from "./session/SessionTypes";
export { KeywordIntentClassifier } from "./session/KeywordIntentClassifier";
export { TemplateNarrator } from "./session/TemplateNarrator";
export { TurnLoop, type TurnLoopDeps } from "./session/TurnLoop";

export * from "./state/StateTypes";
export { GameState, type GameStateOptions, type TurnRecord } from "./state/GameState";
export { collectViolations } from "./state/StateInvariants";
export { GameSnapshotSchema } from "./state/StateSchemas";

export { StateTransaction, TransactionConcepts, type CommitResult, type TransactionStatus } from "./transactions/StateTransaction";

export { Logger } from "./utils/logger";
export { mathRandom, randomInt, seededRandom, type RandomSource } from "./utils/Rng";
export type { DeepReadonly, JsonObject, JsonPrimitive, JsonValue } from "./utils/types";
