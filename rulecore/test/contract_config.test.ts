// rulecore/test/contract_config.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { loadRulecoreConfig } from "../config/config";
import { logEnabled, parseLevel } from "../config/logconfig";
import { ValidationError } from "../errors/EngineErrors";

test("[contract] empty env yields defaults", () => {
  assert.deepEqual(loadRulecoreConfig({}), {
    historyLimit: 500,
    minutesPerTurn: 30,
    defaultPriority: 5,
    rngSeed: null,
  });
});

test("[contract] env values are parsed and trimmed", () => {
  assert.deepEqual(
    loadRulecoreConfig({
      RULECORE_HISTORY_LIMIT: " 50 ",
      RULECORE_MINUTES_PER_TURN: "0",
      RULECORE_DEFAULT_PRIORITY: "3",
      RULECORE_RNG_SEED: "table-seed",
    }),
    { historyLimit: 50, minutesPerTurn: 0, defaultPriority: 3, rngSeed: "table-seed" },
  );
  assert.equal(loadRulecoreConfig({ RULECORE_RNG_SEED: "   " }).rngSeed, null);
});

test("[contract] invalid values throw ValidationError naming the variable", () => {
  assert.throws(
    () => loadRulecoreConfig({ RULECORE_HISTORY_LIMIT: "0" }),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.issues.length === 1 &&
      err.issues[0] === "RULECORE_HISTORY_LIMIT: expected an integer >= 1",
  );
  assert.throws(() => loadRulecoreConfig({ RULECORE_MINUTES_PER_TURN: "2.5" }), ValidationError);
  assert.throws(() => loadRulecoreConfig({ RULECORE_DEFAULT_PRIORITY: "high" }), ValidationError);
});

test("[contract] parseLevel accepts the four levels in any case", () => {
  assert.equal(parseLevel("DEBUG"), "debug");
  assert.equal(parseLevel(" warn "), "warn");
  assert.equal(parseLevel("verbose"), null);
  assert.equal(parseLevel(undefined), null);
});

test("[contract] log levels resolve per scope, then globally, then by default", () => {
  // TX defaults to warn.
  assert.equal(logEnabled("TX", "info", {}), false);
  assert.equal(logEnabled("TX", "warn", {}), true);
  // Unknown scopes default to info.
  assert.equal(logEnabled("CUSTOM", "info", {}), true);
  assert.equal(logEnabled("CUSTOM", "debug", {}), false);

  assert.equal(logEnabled("ENGINE", "debug", { LOG_LEVEL: "debug" }), true);
  assert.equal(logEnabled("ENGINE", "info", { LOG_LEVEL: "debug", LOG_SCOPE_ENGINE: "error" }), false);
  assert.equal(logEnabled("engine", "error", { LOG_SCOPE_ENGINE: "error" }), true);
});
