// rulecore/test/contract_executionEngine.test.ts
//
// Contract: process() selects candidates in order, runs each inside its own
// transaction, and only ever returns data for game-level outcomes.

import test from "node:test";
import assert from "node:assert/strict";

import { ExecutionEngine } from "../engine/ExecutionEngine";
import { LoggingHook } from "../engine/ExecutionHooks";
import { INVALID_INTENT, NO_MATCHING_ACTION, type ExecutionHook } from "../engine/EngineTypes";
import { TransactionConflict } from "../errors/EngineErrors";
import { FunctionRegistry } from "../functions/FunctionRegistry";
import { fakeFunction, intent, makeState, seqRng } from "./fixtures";

function engineWith(...fns: ReturnType<typeof fakeFunction>[]): ExecutionEngine {
  const registry = new FunctionRegistry({ defaultPriority: 5 });
  for (const fn of fns) registry.register(fn, { category: "act" });
  return new ExecutionEngine({ registry, rng: seqRng([0.5]) });
}

test("[contract] a successful function commits, ends the turn and reports its changes", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("pay", {
      execute: (_i, _s, ctx) => {
        ctx.tx.addChange({ target: "player", action: "modify", property: "gold", value: -10 });
        return { success: true, actionTaken: "pay the toll", worldChanges: ["the gate opens"], details: { paid: 10 } };
      },
    }),
  );

  const result = engine.process(intent("act"), state);

  assert.deepEqual(result, {
    success: true,
    actionTaken: "pay the toll",
    stateChanges: [{ target: "player", action: "modify", property: "gold", value: -10 }],
    diceResults: [],
    worldChanges: ["the gate opens"],
    newConcepts: [],
    functionName: "pay",
    attempts: [],
    details: { paid: 10 },
  });
  assert.equal(state.player.gold, 40);
  assert.equal(state.turn, 1);
  assert.equal(state.history[0]?.summary, "pay the toll");
  assert.equal(state.history[0]?.functionName, "pay");
});

test("[contract] a game-level failure still commits and counts as a turn", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("pick_lock", {
      execute: (_i, _s, ctx) => {
        ctx.dice.check(0, 15, "lockpicking");
        return { success: false, actionTaken: "pick the lock" };
      },
    }),
  );

  const result = engine.process(intent("act"), state);

  assert.equal(result.success, false);
  assert.equal(result.failureReason, "action failed");
  assert.equal(result.functionName, "pick_lock");
  // 0.5 -> 11 on the d20
  assert.deepEqual(
    result.diceResults.map((r) => r.total),
    [11],
  );
  assert.equal(state.turn, 1);
  assert.equal(state.history[0]?.success, false);
});

test("[contract] no candidate yields a no matching action result and leaves state alone", () => {
  const state = makeState();
  const before = state.snapshot();
  const engine = engineWith(fakeFunction("never", { canExecute: () => false }));

  const result = engine.process(intent("act"), state);
  assert.equal(result.success, false);
  assert.equal(result.failureReason, NO_MATCHING_ACTION);
  assert.equal(result.functionName, null);
  assert.deepEqual(result.attempts, []);

  assert.equal(engine.process(intent("dance"), state).failureReason, NO_MATCHING_ACTION);
  assert.deepEqual(state.snapshot(), before);
});

test("[contract] an invalid intent is reported without running anything", () => {
  const state = makeState();
  let ran = false;
  const engine = engineWith(
    fakeFunction("any", {
      execute: () => {
        ran = true;
        return { success: true, actionTaken: "x" };
      },
    }),
  );

  const result = engine.process(intent("act", { confidence: 2 }), state);
  assert.equal(result.failureReason, INVALID_INTENT);
  assert.equal(result.details["error"], "ValidationError");
  const issues = result.details["issues"];
  assert.ok(Array.isArray(issues));
  assert.equal(issues.length, 1);
  assert.match(String(issues[0]), /^confidence: /);

  assert.equal(engine.process(intent("   "), state).failureReason, INVALID_INTENT);
  assert.equal(ran, false);
  assert.equal(state.turn, 0);
});

test("[contract] a throwing candidate is rolled back and the next one runs", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("broken", {
      priority: 9,
      execute: (_i, _s, ctx) => {
        ctx.tx.addChange({ target: "player", action: "modify", property: "gold", value: -50 });
        throw new Error("boom");
      },
    }),
    fakeFunction("fallback", { priority: 1 }),
  );

  const result = engine.process(intent("act"), state);

  assert.equal(result.success, true);
  assert.equal(result.functionName, "fallback");
  assert.deepEqual(result.attempts, [
    { functionName: "broken", kind: "ExecutionFailure", message: 'Function "broken" failed: boom' },
  ]);
  assert.equal(state.player.gold, 50);
  assert.equal(state.hasOpenTransaction, false);
  assert.equal(state.turn, 1);
});

test("[contract] a candidate whose changes break an invariant is recorded and skipped", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("overkill", {
      execute: (_i, _s, ctx) => {
        ctx.tx.addChange({ target: "player", action: "modify", property: "hp", value: -100 });
        return { success: true, actionTaken: "overkill" };
      },
    }),
  );

  const result = engine.process(intent("act"), state);

  assert.equal(result.failureReason, NO_MATCHING_ACTION);
  assert.deepEqual(result.attempts, [
    {
      functionName: "overkill",
      kind: "StateInvariantViolation",
      message: "State invariant violated: player hp out of bounds: -80 not in [0, 20]",
    },
  ]);
  assert.equal(state.player.hp, 20);
  assert.equal(state.turn, 0);
});

test("[contract] a throwing canExecute counts as a decline", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("flaky", {
      priority: 9,
      canExecute: () => {
        throw new Error("cannot decide");
      },
    }),
    fakeFunction("steady", { priority: 1 }),
  );

  const result = engine.process(intent("act"), state);
  assert.equal(result.functionName, "steady");
  assert.deepEqual(result.attempts, []);
});

test("[contract] processing a session with an open transaction is a conflict", () => {
  const state = makeState();
  const engine = engineWith(fakeFunction("any"));
  const tx = state.begin();

  assert.throws(() => engine.process(intent("act"), state), TransactionConflict);
  tx.rollback();
  assert.equal(engine.process(intent("act"), state).success, true);
});

test("[contract] a function that re-enters the session propagates the conflict", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("reentrant", {
      execute: (_i, s) => {
        s.begin();
        return { success: true, actionTaken: "never" };
      },
    }),
  );

  assert.throws(() => engine.process(intent("act"), state), TransactionConflict);
  assert.equal(state.hasOpenTransaction, false);
  assert.equal(state.turn, 0);
});

test("[contract] per-call rng overrides the engine's", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("roll", {
      execute: (_i, _s, ctx) => ({ success: true, actionTaken: `rolled ${ctx.dice.roll("1d20").total}` }),
    }),
  );

  assert.equal(engine.process(intent("act"), state).actionTaken, "rolled 11");
  assert.equal(engine.process(intent("act"), state, { rng: seqRng([0]) }).actionTaken, "rolled 1");
});

test("[contract] hooks observe each phase and may replace the result", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("broken", {
      priority: 9,
      execute: () => {
        throw new Error("nope");
      },
    }),
    fakeFunction("ok", { priority: 1 }),
  );

  const seen: string[] = [];
  const hook: ExecutionHook = {
    beforeProcess: (i) => seen.push(`before ${i.category}`),
    onExecutionFailure: (_i, name) => seen.push(`failure ${name}`),
    afterProcess: (_i, result) => {
      seen.push(`after ${result.functionName}`);
      return { ...result, actionTaken: result.actionTaken.toUpperCase() };
    },
  };
  const remove = engine.addHook(hook);
  engine.addHook({
    beforeProcess: () => {
      throw new Error("bad hook");
    },
  });

  const result = engine.process(intent("act"), state);
  assert.deepEqual(seen, ["before act", "failure broken", "after ok"]);
  assert.equal(result.actionTaken, "OK");

  remove();
  assert.equal(engine.process(intent("act"), state).actionTaken, "ok");
  assert.equal(seen.length, 3);
});

test("[contract] concepts created by the winning function come back as newConcepts", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("forge", {
      execute: (_i, _s, ctx) => {
        ctx.tx.concepts.getOrCreate({ type: "item", name: "star_anvil", description: "Warm to the touch." });
        return { success: true, actionTaken: "forge" };
      },
    }),
  );

  const first = engine.process(intent("act"), state);
  assert.deepEqual(first.newConcepts, [
    { type: "item", name: "star_anvil", description: "Warm to the touch.", properties: {}, createdTurn: 0 },
  ]);
  assert.deepEqual(first.stateChanges, [
    {
      target: "concept:item",
      action: "add",
      property: "star_anvil",
      value: { description: "Warm to the touch.", properties: {} },
    },
  ]);

  const second = engine.process(intent("act"), state);
  assert.deepEqual(second.newConcepts, []);
  assert.equal(state.concepts.byType("item").filter((c) => c.name === "star_anvil").length, 1);
});

test("[contract] LoggingHook observes without changing the result", () => {
  const state = makeState();
  const registry = new FunctionRegistry({ defaultPriority: 5 });
  registry.register(
    fakeFunction("broken", {
      priority: 9,
      execute: () => {
        throw new Error("nope");
      },
    }),
    { category: "act" },
  );
  registry.register(fakeFunction("ok", { priority: 1 }), { category: "act" });
  const engine = new ExecutionEngine({ registry, rng: seqRng([0.5]), hooks: [new LoggingHook()] });

  const result = engine.process(intent("act"), state);
  assert.equal(result.functionName, "ok");
  assert.equal(result.actionTaken, "ok");
  assert.equal(result.attempts.length, 1);
});

test("[contract] a commit that cannot apply a change is an attempt, and the session stays usable", () => {
  const state = makeState();
  const engine = engineWith(
    fakeFunction("stash", {
      priority: 9,
      execute: (_i, _s, ctx) => {
        ctx.tx.addChange({ target: "world", action: "add", property: "items.toString", value: { item: "dagger", quantity: 1 } });
        return { success: true, actionTaken: "stash the dagger" };
      },
    }),
    fakeFunction("poke", {
      priority: 1,
      execute: (_i, _s, ctx) => {
        ctx.tx.addChange({ target: "npc:constructor", action: "modify", property: "hp", value: -5 });
        return { success: true, actionTaken: "poke" };
      },
    }),
  );

  const result = engine.process(intent("act"), state);

  assert.equal(result.failureReason, NO_MATCHING_ACTION);
  assert.deepEqual(result.attempts, [
    {
      functionName: "stash",
      kind: "StateInvariantViolation",
      message: 'State invariant violated: add world.items.toString = {"item":"dagger","quantity":1}: unknown location',
    },
    {
      functionName: "poke",
      kind: "StateInvariantViolation",
      message: 'State invariant violated: unknown npc "constructor"',
    },
  ]);
  assert.equal(state.hasOpenTransaction, false);
  assert.equal(state.turn, 0);

  const next = engineWith(fakeFunction("wait")).process(intent("act"), state);
  assert.equal(next.success, true);
  assert.equal(state.turn, 1);
});
