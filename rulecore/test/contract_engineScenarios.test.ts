// rulecore/test/contract_engineScenarios.test.ts
//
// End-to-end turns through registry + engine + state with pinned dice.

import test from "node:test";
import assert from "node:assert/strict";

import { ExecutionEngine } from "../engine/ExecutionEngine";
import { NO_MATCHING_ACTION } from "../engine/EngineTypes";
import { DuplicateConceptError } from "../errors/EngineErrors";
import { FunctionRegistry } from "../functions/FunctionRegistry";
import { AttackFunction, SearchFunction, registerStarterFunctions } from "../functions/builtin";
import { fakeFunction, intent, makeState, seqRng } from "./fixtures";

function registryOf(...entries: Parameters<FunctionRegistry["register"]>[]): FunctionRegistry {
  const registry = new FunctionRegistry({ defaultPriority: 5 });
  for (const [fn, registration] of entries) registry.register(fn, registration);
  return registry;
}

test("[contract] attack with pinned dice hits for a known amount", () => {
  const state = makeState();
  const engine = new ExecutionEngine({ registry: registryOf([new AttackFunction(), { category: "attack" }]) });

  // d20: 0.9 -> 19 vs AC 12; 1d6+2: 0.4 -> 3 + 2
  const result = engine.process(intent("attack", { target: "goblin" }), state, { rng: seqRng([0.9, 0.4]) });

  assert.equal(result.success, true);
  assert.equal(result.actionTaken, "attack goblin for 5 damage");
  assert.deepEqual(result.stateChanges, [{ target: "npc:goblin", action: "modify", property: "hp", value: -5 }]);
  assert.deepEqual(
    result.diceResults.map((r) => r.total),
    [19, 5],
  );
  assert.deepEqual(result.worldChanges, []);
  assert.equal(state.world.npcs["goblin"]?.hp, 10);
  assert.equal(state.turn, 1);
});

test("[contract] an unrecognized action matches nothing and changes nothing", () => {
  const state = makeState();
  const before = state.snapshot();
  const registry = new FunctionRegistry({ defaultPriority: 5 });
  registerStarterFunctions(registry);
  const engine = new ExecutionEngine({ registry, rng: seqRng([0.5]) });

  const result = engine.process(
    intent("teleport_to_moon", { type: "Imagine", action: "teleport to the moon" }),
    state,
  );

  assert.equal(result.success, false);
  assert.equal(result.failureReason, NO_MATCHING_ACTION);
  assert.deepEqual(state.snapshot(), before);
});

test("[contract] discovering the same item twice reuses its concept", () => {
  const state = makeState();
  const engine = new ExecutionEngine({ registry: registryOf([new SearchFunction(), { category: "search" }]) });
  const search = intent("search", { parameters: { discovery: "silvered_blade" } });

  const first = engine.process(search, state, { rng: seqRng([0.9]) });
  assert.equal(first.success, true);
  assert.equal(first.actionTaken, "search Damp Cave and find silvered_blade");
  assert.deepEqual(first.worldChanges, ["discovered silvered_blade"]);
  assert.equal(first.newConcepts.length, 1);
  assert.equal(first.newConcepts[0]?.description, "Something found while searching Damp Cave.");

  const second = engine.process(search, state, { rng: seqRng([0.9]) });
  assert.equal(second.success, true);
  assert.deepEqual(second.newConcepts, []);
  assert.deepEqual(second.worldChanges, []);
  assert.equal(state.player.inventory["silvered_blade"], 2);
  assert.equal(state.concepts.list().filter((c) => c.name === "silvered_blade").length, 1);

  // A plain create of the same name is a conflict.
  const tx = state.begin();
  assert.throws(
    () => tx.concepts.create({ type: "item", name: "silvered_blade", description: "copy" }),
    DuplicateConceptError,
  );
  tx.rollback();
});

test("[contract] a faulty candidate never leaks partial changes", () => {
  const faulty = () =>
    fakeFunction("faulty", {
      priority: 20,
      execute: (_i, _s, ctx) => {
        ctx.tx.addChange({ target: "npc:goblin", action: "modify", property: "hp", value: -5 });
        throw new Error("half-finished");
      },
    });

  const alone = makeState();
  const before = alone.snapshot();
  const soloEngine = new ExecutionEngine({ registry: registryOf([faulty(), { category: "attack" }]) });
  const solo = soloEngine.process(intent("attack", { target: "goblin" }), alone, { rng: seqRng([0.9, 0.4]) });

  assert.equal(solo.failureReason, NO_MATCHING_ACTION);
  assert.equal(solo.attempts[0]?.kind, "ExecutionFailure");
  assert.deepEqual(alone.snapshot(), before);

  const state = makeState();
  const engine = new ExecutionEngine({
    registry: registryOf([faulty(), { category: "attack" }], [new AttackFunction(), { category: "attack" }]),
  });
  const result = engine.process(intent("attack", { target: "goblin" }), state, { rng: seqRng([0.9, 0.4]) });

  assert.equal(result.functionName, "attack");
  assert.equal(result.attempts.length, 1);
  // Only the attack's 5 damage landed.
  assert.equal(state.world.npcs["goblin"]?.hp, 10);
});

test("[contract] equal priority resolves to the earlier registration", () => {
  const state = makeState();
  const engine = new ExecutionEngine({
    registry: registryOf(
      [fakeFunction("A", { priority: 3 }), { category: "act" }],
      [fakeFunction("B", { priority: 3 }), { category: "act" }],
    ),
    rng: seqRng([0.5]),
  });

  assert.equal(engine.process(intent("act"), state).functionName, "A");
  assert.equal(engine.process(intent("act"), state).functionName, "A");
});

test("[contract] a missed attack is a committed game failure", () => {
  const state = makeState();
  const engine = new ExecutionEngine({ registry: registryOf([new AttackFunction(), { category: "attack" }]) });

  // 0.1 -> 3 on the d20
  const result = engine.process(intent("attack"), state, { rng: seqRng([0.1]) });

  assert.equal(result.success, false);
  assert.equal(result.actionTaken, "attack goblin");
  assert.equal(result.failureReason, "attack missed");
  assert.deepEqual(result.details, { roll: 3, ac: 12 });
  assert.deepEqual(result.stateChanges, []);
  assert.equal(state.turn, 1);
});

test("[contract] attacking a friendly npc turns it hostile", () => {
  const state = makeState();
  const engine = new ExecutionEngine({ registry: registryOf([new AttackFunction(), { category: "attack" }]) });

  // 0.9 -> 19 vs AC 10; 0.0 -> 1 + 2 = 3 damage
  const result = engine.process(intent("attack", { target: "elder" }), state, { rng: seqRng([0.9, 0]) });

  assert.equal(result.actionTaken, "attack Old Elder for 3 damage");
  assert.deepEqual(result.worldChanges, ["Old Elder turns hostile"]);
  assert.equal(state.world.npcs["elder"]?.disposition, "hostile");
  assert.equal(state.world.npcs["elder"]?.hp, 5);
});
