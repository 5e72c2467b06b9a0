// rulecore/test/contract_gameStateSnapshot.test.ts
//
// Contract: GameState validates on construction, snapshot/restore round-trips
// every field, and end-of-turn bookkeeping (turn, clock, status ticks,
// history) behaves as documented.

import test from "node:test";
import assert from "node:assert/strict";

import { StateInvariantViolation, ValidationError } from "../errors/EngineErrors";
import { GameState } from "../state/GameState";
import { baseInit, makeState, TEST_STATE_OPTIONS } from "./fixtures";

const turnRecord = { summary: "wait", success: true, functionName: "wait" };

test("[contract] construction rejects a state that breaks an invariant", () => {
  const init = baseInit();
  init.player.hp = 25;

  assert.throws(
    () => new GameState(init, TEST_STATE_OPTIONS),
    (err: unknown) =>
      err instanceof StateInvariantViolation &&
      err.violations.includes("player hp out of bounds: 25 not in [0, 20]"),
  );
});

test("[contract] construction copies its input", () => {
  const init = baseInit();
  const state = new GameState(init, TEST_STATE_OPTIONS);
  init.player.hp = 1;
  assert.equal(state.player.hp, 20);
});

test("[contract] restore(snapshot()) reproduces every observable field", () => {
  const state = makeState();
  state.completeTurn(turnRecord);
  const snap = state.snapshot();

  const other = makeState((init) => {
    init.sessionId = "someone-else";
  });
  other.restore(snap);
  assert.deepEqual(other.snapshot(), snap);

  const rebuilt = GameState.fromSnapshot(JSON.parse(JSON.stringify(snap)), TEST_STATE_OPTIONS);
  assert.deepEqual(rebuilt.snapshot(), snap);
  assert.equal(rebuilt.turn, 1);
  assert.equal(rebuilt.sessionId, "session-test");
});

test("[contract] snapshot is detached from live state", () => {
  const state = makeState();
  const snap = state.snapshot();
  snap.player.hp = 1;
  snap.world.flags["tampered"] = true;

  assert.equal(state.player.hp, 20);
  assert.equal(state.world.flags["tampered"], undefined);
});

test("[contract] malformed snapshot throws ValidationError and changes nothing", () => {
  const state = makeState();
  const before = state.snapshot();

  assert.throws(() => state.restore({ version: 1, player: "nope" }), ValidationError);
  assert.throws(() => state.restore(null), ValidationError);
  assert.deepEqual(state.snapshot(), before);
});

test("[contract] well-formed snapshot with a dangling reference throws StateInvariantViolation", () => {
  const state = makeState();
  const snap = state.snapshot();
  snap.player.inventory["phantom_item"] = 1;

  assert.throws(
    () => state.restore(snap),
    (err: unknown) =>
      err instanceof StateInvariantViolation &&
      err.violations.includes('player references unknown item "phantom_item"'),
  );
  assert.equal(state.player.inventory["phantom_item"], undefined);
});

test("[contract] snapshot with duplicate concepts is rejected", () => {
  const state = makeState();
  const snap = state.snapshot();
  const first = snap.concepts[0];
  assert.ok(first);
  snap.concepts.push({ ...first });

  assert.throws(() => state.restore(snap), ValidationError);
});

test("[contract] completeTurn bumps the turn, advances the clock and records history", () => {
  const state = makeState();
  const event = state.completeTurn({ summary: "look around", success: true, functionName: "search" });

  assert.equal(state.turn, 1);
  assert.deepEqual(state.world.clock, { day: 1, hour: 8, minute: 30 });
  assert.deepEqual(event, {
    turn: 1,
    kind: "action",
    summary: "look around",
    success: true,
    functionName: "search",
    clock: { day: 1, hour: 8, minute: 30 },
  });
  assert.equal(state.history.length, 1);
});

test("[contract] clock rolls over midnight", () => {
  const state = makeState((init) => {
    init.world.clock = { day: 3, hour: 23, minute: 45 };
  });
  state.completeTurn(turnRecord);
  assert.deepEqual(state.world.clock, { day: 4, hour: 0, minute: 15 });
});

test("[contract] timed status effects tick down and expire with a system event", () => {
  const state = makeState((init) => {
    init.player.statusEffects = [{ name: "poisoned", remainingTurns: 2, stacks: 1 }];
    const goblin = init.world.npcs["goblin"];
    if (goblin) goblin.statusEffects = [{ name: "poisoned", remainingTurns: null, stacks: 2 }];
  });

  state.completeTurn(turnRecord);
  assert.deepEqual(state.player.statusEffects, [{ name: "poisoned", remainingTurns: 1, stacks: 1 }]);

  state.completeTurn(turnRecord);
  assert.deepEqual(state.player.statusEffects, []);
  // Permanent effects never tick.
  assert.deepEqual(state.world.npcs["goblin"]?.statusEffects, [{ name: "poisoned", remainingTurns: null, stacks: 2 }]);

  const last = state.history[state.history.length - 1];
  assert.equal(last?.kind, "system");
  assert.equal(last?.summary, 'status "poisoned" wore off the player');
  assert.equal(last?.turn, 2);
  assert.equal(state.history.length, 3);
});

test("[contract] history keeps only the newest entries", () => {
  const state = makeState(undefined, { historyLimit: 3, minutesPerTurn: 30 });
  for (let i = 0; i < 5; i++) state.completeTurn(turnRecord);

  assert.deepEqual(
    state.history.map((e) => e.turn),
    [3, 4, 5],
  );
  assert.deepEqual(
    state.recentHistory(2).map((e) => e.turn),
    [4, 5],
  );
});
