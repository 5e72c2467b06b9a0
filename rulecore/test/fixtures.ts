// rulecore/test/fixtures.ts
//
// Shared builders for the rulecore tests: a small two-room world and a
// sequence RNG that hands back fixed values.

import type { Intent } from "../engine/EngineTypes";
import type { ExecutionContext, FunctionOutcome, GameFunction } from "../functions/FunctionTypes";
import { GameState, type GameStateOptions } from "../state/GameState";
import type { GameStateInit } from "../state/StateTypes";

export function seqRng(values: number[]) {
  let i = 0;
  return () => {
    const v = values[i] ?? values[values.length - 1] ?? 0;
    i += 1;
    return v;
  };
}

/**
 * Player "Tester" (all abilities 10, unarmed) in the cave with a hostile
 * goblin and a friendly elder. A merchant waits in the tunnel.
 */
export function baseInit(): GameStateInit {
  return {
    sessionId: "session-test",
    player: {
      name: "Tester",
      attributes: { str: 10, dex: 10, con: 10, int: 10, wis: 10, cha: 10 },
      hp: 20,
      maxHp: 20,
      mp: 10,
      maxMp: 10,
      ac: 12,
      level: 1,
      xp: 0,
      gold: 50,
      statusEffects: [],
      inventory: { dagger: 1, healing_potion: 1 },
      equipment: { weapon: null, armor: null, shield: null, accessory: null },
      location: "cave",
    },
    world: {
      currentLocation: "cave",
      locations: {
        cave: {
          id: "cave",
          name: "Damp Cave",
          description: "Water drips from the ceiling.",
          connections: ["tunnel"],
          items: {},
          properties: {},
        },
        tunnel: {
          id: "tunnel",
          name: "Narrow Tunnel",
          description: "The walls press close.",
          connections: ["cave"],
          items: { copper_coin: 2 },
          properties: {},
        },
      },
      npcs: {
        goblin: {
          id: "goblin",
          name: "goblin",
          disposition: "hostile",
          hp: 15,
          maxHp: 15,
          ac: 12,
          location: "cave",
          inventory: { goblin_ear: 1 },
          statusEffects: [],
          properties: { xp: 20 },
        },
        elder: {
          id: "elder",
          name: "Old Elder",
          disposition: "friendly",
          hp: 8,
          maxHp: 8,
          ac: 10,
          location: "cave",
          inventory: {},
          statusEffects: [],
          properties: { greeting: "Stay a while." },
        },
        trader: {
          id: "trader",
          name: "Tunnel Trader",
          disposition: "merchant",
          hp: 10,
          maxHp: 10,
          ac: 10,
          location: "tunnel",
          inventory: { healing_potion: 3, iron_shield: 1 },
          statusEffects: [],
          properties: {},
        },
      },
      flags: {},
      variables: {},
      clock: { day: 1, hour: 8, minute: 0 },
    },
    concepts: [
      { type: "item", name: "dagger", description: "A short blade.", properties: { slot: "weapon", damage: "1d4", value: 4 }, createdTurn: 0 },
      { type: "item", name: "healing_potion", description: "Red and fizzy.", properties: { consumable: true, heal: 5, value: 10 }, createdTurn: 0 },
      { type: "item", name: "iron_shield", description: "Heavy.", properties: { slot: "shield", acBonus: 2, value: 30 }, createdTurn: 0 },
      { type: "item", name: "goblin_ear", description: "Gross.", properties: { value: 2 }, createdTurn: 0 },
      { type: "item", name: "copper_coin", description: "Small change.", properties: { value: 1 }, createdTurn: 0 },
      { type: "status", name: "poisoned", description: "Venom.", properties: {}, createdTurn: 0 },
    ],
  };
}

export const TEST_STATE_OPTIONS: GameStateOptions = { historyLimit: 100, minutesPerTurn: 30 };

export function makeState(mutate?: (init: GameStateInit) => void, opts: GameStateOptions = TEST_STATE_OPTIONS): GameState {
  const init = baseInit();
  mutate?.(init);
  return new GameState(init, opts);
}

export function intent(category: string, fields: Partial<Intent> = {}): Intent {
  return {
    type: "Execute",
    category,
    action: category,
    target: "",
    parameters: {},
    confidence: 1,
    ...fields,
  };
}

/** GameFunction built from closures, for engine and registry tests. */
export function fakeFunction(
  name: string,
  opts: {
    priority?: number;
    canExecute?: (i: Intent, s: GameState) => boolean;
    execute?: (i: Intent, s: GameState, ctx: ExecutionContext) => FunctionOutcome;
  } = {},
): GameFunction {
  const fn: GameFunction = {
    name,
    canExecute: (i, s) => (opts.canExecute ? opts.canExecute(i, s) : true),
    execute: (i, s, ctx) => (opts.execute ? opts.execute(i, s, ctx) : { success: true, actionTaken: name }),
    description: () => `test function ${name}`,
  };
  const priority = opts.priority;
  if (priority !== undefined) fn.priority = () => priority;
  return fn;
}
