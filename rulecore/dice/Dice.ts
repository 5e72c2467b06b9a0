// rulecore/dice/Dice.ts
//
// Dice and resolution primitives. Pure: no state access, randomness is always
// injected so a seeded source reproduces every roll.

import { DiceExpressionError } from "../errors/EngineErrors";
import { randomInt, type RandomSource } from "../utils/Rng";
import type { CheckResult, DiceExpression, DiceRoll } from "./DiceTypes";

export const MAX_DICE_COUNT = 100;
export const MAX_DICE_SIDES = 1000;

const DICE_PATTERN = /^(\d*)d(\d+)\s*(?:([+-])\s*(\d+))?$/i;

export function parseDiceExpression(expression: string): DiceExpression {
  const match = DICE_PATTERN.exec(expression.trim());
  if (!match) {
    throw new DiceExpressionError(expression, "expected NdM, NdM+K or NdM-K");
  }

  const count = match[1] ? Number(match[1]) : 1;
  const sides = Number(match[2]);
  const magnitude = match[4] ? Number(match[4]) : 0;
  const modifier = match[3] === "-" ? -magnitude : magnitude;

  if (count < 1 || count > MAX_DICE_COUNT) {
    throw new DiceExpressionError(expression, `dice count must be 1..${MAX_DICE_COUNT}`);
  }
  if (sides < 1 || sides > MAX_DICE_SIDES) {
    throw new DiceExpressionError(expression, `die sides must be 1..${MAX_DICE_SIDES}`);
  }

  return { count, sides, modifier };
}

export function formatDiceExpression(expr: DiceExpression): string {
  const base = `${expr.count}d${expr.sides}`;
  if (expr.modifier === 0) return base;
  return expr.modifier > 0 ? `${base}+${expr.modifier}` : `${base}${expr.modifier}`;
}

/**
 * Roll "NdM+K". rolledValue lands in [N, N*M]; total = rolledValue + K.
 * `extraModifier` stacks on top of K (ability bonuses and the like).
 */
export function rollDice(
  expression: string,
  rng: RandomSource,
  opts: { label?: string; extraModifier?: number } = {},
): DiceRoll {
  const parsed = parseDiceExpression(expression);
  const modifier = parsed.modifier + (opts.extraModifier ?? 0);

  const rolls: number[] = [];
  for (let i = 0; i < parsed.count; i++) {
    rolls.push(randomInt(rng, 1, parsed.sides));
  }
  const rolledValue = rolls.reduce((sum, r) => sum + r, 0);

  const roll: DiceRoll = {
    expression: formatDiceExpression({ ...parsed, modifier }),
    ...(opts.label !== undefined ? { label: opts.label } : {}),
    rolls: Object.freeze(rolls),
    rolledValue,
    modifier,
    total: rolledValue + modifier,
  };
  return Object.freeze(roll);
}

/** Classic ability modifier: 10-11 => 0, 12-13 => +1, 8-9 => -1. */
export function abilityModifier(score: number): number {
  return Math.floor((score - 10) / 2);
}

/**
 * d20 + modifier against a difficulty class.
 * Natural 20 always succeeds, natural 1 always fails.
 */
export function rollCheck(
  rng: RandomSource,
  modifier: number,
  dc: number,
  label: string,
): CheckResult {
  const roll = rollDice("1d20", rng, { label, extraModifier: modifier });
  const natural = roll.rolledValue;

  let success: boolean;
  if (natural === 20) success = true;
  else if (natural === 1) success = false;
  else success = roll.total >= dc;

  return { roll, dc, success, natural };
}
