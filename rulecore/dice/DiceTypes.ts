// rulecore/dice/DiceTypes.ts

export interface DiceExpression {
  count: number;
  sides: number;
  modifier: number;
}

/** Result of one "NdM+K" roll. Frozen once produced. */
export interface DiceRoll {
  readonly expression: string;
  readonly label?: string;
  readonly rolls: readonly number[];
  readonly rolledValue: number;
  readonly modifier: number;
  readonly total: number;
}

export interface CheckResult {
  roll: DiceRoll;
  dc: number;
  success: boolean;
  natural: number;
}
