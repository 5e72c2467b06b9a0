// rulecore/config/config.ts
//
// Engine tunables from the environment. dotenv fills process.env from a local
// .env once; zod turns the raw strings into a typed config.

import dotenv from "dotenv";
import { z } from "zod";

import { ValidationError } from "../errors/EngineErrors";
import { formatZodIssues } from "../utils/zodIssues";

let dotenvLoaded = false;

function ensureDotenv(): void {
  if (dotenvLoaded) return;
  dotenvLoaded = true;
  // Only updates process.env; validation happens below.
  dotenv.config();
}

const optionalInt = (fallback: number, min: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw === "") return fallback;
      const n = Number(raw);
      if (!Number.isInteger(n) || n < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer >= ${min}` });
        return z.NEVER;
      }
      return n;
    });

const EnvSchema = z.object({
  RULECORE_HISTORY_LIMIT: optionalInt(500, 1),
  RULECORE_MINUTES_PER_TURN: optionalInt(30, 0),
  RULECORE_DEFAULT_PRIORITY: optionalInt(5, 0),
  RULECORE_RNG_SEED: z
    .string()
    .trim()
    .optional()
    .transform((raw) => (raw ? raw : null)),
});

export interface RulecoreConfig {
  historyLimit: number;
  minutesPerTurn: number;
  defaultPriority: number;
  // null = Math.random
  rngSeed: string | null;
}

/**
 * Parse engine settings. Pass an explicit env for tests; the default reads
 * process.env after loading .env.
 */
export function loadRulecoreConfig(env?: NodeJS.ProcessEnv): RulecoreConfig {
  let source = env;
  if (!source) {
    ensureDotenv();
    source = process.env;
  }

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ValidationError("invalid rulecore configuration", formatZodIssues(parsed.error));
  }

  return {
    historyLimit: parsed.data.RULECORE_HISTORY_LIMIT,
    minutesPerTurn: parsed.data.RULECORE_MINUTES_PER_TURN,
    defaultPriority: parsed.data.RULECORE_DEFAULT_PRIORITY,
    rngSeed: parsed.data.RULECORE_RNG_SEED,
  };
}
