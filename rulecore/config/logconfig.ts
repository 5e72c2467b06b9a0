// rulecore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (overridable with LOG_SCOPE_<SCOPE>=level).
// The engine narrates every turn at debug; keep it quiet unless asked.
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  ENGINE: "info",
  REGISTRY: "info",
  TX: "warn",
  STATE: "info",
  CONTENT: "info",
  TURN: "info",
};

function getScopeLevel(scope: string, env: NodeJS.ProcessEnv): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Global override
  const global = parseLevel(env.LOG_LEVEL);
  if (global) return global;

  // 3) Default table, then info
  return PER_SCOPE_DEFAULTS[key] ?? "info";
}

export function logEnabled(
  scope: string,
  level: LogLevel,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  const effective = getScopeLevel(scope, env);
  return ORDER.indexOf(level) >= ORDER.indexOf(effective);
}
