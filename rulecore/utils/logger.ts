// rulecore/utils/logger.ts

import { LogLevel, logEnabled } from "../config/logconfig";

const Colors = {
  Reset: "\x1b[0m",
  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",
  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
} as const;

type ColorCode = (typeof Colors)[keyof typeof Colors];

function colorize(text: string, color: ColorCode): string {
  if (process.env.NO_COLOR) return text;
  return `${color}${text}${Colors.Reset}`;
}

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function levelColor(level: LogLevel): ColorCode {
  switch (level) {
    case "debug":
      return Colors.BrightCyan;
    case "info":
      return Colors.FgGreen;
    case "warn":
      return Colors.FgYellow;
    case "error":
    default:
      return Colors.FgRed;
  }
}

function maybeFormatError(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack,
    };
  }
  return value;
}

export class Logger {
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, args: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    const [first, ...rest] = args;

    // If first arg is a string, show it inline; otherwise just tag + data.
    if (typeof first === "string") {
      console.log(`${timestamp()} ${tag} ${first}`, ...rest.map(maybeFormatError));
    } else {
      console.log(`${timestamp()} ${tag}`, ...args.map(maybeFormatError));
    }
  }

  debug(...args: unknown[]): void {
    this.write("debug", levelColor("debug"), args);
  }

  info(...args: unknown[]): void {
    this.write("info", levelColor("info"), args);
  }

  warn(...args: unknown[]): void {
    this.write("warn", levelColor("warn"), args);
  }

  error(...args: unknown[]): void {
    this.write("error", levelColor("error"), args);
  }

  // Info level with a bright green tag
  success(...args: unknown[]): void {
    this.write("info", Colors.BrightGreen, args);
  }
}
