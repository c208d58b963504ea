import chalk from "chalk";
import { getConfig, type LogLevel } from "./config.js";

type ChalkFormatter = (text: string) => string;

interface LevelStyle {
  color: ChalkFormatter;
  label: string;
  rank: number;
}

const STYLES = {
  debug: { color: chalk.bold.magenta, label: "DEBUG", rank: 0 },
  info: { color: chalk.bold.blue, label: "INFO", rank: 1 },
  market: { color: chalk.bold.hex("#00FF99"), label: "MARKET", rank: 1 },
  success: { color: chalk.bold.green, label: "OK", rank: 1 },
  warn: { color: chalk.bold.yellow, label: "WARN", rank: 2 },
  error: { color: chalk.bold.red, label: "ERROR", rank: 3 },
} satisfies Record<string, LevelStyle>;

type StyleName = keyof typeof STYLES;

const THRESHOLDS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let override: LogLevel | null = null;

export function setLogLevel(level: LogLevel | null): void {
  override = level;
}

function enabled(style: StyleName): boolean {
  const level = override ?? getConfig().logLevel;
  return STYLES[style].rank >= THRESHOLDS[level];
}

const timestamp = (): string => {
  const time = new Date().toTimeString().split(" ")[0];
  return chalk.dim(`[${time}]`);
};

const prefix = (style: StyleName): string => {
  const { color, label } = STYLES[style];
  return color(label.padEnd(8, " "));
};

const print = (style: StyleName, message: string, args: unknown[], formatter?: ChalkFormatter): void => {
  if (!enabled(style)) return;
  const body = formatter ? formatter(message) : message;
  if (style === "error") {
    console.error(timestamp(), prefix(style), body, ...args);
  } else if (style === "warn") {
    console.warn(timestamp(), prefix(style), body, ...args);
  } else {
    console.log(timestamp(), prefix(style), body, ...args);
  }
};

export const logger = {
  debug: (message: string, ...args: unknown[]) => print("debug", message, args, chalk.dim),
  info: (message: string, ...args: unknown[]) => print("info", message, args),
  market: (message: string, ...args: unknown[]) => print("market", message, args),
  success: (message: string, ...args: unknown[]) => print("success", message, args, chalk.green),
  warn: (message: string, ...args: unknown[]) => print("warn", message, args, chalk.yellow),
  error: (message: string, ...args: unknown[]) => print("error", message, args, chalk.red),
} as const;
