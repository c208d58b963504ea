import { config as loadDotenv } from "dotenv";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface MarketConfig {
  readonly env: "development" | "production" | "test";
  readonly host: string;
  readonly port: number;
  readonly wsPort: number;
  // value an installation must pay per unit of capacity
  readonly installationUnitRate: number;
  readonly logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];
const ENVS: readonly MarketConfig["env"][] = ["development", "production", "test"];

function readString(key: string, fallback: string): string {
  const value = process.env[key];
  return value === undefined || value.length === 0 ? fallback : value;
}

function readInteger(key: string, fallback: number, min = 0): number {
  const raw = process.env[key];
  if (raw === undefined || raw.length === 0) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new Error(`Environment variable ${key} must be an integer >= ${min}`);
  }
  return value;
}

function readChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const raw = readString(key, fallback).toLowerCase();
  const match = choices.find((choice) => choice === raw);
  if (match === undefined) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(", ")}`);
  }
  return match;
}

export function loadConfig(): MarketConfig {
  loadDotenv();

  const env = readChoice("NODE_ENV", ENVS, "development");

  return {
    env,
    host: readString("HOST", "0.0.0.0"),
    port: readInteger("PORT", 8080),
    wsPort: readInteger("WS_PORT", 8081),
    installationUnitRate: readInteger("INSTALLATION_UNIT_RATE", 1),
    logLevel: readChoice("LOG_LEVEL", LOG_LEVELS, env === "test" ? "silent" : "info"),
  };
}

let cached: MarketConfig | null = null;

export function getConfig(): MarketConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

// For tests
export function resetConfig(): void {
  cached = null;
}
