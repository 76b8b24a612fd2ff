// ============================================
// Centralized Configuration
// ============================================

import dotenv from "dotenv";
import { QUEUES } from "../types/events.js";

dotenv.config();

/** Chainlink-style feeds go stale after three hours without an update. */
export const DEFAULT_ORACLE_TIMEOUT_SECONDS = 3 * 60 * 60;

export const DEFAULT_EVENTS_QUEUE = QUEUES.ENGINE_EVENTS;

export interface AppConfig {
  // EVM connection
  chain: {
    rpcUrl: string;
    chainId: number;
  };
  // Engine wiring
  engine: {
    peggedToken: string;
    custody: string;
    operatorPrivateKey?: string;
    collateralTokens: string[];
    priceFeeds: string[];
    oracleTimeoutSeconds: number;
  };
  // Database
  postgres: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  // Redis
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  events: {
    queueName: string;
  };
}

/** Split a comma-separated env value, dropping blanks. */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    chain: {
      rpcUrl: env.RPC_URL || "http://127.0.0.1:8545",
      chainId: parseInteger("CHAIN_ID", env.CHAIN_ID, 31337),
    },
    engine: {
      peggedToken: env.PEGGED_TOKEN_ADDRESS || "",
      custody: env.ENGINE_CUSTODY_ADDRESS || "",
      operatorPrivateKey: env.ENGINE_PRIVATE_KEY || undefined,
      collateralTokens: parseList(env.COLLATERAL_TOKENS),
      priceFeeds: parseList(env.PRICE_FEEDS),
      oracleTimeoutSeconds: parseInteger(
        "ORACLE_TIMEOUT_SECONDS",
        env.ORACLE_TIMEOUT_SECONDS,
        DEFAULT_ORACLE_TIMEOUT_SECONDS
      ),
    },
    postgres: {
      host: env.POSTGRES_HOST || "localhost",
      port: parseInteger("POSTGRES_PORT", env.POSTGRES_PORT, 5432),
      database: env.POSTGRES_DB || "pegmint",
      user: env.POSTGRES_USER || "pegmint",
      password: env.POSTGRES_PASSWORD || "change_me",
    },
    redis: {
      host: env.REDIS_HOST || "localhost",
      port: parseInteger("REDIS_PORT", env.REDIS_PORT, 6379),
      password: env.REDIS_PASSWORD || undefined,
    },
    events: {
      queueName: env.EVENTS_QUEUE || DEFAULT_EVENTS_QUEUE,
    },
  };
}
