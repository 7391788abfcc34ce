import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

export interface SubgraphConfig {
  url: string;
  maxRetries: number;
  retryDelayMs: number;
  pageSize: number;
  timeoutMs: number;
}

const DEFAULT_SUBGRAPH_URL = "https://api.thegraph.com/subgraphs/name/uniswap/uniswap-v3";

function intFromEnv(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === "") return fallback;
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Subgraph endpoint settings from environment variables. Pool and position
 * ids are never read from here; callers pass them explicitly.
 */
export function loadSubgraphConfig(env: NodeJS.ProcessEnv = process.env): SubgraphConfig {
  return {
    url: env.SUBGRAPH_URL || DEFAULT_SUBGRAPH_URL,
    maxRetries: intFromEnv(env.SUBGRAPH_MAX_RETRIES, 5, "SUBGRAPH_MAX_RETRIES"),
    retryDelayMs: intFromEnv(env.SUBGRAPH_RETRY_DELAY_MS, 1000, "SUBGRAPH_RETRY_DELAY_MS"),
    pageSize: intFromEnv(env.SUBGRAPH_PAGE_SIZE, 1000, "SUBGRAPH_PAGE_SIZE"),
    timeoutMs: intFromEnv(env.SUBGRAPH_TIMEOUT_MS, 30000, "SUBGRAPH_TIMEOUT_MS"),
  };
}
