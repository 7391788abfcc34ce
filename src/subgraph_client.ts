import type { z } from "zod";
import { loadSubgraphConfig, type SubgraphConfig } from "./config/subgraph";
import { NotFoundError, SubgraphError } from "./errors";
import {
  PoolsResponseSchema,
  PositionDetailsResponseSchema,
  PositionsResponseSchema,
  TicksResponseSchema,
  toPoolSnapshot,
  toPositionDetails,
  toPositionRecord,
  toTickRecord,
} from "./subgraph_schema";
import type { PoolSnapshot, PositionDetails, PositionRecord, TickRecord } from "./types";

/***************** Queries *****************/

export const POOL_QUERY = `query get_pools($pool_id: ID!) {
  pools(where: {id: $pool_id}) {
    id
    tick
    sqrtPrice
    liquidity
    feeTier
    token0 { symbol decimals }
    token1 { symbol decimals }
  }
}`;

export const POOL_WITH_DAY_DATA_QUERY = `query get_pools($pool_id: ID!, $num_days: Int) {
  pools(where: {id: $pool_id}) {
    id
    tick
    sqrtPrice
    liquidity
    feeTier
    token0 { symbol decimals }
    token1 { symbol decimals }
    poolDayData(first: $num_days, orderBy: date, orderDirection: desc) {
      date
      volumeUSD
    }
  }
}`;

export const TICKS_QUERY = `query get_ticks($num_skip: Int, $page_size: Int, $pool_id: ID!) {
  ticks(skip: $num_skip, first: $page_size, where: {pool: $pool_id}) {
    tickIdx
    liquidityNet
  }
}`;

// Open positions only (liquidity > 0)
export const POSITIONS_QUERY = `query get_positions($num_skip: Int, $page_size: Int, $pool_id: ID!) {
  positions(skip: $num_skip, first: $page_size, where: {pool: $pool_id, liquidity_gt: 0}) {
    id
    tickLower { tickIdx }
    tickUpper { tickIdx }
    liquidity
  }
}`;

export const POSITION_QUERY = `query get_position($position_id: ID!) {
  positions(where: {id: $position_id}) {
    id
    liquidity
    tickLower { tickIdx }
    tickUpper { tickIdx }
    pool { id }
    token0 { symbol decimals }
    token1 { symbol decimals }
  }
}`;

/***************** Client *****************/

export type Logger = Pick<Console, "log" | "error">;
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface SubgraphClientConfig extends Partial<SubgraphConfig> {
  fetchFn?: FetchFn;
  logger?: Logger;
}

interface GraphQLResponse {
  data?: unknown;
  errors?: Array<{ message?: string }>;
}

function isGraphQLResponse(value: unknown): value is GraphQLResponse {
  return typeof value === "object" && value !== null;
}

/**
 * Read-only client for a Uniswap-v3-style subgraph. Every record is
 * validated and its integer fields parsed before it leaves this class.
 */
export class SubgraphClient {
  private readonly config: SubgraphConfig;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(config: SubgraphClientConfig = {}) {
    const defaults = loadSubgraphConfig();
    this.config = {
      url: config.url ?? defaults.url,
      maxRetries: config.maxRetries ?? defaults.maxRetries,
      retryDelayMs: config.retryDelayMs ?? defaults.retryDelayMs,
      pageSize: config.pageSize ?? defaults.pageSize,
      timeoutMs: config.timeoutMs ?? defaults.timeoutMs,
    };
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? console;
  }

  async getPool(poolId: string): Promise<PoolSnapshot> {
    const data = await this.query(POOL_QUERY, { pool_id: poolId }, PoolsResponseSchema);
    const pool = data.pools[0];
    if (!pool) {
      throw new NotFoundError("pool", poolId);
    }
    return toPoolSnapshot(poolId, pool);
  }

  /**
   * Pool snapshot plus the last `numDays` days of volume, newest first.
   */
  async getPoolWithDayData(poolId: string, numDays: number): Promise<PoolSnapshot> {
    const data = await this.query(
      POOL_WITH_DAY_DATA_QUERY,
      { pool_id: poolId, num_days: numDays },
      PoolsResponseSchema
    );
    const pool = data.pools[0];
    if (!pool) {
      throw new NotFoundError("pool", poolId);
    }
    return toPoolSnapshot(poolId, pool);
  }

  async getTicks(poolId: string): Promise<TickRecord[]> {
    return this.paginate("ticks", async (skip) => {
      const data = await this.query(
        TICKS_QUERY,
        { num_skip: skip, page_size: this.config.pageSize, pool_id: poolId },
        TicksResponseSchema
      );
      return data.ticks.map(toTickRecord);
    });
  }

  /**
   * tick -> liquidityNet, ready for the range distribution sweep.
   */
  async getTickDeltas(poolId: string): Promise<Map<number, bigint>> {
    const ticks = await this.getTicks(poolId);
    return new Map(ticks.map((t) => [t.tickIdx, t.liquidityNet]));
  }

  async getPositions(poolId: string): Promise<PositionRecord[]> {
    return this.paginate("positions", async (skip) => {
      const data = await this.query(
        POSITIONS_QUERY,
        { num_skip: skip, page_size: this.config.pageSize, pool_id: poolId },
        PositionsResponseSchema
      );
      return data.positions.map(toPositionRecord);
    });
  }

  async getPosition(positionId: string): Promise<PositionDetails> {
    const data = await this.query(
      POSITION_QUERY,
      { position_id: positionId },
      PositionDetailsResponseSchema
    );
    const position = data.positions[0];
    if (!position) {
      throw new NotFoundError("position", positionId);
    }
    return toPositionDetails(position);
  }

  /**
   * Skip-based pagination; stops at the first empty page.
   */
  private async paginate<T>(label: string, fetchPage: (skip: number) => Promise<T[]>): Promise<T[]> {
    const items: T[] = [];
    let skip = 0;
    while (true) {
      this.logger.log(`📥 Querying ${label}, num_skip=${skip}`);
      const page = await fetchPage(skip);
      if (page.length === 0) {
        break;
      }
      items.push(...page);
      skip += page.length;
    }
    return items;
  }

  /**
   * POST a query and validate `data` against `schema`. Transport failures,
   * non-2xx statuses and GraphQL errors are retried up to `maxRetries`
   * times with linear backoff.
   */
  async query<S extends z.ZodTypeAny>(
    query: string,
    variables: Record<string, unknown>,
    schema: S
  ): Promise<z.output<S>> {
    const attempts = this.config.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const data = await this.post(query, variables);
        const parsed = schema.safeParse(data);
        if (!parsed.success) {
          // Malformed payloads will not improve on retry
          throw new SubgraphError(`Unexpected subgraph response: ${parsed.error.message}`, attempt);
        }
        return parsed.data;
      } catch (error) {
        if (error instanceof SubgraphError) {
          throw error;
        }
        lastError = error;
        if (attempt < attempts) {
          this.logger.error(`🔄 Subgraph request failed, retrying (${attempt}/${this.config.maxRetries}): ${errorMessage(error)}`);
          await this.sleep(this.config.retryDelayMs * attempt);
        }
      }
    }

    this.logger.error(`❌ Max retries reached for ${this.config.url}`);
    throw new SubgraphError(`Subgraph request failed after ${attempts} attempts: ${errorMessage(lastError)}`, attempts, {
      cause: lastError,
    });
  }

  private async post(query: string, variables: Record<string, unknown>): Promise<unknown> {
    const response = await this.fetchFn(this.config.url, {
      method: "POST",
      headers: { "Content-Type": "application/json; charset=utf-8" },
      body: JSON.stringify({ query, variables }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    const body: unknown = await response.json();
    if (!isGraphQLResponse(body)) {
      throw new Error("Response body is not an object");
    }
    if (body.errors && body.errors.length > 0) {
      throw new Error(`GraphQL errors: ${body.errors.map((e) => e.message ?? "unknown").join("; ")}`);
    }
    return body.data;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
