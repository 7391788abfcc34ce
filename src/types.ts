/**
 * Plain records handed from the subgraph client to the math core.
 * Integer fields that can exceed 2^53 are already parsed to bigint.
 */

export interface TokenInfo {
  symbol: string;
  decimals: number;
}

export interface PoolDayVolume {
  /** Unix seconds, start of the UTC day */
  date: number;
  volumeUSD: number;
}

export interface PoolSnapshot {
  id: string;
  tick: number;
  /** Active liquidity in the current range */
  liquidity: bigint;
  /** Q64.96 fixed-point */
  sqrtPriceX96: bigint;
  feeTier: number;
  token0: TokenInfo;
  token1: TokenInfo;
  /** Newest first, present only when requested */
  dayData?: PoolDayVolume[];
}

export interface TickRecord {
  tickIdx: number;
  liquidityNet: bigint;
}

export interface PositionRecord {
  id: string;
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
}

/** A single position joined with its pool id and tokens. */
export interface PositionDetails extends PositionRecord {
  poolId: string;
  token0: TokenInfo;
  token1: TokenInfo;
}
