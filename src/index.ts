export {
  D,
  TICK_BASE,
  DEFAULT_TICK_SPACING,
  tickToPrice,
  tickToSqrtPrice,
  priceToTick,
  feeTierToSpacing,
  rangeBottomTick,
  sqrtPriceX96ToSqrtPrice,
  sqrtPriceX96ToPrice,
  adjustPriceForDecimals,
  toHumanAmount,
} from "./tick_math";
export type { Numeric } from "./tick_math";

export {
  liquidityFromAmount0,
  liquidityFromAmount1,
  liquidityFromAmounts,
  amount0FromLiquidity,
  amount1FromLiquidity,
  amountsFromLiquidity,
  amountDeltasForPriceMove,
  lockedAmount0,
  lockedAmount1,
} from "./liquidity_math";
export type { TokenAmounts } from "./liquidity_math";

export {
  lowerBoundFromLiquidity,
  lowerBoundFromAmounts,
  upperBoundFromLiquidity,
  upperBoundFromAmounts,
  upperRatio,
  lowerRatio,
  crossCheckBounds,
  DEFAULT_BOUND_TOLERANCE,
} from "./bound_solver";
export type { BoundCheckInput, BoundCheckResult } from "./bound_solver";

export { aggregateRangeDistribution, currentRangeAmounts } from "./range_distribution";
export type {
  RangeAmounts,
  RangeDistribution,
  RangeDistributionInput,
  RangePosition,
  CurrentRangeInput,
  CurrentRangeAmounts,
} from "./range_distribution";

export { valuePosition, summarizePositions } from "./position_valuation";
export type { PositionStatus, PositionValue, PositionsSummary, PoolPrice, ValuedPosition } from "./position_valuation";

export { currentRangeLocked, impliedVolatility, dailyImpliedVolatility } from "./implied_volatility";
export type { DailyVolatility } from "./implied_volatility";

export { STABLECOINS, shouldInvertPrice, displayPrice } from "./price_display";
export type { DisplayPrice } from "./price_display";

export { DomainError, SubgraphError, NotFoundError } from "./errors";
export type { DomainErrorKind, PrecisionWarning } from "./errors";

export { SubgraphClient } from "./subgraph_client";
export type { SubgraphClientConfig, FetchFn, Logger } from "./subgraph_client";
export { loadSubgraphConfig } from "./config/subgraph";
export type { SubgraphConfig } from "./config/subgraph";

export type { TokenInfo, PoolSnapshot, PoolDayVolume, TickRecord, PositionRecord, PositionDetails } from "./types";

export {
  runRangeReport,
  runCurrentRangeReport,
  runPositionsReport,
  runPositionReport,
  runVolatilityReport,
  runLiquidityExamples,
} from "./pool_report";
export type { PoolDataSource, LineSink } from "./pool_report";
