import type { PoolLiquidity } from "./types";

const MAX_UINT128 = 2n ** 128n - 1n;

const DEEP_LIQUIDITY = 10n ** 18n;
const MEDIUM_LIQUIDITY = 10n ** 16n;

/**
 * Share of the expected profit demanded as a floor, in basis points,
 * picked by the shallower of the two pools.
 */
export function slippageFactorBps(liquidity: PoolLiquidity): bigint {
  const shallowest = liquidity.buy < liquidity.sell ? liquidity.buy : liquidity.sell;

  if (shallowest >= DEEP_LIQUIDITY) return 9990n;
  if (shallowest >= MEDIUM_LIQUIDITY) return 9950n;
  return 9500n;
}

/** Minimum profit for the payload, clamped to its uint128 field */
export function deriveMinProfit(expectedProfit: bigint, factorBps: bigint): bigint {
  if (expectedProfit <= 0n) return 0n;
  const floor = (expectedProfit * factorBps) / 10_000n;
  return floor > MAX_UINT128 ? MAX_UINT128 : floor;
}
