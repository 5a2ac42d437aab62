import type { ArbDirection, ArbitrageSignal, PairConfig, SwapLegs } from "./types";

/**
 * Compare the base asset's price on both venues against a spread floor.
 * Prices are in quote-asset units per base unit; the spread is truncated
 * toward zero.
 */
export function checkArbitrage(
  priceA: bigint,
  priceB: bigint,
  minSpreadBps: bigint,
): ArbitrageSignal {
  if (priceA <= 0n || priceB <= 0n) {
    throw new Error(`Venue prices must be positive, got ${priceA} and ${priceB}`);
  }

  const spreadBps = ((priceB - priceA) * 10_000n) / priceA;
  const magnitude = spreadBps < 0n ? -spreadBps : spreadBps;

  if (spreadBps === 0n || magnitude < minSpreadBps) {
    return { profitable: false, direction: "NO_OP", spreadBps };
  }

  return {
    profitable: true,
    direction: spreadBps > 0n ? "BUY_A_SELL_B" : "BUY_B_SELL_A",
    spreadBps,
  };
}

/**
 * Swap directions and asset roles for a direction.
 *
 * Buying base on A means flash-swapping quote for base on A (owe quote,
 * receive base) and selling that base on B. Buying on B runs the pair the
 * other way round: owe base to A, receive quote, and spend it on B.
 */
export function resolveLegs(direction: ArbDirection, pair: PairConfig): SwapLegs {
  const buyOnA = direction === "BUY_A_SELL_B";
  const oweQuote = buyOnA;

  // Getting token0 out of a pool is a oneForZero swap
  const baseOut = pair.token0IsBase ? 1 : 0;
  const baseIn = pair.token0IsBase ? 0 : 1;

  return {
    directionA: buyOnA ? baseOut : baseIn,
    directionB: buyOnA ? baseIn : baseOut,
    owedAsset: oweQuote ? pair.quote : pair.base,
    receivedAsset: oweQuote ? pair.base : pair.quote,
  };
}
