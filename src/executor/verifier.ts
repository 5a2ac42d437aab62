import { ArbitrageError } from "./errors";

/**
 * Profit realized between two balance snapshots of the owed asset.
 * Equality with `minProfit` passes; any non-increase fails first.
 */
export function realizedProfit(
  before: bigint,
  after: bigint,
  minProfit: bigint,
): bigint {
  if (after <= before) {
    throw new ArbitrageError("NoProfit", `Balance went from ${before} to ${after}`);
  }
  const profit = after - before;
  if (profit < minProfit) {
    throw new ArbitrageError(
      "InsufficientProfit",
      `Profit ${profit} is below the floor of ${minProfit}`,
    );
  }
  return profit;
}
