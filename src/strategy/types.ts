import type { Address } from "viem";
import type { SwapDirection } from "../executor/payload";

/** Which venue sells the base asset cheaper */
export type ArbDirection = "BUY_A_SELL_B" | "BUY_B_SELL_A";

export interface ArbitrageSignal {
  profitable: boolean;
  direction: ArbDirection | "NO_OP";
  /** (priceB - priceA) / priceA in basis points */
  spreadBps: bigint;
}

export interface SwapLegs {
  directionA: SwapDirection;
  directionB: SwapDirection;
  owedAsset: Address;
  receivedAsset: Address;
}

export interface PairConfig {
  /** Asset priced by the venues, e.g. WETH */
  base: Address;
  /** Asset prices are quoted in, e.g. USDC */
  quote: Address;
  /** Whether the base asset is token0 on both venues */
  token0IsBase: boolean;
}

export interface PoolLiquidity {
  buy: bigint;
  sell: bigint;
}
