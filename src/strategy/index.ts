export { checkArbitrage, resolveLegs } from "./arbitrage";
export { slippageFactorBps, deriveMinProfit } from "./minProfit";
export {
  ArbitrageRequestSchema,
  buildArbitrageRequest,
  deadlineFor,
  parseArbitrageRequest,
} from "./request";
export type { ArbitrageRequestInput, BuildRequestParams } from "./request";
export type {
  ArbDirection,
  ArbitrageSignal,
  PairConfig,
  PoolLiquidity,
  SwapLegs,
} from "./types";
