/**
 * Atomic two-venue flash-swap arbitrage.
 *
 * - `chain`: in-process ledger with all-or-nothing transactions, tokens and
 *   flash-swap pools
 * - `executor`: the arbitrage contract and its compact payload codec
 * - `strategy`: helpers for building requests off-chain
 * - `client`: viem client for a deployed executor
 */
export * from "./chain";
export * from "./executor";
export * from "./strategy";
export * from "./client";
export { ConfigSchema, loadConfig, executorOptions } from "./config";
export type { AppConfig } from "./config";
