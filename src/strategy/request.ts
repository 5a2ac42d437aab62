import { z } from "zod";
import type { Address } from "viem";
import type { ArbitrageRequest } from "../executor/payload";
import { AddressSchema, DirectionSchema, UintSchema } from "../schemas";
import { deriveMinProfit, slippageFactorBps } from "./minProfit";
import type { PoolLiquidity, SwapLegs } from "./types";

const MAX_UINT32 = 2n ** 32n - 1n;

export const ArbitrageRequestSchema = z.object({
  venueA: AddressSchema,
  venueB: AddressSchema,
  owedAsset: AddressSchema,
  receivedAsset: AddressSchema,
  amount: UintSchema.refine((amount) => amount > 0n, "amount must be positive"),
  directionA: DirectionSchema,
  directionB: DirectionSchema,
  minProfit: UintSchema,
  deadline: UintSchema.optional(),
});

export type ArbitrageRequestInput = z.input<typeof ArbitrageRequestSchema>;

/** Last valid block for a request built at `currentBlock` */
export function deadlineFor(currentBlock: bigint, horizonBlocks: number): bigint {
  const deadline = currentBlock + BigInt(horizonBlocks);
  if (deadline > MAX_UINT32) {
    throw new Error(`Deadline block ${deadline} does not fit in 4 bytes`);
  }
  return deadline;
}

/** Validate a JSON request; a missing deadline is derived from the horizon */
export function parseArbitrageRequest(
  raw: unknown,
  currentBlock: bigint,
  horizonBlocks: number,
): ArbitrageRequest {
  const { deadline, ...fields } = ArbitrageRequestSchema.parse(raw);
  return {
    ...fields,
    deadline: deadline ?? deadlineFor(currentBlock, horizonBlocks),
  };
}

export interface BuildRequestParams {
  venueA: Address;
  venueB: Address;
  legs: SwapLegs;
  amount: bigint;
  /** Profit the off-chain model expects, in owed-asset units */
  expectedProfit: bigint;
  liquidity: PoolLiquidity;
  currentBlock: bigint;
  horizonBlocks: number;
}

export function buildArbitrageRequest(params: BuildRequestParams): ArbitrageRequest {
  if (params.amount <= 0n) {
    throw new Error("amount must be positive");
  }
  const factor = slippageFactorBps(params.liquidity);
  return {
    venueA: params.venueA,
    venueB: params.venueB,
    ...params.legs,
    amount: params.amount,
    minProfit: deriveMinProfit(params.expectedProfit, factor),
    deadline: deadlineFor(params.currentBlock, params.horizonBlocks),
  };
}
