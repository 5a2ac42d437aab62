import { ExecutionReverted } from "../chain/errors";
import type { Receipt } from "../chain/types";

export const ARBITRAGE_ERROR_CODES = [
  "Unauthorized",
  "Reentrancy",
  "ZeroAmount",
  "DeadlineExpired",
  "UnknownCallbackCaller",
  "NoProfit",
  "InsufficientProfit",
  "TransferFailed",
  "ZeroBalance",
  "ZeroAddress",
  "MalformedPayload",
  "InvalidDirection",
  "UnexpectedCallback",
  "IncompleteSettlement",
  "InvalidDeltas",
] as const;

export type ArbitrageErrorCode = (typeof ARBITRAGE_ERROR_CODES)[number];

/** Named abort condition of the executor */
export class ArbitrageError extends ExecutionReverted {
  constructor(
    readonly code: ArbitrageErrorCode,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(code, message ?? code, options);
    this.name = "ArbitrageError";
  }
}

export function isArbitrageError(
  error: unknown,
  code?: ArbitrageErrorCode,
): error is ArbitrageError {
  return (
    error instanceof ArbitrageError && (code === undefined || error.code === code)
  );
}

/** Reason a receipt reverted with, or undefined when it succeeded */
export function revertReason(receipt: Receipt<unknown>): string | undefined {
  return receipt.status === "reverted" ? receipt.error.reason : undefined;
}
