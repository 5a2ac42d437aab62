import type { Address } from "viem";
import type { Ledger } from "../chain/ledger";
import { ExecutionReverted } from "../chain/errors";
import { isToken } from "../chain/token";
import { ArbitrageError } from "./errors";

/**
 * Move `amount` of `asset` from the executing contract. Succeeds only when
 * the token call does not revert and returns either nothing or `true`.
 */
export function safeTransfer(
  chain: Ledger,
  from: Address,
  asset: Address,
  to: Address,
  amount: bigint,
): void {
  const token = chain.contractAt(asset);
  if (!token || !isToken(token)) {
    throw new ArbitrageError("TransferFailed", `No token deployed at ${asset}`);
  }

  let result: boolean | undefined;
  try {
    result = chain.call(from, token, (t) => t.transfer(to, amount));
  } catch (error) {
    if (error instanceof ExecutionReverted) {
      throw new ArbitrageError(
        "TransferFailed",
        `Transfer of ${amount} ${asset} to ${to} reverted: ${error.reason}`,
        { cause: error },
      );
    }
    throw error;
  }

  if (result === false) {
    throw new ArbitrageError(
      "TransferFailed",
      `Transfer of ${amount} ${asset} to ${to} returned false`,
    );
  }
}
