/**
 * Raised for any condition that aborts the current transaction.
 * The ledger rolls back every tracked component when one escapes a
 * top-level call and reports it on the receipt.
 */
export class ExecutionReverted extends Error {
  constructor(
    public readonly reason: string,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(message ?? reason, options);
    this.name = "ExecutionReverted";
  }
}
