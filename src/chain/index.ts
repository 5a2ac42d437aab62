export { Ledger } from "./ledger";
export type { LedgerOptions } from "./ledger";
export { Contract, isNativeReceiver } from "./contract";
export type { NativeReceiver } from "./contract";
export { ExecutionReverted } from "./errors";
export { TransientSlot } from "./transient";
export {
  Erc20Token,
  NoReturnToken,
  FalseReturningToken,
  isToken,
} from "./token";
export type { TokenLike, TransferReturn } from "./token";
export {
  FlashSwapPool,
  ConstantProductCurve,
  FixedRateCurve,
  isSwapVenue,
  isSwapCallbackReceiver,
} from "./pool";
export type {
  SwapVenue,
  SwapCallbackReceiver,
  PriceCurve,
} from "./pool";
export type {
  CallFrame,
  Checkpointed,
  LogRecord,
  LogValue,
  Receipt,
} from "./types";
