export { FlashArbExecutor } from "./flashArbExecutor";
export type {
  ExecutionOutcome,
  ExecutorOptions,
  ProfitPolicy,
} from "./flashArbExecutor";
export {
  ArbitrageError,
  ARBITRAGE_ERROR_CODES,
  isArbitrageError,
  revertReason,
} from "./errors";
export type { ArbitrageErrorCode } from "./errors";
export { ExecutionGuard, assertRoles } from "./guard";
export type { RoleIdentity } from "./guard";
export {
  PAYLOAD_FIELDS,
  PAYLOAD_LENGTH,
  decodePayload,
  encodePayload,
  fieldAt,
  formatPayloadHex,
  isZeroForOne,
} from "./payload";
export type {
  ArbitrageRequest,
  DecodeOptions,
  FieldSpec,
  PayloadField,
  PayloadInput,
  PayloadLayout,
  SwapDirection,
  TruncationPolicy,
} from "./payload";
export { ArbitrageSession, splitDeltas } from "./session";
export type {
  CallbackLeg,
  ExecutionContext,
  SettlementPhase,
} from "./session";
export { realizedProfit } from "./verifier";
export { safeTransfer } from "./transfer";
