import { isAddressEqual, type Address } from "viem";
import { ArbitrageError, type ArbitrageErrorCode } from "./errors";
import type { ArbitrageRequest, SwapDirection } from "./payload";

export type SettlementPhase =
  | "IDLE"
  | "CONTEXT_SET"
  | "AWAITING_VENUE_A_CALLBACK"
  | "AWAITING_VENUE_B_CALLBACK"
  | "SETTLED";

export interface ExecutionContext {
  expectedVenue: Address;
  counterpartyVenue: Address;
  counterpartyDirection: SwapDirection;
  owedAsset: Address;
  receivedAsset: Address;
}

export type CallbackLeg =
  | { kind: "venueA"; venue: Address }
  | { kind: "venueB"; venue: Address };

/**
 * State of one two-venue exchange, from context set-up to settlement.
 * Whichever leg holds control advances it; the enclosing invocation drops
 * it on exit.
 */
export class ArbitrageSession {
  private current: SettlementPhase = "IDLE";

  constructor(readonly context: Readonly<ExecutionContext>) {}

  static open(request: ArbitrageRequest): ArbitrageSession {
    const session = new ArbitrageSession({
      expectedVenue: request.venueA,
      counterpartyVenue: request.venueB,
      counterpartyDirection: request.directionB,
      owedAsset: request.owedAsset,
      receivedAsset: request.receivedAsset,
    });
    session.transition("IDLE", "CONTEXT_SET");
    return session;
  }

  get phase(): SettlementPhase {
    return this.current;
  }

  transition(from: SettlementPhase, to: SettlementPhase): void {
    this.require(from, "UnexpectedCallback");
    this.current = to;
  }

  require(phase: SettlementPhase, code: ArbitrageErrorCode): void {
    if (this.current !== phase) {
      throw new ArbitrageError(code, `Expected phase ${phase}, at ${this.current}`);
    }
  }

  /** Identify the leg a callback belongs to from the caller's identity */
  route(caller: Address): CallbackLeg {
    if (isAddressEqual(caller, this.context.expectedVenue)) {
      return { kind: "venueA", venue: this.context.expectedVenue };
    }
    if (isAddressEqual(caller, this.context.counterpartyVenue)) {
      return { kind: "venueB", venue: this.context.counterpartyVenue };
    }
    throw new ArbitrageError(
      "UnknownCallbackCaller",
      `${caller} is not a venue of the current arbitrage`,
    );
  }
}

/** Split a venue's signed deltas into what is owed to it and what it paid */
export function splitDeltas(
  amount0Delta: bigint,
  amount1Delta: bigint,
): { owed: bigint; received: bigint } {
  if (amount0Delta > 0n) {
    return { owed: amount0Delta, received: amount1Delta < 0n ? -amount1Delta : 0n };
  }
  if (amount1Delta > 0n) {
    return { owed: amount1Delta, received: amount0Delta < 0n ? -amount0Delta : 0n };
  }
  throw new ArbitrageError(
    "InvalidDeltas",
    `Neither delta is owed: ${amount0Delta}, ${amount1Delta}`,
  );
}
