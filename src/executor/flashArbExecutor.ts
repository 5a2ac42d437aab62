import { isAddressEqual, zeroAddress, type Address, type Hex } from "viem";
import type { Ledger } from "../chain/ledger";
import { Contract, type NativeReceiver } from "../chain/contract";
import { isSwapVenue, type SwapCallbackReceiver } from "../chain/pool";
import { isToken } from "../chain/token";
import type { TransientSlot } from "../chain/transient";
import { ArbitrageError } from "./errors";
import { ExecutionGuard, assertRoles, type RoleIdentity } from "./guard";
import {
  decodePayload,
  isZeroForOne,
  type PayloadLayout,
  type SwapDirection,
  type TruncationPolicy,
} from "./payload";
import { ArbitrageSession, splitDeltas } from "./session";
import { safeTransfer } from "./transfer";
import { realizedProfit } from "./verifier";

/** Where realized profit goes once verified */
export type ProfitPolicy = "retain" | "forward";

export interface ExecutorOptions {
  layout?: PayloadLayout;
  truncation?: TruncationPolicy;
  profitPolicy?: ProfitPolicy;
}

export interface ExecutionOutcome {
  profit: bigint;
  forwarded: boolean;
}

/**
 * Two-venue flash-swap arbitrage executor.
 *
 * `execute` takes the raw payload, borrows from venue A, sells the
 * proceeds on venue B from inside venue A's callback, repays both, and
 * keeps the surplus. Both venues call back through `swapCallback`, which
 * tells the legs apart by caller identity.
 */
export class FlashArbExecutor
  extends Contract
  implements SwapCallbackReceiver, NativeReceiver
{
  readonly layout: PayloadLayout;
  readonly truncation: TruncationPolicy;
  readonly profitPolicy: ProfitPolicy;
  private readonly guard: ExecutionGuard;
  private readonly session: TransientSlot<ArbitrageSession>;

  constructor(
    chain: Ledger,
    deployer: Address,
    roles: RoleIdentity,
    options: ExecutorOptions = {},
  ) {
    assertRoles(roles);
    super(chain, deployer);
    this.layout = options.layout ?? "current";
    this.truncation = options.truncation ?? "reject";
    this.profitPolicy = options.profitPolicy ?? "retain";
    this.guard = new ExecutionGuard(chain, { ...roles });
    this.session = chain.transientSlot<ArbitrageSession>();
  }

  get executor(): Address {
    return this.guard.roles.executor;
  }

  get admin(): Address {
    return this.guard.roles.admin;
  }

  /** True only while an invocation is in flight */
  get busy(): boolean {
    return this.guard.locked || this.session.get() !== undefined;
  }

  // ============== Arbitrage ==============

  execute(payload: Uint8Array | Hex): ExecutionOutcome {
    this.guard.requireExecutor(this.sender);
    return this.guard.withLock(
      () => this.run(payload),
      () => this.session.reset(),
    );
  }

  private run(payload: Uint8Array | Hex): ExecutionOutcome {
    const request = decodePayload(payload, {
      layout: this.layout,
      truncation: this.truncation,
    });
    this.guard.requireNotExpired(request.deadline, this.chain.blockNumber);

    const session = ArbitrageSession.open(request);
    this.session.set(session);

    const before = this.assetBalance(request.owedAsset);
    session.transition("CONTEXT_SET", "AWAITING_VENUE_A_CALLBACK");
    this.swapOn(request.venueA, request.directionA, request.amount);
    session.require("SETTLED", "IncompleteSettlement");
    const after = this.assetBalance(request.owedAsset);

    const profit = realizedProfit(before, after, request.minProfit);
    this.emit("ArbitrageExecuted", {
      venueA: request.venueA,
      venueB: request.venueB,
      amount: request.amount,
      profit,
    });

    if (this.profitPolicy === "retain") {
      return { profit, forwarded: false };
    }

    safeTransfer(this.chain, this.address, request.owedAsset, this.admin, profit);
    this.emit("ProfitForwarded", {
      asset: request.owedAsset,
      to: this.admin,
      amount: profit,
    });
    return { profit, forwarded: true };
  }

  swapCallback(amount0Delta: bigint, amount1Delta: bigint, _data: Hex): void {
    const session = this.session.get();
    if (!session) {
      throw new ArbitrageError(
        "UnknownCallbackCaller",
        `${this.sender} called back with no arbitrage in progress`,
      );
    }

    const leg = session.route(this.sender);
    const { owed, received } = splitDeltas(amount0Delta, amount1Delta);
    const { context } = session;

    switch (leg.kind) {
      case "venueA":
        session.transition(
          "AWAITING_VENUE_A_CALLBACK",
          "AWAITING_VENUE_B_CALLBACK",
        );
        // Venue B calls back into this contract before returning
        this.swapOn(
          context.counterpartyVenue,
          context.counterpartyDirection,
          received,
        );
        session.require("SETTLED", "IncompleteSettlement");
        safeTransfer(this.chain, this.address, context.owedAsset, leg.venue, owed);
        return;

      case "venueB":
        session.transition("AWAITING_VENUE_B_CALLBACK", "SETTLED");
        safeTransfer(
          this.chain,
          this.address,
          context.receivedAsset,
          leg.venue,
          owed,
        );
        return;
    }
  }

  private swapOn(venue: Address, direction: SwapDirection, amount: bigint): void {
    const pool = this.chain.resolve(venue, isSwapVenue, "swap venue");
    this.call(pool, (v) =>
      v.swap(this.address, isZeroForOne(direction), amount, "0x"),
    );
  }

  // ============== Custody ==============

  /** Send the whole balance of `asset` to the admin */
  sweepToken(asset: Address): bigint {
    this.guard.requireAdmin(this.sender);
    const balance = this.assetBalance(asset);
    if (balance === 0n) {
      throw new ArbitrageError("ZeroBalance", `Nothing to sweep for ${asset}`);
    }
    safeTransfer(this.chain, this.address, asset, this.admin, balance);
    return balance;
  }

  /** Send the whole native balance to the admin */
  sweepNative(): bigint {
    this.guard.requireAdmin(this.sender);
    const balance = this.chain.balanceOf(this.address);
    if (balance === 0n) {
      throw new ArbitrageError("ZeroBalance", "No native balance to sweep");
    }
    this.chain.transferNative(this.address, this.admin, balance);
    return balance;
  }

  /** Holdings of `asset`; the zero address stands for native currency */
  balanceOf(asset: Address): bigint {
    if (isAddressEqual(asset, zeroAddress)) {
      return this.chain.balanceOf(this.address);
    }
    return this.assetBalance(asset);
  }

  /** Accepts native currency with no side effects */
  receive(): void {}

  private assetBalance(asset: Address): bigint {
    return this.chain.resolve(asset, isToken, "token").balanceOf(this.address);
  }
}
