import type { Address, Hex } from "viem";
import type { Ledger } from "./ledger";
import { Contract } from "./contract";
import { ExecutionReverted } from "./errors";
import { isToken } from "./token";
import type { Checkpointed } from "./types";

// ============== Interfaces ==============

export interface SwapCallbackReceiver {
  /**
   * Invoked by a venue after it has delivered the output of a swap.
   * A positive delta is owed to the venue, a negative one was paid out.
   */
  swapCallback(amount0Delta: bigint, amount1Delta: bigint, data: Hex): void;
}

export interface SwapVenue {
  readonly token0: Address;
  readonly token1: Address;
  swap(
    recipient: Address,
    zeroForOne: boolean,
    amountIn: bigint,
    data: Hex,
  ): readonly [bigint, bigint];
}

export function isSwapVenue(contract: Contract): contract is Contract & SwapVenue {
  return "swap" in contract && typeof contract.swap === "function";
}

export function isSwapCallbackReceiver(
  contract: Contract,
): contract is Contract & SwapCallbackReceiver {
  return (
    "swapCallback" in contract && typeof contract.swapCallback === "function"
  );
}

// ============== Pricing ==============

export interface PriceCurve {
  quote(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    zeroForOne: boolean,
  ): bigint;
}

/** x * y = k with the fee taken from the input */
export class ConstantProductCurve implements PriceCurve {
  constructor(readonly feeBps: bigint = 30n) {}

  quote(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    const amountInWithFee = amountIn * (10_000n - this.feeBps);
    return (
      (amountInWithFee * reserveOut) / (reserveIn * 10_000n + amountInWithFee)
    );
  }
}

/** Fixed price of token0 in token1, `numerator / denominator` */
export class FixedRateCurve implements PriceCurve {
  constructor(
    readonly numerator: bigint,
    readonly denominator: bigint = 1n,
  ) {
    if (numerator <= 0n || denominator <= 0n) {
      throw new Error("FixedRateCurve: rate must be positive");
    }
  }

  quote(
    amountIn: bigint,
    _reserveIn: bigint,
    _reserveOut: bigint,
    zeroForOne: boolean,
  ): bigint {
    return zeroForOne
      ? (amountIn * this.numerator) / this.denominator
      : (amountIn * this.denominator) / this.numerator;
  }
}

// ============== Pool ==============

/**
 * Two-token venue with flash-swap settlement: the output is delivered
 * first, the caller is called back, and the input must have arrived by the
 * time the callback returns. Reserves are the pool's own token balances.
 */
export class FlashSwapPool extends Contract implements SwapVenue, Checkpointed {
  private curve: PriceCurve;

  constructor(
    chain: Ledger,
    deployer: Address,
    readonly token0: Address,
    readonly token1: Address,
    curve: PriceCurve,
  ) {
    super(chain, deployer);
    this.curve = curve;
    chain.track(this);
  }

  /** Replace the pricing curve between transactions */
  reprice(curve: PriceCurve): void {
    this.curve = curve;
  }

  reserves(): [bigint, bigint] {
    return [this.reserveOf(this.token0), this.reserveOf(this.token1)];
  }

  quote(zeroForOne: boolean, amountIn: bigint): bigint {
    const [reserve0, reserve1] = this.reserves();
    return zeroForOne
      ? this.curve.quote(amountIn, reserve0, reserve1, true)
      : this.curve.quote(amountIn, reserve1, reserve0, false);
  }

  swap(
    recipient: Address,
    zeroForOne: boolean,
    amountIn: bigint,
    data: Hex,
  ): readonly [bigint, bigint] {
    if (amountIn <= 0n) {
      throw new ExecutionReverted("ZeroAmountIn");
    }

    const [tokenIn, tokenOut] = zeroForOne
      ? [this.token0, this.token1]
      : [this.token1, this.token0];
    const inToken = this.chain.resolve(tokenIn, isToken, "token");
    const outToken = this.chain.resolve(tokenOut, isToken, "token");

    const reserveIn = inToken.balanceOf(this.address);
    const reserveOut = outToken.balanceOf(this.address);
    const amountOut = this.quote(zeroForOne, amountIn);
    if (amountOut <= 0n || amountOut > reserveOut) {
      throw new ExecutionReverted(
        "InsufficientLiquidity",
        `Pool ${this.address} cannot pay ${amountOut} out of ${reserveOut}`,
      );
    }

    if (this.call(outToken, (token) => token.transfer(recipient, amountOut)) === false) {
      throw new ExecutionReverted("TransferFailed");
    }

    const deltas = zeroForOne
      ? ([amountIn, -amountOut] as const)
      : ([-amountOut, amountIn] as const);

    const payer = this.chain.resolve(
      this.sender,
      isSwapCallbackReceiver,
      "swap callback receiver",
    );
    this.call(payer, (receiver) =>
      receiver.swapCallback(deltas[0], deltas[1], data),
    );

    if (inToken.balanceOf(this.address) < reserveIn + amountIn) {
      throw new ExecutionReverted(
        "InsufficientInputAmount",
        `Pool ${this.address} expected ${amountIn} of ${tokenIn}`,
      );
    }

    this.emit("Swap", {
      sender: this.sender,
      recipient,
      amount0: deltas[0],
      amount1: deltas[1],
    });
    return deltas;
  }

  checkpoint(): () => void {
    const curve = this.curve;
    return () => {
      this.curve = curve;
    };
  }

  private reserveOf(token: Address): bigint {
    return this.chain.resolve(token, isToken, "token").balanceOf(this.address);
  }
}
