import { getAddress, type Address } from "viem";
import type { Ledger } from "./ledger";
import { Contract } from "./contract";
import { ExecutionReverted } from "./errors";
import type { Checkpointed } from "./types";

/** `undefined` models a transfer that returns no data at all */
export type TransferReturn = boolean | undefined;

export interface TokenLike {
  balanceOf(owner: Address): bigint;
  transfer(to: Address, amount: bigint): TransferReturn;
}

export function isToken(contract: Contract): contract is Contract & TokenLike {
  return (
    "transfer" in contract &&
    typeof contract.transfer === "function" &&
    "balanceOf" in contract &&
    typeof contract.balanceOf === "function"
  );
}

/**
 * Fungible asset with the usual transfer convention: reverts when the
 * sender is short, returns `true` otherwise.
 */
export class Erc20Token extends Contract implements TokenLike, Checkpointed {
  private balances = new Map<Address, bigint>();
  private supply = 0n;

  constructor(
    chain: Ledger,
    deployer: Address,
    readonly symbol: string,
    readonly decimals: number = 18,
  ) {
    super(chain, deployer);
    chain.track(this);
  }

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(owner: Address): bigint {
    return this.balances.get(getAddress(owner)) ?? 0n;
  }

  /** Credit an account directly, outside any transaction */
  mint(to: Address, amount: bigint): void {
    this.balances.set(getAddress(to), this.balanceOf(to) + amount);
    this.supply += amount;
  }

  transfer(to: Address, amount: bigint): TransferReturn {
    this.move(this.sender, to, amount);
    return true;
  }

  protected move(from: Address, to: Address, amount: bigint): void {
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new ExecutionReverted(
        "InsufficientBalance",
        `${this.symbol}: ${from} holds ${available}, needs ${amount}`,
      );
    }
    this.balances.set(getAddress(from), available - amount);
    this.balances.set(getAddress(to), this.balanceOf(to) + amount);
    this.emit("Transfer", { from, to, amount });
  }

  checkpoint(): () => void {
    const balances = new Map(this.balances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.supply = supply;
    };
  }
}

/** Transfers succeed silently, without a return value */
export class NoReturnToken extends Erc20Token {
  transfer(to: Address, amount: bigint): TransferReturn {
    this.move(this.sender, to, amount);
    return undefined;
  }
}

/** Reports a short balance by returning `false` instead of reverting */
export class FalseReturningToken extends Erc20Token {
  transfer(to: Address, amount: bigint): TransferReturn {
    if (this.balanceOf(this.sender) < amount) {
      return false;
    }
    this.move(this.sender, to, amount);
    return true;
  }
}
