import { isAddressEqual, zeroAddress, type Address } from "viem";
import type { Ledger } from "../chain/ledger";
import type { TransientSlot } from "../chain/transient";
import { ArbitrageError } from "./errors";

export interface RoleIdentity {
  /** Allowed to trigger arbitrage attempts */
  executor: Address;
  /** Allowed to move funds out */
  admin: Address;
}

export function assertRoles(roles: RoleIdentity): void {
  if (isAddressEqual(roles.executor, zeroAddress)) {
    throw new ArbitrageError("ZeroAddress", "executor role must be set");
  }
  if (isAddressEqual(roles.admin, zeroAddress)) {
    throw new ArbitrageError("ZeroAddress", "admin role must be set");
  }
}

/**
 * Caller checks, the re-entrancy latch and the deadline bound. The latch
 * lives in a transaction-scoped slot and is released on every exit from
 * {@link ExecutionGuard.withLock}.
 */
export class ExecutionGuard {
  private readonly latch: TransientSlot<boolean>;

  constructor(
    chain: Ledger,
    readonly roles: Readonly<RoleIdentity>,
  ) {
    assertRoles(roles);
    this.latch = chain.transientSlot<boolean>();
  }

  get locked(): boolean {
    return this.latch.get() === true;
  }

  requireExecutor(caller: Address): void {
    if (!isAddressEqual(caller, this.roles.executor)) {
      throw new ArbitrageError("Unauthorized", `${caller} is not the executor`);
    }
  }

  requireAdmin(caller: Address): void {
    if (!isAddressEqual(caller, this.roles.admin)) {
      throw new ArbitrageError("Unauthorized", `${caller} is not the admin`);
    }
  }

  /** Run `body` holding the latch; `release` runs after it however it exits */
  withLock<R>(body: () => R, release: () => void): R {
    if (this.locked) {
      throw new ArbitrageError("Reentrancy", "Arbitrage already in progress");
    }
    this.latch.set(true);
    try {
      return body();
    } finally {
      this.latch.set(false);
      release();
    }
  }

  requireNotExpired(deadline: bigint | null, blockNumber: bigint): void {
    if (deadline !== null && blockNumber > deadline) {
      throw new ArbitrageError(
        "DeadlineExpired",
        `Block ${blockNumber} is past deadline ${deadline}`,
      );
    }
  }
}
