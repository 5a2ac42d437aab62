import { getAddress, getContractAddress, type Address } from "viem";
import { ExecutionReverted } from "./errors";
import { isNativeReceiver, type Contract } from "./contract";
import { TransientSlot } from "./transient";
import type {
  CallFrame,
  Checkpointed,
  LogRecord,
  Receipt,
  Resettable,
} from "./types";

export interface LedgerOptions {
  /** Height the ledger starts at (default: 1) */
  blockNumber?: bigint;
}

/**
 * In-process execution environment with all-or-nothing transactions.
 *
 * A top-level transaction either commits every state change and record it
 * produced, or restores every tracked component to where it was before the
 * transaction started. Nested calls share the outcome of their enclosing
 * transaction; there is no partial commit.
 */
export class Ledger {
  private height: bigint;
  private readonly contracts = new Map<Address, Contract>();
  private readonly nonces = new Map<Address, bigint>();
  private native = new Map<Address, bigint>();
  private readonly tracked: Checkpointed[] = [];
  private readonly transient: Resettable[] = [];
  private readonly frames: CallFrame[] = [];
  private pending: LogRecord[] = [];

  /** Records of every committed transaction, in order */
  readonly history: LogRecord[] = [];

  constructor(options: LedgerOptions = {}) {
    this.height = options.blockNumber ?? 1n;
  }

  // ============== Blocks ==============

  get blockNumber(): bigint {
    return this.height;
  }

  mine(blocks: bigint = 1n): bigint {
    if (blocks < 0n) {
      throw new Error(`Cannot mine a negative number of blocks: ${blocks}`);
    }
    this.height += blocks;
    return this.height;
  }

  // ============== Deployment ==============

  /** Assign an address to a freshly constructed contract */
  register(contract: Contract, deployer: Address): Address {
    const from = getAddress(deployer);
    const nonce = this.nonces.get(from) ?? 0n;
    this.nonces.set(from, nonce + 1n);

    const address = getContractAddress({ from, nonce });
    this.contracts.set(address, contract);
    return address;
  }

  contractAt(address: Address): Contract | undefined {
    return this.contracts.get(getAddress(address));
  }

  /** Look up a contract and check it exposes the expected interface */
  resolve<C extends Contract>(
    address: Address,
    matches: (contract: Contract) => contract is C,
    label: string,
  ): C {
    const contract = this.contractAt(address);
    if (!contract) {
      throw new ExecutionReverted("NoCode", `No ${label} deployed at ${address}`);
    }
    if (!matches(contract)) {
      throw new ExecutionReverted(
        "InterfaceMismatch",
        `Contract at ${address} is not a ${label}`,
      );
    }
    return contract;
  }

  /** Include a component in transaction rollback */
  track(component: Checkpointed): void {
    this.tracked.push(component);
  }

  transientSlot<T>(): TransientSlot<T> {
    const slot = new TransientSlot<T>();
    this.transient.push(slot);
    return slot;
  }

  // ============== Native Currency ==============

  balanceOf(address: Address): bigint {
    return this.native.get(getAddress(address)) ?? 0n;
  }

  /** Set a native balance directly, outside any transaction */
  fund(address: Address, amount: bigint): void {
    this.native.set(getAddress(address), amount);
  }

  /**
   * Send native currency. Contracts must accept it through `receive`;
   * plain accounts are credited directly.
   */
  transferNative(from: Address, to: Address, amount: bigint): void {
    const target = this.contractAt(to);
    if (!target) {
      this.moveNative(from, to, amount);
      return;
    }
    if (!isNativeReceiver(target)) {
      throw new ExecutionReverted(
        "NativeTransferRejected",
        `Contract at ${to} does not accept native currency`,
      );
    }
    this.call(from, target, (receiver) => receiver.receive(), amount);
  }

  private moveNative(from: Address, to: Address, amount: bigint): void {
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new ExecutionReverted(
        "InsufficientNativeBalance",
        `${from} holds ${available}, needs ${amount}`,
      );
    }
    this.native.set(getAddress(from), available - amount);
    this.native.set(getAddress(to), this.balanceOf(to) + amount);
  }

  // ============== Calls ==============

  /** Current call frame; only valid while a transaction is executing */
  frame(): CallFrame {
    const current = this.frames[this.frames.length - 1];
    if (!current) {
      throw new Error("No active call frame: contract invoked outside a transaction");
    }
    return current;
  }

  call<C extends Contract, R>(
    from: Address,
    target: C,
    invoke: (contract: C) => R,
    value: bigint = 0n,
  ): R {
    if (value > 0n) {
      this.moveNative(from, target.address, value);
    }
    this.frames.push({ sender: getAddress(from), self: target.address, value });
    try {
      return invoke(target);
    } finally {
      this.frames.pop();
    }
  }

  emit(record: LogRecord): void {
    this.pending.push(record);
  }

  // ============== Transactions ==============

  /** Execute a top-level call and commit its effects if it does not revert */
  transact<C extends Contract, R>(
    from: Address,
    target: C,
    invoke: (contract: C) => R,
    value: bigint = 0n,
  ): Receipt<R> {
    return this.execute(from, target, invoke, value, true);
  }

  /** Execute a top-level call and discard its effects either way */
  simulate<C extends Contract, R>(
    from: Address,
    target: C,
    invoke: (contract: C) => R,
    value: bigint = 0n,
  ): Receipt<R> {
    return this.execute(from, target, invoke, value, false);
  }

  private execute<C extends Contract, R>(
    from: Address,
    target: C,
    invoke: (contract: C) => R,
    value: bigint,
    commit: boolean,
  ): Receipt<R> {
    if (this.frames.length > 0) {
      throw new Error("A transaction is already executing");
    }

    const restores = [
      this.checkpointNative(),
      ...this.tracked.map((component) => component.checkpoint()),
    ];
    const rollback = () => {
      for (const restore of restores.reverse()) restore();
    };
    const blockNumber = this.height;
    this.pending = [];

    try {
      const result = this.call(from, target, invoke, value);
      const logs = this.pending;
      if (commit) {
        this.history.push(...logs);
      } else {
        rollback();
      }
      return { status: "success", blockNumber, result, logs };
    } catch (error) {
      rollback();
      if (error instanceof ExecutionReverted) {
        return { status: "reverted", blockNumber, error };
      }
      throw error;
    } finally {
      this.pending = [];
      for (const slot of this.transient) slot.reset();
    }
  }

  private checkpointNative(): () => void {
    const snapshot = new Map(this.native);
    return () => {
      this.native = snapshot;
    };
  }
}
