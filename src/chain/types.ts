import type { Address } from "viem";
import type { ExecutionReverted } from "./errors";

// ============== Call Frames ==============

export interface CallFrame {
  /** Identity of the immediate caller */
  sender: Address;
  /** Contract currently executing */
  self: Address;
  /** Native currency attached to the call */
  value: bigint;
}

// ============== Records ==============

export type LogValue = Address | bigint | boolean;

export interface LogRecord {
  address: Address;
  name: string;
  args: Readonly<Record<string, LogValue>>;
}

// ============== Receipts ==============

export type Receipt<T> =
  | {
      status: "success";
      blockNumber: bigint;
      result: T;
      logs: LogRecord[];
    }
  | {
      status: "reverted";
      blockNumber: bigint;
      error: ExecutionReverted;
    };

// ============== State Tracking ==============

/** A component whose state is restored when a transaction reverts */
export interface Checkpointed {
  /** Capture current state; the returned function restores it */
  checkpoint(): () => void;
}

export interface Resettable {
  reset(): void;
}
