import type { Address } from "viem";
import type { Ledger } from "./ledger";
import type { LogValue } from "./types";

export interface NativeReceiver {
  /** Accept native currency sent without calldata */
  receive(): void;
}

export function isNativeReceiver(
  contract: Contract,
): contract is Contract & NativeReceiver {
  return "receive" in contract && typeof contract.receive === "function";
}

/**
 * Base for anything deployed on a {@link Ledger}. The address is derived
 * from the deployer and its nonce at construction time.
 */
export abstract class Contract {
  readonly address: Address;

  constructor(
    protected readonly chain: Ledger,
    deployer: Address,
  ) {
    this.address = chain.register(this, deployer);
  }

  /** Caller of the currently executing frame */
  protected get sender(): Address {
    return this.chain.frame().sender;
  }

  protected call<C extends Contract, R>(
    target: C,
    invoke: (contract: C) => R,
  ): R {
    return this.chain.call(this.address, target, invoke);
  }

  protected emit(name: string, args: Record<string, LogValue>): void {
    this.chain.emit({ address: this.address, name, args });
  }
}
