import {
  BaseError,
  ContractFunctionRevertedError,
  ExecutionRevertedError,
  RawContractError,
  bytesToHex,
  createPublicClient,
  createWalletClient,
  http,
  type Account,
  type Address,
  type Chain,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";
import {
  encodePayload,
  type PayloadInput,
  type PayloadLayout,
} from "../executor/payload";

export interface ExecutorClientOptions {
  /** Deployed executor contract */
  contract: Address;
  /** Holder of the executor role */
  account: Account | Address;
  chain?: Chain;
  rpcUrl?: string;
  /** Overrides the HTTP transport built from `rpcUrl` */
  transport?: Transport;
  layout?: PayloadLayout;
}

export interface ExecutionTransaction {
  to: Address;
  data: Hex;
}

export type SimulationResult = { ok: true } | { ok: false; reason: string };

/**
 * Submits payloads to a deployed executor. The calldata is the bare payload:
 * no selector and no ABI envelope.
 */
export class ExecutorClient {
  private publicClient: PublicClient;
  private walletClient: WalletClient;
  private readonly account: Account | Address;
  private readonly chain: Chain | undefined;
  readonly contract: Address;
  readonly layout: PayloadLayout;

  constructor(options: ExecutorClientOptions) {
    const transport = options.transport ?? http(options.rpcUrl);
    this.contract = options.contract;
    this.account = options.account;
    this.chain = options.chain;
    this.layout = options.layout ?? "current";

    this.publicClient = createPublicClient({
      chain: options.chain,
      transport,
    });

    this.walletClient = createWalletClient({
      account: options.account,
      chain: options.chain,
      transport,
    });
  }

  buildTransaction(request: PayloadInput): ExecutionTransaction {
    return {
      to: this.contract,
      data: bytesToHex(encodePayload(request, this.layout)),
    };
  }

  async currentBlock(): Promise<bigint> {
    return this.publicClient.getBlockNumber();
  }

  /**
   * Dry-run the payload against the latest block. Only a revert resolves
   * with `ok: false`; transport and node failures reject.
   */
  async simulate(request: PayloadInput): Promise<SimulationResult> {
    const tx = this.buildTransaction(request);
    try {
      await this.publicClient.call({
        account: this.account,
        to: tx.to,
        data: tx.data,
      });
      return { ok: true };
    } catch (error) {
      const revert = error instanceof BaseError ? error.walk(isRevert) : null;
      if (revert instanceof BaseError) {
        return { ok: false, reason: revert.shortMessage };
      }
      throw error;
    }
  }

  async submit(request: PayloadInput): Promise<Hex> {
    const tx = this.buildTransaction(request);
    console.log(`📤 Sending ${(tx.data.length - 2) / 2}-byte payload to ${tx.to}`);
    return this.walletClient.sendTransaction({
      account: this.account,
      chain: this.chain ?? null,
      to: tx.to,
      data: tx.data,
    });
  }
}

function isRevert(error: unknown): boolean {
  return (
    error instanceof ExecutionRevertedError ||
    error instanceof ContractFunctionRevertedError ||
    (error instanceof RawContractError && error.data !== undefined)
  );
}
