import { getAddress, pad, toHex, type Address, type Hex } from "viem";
import { Ledger } from "../chain/ledger";
import { Contract } from "../chain/contract";
import { Erc20Token, type TransferReturn } from "../chain/token";
import {
  FixedRateCurve,
  FlashSwapPool,
  isSwapVenue,
  type SwapCallbackReceiver,
  type SwapVenue,
} from "../chain/pool";
import {
  FlashArbExecutor,
  type ExecutionOutcome,
  type ExecutorOptions,
} from "../executor/flashArbExecutor";
import { isArbitrageError, type ArbitrageErrorCode } from "../executor/errors";
import type { PayloadInput } from "../executor/payload";

// ============== Accounts ==============

export function eoa(id: number): Address {
  return getAddress(pad(toHex(id), { size: 20 }));
}

export const DEPLOYER = eoa(0xde);
export const ADMIN = eoa(0xad);
export const EXECUTOR = eoa(0xe0);
export const STRANGER = eoa(0x5e);

// ============== Test Contracts ==============

/** Contract holding the executor role and forwarding payloads to it */
export class Relayer extends Contract {
  relay(target: FlashArbExecutor, payload: Uint8Array): ExecutionOutcome {
    return this.call(target, (executor) => executor.execute(payload));
  }
}

/** Pool that runs a hook before swapping */
export class HookedPool extends FlashSwapPool {
  onSwap?: () => void;

  swap(
    recipient: Address,
    zeroForOne: boolean,
    amountIn: bigint,
    data: Hex,
  ): readonly [bigint, bigint] {
    this.onSwap?.();
    return super.swap(recipient, zeroForOne, amountIn, data);
  }
}

/** Token that runs a hook after every transfer */
export class HookedToken extends Erc20Token {
  onTransfer?: () => void;

  transfer(to: Address, amount: bigint): TransferReturn {
    const result = super.transfer(to, amount);
    this.onTransfer?.();
    return result;
  }
}

/** Venue that accepts a swap and never calls back */
export class SilentVenue extends Contract implements SwapVenue {
  constructor(
    chain: Ledger,
    deployer: Address,
    readonly token0: Address,
    readonly token1: Address,
  ) {
    super(chain, deployer);
  }

  swap(): readonly [bigint, bigint] {
    return [0n, 0n];
  }
}

/** Swaps on a pool and ignores the bill */
export class DeadbeatTrader extends Contract implements SwapCallbackReceiver {
  trade(pool: Address, zeroForOne: boolean, amountIn: bigint): void {
    const venue = this.chain.resolve(pool, isSwapVenue, "swap venue");
    this.call(venue, (v) => v.swap(this.address, zeroForOne, amountIn, "0x"));
  }

  swapCallback(): void {}
}

// ============== Scenario ==============

export interface ScenarioOptions extends ExecutorOptions {
  /** USDC paid per WETH on venue A (default 1000) */
  buyRate?: bigint;
  /** USDC paid per WETH on venue B (default 1050) */
  sellRate?: bigint;
  quoteToken?: typeof Erc20Token;
  baseToken?: typeof Erc20Token;
  poolType?: typeof FlashSwapPool;
  executorRole?: Address;
  /** Deploy onto an existing ledger, e.g. one already holding a relayer */
  ledger?: Ledger;
}

/**
 * WETH/USDC on two fixed-rate venues (token0 = WETH). The default request
 * borrows 1000 USDC worth of WETH on venue A and sells it on venue B.
 */
export function deployScenario(options: ScenarioOptions = {}) {
  const ledger = options.ledger ?? new Ledger({ blockNumber: 100n });
  const BaseToken = options.baseToken ?? Erc20Token;
  const QuoteToken = options.quoteToken ?? Erc20Token;
  const Pool = options.poolType ?? FlashSwapPool;

  const weth = new BaseToken(ledger, DEPLOYER, "WETH", 18);
  const usdc = new QuoteToken(ledger, DEPLOYER, "USDC", 6);

  const venueA = new Pool(
    ledger,
    DEPLOYER,
    weth.address,
    usdc.address,
    new FixedRateCurve(options.buyRate ?? 1000n),
  );
  const venueB = new Pool(
    ledger,
    DEPLOYER,
    weth.address,
    usdc.address,
    new FixedRateCurve(options.sellRate ?? 1050n),
  );

  for (const pool of [venueA, venueB]) {
    weth.mint(pool.address, 1_000n);
    usdc.mint(pool.address, 1_000_000n);
  }

  const executor = new FlashArbExecutor(
    ledger,
    ADMIN,
    { executor: options.executorRole ?? EXECUTOR, admin: ADMIN },
    options,
  );

  const request = (overrides: Partial<PayloadInput> = {}): PayloadInput => ({
    venueA: venueA.address,
    venueB: venueB.address,
    owedAsset: usdc.address,
    receivedAsset: weth.address,
    amount: 1000n,
    directionA: 1,
    directionB: 0,
    minProfit: 1n,
    deadline: ledger.blockNumber + 2n,
    ...overrides,
  });

  return { ledger, weth, usdc, venueA, venueB, executor, request };
}

/** Code of the ArbitrageError thrown by `fn`, if it throws one */
export function thrownCode(fn: () => unknown): ArbitrageErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (isArbitrageError(error)) return error.code;
    throw error;
  }
  return undefined;
}
