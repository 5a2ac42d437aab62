import { describe, it, expect } from "vitest";
import { encodePayload } from "../executor/payload";
import {
  buildArbitrageRequest,
  checkArbitrage,
  deadlineFor,
  deriveMinProfit,
  parseArbitrageRequest,
  resolveLegs,
  slippageFactorBps,
} from "../strategy";
import { EXECUTOR, deployScenario, eoa } from "./helpers";

const WETH = eoa(0x11);
const USDC = eoa(0x22);

describe("checkArbitrage", () => {
  it("buys on A when B prices the base asset higher", () => {
    expect(checkArbitrage(2000n, 2010n, 30n)).toEqual({
      profitable: true,
      direction: "BUY_A_SELL_B",
      spreadBps: 50n,
    });
  });

  it("buys on B when A prices the base asset higher", () => {
    // -100000 / 2010 truncates to -49
    expect(checkArbitrage(2010n, 2000n, 30n)).toEqual({
      profitable: true,
      direction: "BUY_B_SELL_A",
      spreadBps: -49n,
    });
  });

  it("stays out below the spread floor", () => {
    expect(checkArbitrage(2000n, 2002n, 30n)).toEqual({
      profitable: false,
      direction: "NO_OP",
      spreadBps: 10n,
    });
    expect(checkArbitrage(2000n, 2000n, 0n).direction).toBe("NO_OP");
  });

  it("refuses prices that are not positive", () => {
    expect(() => checkArbitrage(0n, 100n, 25n)).toThrow("must be positive");
    expect(() => checkArbitrage(100n, -1n, 25n)).toThrow("must be positive");
  });
});

describe("resolveLegs", () => {
  it("owes quote and receives base when buying on A", () => {
    expect(resolveLegs("BUY_A_SELL_B", { base: WETH, quote: USDC, token0IsBase: true })).toEqual({
      directionA: 1,
      directionB: 0,
      owedAsset: USDC,
      receivedAsset: WETH,
    });
    expect(resolveLegs("BUY_A_SELL_B", { base: WETH, quote: USDC, token0IsBase: false })).toEqual({
      directionA: 0,
      directionB: 1,
      owedAsset: USDC,
      receivedAsset: WETH,
    });
  });

  it("owes base and receives quote when buying on B", () => {
    expect(resolveLegs("BUY_B_SELL_A", { base: WETH, quote: USDC, token0IsBase: true })).toEqual({
      directionA: 0,
      directionB: 1,
      owedAsset: WETH,
      receivedAsset: USDC,
    });
    expect(resolveLegs("BUY_B_SELL_A", { base: WETH, quote: USDC, token0IsBase: false })).toEqual({
      directionA: 1,
      directionB: 0,
      owedAsset: WETH,
      receivedAsset: USDC,
    });
  });

  it("produces legs that settle when B is the cheaper venue", () => {
    const { ledger, executor, weth, usdc, venueA, venueB } = deployScenario({
      buyRate: 1100n,
      sellRate: 1000n,
    });
    const signal = checkArbitrage(1100n, 1000n, 30n);
    if (signal.direction === "NO_OP") throw new Error("expected an opportunity");

    const request = buildArbitrageRequest({
      venueA: venueA.address,
      venueB: venueB.address,
      legs: resolveLegs(signal.direction, {
        base: weth.address,
        quote: usdc.address,
        token0IsBase: true,
      }),
      amount: 10n,
      expectedProfit: 1n,
      liquidity: { buy: 1_000n, sell: 1_000n },
      currentBlock: ledger.blockNumber,
      horizonBlocks: 2,
    });

    // 10 WETH -> 11000 USDC on A -> 11 WETH on B, 10 repaid
    const receipt = ledger.transact(EXECUTOR, executor, (c) =>
      c.execute(encodePayload(request)),
    );

    expect(receipt.status).toBe("success");
    expect(weth.balanceOf(executor.address)).toBe(1n);
  });
});

describe("minimum profit", () => {
  it("picks the factor from the shallower pool", () => {
    expect(slippageFactorBps({ buy: 10n ** 18n, sell: 10n ** 19n })).toBe(9990n);
    expect(slippageFactorBps({ buy: 10n ** 18n, sell: 10n ** 16n })).toBe(9950n);
    expect(slippageFactorBps({ buy: 10n ** 16n - 1n, sell: 10n ** 20n })).toBe(9500n);
  });

  it("scales expected profit by the factor", () => {
    expect(deriveMinProfit(1_000_000n, 9950n)).toBe(995_000n);
    expect(deriveMinProfit(0n, 9990n)).toBe(0n);
    expect(deriveMinProfit(-5n, 9990n)).toBe(0n);
  });

  it("clamps to the 16-byte field", () => {
    expect(deriveMinProfit(2n ** 130n, 9500n)).toBe(2n ** 128n - 1n);
  });
});

describe("request building", () => {
  it("sets the deadline a fixed number of blocks ahead", () => {
    expect(deadlineFor(100n, 2)).toBe(102n);
    expect(() => deadlineFor(2n ** 32n - 2n, 2)).toThrow("does not fit in 4 bytes");
  });

  it("validates a JSON request and fills in the deadline", () => {
    const request = parseArbitrageRequest(
      {
        venueA: eoa(0xa1).toLowerCase(),
        venueB: eoa(0xb2),
        owedAsset: USDC,
        receivedAsset: WETH,
        amount: "25000000000000000000",
        directionA: 1,
        directionB: 0,
        minProfit: 5,
      },
      100n,
      2,
    );

    expect(request).toEqual({
      venueA: eoa(0xa1),
      venueB: eoa(0xb2),
      owedAsset: USDC,
      receivedAsset: WETH,
      amount: 25n * 10n ** 18n,
      directionA: 1,
      directionB: 0,
      minProfit: 5n,
      deadline: 102n,
    });
  });

  it("keeps an explicit deadline", () => {
    const request = parseArbitrageRequest(
      {
        venueA: eoa(0xa1),
        venueB: eoa(0xb2),
        owedAsset: USDC,
        receivedAsset: WETH,
        amount: "1",
        directionA: 0,
        directionB: 1,
        minProfit: "0",
        deadline: "150",
      },
      100n,
      2,
    );
    expect(request.deadline).toBe(150n);
  });

  it("rejects malformed requests", () => {
    const valid = {
      venueA: eoa(0xa1),
      venueB: eoa(0xb2),
      owedAsset: USDC,
      receivedAsset: WETH,
      amount: "1",
      directionA: 0,
      directionB: 1,
      minProfit: "0",
    };

    expect(() => parseArbitrageRequest({ ...valid, directionA: 2 }, 100n, 2)).toThrow();
    expect(() => parseArbitrageRequest({ ...valid, amount: "0" }, 100n, 2)).toThrow(
      "amount must be positive",
    );
    expect(() => parseArbitrageRequest({ ...valid, venueA: "0x123" }, 100n, 2)).toThrow(
      "Invalid address",
    );
    expect(() => parseArbitrageRequest({ ...valid, amount: "1.5" }, 100n, 2)).toThrow();

    const oversized: unknown = JSON.parse(
      JSON.stringify(valid).replace('"amount":"1"', '"amount":12345678901234567891'),
    );
    expect(() => parseArbitrageRequest(oversized, 100n, 2)).toThrow(
      "must be decimal strings",
    );
    expect(
      parseArbitrageRequest({ ...valid, amount: "12345678901234567891" }, 100n, 2).amount,
    ).toBe(12345678901234567891n);
  });

  it("derives the floor from expected profit and liquidity", () => {
    const request = buildArbitrageRequest({
      venueA: eoa(0xa1),
      venueB: eoa(0xb2),
      legs: resolveLegs("BUY_A_SELL_B", { base: WETH, quote: USDC, token0IsBase: true }),
      amount: 10n ** 18n,
      expectedProfit: 1_000_000n,
      liquidity: { buy: 10n ** 18n, sell: 10n ** 18n },
      currentBlock: 500n,
      horizonBlocks: 3,
    });

    expect(request.minProfit).toBe(999_000n);
    expect(request.deadline).toBe(503n);
    expect(request.directionA).toBe(1);
    expect(request.owedAsset).toBe(USDC);
  });

  it("refuses a zero amount", () => {
    expect(() =>
      buildArbitrageRequest({
        venueA: eoa(0xa1),
        venueB: eoa(0xb2),
        legs: resolveLegs("BUY_A_SELL_B", { base: WETH, quote: USDC, token0IsBase: true }),
        amount: 0n,
        expectedProfit: 1n,
        liquidity: { buy: 1n, sell: 1n },
        currentBlock: 1n,
        horizonBlocks: 2,
      }),
    ).toThrow("amount must be positive");
  });
});
