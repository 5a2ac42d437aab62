import {
  bytesToBigInt,
  bytesToHex,
  concat,
  getAddress,
  hexToBytes,
  isAddress,
  isHex,
  numberToBytes,
  type Address,
  type Hex,
} from "viem";
import { ArbitrageError } from "./errors";

// ============== Layout ==============
//
//  offset  size  field
//  0       20    venueA         flash-swap source
//  20      20    venueB         sale venue
//  40      20    owedAsset      repaid to venueA
//  60      20    receivedAsset  delivered by venueA, paid to venueB
//  80      32    amount         uint256, big-endian
//  112     1     directionA     0 = zeroForOne, 1 = oneForZero
//  113     1     directionB
//  114     16    minProfit      uint128, big-endian
//  130     4     deadline       uint32 block bound (current layout only)

export type PayloadLayout = "current" | "legacy";
export type TruncationPolicy = "reject" | "zero-pad";
export type SwapDirection = 0 | 1;

export interface FieldSpec {
  offset: number;
  size: number;
}

export const PAYLOAD_FIELDS = {
  venueA: { offset: 0, size: 20 },
  venueB: { offset: 20, size: 20 },
  owedAsset: { offset: 40, size: 20 },
  receivedAsset: { offset: 60, size: 20 },
  amount: { offset: 80, size: 32 },
  directionA: { offset: 112, size: 1 },
  directionB: { offset: 113, size: 1 },
  minProfit: { offset: 114, size: 16 },
  deadline: { offset: 130, size: 4 },
} as const satisfies Record<string, FieldSpec>;

export type PayloadField = keyof typeof PAYLOAD_FIELDS;

export const PAYLOAD_LENGTH: Record<PayloadLayout, number> = {
  current: 134,
  legacy: 130,
};

const MAX_UINT256 = 2n ** 256n - 1n;
const MAX_UINT128 = 2n ** 128n - 1n;
const MAX_UINT32 = 2n ** 32n - 1n;

export interface ArbitrageRequest {
  venueA: Address;
  venueB: Address;
  owedAsset: Address;
  receivedAsset: Address;
  amount: bigint;
  directionA: SwapDirection;
  directionB: SwapDirection;
  minProfit: bigint;
  /** Last block the request is valid in; null under the legacy layout */
  deadline: bigint | null;
}

export interface DecodeOptions {
  layout?: PayloadLayout;
  truncation?: TruncationPolicy;
}

export function isZeroForOne(direction: SwapDirection): boolean {
  return direction === 0;
}

/** Field a byte offset falls within, if any */
export function fieldAt(
  offset: number,
  layout: PayloadLayout = "current",
): PayloadField | undefined {
  const fields = Object.keys(PAYLOAD_FIELDS) as PayloadField[];
  return fields.find((name) => {
    const { offset: start, size } = PAYLOAD_FIELDS[name];
    return (
      offset >= start &&
      offset < start + size &&
      start + size <= PAYLOAD_LENGTH[layout]
    );
  });
}

// ============== Decoding ==============

/**
 * Parse a fixed-layout payload. The length is checked before any field is
 * read; under "zero-pad" a short payload reads as if its missing tail were
 * zero bytes, which in practice fails the amount or deadline checks.
 */
export function decodePayload(
  payload: Uint8Array | Hex,
  options: DecodeOptions = {},
): ArbitrageRequest {
  const layout = options.layout ?? "current";
  const truncation = options.truncation ?? "reject";
  const bytes = normalizeLength(
    typeof payload === "string" ? payloadBytes(payload) : payload,
    PAYLOAD_LENGTH[layout],
    truncation,
  );

  const read = (field: PayloadField) => {
    const { offset, size } = PAYLOAD_FIELDS[field];
    return bytes.subarray(offset, offset + size);
  };
  const address = (field: PayloadField) => getAddress(bytesToHex(read(field)));
  const uint = (field: PayloadField) => bytesToBigInt(read(field));

  const amount = uint("amount");
  if (amount === 0n) {
    throw new ArbitrageError("ZeroAmount", "Arbitrage amount must be positive");
  }

  return {
    venueA: address("venueA"),
    venueB: address("venueB"),
    owedAsset: address("owedAsset"),
    receivedAsset: address("receivedAsset"),
    amount,
    directionA: direction(read("directionA")[0], "directionA"),
    directionB: direction(read("directionB")[0], "directionB"),
    minProfit: uint("minProfit"),
    deadline: layout === "current" ? uint("deadline") : null,
  };
}

function payloadBytes(payload: Hex): Uint8Array {
  if (!isHex(payload, { strict: true })) {
    throw new ArbitrageError("MalformedPayload", "Payload is not a hex string");
  }
  return hexToBytes(payload);
}

function normalizeLength(
  bytes: Uint8Array,
  expected: number,
  truncation: TruncationPolicy,
): Uint8Array {
  if (bytes.length === expected) return bytes;

  if (bytes.length < expected && truncation === "zero-pad") {
    const padded = new Uint8Array(expected);
    padded.set(bytes);
    return padded;
  }

  throw new ArbitrageError(
    "MalformedPayload",
    `Expected ${expected} payload bytes, got ${bytes.length}`,
  );
}

function direction(value: number | undefined, field: PayloadField): SwapDirection {
  if (value === 0 || value === 1) return value;
  throw new ArbitrageError(
    "InvalidDirection",
    `${field} must be 0 or 1, got ${value}`,
  );
}

// ============== Encoding ==============

export type PayloadInput = Omit<ArbitrageRequest, "deadline"> & {
  deadline?: bigint | null;
};

/** Build the payload the executor decodes; every field is range-checked */
export function encodePayload(
  request: PayloadInput,
  layout: PayloadLayout = "current",
): Uint8Array {
  for (const field of ["venueA", "venueB", "owedAsset", "receivedAsset"] as const) {
    if (!isAddress(request[field])) {
      throw new Error(`${field} is not an address: ${request[field]}`);
    }
  }
  assertRange("amount", request.amount, MAX_UINT256);
  assertRange("minProfit", request.minProfit, MAX_UINT128);
  if (request.directionA !== 0 && request.directionA !== 1) {
    throw new Error(`directionA must be 0 or 1, got ${request.directionA}`);
  }
  if (request.directionB !== 0 && request.directionB !== 1) {
    throw new Error(`directionB must be 0 or 1, got ${request.directionB}`);
  }

  const parts: Uint8Array[] = [
    hexToBytes(request.venueA),
    hexToBytes(request.venueB),
    hexToBytes(request.owedAsset),
    hexToBytes(request.receivedAsset),
    numberToBytes(request.amount, { size: 32 }),
    Uint8Array.of(request.directionA, request.directionB),
    numberToBytes(request.minProfit, { size: 16 }),
  ];

  if (layout === "current") {
    if (request.deadline === undefined || request.deadline === null) {
      throw new Error("deadline is required by the current payload layout");
    }
    assertRange("deadline", request.deadline, MAX_UINT32);
    parts.push(numberToBytes(request.deadline, { size: 4 }));
  }

  return concat(parts);
}

/** Hex rendering used in logs */
export function formatPayloadHex(payload: Uint8Array): Hex {
  return bytesToHex(payload);
}

function assertRange(field: string, value: bigint, max: bigint): void {
  if (value < 0n || value > max) {
    throw new Error(`${field} out of range: ${value}`);
  }
}
