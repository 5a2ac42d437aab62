import { z } from "zod";
import { getAddress, isAddress, type Hex } from "viem";

export const AddressSchema = z
  .string()
  .refine((value) => isAddress(value), "Invalid address")
  .transform((value) => getAddress(value));

export const PrivateKeySchema = z.custom<Hex>(
  (value) => typeof value === "string" && /^0x[a-fA-F0-9]{64}$/.test(value),
  "Invalid private key format",
);

/** Non-negative integer given as a decimal string or a safe JS number */
export const UintSchema = z
  .union([
    z.string().regex(/^\d+$/, "Expected a decimal integer"),
    z.number().int().nonnegative().safe("Integers past 2^53 must be decimal strings"),
  ])
  .transform((value) => BigInt(value));

export const DirectionSchema = z.union([z.literal(0), z.literal(1)]);
