import { z } from "zod";
import * as dotenv from "dotenv";
import * as path from "path";
import { AddressSchema, PrivateKeySchema } from "./schemas";
import type { ExecutorOptions } from "./executor/flashArbExecutor";

dotenv.config({ path: path.resolve(__dirname, "../.env") });

export const ConfigSchema = z.object({
  RPC_URL: z.string().url().optional(),
  EXECUTOR_PRIVATE_KEY: PrivateKeySchema.optional(),
  ARB_CONTRACT_ADDRESS: AddressSchema.optional(),
  CHAIN_ID: z.coerce.number().int().positive().default(8453),
  DEADLINE_BLOCKS: z.coerce.number().int().positive().default(2),
  PAYLOAD_LAYOUT: z.enum(["current", "legacy"]).default("current"),
  // Settings of an executor deployed on an in-process Ledger; the entry
  // script talks to an already deployed contract and ignores them
  TRUNCATED_PAYLOAD: z.enum(["reject", "zero-pad"]).default("reject"),
  PROFIT_POLICY: z.enum(["retain", "forward"]).default("retain"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse(env);
}

/** Options for deploying a FlashArbExecutor on a Ledger from the environment */
export function executorOptions(config: AppConfig): ExecutorOptions {
  return {
    layout: config.PAYLOAD_LAYOUT,
    truncation: config.TRUNCATED_PAYLOAD,
    profitPolicy: config.PROFIT_POLICY,
  };
}
