import type { Chain } from "viem";
import { anvil, base, baseSepolia, mainnet, sepolia } from "viem/chains";

const KNOWN_CHAINS: Chain[] = [base, baseSepolia, mainnet, sepolia, anvil];

/** viem chain definition for an id, if it is one we deploy to */
export function chainById(chainId: number): Chain | undefined {
  return KNOWN_CHAINS.find((chain) => chain.id === chainId);
}
