import type { LocalAccount } from "viem";

/**
 * ClientEvmSigner - Used by buyers to sign permits.
 * A viem LocalAccount (e.g. from `privateKeyToAccount`) satisfies it.
 */
export type ClientEvmSigner = Pick<LocalAccount, "address" | "signTypedData">;

/**
 * Converts a signer to a ClientEvmSigner
 *
 * @param signer - The signer to convert to a ClientEvmSigner
 * @returns The converted signer
 */
export function toClientEvmSigner(signer: ClientEvmSigner): ClientEvmSigner {
  return signer;
}
