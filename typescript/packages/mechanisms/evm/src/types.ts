import type { Address, Hex } from "viem";

/**
 * EIP-712 domain of a permit token.
 */
export interface PermitDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
}

/**
 * Token surface needed to sign a permit for it.
 */
export interface PermitDomainSource {
  readonly address: Address;
  eip712Domain(): PermitDomain;
  nonces(owner: Address): bigint;
}

/**
 * A signed EIP-2612 permit.
 */
export interface Eip2612PermitInfo {
  /** The token owner granting the allowance. */
  from: Address;
  /** The token contract address. */
  asset: Address;
  /** The address allowed to spend. */
  spender: Address;
  amount: bigint;
  /** The owner's permit nonce at signing time. */
  nonce: bigint;
  /** Unix timestamp after which the permit is rejected. */
  deadline: bigint;
  /** The 65-byte concatenated permit signature (r, s, v). */
  signature: Hex;
}

export interface IndieTreatTokenConfig {
  name: string;
  symbol: string;
  /** Account allowed to mint */
  owner: Address;
}
