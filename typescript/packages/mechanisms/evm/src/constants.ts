/**
 * EIP-2612 Permit types for EIP-712 signing.
 */
export const eip2612PermitTypes = {
  Permit: [
    { name: "owner", type: "address" },
    { name: "spender", type: "address" },
    { name: "value", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

/**
 * EIP-712 domain version of the IndieTreat token's permit.
 */
export const INDIETREAT_TOKEN_VERSION = "1";

export const INDIETREAT_TOKEN_DECIMALS = 18;
