import { getAddress } from "viem";
import type { Address } from "viem";
import { eip2612PermitTypes } from "../constants";
import type { ClientEvmSigner } from "../signer";
import type { Eip2612PermitInfo, PermitDomain, PermitDomainSource } from "../types";

/**
 * Signs an EIP-2612 permit letting `spender` move `amount` of the signer's tokens.
 *
 * The token checkout verifies the permit against `value == amount` and `spender == checkout`,
 * so pass the exact purchase amount and the checkout address.
 *
 * @param signer - The buyer's signer
 * @param token - The token, queried for its EIP-712 domain and the signer's nonce
 * @param spender - The address allowed to spend
 * @param amount - The amount to approve
 * @param deadline - Unix timestamp after which the permit is rejected
 * @returns The signed permit
 */
export async function signEip2612Permit(
  signer: ClientEvmSigner,
  token: PermitDomainSource,
  spender: Address,
  amount: bigint,
  deadline: bigint,
): Promise<Eip2612PermitInfo> {
  return signEip2612PermitMessage(signer, token.eip712Domain(), {
    spender,
    amount,
    nonce: token.nonces(signer.address),
    deadline,
  });
}

/**
 * Signs an EIP-2612 permit for an explicit domain and nonce, without reading the token.
 *
 * @param signer - The token owner's signer
 * @param domain - The token's EIP-712 domain
 * @param permit - Spender, amount, nonce and deadline
 * @param permit.spender - The address allowed to spend
 * @param permit.amount - The amount to approve
 * @param permit.nonce - The owner's current permit nonce
 * @param permit.deadline - Unix timestamp after which the permit is rejected
 * @returns The signed permit
 */
export async function signEip2612PermitMessage(
  signer: ClientEvmSigner,
  domain: PermitDomain,
  permit: { spender: Address; amount: bigint; nonce: bigint; deadline: bigint },
): Promise<Eip2612PermitInfo> {
  const owner = signer.address;
  const spender = getAddress(permit.spender);

  const signature = await signer.signTypedData({
    domain,
    types: eip2612PermitTypes,
    primaryType: "Permit",
    message: {
      owner,
      spender,
      value: permit.amount,
      nonce: permit.nonce,
      deadline: permit.deadline,
    },
  });

  return {
    from: owner,
    asset: domain.verifyingContract,
    spender,
    amount: permit.amount,
    nonce: permit.nonce,
    deadline: permit.deadline,
    signature,
  };
}
