import type { Address } from "viem";
import type { TransactionRequest } from "./chain";

/**
 * EIP-2612 signed authorization: `owner` lets `spender` move `value` until `deadline`.
 */
export interface PermitAuthorization {
  owner: Address;
  spender: Address;
  value: bigint;
  deadline: bigint;
  /** 65-byte ECDSA signature over the EIP-712 `Permit` message, 0x-hex encoded */
  signature: string;
}

/**
 * Fungible token capability the token checkout pays with.
 *
 * Failures are thrown as `CheckoutError`s: `INSUFFICIENT_AUTHORIZATION` when the allowance is
 * too low, `INSUFFICIENT_BALANCE` when the owner cannot cover the amount, `EXPIRED` and
 * `INVALID_SIGNATURE` for rejected permits.
 */
export interface PermitToken {
  readonly address: Address;
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  transfer(tx: TransactionRequest, to: Address, amount: bigint): Promise<boolean>;
  transferFrom(tx: TransactionRequest, from: Address, to: Address, amount: bigint): Promise<boolean>;
  permit(tx: TransactionRequest, authorization: PermitAuthorization): Promise<void>;
}
