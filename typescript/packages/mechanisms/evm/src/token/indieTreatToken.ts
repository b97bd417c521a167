import { isAddressEqual, isHex, maxUint256, recoverTypedDataAddress, zeroAddress } from "viem";
import type { Address } from "viem";
import { z } from "zod";
import {
  APPROVAL_EVENT,
  AddressSchema,
  CHECKOUT_ERROR_CODES,
  CheckoutError,
  JournaledMap,
  JournaledValue,
  PermitAuthorizationSchema,
  TRANSFER_EVENT,
  Uint256Schema,
  parseInput,
} from "@indietreat/core";
import type {
  CallContext,
  ChainContract,
  LocalChain,
  PermitAuthorization,
  PermitToken,
  TransactionRequest,
} from "@indietreat/core";
import { INDIETREAT_TOKEN_DECIMALS, INDIETREAT_TOKEN_VERSION, eip2612PermitTypes } from "../constants";
import type { IndieTreatTokenConfig, PermitDomain, PermitDomainSource } from "../types";

const IndieTreatTokenConfigSchema = z.object({
  name: z.string().min(1),
  symbol: z.string().min(1),
  owner: AddressSchema,
});

/**
 * Mintable ERC20 token with EIP-2612 permits, used as the payment medium of the token checkout.
 *
 * Only the owner can mint. An allowance of `maxUint256` is never decreased by `transferFrom`.
 */
export class IndieTreatToken implements PermitToken, PermitDomainSource, ChainContract {
  readonly name: string;
  readonly symbol: string;
  readonly decimals = INDIETREAT_TOKEN_DECIMALS;
  readonly owner: Address;

  private readonly balances: JournaledMap<Address, bigint>;
  private readonly allowances: JournaledMap<string, bigint>;
  private readonly permitNonces: JournaledMap<Address, bigint>;
  private readonly supply: JournaledValue<bigint>;

  /**
   * Creates the token.
   *
   * @param chain - The chain the token is deployed on
   * @param address - The address assigned at deployment
   * @param config - Name, symbol and minting owner
   */
  constructor(
    private readonly chain: LocalChain,
    readonly address: Address,
    config: IndieTreatTokenConfig,
  ) {
    const { name, symbol, owner } = parseInput(IndieTreatTokenConfigSchema, config);
    this.name = name;
    this.symbol = symbol;
    this.owner = owner;
    this.balances = new JournaledMap(chain);
    this.allowances = new JournaledMap(chain);
    this.permitNonces = new JournaledMap(chain);
    this.supply = new JournaledValue(chain, 0n);
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  totalSupply(): bigint {
    return this.supply.get();
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(parseInput(AddressSchema, account)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  /**
   * Current permit nonce of an owner. Each accepted permit consumes one.
   *
   * @param owner - The token owner
   * @returns The nonce the next permit must be signed with
   */
  nonces(owner: Address): bigint {
    return this.permitNonces.get(parseInput(AddressSchema, owner)) ?? 0n;
  }

  eip712Domain(): PermitDomain {
    return {
      name: this.name,
      version: INDIETREAT_TOKEN_VERSION,
      chainId: this.chain.chainId,
      verifyingContract: this.address,
    };
  }

  // ==========================================================================
  // Entry points
  // ==========================================================================

  /**
   * Creates `amount` tokens for `to`. Owner only.
   *
   * @param tx - The caller, must be the owner
   * @param to - Recipient of the new tokens
   * @param amount - Amount to mint
   */
  async mint(tx: TransactionRequest, to: Address, amount: bigint): Promise<void> {
    await this.chain.execute(tx, this.address, ctx => {
      if (!isAddressEqual(ctx.sender, this.owner)) {
        throw new CheckoutError(
          CHECKOUT_ERROR_CODES.UNAUTHORIZED,
          `Only ${this.owner} can mint, called by ${ctx.sender}`,
        );
      }
      const recipient = parseInput(AddressSchema, to);
      const value = parseInput(Uint256Schema, amount);
      if (recipient === zeroAddress) {
        throw new CheckoutError(CHECKOUT_ERROR_CODES.INVALID_INPUT, "Cannot mint to the zero address");
      }
      this.supply.set(this.supply.get() + value);
      this.balances.set(recipient, this.balanceOf(recipient) + value);
      this.chain.emit(ctx, TRANSFER_EVENT, { from: zeroAddress, to: recipient, value });
    });
  }

  async transfer(tx: TransactionRequest, to: Address, amount: bigint): Promise<boolean> {
    return this.chain.execute(tx, this.address, ctx => {
      this.move(ctx, ctx.sender, to, amount);
      return true;
    });
  }

  async approve(tx: TransactionRequest, spender: Address, amount: bigint): Promise<boolean> {
    return this.chain.execute(tx, this.address, ctx => {
      this.setAllowance(ctx, ctx.sender, spender, amount);
      return true;
    });
  }

  /**
   * Moves `amount` from `from` to `to` on behalf of the caller, spending the caller's allowance.
   *
   * @param tx - The spender
   * @param from - The token owner
   * @param to - The recipient
   * @param amount - Amount to move
   * @returns True on success
   */
  async transferFrom(
    tx: TransactionRequest,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<boolean> {
    return this.chain.execute(tx, this.address, ctx => {
      const owner = parseInput(AddressSchema, from);
      const value = parseInput(Uint256Schema, amount);
      const current = this.allowance(owner, ctx.sender);
      if (current !== maxUint256) {
        if (current < value) {
          throw new CheckoutError(
            CHECKOUT_ERROR_CODES.INSUFFICIENT_AUTHORIZATION,
            `Allowance of ${ctx.sender} over ${owner} is ${current}, ${value} required`,
          );
        }
        this.allowances.set(allowanceKey(owner, ctx.sender), current - value);
      }
      this.move(ctx, owner, to, value);
      return true;
    });
  }

  /**
   * Sets an allowance from an owner's EIP-712 signature. Anyone may submit it.
   *
   * @param tx - The submitter
   * @param authorization - The signed permit
   */
  async permit(tx: TransactionRequest, authorization: PermitAuthorization): Promise<void> {
    await this.chain.execute(tx, this.address, async ctx => {
      const { owner, spender, value, deadline, signature } = parseInput(
        PermitAuthorizationSchema,
        authorization,
      );
      if (ctx.timestamp > deadline) {
        throw new CheckoutError(
          CHECKOUT_ERROR_CODES.EXPIRED,
          `Permit deadline ${deadline} is before block timestamp ${ctx.timestamp}`,
        );
      }

      if (!isHex(signature)) {
        throw new CheckoutError(
          CHECKOUT_ERROR_CODES.INVALID_SIGNATURE,
          "Permit signature is not hex encoded",
        );
      }

      const nonce = this.nonces(owner);
      let signer: Address;
      try {
        signer = await recoverTypedDataAddress({
          domain: this.eip712Domain(),
          types: eip2612PermitTypes,
          primaryType: "Permit",
          message: { owner, spender, value, nonce, deadline },
          signature,
        });
      } catch (error) {
        throw new CheckoutError(CHECKOUT_ERROR_CODES.INVALID_SIGNATURE, undefined, { cause: error });
      }
      if (!isAddressEqual(signer, owner)) {
        throw new CheckoutError(
          CHECKOUT_ERROR_CODES.INVALID_SIGNATURE,
          `Permit signed by ${signer}, expected ${owner}`,
        );
      }

      this.permitNonces.set(owner, nonce + 1n);
      this.setAllowance(ctx, owner, spender, value);
    });
  }

  /**
   * The token holds no native currency.
   */
  receive(): never {
    throw new CheckoutError(CHECKOUT_ERROR_CODES.REJECTED_PAYMENT);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private move(ctx: CallContext, from: Address, to: Address, amount: bigint): void {
    const sender = parseInput(AddressSchema, from);
    const recipient = parseInput(AddressSchema, to);
    const value = parseInput(Uint256Schema, amount);
    if (recipient === zeroAddress) {
      throw new CheckoutError(CHECKOUT_ERROR_CODES.INVALID_INPUT, "Cannot transfer to the zero address");
    }
    const available = this.balanceOf(sender);
    if (available < value) {
      throw new CheckoutError(
        CHECKOUT_ERROR_CODES.INSUFFICIENT_BALANCE,
        `Balance of ${sender} is ${available}, ${value} required`,
      );
    }
    this.balances.set(sender, available - value);
    this.balances.set(recipient, this.balanceOf(recipient) + value);
    this.chain.emit(ctx, TRANSFER_EVENT, { from: sender, to: recipient, value });
  }

  private setAllowance(ctx: CallContext, owner: Address, spender: Address, amount: bigint): void {
    const holder = parseInput(AddressSchema, owner);
    const approved = parseInput(AddressSchema, spender);
    const value = parseInput(Uint256Schema, amount);
    if (approved === zeroAddress) {
      throw new CheckoutError(CHECKOUT_ERROR_CODES.INVALID_INPUT, "Cannot approve the zero address");
    }
    this.allowances.set(allowanceKey(holder, approved), value);
    this.chain.emit(ctx, APPROVAL_EVENT, { owner: holder, spender: approved, value });
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner.toLowerCase()}:${spender.toLowerCase()}`;
}
