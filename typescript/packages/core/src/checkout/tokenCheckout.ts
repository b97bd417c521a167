import { isAddress, zeroAddress } from "viem";
import type { Address } from "viem";
import type { LocalChain } from "../chain/localChain";
import { CHECKOUT_ERROR_CODES, CheckoutError, isCheckoutError } from "../errors";
import { PermitPurchaseInputSchema, TokenPurchaseInputSchema, parseInput } from "../schemas";
import type { PermitPurchaseInput, TokenPurchaseInput } from "../schemas";
import type { CallContext, PermitToken, Purchase, TransactionRequest } from "../types";
import { Checkout } from "./checkout";

/**
 * Checkout paid with a permit-capable token pulled from the buyer into the seller wallet.
 */
export class TokenCheckout extends Checkout {
  /**
   * Creates a token checkout.
   *
   * @param chain - The chain the checkout is deployed on
   * @param address - The address assigned at deployment
   * @param token - The payment token
   */
  constructor(
    chain: LocalChain,
    address: Address,
    readonly token: PermitToken,
  ) {
    super(chain, address);
    if (!isAddress(token.address, { strict: false }) || token.address === zeroAddress) {
      throw new CheckoutError(
        CHECKOUT_ERROR_CODES.INVALID_INPUT,
        "Payment token address must be a non-zero address",
      );
    }
  }

  /**
   * Records a purchase paid from an existing allowance of at least `amount`.
   *
   * @param tx - The buyer
   * @param input - Store, product, buyer details, amount and seller wallet
   */
  async purchase(tx: TransactionRequest, input: TokenPurchaseInput): Promise<void> {
    await this.chain.execute(tx, this.address, ctx =>
      this.recordAndPay(ctx, parseInput(TokenPurchaseInputSchema, input)),
    );
  }

  /**
   * Applies the buyer's signed permit for `amount`, then records and pays the purchase.
   *
   * @param tx - The buyer, who signed the permit
   * @param input - Purchase fields plus the permit deadline and signature
   */
  async purchaseWithPermit(tx: TransactionRequest, input: PermitPurchaseInput): Promise<void> {
    await this.chain.execute(tx, this.address, async ctx => {
      const { deadline, signature, ...purchase } = parseInput(PermitPurchaseInputSchema, input);

      await this.token.permit(
        { from: this.address },
        { owner: ctx.sender, spender: this.address, value: purchase.amount, deadline, signature },
      );

      // The permit may have been satisfied by an unrelated approval; check what it left us.
      const authorized = this.token.allowance(ctx.sender, this.address);
      if (authorized < purchase.amount) {
        throw new CheckoutError(
          CHECKOUT_ERROR_CODES.INSUFFICIENT_AUTHORIZATION,
          `Allowance ${authorized} is below ${purchase.amount}`,
        );
      }

      await this.recordAndPay(ctx, purchase);
    });
  }

  protected async settle(ctx: CallContext, purchase: Purchase): Promise<void> {
    let transferred: boolean;
    try {
      transferred = await this.token.transferFrom(
        { from: this.address },
        ctx.sender,
        purchase.wallet,
        purchase.amount,
      );
    } catch (error) {
      if (isCheckoutError(error, CHECKOUT_ERROR_CODES.INSUFFICIENT_AUTHORIZATION)) {
        throw error;
      }
      throw new CheckoutError(CHECKOUT_ERROR_CODES.TRANSFER_FAILED, undefined, { cause: error });
    }

    if (!transferred) {
      throw new CheckoutError(CHECKOUT_ERROR_CODES.TRANSFER_FAILED, "Token returned false");
    }
  }
}
