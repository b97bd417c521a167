import { CHECKOUT_ERROR_CODES, CheckoutError } from "../errors";
import { NativePurchaseInputSchema, parseInput } from "../schemas";
import type { NativePurchaseInput } from "../schemas";
import type { CallContext, Purchase, TransactionRequest } from "../types";
import { Checkout } from "./checkout";

/**
 * Checkout paid in the chain's native currency. The value attached to `purchase` is the
 * recorded amount and is forwarded in full to the seller wallet.
 */
export class NativeCheckout extends Checkout {
  /**
   * Records a purchase paid with `tx.value`.
   *
   * @param tx - Buyer and attached payment
   * @param input - Store, product, buyer details and seller wallet
   */
  async purchase(tx: TransactionRequest, input: NativePurchaseInput): Promise<void> {
    await this.chain.execute(
      tx,
      this.address,
      ctx => this.recordAndPay(ctx, { ...parseInput(NativePurchaseInputSchema, input), amount: ctx.value }),
      { payable: true },
    );
  }

  protected async settle(ctx: CallContext, purchase: Purchase): Promise<void> {
    const forwarded = await this.chain.call(ctx, purchase.wallet, purchase.amount);
    if (!forwarded) {
      throw new CheckoutError(
        CHECKOUT_ERROR_CODES.FORWARD_FAILED,
        `Wallet ${purchase.wallet} rejected ${purchase.amount} wei`,
      );
    }
  }
}
