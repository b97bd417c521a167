import type { Address } from "viem";
import type { LocalChain } from "../chain/localChain";
import { PURCHASE_MADE_EVENT } from "../constants";
import { CHECKOUT_ERROR_CODES, CheckoutError } from "../errors";
import { PurchaseLedger } from "../ledger/purchaseLedger";
import { RecordInputSchema, Uint256Schema, parseInput } from "../schemas";
import type { RecordInput } from "../schemas";
import type { CallContext, ChainContract, Purchase } from "../types";

/**
 * Shared part of both checkout variants: the purchase ledger, its read accessors, the
 * recording routine and the rejection of unsolicited payments.
 *
 * Variants implement `settle`, which moves the payment to the seller wallet once the
 * purchase is recorded.
 */
export abstract class Checkout implements ChainContract {
  protected readonly ledger: PurchaseLedger;
  private entered = false;

  /**
   * Creates a checkout bound to a chain.
   *
   * @param chain - The chain the checkout is deployed on
   * @param address - The address assigned at deployment
   */
  constructor(
    protected readonly chain: LocalChain,
    readonly address: Address,
  ) {
    this.ledger = new PurchaseLedger(chain);
  }

  /**
   * Reads a recorded purchase.
   *
   * @param storeId - The store
   * @param purchaseId - The purchase identifier
   * @returns The purchase, `NOT_FOUND` when the identifier is not below the store count
   */
  getPurchase(storeId: bigint, purchaseId: bigint): Readonly<Purchase> {
    return this.ledger.get(parseInput(Uint256Schema, storeId), parseInput(Uint256Schema, purchaseId));
  }

  getStorePurchaseCount(storeId: bigint): bigint {
    return this.ledger.count(parseInput(Uint256Schema, storeId));
  }

  storeExists(storeId: bigint): boolean {
    return this.getStorePurchaseCount(storeId) > 0n;
  }

  getStorePurchases(storeId: bigint): Array<Readonly<Purchase>> {
    return this.ledger.list(parseInput(Uint256Schema, storeId));
  }

  /**
   * Plain value transfers are not purchases.
   */
  receive(): never {
    throw new CheckoutError(CHECKOUT_ERROR_CODES.REJECTED_PAYMENT);
  }

  /**
   * Calls to undefined entry points are rejected.
   *
   * @param _ctx - Unused call context
   * @param functionName - Name of the missing entry point
   */
  fallback(_ctx: CallContext, functionName: string): never {
    throw new CheckoutError(
      CHECKOUT_ERROR_CODES.REJECTED_PAYMENT,
      functionName ? `Unknown entry point ${functionName}` : undefined,
    );
  }

  /**
   * Validates, records, pays, then emits `PurchaseMade`. Runs inside the caller's transaction,
   * so a failed payment also drops the record.
   *
   * @param ctx - Context of the purchase call
   * @param input - The purchase to record
   */
  protected async recordAndPay(ctx: CallContext, input: RecordInput): Promise<void> {
    if (this.entered) {
      throw new CheckoutError(CHECKOUT_ERROR_CODES.REENTRANT_CALL);
    }
    this.entered = true;

    try {
      const { storeId, ...fields } = parseInput(RecordInputSchema, input);
      const purchase: Purchase = { ...fields, timestamp: ctx.timestamp };
      const purchaseId = this.ledger.append(storeId, purchase);

      await this.settle(ctx, purchase);

      this.chain.emit(ctx, PURCHASE_MADE_EVENT, { storeId, purchaseId, ...purchase });
    } finally {
      this.entered = false;
    }
  }

  /**
   * Moves the recorded payment to `purchase.wallet`. Throwing reverts the purchase.
   *
   * @param ctx - Context of the purchase call
   * @param purchase - The purchase just recorded
   */
  protected abstract settle(ctx: CallContext, purchase: Purchase): Promise<void>;
}
