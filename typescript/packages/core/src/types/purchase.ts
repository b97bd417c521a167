import type { Address } from "viem";

/**
 * A recorded purchase. Frozen once appended to a store.
 */
export interface Purchase {
  productName: string;
  username: string;
  userId: bigint;
  /** Block timestamp at recording */
  timestamp: bigint;
  /** Payment amount in the smallest unit of the payment medium */
  amount: bigint;
  /** Seller wallet the payment was forwarded to */
  wallet: Address;
}

/**
 * Arguments of the `PurchaseMade` event.
 */
export interface PurchaseMade extends Purchase {
  storeId: bigint;
  purchaseId: bigint;
}
