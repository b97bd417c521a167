import { JournaledMap } from "../chain/journal";
import { CHECKOUT_ERROR_CODES, CheckoutError } from "../errors";
import type { Purchase, StateJournal } from "../types";

/**
 * Append-only purchase log, per store.
 *
 * Records live under `(storeId, purchaseId)` and a per-store counter holds the next
 * identifier, which is also the number of records in the store. Writes go through the
 * chain journal, so a reverted transaction leaves no record behind.
 */
export class PurchaseLedger {
  private readonly counts: JournaledMap<bigint, bigint>;
  private readonly records: JournaledMap<string, Readonly<Purchase>>;

  /**
   * Creates an empty ledger.
   *
   * @param journal - Journal of the chain the ledger's contract is deployed on
   */
  constructor(journal: StateJournal) {
    this.counts = new JournaledMap(journal);
    this.records = new JournaledMap(journal);
  }

  /**
   * Appends a purchase to a store.
   *
   * @param storeId - The store
   * @param purchase - The purchase to record
   * @returns The identifier assigned to the purchase
   */
  append(storeId: bigint, purchase: Purchase): bigint {
    const purchaseId = this.count(storeId);
    this.records.set(recordKey(storeId, purchaseId), Object.freeze({ ...purchase }));
    this.counts.set(storeId, purchaseId + 1n);
    return purchaseId;
  }

  /**
   * Reads a purchase.
   *
   * @param storeId - The store
   * @param purchaseId - The purchase identifier
   * @returns The recorded purchase
   */
  get(storeId: bigint, purchaseId: bigint): Readonly<Purchase> {
    const record =
      purchaseId < this.count(storeId) ? this.records.get(recordKey(storeId, purchaseId)) : undefined;
    if (!record) {
      throw new CheckoutError(
        CHECKOUT_ERROR_CODES.NOT_FOUND,
        `Store ${storeId} has no purchase ${purchaseId}`,
        { details: { storeId, purchaseId } },
      );
    }
    return record;
  }

  /**
   * Number of purchases recorded for a store, 0 for stores never used.
   *
   * @param storeId - The store
   * @returns The purchase count
   */
  count(storeId: bigint): bigint {
    return this.counts.get(storeId) ?? 0n;
  }

  /**
   * Lists every purchase of a store in identifier order.
   *
   * @param storeId - The store
   * @returns The recorded purchases
   */
  list(storeId: bigint): Array<Readonly<Purchase>> {
    const purchases: Array<Readonly<Purchase>> = [];
    for (let purchaseId = 0n; purchaseId < this.count(storeId); purchaseId++) {
      purchases.push(this.get(storeId, purchaseId));
    }
    return purchases;
  }
}

function recordKey(storeId: bigint, purchaseId: bigint): string {
  return `${storeId}:${purchaseId}`;
}
