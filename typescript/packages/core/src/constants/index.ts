/**
 * @fileoverview Chain and event constants for IndieTreat
 * @module @indietreat/core/constants
 */

import type { EventDefinition } from "../types";

/**
 * Chain ID used by the local chain unless configured otherwise.
 * Matches the id development nodes such as Hardhat and Anvil use.
 */
export const DEFAULT_CHAIN_ID = 31337;

/**
 * Emitted by both checkout variants after a purchase is recorded and paid.
 * `storeId` and `purchaseId` are indexed and can be used in log filters.
 */
export const PURCHASE_MADE_EVENT = {
  name: "PurchaseMade",
  indexed: ["storeId", "purchaseId"],
} as const satisfies EventDefinition;

/**
 * ERC20 transfer event, also emitted for mints (from the zero address).
 */
export const TRANSFER_EVENT = {
  name: "Transfer",
  indexed: ["from", "to"],
} as const satisfies EventDefinition;

/**
 * ERC20 approval event, emitted by `approve` and `permit`.
 */
export const APPROVAL_EVENT = {
  name: "Approval",
  indexed: ["owner", "spender"],
} as const satisfies EventDefinition;
