/**
 * @module @indietreat/core - IndieTreat checkout contracts and the local chain they run on
 */

export * from "./chain";
export * from "./checkout";
export * from "./constants";
export * from "./errors";
export * from "./ledger";
export * from "./schemas";
export type * from "./types";
