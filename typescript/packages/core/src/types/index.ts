export type {
  BlockHeader,
  CallContext,
  ChainContract,
  ChainLog,
  ChainLogger,
  EventArgs,
  EventDefinition,
  EventValue,
  LogFilter,
  RawTransaction,
  StateJournal,
  TransactionRequest,
} from "./chain";
export type { Purchase, PurchaseMade } from "./purchase";
export type { PermitAuthorization, PermitToken } from "./token";
