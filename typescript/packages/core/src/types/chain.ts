import type { Address, Hex } from "viem";

/**
 * A call submitted by an account. `value` is the native amount attached to it.
 */
export type TransactionRequest = {
  from: Address;
  value?: bigint;
};

/**
 * Execution context handed to a contract while it runs.
 */
export interface CallContext {
  /** Immediate caller (an account, or the contract that made a nested call) */
  sender: Address;
  /** Address of the executing contract */
  self: Address;
  /** Native value attached to this call */
  value: bigint;
  /** Timestamp of the block the transaction is mined in */
  timestamp: bigint;
  blockNumber: bigint;
  chainId: number;
}

export type BlockHeader = {
  number: bigint;
  timestamp: bigint;
};

export type EventValue = bigint | string | boolean;

export type EventArgs = Readonly<Record<string, EventValue>>;

/**
 * Describes an event: its name and which argument names are indexed (filterable).
 */
export interface EventDefinition {
  name: string;
  indexed: readonly string[];
}

export interface ChainLog {
  address: Address;
  eventName: string;
  args: EventArgs;
  /** Argument names that can be used in `getLogs` / `watchEvent` filters */
  indexed: readonly string[];
  blockNumber: bigint;
  transactionHash: Hex;
  logIndex: number;
}

export interface LogFilter {
  address?: Address;
  eventName?: string;
  /** Matches indexed arguments only */
  args?: Partial<EventArgs>;
  fromBlock?: bigint;
  toBlock?: bigint;
}

/**
 * A contract deployed on the local chain.
 *
 * `receive` handles plain value transfers and `fallback` handles calls to entry points the
 * contract does not define. A contract without them rejects such calls.
 */
export interface ChainContract {
  readonly address: Address;
  receive?(ctx: CallContext): void | Promise<void>;
  fallback?(ctx: CallContext, functionName: string): void | Promise<void>;
}

/**
 * Raw transaction, used for plain value transfers and calls by function name.
 */
export type RawTransaction = TransactionRequest & {
  to: Address;
  functionName?: string;
};

export interface ChainLogger {
  debug(message: string): void;
  warn(message: string): void;
}

/**
 * Records undo operations for state changes made inside the active transaction.
 */
export interface StateJournal {
  record(undo: () => void): void;
}
