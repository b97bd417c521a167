import { AsyncLocalStorage } from "node:async_hooks";
import { getAddress, getContractAddress, isAddress, isAddressEqual, keccak256, toHex } from "viem";
import type { Address, Hex } from "viem";
import { DEFAULT_CHAIN_ID } from "../constants";
import { CHECKOUT_ERROR_CODES, CheckoutError } from "../errors";
import { AddressSchema, LocalChainOptionsSchema, TransactionRequestSchema, Uint256Schema, parseInput } from "../schemas";
import type {
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
} from "../types";
import { JournaledMap } from "./journal";

export interface LocalChainOptions {
  /** Chain id used in EIP-712 domains. Defaults to 31337. */
  chainId?: number;
  /** Wall clock in unix seconds. Defaults to `Date.now()`. */
  now?: () => bigint;
  /** Timestamp of block 0. Defaults to `now()`. */
  genesisTimestamp?: bigint;
  /** Receives block and revert diagnostics. Silent when omitted. */
  logger?: ChainLogger;
}

export interface ExecuteOptions {
  /** Whether the entry point accepts native value. Defaults to false. */
  payable?: boolean;
}

export interface WatchEventParameters {
  filter?: LogFilter;
  onLog: (log: ChainLog) => void;
  onError?: (error: unknown) => void;
}

type ActiveTransaction = {
  hash: Hex;
  block: BlockHeader;
  journal: Array<() => void>;
  logs: Array<Omit<ChainLog, "logIndex">>;
};

type Frame = {
  transaction: ActiveTransaction;
  /** Contract currently executing */
  self: Address;
};

/**
 * In-process EVM-like chain the checkout contracts run on.
 *
 * Every top-level call is a transaction: calls are serialized, each one is mined in its own
 * block, and a failing call reverts all of its state changes and drops its logs before the
 * error reaches the caller. Contracts keep their state in journaled structures bound to the
 * chain, and call each other through `execute`, which joins the active transaction.
 */
export class LocalChain implements StateJournal {
  readonly chainId: number;

  private readonly clock: () => bigint;
  private readonly logger?: ChainLogger;
  private readonly frames = new AsyncLocalStorage<Frame>();
  private readonly balances: JournaledMap<Address, bigint>;
  private readonly contracts = new Map<Address, ChainContract>();
  private readonly deployNonces = new Map<Address, bigint>();
  private readonly logs: ChainLog[] = [];
  private readonly watchers = new Set<WatchEventParameters>();
  private head: BlockHeader;
  private timeOffset = 0n;
  private pendingTimestamp?: bigint;
  private queue: Promise<void> = Promise.resolve();

  /**
   * Creates a chain with an empty genesis block.
   *
   * @param options - Chain configuration
   */
  constructor(options: LocalChainOptions = {}) {
    const { chainId, genesisTimestamp } = parseInput(LocalChainOptionsSchema, {
      chainId: options.chainId,
      genesisTimestamp: options.genesisTimestamp,
    });
    this.chainId = chainId ?? DEFAULT_CHAIN_ID;
    this.clock = options.now ?? (() => BigInt(Math.floor(Date.now() / 1000)));
    this.logger = options.logger;
    this.balances = new JournaledMap(this);
    this.head = { number: 0n, timestamp: genesisTimestamp ?? this.now() };
  }

  // ==========================================================================
  // Clock & blocks
  // ==========================================================================

  /**
   * Current wall-clock time of the chain in unix seconds, including `increaseTime` offsets.
   *
   * @returns The current time
   */
  now(): bigint {
    return this.clock() + this.timeOffset;
  }

  /**
   * Returns the latest mined block.
   *
   * @returns The block header
   */
  getBlock(): BlockHeader {
    return { ...this.head };
  }

  /**
   * Fixes the timestamp of the next mined block.
   *
   * @param timestamp - Must be later than the latest block
   */
  setNextBlockTimestamp(timestamp: bigint): void {
    const next = parseInput(Uint256Schema, timestamp);
    if (next <= this.head.timestamp) {
      throw new CheckoutError(
        CHECKOUT_ERROR_CODES.INVALID_INPUT,
        `Timestamp ${next} is not after the latest block timestamp ${this.head.timestamp}`,
      );
    }
    this.pendingTimestamp = next;
  }

  /**
   * Moves the chain clock forward.
   *
   * @param seconds - Seconds to add
   */
  increaseTime(seconds: bigint): void {
    this.timeOffset += parseInput(Uint256Schema, seconds);
  }

  // ==========================================================================
  // Accounts & contracts
  // ==========================================================================

  /**
   * Returns the native balance of an account.
   *
   * @param address - The account
   * @returns The balance in wei
   */
  getBalance(address: Address): bigint {
    return this.balances.get(getAddress(address)) ?? 0n;
  }

  /**
   * Sets the native balance of an account. Development helper, not journaled.
   *
   * @param address - The account
   * @param amount - The new balance in wei
   */
  setBalance(address: Address, amount: bigint): void {
    if (this.frames.getStore()) {
      throw new Error("setBalance cannot be used inside a transaction");
    }
    this.balances.setUnjournaled(parseInput(AddressSchema, address), parseInput(Uint256Schema, amount));
  }

  /**
   * Deploys a contract at the address derived from the deployer and its deployment nonce.
   *
   * @param deployer - Account deploying the contract
   * @param build - Creates the contract instance for the assigned address
   * @returns The deployed contract
   */
  deploy<T extends ChainContract>(deployer: Address, build: (address: Address) => T): T {
    const from = parseInput(AddressSchema, deployer);
    const nonce = this.deployNonces.get(from) ?? 0n;
    const address = getContractAddress({ from, nonce });
    const contract = build(address);
    if (!isAddressEqual(contract.address, address)) {
      throw new Error(`Contract reported address ${contract.address}, expected ${address}`);
    }
    this.deployNonces.set(from, nonce + 1n);
    this.contracts.set(address, contract);
    this.logger?.debug(`Deployed contract at ${address} from ${from}`);
    return contract;
  }

  /**
   * Looks up a deployed contract.
   *
   * @param address - The contract address
   * @returns The contract, or undefined for externally owned accounts
   */
  getContract(address: Address): ChainContract | undefined {
    return this.contracts.get(getAddress(address));
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Runs a contract entry point.
   *
   * Outside a transaction this starts one: it waits for earlier transactions, mines a block,
   * moves `tx.value` to the contract and runs `body`, reverting everything if it throws.
   * Inside a transaction it is a nested call, which must come from the executing contract.
   * Value attached to an entry point that is not payable fails with `REJECTED_PAYMENT`.
   *
   * @param tx - Sender and attached value
   * @param to - The contract being called
   * @param body - The entry point logic
   * @param options - Entry point attributes
   * @returns The entry point result
   */
  async execute<R>(
    tx: TransactionRequest,
    to: Address,
    body: (ctx: CallContext) => R | Promise<R>,
    options: ExecuteOptions = {},
  ): Promise<R> {
    const { from, value } = parseInput(TransactionRequestSchema, tx);
    const payable = options.payable ?? false;
    const target = parseInput(AddressSchema, to);
    const frame = this.frames.getStore();

    if (frame) {
      if (!isAddressEqual(from, frame.self)) {
        throw new CheckoutError(
          CHECKOUT_ERROR_CODES.UNAUTHORIZED,
          `Nested call must come from the executing contract ${frame.self}, got ${from}`,
        );
      }
      const ctx = this.createContext(frame.transaction.block, from, target, value);
      return this.frames.run({ transaction: frame.transaction, self: target }, async () => {
        this.acceptValue(from, target, value, payable);
        return body(ctx);
      });
    }

    return this.enqueue(() => this.executeTransaction(from, target, value, payable, body));
  }

  /**
   * Low-level value call from the executing contract. A rejection by the recipient reverts
   * the changes made by the call and is reported as `false`.
   *
   * @param ctx - Context of the calling contract
   * @param to - The recipient
   * @param value - Wei to send
   * @returns Whether the recipient accepted the value
   */
  async call(ctx: CallContext, to: Address, value: bigint): Promise<boolean> {
    const { transaction } = this.requireFrame();
    const target = parseInput(AddressSchema, to);
    const journalMark = transaction.journal.length;
    const logMark = transaction.logs.length;

    try {
      await this.frames.run({ transaction, self: target }, async () => {
        this.moveValue(ctx.self, target, value);
        const recipient = this.contracts.get(target);
        if (recipient) {
          await this.dispatchReceive(
            recipient,
            this.createContext(transaction.block, ctx.self, target, value),
          );
        }
      });
      return true;
    } catch (error) {
      this.revertTo(transaction, journalMark, logMark);
      this.logger?.debug(`Call from ${ctx.self} to ${target} failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Sends a raw transaction: a plain value transfer, or a call by function name that no typed
   * entry point handles. Contracts handle these through `receive` and `fallback`.
   *
   * @param transaction - The raw transaction
   */
  async sendTransaction(transaction: RawTransaction): Promise<void> {
    const { to, functionName, ...tx } = transaction;
    // The recipient's receive or fallback decides whether value is accepted
    const dispatch = async (ctx: CallContext): Promise<void> => {
      const contract = this.contracts.get(ctx.self);
      if (!contract) {
        return;
      }
      if (functionName === undefined) {
        await this.dispatchReceive(contract, ctx);
        return;
      }
      if (!contract.fallback) {
        throw new CheckoutError(
          CHECKOUT_ERROR_CODES.REJECTED_PAYMENT,
          `Contract ${contract.address} has no entry point ${functionName}`,
        );
      }
      await contract.fallback(ctx, functionName);
    };
    await this.execute(tx, to, dispatch, { payable: true });
  }

  /**
   * Records an undo operation for the active transaction.
   *
   * @param undo - Restores the state changed by the caller
   */
  record(undo: () => void): void {
    this.requireFrame().transaction.journal.push(undo);
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  /**
   * Emits an event from the executing contract. Logs become visible once the transaction
   * commits.
   *
   * @param ctx - Context of the emitting contract
   * @param event - The event definition
   * @param args - The event arguments
   */
  emit(ctx: CallContext, event: EventDefinition, args: EventArgs): void {
    const { transaction } = this.requireFrame();
    transaction.logs.push({
      address: ctx.self,
      eventName: event.name,
      args: Object.freeze({ ...args }),
      indexed: event.indexed,
      blockNumber: transaction.block.number,
      transactionHash: transaction.hash,
    });
  }

  /**
   * Returns committed logs matching a filter, in emission order.
   *
   * @param filter - Address, event name, indexed arguments and block range to match
   * @returns The matching logs
   */
  getLogs(filter: LogFilter = {}): ChainLog[] {
    return this.logs.filter(log => matchesFilter(filter, log));
  }

  /**
   * Subscribes to logs as transactions commit.
   *
   * @param parameters - Filter and callbacks
   * @returns Function removing the subscription
   */
  watchEvent(parameters: WatchEventParameters): () => void {
    this.watchers.add(parameters);
    return () => {
      this.watchers.delete(parameters);
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async executeTransaction<R>(
    from: Address,
    to: Address,
    value: bigint,
    payable: boolean,
    body: (ctx: CallContext) => R | Promise<R>,
  ): Promise<R> {
    const block = this.mineBlock();
    const transaction: ActiveTransaction = {
      hash: keccak256(toHex(`${this.chainId}:${block.number}:${from}:${to}`)),
      block,
      journal: [],
      logs: [],
    };
    const ctx = this.createContext(block, from, to, value);

    try {
      const result = await this.frames.run({ transaction, self: to }, async () => {
        this.acceptValue(from, to, value, payable);
        return body(ctx);
      });
      this.commit(transaction);
      return result;
    } catch (error) {
      this.revertTo(transaction, 0, 0);
      this.logger?.warn(`Transaction ${transaction.hash} reverted: ${describeError(error)}`);
      throw error;
    }
  }

  private mineBlock(): BlockHeader {
    const earliest = this.head.timestamp + 1n;
    const now = this.now();
    const timestamp = this.pendingTimestamp ?? (now > earliest ? now : earliest);
    this.pendingTimestamp = undefined;
    this.head = { number: this.head.number + 1n, timestamp };
    return this.head;
  }

  private commit(transaction: ActiveTransaction): void {
    const committed: ChainLog[] = transaction.logs.map((log, offset) => ({
      ...log,
      logIndex: this.logs.length + offset,
    }));
    this.logs.push(...committed);
    this.logger?.debug(
      `Block ${transaction.block.number} mined: ${transaction.hash} (${committed.length} logs)`,
    );

    for (const watcher of this.watchers) {
      for (const log of committed.filter(entry => matchesFilter(watcher.filter ?? {}, entry))) {
        try {
          watcher.onLog(log);
        } catch (error) {
          if (watcher.onError) {
            watcher.onError(error);
          } else {
            this.logger?.warn(`Log listener failed: ${describeError(error)}`);
          }
        }
      }
    }
  }

  private revertTo(transaction: ActiveTransaction, journalMark: number, logMark: number): void {
    for (let index = transaction.journal.length - 1; index >= journalMark; index--) {
      transaction.journal[index]();
    }
    transaction.journal.length = journalMark;
    transaction.logs.length = logMark;
  }

  private acceptValue(from: Address, to: Address, value: bigint, payable: boolean): void {
    if (value > 0n && !payable) {
      throw new CheckoutError(
        CHECKOUT_ERROR_CODES.REJECTED_PAYMENT,
        `Entry point of ${to} is not payable, ${value} wei attached`,
      );
    }
    this.moveValue(from, to, value);
  }

  private moveValue(from: Address, to: Address, value: bigint): void {
    if (value === 0n) {
      return;
    }
    const available = this.getBalance(from);
    if (available < value) {
      throw new CheckoutError(
        CHECKOUT_ERROR_CODES.INSUFFICIENT_BALANCE,
        `Balance of ${from} is ${available}, ${value} required`,
      );
    }
    this.balances.set(from, available - value);
    this.balances.set(to, this.getBalance(to) + value);
  }

  private async dispatchReceive(contract: ChainContract, ctx: CallContext): Promise<void> {
    if (contract.receive) {
      await contract.receive(ctx);
    } else if (contract.fallback) {
      await contract.fallback(ctx, "");
    } else {
      throw new CheckoutError(CHECKOUT_ERROR_CODES.REJECTED_PAYMENT);
    }
  }

  private createContext(block: BlockHeader, sender: Address, self: Address, value: bigint): CallContext {
    return {
      sender,
      self,
      value,
      timestamp: block.timestamp,
      blockNumber: block.number,
      chainId: this.chainId,
    };
  }

  private requireFrame(): Frame {
    const frame = this.frames.getStore();
    if (!frame) {
      throw new Error("No active transaction: state changes and events require a transaction");
    }
    return frame;
  }
}

/**
 * Checks a log against a filter. Argument filters apply to indexed arguments only.
 *
 * @param filter - The filter
 * @param log - The log
 * @returns Whether the log matches
 */
function matchesFilter(filter: LogFilter, log: Omit<ChainLog, "logIndex">): boolean {
  if (filter.address && !isAddressEqual(filter.address, log.address)) return false;
  if (filter.eventName !== undefined && filter.eventName !== log.eventName) return false;
  if (filter.fromBlock !== undefined && log.blockNumber < filter.fromBlock) return false;
  if (filter.toBlock !== undefined && log.blockNumber > filter.toBlock) return false;

  return Object.entries(filter.args ?? {}).every(([name, expected]) => {
    if (expected === undefined) return true;
    const actual = log.args[name];
    return log.indexed.includes(name) && actual !== undefined && valuesEqual(actual, expected);
  });
}

function valuesEqual(actual: EventValue, expected: EventValue): boolean {
  if (
    typeof actual === "string" &&
    typeof expected === "string" &&
    isAddress(actual, { strict: false }) &&
    isAddress(expected, { strict: false })
  ) {
    return isAddressEqual(actual, expected);
  }
  return actual === expected;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
