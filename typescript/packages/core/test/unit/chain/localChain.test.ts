import { beforeEach, describe, it, expect, vi } from "vitest";
import { getContractAddress } from "viem";
import type { Address } from "viem";
import { JournaledValue, LocalChain } from "../../../src/chain";
import { CheckoutError } from "../../../src/errors";
import type { CallContext, ChainContract, ChainLog, EventDefinition, TransactionRequest } from "../../../src/types";
import {
  AcceptingWallet,
  BUYER,
  DEPLOYER,
  GENESIS_TIMESTAMP,
  OTHER_BUYER,
  RejectingWallet,
  SELLER,
} from "../../mocks";

const TICK_EVENT = { name: "Tick", indexed: ["caller"] } as const satisfies EventDefinition;

class Counter implements ChainContract {
  readonly count: JournaledValue<bigint>;

  constructor(
    private readonly chain: LocalChain,
    readonly address: Address,
  ) {
    this.count = new JournaledValue(chain, 0n);
  }

  async increment(tx: TransactionRequest, failWith?: string): Promise<CallContext> {
    return this.chain.execute(
      tx,
      this.address,
      ctx => {
        this.count.set(this.count.get() + 1n);
        this.chain.emit(ctx, TICK_EVENT, { caller: ctx.sender, count: this.count.get() });
        if (failWith) {
          throw new Error(failWith);
        }
        return ctx;
      },
      { payable: true },
    );
  }
}

class Payer implements ChainContract {
  constructor(
    private readonly chain: LocalChain,
    readonly address: Address,
  ) {}

  receive(): void {}

  async pay(tx: TransactionRequest, to: Address, amount: bigint): Promise<boolean> {
    return this.chain.execute(tx, this.address, ctx => this.chain.call(ctx, to, amount));
  }
}

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof CheckoutError ? error.code : undefined;
  }
  throw new Error("Expected the call to fail");
}

describe("LocalChain", () => {
  let clock: bigint;
  let logger: { debug: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn> };
  let chain: LocalChain;
  let counter: Counter;

  beforeEach(() => {
    clock = GENESIS_TIMESTAMP;
    logger = { debug: vi.fn(), warn: vi.fn() };
    chain = new LocalChain({ now: () => clock, logger });
    counter = chain.deploy(DEPLOYER, address => new Counter(chain, address));
  });

  describe("blocks", () => {
    it("should start at a genesis block on the default chain id", () => {
      expect(chain.chainId).toBe(31337);
      expect(chain.getBlock()).toEqual({ number: 0n, timestamp: GENESIS_TIMESTAMP });
    });

    it("should mine one block per transaction with increasing timestamps", async () => {
      const first = await counter.increment({ from: BUYER });
      const second = await counter.increment({ from: BUYER });

      expect(first.blockNumber).toBe(1n);
      expect(first.timestamp).toBe(GENESIS_TIMESTAMP + 1n);
      expect(second.blockNumber).toBe(2n);
      expect(second.timestamp).toBe(GENESIS_TIMESTAMP + 2n);
      expect(chain.getBlock()).toEqual({ number: 2n, timestamp: GENESIS_TIMESTAMP + 2n });
    });

    it("should follow the wall clock once it passes the latest block", async () => {
      clock = GENESIS_TIMESTAMP + 100n;

      const ctx = await counter.increment({ from: BUYER });

      expect(ctx.timestamp).toBe(GENESIS_TIMESTAMP + 100n);
    });

    it("should use a pinned timestamp for the next block only", async () => {
      chain.setNextBlockTimestamp(GENESIS_TIMESTAMP + 500n);

      const pinned = await counter.increment({ from: BUYER });
      const next = await counter.increment({ from: BUYER });

      expect(pinned.timestamp).toBe(GENESIS_TIMESTAMP + 500n);
      expect(next.timestamp).toBe(GENESIS_TIMESTAMP + 501n);
    });

    it("should reject a pinned timestamp that is not after the latest block", () => {
      expect(() => chain.setNextBlockTimestamp(GENESIS_TIMESTAMP)).toThrow(
        `Timestamp ${GENESIS_TIMESTAMP} is not after the latest block timestamp ${GENESIS_TIMESTAMP}`,
      );
    });

    it("should move the clock forward with increaseTime", async () => {
      chain.increaseTime(3600n);

      expect(chain.now()).toBe(GENESIS_TIMESTAMP + 3600n);
      expect((await counter.increment({ from: BUYER })).timestamp).toBe(GENESIS_TIMESTAMP + 3600n);
    });
  });

  describe("execute", () => {
    it("should revert state and drop logs when the body throws", async () => {
      await expect(counter.increment({ from: BUYER }, "boom")).rejects.toThrow("boom");

      expect(counter.count.get()).toBe(0n);
      expect(chain.getLogs()).toEqual([]);
      expect(chain.getBlock().number).toBe(1n);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringMatching(/^Transaction 0x[0-9a-f]{64} reverted: boom$/),
      );
    });

    it("should move attached value to the contract", async () => {
      chain.setBalance(BUYER, 50n);

      await counter.increment({ from: BUYER, value: 20n });

      expect(chain.getBalance(BUYER)).toBe(30n);
      expect(chain.getBalance(counter.address)).toBe(20n);
    });

    it("should return attached value when the transaction reverts", async () => {
      chain.setBalance(BUYER, 50n);

      await expect(counter.increment({ from: BUYER, value: 20n }, "boom")).rejects.toThrow("boom");

      expect(chain.getBalance(BUYER)).toBe(50n);
      expect(chain.getBalance(counter.address)).toBe(0n);
    });

    it("should fail with INSUFFICIENT_BALANCE when the sender cannot cover the value", async () => {
      chain.setBalance(BUYER, 10n);

      expect(await codeOf(counter.increment({ from: BUYER, value: 20n }))).toBe("INSUFFICIENT_BALANCE");
      expect(counter.count.get()).toBe(0n);
    });

    it("should reject value attached to an entry point that is not payable", async () => {
      chain.setBalance(BUYER, 50n);

      const rejected = chain.execute({ from: BUYER, value: 20n }, counter.address, () => undefined);

      await expect(rejected).rejects.toMatchObject({
        code: "REJECTED_PAYMENT",
        message: `Entry point of ${counter.address} is not payable, 20 wei attached`,
      });
      expect(chain.getBalance(BUYER)).toBe(50n);
      expect(chain.getBalance(counter.address)).toBe(0n);
    });

    it("should run nested calls from the executing contract in the same block", async () => {
      const payer = chain.deploy(DEPLOYER, address => new Payer(chain, address));

      const nested = await chain.execute({ from: BUYER }, payer.address, ctx =>
        counter.increment({ from: ctx.self }),
      );

      expect(nested.sender).toBe(payer.address);
      expect(nested.self).toBe(counter.address);
      expect(nested.blockNumber).toBe(1n);
      expect(counter.count.get()).toBe(1n);
    });

    it("should reject nested calls impersonating another account", async () => {
      const payer = chain.deploy(DEPLOYER, address => new Payer(chain, address));

      const code = await codeOf(
        chain.execute({ from: BUYER }, payer.address, () => counter.increment({ from: BUYER })),
      );

      expect(code).toBe("UNAUTHORIZED");
      expect(counter.count.get()).toBe(0n);
    });

    it("should run concurrent transactions one after another in call order", async () => {
      const order: string[] = [];

      const first = chain.execute({ from: BUYER }, counter.address, async () => {
        order.push("first:start");
        await new Promise(resolve => setTimeout(resolve, 10));
        order.push("first:end");
      });
      const second = chain.execute({ from: OTHER_BUYER }, counter.address, () => {
        order.push("second");
      });
      await Promise.all([first, second]);

      expect(order).toEqual(["first:start", "first:end", "second"]);
    });

    it("should keep processing after a failed transaction", async () => {
      const failed = counter.increment({ from: BUYER }, "boom");
      const next = counter.increment({ from: BUYER });

      await expect(failed).rejects.toThrow("boom");
      expect((await next).blockNumber).toBe(2n);
      expect(counter.count.get()).toBe(1n);
    });

    it("should refuse journaled writes outside a transaction", () => {
      expect(() => counter.count.set(5n)).toThrow("No active transaction");
    });

    it("should refuse setBalance inside a transaction", async () => {
      await expect(
        chain.execute({ from: BUYER }, counter.address, () => chain.setBalance(BUYER, 1n)),
      ).rejects.toThrow("setBalance cannot be used inside a transaction");
    });
  });

  describe("call", () => {
    let payer: Payer;

    beforeEach(() => {
      payer = chain.deploy(DEPLOYER, address => new Payer(chain, address));
      chain.setBalance(payer.address, 100n);
    });

    it("should pay externally owned accounts", async () => {
      expect(await payer.pay({ from: BUYER }, SELLER, 30n)).toBe(true);

      expect(chain.getBalance(SELLER)).toBe(30n);
      expect(chain.getBalance(payer.address)).toBe(70n);
    });

    it("should run the receive hook of contract recipients", async () => {
      const wallet = chain.deploy(DEPLOYER, address => new AcceptingWallet(address));

      expect(await payer.pay({ from: BUYER }, wallet.address, 30n)).toBe(true);

      expect(wallet.received).toEqual([30n]);
      expect(chain.getBalance(wallet.address)).toBe(30n);
    });

    it("should return false and undo the transfer when the recipient rejects", async () => {
      const wallet = chain.deploy(DEPLOYER, address => new RejectingWallet(address));

      expect(await payer.pay({ from: BUYER }, wallet.address, 30n)).toBe(false);

      expect(chain.getBalance(wallet.address)).toBe(0n);
      expect(chain.getBalance(payer.address)).toBe(100n);
      expect(logger.debug).toHaveBeenCalledWith(
        `Call from ${payer.address} to ${wallet.address} failed: Wallet does not accept payments`,
      );
    });

    it("should return false when the caller cannot cover the value", async () => {
      expect(await payer.pay({ from: BUYER }, SELLER, 500n)).toBe(false);
      expect(chain.getBalance(SELLER)).toBe(0n);
    });
  });

  describe("sendTransaction", () => {
    beforeEach(() => {
      chain.setBalance(BUYER, 100n);
    });

    it("should transfer value between accounts", async () => {
      await chain.sendTransaction({ from: BUYER, to: SELLER, value: 40n });

      expect(chain.getBalance(BUYER)).toBe(60n);
      expect(chain.getBalance(SELLER)).toBe(40n);
    });

    it("should reject value sent to a contract without a receive hook", async () => {
      expect(
        await codeOf(chain.sendTransaction({ from: BUYER, to: counter.address, value: 40n })),
      ).toBe("REJECTED_PAYMENT");
      expect(chain.getBalance(BUYER)).toBe(100n);
    });

    it("should deliver value to the receive hook", async () => {
      const wallet = chain.deploy(DEPLOYER, address => new AcceptingWallet(address));

      await chain.sendTransaction({ from: BUYER, to: wallet.address, value: 40n });

      expect(wallet.received).toEqual([40n]);
    });

    it("should reject unknown entry points on contracts without a fallback", async () => {
      const wallet = chain.deploy(DEPLOYER, address => new AcceptingWallet(address));

      await expect(
        chain.sendTransaction({ from: BUYER, to: wallet.address, functionName: "withdraw" }),
      ).rejects.toThrow(`Contract ${wallet.address} has no entry point withdraw`);
    });
  });

  describe("deploy", () => {
    it("should derive addresses from the deployer nonce", () => {
      const second = chain.deploy(DEPLOYER, address => new Counter(chain, address));

      expect(counter.address).toBe(getContractAddress({ from: DEPLOYER, nonce: 0n }));
      expect(second.address).toBe(getContractAddress({ from: DEPLOYER, nonce: 1n }));
      expect(chain.getContract(second.address)).toBe(second);
      expect(chain.getContract(SELLER)).toBeUndefined();
    });

    it("should reject contracts reporting another address", () => {
      expect(() => chain.deploy(DEPLOYER, () => new Counter(chain, SELLER))).toThrow(
        `Contract reported address ${SELLER}`,
      );
    });
  });

  describe("logs", () => {
    it("should number committed logs and tag them with their transaction", async () => {
      await counter.increment({ from: BUYER });
      await counter.increment({ from: OTHER_BUYER });

      const logs = chain.getLogs();
      expect(logs.map(log => log.logIndex)).toEqual([0, 1]);
      expect(logs.map(log => log.blockNumber)).toEqual([1n, 2n]);
      expect(logs[0]).toMatchObject({
        address: counter.address,
        eventName: "Tick",
        args: { caller: BUYER, count: 1n },
      });
      expect(logs[0].transactionHash).not.toBe(logs[1].transactionHash);
    });

    it("should filter on indexed arguments, address and block range", async () => {
      await counter.increment({ from: BUYER });
      await counter.increment({ from: OTHER_BUYER });
      await counter.increment({ from: BUYER });

      expect(chain.getLogs({ args: { caller: BUYER } }).map(log => log.blockNumber)).toEqual([1n, 3n]);
      expect(chain.getLogs({ args: { caller: BUYER }, fromBlock: 2n })).toHaveLength(1);
      expect(chain.getLogs({ address: SELLER })).toEqual([]);
      expect(chain.getLogs({ eventName: "Tock" })).toEqual([]);
    });

    it("should not filter on arguments that are not indexed", async () => {
      await counter.increment({ from: BUYER });

      expect(chain.getLogs({ args: { count: 1n } })).toEqual([]);
    });
  });

  describe("watchEvent", () => {
    it("should deliver committed logs until unwatched", async () => {
      const received: ChainLog[] = [];
      const unwatch = chain.watchEvent({
        filter: { args: { caller: BUYER } },
        onLog: log => received.push(log),
      });

      await counter.increment({ from: BUYER });
      await counter.increment({ from: OTHER_BUYER });
      await expect(counter.increment({ from: BUYER }, "boom")).rejects.toThrow("boom");
      unwatch();
      await counter.increment({ from: BUYER });

      expect(received.map(log => log.blockNumber)).toEqual([1n]);
    });

    it("should report listener errors without failing the transaction", async () => {
      const onError = vi.fn();
      chain.watchEvent({
        onLog: () => {
          throw new Error("listener broke");
        },
        onError,
      });

      await counter.increment({ from: BUYER });

      expect(counter.count.get()).toBe(1n);
      expect(onError).toHaveBeenCalledWith(new Error("listener broke"));
    });

    it("should log listener errors when no error callback is given", async () => {
      chain.watchEvent({
        onLog: () => {
          throw new Error("listener broke");
        },
      });

      await counter.increment({ from: BUYER });

      expect(logger.warn).toHaveBeenCalledWith("Log listener failed: listener broke");
    });
  });
});
