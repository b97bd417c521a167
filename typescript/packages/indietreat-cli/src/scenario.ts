import { keccak256, toHex } from 'viem';
import type { Address } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import {
  LocalChain,
  NativeCheckout,
  PURCHASE_MADE_EVENT,
  TokenCheckout,
  decodePurchaseMade
} from '@indietreat/core';
import type { ChainLogger, Purchase } from '@indietreat/core';
import { IndieTreatToken, signEip2612Permit } from '@indietreat/evm';

export type CheckoutVariant = 'native' | 'token';

export interface ScenarioOptions {
  variant: CheckoutVariant;
  storeId: bigint;
  productName: string;
  username: string;
  userId: bigint;
  amount: bigint;
  logger?: ChainLogger;
  now?: () => bigint;
}

export interface ScenarioResult {
  variant: CheckoutVariant;
  checkout: Address;
  token?: Address;
  buyer: Address;
  seller: Address;
  purchaseId: bigint;
  purchase: Purchase;
  storePurchaseCount: bigint;
  sellerBalance: bigint;
}

/** Seconds a demo permit stays valid */
const PERMIT_VALIDITY = 3600n;

/**
 * Demo accounts are derived from fixed labels so every run uses the same addresses.
 */
function demoAccount(label: string) {
  return privateKeyToAccount(keccak256(toHex(`indietreat-demo:${label}`)));
}

/**
 * Deploys a checkout on a fresh local chain and makes one purchase through it.
 * The token variant pays with a permit signed by the buyer.
 */
export async function runCheckoutScenario(options: ScenarioOptions): Promise<ScenarioResult> {
  const chain = new LocalChain({ logger: options.logger, now: options.now });
  const deployer = demoAccount('deployer').address;
  const seller = demoAccount('seller').address;
  const buyer = demoAccount('buyer');
  const details = {
    storeId: options.storeId,
    productName: options.productName,
    username: options.username,
    userId: options.userId
  };

  let checkout: NativeCheckout | TokenCheckout;
  let token: IndieTreatToken | undefined;

  if (options.variant === 'native') {
    const native = chain.deploy(deployer, address => new NativeCheckout(chain, address));
    chain.setBalance(buyer.address, options.amount);
    await native.purchase({ from: buyer.address, value: options.amount }, { ...details, wallet: seller });
    checkout = native;
  } else {
    const paymentToken = chain.deploy(
      deployer,
      address => new IndieTreatToken(chain, address, { name: 'IndieTreat Token', symbol: 'TREAT', owner: deployer })
    );
    const tokenCheckout = chain.deploy(deployer, address => new TokenCheckout(chain, address, paymentToken));
    await paymentToken.mint({ from: deployer }, buyer.address, options.amount);

    const permit = await signEip2612Permit(
      buyer,
      paymentToken,
      tokenCheckout.address,
      options.amount,
      chain.now() + PERMIT_VALIDITY
    );
    await tokenCheckout.purchaseWithPermit(
      { from: buyer.address },
      { ...details, amount: options.amount, wallet: seller, deadline: permit.deadline, signature: permit.signature }
    );
    checkout = tokenCheckout;
    token = paymentToken;
  }

  const [log] = chain
    .getLogs({ address: checkout.address, eventName: PURCHASE_MADE_EVENT.name, args: { storeId: options.storeId } })
    .slice(-1);
  if (!log) {
    throw new Error('Purchase completed without a PurchaseMade log');
  }
  const { purchaseId } = decodePurchaseMade(log);

  return {
    variant: options.variant,
    checkout: checkout.address,
    token: token?.address,
    buyer: buyer.address,
    seller,
    purchaseId,
    purchase: checkout.getPurchase(options.storeId, purchaseId),
    storePurchaseCount: checkout.getStorePurchaseCount(options.storeId),
    sellerBalance: token ? token.balanceOf(seller) : chain.getBalance(seller)
  };
}
