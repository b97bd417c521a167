import ora from 'ora';
import { z } from 'zod';
import { formatEther } from 'viem';
import { logger, chainLogger } from '../utils/logger';
import { BigIntOption, describeError } from '../utils/parse';
import { runCheckoutScenario } from '../scenario';

interface DemoOptions {
  variant: string;
  store: string;
  product: string;
  username: string;
  userId: string;
  amount: string;
  verbose?: boolean;
}

const DemoOptionsSchema = z.object({
  variant: z.enum(['native', 'token']),
  store: BigIntOption,
  product: z.string(),
  username: z.string(),
  userId: BigIntOption,
  amount: BigIntOption,
  verbose: z.boolean().optional()
});

export async function runDemo(options: DemoOptions) {
  logger.header('IndieTreat Checkout Demo');

  const parsed = DemoOptionsSchema.safeParse(options);
  if (!parsed.success) {
    logger.error(`Invalid options: ${describeError(parsed.error)}`);
    process.exitCode = 1;
    return;
  }
  const { variant, store, product, username, userId, amount, verbose } = parsed.data;

  logger.info(`Variant: ${variant}`);
  const spinner = ora(`Purchasing "${product}" in store ${store}`).start();

  try {
    const result = await runCheckoutScenario({
      variant,
      storeId: store,
      productName: product,
      username,
      userId,
      amount,
      logger: verbose ? chainLogger : undefined
    });
    spinner.succeed('Purchase recorded');

    logger.header('Purchase');
    logger.keyValue('Checkout', result.checkout);
    if (result.token) {
      logger.keyValue('Token', result.token);
    }
    logger.keyValue('Store', store.toString());
    logger.keyValue('Purchase ID', result.purchaseId.toString());
    logger.keyValue('Product', result.purchase.productName);
    logger.keyValue('Buyer', `${result.purchase.username} (#${result.purchase.userId}) ${result.buyer}`);
    logger.keyValue('Amount', `${result.purchase.amount} (${formatEther(result.purchase.amount)})`);
    logger.keyValue('Timestamp', new Date(Number(result.purchase.timestamp) * 1000).toISOString());
    logger.keyValue('Seller', result.seller);

    logger.header('Store');
    logger.keyValue('Purchases', result.storePurchaseCount.toString());
    logger.keyValue('Seller balance', result.sellerBalance.toString());
    logger.success('Payment forwarded to the seller wallet');
  } catch (error) {
    spinner.fail('Purchase failed');
    logger.error(describeError(error));
    process.exitCode = 1;
  }
}
