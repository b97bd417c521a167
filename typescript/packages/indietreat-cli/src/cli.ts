#!/usr/bin/env node

import { Command } from 'commander';
import { runDemo } from './commands/demo';
import { signPermit } from './commands/signPermit';
import { logger } from './utils/logger';
import { describeError } from './utils/parse';

const program = new Command();

program
  .name('indietreat')
  .description('CLI tool for trying IndieTreat checkouts on a local in-process chain')
  .version('0.1.0');

program
  .command('demo')
  .description('Deploy a checkout on a local chain and make one purchase')
  .option('--variant <variant>', 'Checkout variant: native or token', 'native')
  .option('-s, --store <id>', 'Store ID', '7')
  .option('-p, --product <name>', 'Product name', 'Sticker Pack')
  .option('-u, --username <name>', 'Buyer display name', 'alice')
  .option('--user-id <id>', 'Buyer user ID', '42')
  .option('-a, --amount <amount>', 'Payment amount in the smallest unit', '100')
  .option('-v, --verbose', 'Show local chain activity')
  .action(runDemo);

program
  .command('sign-permit <token> <spender> <amount>')
  .description('Sign an EIP-2612 permit offline and print it as JSON')
  .option('-k, --key <privateKey>', 'Private key of the token owner (or set INDIETREAT_PRIVATE_KEY env var)')
  .option('-d, --deadline <timestamp>', 'Unix timestamp the permit expires at (default: one hour from now)')
  .option('-n, --nonce <nonce>', "Owner's current permit nonce", '0')
  .option('-c, --chain-id <chainId>', 'Chain ID (or set INDIETREAT_CHAIN_ID env var)')
  .option('--name <name>', 'Token EIP-712 domain name', 'IndieTreat Token')
  .option('--token-version <version>', 'Token EIP-712 domain version')
  .action(signPermit);

program.parseAsync().catch(error => {
  logger.error(describeError(error));
  process.exitCode = 1;
});
