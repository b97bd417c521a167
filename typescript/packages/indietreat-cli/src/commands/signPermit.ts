import { z } from 'zod';
import type { Address } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { AddressSchema } from '@indietreat/core';
import { INDIETREAT_TOKEN_VERSION, signEip2612PermitMessage } from '@indietreat/evm';
import { logger } from '../utils/logger';
import { getChainId, getPrivateKey } from '../utils/config';
import { BigIntOption, PrivateKeyOption, describeError } from '../utils/parse';

interface SignPermitOptions {
  key?: string;
  deadline?: string;
  nonce: string;
  chainId?: string;
  name: string;
  tokenVersion?: string;
}

/** Default permit validity when no deadline is given, in seconds */
const DEFAULT_VALIDITY = 3600;

const SignPermitSchema = z.object({
  token: AddressSchema,
  spender: AddressSchema,
  amount: BigIntOption,
  key: PrivateKeyOption,
  deadline: BigIntOption,
  nonce: BigIntOption,
  chainId: BigIntOption.refine(value => value > 0n && value <= BigInt(Number.MAX_SAFE_INTEGER), {
    message: 'Chain ID must be between 1 and 2^53 - 1'
  }).transform(value => Number(value)),
  name: z.string().min(1),
  version: z.string().min(1)
});

export async function signPermit(token: string, spender: string, amount: string, options: SignPermitOptions) {
  const privateKey = getPrivateKey(options.key);
  if (!privateKey) {
    logger.error('Private key required. Use --key or set INDIETREAT_PRIVATE_KEY');
    process.exitCode = 1;
    return;
  }

  const parsed = SignPermitSchema.safeParse({
    token,
    spender,
    amount,
    key: privateKey,
    deadline: options.deadline ?? String(Math.floor(Date.now() / 1000) + DEFAULT_VALIDITY),
    nonce: options.nonce,
    chainId: getChainId(options.chainId),
    name: options.name,
    version: options.tokenVersion ?? INDIETREAT_TOKEN_VERSION
  });
  if (!parsed.success) {
    logger.error(`Invalid arguments: ${describeError(parsed.error)}`);
    process.exitCode = 1;
    return;
  }

  const args = parsed.data;
  const signer = privateKeyToAccount(args.key);
  const verifyingContract: Address = args.token;
  const permit = await signEip2612PermitMessage(
    signer,
    { name: args.name, version: args.version, chainId: args.chainId, verifyingContract },
    { spender: args.spender, amount: args.amount, nonce: args.nonce, deadline: args.deadline }
  );

  logger.json({
    ...permit,
    amount: permit.amount.toString(),
    nonce: permit.nonce.toString(),
    deadline: permit.deadline.toString(),
    chainId: args.chainId
  });
}
