import { config } from 'dotenv';
import { resolve } from 'path';
import { DEFAULT_CHAIN_ID } from '@indietreat/core';

config({ path: resolve(process.cwd(), '.env') });

export function getPrivateKey(cliKey?: string): string | undefined {
  return cliKey || process.env.INDIETREAT_PRIVATE_KEY;
}

export function getChainId(cliChainId?: string): string {
  return cliChainId || process.env.INDIETREAT_CHAIN_ID || String(DEFAULT_CHAIN_ID);
}
