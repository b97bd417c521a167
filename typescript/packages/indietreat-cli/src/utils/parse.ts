import { z } from 'zod';
import type { Hex } from 'viem';

/** Decimal string option parsed into a uint256 bigint */
export const BigIntOption = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform(value => BigInt(value));

export const PrivateKeyOption = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, 'Expected a 32-byte hex private key')
  .transform((value): Hex => `0x${value.slice(2)}`);

/**
 * Formats an error for CLI output, including the checkout error code when present.
 */
export function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
  }
  if (error instanceof Error) {
    return 'code' in error && typeof error.code === 'string' ? `${error.code}: ${error.message}` : error.message;
  }
  return String(error);
}
