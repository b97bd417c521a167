import { getAddress, isAddress, isHex, maxUint256, zeroAddress } from "viem";
import type { Address, Hex } from "viem";
import { z } from "zod";
import { CHECKOUT_ERROR_CODES, CheckoutError } from "../errors";
import type { ChainLog, PurchaseMade } from "../types";

// ============================================================================
// Reusable Primitive Schemas
// ============================================================================

/**
 * Unsigned 256-bit integer.
 */
export const Uint256Schema = z.bigint().nonnegative().max(maxUint256);
export type Uint256 = z.infer<typeof Uint256Schema>;

/**
 * Strictly positive uint256, used for payment amounts.
 */
export const PositiveAmountSchema = z.bigint().positive().max(maxUint256);

/**
 * EVM address in any casing, normalized to its checksummed form.
 */
export const AddressSchema = z
  .custom<Address>(value => typeof value === "string" && isAddress(value, { strict: false }), {
    message: "Invalid address",
  })
  .transform(value => getAddress(value));

/**
 * Seller wallet - any address except the zero address.
 */
export const WalletSchema = AddressSchema.refine(value => value !== zeroAddress, {
  message: "Wallet must not be the zero address",
});

/**
 * 0x-prefixed hex string.
 */
export const HexSchema = z.custom<Hex>(value => typeof value === "string" && isHex(value), {
  message: "Invalid hex string",
});

/**
 * Signature bytes as submitted. Encoding is checked by the verifying token, which reports
 * malformed signatures as `INVALID_SIGNATURE`.
 */
export const SignatureSchema = z.string();

// ============================================================================
// Chain Schemas
// ============================================================================

/**
 * Sender and attached value of a call.
 */
export const TransactionRequestSchema = z.object({
  from: AddressSchema,
  value: Uint256Schema.default(0n),
});

/**
 * Serializable part of the local chain configuration.
 */
export const LocalChainOptionsSchema = z.object({
  chainId: z.number().int().positive().optional(),
  genesisTimestamp: Uint256Schema.optional(),
});

// ============================================================================
// Checkout Input Schemas
// ============================================================================

/**
 * Fields every purchase carries regardless of payment medium.
 */
export const PurchaseDetailsSchema = z.object({
  storeId: Uint256Schema,
  productName: z.string(),
  username: z.string(),
  userId: Uint256Schema,
});
export type PurchaseDetails = z.input<typeof PurchaseDetailsSchema>;

/**
 * Input of the shared recording routine.
 */
export const RecordInputSchema = PurchaseDetailsSchema.extend({
  amount: PositiveAmountSchema,
  wallet: WalletSchema,
});
export type RecordInput = z.input<typeof RecordInputSchema>;

/**
 * Native checkout `purchase` input. The amount is the value attached to the call.
 */
export const NativePurchaseInputSchema = PurchaseDetailsSchema.extend({
  wallet: WalletSchema,
});
export type NativePurchaseInput = z.input<typeof NativePurchaseInputSchema>;

/**
 * Token checkout `purchase` input.
 */
export const TokenPurchaseInputSchema = RecordInputSchema;
export type TokenPurchaseInput = z.input<typeof TokenPurchaseInputSchema>;

/**
 * Token checkout `purchaseWithPermit` input.
 */
export const PermitPurchaseInputSchema = TokenPurchaseInputSchema.extend({
  deadline: Uint256Schema,
  signature: SignatureSchema,
});
export type PermitPurchaseInput = z.input<typeof PermitPurchaseInputSchema>;

/**
 * EIP-2612 signed authorization.
 */
export const PermitAuthorizationSchema = z.object({
  owner: AddressSchema,
  spender: AddressSchema,
  value: Uint256Schema,
  deadline: Uint256Schema,
  signature: SignatureSchema,
});

// ============================================================================
// Event Schemas
// ============================================================================

/**
 * Arguments of a `PurchaseMade` log.
 */
export const PurchaseMadeArgsSchema = z.object({
  storeId: Uint256Schema,
  purchaseId: Uint256Schema,
  productName: z.string(),
  username: z.string(),
  userId: Uint256Schema,
  timestamp: Uint256Schema,
  amount: PositiveAmountSchema,
  wallet: WalletSchema,
});

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parses a value with a schema, throwing `INVALID_INPUT` on failure.
 *
 * @param schema - The schema to parse with
 * @param value - The value to parse
 * @returns The parsed value
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const summary = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new CheckoutError(CHECKOUT_ERROR_CODES.INVALID_INPUT, summary, {
      details: { issues: result.error.issues },
    });
  }
  return result.data;
}

/**
 * Decodes the arguments of a `PurchaseMade` log.
 *
 * @param log - A log emitted by a checkout
 * @returns The purchase event arguments
 */
export function decodePurchaseMade(log: ChainLog): PurchaseMade {
  return parseInput(PurchaseMadeArgsSchema, log.args);
}
