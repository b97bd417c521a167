/**
 * @fileoverview Error codes and messages for IndieTreat checkouts
 * @module @indietreat/core/errors
 */

/**
 * Error codes raised by the checkout contracts, the payment token and the chain runtime.
 */
export const CHECKOUT_ERROR_CODES = {
  /** Zero wallet, non-positive amount or an integer outside uint256 */
  INVALID_INPUT: "INVALID_INPUT",
  /** Query beyond the recorded purchase count */
  NOT_FOUND: "NOT_FOUND",
  /** Native value could not be forwarded to the seller wallet */
  FORWARD_FAILED: "FORWARD_FAILED",
  /** Token could not be pulled from the buyer into the seller wallet */
  TRANSFER_FAILED: "TRANSFER_FAILED",
  /** Spending allowance is below the requested amount */
  INSUFFICIENT_AUTHORIZATION: "INSUFFICIENT_AUTHORIZATION",
  /** Signed authorization is malformed or signed by someone else */
  INVALID_SIGNATURE: "INVALID_SIGNATURE",
  /** Signed authorization deadline has passed */
  EXPIRED: "EXPIRED",
  /** Value sent outside the designated entry point */
  REJECTED_PAYMENT: "REJECTED_PAYMENT",
  /** Account balance is below the amount moved */
  INSUFFICIENT_BALANCE: "INSUFFICIENT_BALANCE",
  /** Caller may not perform the operation */
  UNAUTHORIZED: "UNAUTHORIZED",
  /** Recording routine entered while already running */
  REENTRANT_CALL: "REENTRANT_CALL",
} as const;

/**
 * Type for checkout error code values.
 */
export type CheckoutErrorCode = (typeof CHECKOUT_ERROR_CODES)[keyof typeof CHECKOUT_ERROR_CODES];

/**
 * Human-readable error messages for checkout error codes.
 */
export const CHECKOUT_ERROR_MESSAGES: Record<CheckoutErrorCode, string> = {
  [CHECKOUT_ERROR_CODES.INVALID_INPUT]: "The call arguments failed validation.",
  [CHECKOUT_ERROR_CODES.NOT_FOUND]: "No purchase exists with that identifier.",
  [CHECKOUT_ERROR_CODES.FORWARD_FAILED]: "The seller wallet rejected the forwarded payment.",
  [CHECKOUT_ERROR_CODES.TRANSFER_FAILED]: "The token transfer to the seller wallet failed.",
  [CHECKOUT_ERROR_CODES.INSUFFICIENT_AUTHORIZATION]:
    "The spending allowance is lower than the payment amount.",
  [CHECKOUT_ERROR_CODES.INVALID_SIGNATURE]: "The permit signature is invalid.",
  [CHECKOUT_ERROR_CODES.EXPIRED]: "The permit deadline has passed.",
  [CHECKOUT_ERROR_CODES.REJECTED_PAYMENT]: "This contract does not accept direct payments.",
  [CHECKOUT_ERROR_CODES.INSUFFICIENT_BALANCE]: "The account balance is lower than the amount moved.",
  [CHECKOUT_ERROR_CODES.UNAUTHORIZED]: "The caller is not allowed to perform this operation.",
  [CHECKOUT_ERROR_CODES.REENTRANT_CALL]: "Reentrant call into the checkout.",
};

/**
 * Gets a human-readable error message for a checkout error code.
 *
 * @param code - The checkout error code
 * @returns Human-readable error message
 */
export function getCheckoutErrorMessage(code: string): string {
  return isCheckoutErrorCode(code)
    ? CHECKOUT_ERROR_MESSAGES[code]
    : "An unknown checkout error occurred.";
}

/**
 * Checks whether a string is one of the checkout error codes.
 *
 * @param code - The string to check
 * @returns True when the string is a known code
 */
export function isCheckoutErrorCode(code: string): code is CheckoutErrorCode {
  return Object.values(CHECKOUT_ERROR_CODES).some(known => known === code);
}

/**
 * Error thrown by every failing call. Throwing it reverts the enclosing transaction.
 */
export class CheckoutError extends Error {
  public readonly code: CheckoutErrorCode;
  public readonly details?: Record<string, unknown>;

  /**
   * Builds a `CheckoutError` for the given code.
   *
   * @param code - The checkout error code
   * @param message - Overrides the default message for the code
   * @param options - Extra context and the underlying cause
   * @param options.details - Structured context for the failure
   * @param options.cause - Error that triggered this one
   */
  constructor(
    code: CheckoutErrorCode,
    message?: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message ?? getCheckoutErrorMessage(code), { cause: options.cause });
    this.name = "CheckoutError";
    this.code = code;
    this.details = options.details;
  }
}

/**
 * Checks whether a value is a `CheckoutError`, optionally with a specific code.
 *
 * @param error - The value to check
 * @param code - Code the error must carry
 * @returns True when the value is a matching `CheckoutError`
 */
export function isCheckoutError(error: unknown, code?: CheckoutErrorCode): error is CheckoutError {
  return error instanceof CheckoutError && (code === undefined || error.code === code);
}
