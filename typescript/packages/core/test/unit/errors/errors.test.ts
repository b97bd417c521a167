import { describe, it, expect } from "vitest";
import {
  CHECKOUT_ERROR_CODES,
  CheckoutError,
  getCheckoutErrorMessage,
  isCheckoutError,
  isCheckoutErrorCode,
} from "../../../src/errors";

describe("Checkout Errors", () => {
  describe("CHECKOUT_ERROR_CODES", () => {
    it("should use the key as the code value", () => {
      for (const [key, value] of Object.entries(CHECKOUT_ERROR_CODES)) {
        expect(value).toBe(key);
      }
    });

    it("should have all expected error codes", () => {
      expect(Object.keys(CHECKOUT_ERROR_CODES).sort()).toEqual([
        "EXPIRED",
        "FORWARD_FAILED",
        "INSUFFICIENT_AUTHORIZATION",
        "INSUFFICIENT_BALANCE",
        "INVALID_INPUT",
        "INVALID_SIGNATURE",
        "NOT_FOUND",
        "REENTRANT_CALL",
        "REJECTED_PAYMENT",
        "TRANSFER_FAILED",
        "UNAUTHORIZED",
      ]);
    });
  });

  describe("getCheckoutErrorMessage", () => {
    it("should return correct message for known error codes", () => {
      expect(getCheckoutErrorMessage("REJECTED_PAYMENT")).toBe(
        "This contract does not accept direct payments.",
      );
      expect(getCheckoutErrorMessage("EXPIRED")).toBe("The permit deadline has passed.");
    });

    it("should return default message for unknown error codes", () => {
      expect(getCheckoutErrorMessage("UNKNOWN_CODE")).toBe("An unknown checkout error occurred.");
    });
  });

  describe("isCheckoutErrorCode", () => {
    it("should accept known codes only", () => {
      expect(isCheckoutErrorCode("NOT_FOUND")).toBe(true);
      expect(isCheckoutErrorCode("not_found")).toBe(false);
    });
  });

  describe("CheckoutError", () => {
    it("should default the message to the code's message", () => {
      const error = new CheckoutError(CHECKOUT_ERROR_CODES.FORWARD_FAILED);

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("CheckoutError");
      expect(error.code).toBe("FORWARD_FAILED");
      expect(error.message).toBe("The seller wallet rejected the forwarded payment.");
      expect(error.details).toBeUndefined();
    });

    it("should keep a custom message, details and cause", () => {
      const cause = new Error("boom");
      const error = new CheckoutError(CHECKOUT_ERROR_CODES.TRANSFER_FAILED, "Token returned false", {
        details: { amount: 100n },
        cause,
      });

      expect(error.message).toBe("Token returned false");
      expect(error.details).toEqual({ amount: 100n });
      expect(error.cause).toBe(cause);
    });
  });

  describe("isCheckoutError", () => {
    it("should match any checkout error without a code", () => {
      expect(isCheckoutError(new CheckoutError(CHECKOUT_ERROR_CODES.EXPIRED))).toBe(true);
      expect(isCheckoutError(new Error("EXPIRED"))).toBe(false);
      expect(isCheckoutError("EXPIRED")).toBe(false);
    });

    it("should match the code when given", () => {
      const error = new CheckoutError(CHECKOUT_ERROR_CODES.EXPIRED);

      expect(isCheckoutError(error, CHECKOUT_ERROR_CODES.EXPIRED)).toBe(true);
      expect(isCheckoutError(error, CHECKOUT_ERROR_CODES.INVALID_SIGNATURE)).toBe(false);
    });
  });
});
