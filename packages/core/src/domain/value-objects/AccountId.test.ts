import { describe, it, expect } from "vitest";
import { AccountId } from "./AccountId.ts";

describe("AccountId", () => {
  describe("isValid", () => {
    it("should accept named and implicit accounts", () => {
      expect(AccountId.isValid("alice.near")).toBe(true);
      expect(AccountId.isValid("bob.testnet")).toBe(true);
      expect(AccountId.isValid("ab".repeat(32))).toBe(true);
    });

    it("should reject malformed account ids", () => {
      expect(AccountId.isValid("a")).toBe(false);
      expect(AccountId.isValid("bob..near")).toBe(false);
      expect(AccountId.isValid("Alice.near")).toBe(false);
      expect(AccountId.isValid("a".repeat(65))).toBe(false);
    });
  });
});
