import { describe, it, expect } from "vitest";
import { ledgerliftConfigSchema, accountIdSchema } from "./schema.ts";

describe("ledgerliftConfigSchema", () => {
  it("should accept an empty config", () => {
    const result = ledgerliftConfigSchema.safeParse({});
    expect(result.success).toBe(true);
  });

  describe("network config", () => {
    it("should validate a known network", () => {
      const result = ledgerliftConfigSchema.safeParse({
        network: { id: "testnet", rpcUrl: "https://rpc.testnet.near.org" },
      });
      expect(result.success).toBe(true);
    });

    it("should reject an unknown network", () => {
      const result = ledgerliftConfigSchema.safeParse({
        network: { id: "betanet" },
      });
      expect(result.success).toBe(false);
    });

    it("should reject a malformed rpc url", () => {
      const result = ledgerliftConfigSchema.safeParse({
        network: { id: "mainnet", rpcUrl: "not a url" },
      });
      expect(result.success).toBe(false);
    });
  });

  describe("contract config", () => {
    it("should validate source and target accounts", () => {
      const result = ledgerliftConfigSchema.safeParse({
        contract: { source: "aurora", target: "eth-connector.near" },
      });
      expect(result.success).toBe(true);
    });

    it("should reject a target equal to the source", () => {
      const result = ledgerliftConfigSchema.safeParse({
        contract: { source: "aurora", target: "aurora" },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.path).toEqual(["contract", "target"]);
      }
    });
  });

  describe("indexer config", () => {
    it("should reject a negative start block", () => {
      const result = ledgerliftConfigSchema.safeParse({
        indexer: { startBlock: -1 },
      });
      expect(result.success).toBe(false);
    });

    it("should accept a zero request delay", () => {
      const result = ledgerliftConfigSchema.safeParse({
        indexer: { requestDelayMs: 0 },
      });
      expect(result.success).toBe(true);
    });
  });

  describe("migration config", () => {
    it("should reject a zero batch size", () => {
      const result = ledgerliftConfigSchema.safeParse({
        migration: { batchSize: 0 },
      });
      expect(result.success).toBe(false);
    });

    it("should reject more than 300 TGas", () => {
      const result = ledgerliftConfigSchema.safeParse({
        migration: { gasTera: 301 },
      });
      expect(result.success).toBe(false);
    });
  });

  describe("logging config", () => {
    it("should reject an unknown level", () => {
      const result = ledgerliftConfigSchema.safeParse({
        logging: { level: "verbose" },
      });
      expect(result.success).toBe(false);
    });
  });
});

describe("accountIdSchema", () => {
  it.each(["aurora", "alice.near", "relay_er-1.testnet", "0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef"])(
    "should accept %s",
    (accountId) => {
      expect(accountIdSchema.safeParse(accountId).success).toBe(true);
    }
  );

  it.each(["a", "Alice.near", "alice..near", "-alice", "alice.", "x".repeat(65)])(
    "should reject %s",
    (accountId) => {
      expect(accountIdSchema.safeParse(accountId).success).toBe(false);
    }
  );
});
