import { describe, it, expect } from "vitest";
import {
  AccountCountMismatchError,
  BlockUnavailableError,
  CommitFailedError,
  TransactionFailedError,
  ViewCallError,
  toError,
} from "./errors.ts";

describe("domain errors", () => {
  it("should describe an unavailable block", () => {
    const error = new BlockUnavailableError(120, new Error("UNKNOWN_BLOCK"));

    expect(error.name).toBe("BlockUnavailableError");
    expect(error.height).toBe(120);
    expect(error.message).toBe("Block 120 is unavailable: UNKNOWN_BLOCK");
  });

  it("should describe an exhausted commit", () => {
    const error = new CommitFailedError("target.near", "migrate", 10);

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe("Failed to commit migrate on target.near after 10 attempts");
  });

  it("should describe a failed view call", () => {
    const error = new ViewCallError("aurora", "ft_balance_of", "not a call result");
    expect(error.message).toBe("View call aurora.ft_balance_of failed: not a call result");
  });

  it("should describe an account count mismatch", () => {
    const error = new AccountCountMismatchError(2, 3n);
    expect(error.message).toBe("Wrong accounts count: found 2 accounts, counter says 3");
  });

  it("should describe a failed transaction", () => {
    const error = new TransactionFailedError("tx1", "out of gas");
    expect(error.message).toBe("Transaction tx1 failed: out of gas");
  });
});

describe("toError", () => {
  it("should keep errors and wrap anything else", () => {
    const error = new Error("kept");

    expect(toError(error)).toBe(error);
    expect(toError("plain")).toEqual(new Error("plain"));
  });
});
