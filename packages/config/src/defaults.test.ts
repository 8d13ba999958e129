import { describe, it, expect } from "vitest";
import {
  DEFAULT_INDEXER_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_MIGRATION_CONFIG,
  DEFAULT_RPC_URLS,
  defaultConfig,
} from "./defaults.ts";

describe("DEFAULT_INDEXER_CONFIG", () => {
  it("should have correct default values", () => {
    expect(DEFAULT_INDEXER_CONFIG.dataFile).toBe("data.borsh");
    expect(DEFAULT_INDEXER_CONFIG.requestDelayMs).toBe(60);
    expect(DEFAULT_INDEXER_CONFIG.saveIntervalMs).toBe(60_000);
  });
});

describe("DEFAULT_MIGRATION_CONFIG", () => {
  it("should have correct default values", () => {
    expect(DEFAULT_MIGRATION_CONFIG.batchSize).toBe(750);
    expect(DEFAULT_MIGRATION_CONFIG.commitRetries).toBe(10);
    expect(DEFAULT_MIGRATION_CONFIG.commitRetryDelayMs).toBe(1500);
    expect(DEFAULT_MIGRATION_CONFIG.gasTera).toBe(300);
  });
});

describe("DEFAULT_LOGGING_CONFIG", () => {
  it("should have correct default values", () => {
    expect(DEFAULT_LOGGING_CONFIG.level).toBe("info");
    expect(DEFAULT_LOGGING_CONFIG.timestamps).toBe(true);
    expect(DEFAULT_LOGGING_CONFIG.json).toBe(false);
    expect(DEFAULT_LOGGING_CONFIG.progress).toBe(true);
  });
});

describe("defaultConfig", () => {
  it("should target the mainnet archival node by default", () => {
    const config = defaultConfig();

    expect(config.network.id).toBe("mainnet");
    expect(config.network.rpcUrl).toBe(DEFAULT_RPC_URLS.mainnet);
    expect(config.contract.source).toBe("aurora");
  });

  it("should pick the endpoint of the requested network", () => {
    expect(defaultConfig("testnet").network.rpcUrl).toBe(
      "https://archival-rpc.testnet.near.org"
    );
  });

  it("should return independent copies", () => {
    const first = defaultConfig();
    first.indexer.dataFile = "changed.borsh";

    expect(defaultConfig().indexer.dataFile).toBe("data.borsh");
  });
});
