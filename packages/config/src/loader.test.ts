import { describe, it, expect, afterEach } from "vitest";
import { fileURLToPath } from "node:url";
import {
  defineConfig,
  defineConfigWithEnv,
  findConfigFile,
  loadConfig,
  mergeConfig,
  resolveConfig,
} from "./loader.ts";

const fixture = (name: string) =>
  fileURLToPath(new URL(`./__fixtures__/${name}`, import.meta.url));

describe("defineConfig", () => {
  it("should return the config as-is", () => {
    const config = {
      network: { id: "testnet" as const },
      contract: { source: "aurora" },
    };

    expect(defineConfig(config)).toBe(config);
  });
});

describe("resolveConfig", () => {
  it("should fill every default for an empty config", () => {
    const config = resolveConfig({});

    expect(config.network).toEqual({
      id: "mainnet",
      rpcUrl: "https://archival-rpc.mainnet.near.org",
      timeout: 30_000,
    });
    expect(config.contract).toEqual({ source: "aurora", target: undefined });
    expect(config.migration.batchSize).toBe(750);
    expect(config.indexer.startBlock).toBeUndefined();
  });

  it("should keep explicit values", () => {
    const config = resolveConfig({
      network: { id: "localnet", rpcUrl: "http://localhost:3030" },
      indexer: { startBlock: 100, saveIntervalMs: 5000 },
    });

    expect(config.network.rpcUrl).toBe("http://localhost:3030");
    expect(config.indexer.startBlock).toBe(100);
    expect(config.indexer.saveIntervalMs).toBe(5000);
    expect(config.indexer.requestDelayMs).toBe(60);
  });

  it("should list every invalid field", () => {
    expect(() =>
      resolveConfig({ migration: { batchSize: 0 }, logging: { level: "loud" } })
    ).toThrow(/Invalid configuration:\n {2}- migration\.batchSize: .*\n {2}- logging\.level: /);
  });
});

describe("mergeConfig", () => {
  it("should merge sections with the override winning", () => {
    const merged = mergeConfig(
      { indexer: { dataFile: "a.borsh", requestDelayMs: 50 } },
      { indexer: { dataFile: "b.borsh" }, migration: { batchSize: 2 } }
    );

    expect(merged.indexer).toEqual({ dataFile: "b.borsh", requestDelayMs: 50 });
    expect(merged.migration).toEqual({ batchSize: 2 });
    expect(merged.network).toBeUndefined();
  });

  it("should keep base values for unset override keys", () => {
    const merged = mergeConfig(
      { indexer: { dataFile: "a.borsh" } },
      { indexer: { dataFile: undefined, startBlock: 7 } }
    );

    expect(merged.indexer).toEqual({ dataFile: "a.borsh", startBlock: 7 });
  });
});

describe("defineConfigWithEnv", () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  it("should apply the override of the current environment", () => {
    process.env.NODE_ENV = "production";

    const config = defineConfigWithEnv(
      { network: { id: "testnet" } },
      { production: { network: { id: "mainnet" } } }
    );

    expect(config.network?.id).toBe("mainnet");
  });

  it("should return the base config without a matching override", () => {
    process.env.NODE_ENV = "test";
    const base = { network: { id: "testnet" as const } };

    expect(defineConfigWithEnv(base, { production: {} })).toBe(base);
  });
});

describe("findConfigFile", () => {
  it("should find the config file in a directory", () => {
    expect(findConfigFile(fixture("project"))).toBe(
      fixture("project/ledgerlift.config.mjs")
    );
  });

  it("should return undefined when there is none", () => {
    expect(findConfigFile(fixture(""))).toBeUndefined();
  });
});

describe("loadConfig", () => {
  it("should load and resolve a config file", async () => {
    const config = await loadConfig({ cwd: fixture("project") });

    expect(config.network.id).toBe("testnet");
    expect(config.network.rpcUrl).toBe("https://archival-rpc.testnet.near.org");
    expect(config.network.timeout).toBe(5000);
    expect(config.contract.target).toBe("eth-connector.testnet");
    expect(config.indexer.dataFile).toBe("testnet-data.borsh");
    expect(config.indexer.requestDelayMs).toBe(90);
    expect(config.migration.batchSize).toBe(500);
    expect(config.migration.commitRetries).toBe(10);
  });

  it("should let overrides win over the file", async () => {
    const config = await loadConfig({
      cwd: fixture("project"),
      overrides: { indexer: { dataFile: "override.borsh", startBlock: 42 } },
    });

    expect(config.indexer.dataFile).toBe("override.borsh");
    expect(config.indexer.startBlock).toBe(42);
    expect(config.indexer.requestDelayMs).toBe(90);
  });

  it("should fall back to defaults without a config file", async () => {
    const config = await loadConfig({ cwd: fixture("") });

    expect(config.network.id).toBe("mainnet");
    expect(config.indexer.dataFile).toBe("data.borsh");
  });

  it("should reject an invalid config file", async () => {
    await expect(loadConfig({ cwd: fixture("invalid") })).rejects.toThrow(
      "Invalid configuration"
    );
  });

  it("should report a config path that cannot be loaded", async () => {
    await expect(
      loadConfig({ configPath: fixture("missing/ledgerlift.config.mjs") })
    ).rejects.toThrow(/^Failed to load configuration from /);
  });
});
