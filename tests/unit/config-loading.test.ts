import { describe, it } from "node:test";
import assert from "node:assert";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, resolveConfigPath } from "../../src/config/loadConfig.js";
import { applyConfig } from "../../src/config/applyConfig.js";
import { StorageManager } from "../../src/slice/storage.js";
import { ConfigError } from "../../src/slice/errors.js";
import { logger } from "../../src/util/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function withConfigFile(
  content: string,
  run: (configPath: string) => void,
): void {
  const dir = mkdtempSync(join(tmpdir(), "fixed-slice-config-"));
  const configPath = join(dir, "fixed-slice.config.json");
  try {
    writeFileSync(configPath, content);
    run(configPath);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

function withEnv(name: string, value: string | undefined, run: () => void): void {
  const old = process.env[name];
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
  try {
    run();
  } finally {
    if (old === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = old;
    }
  }
}

describe("loadConfig", () => {
  it("should resolve the default path under the package root", () => {
    withEnv("SLICE_CONFIG", undefined, () => {
      assert.strictEqual(
        resolveConfigPath(),
        resolve(__dirname, "../../config/fixed-slice.config.json"),
      );
    });
  });

  it("should load the bundled config", () => {
    withEnv("SLICE_CONFIG", undefined, () => {
      const config = loadConfig();
      assert.strictEqual(config.logLevel, "info");
      assert.strictEqual(config.storage.maxSlotsPerBlock, 16777216);
    });
  });

  it("should fill defaults for omitted sections", () => {
    withConfigFile("{}", (configPath) => {
      const config = loadConfig(configPath);
      assert.deepStrictEqual(config, {
        logLevel: "info",
        storage: {
          maxSlotsPerBlock: 16777216,
          maxLiveSlots: Number.MAX_SAFE_INTEGER,
        },
      });
    });
  });

  it("should use SLICE_CONFIG when no explicit path is provided", () => {
    withConfigFile(
      JSON.stringify({ logLevel: "debug", storage: { maxSlotsPerBlock: 64 } }),
      (configPath) => {
        withEnv("SLICE_CONFIG", configPath, () => {
          const config = loadConfig();
          assert.strictEqual(config.logLevel, "debug");
          assert.strictEqual(config.storage.maxSlotsPerBlock, 64);
        });
      },
    );
  });

  it("should expand environment variable references", () => {
    withConfigFile('{ "logLevel": "${SLICE_TEST_LEVEL}" }', (configPath) => {
      withEnv("SLICE_TEST_LEVEL", "warn", () => {
        assert.strictEqual(loadConfig(configPath).logLevel, "warn");
      });
    });
  });

  it("should reject references to unset variables", () => {
    withConfigFile('{ "logLevel": "${SLICE_TEST_UNSET}" }', (configPath) => {
      withEnv("SLICE_TEST_UNSET", undefined, () => {
        assert.throws(
          () => loadConfig(configPath),
          (err: unknown) =>
            err instanceof ConfigError &&
            err.message === 'Environment variable "SLICE_TEST_UNSET" is not set',
        );
      });
    });
  });

  it("should throw for a missing file", () => {
    assert.throws(
      () => loadConfig("/non/existent/path.json"),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.message === "Config file not found: /non/existent/path.json",
    );
  });

  it("should throw for invalid JSON", () => {
    withConfigFile("{ not json", (configPath) => {
      assert.throws(
        () => loadConfig(configPath),
        (err: unknown) =>
          err instanceof ConfigError &&
          err.message === `Invalid JSON in config file: ${configPath}`,
      );
    });
  });

  it("should report schema violations by path", () => {
    withConfigFile(
      JSON.stringify({ logLevel: "verbose", storage: { maxSlotsPerBlock: -1 } }),
      (configPath) => {
        assert.throws(
          () => loadConfig(configPath),
          (err: unknown) =>
            err instanceof ConfigError &&
            err.message.startsWith("Config validation failed:") &&
            err.message.includes("  - logLevel:") &&
            err.message.includes("  - storage.maxSlotsPerBlock:"),
        );
      },
    );
  });

  it("should clamp the default block limit to a smaller live slot budget", () => {
    withConfigFile(
      JSON.stringify({ storage: { maxLiveSlots: 1000 } }),
      (configPath) => {
        const config = loadConfig(configPath);
        assert.deepStrictEqual(config.storage, {
          maxSlotsPerBlock: 1000,
          maxLiveSlots: 1000,
        });
      },
    );
  });

  it("should keep an explicit block limit when only it is given", () => {
    withConfigFile(
      JSON.stringify({ storage: { maxSlotsPerBlock: 64 } }),
      (configPath) => {
        const config = loadConfig(configPath);
        assert.deepStrictEqual(config.storage, {
          maxSlotsPerBlock: 64,
          maxLiveSlots: Number.MAX_SAFE_INTEGER,
        });
      },
    );
  });

  it("should reject a block limit above the live slot budget", () => {
    withConfigFile(
      JSON.stringify({ storage: { maxSlotsPerBlock: 10, maxLiveSlots: 5 } }),
      (configPath) => {
        assert.throws(
          () => loadConfig(configPath),
          (err: unknown) =>
            err instanceof ConfigError &&
            err.message ===
              "Config validation failed:\n  - storage.maxSlotsPerBlock: maxSlotsPerBlock must not exceed maxLiveSlots",
        );
      },
    );
  });
});

describe("applyConfig", () => {
  it("should set the logger level and storage limits", () => {
    const storage = new StorageManager();
    const previousLevel = logger.getLevel();
    try {
      applyConfig(
        { logLevel: "error", storage: { maxSlotsPerBlock: 4, maxLiveSlots: 8 } },
        storage,
      );
      assert.strictEqual(logger.getLevel(), "error");
      assert.deepStrictEqual(storage.getOptions(), {
        maxSlotsPerBlock: 4,
        maxLiveSlots: 8,
      });
    } finally {
      logger.setLevel(previousLevel);
    }
  });
});
