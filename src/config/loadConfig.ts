import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { AppConfig, AppConfigSchema } from "./types.js";
import { CONFIG_FILE_NAME, CONFIG_PATH_ENV } from "./constants.js";
import { ConfigError } from "../slice/errors.js";
import { findPackageRoot } from "../util/findPackageRoot.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function expandEnvVars(obj: unknown): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not set`);
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => expandEnvVars(item));
  }

  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = expandEnvVars(value);
    }
    return result;
  }

  return obj;
}

export function resolveConfigPath(configPath?: string): string {
  const envConfigPath = process.env[CONFIG_PATH_ENV];
  if (configPath) return resolve(configPath);
  if (envConfigPath) return resolve(envConfigPath);
  return resolve(findPackageRoot(__dirname), "config", CONFIG_FILE_NAME);
}

export function loadConfig(configPath?: string): AppConfig {
  const filePath = resolveConfigPath(configPath);

  let rawContent: string;
  try {
    rawContent = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${filePath}`, {
        cause: err,
      });
    }
    throw err;
  }

  let parsedConfig: unknown;
  try {
    parsedConfig = JSON.parse(rawContent);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${filePath}`, {
        cause: err,
      });
    }
    throw err;
  }

  const result = AppConfigSchema.safeParse(expandEnvVars(parsedConfig));

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => {
        const path = e.path.join(".");
        return `  - ${path}: ${e.message}`;
      })
      .join("\n");
    throw new ConfigError(`Config validation failed:\n${errors}`);
  }

  return result.data;
}
