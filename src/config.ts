import * as fs from "fs";
import * as path from "path";
import { errorMessage, isRecord } from "./shared.js";

export interface RepolizerConfig {
  iconsDir?: string;
  repositoriesFile?: string;
  resultsDir?: string;
  quiet?: boolean;
}

export interface LoadedConfig {
  config: RepolizerConfig;
  sourcePath: string | null;
}

export class ConfigError extends Error {}

export const CONFIG_FILE = "repolizer.config.json";
export const PACKAGE_JSON_KEY = "repolizer";

const ALLOWED_KEYS = new Set(["iconsDir", "repositoriesFile", "resultsDir", "quiet"]);

function parseString(
  value: unknown,
  key: keyof RepolizerConfig,
  sourcePath: string
): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected non-empty string.`);
  }
  return value;
}

function parseBoolean(
  value: unknown,
  key: keyof RepolizerConfig,
  sourcePath: string
): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected boolean.`);
  }
  return value;
}

function parseConfig(value: unknown, sourcePath: string): RepolizerConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config in ${sourcePath}: expected a JSON object.`);
  }

  for (const key of Object.keys(value)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`Unknown config key "${key}" in ${sourcePath}.`);
    }
  }

  return {
    iconsDir: parseString(value.iconsDir, "iconsDir", sourcePath),
    repositoriesFile: parseString(value.repositoriesFile, "repositoriesFile", sourcePath),
    resultsDir: parseString(value.resultsDir, "resultsDir", sourcePath),
    quiet: parseBoolean(value.quiet, "quiet", sourcePath),
  };
}

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Failed to read config file ${filePath}: ${errorMessage(err)}`);
  }
}

export function loadConfig(cwd: string, explicitConfigPath?: string): LoadedConfig {
  if (explicitConfigPath) {
    const configPath = path.resolve(cwd, explicitConfigPath);
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return {
      config: parseConfig(readJsonFile(configPath), configPath),
      sourcePath: configPath,
    };
  }

  const configJsonPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(configJsonPath)) {
    return {
      config: parseConfig(readJsonFile(configJsonPath), configJsonPath),
      sourcePath: configJsonPath,
    };
  }

  const packageJsonPath = path.join(cwd, "package.json");
  if (fs.existsSync(packageJsonPath)) {
    const packageJson = readJsonFile(packageJsonPath);
    if (isRecord(packageJson) && packageJson[PACKAGE_JSON_KEY] !== undefined) {
      const sourcePath = `${packageJsonPath}#${PACKAGE_JSON_KEY}`;
      return {
        config: parseConfig(packageJson[PACKAGE_JSON_KEY], sourcePath),
        sourcePath,
      };
    }
  }

  return {
    config: {},
    sourcePath: null,
  };
}
