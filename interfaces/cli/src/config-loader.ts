import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import {
  LogLevel,
  formatZodIssues,
  fromYaml,
  getErrorMessage,
  parseLogLevel,
} from "@slidesmith/utils";
import type { MaterializerConfigInput } from "@slidesmith/assets";
import type { BuildConfigInput } from "@slidesmith/builder";
import { cliConfigSchema } from "./config";
import type { CLIConfig } from "./config";

export const CONFIG_FILE_NAME = "slidesmith.config.yaml";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LoadedConfig {
  build: BuildConfigInput;
  materializer: MaterializerConfigInput;
  logLevel: LogLevel;

  // Secrets from environment variables
  secrets: {
    openaiApiKey?: string | undefined;
  };
}

export interface LoadConfigOptions {
  cwd: string;
  env: Record<string, string | undefined>;
  /** Explicit config file; defaults to ./slidesmith.config.yaml when present */
  configPath?: string | undefined;
}

/**
 * Load configuration from slidesmith.config.yaml and environment variables.
 * Environment variables win over the file. Paths resolve against `cwd`.
 */
export function loadConfig(options: LoadConfigOptions): LoadedConfig {
  const { cwd, env } = options;
  const file = readConfigFile(options);

  const concurrency = parseConcurrency(env["SLIDESMITH_CONCURRENCY"]) ?? file.concurrency;
  const templateDir = file.templateDir;

  return {
    build: {
      outputRoot: resolve(cwd, file.outputRoot ?? "build"),
      ...(templateDir !== undefined ? { templateDir: resolve(cwd, templateDir) } : {}),
    },
    materializer: {
      ...(concurrency !== undefined ? { concurrency } : {}),
      ...(file.generation ? { generation: file.generation } : {}),
      ...(file.download ? { download: file.download } : {}),
    },
    logLevel: parseLogLevel(env["LOG_LEVEL"] ?? file.logLevel, LogLevel.INFO),
    secrets: {
      openaiApiKey: env["OPENAI_API_KEY"] || undefined,
    },
  };
}

function readConfigFile(options: LoadConfigOptions): CLIConfig {
  const configFile = options.configPath
    ? resolve(options.cwd, options.configPath)
    : join(options.cwd, CONFIG_FILE_NAME);

  if (!existsSync(configFile)) {
    if (options.configPath) {
      throw new ConfigError(`Configuration file not found: ${configFile}`);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = fromYaml(readFileSync(configFile, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Invalid configuration file ${configFile}: ${getErrorMessage(error)}`,
      { configFile },
    );
  }

  const parsed = cliConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration file ${configFile}: ${formatZodIssues(parsed.error.issues)}`,
      { configFile },
    );
  }
  return parsed.data;
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const concurrency = Number(value);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(
      `SLIDESMITH_CONCURRENCY must be a positive integer, got: ${value}`,
    );
  }
  return concurrency;
}
