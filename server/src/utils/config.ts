import fs from "fs";
import path from "path";
import { parseArgs } from "util";
import Joi from "joi";
import { ConfigError } from "./errors";

export interface AppConfig {
  broker: string;
  topics: string[];
  downloadDirectory: string;
  port: number;
  host: string;
  apiKey?: string;
  downloadTimeoutMs: number;
  queueReportIntervalMs: number;
}

interface ConfigFile {
  broker?: string;
  topics: string[];
  download_directory: string;
}

const configFileSchema = Joi.object<ConfigFile>({
  broker: Joi.string(),
  topics: Joi.array().items(Joi.string().min(1)).unique().default([]),
  download_directory: Joi.string().min(1).required(),
}).unknown(true);

interface EnvVars {
  REDIS_URL?: string;
  SERVER_PORT: number;
  SERVER_HOST: string;
  SERVER_API_KEY?: string;
  DOWNLOAD_TIMEOUT_MS: number;
  QUEUE_REPORT_INTERVAL_MS: number;
}

const envSchema = Joi.object<EnvVars>({
  REDIS_URL: Joi.string().uri({ scheme: ["redis", "rediss"] }),
  SERVER_PORT: Joi.number().integer().min(0).max(65535).default(8080),
  SERVER_HOST: Joi.string().default("127.0.0.1"),
  SERVER_API_KEY: Joi.string().allow(""),
  DOWNLOAD_TIMEOUT_MS: Joi.number().integer().min(0).default(0),
  QUEUE_REPORT_INTERVAL_MS: Joi.number().integer().min(1000).default(60000),
}).unknown(true);

const brokerSchema = Joi.string()
  .uri({ scheme: ["redis", "rediss"] })
  .required();

function configFromArgs(argv: string[]): string | undefined {
  try {
    const { values } = parseArgs({
      args: argv,
      options: { config: { type: "string" } },
      strict: false,
      allowPositionals: true,
    });
    const config = values.config;
    return typeof config === "string" && config.length > 0 ? config : undefined;
  } catch (error) {
    throw new ConfigError("Invalid command line arguments", { cause: error });
  }
}

/**
 * Config file location: `--config <path>`, then CONFIG_PATH, then
 * config.json in the working directory.
 */
export function resolveConfigPath(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const fromArgs = configFromArgs(argv);
  if (fromArgs) {
    return path.resolve(cwd, fromArgs);
  }
  if (env.CONFIG_PATH) {
    return path.resolve(cwd, env.CONFIG_PATH);
  }
  return path.join(cwd, "config.json");
}

export function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${configPath}`, {
      cause: error,
    });
  }

  const file = configFileSchema.validate(raw);
  if (file.error || !file.value) {
    throw new ConfigError(
      `Invalid config file ${configPath}: ${file.error?.message ?? "empty"}`,
    );
  }

  const vars = envSchema.validate(env);
  if (vars.error || !vars.value) {
    throw new ConfigError(
      `Invalid environment: ${vars.error?.message ?? "empty"}`,
    );
  }

  const broker = brokerSchema.validate(env.REDIS_URL ?? file.value.broker);
  if (broker.error || typeof broker.value !== "string") {
    throw new ConfigError(
      `Invalid broker: ${broker.error?.message ?? "missing"}`,
    );
  }

  return {
    broker: broker.value,
    topics: file.value.topics,
    downloadDirectory: path.resolve(file.value.download_directory),
    port: vars.value.SERVER_PORT,
    host: vars.value.SERVER_HOST,
    apiKey: vars.value.SERVER_API_KEY || undefined,
    downloadTimeoutMs: vars.value.DOWNLOAD_TIMEOUT_MS,
    queueReportIntervalMs: vars.value.QUEUE_REPORT_INTERVAL_MS,
  };
}
