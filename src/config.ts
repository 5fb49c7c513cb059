import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";

import { createLogger } from "./logging/configLogger.js";

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface HttpAdapterConfig {
  logging: {
    debug: boolean;
  };
  transport: {
    timeoutMs: number;
    maxRedirects: number;
    throwOnHttpError: boolean;
  };
  messages: {
    defaultProtocolVersion: string;
  };
}

type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_CONFIG: HttpAdapterConfig = {
  logging: {
    debug: false,
  },
  transport: {
    timeoutMs: 30_000,
    maxRedirects: 5,
    // same as axios: 4xx/5xx reject
    throwOnHttpError: true,
  },
  messages: {
    defaultProtocolVersion: "1.1",
  },
};

function getEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === "true" || value === "1";
}

function parseNumberEnv(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return Number(value);
}

function loadConfigFromFile(): DeepPartial<HttpAdapterConfig> {
  try {
    const configPath = join(process.cwd(), "config.json");
    const configFile = readFileSync(configPath, "utf8");
    return JSON.parse(configFile) as DeepPartial<HttpAdapterConfig>;
  } catch (error: unknown) {
    // Can't use logger here as it's not created yet
    console.warn(`[CONFIG] Unable to load config.json (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`);
    return {};
  }
}

/**
 * Layers defaults, then config.json, then environment overrides.
 */
export function resolveConfig(
  fileConfig: DeepPartial<HttpAdapterConfig>,
  env: Env = process.env,
): HttpAdapterConfig {
  return {
    logging: {
      debug:
        parseBooleanEnv(getEnv(env, "HTTP_ADAPTER_DEBUG"))
        ?? fileConfig.logging?.debug
        ?? DEFAULT_CONFIG.logging.debug,
    },
    transport: {
      timeoutMs:
        parseNumberEnv(getEnv(env, "HTTP_ADAPTER_TIMEOUT_MS"))
        ?? fileConfig.transport?.timeoutMs
        ?? DEFAULT_CONFIG.transport.timeoutMs,
      maxRedirects: fileConfig.transport?.maxRedirects ?? DEFAULT_CONFIG.transport.maxRedirects,
      throwOnHttpError:
        fileConfig.transport?.throwOnHttpError ?? DEFAULT_CONFIG.transport.throwOnHttpError,
    },
    messages: {
      defaultProtocolVersion:
        fileConfig.messages?.defaultProtocolVersion
        ?? DEFAULT_CONFIG.messages.defaultProtocolVersion,
    },
  };
}

/**
 * Throws one Error listing every invalid setting.
 */
export function validateConfig(candidate: HttpAdapterConfig): void {
  const errors: string[] = [];

  const { timeoutMs, maxRedirects } = candidate.transport;
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    errors.push(`transport.timeoutMs must be a non-negative number. Got: ${timeoutMs}`);
  }

  if (!Number.isInteger(maxRedirects) || maxRedirects < 0) {
    errors.push(`transport.maxRedirects must be a non-negative integer. Got: ${maxRedirects}`);
  }

  if (candidate.messages.defaultProtocolVersion.trim() === "") {
    errors.push("messages.defaultProtocolVersion must not be empty");
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.map((error) => `- ${error}`).join("\n")}`);
  }
}

const fileConfig = loadConfigFromFile();

export const config: HttpAdapterConfig = resolveConfig(fileConfig);

const logger = createLogger(config.logging.debug);

try {
  validateConfig(config);
} catch (error: unknown) {
  logger.error(error instanceof Error ? error.message : String(error));
  throw error;
}

export const DEBUG_MODE = config.logging.debug;
export const DEFAULT_PROTOCOL_VERSION = config.messages.defaultProtocolVersion;

const { timeoutMs, maxRedirects, throwOnHttpError } = config.transport;
logger.debug(
  `[CONFIG] timeout=${timeoutMs}ms maxRedirects=${maxRedirects} throwOnHttpError=${throwOnHttpError} protocol=${DEFAULT_PROTOCOL_VERSION}`,
);
