// packages/adaptive-client/src/config.ts
//
// Client settings. Precedence: explicit option > environment > default.

import { ConfigurationError } from "./errors";
import { loggerFromEnv, type Logger } from "./logger";

export const ENV = {
  serviceUrl: "ADAPTIVE_EVAL_SERVICE_URL",
  apiKey: "ADAPTIVE_EVAL_API_KEY",
  maxItems: "ADAPTIVE_EVAL_MAX_ITEMS",
  debug: "ADAPTIVE_EVAL_DEBUG",
} as const;

export const DEFAULTS = {
  serviceUrl: "http://localhost:8787/adaptive-testing",
  maxItems: 150,
  timeoutMs: 30_000,
  tokenRefreshMarginMs: 5 * 60_000,
} as const;

export type AuthMode = "api-key" | "token";

export type ClientOptions = {
  serviceUrl?: string;
  apiKey?: string;
  /** Progress denominator only; the service decides when a run ends. */
  maxItems?: number;
  timeoutMs?: number;
  authMode?: AuthMode;
  logger?: Logger;
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
};

export type ClientConfig = {
  serviceUrl: string;
  apiKey: string;
  maxItems: number;
  timeoutMs: number;
  authMode: AuthMode;
  logger: Logger;
};

function pick(value: string | undefined, env: NodeJS.ProcessEnv, name: string): string | undefined {
  if (value !== undefined) return value;
  const fromEnv = env[name];
  return fromEnv === undefined || fromEnv === "" ? undefined : fromEnv;
}

export function normalizeBaseUrl(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

function requiredOption(value: string | undefined, name: string, envName: string): string {
  if (value === undefined) {
    throw new ConfigurationError(
      `The ${name} client option must be set either by passing ${name} to the client or by setting the ${envName} environment variable`
    );
  }
  return value;
}

function positiveInt(raw: number | string, what: string): number {
  const n = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${what} must be a positive integer, got: ${String(raw)}`);
  }
  return n;
}

export function resolveConfig(options: ClientOptions = {}): ClientConfig {
  const env = options.env ?? process.env;

  const serviceUrl = normalizeBaseUrl(pick(options.serviceUrl, env, ENV.serviceUrl) ?? DEFAULTS.serviceUrl);
  try {
    new URL(serviceUrl);
  } catch (err) {
    throw new ConfigurationError(`Invalid service URL: ${serviceUrl}`, { cause: err });
  }

  const apiKey = requiredOption(pick(options.apiKey, env, ENV.apiKey), "apiKey", ENV.apiKey);

  const maxItemsRaw = options.maxItems ?? pick(undefined, env, ENV.maxItems) ?? DEFAULTS.maxItems;
  const maxItems = positiveInt(maxItemsRaw, "maxItems");
  const timeoutMs = positiveInt(options.timeoutMs ?? DEFAULTS.timeoutMs, "timeoutMs");

  return {
    serviceUrl,
    apiKey,
    maxItems,
    timeoutMs,
    authMode: options.authMode ?? "api-key",
    logger: options.logger ?? loggerFromEnv("adaptive-client", env, ENV.debug),
  };
}
