import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "./errors.js";

export const DEFAULT_SOURCE_BASE_URL =
  "https://download.bls.gov/pub/time.series/cu/";
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;
// BLS answers 403 to requests without an identifying User-Agent
export const DEFAULT_USER_AGENT = "cpi-u-loader/0.1.0 (data-ops@example.com)";

// ============================================================================
// Schema
// ============================================================================

const EnvSchema = Type.Object({
  DATABASE_URL: Type.String({ minLength: 1 }),
  CPI_SOURCE_BASE_URL: Type.Optional(Type.String({ pattern: "^https?://" })),
  CPI_FETCH_TIMEOUT_MS: Type.Optional(Type.String({ pattern: "^[0-9]+$" })),
  CPI_USER_AGENT: Type.Optional(Type.String({ minLength: 1 })),
});

type Env = Static<typeof EnvSchema>;

export interface AppConfig {
  /** SQLite file the pipeline writes to */
  databasePath: string;
  /** Directory URL holding the cu.* files, always ending in "/" */
  sourceBaseUrl: string;
  fetchTimeoutMs: number;
  userAgent: string;
}

// ============================================================================
// Loading
// ============================================================================

function describeErrors(env: Record<string, string | undefined>): string {
  return [...Value.Errors(EnvSchema, env)]
    .map((e) => {
      const key = e.path.replace(/^\//, "");
      return key === "" ? e.message : `${key}: ${e.message}`;
    })
    .join("; ");
}

function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Build the process configuration from environment variables.
 * Called once at startup; throws ConfigurationError before any work is done.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Only our keys are validated; the rest of the environment is ignored
  const relevant = {
    DATABASE_URL: env.DATABASE_URL,
    CPI_SOURCE_BASE_URL: env.CPI_SOURCE_BASE_URL,
    CPI_FETCH_TIMEOUT_MS: env.CPI_FETCH_TIMEOUT_MS,
    CPI_USER_AGENT: env.CPI_USER_AGENT,
  };

  if (!Value.Check(EnvSchema, relevant)) {
    if (env.DATABASE_URL === undefined || env.DATABASE_URL === "") {
      throw new ConfigurationError(
        "DATABASE_URL is not set; point it at the SQLite file to update"
      );
    }
    throw new ConfigurationError(
      `Invalid configuration: ${describeErrors(relevant)}`
    );
  }

  const parsed: Env = relevant;

  return {
    databasePath: parsed.DATABASE_URL,
    sourceBaseUrl: withTrailingSlash(
      parsed.CPI_SOURCE_BASE_URL ?? DEFAULT_SOURCE_BASE_URL
    ),
    fetchTimeoutMs:
      parsed.CPI_FETCH_TIMEOUT_MS !== undefined
        ? Number(parsed.CPI_FETCH_TIMEOUT_MS)
        : DEFAULT_FETCH_TIMEOUT_MS,
    userAgent: parsed.CPI_USER_AGENT ?? DEFAULT_USER_AGENT,
  };
}
