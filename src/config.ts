import { CapacityLimits, DEFAULT_LIMITS, assertCapacityLimits } from "./bulk/capacity";

export interface AppConfig {
  http: {
    port: number;
    apiKey: string;
  };
  bulk: CapacityLimits;
  sessions: {
    dbPath: string;
    ttlSeconds: number;
    purgeIntervalMs: number;
  };
  mail: {
    baseUrl: string;
    username: string;
    password: string;
  } | null;
  board: {
    baseUrl: string;
    apiKey: string;
  } | null;
  logLevel: "info" | "debug";
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got '${raw}'`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  const logLevel = process.env.LOG_LEVEL ?? "info";
  const apiKey = process.env.API_KEY;

  if (!apiKey) {
    throw new Error("Missing required env var: API_KEY");
  }

  const bulk: CapacityLimits = {
    minBatchSize: intFromEnv("BULK_MIN_BATCH_SIZE", DEFAULT_LIMITS.minBatchSize),
    maxBatchSize: intFromEnv("BULK_MAX_BATCH_SIZE", DEFAULT_LIMITS.maxBatchSize),
    maxTotalItems: intFromEnv("BULK_MAX_TOTAL_ITEMS", DEFAULT_LIMITS.maxTotalItems),
  };
  assertCapacityLimits(bulk);

  const mailBaseUrl = process.env.MAIL_API_BASE_URL;
  const mailUsername = process.env.MAIL_API_USERNAME;
  const mailPassword = process.env.MAIL_API_PASSWORD;
  if (mailBaseUrl && (!mailUsername || !mailPassword)) {
    throw new Error(
      "MAIL_API_USERNAME and MAIL_API_PASSWORD are required when MAIL_API_BASE_URL is set"
    );
  }

  const boardBaseUrl = process.env.BOARD_API_BASE_URL;
  const boardApiKey = process.env.BOARD_API_KEY;
  if (boardBaseUrl && !boardApiKey) {
    throw new Error("BOARD_API_KEY is required when BOARD_API_BASE_URL is set");
  }

  return {
    http: {
      port: intFromEnv("HTTP_PORT", 3001),
      apiKey,
    },
    bulk,
    sessions: {
      dbPath: process.env.SESSION_DB_PATH || "./data/sessions.db",
      ttlSeconds: intFromEnv("SESSION_TTL_SECONDS", 3600),
      purgeIntervalMs: intFromEnv("SESSION_PURGE_INTERVAL_MS", 60_000),
    },
    mail:
      mailBaseUrl && mailUsername && mailPassword
        ? { baseUrl: mailBaseUrl, username: mailUsername, password: mailPassword }
        : null,
    board:
      boardBaseUrl && boardApiKey ? { baseUrl: boardBaseUrl, apiKey: boardApiKey } : null,
    logLevel: logLevel === "debug" ? "debug" : "info",
  };
}
