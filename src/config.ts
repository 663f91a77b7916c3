import { essentialCategories } from "./categories.js";
import type { LogLevel } from "./logger.js";

export interface Config {
  server: {
    host: string;
    port: number;
    transport: "stdio" | "http";
    corsOrigins: string[];
  };
  rateLimit: {
    rpm: number;
  };
  analysis: {
    defaultOwner: string;
    essentialCategories: ReadonlySet<string>;
    anomalyThreshold: number;
  };
  dbPath: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const transport = resolveTransport(env);

  return {
    server: {
      host: env.HOST || "127.0.0.1",
      port: intEnv(env, "PORT", 3300),
      transport,
      corsOrigins: (env.CORS_ORIGINS || "http://localhost:3000")
        .split(",")
        .map((o) => o.trim())
        .filter(Boolean),
    },
    rateLimit: {
      rpm: intEnv(env, "RATE_LIMIT_RPM", 60),
    },
    analysis: {
      defaultOwner: env.DEFAULT_OWNER || "default",
      essentialCategories: env.ESSENTIAL_CATEGORIES
        ? new Set(
            env.ESSENTIAL_CATEGORIES.split(",")
              .map((c) => c.trim())
              .filter(Boolean),
          )
        : essentialCategories(),
      anomalyThreshold: positiveNumberEnv(env, "ANOMALY_THRESHOLD", 2),
    },
    dbPath: env.DB_PATH || "budget-insights.db",
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  };
}

function resolveTransport(env: NodeJS.ProcessEnv): "stdio" | "http" {
  // CLI flag takes precedence
  const args = process.argv.slice(2);
  const transportIdx = args.indexOf("--transport");
  const flag = transportIdx !== -1 ? args[transportIdx + 1] : undefined;
  if (flag === "stdio" || flag === "http") return flag;

  const envTransport = env.TRANSPORT;
  if (envTransport === "stdio" || envTransport === "http") return envTransport;

  return "stdio";
}

function resolveLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

function intEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = numberEnv(env, key, fallback);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer, got "${env[key]}"`);
  }
  return value;
}

function positiveNumberEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const value = numberEnv(env, key, fallback);
  if (value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number, got "${env[key]}"`);
  }
  return value;
}

function numberEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}
