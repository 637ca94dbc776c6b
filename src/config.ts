import { join } from "path";

/**
 * What happens to dependent rows when a user or menu item is deleted.
 * - orphan: delete the row only; orders and order items keep dangling ids
 * - restrict: refuse the delete while dependent rows exist
 * - cascade: delete the dependent rows as well
 */
export type DeletePolicy = "orphan" | "restrict" | "cascade";

export type SessionBackend = "sqlite" | "memory";

// --- Environment config ---
export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: "development" | "production" | "test";
  dbPath: string;

  // Static files; uploaded images land in <publicDir>/images
  publicDir: string;
  maxUploadBytes: number;

  // Sessions
  sessionSecret: string;
  sessionCookieName: string;
  sessionBackend: SessionBackend;

  deletePolicy: DeletePolicy;
  seedData: boolean;

  // Logging
  logLevel: string;
}

export const DEFAULT_SESSION_SECRET = "dev-only-session-secret-change-me";

function envStr(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const v = process.env[key];
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return isNaN(n) ? fallback : n;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  if (!v) return fallback;
  return v === "true" || v === "1";
}

function envChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const v = process.env[key];
  return choices.find((c) => c === v) ?? fallback;
}

export function loadConfig(): AppConfig {
  return {
    port: envInt("PORT", 8000),
    host: envStr("HOST", "0.0.0.0"),
    nodeEnv: envChoice("NODE_ENV", ["development", "production", "test"] as const, "development"),
    dbPath: envStr("DB_PATH", join("data", "restaurant.db")),

    publicDir: envStr("PUBLIC_DIR", "public"),
    maxUploadBytes: envInt("MAX_UPLOAD_BYTES", 10 * 1024 * 1024),

    sessionSecret: envStr("SESSION_SECRET", DEFAULT_SESSION_SECRET),
    sessionCookieName: envStr("SESSION_COOKIE", "sid"),
    sessionBackend: envChoice("SESSION_STORE", ["sqlite", "memory"] as const, "sqlite"),

    deletePolicy: envChoice("DELETE_POLICY", ["orphan", "restrict", "cascade"] as const, "orphan"),
    seedData: envBool("SEED_DATA", true),

    logLevel: envStr("LOG_LEVEL", "info"),
  };
}

export const config = loadConfig();
