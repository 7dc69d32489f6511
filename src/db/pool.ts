import fs from "node:fs";
import path from "node:path";
import { Pool, type PoolConfig } from "pg";
import type { AppConfig } from "../config";
import type { LoggerLike } from "../utils/logger";

const SSL_REQUIRED_MODES = new Set(["require", "verify-ca", "verify-full", "no-verify"]);

function normalizeConnectionString(raw: string): {
  connectionString: string;
  sslMode?: string;
} {
  const parsed = new URL(raw);
  const sslMode = parsed.searchParams.get("sslmode")?.trim().toLowerCase() ?? undefined;
  parsed.searchParams.delete("sslmode");
  return {
    connectionString: parsed.toString(),
    sslMode,
  };
}

/**
 * Builds the pool behind the snapshot source. A CA path enables verified TLS;
 * otherwise `sslmode` in DATABASE_URL decides between unverified TLS and none.
 */
export function buildPool(config: AppConfig, logger?: LoggerLike): Pool {
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required to create a Postgres connection pool.");
  }

  const { connectionString, sslMode } = normalizeConnectionString(config.databaseUrl);
  const poolConfig: PoolConfig = { connectionString };

  const certPath = config.databaseSslRootCertPath.trim();
  if (certPath) {
    if (!path.isAbsolute(certPath)) {
      throw new Error(
        `Fatal config error: DATABASE_SSL_ROOT_CERT_PATH must be an absolute path (received: ${certPath}).`,
      );
    }

    poolConfig.ssl = {
      ca: fs.readFileSync(certPath, "utf8"),
      rejectUnauthorized: true,
    };
    logger?.info({ dbSslMode: "ca_verify" }, "database pool SSL mode configured");
    return new Pool(poolConfig);
  }

  if (sslMode && SSL_REQUIRED_MODES.has(sslMode)) {
    poolConfig.ssl = { rejectUnauthorized: false };
    logger?.info({ dbSslMode: "insecure_ssl", databaseUrlSslmodeParam: sslMode }, "database pool SSL mode configured");
  } else {
    poolConfig.ssl = false;
    logger?.info({ dbSslMode: "disabled", databaseUrlSslmodeParam: sslMode ?? null }, "database pool SSL mode configured");
  }

  return new Pool(poolConfig);
}
