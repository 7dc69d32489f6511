export interface AppConfig {
  port: number;
  databaseUrl: string;
  databaseSslRootCertPath: string;
  aiGatewayApiKey: string;
  aiGatewayBaseUrl: string;
  modelChat: string;
  modelPlanning: string;
  modelCode: string;
  llmMaxTokens: number;
  snapshotDefaultTable: string;
  snapshotPageSize: number;
  snapshotCacheTtlSeconds: number;
  planMaxSteps: number;
  planHistoryTurns: number;
  artifactPreviewRows: number;
  artifactTextMaxChars: number;
  sandboxMaxStatements: number;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function getConfig(): AppConfig {
  return {
    port: intFromEnv("PORT", 3001),
    databaseUrl: process.env.DATABASE_URL ?? "",
    databaseSslRootCertPath: process.env.DATABASE_SSL_ROOT_CERT_PATH ?? "",
    aiGatewayApiKey: process.env.AI_GATEWAY_API_KEY ?? "",
    aiGatewayBaseUrl: process.env.AI_GATEWAY_BASE_URL ?? "https://ai-gateway.vercel.sh/v1",
    modelChat: process.env.MODEL_CHAT ?? "openai/gpt-4.1-mini",
    modelPlanning: process.env.MODEL_PLANNING ?? "openai/gpt-4.1",
    modelCode: process.env.MODEL_CODE ?? "openai/gpt-4.1",
    llmMaxTokens: intFromEnv("LLM_MAX_TOKENS", 1200),
    snapshotDefaultTable: process.env.SNAPSHOT_DEFAULT_TABLE ?? "players",
    snapshotPageSize: intFromEnv("SNAPSHOT_PAGE_SIZE", 1000),
    snapshotCacheTtlSeconds: intFromEnv("SNAPSHOT_CACHE_TTL_SECONDS", 3600),
    planMaxSteps: intFromEnv("PLAN_MAX_STEPS", 8),
    planHistoryTurns: intFromEnv("PLAN_HISTORY_TURNS", 6),
    artifactPreviewRows: intFromEnv("ARTIFACT_PREVIEW_ROWS", 20),
    artifactTextMaxChars: intFromEnv("ARTIFACT_TEXT_MAX_CHARS", 20000),
    sandboxMaxStatements: intFromEnv("SANDBOX_MAX_STATEMENTS", 200),
  };
}

export function validateProductionBootConfig(config: AppConfig): void {
  if (process.env.NODE_ENV !== "production") {
    return;
  }

  const missing: string[] = [];
  if (!config.aiGatewayApiKey.trim()) {
    missing.push("AI_GATEWAY_API_KEY");
  }
  if (!config.databaseUrl.trim()) {
    missing.push("DATABASE_URL");
  }

  if (missing.length > 0) {
    throw new Error(`Fatal config error: missing required production settings: ${missing.join(", ")}`);
  }
}
