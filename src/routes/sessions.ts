import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import type { Pool } from "pg";
import { getConfig, type AppConfig } from "../config";
import { buildPool } from "../db/pool";
import {
  AgentSession,
  MemorySessionStore,
  SessionError,
  type SessionMessage,
} from "../services/agent/session";
import { ContractViolation } from "../services/code/contract";
import { SandboxError, SandboxViolation } from "../services/code/sandbox";
import { SnippetSyntaxError } from "../services/code/snippet.lexer";
import { SnippetLimitError, SnippetRuntimeError } from "../services/code/snippet.values";
import { DataTable } from "../services/data/table";
import {
  CachedSnapshotSource,
  MemorySnapshotSource,
  PostgresSnapshotSource,
  type SnapshotSource,
} from "../services/data/snapshot.store";
import { AiGatewayClient, type LlmClient } from "../services/llm/ai-gateway.client";
import { PlanLifecycleError } from "../services/plans/plan.lifecycle";
import { PlanExecutor } from "../services/plans/plan.executor";
import { createDefaultNormalizer } from "../services/results/normalize";
import { createDefaultToolRegistry } from "../services/tools/default.registry";
import type { ToolRegistry } from "../services/tools/tool.registry";
import { errorResponse, okResponse } from "../utils/http-envelope";
import type { Artifact, PlanExecutionResult } from "../types/plan";

export const MAX_MESSAGE_CHARS = 4000;
const MAX_PREVIEW_ROWS = 500;
const STEP_KEY_PATTERN = /^step_\d+$/;

export interface SessionsRouteOptions {
  config?: AppConfig;
  store?: MemorySessionStore;
  llmClient?: LlmClient;
  snapshots?: SnapshotSource;
  registry?: ToolRegistry;
}

interface SessionParams {
  sessionId: string;
}

let cachedPool: Pool | null = null;

function createSnapshotSource(config: AppConfig, logger: FastifyBaseLogger): SnapshotSource {
  if (!config.databaseUrl) {
    return new MemorySnapshotSource();
  }

  if (!cachedPool) {
    cachedPool = buildPool(config, logger);
  }

  return new CachedSnapshotSource(
    new PostgresSnapshotSource(cachedPool, config.snapshotPageSize),
    config.snapshotCacheTtlSeconds,
  );
}

function createSessionStore(options: SessionsRouteOptions, config: AppConfig, logger: FastifyBaseLogger) {
  const llm = options.llmClient ?? new AiGatewayClient(config.aiGatewayApiKey, config.aiGatewayBaseUrl);
  const registry = options.registry ?? createDefaultToolRegistry();
  const snapshots = options.snapshots ?? createSnapshotSource(config, logger);
  const executor = new PlanExecutor({
    registry,
    logger,
    normalizer: createDefaultNormalizer({
      previewRows: config.artifactPreviewRows,
      textMaxChars: config.artifactTextMaxChars,
    }),
  });

  return new MemorySessionStore((id) => new AgentSession(id, {
    llm,
    registry,
    executor,
    toolContext: {
      llm,
      snapshots,
      defaultTable: config.snapshotDefaultTable,
      codeModel: config.modelCode,
      maxTokens: config.llmMaxTokens,
      logger,
    },
    chatModel: config.modelChat,
    planningModel: config.modelPlanning,
    maxTokens: config.llmMaxTokens,
    maxSteps: config.planMaxSteps,
    historyTurns: config.planHistoryTurns,
    sandboxLimits: { maxStatements: config.sandboxMaxStatements },
    logger,
  }));
}

function isValidUuid(value: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
    value,
  );
}

function asRecord(raw: unknown): Record<string, unknown> | null {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return null;
  }
  return Object.fromEntries(Object.entries(raw));
}

function validateMessagePayload(raw: unknown): { value?: { content: string }; error?: string } {
  const payload = asRecord(raw);
  if (!payload) {
    return { error: "Payload must be a JSON object" };
  }

  const content = typeof payload.content === "string" ? payload.content.trim() : "";
  if (!content) {
    return { error: "content is required" };
  }
  if (content.length > MAX_MESSAGE_CHARS) {
    return { error: `content must be at most ${MAX_MESSAGE_CHARS} characters` };
  }

  return { value: { content } };
}

function validateCodeRunPayload(raw: unknown): {
  value?: { codeStep?: string; dataStep?: string; previewRows?: number };
  error?: string;
} {
  const payload = raw === undefined || raw === null ? {} : asRecord(raw);
  if (!payload) {
    return { error: "Payload must be a JSON object" };
  }

  const value: { codeStep?: string; dataStep?: string; previewRows?: number } = {};
  for (const [field, key] of [["code_step", "codeStep"], ["data_step", "dataStep"]] as const) {
    const step = payload[field];
    if (step === undefined) {
      continue;
    }
    if (typeof step !== "string" || !STEP_KEY_PATTERN.test(step)) {
      return { error: `${field} must look like step_<index>` };
    }
    value[key] = step;
  }

  const previewRows = payload.preview_rows;
  if (previewRows !== undefined) {
    if (
      typeof previewRows !== "number"
      || !Number.isInteger(previewRows)
      || previewRows < 1
      || previewRows > MAX_PREVIEW_ROWS
    ) {
      return { error: `preview_rows must be an integer between 1 and ${MAX_PREVIEW_ROWS}` };
    }
    value.previewRows = previewRows;
  }

  return { value };
}

function toApiMessage(message: SessionMessage) {
  return {
    role: message.role,
    content: message.content,
    created_at: message.createdAt,
  };
}

function toApiArtifact(artifact: Artifact): Record<string, unknown> {
  const rendered: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(artifact)) {
    if (key === "df" && value instanceof DataTable) {
      rendered.shape = value.shape;
    } else if (key !== "value" || !("code" in artifact)) {
      rendered[key] = value;
    }
  }
  return rendered;
}

function toApiResult(result: PlanExecutionResult | null) {
  if (!result) {
    return null;
  }

  return {
    observations: result.observations,
    artifacts: Object.fromEntries(
      Object.entries(result.artifacts).map(([key, artifact]) => [key, toApiArtifact(artifact)]),
    ),
  };
}

function toApiSession(session: AgentSession) {
  const { state, plan, result } = session.plan;
  return {
    session_id: session.id,
    created_at: session.createdAt,
    plan_state: state,
    plan,
    result: toApiResult(result),
  };
}

function lifecycleErrorResponse(error: PlanLifecycleError) {
  return errorResponse(error.code, error.message, { state: error.state });
}

function isCodeRunError(error: unknown): error is
  | ContractViolation
  | SandboxViolation
  | SandboxError
  | SnippetSyntaxError
  | SnippetRuntimeError
  | SnippetLimitError {
  return error instanceof ContractViolation
    || error instanceof SandboxViolation
    || error instanceof SandboxError
    || error instanceof SnippetSyntaxError
    || error instanceof SnippetRuntimeError
    || error instanceof SnippetLimitError;
}

export async function sessionsRoutes(app: FastifyInstance, options: SessionsRouteOptions) {
  const config = options.config ?? getConfig();
  const store = options.store ?? createSessionStore(options, config, app.log);

  function findSession(sessionId: string): { session?: AgentSession; status?: 400 | 404; error?: ReturnType<typeof errorResponse> } {
    if (!isValidUuid(sessionId)) {
      return { status: 400, error: errorResponse("VALIDATION_ERROR", "sessionId must be a valid UUID") };
    }
    const session = store.get(sessionId);
    if (!session) {
      return { status: 404, error: errorResponse("SESSION_NOT_FOUND", "Session not found") };
    }
    return { session };
  }

  app.post("/sessions", async (_request, reply) => {
    const session = store.create();
    return reply.code(201).send(okResponse({
      session: toApiSession(session),
      messages: session.history.map((message) => toApiMessage(message)),
    }));
  });

  app.get<{ Params: SessionParams }>("/sessions/:sessionId", async (request, reply) => {
    const found = findSession(request.params.sessionId.trim());
    if (!found.session) {
      return reply.code(found.status ?? 404).send(found.error);
    }

    return reply.code(200).send(okResponse({
      session: toApiSession(found.session),
      messages: found.session.history.map((message) => toApiMessage(message)),
    }));
  });

  app.delete<{ Params: SessionParams }>("/sessions/:sessionId", async (request, reply) => {
    const found = findSession(request.params.sessionId.trim());
    if (!found.session) {
      return reply.code(found.status ?? 404).send(found.error);
    }

    store.delete(found.session.id);
    request.log.info({ sessionId: found.session.id }, "session cleared");
    return reply.code(200).send(okResponse({ session_id: found.session.id, deleted: true }));
  });

  app.post<{ Params: SessionParams }>("/sessions/:sessionId/messages", async (request, reply) => {
    const found = findSession(request.params.sessionId.trim());
    if (!found.session) {
      return reply.code(found.status ?? 404).send(found.error);
    }

    const validated = validateMessagePayload(request.body);
    if (!validated.value) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", validated.error ?? "Invalid payload"));
    }

    const outcome = await found.session.handleUserMessage(validated.value.content, request.id);
    if (outcome.mode === "failed") {
      return reply.code(422).send(errorResponse(outcome.code, outcome.error, {
        reply: outcome.reply,
        issues: outcome.issues,
      }));
    }

    return reply.code(200).send(okResponse({
      mode: outcome.mode,
      route_reason: outcome.route.why,
      reply: outcome.reply,
      session: toApiSession(found.session),
    }));
  });

  app.post<{ Params: SessionParams }>("/sessions/:sessionId/plan/approve", async (request, reply) => {
    const found = findSession(request.params.sessionId.trim());
    if (!found.session) {
      return reply.code(found.status ?? 404).send(found.error);
    }

    try {
      found.session.approve();
    } catch (error) {
      if (error instanceof PlanLifecycleError) {
        return reply.code(409).send(lifecycleErrorResponse(error));
      }
      throw error;
    }

    return reply.code(200).send(okResponse({ session: toApiSession(found.session) }));
  });

  app.post<{ Params: SessionParams }>("/sessions/:sessionId/plan/discard", async (request, reply) => {
    const found = findSession(request.params.sessionId.trim());
    if (!found.session) {
      return reply.code(found.status ?? 404).send(found.error);
    }

    try {
      found.session.discard();
    } catch (error) {
      if (error instanceof PlanLifecycleError) {
        return reply.code(409).send(lifecycleErrorResponse(error));
      }
      throw error;
    }

    return reply.code(200).send(okResponse({ session: toApiSession(found.session) }));
  });

  app.post<{ Params: SessionParams }>("/sessions/:sessionId/plan/execute", async (request, reply) => {
    const found = findSession(request.params.sessionId.trim());
    if (!found.session) {
      return reply.code(found.status ?? 404).send(found.error);
    }

    let result: PlanExecutionResult;
    try {
      result = await found.session.execute();
    } catch (error) {
      if (error instanceof PlanLifecycleError) {
        return reply.code(409).send(lifecycleErrorResponse(error));
      }
      throw error;
    }

    return reply.code(200).send(okResponse({
      result: toApiResult(result),
      session: toApiSession(found.session),
    }));
  });

  app.post<{ Params: SessionParams }>("/sessions/:sessionId/code/run", async (request, reply) => {
    const found = findSession(request.params.sessionId.trim());
    if (!found.session) {
      return reply.code(found.status ?? 404).send(found.error);
    }

    const validated = validateCodeRunPayload(request.body);
    if (!validated.value) {
      return reply
        .code(400)
        .send(errorResponse("VALIDATION_ERROR", validated.error ?? "Invalid payload"));
    }

    try {
      const run = found.session.runCode(validated.value);
      return reply.code(200).send(okResponse({
        code_step: run.codeStep,
        data_step: run.dataStep,
        shape: run.shape,
        columns: run.columns,
        preview: run.preview,
      }));
    } catch (error) {
      if (error instanceof SessionError) {
        return reply.code(409).send(errorResponse(error.code, error.message));
      }
      if (isCodeRunError(error)) {
        request.log.warn({ sessionId: found.session.id, reason: error.code }, "generated code rejected");
        return reply.code(422).send(errorResponse("CODE_RUN_FAILED", error.message, {
          reason: error.code,
          ...("violations" in error ? { violations: error.violations } : {}),
        }));
      }
      throw error;
    }
  });
}
