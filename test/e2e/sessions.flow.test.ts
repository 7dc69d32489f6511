import assert from "node:assert/strict";
import test from "node:test";
import type { AppConfig } from "../../src/config";
import { GREETING } from "../../src/services/agent/prompts";
import { MemorySnapshotSource } from "../../src/services/data/snapshot.store";
import { buildServer } from "../../src/server";
import { fenced, GENERATED_CODE, ScriptedLlmClient, wideTable } from "../support/fakes";

const MISSING_SESSION_ID = "1655a4af-6678-4ebe-a570-58f49fa2f73d";

const PLAN_INPUT = {
  steps: [
    { tool: "load_snapshot", args: {} },
    { tool: "nl_to_code", args: { user_query: "top three red rows by stat_1" } },
  ],
  why: "Load the players and rank the red team",
  assumptions: [],
};

function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 3001,
    databaseUrl: "",
    databaseSslRootCertPath: "",
    aiGatewayApiKey: "test-secret",
    aiGatewayBaseUrl: "https://gateway.test/v1",
    modelChat: "chat-model",
    modelPlanning: "planning-model",
    modelCode: "code-model",
    llmMaxTokens: 300,
    snapshotDefaultTable: "players",
    snapshotPageSize: 1000,
    snapshotCacheTtlSeconds: 3600,
    planMaxSteps: 8,
    planHistoryTurns: 6,
    artifactPreviewRows: 2,
    artifactTextMaxChars: 20000,
    sandboxMaxStatements: 200,
    ...overrides,
  };
}

async function buildApp(llmClient: ScriptedLlmClient) {
  return buildServer({
    logger: false,
    sessions: {
      config: testConfig(),
      llmClient,
      snapshots: new MemorySnapshotSource({ players: wideTable(6, 4) }),
    },
  });
}

async function createSession(app: Awaited<ReturnType<typeof buildApp>>): Promise<string> {
  const response = await app.inject({ method: "POST", url: "/api/v1/sessions" });
  assert.equal(response.statusCode, 201);
  return response.json().data.session.session_id;
}

test("POST /api/v1/sessions starts an empty session with the greeting", async () => {
  const app = await buildApp(new ScriptedLlmClient());

  const response = await app.inject({ method: "POST", url: "/api/v1/sessions" });
  const body = response.json();

  assert.equal(response.statusCode, 201);
  assert.equal(body.ok, true);
  assert.equal(body.meta.request_id, response.headers["x-request-id"]);
  assert.equal(body.data.session.plan_state, "empty");
  assert.equal(body.data.session.plan, null);
  assert.equal(body.data.session.result, null);
  assert.deepEqual(
    body.data.messages.map((message: { role: string; content: string }) => [message.role, message.content]),
    [["assistant", GREETING]],
  );

  await app.close();
});

test("a plan goes from message to approval, execution and a code run", async () => {
  const llm = new ScriptedLlmClient(
    [
      "{\"mode\": \"plan\", \"why\": \"Wants a ranking\"}",
      "I will load players and rank the red team.",
      fenced(GENERATED_CODE),
    ],
    [PLAN_INPUT],
  );
  const app = await buildApp(llm);
  const sessionId = await createSession(app);

  const message = await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/messages`,
    payload: { content: "  Top red players by stat_1  " },
  });
  assert.equal(message.statusCode, 200);
  assert.equal(message.json().data.mode, "plan");
  assert.equal(message.json().data.route_reason, "Wants a ranking");
  assert.equal(message.json().data.reply, "I will load players and rank the red team.");
  assert.equal(message.json().data.session.plan_state, "proposed");
  assert.equal(llm.toolRequests[0]?.messages.at(-1)?.content, "Top red players by stat_1");

  const early = await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/plan/execute` });
  assert.equal(early.statusCode, 409);
  assert.deepEqual(early.json().error, {
    state: "proposed",
    code: "PLAN_NOT_EXECUTABLE",
    message: "Plan must be approved before execution (state: proposed)",
  });

  const approve = await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/plan/approve` });
  assert.equal(approve.statusCode, 200);
  assert.equal(approve.json().data.session.plan_state, "approved");

  const execute = await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/plan/execute` });
  assert.equal(execute.statusCode, 200);
  const { result, session } = execute.json().data;
  assert.equal(session.plan_state, "executed");
  assert.deepEqual(result.observations[0], {
    tool: "load_snapshot",
    status: "ok",
    type: "dataframe",
    shape: [6, 4],
    columns: ["id", "team", "stat_1", "stat_2"],
  });
  assert.deepEqual(result.artifacts.step_0, {
    columns: ["id", "team", "stat_1", "stat_2"],
    preview: [
      { id: 0, team: "red", stat_1: 0, stat_2: 0 },
      { id: 1, team: "blue", stat_1: 2, stat_2: 3 },
    ],
    shape: [6, 4],
  });
  assert.deepEqual(result.artifacts.step_1, { code: GENERATED_CODE });

  const run = await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/code/run`,
    payload: { preview_rows: 1 },
  });
  assert.equal(run.statusCode, 200);
  assert.deepEqual(run.json().data, {
    code_step: "step_1",
    data_step: "step_0",
    shape: [3, 4],
    columns: ["id", "team", "stat_1", "stat_2"],
    preview: [{ id: 4, team: "red", stat_1: 8, stat_2: 12 }],
  });

  const discard = await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/plan/discard` });
  assert.equal(discard.statusCode, 200);
  assert.equal(discard.json().data.session.plan_state, "discarded");
  assert.equal(discard.json().data.session.result, null);

  await app.close();
});

test("capability questions come back as tool_qa and are kept in the history", async () => {
  const llm = new ScriptedLlmClient([
    "{\"mode\": \"tool_qa\", \"why\": \"Asks about tools\"}",
    "I can load snapshots and write pandas snippets.",
  ]);
  const app = await buildApp(llm);
  const sessionId = await createSession(app);

  const message = await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/messages`,
    payload: { content: "What can you do?" },
  });
  assert.equal(message.statusCode, 200);
  assert.equal(message.json().data.mode, "tool_qa");

  const fetched = await app.inject({ method: "GET", url: `/api/v1/sessions/${sessionId}` });
  assert.deepEqual(
    fetched.json().data.messages.map((entry: { content: string }) => entry.content),
    [GREETING, "What can you do?", "I can load snapshots and write pandas snippets."],
  );

  await app.close();
});

test("a planning failure returns 422 with the visible reply", async () => {
  const llm = new ScriptedLlmClient(
    ["{\"mode\": \"plan\", \"why\": \"Wants a ranking\"}"],
    [{ steps: [], why: "Nothing to do", assumptions: [] }],
  );
  const app = await buildApp(llm);
  const sessionId = await createSession(app);

  const response = await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/messages`,
    payload: { content: "Rank everything" },
  });

  assert.equal(response.statusCode, 422);
  assert.deepEqual(response.json().error, {
    reply: "I could not prepare a plan for that request: steps must be a non-empty array",
    issues: [{ code: "PLAN_SCHEMA_INVALID", message: "steps must be a non-empty array" }],
    code: "PLANNING_FAILED",
    message: "steps must be a non-empty array",
  });

  await app.close();
});

test("invalid input and unknown sessions are rejected", async () => {
  const app = await buildApp(new ScriptedLlmClient());
  const sessionId = await createSession(app);

  const badId = await app.inject({ method: "GET", url: "/api/v1/sessions/not-a-uuid" });
  assert.equal(badId.statusCode, 400);
  assert.equal(badId.json().error.message, "sessionId must be a valid UUID");

  const missing = await app.inject({ method: "GET", url: `/api/v1/sessions/${MISSING_SESSION_ID}` });
  assert.equal(missing.statusCode, 404);
  assert.equal(missing.json().error.code, "SESSION_NOT_FOUND");

  const empty = await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/messages`,
    payload: { content: "   " },
  });
  assert.equal(empty.statusCode, 400);
  assert.deepEqual(empty.json().error, { code: "VALIDATION_ERROR", message: "content is required" });

  const tooLong = await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/messages`,
    payload: { content: "x".repeat(4001) },
  });
  assert.equal(tooLong.json().error.message, "content must be at most 4000 characters");

  const badStep = await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/code/run`,
    payload: { code_step: "last" },
  });
  assert.equal(badStep.statusCode, 400);
  assert.equal(badStep.json().error.message, "code_step must look like step_<index>");

  const noResult = await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/code/run` });
  assert.equal(noResult.statusCode, 409);
  assert.equal(noResult.json().error.code, "NO_EXECUTION_RESULT");

  const approve = await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/plan/approve` });
  assert.equal(approve.statusCode, 409);
  assert.deepEqual(approve.json().error, { state: "empty", code: "PLAN_MISSING", message: "No plan has been proposed" });

  await app.close();
});

test("generated code that fails at run time returns 422", async () => {
  const brokenCode = ["import pandas as pd", "df = df_in.copy()", "df_out = df['missing']"].join("\n");
  const llm = new ScriptedLlmClient(
    ["{\"mode\": \"plan\", \"why\": \"Wants a column\"}", "Loading players.", brokenCode],
    [PLAN_INPUT],
  );
  const app = await buildApp(llm);
  const sessionId = await createSession(app);

  await app.inject({
    method: "POST",
    url: `/api/v1/sessions/${sessionId}/messages`,
    payload: { content: "Show the missing column" },
  });
  await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/plan/approve` });
  await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/plan/execute` });

  const run = await app.inject({ method: "POST", url: `/api/v1/sessions/${sessionId}/code/run` });
  assert.equal(run.statusCode, 422);
  assert.deepEqual(run.json().error, {
    reason: "SNIPPET_RUNTIME_ERROR",
    code: "CODE_RUN_FAILED",
    message: "Line 3: Unknown column: missing",
  });

  await app.close();
});

test("DELETE /api/v1/sessions/:id removes the session", async () => {
  const app = await buildApp(new ScriptedLlmClient());
  const sessionId = await createSession(app);

  const deleted = await app.inject({ method: "DELETE", url: `/api/v1/sessions/${sessionId}` });
  assert.equal(deleted.statusCode, 200);
  assert.deepEqual(deleted.json().data, { session_id: sessionId, deleted: true });

  const after = await app.inject({ method: "GET", url: `/api/v1/sessions/${sessionId}` });
  assert.equal(after.statusCode, 404);

  await app.close();
});
