import assert from "node:assert/strict";
import test from "node:test";
import { MemorySnapshotSource } from "../../src/services/data/snapshot.store";
import { DataTable } from "../../src/services/data/table";
import { PlanExecutor } from "../../src/services/plans/plan.executor";
import { createDefaultToolRegistry } from "../../src/services/tools/default.registry";
import { ToolRegistry, type ToolContext } from "../../src/services/tools/tool.registry";
import type { Plan } from "../../src/types/plan";
import { silentLogger } from "../../src/utils/logger";
import { fenced, GENERATED_CODE, RecordingLogger, ScriptedLlmClient, wideTable } from "../support/fakes";

function buildContext(chatReplies: string[] = []): ToolContext {
  return {
    llm: new ScriptedLlmClient(chatReplies),
    snapshots: new MemorySnapshotSource({ players: wideTable(500, 10) }),
    defaultTable: "players",
    codeModel: "test-code-model",
    maxTokens: 100,
    logger: silentLogger,
  };
}

function plan(steps: Plan["steps"]): Plan {
  return { steps, why: "Answer the question", assumptions: [] };
}

test("loads the snapshot and generates a snippet as two observations", async () => {
  const executor = new PlanExecutor({ registry: createDefaultToolRegistry() });
  const result = await executor.execute(
    plan([
      { tool: "load_snapshot", args: {} },
      { tool: "nl_to_code", args: { user_query: "top three red rows by stat_1" } },
    ]),
    buildContext([fenced(GENERATED_CODE)]),
  );

  assert.deepEqual(result.observations[0], {
    tool: "load_snapshot",
    status: "ok",
    type: "dataframe",
    shape: [500, 10],
    columns: ["id", "team", "stat_1", "stat_2", "stat_3", "stat_4", "stat_5", "stat_6", "stat_7", "stat_8"],
  });
  assert.deepEqual(result.observations[1], {
    tool: "nl_to_code",
    status: "ok",
    type: "code",
    length: GENERATED_CODE.length,
  });
  assert.ok(result.artifacts.step_0?.df instanceof DataTable);
  assert.equal(result.artifacts.step_1?.code, GENERATED_CODE);
});

test("unknown and failing steps still yield one observation each", async () => {
  const logger = new RecordingLogger();
  const executor = new PlanExecutor({ registry: createDefaultToolRegistry(), logger });
  const result = await executor.execute(
    plan([
      { tool: "drop_table", args: {} },
      { tool: "nl_to_code", args: { user_query: "   " } },
      { tool: "load_snapshot", args: { table: "players" } },
    ]),
    buildContext(),
  );

  assert.equal(result.observations.length, 3);
  assert.deepEqual(result.observations[0], { tool: "drop_table", status: "skipped", reason: "Unknown tool" });
  assert.deepEqual(result.observations[1], {
    tool: "nl_to_code",
    status: "error",
    error: "nl_to_code requires a non-empty user_query",
  });
  assert.equal(result.observations[2]?.status, "ok");
  assert.deepEqual(Object.keys(result.artifacts), ["step_2"]);
  assert.deepEqual(
    logger.entries.map((entry) => entry.message),
    ["plan step skipped: unknown tool", "plan step failed", "plan step completed"],
  );
});

test("tools without needsContext are called without the context", async () => {
  const registry = new ToolRegistry().register(
    "context_check",
    (_args, context) => ({ sawContext: context !== undefined }),
    { name: "context_check", description: "Report whether a context was passed", parameterSchema: { type: "object" } },
    { needsContext: false, phases: ["execution"] },
  );
  const result = await new PlanExecutor({ registry }).execute(plan([{ tool: "context_check", args: {} }]), buildContext());

  assert.deepEqual(result.artifacts.step_0, { value: { sawContext: false } });
});

test("repeated executions do not share tables", async () => {
  const executor = new PlanExecutor({ registry: createDefaultToolRegistry() });
  const context = buildContext();
  const steps = plan([{ tool: "load_snapshot", args: {} }]);

  const first = await executor.execute(steps, context);
  const second = await executor.execute(steps, context);
  const firstTable = first.artifacts.step_0?.df;
  const secondTable = second.artifacts.step_0?.df;
  assert.ok(firstTable instanceof DataTable);
  assert.ok(secondTable instanceof DataTable);

  const [row] = firstTable.rows;
  assert.ok(row);
  row.team = "changed";

  assert.equal(secondTable.rows[0]?.team, "red");
  assert.equal((await context.snapshots.loadTable("players")).rows[0]?.team, "red");
});
