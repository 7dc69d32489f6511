import assert from "node:assert/strict";
import test from "node:test";
import { ContractViolation } from "../../src/services/code/contract";
import { MemorySnapshotSource } from "../../src/services/data/snapshot.store";
import { DataTable } from "../../src/services/data/table";
import { loadSnapshotTool } from "../../src/services/tools/load_snapshot.tool";
import { nlToCodeTool } from "../../src/services/tools/nl_to_code.tool";
import type { ToolContext } from "../../src/services/tools/tool.registry";
import { fenced, GENERATED_CODE, RecordingLogger, ScriptedLlmClient, wideTable } from "../support/fakes";

function buildContext(llm = new ScriptedLlmClient(), logger = new RecordingLogger()): ToolContext {
  return {
    llm,
    snapshots: new MemorySnapshotSource({
      players: wideTable(4, 3),
      teams: DataTable.fromRows([{ name: "Real Madrid" }, { name: "Getafe" }]),
    }),
    defaultTable: "players",
    codeModel: "test-code-model",
    maxTokens: 256,
    logger,
  };
}

test("load_snapshot loads the default table unless one is named", async () => {
  const context = buildContext();

  assert.deepEqual((await loadSnapshotTool({}, context)).shape, [4, 3]);
  assert.deepEqual((await loadSnapshotTool({ table: " teams " }, context)).columns, ["name"]);
  await assert.rejects(loadSnapshotTool({}), /load_snapshot requires the orchestration context/);
});

test("nl_to_code returns the unfenced snippet and logs it", async () => {
  const llm = new ScriptedLlmClient([fenced(GENERATED_CODE)]);
  const logger = new RecordingLogger();

  const result = await nlToCodeTool({ user_query: "top red rows" }, buildContext(llm, logger));

  assert.deepEqual(result, { code: GENERATED_CODE });
  assert.equal(llm.chatRequests[0]?.model, "test-code-model");
  assert.equal(llm.chatRequests[0]?.maxTokens, 256);
  assert.deepEqual(logger.entries, [
    {
      level: "info",
      payload: {
        tool: "nl_to_code",
        table: "players",
        model: "test-code-model",
        codeLength: GENERATED_CODE.length,
      },
      message: "pandas snippet generated",
    },
  ]);
});

test("nl_to_code describes the requested table and passes alias hints", async () => {
  const llm = new ScriptedLlmClient([GENERATED_CODE]);

  await nlToCodeTool(
    { user_query: "rows for Madrid", table: "teams", alias_hints: { Madrid: "Real Madrid", bad: 3 } },
    buildContext(llm),
  );

  const lines = (llm.chatRequests[0]?.messages[1]?.content ?? "").split("\n");
  assert.ok(lines.includes("- name: string"));
  assert.ok(lines.includes("- name: [\"Getafe\",\"Real Madrid\"]"));
  assert.ok(lines.includes("- Alias hints: Madrid -> Real Madrid"));
  assert.ok(lines.includes("Table: teams"));
});

test("nl_to_code rejects a missing query and code that breaks the contract", async () => {
  await assert.rejects(nlToCodeTool({ user_query: "" }, buildContext()), /non-empty user_query/);
  await assert.rejects(nlToCodeTool({ user_query: "x" }), /requires the orchestration context/);

  const llm = new ScriptedLlmClient(["df_out = df_in"]);
  await assert.rejects(nlToCodeTool({ user_query: "everything" }, buildContext(llm)), (error: unknown) => {
    assert.ok(error instanceof ContractViolation);
    assert.deepEqual(error.violations.map((violation) => violation.rule), ["import_missing", "copy_missing"]);
    return true;
  });
});
