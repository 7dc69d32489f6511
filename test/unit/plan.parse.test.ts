import assert from "node:assert/strict";
import test from "node:test";
import { parsePlanOutput, PlanParseError } from "../../src/services/plans/plan.parse";

const PLAN_JSON = JSON.stringify({
  steps: [{ tool: "load_snapshot", args: {} }],
  why: "Load the table",
  assumptions: [],
});

function failsWith(code: PlanParseError["code"], message: string) {
  return (error: unknown) => error instanceof PlanParseError && error.code === code && error.message === message;
}

test("structured tool arguments pass through untouched", () => {
  const input = { why: "x", steps: [] };
  assert.equal(parsePlanOutput(input), input);
});

test("accepts raw JSON, a json fence, a bare fence and prose around one object", () => {
  const expected = JSON.parse(PLAN_JSON);

  assert.deepEqual(parsePlanOutput(`  ${PLAN_JSON}\n`), expected);
  assert.deepEqual(parsePlanOutput(`Here is the plan:\n\`\`\`json\n${PLAN_JSON}\n\`\`\``), expected);
  assert.deepEqual(parsePlanOutput(`\`\`\`\n${PLAN_JSON}\n\`\`\`\nThanks`), expected);
  assert.deepEqual(parsePlanOutput(`Plan: ${PLAN_JSON} (that is all)`), expected);
});

test("braces inside strings do not split the embedded object", () => {
  assert.deepEqual(parsePlanOutput("Plan: {\"why\": \"use {curly} names\", \"steps\": []} ok"), {
    why: "use {curly} names",
    steps: [],
  });
});

test("rejects empty, malformed and non-object output", () => {
  assert.throws(() => parsePlanOutput("   "), failsWith("PLAN_PARSE_NONJSON", "Plan output is empty"));
  assert.throws(() => parsePlanOutput("{\"why\": }"), failsWith("PLAN_PARSE_NONJSON", "Plan output is not valid JSON"));
  assert.throws(
    () => parsePlanOutput("```json\n[1, 2]\n```"),
    failsWith("PLAN_SCHEMA_INVALID", "Plan output must be a JSON object"),
  );
  assert.throws(
    () => parsePlanOutput("```python\nprint(1)\n```"),
    failsWith("PLAN_PARSE_NONJSON", "Fenced plan output must be JSON"),
  );
  assert.throws(
    () => parsePlanOutput("I would load the table first."),
    failsWith(
      "PLAN_PARSE_NONJSON",
      "Plan output must be raw JSON, a single fenced json block or prose around one JSON object",
    ),
  );
});

test("rejects more than one block or object", () => {
  assert.throws(
    () => parsePlanOutput("```json\n{}\n```\nor\n```json\n{}\n```"),
    failsWith("PLAN_PARSE_MULTIBLOCK", "Plan output contains multiple fenced blocks"),
  );
  assert.throws(
    () => parsePlanOutput("either {\"a\": 1} or {\"b\": 2}"),
    failsWith("PLAN_PARSE_MULTIBLOCK", "Plan output contains multiple JSON objects"),
  );
});
