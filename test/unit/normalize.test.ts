import assert from "node:assert/strict";
import test from "node:test";
import { DataTable } from "../../src/services/data/table";
import {
  classifyToolResult,
  createDefaultNormalizer,
  normalize,
  ResultNormalizer,
} from "../../src/services/results/normalize";

function grid(rows: number): DataTable {
  return DataTable.fromRows(Array.from({ length: rows }, (_value, index) => ({ id: index, label: `row-${index}` })));
}

test("tables become a shape summary plus a preview and an owned copy", () => {
  const table = grid(30);
  const { observation, artifact } = normalize("load_snapshot", table);

  assert.deepEqual(observation, {
    tool: "load_snapshot",
    status: "ok",
    type: "dataframe",
    shape: [30, 2],
    columns: ["id", "label"],
  });
  assert.equal(Array.isArray(artifact.preview) ? artifact.preview.length : -1, 20);
  assert.ok(artifact.df instanceof DataTable);
  assert.notEqual(artifact.df, table);
});

test("plain objects and arrays are json", () => {
  assert.deepEqual(normalize("t", { a: 1, b: 2 }).observation, { tool: "t", status: "ok", type: "json", count: 2 });
  assert.deepEqual(normalize("t", [1, 2, 3]).observation, { tool: "t", status: "ok", type: "json", count: 3 });
});

test("maps and sets are json", () => {
  const fromMap = normalize("t", new Map<unknown, number>([["k", 1], [2, 3]]));
  const fromSet = normalize("t", new Set(["x", "y"]));

  assert.deepEqual(fromMap, {
    observation: { tool: "t", status: "ok", type: "json", count: 2 },
    artifact: { value: { k: 1, "2": 3 } },
  });
  assert.deepEqual(fromSet, {
    observation: { tool: "t", status: "ok", type: "json", count: 2 },
    artifact: { value: ["x", "y"] },
  });
});

test("text is measured and cut by code point", () => {
  const normalizer = createDefaultNormalizer({ textMaxChars: 2 });
  const { observation, artifact } = normalizer.normalize("t", "a\u{1F600}b");

  assert.deepEqual(observation, { tool: "t", status: "ok", type: "text", length: 3 });
  assert.deepEqual(artifact, { value: "a\u{1F600}", truncated: true });
});

test("long text is truncated in the artifact but measured in full", () => {
  const normalizer = createDefaultNormalizer({ textMaxChars: 4 });
  const { observation, artifact } = normalizer.normalize("t", "abcdefgh");

  assert.deepEqual(observation, { tool: "t", status: "ok", type: "text", length: 8 });
  assert.deepEqual(artifact, { value: "abcd", truncated: true });
});

test("scalars and unknown values", () => {
  assert.deepEqual(normalize("t", 42), {
    observation: { tool: "t", status: "ok", type: "scalar" },
    artifact: { value: 42 },
  });
  assert.equal(classifyToolResult(undefined).kind, "scalar");
  assert.equal(classifyToolResult(new WeakMap()).kind, "unknown");
  assert.deepEqual(normalize("t", Symbol("s")).artifact, { repr: "Symbol(s)" });
});

test("generated code gets its own observation type", () => {
  const { observation, artifact } = normalize("nl_to_code", { code: "df_out = df" });

  assert.deepEqual(observation, { tool: "nl_to_code", status: "ok", type: "code", length: 11 });
  assert.deepEqual(artifact, { code: "df_out = df", value: { code: "df_out = df" } });
});

test("a throwing override falls back to an unknown summary", () => {
  const normalizer = new ResultNormalizer().registerOverride("boom", () => {
    throw new Error("adapter failed");
  });

  assert.deepEqual(normalizer.normalize("boom", 7), {
    observation: { tool: "boom", status: "ok", type: "unknown" },
    artifact: { repr: "7" },
  });
});
