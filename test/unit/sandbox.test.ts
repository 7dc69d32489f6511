import assert from "node:assert/strict";
import test from "node:test";
import { runSandboxed, SandboxError, SandboxViolation } from "../../src/services/code/sandbox";
import { isBacktrackSafe, roundHalfEven } from "../../src/services/code/snippet.methods";
import { SnippetRuntimeError } from "../../src/services/code/snippet.values";
import { DataTable } from "../../src/services/data/table";

function players(): DataTable {
  return DataTable.fromRows([
    { name: "ana", team: "red", goals: 5, minutes: 90, joined: "2024-01-10" },
    { name: "ben", team: "blue", goals: 2, minutes: 45, joined: "2024-02-05" },
    { name: "cy", team: "red", goals: 7, minutes: null, joined: "2024-02-20" },
    { name: "dee", team: "red", goals: 1, minutes: 30, joined: "bad" },
  ]);
}

function snippet(...body: string[]): string {
  return ["import pandas as pd", "df = df_in.copy()", ...body].join("\n");
}

test("filters, sorts and selects columns", () => {
  const input = players();
  const output = runSandboxed(
    snippet(
      "df = df[df['team'] == 'red']",
      "df = df.sort_values('goals', ascending=False)",
      "df_out = df[['name', 'goals']]",
    ),
    input,
  );

  assert.deepEqual(output.toRecords(), [
    { name: "cy", goals: 7 },
    { name: "ana", goals: 5 },
    { name: "dee", goals: 1 },
  ]);
  assert.equal(input.rowCount, 4);
});

test("named aggregations produce a flat table keyed by the group column", () => {
  const output = runSandboxed(
    snippet(
      "df = df.groupby('team', as_index=False).agg(total=('goals', 'sum'), players=('name', 'count'))",
      "df_out = df.sort_values('total', ascending=False)",
    ),
    players(),
  );

  assert.deepEqual(output.toRecords(), [
    { team: "red", total: 13, players: 3 },
    { team: "blue", total: 2, players: 1 },
  ]);
});

test("grouped column aggregation keeps the column name", () => {
  const output = runSandboxed(
    snippet("df_out = df.groupby('team')['goals'].sum().reset_index()"),
    players(),
  );

  assert.deepEqual(output.toRecords(), [
    { team: "blue", goals: 2 },
    { team: "red", goals: 13 },
  ]);
});

test("coerced dates filter with inclusive ISO bounds and arithmetic propagates missing values", () => {
  const output = runSandboxed(
    snippet(
      "df['joined'] = pd.to_datetime(df['joined'], errors='coerce')",
      "df = df[(df['joined'] >= '2024-02-01') & (df['joined'] <= '2024-02-29')]",
      "df['per90'] = (df['goals'] / df['minutes'] * 90).round(1)",
      "df_out = df[['name', 'per90']]",
    ),
    players(),
  );

  assert.deepEqual(output.toRecords(), [
    { name: "ben", per90: 4 },
    { name: "cy", per90: null },
  ]);
});

test("value_counts returns a count table sorted by frequency", () => {
  const output = runSandboxed(snippet("df_out = df['team'].value_counts().reset_index()"), players());

  assert.deepEqual(output.columns, ["team", "count"]);
  assert.deepEqual(output.toRecords(), [
    { team: "red", count: 3 },
    { team: "blue", count: 1 },
  ]);
});

test("string matching is literal and can ignore case", () => {
  const output = runSandboxed(
    snippet(
      "df['minutes'] = df['minutes'].fillna(0)",
      "df = df[df['name'].str.contains('A', case=False)]",
      "df_out = df[['name', 'minutes']]",
    ),
    players(),
  );

  assert.deepEqual(output.toRecords(), [{ name: "ana", minutes: 90 }]);
});

test("a scalar df_out is rejected", () => {
  assert.throws(
    () => runSandboxed(snippet("df_out = len(df)"), players()),
    (error: unknown) =>
      error instanceof SandboxError
      && error.code === "SANDBOX_OUTPUT_NOT_TABLE"
      && error.message === "Code did not produce df_out as a DataFrame (got number)",
  );
});

test("policy violations are reported before anything runs", () => {
  const input = players();
  assert.throws(
    () => runSandboxed(["import os", "import pandas as pd", "df = df_in.copy()", "df_out = df"].join("\n"), input),
    (error: unknown) => {
      assert.ok(error instanceof SandboxViolation);
      assert.deepEqual(error.violations, [
        {
          rule: "import_disallowed",
          message: "Disallowed import 'os': only `import pandas as pd` is allowed",
        },
      ]);
      return true;
    },
  );

  assert.throws(
    () => runSandboxed(snippet("x = df.__class__", "df_out = df"), input),
    (error: unknown) =>
      error instanceof SandboxViolation
      && error.violations.some((violation) => violation.message === "Forbidden construct: __"),
  );
});

test("runtime errors carry the snippet line", () => {
  assert.throws(
    () => runSandboxed(snippet("df_out = df['nope']"), players()),
    (error: unknown) =>
      error instanceof SnippetRuntimeError
      && error.line === 3
      && error.message === "Line 3: Unknown column: nope",
  );
});

test("boolean series cannot be combined with and/or", () => {
  assert.throws(
    () => runSandboxed(snippet("df = df[df['goals'] > 1 and df['goals'] < 9]", "df_out = df"), players()),
    /The truth value of a Series is ambiguous/,
  );
});

test("the operation budget stops long snippets", () => {
  assert.throws(
    () => runSandboxed(snippet("df_out = df[['name', 'goals']]"), players(), { maxOperations: 5 }),
    (error: unknown) => error instanceof SandboxError && error.code === "SANDBOX_LIMIT_EXCEEDED",
  );
});

test("roundHalfEven rounds ties to the even neighbour", () => {
  assert.equal(roundHalfEven(2.5, 0), 2);
  assert.equal(roundHalfEven(3.5, 0), 4);
  assert.equal(roundHalfEven(0.125, 2), 0.12);
  assert.equal(roundHalfEven(1.26, 1), 1.3);
});

test("head and tail accept negative counts", () => {
  assert.deepEqual(runSandboxed(snippet("df_out = df.head(-1)"), players()).column("name"), ["ana", "ben", "cy"]);
  assert.deepEqual(runSandboxed(snippet("df_out = df.tail(-1)"), players()).column("name"), ["ben", "cy", "dee"]);
});

test("the pandas import may share a line with other statements", () => {
  const output = runSandboxed("import pandas as pd; df = df_in.copy()\ndf_out = df.head(2)", players());

  assert.deepEqual(output.column("name"), ["ana", "ben"]);
});

test("regular expressions with nested repetition are refused", () => {
  assert.throws(
    () => runSandboxed(snippet("df_out = df[df['name'].str.contains('(a+)+$', regex=True)]"), players()),
    (error: unknown) => error instanceof SnippetRuntimeError && error.line === 3 && /nests repetition/.test(error.message),
  );

  const output = runSandboxed(snippet("df_out = df[df['name'].str.contains('^(a|b)', regex=True)]"), players());
  assert.deepEqual(output.column("name"), ["ana", "ben"]);
});

test("isBacktrackSafe flags backreferences and repeated varying groups", () => {
  assert.equal(isBacktrackSafe("(a+)+"), false);
  assert.equal(isBacktrackSafe("(\\w|\\d)*"), false);
  assert.equal(isBacktrackSafe("(a)\\1"), false);
  assert.equal(isBacktrackSafe("((a*))+"), false);
  assert.equal(isBacktrackSafe("^re(d|al)"), true);
  assert.equal(isBacktrackSafe("(?:ab)+"), true);
  assert.equal(isBacktrackSafe("[(+]+"), true);
});
