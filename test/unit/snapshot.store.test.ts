import assert from "node:assert/strict";
import test from "node:test";
import {
  assertTableName,
  CachedSnapshotSource,
  describeDataTable,
  MemorySnapshotSource,
  numericCell,
  SnapshotError,
} from "../../src/services/data/snapshot.store";
import { DataTable } from "../../src/services/data/table";

function matches(): DataTable {
  return DataTable.fromRows([
    { team: "red", goals: 2, rating: 6.5, played: new Date("2024-03-01T00:00:00Z") },
    { team: "blue", goals: 0, rating: 7, played: new Date("2024-03-08T00:00:00Z") },
    { team: "red", goals: null, rating: null, played: null },
  ]);
}

function snapshotError(code: SnapshotError["code"]) {
  return (error: unknown) => error instanceof SnapshotError && error.code === code;
}

test("assertTableName accepts plain identifiers only", () => {
  assert.equal(assertTableName(" players "), "players");
  assert.throws(() => assertTableName("players; drop table x"), snapshotError("SNAPSHOT_INVALID_TABLE"));
  assert.throws(() => assertTableName("Players"), snapshotError("SNAPSHOT_INVALID_TABLE"));
});

test("describeDataTable infers types, the date column and value hints", () => {
  assert.deepEqual(describeDataTable("matches", matches()), {
    table: "matches",
    columns: [
      { name: "team", dataType: "text" },
      { name: "goals", dataType: "int8" },
      { name: "rating", dataType: "float8" },
      { name: "played", dataType: "timestamptz" },
    ],
    dateColumn: "played",
    valueHints: { team: ["blue", "red"] },
  });
});

test("high-cardinality text columns get no value hints", () => {
  const table = DataTable.fromRows(Array.from({ length: 30 }, (_value, index) => ({ code: `c${index}` })));

  assert.deepEqual(describeDataTable("codes", table).valueHints, {});
});

test("the memory source hands out copies and reports missing tables", async () => {
  const source = new MemorySnapshotSource({ matches: matches() });

  const first = await source.loadTable("matches");
  const [row] = first.rows;
  assert.ok(row);
  row.team = "green";

  assert.equal((await source.loadTable("matches")).rows[0]?.team, "red");
  assert.equal(source.loads, 2);
  await assert.rejects(source.loadTable("players"), snapshotError("SNAPSHOT_TABLE_NOT_FOUND"));
});

test("the cache serves copies until the TTL expires", async () => {
  const source = new MemorySnapshotSource({ matches: matches() });
  let now = 0;
  const cached = new CachedSnapshotSource(source, 60, () => now);

  const first = await cached.loadTable("matches");
  const [row] = first.rows;
  assert.ok(row);
  row.goals = 99;

  now = 59_999;
  assert.equal((await cached.loadTable("matches")).rows[0]?.goals, 2);
  assert.equal(source.loads, 1);

  now = 60_000;
  await cached.loadTable("matches");
  assert.equal(source.loads, 2);

  cached.clear();
  await cached.loadTable("matches");
  assert.equal(source.loads, 3);
});

test("the cache keeps descriptions for the TTL", async () => {
  const source = new MemorySnapshotSource({ matches: matches() });
  const cached = new CachedSnapshotSource(source, 60, () => 0);

  const first = await cached.describeTable("matches");
  const second = await cached.describeTable("matches");

  assert.equal(second, first);
  assert.equal(source.loads, 1);
});

test("describing a table reuses the cached rows", async () => {
  const source = new MemorySnapshotSource({ matches: matches() });
  const cached = new CachedSnapshotSource(source, 60, () => 0);

  await cached.loadTable("matches");
  const description = await cached.describeTable("matches");

  assert.equal(description.dateColumn, "played");
  assert.equal(source.loads, 1);
});

test("a source describes rows it is handed without loading them", async () => {
  const source = new MemorySnapshotSource({ matches: matches() });

  const description = await source.describeTable("matches", DataTable.fromRows([{ team: "red" }]));

  assert.deepEqual(description.columns, [{ name: "team", dataType: "text" }]);
  assert.equal(source.loads, 0);
});

test("numericCell keeps integers beyond the safe range as text", () => {
  assert.equal(numericCell("42"), 42);
  assert.equal(numericCell("12.5"), 12.5);
  assert.equal(numericCell("9007199254740993"), "9007199254740993");
  assert.equal(numericCell("NaN"), "NaN");
});
