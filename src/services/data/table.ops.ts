import { aggregate, cellKey, compareCells, type AggregationName } from "./series";
import { DataTable, TableShapeError, type CellValue, type TableRow } from "./table";

export interface AggregationSpec {
  output: string;
  column: string | null;
  aggregation: AggregationName;
}

export interface GroupBucket {
  key: CellValue[];
  rows: TableRow[];
}

function assertColumns(table: DataTable, columns: string[]) {
  for (const column of columns) {
    if (!table.hasColumn(column)) {
      throw new TableShapeError("TABLE_UNKNOWN_COLUMN", `Unknown column: ${column}`);
    }
  }
}

function compareWithNullsLast(left: CellValue, right: CellValue, ascending: boolean): number {
  if (left === null && right === null) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }

  const order = compareCells(left, right);
  return ascending ? order : -order;
}

export function sortTable(table: DataTable, by: string[], ascending: boolean[]): DataTable {
  assertColumns(table, by);

  const indexed = table.rows.map((row, index) => ({ row, index }));
  indexed.sort((left, right) => {
    for (let position = 0; position < by.length; position += 1) {
      const column = by[position] ?? "";
      const order = compareWithNullsLast(
        left.row[column] ?? null,
        right.row[column] ?? null,
        ascending[position] ?? ascending[0] ?? true,
      );
      if (order !== 0) {
        return order;
      }
    }
    return left.index - right.index;
  });

  return table.withRows(indexed.map((entry) => entry.row));
}

export function filterTable(table: DataTable, mask: CellValue[]): DataTable {
  if (mask.length !== table.rowCount) {
    throw new TableShapeError(
      "TABLE_LENGTH_MISMATCH",
      `Boolean mask has ${mask.length} values for ${table.rowCount} rows`,
    );
  }

  return table.withRows(table.rows.filter((_row, index) => mask[index] === true));
}

export function renameColumns(table: DataTable, mapping: Map<string, string>): DataTable {
  const columns = table.columns.map((column) => mapping.get(column) ?? column);
  return DataTable.fromRows(
    table.rows.map((row) => {
      const record: TableRow = {};
      table.columns.forEach((column, index) => {
        record[columns[index] ?? column] = row[column] ?? null;
      });
      return record;
    }),
    columns,
  );
}

export function dropColumns(table: DataTable, columns: string[]): DataTable {
  assertColumns(table, columns);
  const removed = new Set(columns);
  return table.select(table.columns.filter((column) => !removed.has(column)));
}

export function dropMissing(table: DataTable, subset: string[] | null): DataTable {
  const columns = subset ?? table.columns;
  assertColumns(table, columns);
  return table.withRows(
    table.rows.filter((row) => columns.every((column) => (row[column] ?? null) !== null)),
  );
}

export function dropDuplicates(table: DataTable, subset: string[] | null): DataTable {
  const columns = subset ?? table.columns;
  assertColumns(table, columns);
  const seen = new Set<string>();
  return table.withRows(
    table.rows.filter((row) => {
      const key = columns.map((column) => cellKey(row[column] ?? null)).join("|");
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    }),
  );
}

/**
 * Buckets rows by the key columns. Rows with a missing key are dropped and
 * buckets come back sorted by key, matching the default groupby behaviour
 * analysts expect.
 */
export function groupRows(table: DataTable, keys: string[]): GroupBucket[] {
  assertColumns(table, keys);

  const buckets = new Map<string, GroupBucket>();
  for (const row of table.rows) {
    const key = keys.map((column) => row[column] ?? null);
    if (key.some((value) => value === null)) {
      continue;
    }

    const id = key.map((value) => cellKey(value)).join("|");
    const bucket = buckets.get(id);
    if (bucket) {
      bucket.rows.push(row);
    } else {
      buckets.set(id, { key, rows: [row] });
    }
  }

  return [...buckets.values()].sort((left, right) => {
    for (let index = 0; index < keys.length; index += 1) {
      const order = compareCells(left.key[index] ?? null, right.key[index] ?? null);
      if (order !== 0) {
        return order;
      }
    }
    return 0;
  });
}

export function aggregateGroups(
  table: DataTable,
  keys: string[],
  specs: AggregationSpec[],
): DataTable {
  assertColumns(
    table,
    specs.flatMap((spec) => (spec.column ? [spec.column] : [])),
  );

  const outputs = [...keys, ...specs.map((spec) => spec.output)];
  if (new Set(outputs).size !== outputs.length) {
    throw new TableShapeError("TABLE_DUPLICATE_COLUMN", "Aggregation output names must be unique");
  }

  const rows = groupRows(table, keys).map((bucket) => {
    const record: TableRow = {};
    keys.forEach((column, index) => {
      record[column] = bucket.key[index] ?? null;
    });
    for (const spec of specs) {
      const values = spec.column
        ? bucket.rows.map((row) => row[spec.column ?? ""] ?? null)
        : bucket.rows.map(() => true);
      record[spec.output] = aggregate(spec.aggregation, values);
    }
    return record;
  });

  return DataTable.fromRows(rows, outputs);
}
