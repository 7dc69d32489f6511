import type { Pool } from "pg";
import { cellKey } from "./series";
import { DataTable, type CellValue } from "./table";

export interface ColumnDescription {
  name: string;
  dataType: string;
}

export interface TableDescription {
  table: string;
  columns: ColumnDescription[];
  dateColumn: string | null;
  /** Distinct values of low-cardinality text columns, used as canonical filter values. */
  valueHints: Record<string, string[]>;
}

export interface SnapshotSource {
  loadTable(table: string): Promise<DataTable>;
  /** Describes `table`, reusing `loaded` instead of fetching the rows again when given. */
  describeTable(table: string, loaded?: DataTable): Promise<TableDescription>;
}

export class SnapshotError extends Error {
  constructor(
    public readonly code: "SNAPSHOT_INVALID_TABLE" | "SNAPSHOT_TABLE_NOT_FOUND",
    message: string,
  ) {
    super(message);
    this.name = "SnapshotError";
  }
}

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;
const VALUE_HINT_LIMIT = 25;
const NUMERIC_TYPES = new Set(["int2", "int4", "int8", "float4", "float8", "numeric"]);
const DATE_TYPES = new Set(["date", "timestamp", "timestamptz"]);
const TEXT_TYPES = new Set(["text", "varchar", "char", "bpchar"]);

export function assertTableName(table: string): string {
  const name = table.trim();
  if (!TABLE_NAME_PATTERN.test(name)) {
    throw new SnapshotError("SNAPSHOT_INVALID_TABLE", `Invalid table name: ${table}`);
  }
  return name;
}

/**
 * Numeric column values arrive from `pg` as strings for int8 and numeric.
 * Integers beyond the safe range stay strings rather than lose digits.
 */
export function numericCell(raw: string): number | string {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || (Number.isInteger(parsed) && !Number.isSafeInteger(parsed))) {
    return raw;
  }
  return parsed;
}

function inferDataType(values: CellValue[]): string {
  const present = values.filter((value) => value !== null);
  if (present.length === 0) {
    return "text";
  }
  if (present.every((value) => typeof value === "boolean")) {
    return "bool";
  }
  if (present.every((value) => typeof value === "number")) {
    return present.every((value) => Number.isInteger(value)) ? "int8" : "float8";
  }
  if (present.every((value) => value instanceof Date)) {
    return "timestamptz";
  }
  return "text";
}

function collectValueHints(table: DataTable, columns: ColumnDescription[]): Record<string, string[]> {
  const hints: Record<string, string[]> = {};
  for (const column of columns) {
    if (!TEXT_TYPES.has(column.dataType) || !table.hasColumn(column.name)) {
      continue;
    }

    const distinct = new Map<string, string>();
    for (const value of table.column(column.name)) {
      if (typeof value === "string" && value.trim()) {
        distinct.set(cellKey(value), value);
      }
      if (distinct.size > VALUE_HINT_LIMIT) {
        break;
      }
    }

    if (distinct.size > 0 && distinct.size <= VALUE_HINT_LIMIT) {
      hints[column.name] = [...distinct.values()].sort();
    }
  }
  return hints;
}

export function describeDataTable(
  name: string,
  table: DataTable,
  columns: ColumnDescription[] = table.columns.map((column) => ({
    name: column,
    dataType: inferDataType(table.column(column)),
  })),
): TableDescription {
  const dateColumn = columns.find((column) => DATE_TYPES.has(column.dataType))?.name ?? null;
  return {
    table: name,
    columns,
    dateColumn,
    valueHints: collectValueHints(table, columns),
  };
}

export class MemorySnapshotSource implements SnapshotSource {
  public loads = 0;

  private readonly tables = new Map<string, DataTable>();

  constructor(tables: Record<string, DataTable> = {}) {
    for (const [name, table] of Object.entries(tables)) {
      this.tables.set(assertTableName(name), table);
    }
  }

  async loadTable(table: string): Promise<DataTable> {
    const name = assertTableName(table);
    const found = this.tables.get(name);
    if (!found) {
      throw new SnapshotError("SNAPSHOT_TABLE_NOT_FOUND", `Table not found: ${name}`);
    }
    this.loads += 1;
    return found.clone();
  }

  async describeTable(table: string, loaded?: DataTable): Promise<TableDescription> {
    const name = assertTableName(table);
    return describeDataTable(name, loaded ?? await this.loadTable(name));
  }
}

export class PostgresSnapshotSource implements SnapshotSource {
  constructor(
    private readonly pool: Pool,
    private readonly pageSize = 1000,
  ) {}

  private async columnTypes(table: string): Promise<ColumnDescription[]> {
    const result = await this.pool.query<{ column_name: string; udt_name: string }>(
      `
        SELECT column_name, udt_name
        FROM information_schema.columns
        WHERE table_schema = 'public'
          AND table_name = $1
        ORDER BY ordinal_position
      `,
      [table],
    );

    if (result.rows.length === 0) {
      throw new SnapshotError("SNAPSHOT_TABLE_NOT_FOUND", `Table not found: ${table}`);
    }

    return result.rows.map((row) => ({ name: row.column_name, dataType: row.udt_name }));
  }

  async loadTable(table: string): Promise<DataTable> {
    const name = assertTableName(table);
    const columns = await this.columnTypes(name);
    const numeric = new Set(
      columns.filter((column) => NUMERIC_TYPES.has(column.dataType)).map((column) => column.name),
    );

    const rows: Array<Record<string, unknown>> = [];
    let offset = 0;
    for (;;) {
      const page = await this.pool.query<Record<string, unknown>>(
        `SELECT * FROM "${name}" ORDER BY ctid LIMIT $1 OFFSET $2`,
        [this.pageSize, offset],
      );

      for (const row of page.rows) {
        const record: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(row)) {
          record[key] = numeric.has(key) && typeof value === "string" ? numericCell(value) : value;
        }
        rows.push(record);
      }

      offset += page.rows.length;
      if (page.rows.length < this.pageSize) {
        break;
      }
    }

    return DataTable.fromRows(
      rows,
      columns.map((column) => column.name),
    );
  }

  async describeTable(table: string, loaded?: DataTable): Promise<TableDescription> {
    const name = assertTableName(table);
    const columns = await this.columnTypes(name);
    return describeDataTable(name, loaded ?? await this.loadTable(name), columns);
  }
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/** TTL cache over another source. Callers always receive their own copy of a table. */
export class CachedSnapshotSource implements SnapshotSource {
  private readonly tables = new Map<string, CacheEntry<DataTable>>();

  private readonly descriptions = new Map<string, CacheEntry<TableDescription>>();

  constructor(
    private readonly source: SnapshotSource,
    private readonly ttlSeconds = 3600,
    private readonly now: () => number = Date.now,
  ) {}

  private fresh<T>(entry: CacheEntry<T> | undefined): T | null {
    return entry && entry.expiresAt > this.now() ? entry.value : null;
  }

  async loadTable(table: string): Promise<DataTable> {
    const name = assertTableName(table);
    const cached = this.fresh(this.tables.get(name));
    if (cached) {
      return cached.clone();
    }

    const loaded = await this.source.loadTable(name);
    this.tables.set(name, { value: loaded.clone(), expiresAt: this.now() + this.ttlSeconds * 1000 });
    return loaded;
  }

  async describeTable(table: string, loaded?: DataTable): Promise<TableDescription> {
    const name = assertTableName(table);
    const cached = this.fresh(this.descriptions.get(name));
    if (cached) {
      return cached;
    }

    const description = await this.source.describeTable(name, loaded ?? await this.loadTable(name));
    this.descriptions.set(name, { value: description, expiresAt: this.now() + this.ttlSeconds * 1000 });
    return description;
  }

  clear() {
    this.tables.clear();
    this.descriptions.clear();
  }
}
