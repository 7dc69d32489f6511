export type CellValue = string | number | boolean | Date | null;

export type TableRow = Record<string, CellValue>;

export class TableShapeError extends Error {
  constructor(
    public readonly code: "TABLE_UNKNOWN_COLUMN" | "TABLE_LENGTH_MISMATCH" | "TABLE_DUPLICATE_COLUMN",
    message: string,
  ) {
    super(message);
    this.name = "TableShapeError";
  }
}

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }

  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "bigint") {
    return Number(value);
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }

  try {
    return JSON.stringify(value) ?? null;
  } catch {
    return String(value);
  }
}

function copyCell(value: CellValue): CellValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}

/**
 * In-memory tabular dataset: an ordered column list plus row records.
 *
 * Every transformation returns a new table. Rows are plain records so callers
 * can serialize them directly; `clone()` is the only way to get rows that share
 * nothing with the source.
 */
export class DataTable {
  private constructor(
    public readonly columns: string[],
    public readonly rows: TableRow[],
  ) {}

  static fromRows(rows: Array<Record<string, unknown>>, columns?: string[]): DataTable {
    const order = columns ? [...columns] : [];
    if (!columns) {
      const seen = new Set<string>();
      for (const row of rows) {
        for (const key of Object.keys(row)) {
          if (!seen.has(key)) {
            seen.add(key);
            order.push(key);
          }
        }
      }
    }

    if (new Set(order).size !== order.length) {
      throw new TableShapeError("TABLE_DUPLICATE_COLUMN", "Column names must be unique");
    }

    const normalized = rows.map((row) => {
      const record: TableRow = {};
      for (const column of order) {
        record[column] = toCellValue(row[column]);
      }
      return record;
    });

    return new DataTable(order, normalized);
  }

  static fromColumns(data: Record<string, CellValue[]>): DataTable {
    const columns = Object.keys(data);
    const lengths = new Set(columns.map((column) => data[column]?.length ?? 0));
    if (lengths.size > 1) {
      throw new TableShapeError("TABLE_LENGTH_MISMATCH", "All columns must have the same length");
    }

    const rowCount = columns.length > 0 ? data[columns[0] ?? ""]?.length ?? 0 : 0;
    const rows: TableRow[] = [];
    for (let index = 0; index < rowCount; index += 1) {
      const record: TableRow = {};
      for (const column of columns) {
        record[column] = data[column]?.[index] ?? null;
      }
      rows.push(record);
    }

    return new DataTable(columns, rows);
  }

  static empty(columns: string[] = []): DataTable {
    return new DataTable([...columns], []);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  get shape(): [number, number] {
    return [this.rows.length, this.columns.length];
  }

  hasColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  column(name: string): CellValue[] {
    if (!this.hasColumn(name)) {
      throw new TableShapeError("TABLE_UNKNOWN_COLUMN", `Unknown column: ${name}`);
    }

    return this.rows.map((row) => row[name] ?? null);
  }

  /** First `count` rows; a negative count keeps all but the last `-count`. */
  head(count = 5): DataTable {
    const end = count >= 0 ? count : Math.max(0, this.rows.length + count);
    return this.withRows(this.rows.slice(0, end));
  }

  /** Last `count` rows; a negative count keeps all but the first `-count`. */
  tail(count = 5): DataTable {
    if (count === 0) {
      return this.withRows([]);
    }

    const start = count > 0 ? Math.max(0, this.rows.length - count) : Math.min(this.rows.length, -count);
    return this.withRows(this.rows.slice(start));
  }

  select(columns: string[]): DataTable {
    for (const column of columns) {
      if (!this.hasColumn(column)) {
        throw new TableShapeError("TABLE_UNKNOWN_COLUMN", `Unknown column: ${column}`);
      }
    }

    return new DataTable(
      [...columns],
      this.rows.map((row) => {
        const record: TableRow = {};
        for (const column of columns) {
          record[column] = row[column] ?? null;
        }
        return record;
      }),
    );
  }

  withRows(rows: TableRow[]): DataTable {
    return new DataTable([...this.columns], rows.map((row) => ({ ...row })));
  }

  withColumn(name: string, values: CellValue[]): DataTable {
    if (values.length !== this.rows.length) {
      throw new TableShapeError(
        "TABLE_LENGTH_MISMATCH",
        `Column ${name} has ${values.length} values for ${this.rows.length} rows`,
      );
    }

    const columns = this.hasColumn(name) ? [...this.columns] : [...this.columns, name];
    return new DataTable(
      columns,
      this.rows.map((row, index) => ({ ...row, [name]: values[index] ?? null })),
    );
  }

  clone(): DataTable {
    return new DataTable(
      [...this.columns],
      this.rows.map((row) => {
        const record: TableRow = {};
        for (const column of this.columns) {
          record[column] = copyCell(row[column] ?? null);
        }
        return record;
      }),
    );
  }

  toRecords(): TableRow[] {
    return this.clone().rows;
  }
}
