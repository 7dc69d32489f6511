import type { CellValue } from "./table";

export const AGGREGATION_NAMES = [
  "mean",
  "sum",
  "min",
  "max",
  "count",
  "median",
  "std",
  "nunique",
  "first",
  "last",
  "size",
] as const;

export type AggregationName = (typeof AGGREGATION_NAMES)[number];

export class CellTypeError extends Error {
  public readonly code = "CELL_TYPE_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "CellTypeError";
  }
}

const AGGREGATION_SET: ReadonlySet<string> = new Set(AGGREGATION_NAMES);

export function isAggregationName(value: string): value is AggregationName {
  return AGGREGATION_SET.has(value);
}

export function parseDateCell(value: CellValue): Date | null {
  if (value instanceof Date) {
    return value;
  }

  if (typeof value === "string" || typeof value === "number") {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  return null;
}

function describe(value: CellValue): string {
  if (value instanceof Date) {
    return "datetime";
  }

  return value === null ? "null" : typeof value;
}

/**
 * Orders two non-null cells. Booleans compare as numbers; a date compared
 * with a string parses the string as a date.
 */
export function compareCells(left: CellValue, right: CellValue): number {
  if (left === null || right === null) {
    throw new CellTypeError("Cannot order missing values");
  }

  const a = typeof left === "boolean" ? Number(left) : left;
  const b = typeof right === "boolean" ? Number(right) : right;

  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }

  if (typeof a === "string" && typeof b === "string") {
    if (a === b) {
      return 0;
    }
    return a < b ? -1 : 1;
  }

  if (a instanceof Date || b instanceof Date) {
    const leftDate = parseDateCell(a);
    const rightDate = parseDateCell(b);
    if (leftDate && rightDate) {
      return leftDate.getTime() - rightDate.getTime();
    }
  }

  throw new CellTypeError(`Cannot compare ${describe(left)} with ${describe(right)}`);
}

export function cellsEqual(left: CellValue, right: CellValue): boolean {
  if (left === null || right === null) {
    return false;
  }

  if (left instanceof Date || right instanceof Date) {
    const leftDate = parseDateCell(left);
    const rightDate = parseDateCell(right);
    return Boolean(leftDate && rightDate && leftDate.getTime() === rightDate.getTime());
  }

  if (typeof left === "boolean" || typeof right === "boolean") {
    return Number(left) === Number(right);
  }

  return left === right;
}

export function cellKey(value: CellValue): string {
  if (value instanceof Date) {
    return `d:${value.toISOString()}`;
  }

  return `${typeof value}:${String(value)}`;
}

function numeric(values: CellValue[], aggregation: string): number[] {
  const out: number[] = [];
  for (const value of values) {
    if (value === null) {
      continue;
    }
    if (typeof value === "number") {
      out.push(value);
      continue;
    }
    if (typeof value === "boolean") {
      out.push(Number(value));
      continue;
    }
    throw new CellTypeError(`Cannot compute ${aggregation} of ${describe(value)} values`);
  }
  return out;
}

function present(values: CellValue[]): CellValue[] {
  return values.filter((value) => value !== null);
}

function extreme(values: CellValue[], direction: 1 | -1): CellValue {
  let best: CellValue = null;
  for (const value of present(values)) {
    if (best === null || compareCells(value, best) * direction > 0) {
      best = value;
    }
  }
  return best;
}

const AGGREGATORS: Record<AggregationName, (values: CellValue[]) => CellValue> = {
  mean: (values) => {
    const numbers = numeric(values, "mean");
    if (numbers.length === 0) {
      return null;
    }
    return numbers.reduce((total, value) => total + value, 0) / numbers.length;
  },
  sum: (values) => numeric(values, "sum").reduce((total, value) => total + value, 0),
  min: (values) => extreme(values, -1),
  max: (values) => extreme(values, 1),
  count: (values) => present(values).length,
  median: (values) => {
    const numbers = numeric(values, "median").sort((a, b) => a - b);
    if (numbers.length === 0) {
      return null;
    }
    const middle = Math.floor(numbers.length / 2);
    if (numbers.length % 2 === 1) {
      return numbers[middle] ?? null;
    }
    return ((numbers[middle - 1] ?? 0) + (numbers[middle] ?? 0)) / 2;
  },
  std: (values) => {
    const numbers = numeric(values, "std");
    if (numbers.length < 2) {
      return null;
    }
    const mean = numbers.reduce((total, value) => total + value, 0) / numbers.length;
    const variance =
      numbers.reduce((total, value) => total + (value - mean) ** 2, 0) / (numbers.length - 1);
    return Math.sqrt(variance);
  },
  nunique: (values) => new Set(present(values).map((value) => cellKey(value))).size,
  first: (values) => present(values)[0] ?? null,
  last: (values) => {
    const kept = present(values);
    return kept[kept.length - 1] ?? null;
  },
  size: (values) => values.length,
};

export function aggregate(name: AggregationName, values: CellValue[]): CellValue {
  return AGGREGATORS[name](values);
}

/** A named column of cells, detached from its table. */
export class Series {
  constructor(
    public readonly name: string,
    public readonly values: CellValue[],
  ) {}

  get length(): number {
    return this.values.length;
  }

  rename(name: string): Series {
    return new Series(name, this.values);
  }

  map(mapper: (value: CellValue, index: number) => CellValue): Series {
    return new Series(this.name, this.values.map(mapper));
  }

  aggregate(name: AggregationName): CellValue {
    return aggregate(name, this.values);
  }
}
