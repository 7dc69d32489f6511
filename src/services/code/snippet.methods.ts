import {
  AGGREGATION_NAMES,
  cellKey,
  cellsEqual,
  compareCells,
  isAggregationName,
  parseDateCell,
  Series,
  type AggregationName,
} from "../data/series";
import { DataTable, type CellValue } from "../data/table";
import {
  aggregateGroups,
  dropColumns,
  dropDuplicates,
  dropMissing,
  renameColumns,
  sortTable,
  type AggregationSpec,
} from "../data/table.ops";
import {
  Accessor,
  Arguments,
  describeValue,
  Dict,
  GroupedColumn,
  GroupedTable,
  isCell,
  LibraryHandle,
  NativeFunction,
  sequenceItems,
  SnippetRuntimeError,
  Tuple,
  type CallArguments,
  type SnippetValue,
} from "./snippet.values";

const MAX_RANGE = 10_000;
const MAX_PATTERN_LENGTH = 200;

export function roundHalfEven(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  let rounded: number;
  if (Math.abs(fraction - 0.5) < 1e-9) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }
  return rounded / factor;
}

function method(
  name: string,
  params: string[],
  body: (args: Arguments) => SnippetValue,
): NativeFunction {
  return new NativeFunction(name, (call) => body(new Arguments(call, params)));
}

function unsupported(target: string, name: string, line: number): never {
  throw new SnippetRuntimeError(`Unsupported attribute '${name}' on ${target}`, line);
}

function aggregationArgument(args: Arguments, name: string, value: SnippetValue): AggregationName {
  if (typeof value !== "string" || !isAggregationName(value)) {
    args.fail(
      `expects '${name}' to be one of ${AGGREGATION_NAMES.join(", ")}, got ${
        typeof value === "string" ? value : describeValue(value)
      }`,
    );
  }
  return value;
}

function isNumericColumn(table: DataTable, column: string): boolean {
  return table.rows.every((row) => {
    const value = row[column] ?? null;
    return value === null || typeof value === "number" || typeof value === "boolean";
  });
}

function toNumber(value: CellValue, errors: string, args: Arguments): CellValue {
  if (value === null || typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return Number(value);
  }
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : Number.NaN;
  if (Number.isFinite(parsed)) {
    return parsed;
  }
  if (errors === "coerce") {
    return null;
  }
  return args.fail(`unable to parse '${String(value)}' as a number`);
}

function toDate(value: CellValue, errors: string, args: Arguments): CellValue {
  if (value === null) {
    return null;
  }
  const parsed = parseDateCell(value);
  if (parsed) {
    return parsed;
  }
  if (errors === "coerce") {
    return null;
  }
  return args.fail(`unable to parse '${String(value)}' as a datetime`);
}

function convertArgument(
  args: Arguments,
  convert: (value: CellValue) => CellValue,
): SnippetValue {
  const input = args.required("arg");
  if (input instanceof Series) {
    return input.map((value) => convert(value));
  }
  if (isCell(input)) {
    return convert(input);
  }
  const items = sequenceItems(input);
  if (items) {
    return items.map((item) => (isCell(item) ? convert(item) : args.fail("expects scalar items")));
  }
  return args.fail(`cannot convert ${describeValue(input)}`);
}

function castCell(value: CellValue, type: string, args: Arguments): CellValue {
  if (value === null) {
    return null;
  }
  switch (type) {
    case "int":
    case "int64":
    case "int32": {
      const number = toNumber(value, "raise", args);
      return number === null ? null : Math.trunc(Number(number));
    }
    case "float":
    case "float64":
      return toNumber(value, "raise", args);
    case "str":
    case "string":
    case "object":
      return value instanceof Date ? value.toISOString() : String(value);
    case "bool":
      return Boolean(value);
    case "datetime64[ns]":
      return toDate(value, "raise", args);
    default:
      return args.fail(`unsupported dtype '${type}'`);
  }
}

function membership(args: Arguments, name: string): CellValue[] {
  const values = args.required(name);
  const items = sequenceItems(values);
  if (!items) {
    return args.fail(`expects '${name}' to be a list`);
  }
  return items.map((item) => (isCell(item) ? item : args.fail(`expects '${name}' to contain scalars`)));
}

function numericMap(series: Series, args: Arguments, mapper: (value: number) => number): Series {
  return series.map((value) => {
    if (value === null) {
      return null;
    }
    if (typeof value !== "number" && typeof value !== "boolean") {
      return args.fail(`requires numeric values, got ${typeof value}`);
    }
    return mapper(Number(value));
  });
}

function groupedAggregation(
  grouped: GroupedTable,
  aggregation: AggregationName,
  columns: string[],
): DataTable {
  const numericOnly = aggregation === "mean" || aggregation === "sum" || aggregation === "median" || aggregation === "std";
  const specs: AggregationSpec[] = columns
    .filter((column) => !numericOnly || isNumericColumn(grouped.table, column))
    .map((column) => ({ output: column, column, aggregation }));
  return aggregateGroups(grouped.table, grouped.keys, specs);
}

function namedAggregations(args: Arguments, call: CallArguments): AggregationSpec[] {
  return [...call.keyword.entries()].map(([output, value]) => {
    const pair = value instanceof Tuple ? value.items : null;
    const column = pair?.[0];
    const aggregation = pair?.[1];
    if (!pair || pair.length !== 2 || typeof column !== "string" || aggregation === undefined) {
      return args.fail(`expects named aggregations like ${output}=('column', 'mean')`);
    }
    return { output, column, aggregation: aggregationArgument(args, output, aggregation) };
  });
}

function tableAggregate(grouped: GroupedTable, call: CallArguments): DataTable {
  if (call.positional.length === 0) {
    const args = new Arguments(call, [...call.keyword.keys()]);
    return aggregateGroups(grouped.table, grouped.keys, namedAggregations(args, call));
  }

  const args = new Arguments(call, ["func"]);
  const func = args.required("func");
  if (func instanceof Dict) {
    const specs: AggregationSpec[] = [];
    for (const [column, value] of func.entries) {
      const list = sequenceItems(value);
      if (list) {
        for (const item of list) {
          const aggregation = aggregationArgument(args, column, item);
          specs.push({ output: `${column}_${aggregation}`, column, aggregation });
        }
      } else {
        specs.push({ output: column, column, aggregation: aggregationArgument(args, column, value) });
      }
    }
    return aggregateGroups(grouped.table, grouped.keys, specs);
  }

  const list = sequenceItems(func);
  if (list) {
    const aggregations = list.map((item) => aggregationArgument(args, "func", item));
    return aggregateGroups(
      grouped.table,
      grouped.keys,
      grouped.valueColumns.flatMap((column) =>
        aggregations.map((aggregation) => ({ output: `${column}_${aggregation}`, column, aggregation })),
      ),
    );
  }

  return groupedAggregation(grouped, aggregationArgument(args, "func", func), grouped.valueColumns);
}

function columnAggregate(grouped: GroupedColumn, call: CallArguments): DataTable {
  const { keys, table } = grouped.grouped;
  if (call.positional.length === 0) {
    const args = new Arguments(call, [...call.keyword.keys()]);
    const specs = [...call.keyword.entries()].map(([output, value]) => ({
      output,
      column: grouped.column,
      aggregation: aggregationArgument(args, output, value),
    }));
    return aggregateGroups(table, keys, specs);
  }

  const args = new Arguments(call, ["func"]);
  const func = args.required("func");
  const list = sequenceItems(func);
  if (list) {
    return aggregateGroups(
      table,
      keys,
      list.map((item) => {
        const aggregation = aggregationArgument(args, "func", item);
        return { output: aggregation, column: grouped.column, aggregation };
      }),
    );
  }

  return aggregateGroups(table, keys, [
    { output: grouped.column, column: grouped.column, aggregation: aggregationArgument(args, "func", func) },
  ]);
}

function resetIndex(table: DataTable): NativeFunction {
  return method("reset_index", ["drop", "name"], (args) => {
    args.boolean("drop");
    const name = args.string("name");
    const last = table.columns[table.columns.length - 1];
    if (name && last) {
      return renameColumns(table, new Map([[last, name]]));
    }
    return table;
  });
}

export function tableAttribute(table: DataTable, name: string, line: number): SnippetValue {
  switch (name) {
    case "columns":
      return [...table.columns];
    case "shape":
      return new Tuple([table.rowCount, table.columns.length]);
    case "empty":
      return table.rowCount === 0;
    case "copy":
      return method("copy", ["deep"], () => table.clone());
    case "head":
      return method("head", ["n"], (args) => table.head(args.integer("n") ?? 5));
    case "tail":
      return method("tail", ["n"], (args) => table.tail(args.integer("n") ?? 5));
    case "sort_values":
      return method("sort_values", ["by", "ascending", "na_position"], (args) => {
        const by = args.stringList("by") ?? args.fail("missing required argument 'by'");
        const ascending = args.booleanList("ascending") ?? [true];
        if (ascending.length !== 1 && ascending.length !== by.length) {
          args.fail("'ascending' must match the length of 'by'");
        }
        const position = args.string("na_position") ?? "last";
        if (position !== "last") {
          args.fail("only na_position='last' is supported");
        }
        return sortTable(table, by, by.map((_column, index) => ascending[index] ?? ascending[0] ?? true));
      });
    case "nlargest":
    case "nsmallest":
      return method(name, ["n", "columns"], (args) => {
        const n = args.integer("n") ?? args.fail("missing required argument 'n'");
        const columns = args.stringList("columns") ?? args.fail("missing required argument 'columns'");
        const ascending = name === "nsmallest";
        const present = dropMissing(table, columns);
        return sortTable(present, columns, columns.map(() => ascending)).head(n);
      });
    case "rename":
      return method("rename", ["columns"], (args: Arguments) => {
        const mapping = args.dict("columns") ?? args.fail("expects columns={'old': 'new'}");
        const renames = new Map<string, string>();
        for (const [from, to] of mapping.entries) {
          if (typeof to !== "string") {
            args.fail("expects new column names to be strings");
          }
          renames.set(from, to);
        }
        return renameColumns(table, renames);
      });
    case "drop":
      return method("drop", ["labels", "axis", "columns"], (args) => {
        const columns = args.stringList("columns");
        if (columns) {
          return dropColumns(table, columns);
        }
        const labels = args.stringList("labels");
        const axis = args.value("axis");
        if (labels && (axis === 1 || axis === "columns")) {
          return dropColumns(table, labels);
        }
        return args.fail("only dropping columns is supported (columns=[...] or axis=1)");
      });
    case "dropna":
      return method("dropna", ["subset"], (args) => dropMissing(table, args.stringList("subset") ?? null));
    case "drop_duplicates":
      return method("drop_duplicates", ["subset", "keep"], (args) => {
        const keep = args.string("keep") ?? "first";
        if (keep !== "first") {
          args.fail("only keep='first' is supported");
        }
        return dropDuplicates(table, args.stringList("subset") ?? null);
      });
    case "fillna":
      return method("fillna", ["value"], (args) => {
        const value = args.required("value");
        const fills = new Map<string, CellValue>();
        if (value instanceof Dict) {
          for (const [column, fill] of value.entries) {
            fills.set(column, isCell(fill) ? fill : args.fail("expects scalar fill values"));
          }
        } else if (isCell(value)) {
          for (const column of table.columns) {
            fills.set(column, value);
          }
        } else {
          args.fail("expects a scalar or dict value");
        }
        return table.withRows(
          table.rows.map((row) => {
            const next = { ...row };
            for (const [column, fill] of fills) {
              if (table.hasColumn(column) && (next[column] ?? null) === null) {
                next[column] = fill;
              }
            }
            return next;
          }),
        );
      });
    case "reset_index":
      return resetIndex(table);
    case "groupby":
      return method("groupby", ["by", "as_index", "sort", "dropna"], (args) => {
        const by = args.stringList("by") ?? args.fail("missing required argument 'by'");
        args.boolean("as_index");
        args.boolean("sort");
        args.boolean("dropna");
        for (const column of by) {
          if (!table.hasColumn(column)) {
            args.fail(`unknown column '${column}'`);
          }
        }
        return new GroupedTable(table, by, null);
      });
    default:
      if (table.hasColumn(name)) {
        return new Series(name, table.column(name));
      }
      return unsupported("DataFrame", name, line);
  }
}

function valueCounts(series: Series, args: Arguments): DataTable {
  const normalize = args.boolean("normalize") ?? false;
  const ascending = args.boolean("ascending") ?? false;
  const counts = new Map<string, { value: CellValue; count: number }>();
  let total = 0;
  for (const value of series.values) {
    if (value === null) {
      continue;
    }
    total += 1;
    const key = cellKey(value);
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { value, count: 1 });
    }
  }
  const label = normalize ? "proportion" : "count";
  const rows = [...counts.values()].map((entry) => ({
    [series.name]: entry.value,
    [label]: normalize ? entry.count / total : entry.count,
  }));
  return sortTable(DataTable.fromRows(rows, [series.name, label]), [label], [ascending]);
}

export function seriesAttribute(series: Series, name: string, line: number): SnippetValue {
  if (isAggregationName(name) && name !== "first" && name !== "last") {
    return method(name, ["skipna", "numeric_only"], () => series.aggregate(name));
  }

  switch (name) {
    case "name":
      return series.name;
    case "size":
      return series.length;
    case "str":
    case "dt":
      return new Accessor(name, series);
    case "round":
      return method("round", ["decimals"], (args) => {
        const digits = args.integer("decimals") ?? 0;
        return numericMap(series, args, (value) => roundHalfEven(value, digits));
      });
    case "abs":
      return method("abs", [], (args) => numericMap(series, args, Math.abs));
    case "cumsum":
      return method("cumsum", [], (args) => {
        let running = 0;
        return numericMap(series, args, (value) => {
          running += value;
          return running;
        });
      });
    case "isin":
      return method("isin", ["values"], (args) => {
        const allowed = membership(args, "values");
        return series.map((value) => allowed.some((candidate) => cellsEqual(value, candidate)));
      });
    case "between":
      return method("between", ["left", "right", "inclusive"], (args) => {
        const left = args.cell("left") ?? args.fail("missing required argument 'left'");
        const right = args.cell("right") ?? args.fail("missing required argument 'right'");
        const inclusive = args.string("inclusive") ?? "both";
        const lowInclusive = inclusive === "both" || inclusive === "left";
        const highInclusive = inclusive === "both" || inclusive === "right";
        return series.map((value) => {
          if (value === null) {
            return false;
          }
          const low = compareCells(value, left);
          const high = compareCells(value, right);
          return (lowInclusive ? low >= 0 : low > 0) && (highInclusive ? high <= 0 : high < 0);
        });
      });
    case "isna":
    case "isnull":
      return method(name, [], () => series.map((value) => value === null));
    case "notna":
    case "notnull":
      return method(name, [], () => series.map((value) => value !== null));
    case "fillna":
      return method("fillna", ["value"], (args) => {
        const fill = args.cell("value") ?? null;
        return series.map((value) => (value === null ? fill : value));
      });
    case "astype":
      return method("astype", ["dtype"], (args) => {
        const type = args.string("dtype") ?? args.fail("expects a dtype name such as 'float'");
        return series.map((value) => castCell(value, type, args));
      });
    case "value_counts":
      return method("value_counts", ["normalize", "ascending"], (args) => valueCounts(series, args));
    case "unique":
      return method("unique", [], () => {
        const seen = new Set<string>();
        return series.values.filter((value) => {
          const key = cellKey(value);
          if (seen.has(key)) {
            return false;
          }
          seen.add(key);
          return true;
        });
      });
    case "tolist":
      return method("tolist", [], () => [...series.values]);
    case "head":
      return method("head", ["n"], (args) => new Series(series.name, series.values.slice(0, args.integer("n") ?? 5)));
    case "sort_values":
      return method("sort_values", ["ascending"], (args) => {
        const ascending = args.boolean("ascending") ?? true;
        const sorted = sortTable(DataTable.fromColumns({ [series.name]: series.values }), [series.name], [ascending]);
        return new Series(series.name, sorted.column(series.name));
      });
    case "rename":
      return method("rename", ["name"], (args) => series.rename(args.string("name") ?? series.name));
    case "reset_index":
      return method("reset_index", ["drop", "name"], (args) => {
        args.boolean("drop");
        const label = args.string("name") ?? series.name;
        return DataTable.fromColumns({ [label]: series.values });
      });
    case "to_frame":
      return method("to_frame", ["name"], (args) =>
        DataTable.fromColumns({ [args.string("name") ?? series.name]: series.values }),
      );
    default:
      return unsupported("Series", name, line);
  }
}

function stringMethod(
  series: Series,
  name: string,
  params: string[],
  apply: (text: string, args: Arguments) => CellValue,
): NativeFunction {
  return method(name, params, (args) =>
    series.map((value) => {
      if (value === null) {
        return args.has("na") ? args.cell("na") ?? null : null;
      }
      if (typeof value !== "string") {
        return args.fail(`can only be used with string values, got ${describeValue(value)}`);
      }
      return apply(value, args);
    }),
  );
}

/**
 * False for patterns that can backtrack without bound: backreferences, and
 * repeated groups that themselves contain repetition or alternation.
 */
export function isBacktrackSafe(pattern: string): boolean {
  const groups: boolean[] = [];
  const markOpenGroup = () => {
    if (groups.length > 0) {
      groups[groups.length - 1] = true;
    }
  };

  let inClass = false;
  for (let index = 0; index < pattern.length; index += 1) {
    const char = pattern[index];
    if (char === "\\") {
      if (!inClass && /[1-9k]/.test(pattern[index + 1] ?? "")) {
        return false;
      }
      index += 1;
      continue;
    }
    if (inClass) {
      inClass = char !== "]";
      continue;
    }

    if (char === "[") {
      inClass = true;
    } else if (char === "(") {
      groups.push(false);
      if (pattern[index + 1] === "?") {
        index += 1;
      }
    } else if (char === ")") {
      const varies = groups.pop() ?? false;
      const repeated = /^[*+{]/.test(pattern.slice(index + 1));
      if (varies && repeated) {
        return false;
      }
      if (varies || repeated) {
        markOpenGroup();
      }
    } else if (char === "*" || char === "+" || char === "?" || char === "{" || char === "|") {
      markOpenGroup();
    }
  }
  return true;
}

function matcher(args: Arguments): (text: string) => boolean {
  const pattern = args.string("pat") ?? args.fail("missing required argument 'pat'");
  if (pattern.length > MAX_PATTERN_LENGTH) {
    args.fail(`pattern longer than ${MAX_PATTERN_LENGTH} characters`);
  }
  const caseSensitive = args.boolean("case") ?? true;
  if (args.boolean("regex") === true) {
    if (!isBacktrackSafe(pattern)) {
      args.fail(`regular expression '${pattern}' nests repetition; simplify the pattern`);
    }
    let expression: RegExp;
    try {
      expression = new RegExp(pattern, caseSensitive ? "" : "i");
    } catch {
      return args.fail(`invalid regular expression '${pattern}'`);
    }
    return (text) => expression.test(text);
  }
  const needle = caseSensitive ? pattern : pattern.toLowerCase();
  return (text) => (caseSensitive ? text : text.toLowerCase()).includes(needle);
}

export function accessorAttribute(accessor: Accessor, name: string, line: number): SnippetValue {
  const { series } = accessor;

  if (accessor.kind === "dt") {
    const part = (read: (date: Date) => number) =>
      series.map((value) => {
        const date = value === null ? null : parseDateCell(value);
        return date ? read(date) : null;
      });

    switch (name) {
      case "year":
        return part((date) => date.getUTCFullYear());
      case "month":
        return part((date) => date.getUTCMonth() + 1);
      case "day":
        return part((date) => date.getUTCDate());
      case "dayofweek":
      case "weekday":
        return part((date) => (date.getUTCDay() + 6) % 7);
      default:
        return unsupported("dt accessor", name, line);
    }
  }

  switch (name) {
    case "contains":
      return stringMethod(series, name, ["pat", "case", "na", "regex"], (text, args) => matcher(args)(text));
    case "startswith":
      return stringMethod(series, name, ["pat", "na"], (text, args) =>
        text.startsWith(args.string("pat") ?? args.fail("missing required argument 'pat'")),
      );
    case "endswith":
      return stringMethod(series, name, ["pat", "na"], (text, args) =>
        text.endsWith(args.string("pat") ?? args.fail("missing required argument 'pat'")),
      );
    case "lower":
      return stringMethod(series, name, [], (text) => text.toLowerCase());
    case "upper":
      return stringMethod(series, name, [], (text) => text.toUpperCase());
    case "strip":
      return stringMethod(series, name, [], (text) => text.trim());
    case "len":
      return stringMethod(series, name, [], (text) => text.length);
    default:
      return unsupported("str accessor", name, line);
  }
}

export function groupedAttribute(grouped: GroupedTable, name: string, line: number): SnippetValue {
  if (name === "agg" || name === "aggregate") {
    return new NativeFunction(name, (call) => tableAggregate(grouped, call));
  }

  if (name === "size") {
    return method("size", [], () =>
      aggregateGroups(grouped.table, grouped.keys, [{ output: "size", column: null, aggregation: "size" }]),
    );
  }

  if (isAggregationName(name)) {
    return method(name, ["numeric_only"], (args) => {
      args.boolean("numeric_only");
      return groupedAggregation(grouped, name, grouped.valueColumns);
    });
  }

  return unsupported("GroupBy", name, line);
}

export function groupedColumnAttribute(grouped: GroupedColumn, name: string, line: number): SnippetValue {
  if (name === "agg" || name === "aggregate") {
    return new NativeFunction(name, (call) => columnAggregate(grouped, call));
  }

  if (isAggregationName(name)) {
    const output = name === "size" ? "size" : grouped.column;
    return method(name, [], () =>
      aggregateGroups(grouped.grouped.table, grouped.grouped.keys, [
        { output, column: grouped.column, aggregation: name },
      ]),
    );
  }

  return unsupported("GroupBy column", name, line);
}

export function createPandasHandle(): LibraryHandle {
  return new LibraryHandle(
    "pd",
    new Map([
      [
        "to_datetime",
        method("to_datetime", ["arg", "errors", "format", "utc"], (args) => {
          const errors = args.string("errors") ?? "raise";
          args.string("format");
          args.boolean("utc");
          return convertArgument(args, (value) => toDate(value, errors, args));
        }),
      ],
      [
        "to_numeric",
        method("to_numeric", ["arg", "errors"], (args) => {
          const errors = args.string("errors") ?? "raise";
          return convertArgument(args, (value) => toNumber(value, errors, args));
        }),
      ],
      [
        "Timestamp",
        method("Timestamp", ["ts_input"], (args) => {
          const input = args.cell("ts_input") ?? args.fail("missing required argument 'ts_input'");
          return toDate(input, "raise", args);
        }),
      ],
    ]),
  );
}

function numbersOf(args: Arguments, values: SnippetValue[]): CellValue[] {
  return values.map((value) => (isCell(value) ? value : args.fail("expects scalar values")));
}

function extremeOf(name: "min" | "max", call: CallArguments): SnippetValue {
  const args = new Arguments(call, call.positional.map((_value, index) => `arg${index}`));
  const single = call.positional.length === 1 ? call.positional[0] : undefined;
  const items = single === undefined ? call.positional : sequenceItems(single) ?? [single];
  const values = numbersOf(args, items).filter((value) => value !== null);
  if (values.length === 0) {
    return args.fail("arg is an empty sequence");
  }
  return values.reduce((best, value) => {
    const order = compareCells(value, best);
    return (name === "max" ? order > 0 : order < 0) ? value : best;
  });
}

export function createBuiltins(): Map<string, NativeFunction> {
  return new Map([
    [
      "len",
      method("len", ["obj"], (args) => {
        const value = args.required("obj");
        if (value instanceof DataTable) {
          return value.rowCount;
        }
        if (typeof value === "string") {
          return value.length;
        }
        if (value instanceof Dict) {
          return value.entries.size;
        }
        const items = sequenceItems(value);
        if (items) {
          return items.length;
        }
        return args.fail(`object of type ${describeValue(value)} has no len()`);
      }),
    ],
    ["min", new NativeFunction("min", (call) => extremeOf("min", call))],
    ["max", new NativeFunction("max", (call) => extremeOf("max", call))],
    [
      "sum",
      method("sum", ["iterable"], (args) => {
        const items = sequenceItems(args.required("iterable")) ?? args.fail("expects a list or Series");
        return numbersOf(args, items).reduce<number>((total, value) => {
          if (value === null) {
            return total;
          }
          if (typeof value !== "number" && typeof value !== "boolean") {
            return args.fail("expects numeric values");
          }
          return total + Number(value);
        }, 0);
      }),
    ],
    [
      "abs",
      method("abs", ["x"], (args) => {
        const value = args.required("x");
        if (value instanceof Series) {
          return numericMap(value, args, Math.abs);
        }
        if (typeof value !== "number") {
          return args.fail(`bad operand type for abs(): ${describeValue(value)}`);
        }
        return Math.abs(value);
      }),
    ],
    [
      "round",
      method("round", ["number", "ndigits"], (args) => {
        const value = args.required("number");
        const digits = args.integer("ndigits") ?? 0;
        if (value instanceof Series) {
          return numericMap(value, args, (item) => roundHalfEven(item, digits));
        }
        if (typeof value !== "number") {
          return args.fail(`type ${describeValue(value)} doesn't define round()`);
        }
        return roundHalfEven(value, digits);
      }),
    ],
    [
      "range",
      method("range", ["start", "stop"], (args) => {
        const first = args.integer("start") ?? args.fail("missing required argument");
        const stop = args.integer("stop");
        const [from, to] = stop === undefined ? [0, first] : [first, stop];
        if (to - from > MAX_RANGE) {
          args.fail(`range larger than ${MAX_RANGE} is not allowed`);
        }
        const out: number[] = [];
        for (let value = from; value < to; value += 1) {
          out.push(value);
        }
        return out;
      }),
    ],
  ]);
}
