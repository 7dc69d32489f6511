import { Series } from "../data/series";
import { DataTable, type CellValue } from "../data/table";

export class SnippetRuntimeError extends Error {
  public readonly code = "SNIPPET_RUNTIME_ERROR";

  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`Line ${line}: ${message}`);
    this.name = "SnippetRuntimeError";
  }
}

export class SnippetLimitError extends Error {
  public readonly code = "SNIPPET_LIMIT_EXCEEDED";

  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`Line ${line}: ${message}`);
    this.name = "SnippetLimitError";
  }
}

export class Tuple {
  constructor(public readonly items: SnippetValue[]) {}
}

export class Dict {
  constructor(public readonly entries: Map<string, SnippetValue>) {}
}

export class GroupedTable {
  constructor(
    public readonly table: DataTable,
    public readonly keys: string[],
    public readonly selected: string[] | null,
  ) {}

  get valueColumns(): string[] {
    const keys = new Set(this.keys);
    return (this.selected ?? this.table.columns).filter((column) => !keys.has(column));
  }
}

export class GroupedColumn {
  constructor(
    public readonly grouped: GroupedTable,
    public readonly column: string,
  ) {}
}

export class Accessor {
  constructor(
    public readonly kind: "str" | "dt",
    public readonly series: Series,
  ) {}
}

export interface CallArguments {
  callee: string;
  positional: SnippetValue[];
  keyword: Map<string, SnippetValue>;
  line: number;
}

export class NativeFunction {
  constructor(
    public readonly name: string,
    public readonly invoke: (call: CallArguments) => SnippetValue,
  ) {}
}

export class LibraryHandle {
  constructor(
    public readonly name: string,
    public readonly members: Map<string, NativeFunction>,
  ) {}
}

export type SnippetValue =
  | CellValue
  | DataTable
  | Series
  | GroupedTable
  | GroupedColumn
  | Accessor
  | Tuple
  | Dict
  | NativeFunction
  | LibraryHandle
  | SnippetValue[];

export function isCell(value: SnippetValue): value is CellValue {
  return (
    value === null
    || typeof value === "string"
    || typeof value === "number"
    || typeof value === "boolean"
    || value instanceof Date
  );
}

export function describeValue(value: SnippetValue): string {
  if (value === null) {
    return "None";
  }
  if (value instanceof Date) {
    return "datetime";
  }
  if (value instanceof DataTable) {
    return "DataFrame";
  }
  if (value instanceof Series) {
    return "Series";
  }
  if (value instanceof GroupedTable || value instanceof GroupedColumn) {
    return "GroupBy";
  }
  if (value instanceof Accessor) {
    return `${value.kind} accessor`;
  }
  if (value instanceof Tuple) {
    return "tuple";
  }
  if (value instanceof Dict) {
    return "dict";
  }
  if (value instanceof NativeFunction) {
    return "function";
  }
  if (value instanceof LibraryHandle) {
    return "module";
  }
  if (Array.isArray(value)) {
    return "list";
  }
  return typeof value;
}

/** Sequence items of a list, tuple or series; null for anything else. */
export function sequenceItems(value: SnippetValue): SnippetValue[] | null {
  if (Array.isArray(value)) {
    return value;
  }
  if (value instanceof Tuple) {
    return value.items;
  }
  if (value instanceof Series) {
    return value.values;
  }
  return null;
}

/**
 * Binds positional and keyword arguments to a fixed parameter list and reads
 * them with type checks. Unknown keywords and surplus positionals are errors.
 */
export class Arguments {
  constructor(
    private readonly call: CallArguments,
    private readonly names: string[],
  ) {
    if (call.positional.length > names.length) {
      this.fail(`takes at most ${names.length} positional argument(s)`);
    }

    for (const key of call.keyword.keys()) {
      const index = names.indexOf(key);
      if (index < 0) {
        this.fail(`got an unexpected keyword argument '${key}'`);
      }
      if (index < call.positional.length) {
        this.fail(`got multiple values for argument '${key}'`);
      }
    }

    if (call.keyword.get("inplace") === true) {
      this.fail("inplace=True is not supported; assign the result instead");
    }
  }

  fail(message: string): never {
    throw new SnippetRuntimeError(`${this.call.callee}() ${message}`, this.call.line);
  }

  has(name: string): boolean {
    return this.value(name) !== undefined;
  }

  value(name: string): SnippetValue | undefined {
    const index = this.names.indexOf(name);
    if (index >= 0 && index < this.call.positional.length) {
      return this.call.positional[index];
    }
    return this.call.keyword.get(name);
  }

  required(name: string): SnippetValue {
    const value = this.value(name);
    if (value === undefined) {
      this.fail(`missing required argument '${name}'`);
    }
    return value;
  }

  string(name: string): string | undefined {
    const value = this.value(name);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== "string") {
      this.fail(`expects '${name}' to be a string, got ${describeValue(value)}`);
    }
    return value;
  }

  integer(name: string): number | undefined {
    const value = this.value(name);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== "number" || !Number.isInteger(value)) {
      this.fail(`expects '${name}' to be an integer, got ${describeValue(value)}`);
    }
    return value;
  }

  boolean(name: string): boolean | undefined {
    const value = this.value(name);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== "boolean") {
      this.fail(`expects '${name}' to be True or False, got ${describeValue(value)}`);
    }
    return value;
  }

  /** A single column name or a list of them. */
  stringList(name: string): string[] | undefined {
    const value = this.value(name);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value === "string") {
      return [value];
    }
    const items = sequenceItems(value);
    if (!items || value instanceof Series) {
      this.fail(`expects '${name}' to be a string or list of strings`);
    }
    return items.map((item) => {
      if (typeof item !== "string") {
        this.fail(`expects '${name}' to contain only strings`);
      }
      return item;
    });
  }

  booleanList(name: string): boolean[] | undefined {
    const value = this.value(name);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value === "boolean") {
      return [value];
    }
    const items = sequenceItems(value);
    if (!items || value instanceof Series) {
      this.fail(`expects '${name}' to be True/False or a list of them`);
    }
    return items.map((item) => {
      if (typeof item !== "boolean") {
        this.fail(`expects '${name}' to contain only True/False`);
      }
      return item;
    });
  }

  cell(name: string): CellValue | undefined {
    const value = this.value(name);
    if (value === undefined) {
      return undefined;
    }
    if (!isCell(value)) {
      this.fail(`expects '${name}' to be a scalar, got ${describeValue(value)}`);
    }
    return value;
  }

  dict(name: string): Dict | undefined {
    const value = this.value(name);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!(value instanceof Dict)) {
      this.fail(`expects '${name}' to be a dict, got ${describeValue(value)}`);
    }
    return value;
  }
}
