import { CellTypeError, cellsEqual, compareCells, Series } from "../data/series";
import { DataTable, TableShapeError, type CellValue } from "../data/table";
import { filterTable } from "../data/table.ops";
import type { BinaryOperator, Expr, SnippetProgram, Statement } from "./snippet.ast";
import {
  accessorAttribute,
  groupedAttribute,
  groupedColumnAttribute,
  seriesAttribute,
  tableAttribute,
} from "./snippet.methods";
import {
  Accessor,
  describeValue,
  Dict,
  GroupedColumn,
  GroupedTable,
  isCell,
  LibraryHandle,
  NativeFunction,
  sequenceItems,
  SnippetLimitError,
  SnippetRuntimeError,
  Tuple,
  type SnippetValue,
} from "./snippet.values";

export interface InterpreterOptions {
  maxOperations: number;
}

const DEFAULT_INTERPRETER_OPTIONS: InterpreterOptions = {
  maxOperations: 5_000,
};

type ScalarOperator = (left: CellValue, right: CellValue) => CellValue;

function numericOperand(value: CellValue, op: string): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return Number(value);
  }
  throw new CellTypeError(`unsupported operand type for ${op}: ${value instanceof Date ? "datetime" : typeof value}`);
}

function finite(value: number): CellValue {
  return Number.isFinite(value) ? value : null;
}

function arithmetic(op: string, apply: (left: number, right: number) => number): ScalarOperator {
  return (left, right) => {
    if (left === null || right === null) {
      return null;
    }
    return finite(apply(numericOperand(left, op), numericOperand(right, op)));
  };
}

function floorModulo(left: number, right: number): number {
  return left - right * Math.floor(left / right);
}

function ordering(test: (order: number) => boolean): ScalarOperator {
  return (left, right) => {
    if (left === null || right === null) {
      return false;
    }
    return test(compareCells(left, right));
  };
}

function logicalBits(op: string, apply: (left: boolean, right: boolean) => boolean): ScalarOperator {
  return (left, right) => {
    const a = left ?? false;
    const b = right ?? false;
    if (typeof a !== "boolean" || typeof b !== "boolean") {
      throw new CellTypeError(`operator ${op} needs boolean operands; wrap comparisons in parentheses`);
    }
    return apply(a, b);
  };
}

const SCALAR_OPERATORS: Record<BinaryOperator, ScalarOperator> = {
  "+": (left, right) => {
    if (left === null || right === null) {
      return null;
    }
    if (typeof left === "string" && typeof right === "string") {
      return left + right;
    }
    return finite(numericOperand(left, "+") + numericOperand(right, "+"));
  },
  "-": arithmetic("-", (left, right) => left - right),
  "*": arithmetic("*", (left, right) => left * right),
  "/": arithmetic("/", (left, right) => left / right),
  "//": arithmetic("//", (left, right) => Math.floor(left / right)),
  "%": arithmetic("%", floorModulo),
  "**": arithmetic("**", (left, right) => left ** right),
  "==": (left, right) => cellsEqual(left, right),
  "!=": (left, right) => !cellsEqual(left, right),
  "<": ordering((order) => order < 0),
  "<=": ordering((order) => order <= 0),
  ">": ordering((order) => order > 0),
  ">=": ordering((order) => order >= 0),
  "&": logicalBits("&", (left, right) => left && right),
  "|": logicalBits("|", (left, right) => left || right),
  "^": logicalBits("^", (left, right) => left !== right),
};

function scalarOf(value: SnippetValue, line: number): CellValue {
  if (!isCell(value)) {
    throw new SnippetRuntimeError(`expected a scalar or Series, got ${describeValue(value)}`, line);
  }
  return value;
}

function elementWise(
  left: SnippetValue,
  right: SnippetValue,
  apply: ScalarOperator,
  line: number,
): SnippetValue {
  if (left instanceof Series && right instanceof Series) {
    if (left.length !== right.length) {
      throw new SnippetRuntimeError(`Series lengths differ (${left.length} vs ${right.length})`, line);
    }
    return left.map((value, index) => apply(value, right.values[index] ?? null));
  }
  if (left instanceof Series) {
    const scalar = scalarOf(right, line);
    return left.map((value) => apply(value, scalar));
  }
  if (right instanceof Series) {
    const scalar = scalarOf(left, line);
    return right.map((value) => apply(scalar, value));
  }
  return apply(scalarOf(left, line), scalarOf(right, line));
}

function truthy(value: SnippetValue, line: number): boolean {
  if (value instanceof Series || value instanceof DataTable) {
    throw new SnippetRuntimeError(
      `The truth value of a ${describeValue(value)} is ambiguous; use & and | with parentheses`,
      line,
    );
  }
  if (value === null) {
    return false;
  }
  if (typeof value === "string") {
    return value.length > 0;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (value instanceof Dict) {
    return value.entries.size > 0;
  }
  const items = sequenceItems(value);
  return items ? items.length > 0 : true;
}

function toColumnValues(table: DataTable, value: SnippetValue, line: number): CellValue[] {
  if (value instanceof Series) {
    return value.values;
  }
  if (isCell(value)) {
    return table.rows.map(() => value);
  }
  const items = sequenceItems(value);
  if (items) {
    return items.map((item) => scalarOf(item, line));
  }
  throw new SnippetRuntimeError(`cannot assign ${describeValue(value)} to a column`, line);
}

function booleanMask(value: SnippetValue): CellValue[] | null {
  const items: SnippetValue[] | null = value instanceof Series ? value.values : Array.isArray(value) ? value : null;
  if (!items || items.length === 0 || !items.every((item) => typeof item === "boolean" || item === null)) {
    return null;
  }
  return items.map((item) => (isCell(item) ? item : null));
}

/**
 * Evaluates a parsed snippet over an explicit namespace. Nothing outside the
 * bindings and builtins handed in is reachable.
 */
export class SnippetInterpreter {
  private operations = 0;

  private readonly options: InterpreterOptions;

  constructor(
    private readonly scope: Map<string, SnippetValue>,
    private readonly builtins: Map<string, NativeFunction>,
    options: Partial<InterpreterOptions> = {},
  ) {
    this.options = { ...DEFAULT_INTERPRETER_OPTIONS, ...options };
  }

  run(program: SnippetProgram): Map<string, SnippetValue> {
    for (const statement of program.statements) {
      this.execute(statement);
    }
    return this.scope;
  }

  private execute(statement: Statement) {
    try {
      switch (statement.kind) {
        case "assign":
          this.scope.set(statement.target, this.evaluate(statement.value));
          return;
        case "assignColumn":
          this.assignColumn(statement.target, statement.key, statement.value, statement.line);
          return;
        case "expression":
          this.evaluate(statement.value);
          return;
      }
    } catch (error) {
      if (error instanceof TableShapeError || error instanceof CellTypeError) {
        throw new SnippetRuntimeError(error.message, statement.line);
      }
      throw error;
    }
  }

  private assignColumn(target: string, keyExpr: Expr, valueExpr: Expr, line: number) {
    const table = this.scope.get(target);
    if (!(table instanceof DataTable)) {
      throw new SnippetRuntimeError(`'${target}' is not a DataFrame`, line);
    }
    const key = this.evaluate(keyExpr);
    if (typeof key !== "string") {
      throw new SnippetRuntimeError("column names must be strings", line);
    }
    const values = toColumnValues(table, this.evaluate(valueExpr), line);
    this.scope.set(target, table.withColumn(key, values));
  }

  private tick(line: number) {
    this.operations += 1;
    if (this.operations > this.options.maxOperations) {
      throw new SnippetLimitError(`Snippet exceeds ${this.options.maxOperations} operations`, line);
    }
  }

  private evaluate(expr: Expr): SnippetValue {
    this.tick(expr.line);

    switch (expr.kind) {
      case "literal":
        return expr.value;
      case "name":
        return this.lookup(expr.id, expr.line);
      case "list":
        return expr.items.map((item) => this.evaluate(item));
      case "tuple":
        return new Tuple(expr.items.map((item) => this.evaluate(item)));
      case "dict": {
        const entries = new Map<string, SnippetValue>();
        for (const entry of expr.entries) {
          const key = this.evaluate(entry.key);
          if (typeof key !== "string") {
            throw new SnippetRuntimeError("dict keys must be strings", expr.line);
          }
          entries.set(key, this.evaluate(entry.value));
        }
        return new Dict(entries);
      }
      case "attribute":
        return this.attribute(this.evaluate(expr.target), expr.name, expr.line);
      case "subscript":
        return this.subscript(this.evaluate(expr.target), this.evaluate(expr.index), expr.line);
      case "call":
        return this.call(expr);
      case "unary":
        return this.unary(expr.op, this.evaluate(expr.operand), expr.line);
      case "binary":
        return elementWise(
          this.evaluate(expr.left),
          this.evaluate(expr.right),
          SCALAR_OPERATORS[expr.op],
          expr.line,
        );
      case "logical": {
        const left = this.evaluate(expr.left);
        const leftTruth = truthy(left, expr.line);
        if (expr.op === "and") {
          return leftTruth ? this.evaluate(expr.right) : left;
        }
        return leftTruth ? left : this.evaluate(expr.right);
      }
    }
  }

  private lookup(name: string, line: number): SnippetValue {
    const bound = this.scope.get(name);
    if (bound !== undefined) {
      return bound;
    }
    const builtin = this.builtins.get(name);
    if (builtin) {
      return builtin;
    }
    throw new SnippetRuntimeError(`name '${name}' is not defined`, line);
  }

  private attribute(target: SnippetValue, name: string, line: number): SnippetValue {
    if (target instanceof DataTable) {
      return tableAttribute(target, name, line);
    }
    if (target instanceof Series) {
      return seriesAttribute(target, name, line);
    }
    if (target instanceof Accessor) {
      return accessorAttribute(target, name, line);
    }
    if (target instanceof GroupedTable) {
      return groupedAttribute(target, name, line);
    }
    if (target instanceof GroupedColumn) {
      return groupedColumnAttribute(target, name, line);
    }
    if (target instanceof LibraryHandle) {
      const member = target.members.get(name);
      if (member) {
        return member;
      }
      throw new SnippetRuntimeError(`module '${target.name}' has no supported attribute '${name}'`, line);
    }
    throw new SnippetRuntimeError(`'${describeValue(target)}' object has no attribute '${name}'`, line);
  }

  private subscript(target: SnippetValue, index: SnippetValue, line: number): SnippetValue {
    if (target instanceof DataTable) {
      if (typeof index === "string") {
        return new Series(index, target.column(index));
      }
      const mask = booleanMask(index);
      if (mask) {
        return filterTable(target, mask);
      }
      const items = sequenceItems(index);
      if (Array.isArray(index) && items) {
        return target.select(
          items.map((item) => {
            if (typeof item !== "string") {
              throw new SnippetRuntimeError("column lists must contain only strings", line);
            }
            return item;
          }),
        );
      }
      throw new SnippetRuntimeError(`cannot index a DataFrame with ${describeValue(index)}`, line);
    }

    if (target instanceof GroupedTable) {
      if (typeof index === "string") {
        if (!target.table.hasColumn(index)) {
          throw new SnippetRuntimeError(`Column not found: ${index}`, line);
        }
        return new GroupedColumn(target, index);
      }
      if (Array.isArray(index) && index.every((item): item is string => typeof item === "string")) {
        return new GroupedTable(target.table, target.keys, index);
      }
      throw new SnippetRuntimeError(`cannot index a GroupBy with ${describeValue(index)}`, line);
    }

    if (target instanceof Dict) {
      if (typeof index !== "string") {
        throw new SnippetRuntimeError("dict keys must be strings", line);
      }
      const value = target.entries.get(index);
      if (value === undefined) {
        throw new SnippetRuntimeError(`KeyError: '${index}'`, line);
      }
      return value;
    }

    const items = sequenceItems(target);
    if (items) {
      if (typeof index !== "number" || !Number.isInteger(index)) {
        throw new SnippetRuntimeError("sequence indices must be integers", line);
      }
      const value = items[index < 0 ? items.length + index : index];
      if (value === undefined) {
        throw new SnippetRuntimeError("index out of range", line);
      }
      return value;
    }

    throw new SnippetRuntimeError(`'${describeValue(target)}' object is not subscriptable`, line);
  }

  private call(expr: Extract<Expr, { kind: "call" }>): SnippetValue {
    const callee = this.evaluate(expr.callee);
    if (!(callee instanceof NativeFunction)) {
      throw new SnippetRuntimeError(`'${describeValue(callee)}' object is not callable`, expr.line);
    }
    const positional = expr.args.map((arg) => this.evaluate(arg));
    const keyword = new Map<string, SnippetValue>();
    for (const kwarg of expr.kwargs) {
      keyword.set(kwarg.name, this.evaluate(kwarg.value));
    }
    return callee.invoke({ callee: callee.name, positional, keyword, line: expr.line });
  }

  private unary(op: "-" | "+" | "~" | "not", operand: SnippetValue, line: number): SnippetValue {
    if (op === "not") {
      return !truthy(operand, line);
    }

    const apply = (value: CellValue): CellValue => {
      if (value === null) {
        return null;
      }
      if (op === "~") {
        if (typeof value !== "boolean") {
          throw new CellTypeError("operator ~ needs boolean values");
        }
        return !value;
      }
      const number = numericOperand(value, op);
      return op === "-" ? -number : number;
    };

    if (operand instanceof Series) {
      return operand.map(apply);
    }
    return apply(scalarOf(operand, line));
  }
}
