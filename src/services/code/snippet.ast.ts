export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "**"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&"
  | "|"
  | "^";

export type UnaryOperator = "-" | "+" | "~" | "not";

const BINARY_OPERATORS: ReadonlySet<string> = new Set([
  "+", "-", "*", "/", "//", "%", "**", "==", "!=", "<", "<=", ">", ">=", "&", "|", "^",
]);

export function isBinaryOperator(value: string): value is BinaryOperator {
  return BINARY_OPERATORS.has(value);
}

export function isSignOperator(value: string): value is "-" | "+" | "~" {
  return value === "-" || value === "+" || value === "~";
}

export interface KeywordArgument {
  name: string;
  value: Expr;
}

export type Expr =
  | { kind: "literal"; value: string | number | boolean | null; line: number }
  | { kind: "name"; id: string; line: number }
  | { kind: "list"; items: Expr[]; line: number }
  | { kind: "tuple"; items: Expr[]; line: number }
  | { kind: "dict"; entries: Array<{ key: Expr; value: Expr }>; line: number }
  | { kind: "attribute"; target: Expr; name: string; line: number }
  | { kind: "subscript"; target: Expr; index: Expr; line: number }
  | { kind: "call"; callee: Expr; args: Expr[]; kwargs: KeywordArgument[]; line: number }
  | { kind: "unary"; op: UnaryOperator; operand: Expr; line: number }
  | { kind: "binary"; op: BinaryOperator; left: Expr; right: Expr; line: number }
  | { kind: "logical"; op: "and" | "or"; left: Expr; right: Expr; line: number };

export type Statement =
  | { kind: "assign"; target: string; value: Expr; line: number }
  | { kind: "assignColumn"; target: string; key: Expr; value: Expr; line: number }
  | { kind: "expression"; value: Expr; line: number };

export interface SnippetProgram {
  statements: Statement[];
}
