import {
  isBinaryOperator,
  isSignOperator,
  type Expr,
  type KeywordArgument,
  type SnippetProgram,
  type Statement,
} from "./snippet.ast";
import { SnippetSyntaxError, tokenizeSnippet, type Token } from "./snippet.lexer";
import { SnippetLimitError } from "./snippet.values";

const UNSUPPORTED_KEYWORDS = new Set([
  "lambda", "def", "class", "import", "from", "for", "while", "if", "else", "elif",
  "with", "return", "yield", "global", "nonlocal", "del", "try", "except", "finally",
  "raise", "assert", "async", "await", "pass", "break", "continue", "is", "in", "print",
  "and", "or", "not",
]);

const COMPARISON_OPS = new Set(["==", "!=", "<", "<=", ">", ">="]);

export interface ParseOptions {
  maxStatements: number;
  maxDepth: number;
}

const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  maxStatements: 200,
  maxDepth: 48,
};

class Parser {
  private position = 0;

  private depth = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly options: ParseOptions,
  ) {}

  parseProgram(): SnippetProgram {
    const statements: Statement[] = [];

    while (this.peek().type !== "eof") {
      if (this.peek().type === "newline") {
        this.advance();
        continue;
      }

      statements.push(this.parseStatement());
      if (statements.length > this.options.maxStatements) {
        throw new SnippetLimitError(
          `Snippet exceeds ${this.options.maxStatements} statements`,
          this.peek().line,
        );
      }
    }

    return { statements };
  }

  private parseStatement(): Statement {
    const line = this.peek().line;
    const expr = this.parseExpression();
    const next = this.peek();

    if (next.type === "op" && /^(\+|-|\*|\/|\/\/|\*\*)=$/.test(next.value)) {
      throw new SnippetSyntaxError(`Augmented assignment '${next.value}' is not supported`, next.line);
    }

    if (next.type === "op" && next.value === "=") {
      this.advance();
      const value = this.parseExpression();
      this.expectEndOfStatement();

      if (expr.kind === "name") {
        return { kind: "assign", target: expr.id, value, line };
      }

      if (expr.kind === "subscript" && expr.target.kind === "name") {
        return { kind: "assignColumn", target: expr.target.id, key: expr.index, value, line };
      }

      throw new SnippetSyntaxError("Only `name = ...` and `name[key] = ...` assignments are supported", line);
    }

    this.expectEndOfStatement();
    return { kind: "expression", value: expr, line };
  }

  private expectEndOfStatement() {
    const token = this.peek();
    if (token.type === "newline") {
      this.advance();
      return;
    }

    if (token.type !== "eof") {
      throw new SnippetSyntaxError(`Unexpected '${token.value}' after statement`, token.line);
    }
  }

  private parseExpression(): Expr {
    this.depth += 1;
    if (this.depth > this.options.maxDepth) {
      throw new SnippetLimitError("Expression nesting is too deep", this.peek().line);
    }

    try {
      return this.parseOr();
    } finally {
      this.depth -= 1;
    }
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.isKeyword("or")) {
      const line = this.advance().line;
      left = { kind: "logical", op: "or", left, right: this.parseAnd(), line };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.isKeyword("and")) {
      const line = this.advance().line;
      left = { kind: "logical", op: "and", left, right: this.parseNot(), line };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.isKeyword("not")) {
      const line = this.advance().line;
      return { kind: "unary", op: "not", operand: this.parseNot(), line };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parseBinary(0);
    const token = this.peek();
    if (token.type === "op" && COMPARISON_OPS.has(token.value) && isBinaryOperator(token.value)) {
      const op = token.value;
      this.advance();
      const right = this.parseBinary(0);
      const after = this.peek();
      if (after.type === "op" && COMPARISON_OPS.has(after.value)) {
        throw new SnippetSyntaxError("Chained comparisons are not supported", after.line);
      }
      return { kind: "binary", op, left, right, line: token.line };
    }

    if (this.isKeyword("in") || this.isKeyword("is")) {
      throw new SnippetSyntaxError(`Operator '${token.value}' is not supported`, token.line);
    }

    return left;
  }

  // Precedence levels from loosest to tightest: | ^ & then + - then * / // %.
  private static readonly LEVELS: string[][] = [["|"], ["^"], ["&"], ["+", "-"], ["*", "/", "//", "%"]];

  private parseBinary(level: number): Expr {
    const operators = Parser.LEVELS[level];
    if (!operators) {
      return this.parseUnary();
    }

    let left = this.parseBinary(level + 1);
    for (;;) {
      const token = this.peek();
      const op = token.value;
      if (token.type !== "op" || !operators.includes(op) || !isBinaryOperator(op)) {
        return left;
      }
      this.advance();
      const right = this.parseBinary(level + 1);
      left = { kind: "binary", op, left, right, line: token.line };
    }
  }

  private parseUnary(): Expr {
    const token = this.peek();
    const op = token.value;
    if (token.type === "op" && isSignOperator(op)) {
      this.advance();
      this.depth += 1;
      if (this.depth > this.options.maxDepth) {
        throw new SnippetLimitError("Expression nesting is too deep", token.line);
      }
      try {
        return { kind: "unary", op, operand: this.parseUnary(), line: token.line };
      } finally {
        this.depth -= 1;
      }
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const base = this.parsePostfix();
    const token = this.peek();
    if (token.type === "op" && token.value === "**") {
      this.advance();
      return { kind: "binary", op: "**", left: base, right: this.parseUnary(), line: token.line };
    }
    return base;
  }

  private parsePostfix(): Expr {
    let expr = this.parseAtom();

    for (;;) {
      const token = this.peek();
      if (token.type !== "op") {
        return expr;
      }

      if (token.value === ".") {
        this.advance();
        const name = this.advance();
        if (name.type !== "name") {
          throw new SnippetSyntaxError("Expected attribute name after '.'", name.line);
        }
        expr = { kind: "attribute", target: expr, name: name.value, line: name.line };
        continue;
      }

      if (token.value === "(") {
        this.advance();
        expr = this.parseCallArguments(expr, token.line);
        continue;
      }

      if (token.value === "[") {
        this.advance();
        if (this.peekOp(":")) {
          throw new SnippetSyntaxError("Slices are not supported; use head() or tail()", token.line);
        }
        const index = this.parseExpression();
        if (this.peekOp(":")) {
          throw new SnippetSyntaxError("Slices are not supported; use head() or tail()", token.line);
        }
        this.expectOp("]");
        expr = { kind: "subscript", target: expr, index, line: token.line };
        continue;
      }

      return expr;
    }
  }

  private parseCallArguments(callee: Expr, line: number): Expr {
    const args: Expr[] = [];
    const kwargs: KeywordArgument[] = [];

    while (!this.peekOp(")")) {
      const token = this.peek();
      const following = this.tokens[this.position + 1];
      if (token.type === "op" && (token.value === "*" || token.value === "**")) {
        throw new SnippetSyntaxError("Argument unpacking is not supported", token.line);
      }

      if (token.type === "name" && following?.type === "op" && following.value === "=") {
        this.advance();
        this.advance();
        if (kwargs.some((kwarg) => kwarg.name === token.value)) {
          throw new SnippetSyntaxError(`Keyword argument repeated: ${token.value}`, token.line);
        }
        kwargs.push({ name: token.value, value: this.parseExpression() });
      } else {
        if (kwargs.length > 0) {
          throw new SnippetSyntaxError("Positional argument follows keyword argument", token.line);
        }
        args.push(this.parseExpression());
      }

      if (!this.peekOp(",")) {
        break;
      }
      this.advance();
    }

    this.expectOp(")");
    return { kind: "call", callee, args, kwargs, line };
  }

  private parseAtom(): Expr {
    const token = this.advance();

    if (token.type === "number") {
      return { kind: "literal", value: Number(token.value), line: token.line };
    }

    if (token.type === "string") {
      let value = token.value;
      while (this.peek().type === "string") {
        value += this.advance().value;
      }
      return { kind: "literal", value, line: token.line };
    }

    if (token.type === "name") {
      if (token.value === "True" || token.value === "False") {
        return { kind: "literal", value: token.value === "True", line: token.line };
      }
      if (token.value === "None") {
        return { kind: "literal", value: null, line: token.line };
      }
      if (UNSUPPORTED_KEYWORDS.has(token.value)) {
        throw new SnippetSyntaxError(`Unsupported keyword '${token.value}'`, token.line);
      }
      return { kind: "name", id: token.value, line: token.line };
    }

    if (token.type === "op" && token.value === "(") {
      if (this.peekOp(")")) {
        this.advance();
        return { kind: "tuple", items: [], line: token.line };
      }
      const first = this.parseExpression();
      if (!this.peekOp(",")) {
        this.expectOp(")");
        return first;
      }
      const items = [first];
      while (this.peekOp(",")) {
        this.advance();
        if (this.peekOp(")")) {
          break;
        }
        items.push(this.parseExpression());
      }
      this.expectOp(")");
      return { kind: "tuple", items, line: token.line };
    }

    if (token.type === "op" && token.value === "[") {
      const items: Expr[] = [];
      while (!this.peekOp("]")) {
        items.push(this.parseExpression());
        if (!this.peekOp(",")) {
          break;
        }
        this.advance();
      }
      this.expectOp("]");
      return { kind: "list", items, line: token.line };
    }

    if (token.type === "op" && token.value === "{") {
      const entries: Array<{ key: Expr; value: Expr }> = [];
      while (!this.peekOp("}")) {
        const key = this.parseExpression();
        this.expectOp(":");
        entries.push({ key, value: this.parseExpression() });
        if (!this.peekOp(",")) {
          break;
        }
        this.advance();
      }
      this.expectOp("}");
      return { kind: "dict", entries, line: token.line };
    }

    if (token.type === "newline" || token.type === "eof") {
      throw new SnippetSyntaxError("Unexpected end of statement", token.line);
    }

    throw new SnippetSyntaxError(`Unexpected '${token.value}'`, token.line);
  }

  private peek(): Token {
    return this.tokens[this.position] ?? { type: "eof", value: "", line: 0 };
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "eof") {
      this.position += 1;
    }
    return token;
  }

  private peekOp(value: string): boolean {
    const token = this.peek();
    return token.type === "op" && token.value === value;
  }

  private expectOp(value: string) {
    const token = this.advance();
    if (token.type !== "op" || token.value !== value) {
      throw new SnippetSyntaxError(`Expected '${value}' but found '${token.value || "end of input"}'`, token.line);
    }
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.type === "name" && token.value === value;
  }
}

export function parseSnippet(source: string, options: Partial<ParseOptions> = {}): SnippetProgram {
  const tokens = tokenizeSnippet(source);
  return new Parser(tokens, { ...DEFAULT_PARSE_OPTIONS, ...options }).parseProgram();
}
