export type TokenType = "name" | "number" | "string" | "op" | "newline" | "eof";

export interface Token {
  type: TokenType;
  value: string;
  line: number;
}

export class SnippetSyntaxError extends Error {
  public readonly code = "SNIPPET_SYNTAX_ERROR";

  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`Line ${line}: ${message}`);
    this.name = "SnippetSyntaxError";
  }
}

const THREE_CHAR_OPS = new Set(["**=", "//="]);
const TWO_CHAR_OPS = new Set(["==", "!=", "<=", ">=", "**", "//", "+=", "-=", "*=", "/="]);
const ONE_CHAR_OPS = new Set([
  "(", ")", "[", "]", "{", "}", ",", ":", ".", "=",
  "<", ">", "+", "-", "*", "/", "%", "&", "|", "~", "^",
]);

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS = new Set([")", "]", "}"]);

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

function isNameStart(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isNamePart(char: string): boolean {
  return /[A-Za-z0-9_]/.test(char);
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

/**
 * Splits snippet text into tokens. Newlines inside brackets are dropped so
 * multi-line calls read as a single statement; `#` comments run to end of line.
 */
export function tokenizeSnippet(source: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let depth = 0;
  let index = 0;

  const pushNewline = () => {
    const last = tokens[tokens.length - 1];
    if (last && last.type !== "newline") {
      tokens.push({ type: "newline", value: "\n", line });
    }
  };

  while (index < source.length) {
    const char = source[index] ?? "";

    if (char === "\n") {
      if (depth === 0) {
        pushNewline();
      }
      line += 1;
      index += 1;
      continue;
    }

    if (char === " " || char === "\t" || char === "\r") {
      index += 1;
      continue;
    }

    if (char === "\\" && source[index + 1] === "\n") {
      index += 2;
      line += 1;
      continue;
    }

    if (char === "#") {
      while (index < source.length && source[index] !== "\n") {
        index += 1;
      }
      continue;
    }

    if (char === ";") {
      if (depth === 0) {
        pushNewline();
      }
      index += 1;
      continue;
    }

    if (isNameStart(char)) {
      let end = index + 1;
      while (end < source.length && isNamePart(source[end] ?? "")) {
        end += 1;
      }
      tokens.push({ type: "name", value: source.slice(index, end), line });
      index = end;
      continue;
    }

    if (isDigit(char) || (char === "." && isDigit(source[index + 1] ?? ""))) {
      let end = index;
      while (end < source.length && /[0-9_.]/.test(source[end] ?? "")) {
        end += 1;
      }
      if (/[eE]/.test(source[end] ?? "")) {
        end += 1;
        if (/[+-]/.test(source[end] ?? "")) {
          end += 1;
        }
        while (end < source.length && isDigit(source[end] ?? "")) {
          end += 1;
        }
      }
      const text = source.slice(index, end).replace(/_/g, "");
      if (!Number.isFinite(Number(text))) {
        throw new SnippetSyntaxError(`Invalid number literal: ${text}`, line);
      }
      tokens.push({ type: "number", value: text, line });
      index = end;
      continue;
    }

    if (char === "'" || char === '"') {
      if (source.startsWith(char.repeat(3), index)) {
        throw new SnippetSyntaxError("Triple-quoted strings are not supported", line);
      }

      let value = "";
      let end = index + 1;
      let closed = false;
      while (end < source.length) {
        const current = source[end] ?? "";
        if (current === "\n") {
          break;
        }
        if (current === "\\") {
          const next = source[end + 1] ?? "";
          value += ESCAPES[next] ?? `\\${next}`;
          end += 2;
          continue;
        }
        if (current === char) {
          closed = true;
          end += 1;
          break;
        }
        value += current;
        end += 1;
      }

      if (!closed) {
        throw new SnippetSyntaxError("Unterminated string literal", line);
      }

      const previous = tokens[tokens.length - 1];
      if (previous?.type === "name" && /^[rRbBfFuU]{1,2}$/.test(previous.value) && previous.line === line) {
        throw new SnippetSyntaxError(`String prefix '${previous.value}' is not supported`, line);
      }

      tokens.push({ type: "string", value, line });
      index = end;
      continue;
    }

    const three = source.slice(index, index + 3);
    const two = source.slice(index, index + 2);
    const op = THREE_CHAR_OPS.has(three)
      ? three
      : TWO_CHAR_OPS.has(two)
        ? two
        : ONE_CHAR_OPS.has(char)
          ? char
          : null;

    if (!op) {
      throw new SnippetSyntaxError(`Unexpected character '${char}'`, line);
    }

    if (OPENERS.has(op)) {
      depth += 1;
    } else if (CLOSERS.has(op)) {
      depth -= 1;
      if (depth < 0) {
        throw new SnippetSyntaxError(`Unbalanced '${op}'`, line);
      }
    }

    tokens.push({ type: "op", value: op, line });
    index += op.length;
  }

  if (depth !== 0) {
    throw new SnippetSyntaxError("Unclosed bracket at end of snippet", line);
  }

  pushNewline();
  tokens.push({ type: "eof", value: "", line });
  return tokens;
}
