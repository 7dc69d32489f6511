import assert from "node:assert/strict";
import test from "node:test";
import { SnippetSyntaxError, tokenizeSnippet } from "../../src/services/code/snippet.lexer";
import { parseSnippet } from "../../src/services/code/snippet.parser";
import { SnippetLimitError } from "../../src/services/code/snippet.values";

test("tokenizeSnippet joins bracketed lines and drops comments", () => {
  const tokens = tokenizeSnippet("x = f(1,\n  2)  # trailing\ny = 'a'");

  assert.deepEqual(
    tokens.map((token) => token.value),
    ["x", "=", "f", "(", "1", ",", "2", ")", "\n", "y", "=", "a", "\n", ""],
  );
  assert.equal(tokens.find((token) => token.value === "y")?.line, 3);
});

test("tokenizeSnippet splits statements on semicolons", () => {
  const program = parseSnippet("a = 1; b = 2");

  assert.deepEqual(
    program.statements.map((statement) => statement.kind === "assign" ? statement.target : statement.kind),
    ["a", "b"],
  );
});

test("parseSnippet builds column assignments and keyword calls", () => {
  const program = parseSnippet("df['total'] = df['a'] * 2\ndf = df.sort_values(by='total', ascending=False)");
  const [first, second] = program.statements;

  assert.equal(first?.kind, "assignColumn");
  assert.equal(second?.kind, "assign");
  if (second?.kind === "assign" && second.value.kind === "call") {
    assert.deepEqual(second.value.kwargs.map((kwarg) => kwarg.name), ["by", "ascending"]);
  } else {
    assert.fail("expected a call assignment");
  }
});

test("comparisons bind looser than &", () => {
  const program = parseSnippet("m = (df['a'] > 1) & (df['b'] == 'x')");
  const [statement] = program.statements;

  assert.equal(statement?.kind, "assign");
  if (statement?.kind === "assign") {
    assert.equal(statement.value.kind, "binary");
    assert.equal(statement.value.kind === "binary" ? statement.value.op : null, "&");
  }
});

test("parseSnippet rejects constructs outside the dialect", () => {
  const cases: Array<[string, RegExp]> = [
    ["f = lambda x: x", /Unsupported keyword 'lambda'/],
    ["for x in y: pass", /Unsupported keyword 'for'/],
    ["x = df[1:3]", /Slices are not supported/],
    ["x += 1", /Augmented assignment '\+=' is not supported/],
    ["x = 1 < 2 < 3", /Chained comparisons are not supported/],
    ["x = f'{y}'", /String prefix 'f' is not supported/],
    ["x = \"\"\"doc\"\"\"", /Triple-quoted strings are not supported/],
    ["x = (1", /Unclosed bracket/],
    ["df.a.b = 1", /Only `name = \.\.\.` and `name\[key\] = \.\.\.` assignments are supported/],
    ["x = f(*args)", /Argument unpacking is not supported/],
  ];

  for (const [source, message] of cases) {
    assert.throws(() => parseSnippet(source), (error: unknown) => {
      assert.ok(error instanceof SnippetSyntaxError, source);
      assert.match(error.message, message);
      return true;
    });
  }
});

test("parseSnippet reports the failing line", () => {
  assert.throws(() => parseSnippet("a = 1\nb = 'open"), /Line 2: Unterminated string literal/);
});

test("parseSnippet enforces statement and depth limits", () => {
  assert.throws(
    () => parseSnippet("a = 1\nb = 2\nc = 3", { maxStatements: 2 }),
    (error: unknown) => error instanceof SnippetLimitError && /exceeds 2 statements/.test(error.message),
  );
  assert.throws(
    () => parseSnippet(`x = ${"(".repeat(20)}1${")".repeat(20)}`, { maxDepth: 10 }),
    (error: unknown) => error instanceof SnippetLimitError && /nesting is too deep/.test(error.message),
  );
});
