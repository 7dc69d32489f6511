import { DataTable } from "../data/table";
import { checkCodeContract, INPUT_BINDING, OUTPUT_BINDING } from "./contract";
import { SnippetInterpreter } from "./snippet.interpreter";
import { createBuiltins, createPandasHandle } from "./snippet.methods";
import { parseSnippet } from "./snippet.parser";
import { describeValue, SnippetLimitError, type SnippetValue } from "./snippet.values";

export interface SandboxIssue {
  rule: string;
  message: string;
}

export class SandboxViolation extends Error {
  public readonly code = "SANDBOX_VIOLATION";

  constructor(public readonly violations: SandboxIssue[]) {
    super(violations.map((violation) => violation.message).join("; "));
    this.name = "SandboxViolation";
  }
}

export class SandboxError extends Error {
  constructor(
    public readonly code: "SANDBOX_OUTPUT_NOT_TABLE" | "SANDBOX_LIMIT_EXCEEDED",
    message: string,
  ) {
    super(message);
    this.name = "SandboxError";
  }
}

export interface SandboxLimits {
  maxStatements: number;
  maxDepth: number;
  maxOperations: number;
}

const DEFAULT_LIMITS: SandboxLimits = {
  maxStatements: 200,
  maxDepth: 48,
  maxOperations: 5_000,
};

const DENYLIST: Array<{ pattern: RegExp; label: string }> = [
  { pattern: /\bos\./, label: "os." },
  { pattern: /\bsys\./, label: "sys." },
  { pattern: /\bsubprocess\b/, label: "subprocess" },
  { pattern: /\beval\s*\(/, label: "eval(" },
  { pattern: /\bexec\s*\(/, label: "exec(" },
  { pattern: /\bcompile\s*\(/, label: "compile(" },
  { pattern: /__/, label: "__" },
  { pattern: /\bimportlib\b/, label: "importlib" },
  { pattern: /\brequests\b/, label: "requests" },
  { pattern: /\bglobals\s*\(/, label: "globals(" },
  { pattern: /\blocals\s*\(/, label: "locals(" },
  { pattern: /\bgetattr\s*\(/, label: "getattr(" },
  { pattern: /\bsetattr\s*\(/, label: "setattr(" },
  { pattern: /(^|[^\w.])open\s*\(/, label: "open(" },
];

const SANCTIONED_IMPORT = /^\s*import\s+pandas\s+as\s+pd\s*$/;

export function checkSandboxPolicy(code: string): SandboxIssue[] {
  const issues: SandboxIssue[] = [...checkCodeContract(code)];
  for (const entry of DENYLIST) {
    if (entry.pattern.test(code)) {
      issues.push({ rule: "denylist", message: `Forbidden construct: ${entry.label}` });
    }
  }
  return issues;
}

/** Blanks the import fragment, keeping line numbers and `;` separators intact. */
function stripSanctionedImport(code: string): string {
  return code
    .split(/\r?\n/)
    .map((line) =>
      line
        .split(";")
        .map((fragment) => (SANCTIONED_IMPORT.test(fragment) ? "" : fragment))
        .join(";"))
    .join("\n");
}

/**
 * Runs a pandas-style snippet against a copy of `input` and returns the table
 * bound to `df_out`. The snippet is parsed and interpreted; it never runs as
 * host code.
 */
export function runSandboxed(code: string, input: DataTable, limits: Partial<SandboxLimits> = {}): DataTable {
  const issues = checkSandboxPolicy(code);
  if (issues.length > 0) {
    throw new SandboxViolation(issues);
  }

  const settings = { ...DEFAULT_LIMITS, ...limits };
  let scope: Map<string, SnippetValue>;
  try {
    const program = parseSnippet(stripSanctionedImport(code), {
      maxStatements: settings.maxStatements,
      maxDepth: settings.maxDepth,
    });
    const namespace = new Map<string, SnippetValue>([
      ["pd", createPandasHandle()],
      [INPUT_BINDING, input.clone()],
    ]);
    scope = new SnippetInterpreter(namespace, createBuiltins(), {
      maxOperations: settings.maxOperations,
    }).run(program);
  } catch (error) {
    if (error instanceof SnippetLimitError) {
      throw new SandboxError("SANDBOX_LIMIT_EXCEEDED", error.message);
    }
    throw error;
  }

  const output = scope.get(OUTPUT_BINDING);
  if (!(output instanceof DataTable)) {
    throw new SandboxError(
      "SANDBOX_OUTPUT_NOT_TABLE",
      `Code did not produce ${OUTPUT_BINDING} as a DataFrame (got ${output === undefined ? "nothing" : describeValue(output)})`,
    );
  }

  return output;
}
