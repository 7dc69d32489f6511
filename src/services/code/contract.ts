export const CANONICAL_IMPORT = "import pandas as pd";
export const INPUT_BINDING = "df_in";
export const OUTPUT_BINDING = "df_out";

export type ContractRule =
  | "import_missing"
  | "import_duplicate"
  | "import_disallowed"
  | "copy_missing"
  | "output_missing"
  | "io_forbidden";

export interface ContractIssue {
  rule: ContractRule;
  message: string;
}

export class ContractViolation extends Error {
  public readonly code = "CONTRACT_VIOLATION";

  constructor(public readonly violations: ContractIssue[]) {
    super(violations.map((violation) => violation.message).join("; "));
    this.name = "ContractViolation";
  }
}

const IO_PRIMITIVES = [
  "read_csv",
  "to_csv",
  "read_parquet",
  "to_parquet",
  "read_excel",
  "to_excel",
  "read_json",
  "to_json",
  "read_sql",
  "to_sql",
  "read_html",
  "read_pickle",
  "to_pickle",
  "urlopen",
];

const CANONICAL_IMPORT_LINE = /^\s*import\s+pandas\s+as\s+pd\s*$/;
const IMPORT_LINE = /^\s*import\s+([\w.]+)/;
const FROM_IMPORT_LINE = /^\s*from\s+([\w.]+)\s+import\b/;
const COPY_ASSIGNMENT = /(^|[^\w.])df\s*=\s*df_in\.copy\(\s*\)/m;
const OUTPUT_ASSIGNMENT = /(^|[^\w.])df_out\s*=(?!=)/m;
const OPEN_CALL = /(^|[^\w.])open\s*\(/;

/** Statement-ish fragments: physical lines, further split on `;`. */
export function codeFragments(code: string): string[] {
  return code.split(/\r?\n/).flatMap((line) => line.split(";"));
}

export function checkCodeContract(code: string): ContractIssue[] {
  const issues: ContractIssue[] = [];
  let canonical = 0;

  for (const fragment of codeFragments(code)) {
    if (CANONICAL_IMPORT_LINE.test(fragment)) {
      canonical += 1;
      continue;
    }

    const fromImport = FROM_IMPORT_LINE.exec(fragment);
    const plainImport = IMPORT_LINE.exec(fragment);
    const module = fromImport?.[1] ?? plainImport?.[1];
    if (module) {
      issues.push({
        rule: "import_disallowed",
        message: `Disallowed import '${module}': only \`${CANONICAL_IMPORT}\` is allowed`,
      });
    }
  }

  if (canonical === 0) {
    issues.push({ rule: "import_missing", message: `Missing \`${CANONICAL_IMPORT}\`` });
  } else if (canonical > 1) {
    issues.push({ rule: "import_duplicate", message: `\`${CANONICAL_IMPORT}\` must appear exactly once` });
  }

  if (!COPY_ASSIGNMENT.test(code)) {
    issues.push({ rule: "copy_missing", message: `Snippet must start with \`df = ${INPUT_BINDING}.copy()\`` });
  }

  if (!OUTPUT_ASSIGNMENT.test(code)) {
    issues.push({ rule: "output_missing", message: `Snippet must assign \`${OUTPUT_BINDING} = ...\`` });
  }

  const io = IO_PRIMITIVES.filter((primitive) => code.includes(primitive));
  if (OPEN_CALL.test(code)) {
    io.push("open(");
  }
  if (io.length > 0) {
    issues.push({ rule: "io_forbidden", message: `File or network I/O is not allowed: ${io.join(", ")}` });
  }

  return issues;
}

export function validateCodeContract(code: string): void {
  const issues = checkCodeContract(code);
  if (issues.length > 0) {
    throw new ContractViolation(issues);
  }
}
