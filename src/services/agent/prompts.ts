import type { ChatCompletionMessage } from "../llm/ai-gateway.client";
import type { TableDescription } from "../data/snapshot.store";
import type { ToolSpec } from "../tools/tool.registry";
import type { Plan } from "../../types/plan";

export const GREETING =
  "Hi 👋 I'm your AI Senior Data Analyst (planning mode). What analysis do you have in mind?";

export const PLANNER_ROLE = [
  "You are a concise Senior Data Analyst working in planning mode.",
  "You never execute tools yourself. You propose the minimal plan and wait for approval.",
  "Call make_plan exactly once. Each step names one execution tool and its args.",
  "Prefer the shortest path: usually load_snapshot, then nl_to_code when the user asks for a filter, ranking or aggregation.",
  "Do not invent tools, columns or plotting steps.",
  "Keep `why` to one sentence (at most 120 characters) and list at most 3 short assumptions.",
].join("\n");

export const PLAN_SUMMARIZER_ROLE = [
  "You explain a proposed analysis plan to a business user.",
  "Write 2-4 short sentences: what will be loaded, what will be computed, and what the user should check before approving.",
  "Do not output JSON or code. Refer to tools by their exact names.",
].join("\n");

export const TOOL_KNOWLEDGE_ROLE = [
  "You answer questions about what the available data tools can do.",
  "Use only the tool descriptions provided. If something is not covered, say so plainly.",
  "Be brief: at most 6 sentences, no code.",
].join("\n");

export const ROUTER_ROLE = [
  "You route a user message for a data-analysis assistant.",
  "Reply with ONLY a JSON object with exactly two keys: {\"mode\": \"tool_qa\" | \"plan\", \"why\": \"...\"}.",
  "Use \"tool_qa\" when the user asks what the tools or data can do.",
  "Use \"plan\" when the user wants an analysis performed.",
  "`why` is one sentence of at most 120 characters.",
].join("\n");

const DTYPE_MAP: Record<string, string> = {
  int8: "int",
  int4: "int",
  int2: "int",
  integer: "int",
  int: "int",
  float8: "float",
  float4: "float",
  double: "float",
  numeric: "float",
  text: "string",
  varchar: "string",
  char: "string",
  bpchar: "string",
  uuid: "string",
  date: "date",
  timestamp: "datetime",
  timestamptz: "datetime",
  bool: "bool",
  boolean: "bool",
};

export function normalizeDtype(dataType: string): string {
  return DTYPE_MAP[dataType.trim().toLowerCase()] ?? dataType;
}

export function stripCodeFences(raw: string): string {
  let text = raw.trim();
  if (text.startsWith("```")) {
    const newline = text.indexOf("\n");
    text = newline === -1 ? "" : text.slice(newline + 1);
    const trimmed = text.trimEnd();
    if (trimmed.endsWith("```")) {
      text = trimmed.slice(0, -3);
    }
  }
  return text.trim();
}

function describeSpecs(specs: ToolSpec[]): string {
  return specs
    .map((spec) => `- ${spec.name}: ${spec.description}\n  parameters: ${JSON.stringify(spec.parameterSchema)}`)
    .join("\n");
}

export function buildRouterMessages(userText: string, specs: ToolSpec[]): ChatCompletionMessage[] {
  return [
    { role: "system", content: ROUTER_ROLE },
    { role: "user", content: `TOOLS:\n${describeSpecs(specs)}\n\nUSER MESSAGE:\n${userText}` },
  ];
}

export function buildToolQaMessages(userText: string, specs: ToolSpec[]): ChatCompletionMessage[] {
  return [
    { role: "system", content: TOOL_KNOWLEDGE_ROLE },
    { role: "user", content: `TOOLS:\n${describeSpecs(specs)}\n\nQUESTION:\n${userText}` },
  ];
}

export function buildPlannerMessages(options: {
  history: ChatCompletionMessage[];
  userText: string;
  executionSpecs: ToolSpec[];
  maxSteps: number;
}): ChatCompletionMessage[] {
  const system = [
    PLANNER_ROLE,
    `Plans must have at most ${options.maxSteps} steps.`,
    "Execution tools:",
    describeSpecs(options.executionSpecs),
  ].join("\n");

  return [
    { role: "system", content: system },
    ...options.history,
    { role: "user", content: options.userText },
  ];
}

export function buildPlanSummaryMessages(plan: Plan): ChatCompletionMessage[] {
  return [
    { role: "system", content: PLAN_SUMMARIZER_ROLE },
    { role: "user", content: `PLAN:\n${JSON.stringify(plan, null, 2)}` },
  ];
}

export function buildCodeMessages(options: {
  userQuery: string;
  description: TableDescription;
  aliasHints: Record<string, string>;
}): ChatCompletionMessage[] {
  const { description } = options;
  const columns = description.columns
    .map((column) => `- ${column.name}: ${normalizeDtype(column.dataType)}`)
    .join("\n") || "None";

  const canonical = Object.entries(description.valueHints)
    .map(([column, values]) => `- ${column}: ${JSON.stringify(values)}`)
    .join("\n") || "None";

  const aliases = Object.entries(options.aliasHints)
    .map(([alias, value]) => `${alias} -> ${value}`)
    .join(", ") || "None";

  const dateColumn = description.dateColumn;
  const datePolicy = dateColumn
    ? [
      "- Date policy:",
      "  * If filtering by a month or range, first coerce the date column once:",
      `      df['${dateColumn}'] = pd.to_datetime(df['${dateColumn}'], errors='coerce')`,
      "    Then filter with inclusive ISO bounds:",
      `      (df['${dateColumn}'] >= 'YYYY-MM-DD') & (df['${dateColumn}'] <= 'YYYY-MM-DD')`,
      "    Do NOT use .dt.year/.dt.month when a concrete month range is implied.",
    ].join("\n")
    : "- Date policy: there is no date column.";

  const user = [
    "You write ONE pandas snippet that transforms an existing DataFrame named df_in into df_out.",
    "",
    "RULES (strict):",
    "- Use ONLY these columns and dtypes:",
    columns,
    `- Date columns: ${dateColumn ? `['${dateColumn}']` : "[]"}`,
    "- Canonical values:",
    canonical,
    `- Alias hints: ${aliases}`,
    "- Categorical policy:",
    "  * NEVER modify categorical columns (no .replace on them).",
    "  * Filter using EXACT equality (==) against canonical values only.",
    "  * If the user mentions a non-canonical alias, use the alias hints if present;",
    "    otherwise choose the canonical value the alias clearly refers to.",
    datePolicy,
    "- Use one statement per line. No loops, functions, lambdas, slices or apply().",
    "- Imports: ONLY \"import pandas as pd\".",
    "- Start with: df = df_in.copy()",
    "- End with: df_out = df",
    "- No file/network I/O. No other libraries. Return CODE ONLY.",
    "",
    "CONTEXT:",
    `Table: ${description.table}`,
    "",
    "USER REQUEST:",
    options.userQuery,
  ].join("\n");

  return [
    { role: "system", content: "You output ONLY valid Python pandas code, with no prose and no comments." },
    { role: "user", content: user },
  ];
}
