import { buildCodeMessages, stripCodeFences } from "../agent/prompts";
import { validateCodeContract } from "../code/contract";
import type { ToolArgs, ToolContext, ToolSpec } from "./tool.registry";

export const NL_TO_CODE_SPEC: ToolSpec = {
  name: "nl_to_code",
  description:
    "Translate a natural-language request into one pandas snippet that transforms the loaded table "
    + "(df_in) into a result table (df_out). The snippet is shown to the user and only runs on request.",
  parameterSchema: {
    type: "object",
    properties: {
      user_query: { type: "string", description: "The transformation the user asked for, in plain words." },
      table: { type: "string", description: "Table the snippet will run against.", pattern: "^[a-z_][a-z0-9_]*$" },
      alias_hints: {
        type: "object",
        description: "Map of user wording to canonical values, e.g. {\"Madrid\": \"Real Madrid\"}.",
        additionalProperties: { type: "string" },
      },
    },
    required: ["user_query"],
    additionalProperties: false,
  },
};

function asAliasHints(value: unknown): Record<string, string> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return {};
  }

  const hints: Record<string, string> = {};
  for (const [alias, canonical] of Object.entries(value)) {
    if (typeof canonical === "string" && canonical.trim()) {
      hints[alias] = canonical.trim();
    }
  }
  return hints;
}

export async function nlToCodeTool(args: ToolArgs, context?: ToolContext): Promise<{ code: string }> {
  if (!context) {
    throw new Error("nl_to_code requires the orchestration context");
  }

  const userQuery = String(args.user_query ?? "").trim();
  if (!userQuery) {
    throw new Error("nl_to_code requires a non-empty user_query");
  }

  const table = typeof args.table === "string" && args.table.trim() ? args.table.trim() : context.defaultTable;
  const description = await context.snapshots.describeTable(table);

  const completion = await context.llm.completeChat({
    model: context.codeModel,
    maxTokens: context.maxTokens,
    messages: buildCodeMessages({
      userQuery,
      description,
      aliasHints: asAliasHints(args.alias_hints),
    }),
  });

  const code = stripCodeFences(completion.content);
  validateCodeContract(code);

  context.logger.info(
    { tool: "nl_to_code", table, model: completion.model, codeLength: code.length },
    "pandas snippet generated",
  );

  return { code };
}
