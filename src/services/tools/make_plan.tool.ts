import type { ToolSpec } from "./tool.registry";

export const PLAN_WHY_MAX_LENGTH = 120;
export const PLAN_MAX_ASSUMPTIONS = 3;

/** Planning-phase tool: the model fills its arguments, nothing runs it. */
export function makePlanSpec(executionSpecs: ToolSpec[]): ToolSpec {
  const executionTools = executionSpecs.map((spec) => spec.name);
  return {
    name: "make_plan",
    description: [
      "Plan the MINIMAL sequence of steps to satisfy the user's request using the execution tools.",
      `Allowed tools: ${executionTools.join(", ")}.`,
      "Prefer the shortest path. Do not invent filters, tools or plotting steps.",
      "Return steps (each with tool and args), a concise why and up to 3 short assumptions.",
    ].join("\n"),
    parameterSchema: {
      type: "object",
      properties: {
        steps: {
          type: "array",
          minItems: 1,
          items: {
            oneOf: executionSpecs.map((spec) => ({
              type: "object",
              properties: {
                tool: { type: "string", const: spec.name },
                args: spec.parameterSchema,
              },
              required: ["tool", "args"],
              additionalProperties: false,
            })),
          },
        },
        why: { type: "string", maxLength: PLAN_WHY_MAX_LENGTH, description: "One-sentence rationale." },
        assumptions: {
          type: "array",
          items: { type: "string", maxLength: PLAN_WHY_MAX_LENGTH },
          maxItems: PLAN_MAX_ASSUMPTIONS,
        },
      },
      required: ["steps", "why", "assumptions"],
      additionalProperties: false,
    },
  };
}
