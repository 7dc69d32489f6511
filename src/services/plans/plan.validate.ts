import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import type { ToolRegistry, ToolSpec } from "../tools/tool.registry";
import { PLAN_MAX_ASSUMPTIONS, PLAN_WHY_MAX_LENGTH } from "../tools/make_plan.tool";
import type { Plan, PlanStep } from "../../types/plan";

export const DEFAULT_PLAN_MAX_STEPS = 8;

export interface PlanValidationIssue {
  code:
    | "PLAN_SCHEMA_INVALID"
    | "PLAN_INVALID_TOOL"
    | "PLAN_WHY_TOO_LONG"
    | "PLAN_TOO_MANY_ASSUMPTIONS"
    | "PLAN_STEP_CAP_EXCEEDED";
  message: string;
  stepIndex?: number;
}

export interface ValidatePlanInput {
  parsed: Record<string, unknown>;
  registry: ToolRegistry;
  maxSteps?: number;
}

export interface ValidatePlanResult {
  plan: Plan | null;
  issues: PlanValidationIssue[];
}

const ajv = new Ajv({ allErrors: true });
const argValidators = new WeakMap<ToolSpec, ValidateFunction>();

function argValidator(spec: ToolSpec): ValidateFunction {
  const cached = argValidators.get(spec);
  if (cached) {
    return cached;
  }
  const validate = ajv.compile({ ...spec.parameterSchema });
  argValidators.set(spec, validate);
  return validate;
}

function describeArgsError(error: ErrorObject): string {
  const where = error.instancePath ? `args${error.instancePath.replace(/\//g, ".")}` : "args";
  const extra = typeof error.params.additionalProperty === "string" ? ` '${error.params.additionalProperty}'` : "";
  return `${where} ${error.message ?? "is invalid"}${extra}`;
}

/** Checks step args against the parameter schema the tool was registered with. */
function checkStepArgs(
  registry: ToolRegistry,
  tool: string,
  args: Record<string, unknown>,
  stepIndex: number,
): PlanValidationIssue[] {
  const entry = registry.resolve(tool);
  if (!entry) {
    return [];
  }

  const validate = argValidator(entry.spec);
  if (validate(args)) {
    return [];
  }

  return (validate.errors ?? []).map((error): PlanValidationIssue => ({
    code: "PLAN_SCHEMA_INVALID",
    message: `Invalid args for ${tool}: ${describeArgsError(error)}`,
    stepIndex,
  }));
}

function asString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }

  return Object.fromEntries(Object.entries(value));
}

function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value
    .map((item) => asString(item))
    .filter((item) => item.length > 0);
}

export function validatePlan(input: ValidatePlanInput): ValidatePlanResult {
  const issues: PlanValidationIssue[] = [];
  const maxSteps = input.maxSteps ?? DEFAULT_PLAN_MAX_STEPS;

  const why = asString(input.parsed.why);
  if (!why) {
    issues.push({ code: "PLAN_SCHEMA_INVALID", message: "why is required" });
  } else if (why.length > PLAN_WHY_MAX_LENGTH) {
    issues.push({
      code: "PLAN_WHY_TOO_LONG",
      message: `why must be at most ${PLAN_WHY_MAX_LENGTH} characters (got ${why.length})`,
    });
  }

  if (input.parsed.assumptions !== undefined && !Array.isArray(input.parsed.assumptions)) {
    issues.push({ code: "PLAN_SCHEMA_INVALID", message: "assumptions must be an array of strings" });
  }
  const assumptions = asStringArray(input.parsed.assumptions);
  if (assumptions.length > PLAN_MAX_ASSUMPTIONS) {
    issues.push({
      code: "PLAN_TOO_MANY_ASSUMPTIONS",
      message: `At most ${PLAN_MAX_ASSUMPTIONS} assumptions are allowed (got ${assumptions.length})`,
    });
  }

  const rawSteps = Array.isArray(input.parsed.steps) ? input.parsed.steps : [];
  if (rawSteps.length === 0) {
    issues.push({ code: "PLAN_SCHEMA_INVALID", message: "steps must be a non-empty array" });
  }

  const steps: PlanStep[] = [];
  for (const [stepIndex, rawStep] of rawSteps.entries()) {
    const step = asObject(rawStep);
    if (!step) {
      issues.push({ code: "PLAN_SCHEMA_INVALID", message: "Each step must be an object", stepIndex });
      continue;
    }

    const tool = asString(step.tool);
    if (!tool) {
      issues.push({ code: "PLAN_SCHEMA_INVALID", message: "Each step must name a tool", stepIndex });
      continue;
    }

    if (!input.registry.has(tool, "execution")) {
      issues.push({ code: "PLAN_INVALID_TOOL", message: `Unknown tool in step: ${tool}`, stepIndex });
    }

    let args: Record<string, unknown> = {};
    if (step.args !== undefined && step.args !== null) {
      const parsedArgs = asObject(step.args);
      if (!parsedArgs) {
        issues.push({ code: "PLAN_SCHEMA_INVALID", message: "Step args must be an object", stepIndex });
        continue;
      }
      args = parsedArgs;
    }

    issues.push(...checkStepArgs(input.registry, tool, args, stepIndex));
    steps.push({ tool, args });
  }

  if (rawSteps.length > maxSteps) {
    issues.push({
      code: "PLAN_STEP_CAP_EXCEEDED",
      message: `Step count ${rawSteps.length} exceeds cap ${maxSteps}`,
    });
  }

  if (issues.length > 0) {
    return { plan: null, issues };
  }

  return { plan: { steps, why, assumptions }, issues };
}
