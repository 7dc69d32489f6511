import { createDefaultNormalizer, type ResultNormalizer } from "../results/normalize";
import type { ToolContext, ToolRegistry } from "../tools/tool.registry";
import { silentLogger, type LoggerLike } from "../../utils/logger";
import { stepKey, type Plan, type PlanExecutionResult } from "../../types/plan";

export interface PlanExecutorOptions {
  registry: ToolRegistry;
  normalizer?: ResultNormalizer;
  logger?: LoggerLike;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Runs an approved plan one step at a time. A failing or unknown step never
 * stops the plan; every step yields exactly one observation at its index.
 */
export class PlanExecutor {
  private readonly normalizer: ResultNormalizer;

  private readonly logger: LoggerLike;

  constructor(private readonly options: PlanExecutorOptions) {
    this.normalizer = options.normalizer ?? createDefaultNormalizer();
    this.logger = options.logger ?? silentLogger;
  }

  async execute(plan: Plan, context: ToolContext): Promise<PlanExecutionResult> {
    const result: PlanExecutionResult = { observations: [], artifacts: {} };

    for (const [index, step] of plan.steps.entries()) {
      const key = stepKey(index);
      const entry = this.options.registry.resolve(step.tool);

      if (!entry) {
        this.logger.warn({ step: key, tool: step.tool }, "plan step skipped: unknown tool");
        result.observations.push({ tool: step.tool, status: "skipped", reason: "Unknown tool" });
        continue;
      }

      const args = step.args ?? {};
      const startedAt = Date.now();
      try {
        const raw = entry.needsContext
          ? await entry.handler(args, context)
          : await entry.handler(args);
        const { observation, artifact } = this.normalizer.normalize(step.tool, raw);
        result.observations.push(observation);
        result.artifacts[key] = artifact;
        this.logger.info(
          { step: key, tool: step.tool, type: observation.type, durationMs: Date.now() - startedAt },
          "plan step completed",
        );
      } catch (error) {
        const message = errorMessage(error);
        result.observations.push({ tool: step.tool, status: "error", error: message });
        this.logger.error(
          { step: key, tool: step.tool, error: message, durationMs: Date.now() - startedAt },
          "plan step failed",
        );
      }
    }

    return result;
  }
}
