import { randomUUID } from "node:crypto";
import type { ChatCompletionMessage, LlmClient } from "../llm/ai-gateway.client";
import { DataTable, type TableRow } from "../data/table";
import { runSandboxed, type SandboxLimits } from "../code/sandbox";
import { PlanLifecycle, type PlanLifecycleSnapshot } from "../plans/plan.lifecycle";
import type { PlanExecutor } from "../plans/plan.executor";
import { parsePlanOutput } from "../plans/plan.parse";
import { validatePlan, type PlanValidationIssue } from "../plans/plan.validate";
import type { ToolContext, ToolRegistry } from "../tools/tool.registry";
import { silentLogger, type LoggerLike } from "../../utils/logger";
import type { Plan, PlanExecutionResult } from "../../types/plan";
import { buildPlannerMessages, buildPlanSummaryMessages, buildToolQaMessages, GREETING } from "./prompts";
import { routeMode, type RouteDecision } from "./router";

export interface SessionMessage {
  role: "user" | "assistant";
  content: string;
  createdAt: string;
}

export interface AgentSessionDependencies {
  llm: LlmClient;
  registry: ToolRegistry;
  executor: PlanExecutor;
  toolContext: ToolContext;
  chatModel: string;
  planningModel: string;
  maxTokens: number;
  maxSteps: number;
  historyTurns: number;
  sandboxLimits?: Partial<SandboxLimits>;
  logger?: LoggerLike;
  now?: () => Date;
}

export type MessageOutcome =
  | { mode: "tool_qa"; reply: string; route: RouteDecision }
  | { mode: "plan"; reply: string; route: RouteDecision; plan: Plan }
  | {
    mode: "failed";
    code: "PLANNING_FAILED";
    reply: string;
    error: string;
    issues: PlanValidationIssue[];
  };

export class PlanningFailure extends Error {
  public readonly code = "PLANNING_FAILED";

  constructor(message: string, public readonly issues: PlanValidationIssue[] = []) {
    super(message);
    this.name = "PlanningFailure";
  }
}

export class SessionError extends Error {
  constructor(
    public readonly code: "NO_EXECUTION_RESULT" | "ARTIFACT_NOT_FOUND",
    message: string,
  ) {
    super(message);
    this.name = "SessionError";
  }
}

export interface CodeRunRequest {
  codeStep?: string;
  dataStep?: string;
  previewRows?: number;
}

export interface CodeRunResult {
  codeStep: string;
  dataStep: string;
  shape: [number, number];
  columns: string[];
  preview: TableRow[];
}

const DEFAULT_RUN_PREVIEW_ROWS = 50;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function codeOf(artifact: Record<string, unknown> | undefined): string | null {
  return artifact && typeof artifact.code === "string" ? artifact.code : null;
}

function tableOf(artifact: Record<string, unknown> | undefined): DataTable | null {
  return artifact && artifact.df instanceof DataTable ? artifact.df : null;
}

/** One conversation: chat history plus the plan it is currently working on. */
export class AgentSession {
  public readonly createdAt: string;

  private readonly messages: SessionMessage[] = [];

  private readonly lifecycle = new PlanLifecycle();

  private readonly logger: LoggerLike;

  private readonly now: () => Date;

  constructor(
    public readonly id: string,
    private readonly deps: AgentSessionDependencies,
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.createdAt = this.now().toISOString();
    this.append("assistant", GREETING);
  }

  get history(): readonly SessionMessage[] {
    return this.messages;
  }

  get plan(): PlanLifecycleSnapshot {
    return this.lifecycle.snapshot();
  }

  async handleUserMessage(text: string, requestId?: string): Promise<MessageOutcome> {
    const history = this.recentTurns();
    this.append("user", text);

    const executionSpecs = this.deps.registry.listSpecs("execution");
    try {
      const route = await routeMode(
        this.deps.llm,
        { model: this.deps.chatModel, maxTokens: this.deps.maxTokens, requestId },
        text,
        executionSpecs,
      );

      if (route.mode === "tool_qa") {
        const answer = await this.deps.llm.completeChat({
          requestId,
          model: this.deps.chatModel,
          maxTokens: this.deps.maxTokens,
          messages: buildToolQaMessages(text, executionSpecs),
        });
        this.append("assistant", answer.content);
        return { mode: "tool_qa", reply: answer.content, route };
      }

      const plan = await this.draftPlan(history, text, requestId);
      const summary = await this.deps.llm.completeChat({
        requestId,
        model: this.deps.chatModel,
        maxTokens: this.deps.maxTokens,
        messages: buildPlanSummaryMessages(plan),
      });
      this.lifecycle.propose(plan);
      this.append("assistant", summary.content);
      return { mode: "plan", reply: summary.content, route, plan };
    } catch (error) {
      const message = errorMessage(error);
      const issues = error instanceof PlanningFailure ? error.issues : [];
      this.logger.warn({ sessionId: this.id, requestId, error: message }, "planning failed");
      const reply = `I could not prepare a plan for that request: ${message}`;
      this.append("assistant", reply);
      return { mode: "failed", code: "PLANNING_FAILED", reply, error: message, issues };
    }
  }

  approve(): Plan {
    return this.lifecycle.approve();
  }

  discard(): void {
    this.lifecycle.discard();
  }

  async execute(): Promise<PlanExecutionResult> {
    return this.lifecycle.execute((plan) => this.deps.executor.execute(plan, this.deps.toolContext));
  }

  /**
   * Runs a generated snippet from the latest execution against one of its
   * tabular artifacts. Defaults to the last code artifact and the first table.
   */
  runCode(request: CodeRunRequest = {}): CodeRunResult {
    const result = this.lifecycle.lastResult;
    if (!result) {
      throw new SessionError("NO_EXECUTION_RESULT", "Execute an approved plan before running code");
    }

    const keys = Object.keys(result.artifacts);
    const codeStep = request.codeStep ?? [...keys].reverse().find((key) => codeOf(result.artifacts[key]) !== null);
    const dataStep = request.dataStep ?? keys.find((key) => tableOf(result.artifacts[key]) !== null);

    const code = codeStep ? codeOf(result.artifacts[codeStep]) : null;
    if (!codeStep || code === null) {
      throw new SessionError("ARTIFACT_NOT_FOUND", `No code artifact found${codeStep ? ` for ${codeStep}` : ""}`);
    }

    const input = dataStep ? tableOf(result.artifacts[dataStep]) : null;
    if (!dataStep || !input) {
      throw new SessionError("ARTIFACT_NOT_FOUND", `No table artifact found${dataStep ? ` for ${dataStep}` : ""}`);
    }

    const output = runSandboxed(code, input, this.deps.sandboxLimits);
    this.logger.info(
      { sessionId: this.id, codeStep, dataStep, rows: output.rowCount },
      "generated code executed",
    );

    return {
      codeStep,
      dataStep,
      shape: output.shape,
      columns: [...output.columns],
      preview: output.head(request.previewRows ?? DEFAULT_RUN_PREVIEW_ROWS).toRecords(),
    };
  }

  private async draftPlan(
    history: ChatCompletionMessage[],
    userText: string,
    requestId?: string,
  ): Promise<Plan> {
    const executionSpecs = this.deps.registry.listSpecs("execution");
    const [planTool] = this.deps.registry.listSpecs("planning");
    if (!planTool) {
      throw new PlanningFailure("No planning tool is registered");
    }

    const completion = await this.deps.llm.completeToolCall({
      requestId,
      model: this.deps.planningModel,
      maxTokens: this.deps.maxTokens,
      messages: buildPlannerMessages({
        history,
        userText,
        executionSpecs,
        maxSteps: this.deps.maxSteps,
      }),
      tool: planTool,
    });

    const parsed = parsePlanOutput(completion.input ?? completion.text);
    const { plan, issues } = validatePlan({
      parsed,
      registry: this.deps.registry,
      maxSteps: this.deps.maxSteps,
    });
    if (!plan) {
      throw new PlanningFailure(issues.map((issue) => issue.message).join("; "), issues);
    }

    return plan;
  }

  private recentTurns(): ChatCompletionMessage[] {
    return this.messages
      .slice(-this.deps.historyTurns)
      .map((message) => ({ role: message.role, content: message.content }));
  }

  private append(role: SessionMessage["role"], content: string): void {
    this.messages.push({ role, content, createdAt: this.now().toISOString() });
  }
}

export type AgentSessionFactory = (id: string) => AgentSession;

export class MemorySessionStore {
  private readonly sessions = new Map<string, AgentSession>();

  constructor(private readonly factory: AgentSessionFactory) {}

  create(): AgentSession {
    const session = this.factory(randomUUID());
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): AgentSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}
