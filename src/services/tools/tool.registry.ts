import type { JSONSchema7 } from "json-schema";
import type { LlmClient } from "../llm/ai-gateway.client";
import type { SnapshotSource } from "../data/snapshot.store";
import type { LoggerLike } from "../../utils/logger";

export type ToolPhase = "planning" | "execution";

export interface ToolSpec {
  name: string;
  description: string;
  parameterSchema: JSONSchema7;
}

/** Orchestration handle passed to tools registered with `needsContext`. */
export interface ToolContext {
  llm: LlmClient;
  snapshots: SnapshotSource;
  defaultTable: string;
  codeModel: string;
  maxTokens: number;
  logger: LoggerLike;
}

export type ToolArgs = Record<string, unknown>;

export type ToolHandler = (args: ToolArgs, context?: ToolContext) => unknown;

export interface ToolRegistrationOptions {
  needsContext: boolean;
  phases: ToolPhase[];
}

export interface ToolRegistryEntry {
  name: string;
  handler: ToolHandler | null;
  spec: ToolSpec;
  needsContext: boolean;
  phases: ReadonlySet<ToolPhase>;
}

export class ToolRegistryError extends Error {
  constructor(
    public readonly code: "TOOL_DUPLICATE" | "TOOL_NAME_MISMATCH",
    message: string,
  ) {
    super(message);
    this.name = "ToolRegistryError";
  }
}

export class ToolRegistry {
  private readonly entries = new Map<string, ToolRegistryEntry>();

  register(
    name: string,
    handler: ToolHandler | null,
    spec: ToolSpec,
    options: ToolRegistrationOptions,
  ): this {
    if (this.entries.has(name)) {
      throw new ToolRegistryError("TOOL_DUPLICATE", `Tool already registered: ${name}`);
    }
    if (spec.name !== name) {
      throw new ToolRegistryError("TOOL_NAME_MISMATCH", `Spec name ${spec.name} does not match ${name}`);
    }

    this.entries.set(name, {
      name,
      handler,
      spec,
      needsContext: options.needsContext,
      phases: new Set(options.phases),
    });
    return this;
  }

  /** Callable entry for `name`, or null when unknown or spec-only. */
  resolve(name: string): (ToolRegistryEntry & { handler: ToolHandler }) | null {
    const entry = this.entries.get(name);
    if (!entry || !entry.handler) {
      return null;
    }
    return { ...entry, handler: entry.handler };
  }

  has(name: string, phase: ToolPhase = "execution"): boolean {
    return this.entries.get(name)?.phases.has(phase) ?? false;
  }

  listSpecs(phase: ToolPhase): ToolSpec[] {
    return [...this.entries.values()]
      .filter((entry) => entry.phases.has(phase))
      .map((entry) => entry.spec);
  }
}
