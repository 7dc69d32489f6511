export type PlanState = "empty" | "proposed" | "approved" | "discarded" | "executed";

export interface PlanStep {
  tool: string;
  args: Record<string, unknown>;
}

export interface Plan {
  steps: PlanStep[];
  why: string;
  assumptions: string[];
}

export type ObservationStatus = "ok" | "error" | "skipped";

export type ObservationType = "dataframe" | "json" | "text" | "scalar" | "code" | "unknown";

/** Small, serializable summary of one step. Never carries a full payload. */
export interface Observation {
  tool: string;
  status: ObservationStatus;
  type?: ObservationType;
  reason?: string;
  error?: string;
  shape?: [number, number];
  columns?: string[];
  count?: number | null;
  length?: number;
  [key: string]: unknown;
}

export type Artifact = Record<string, unknown>;

export interface PlanExecutionResult {
  observations: Observation[];
  artifacts: Record<string, Artifact>;
}

export function stepKey(index: number): string {
  return `step_${index}`;
}
