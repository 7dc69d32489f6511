import type { Plan, PlanExecutionResult, PlanState } from "../../types/plan";

export type PlanLifecycleErrorCode =
  | "PLAN_MISSING"
  | "PLAN_NOT_APPROVABLE"
  | "PLAN_NOT_EXECUTABLE"
  | "PLAN_NOT_DISCARDABLE";

export class PlanLifecycleError extends Error {
  constructor(
    public readonly code: PlanLifecycleErrorCode,
    message: string,
    public readonly state: PlanState,
  ) {
    super(message);
    this.name = "PlanLifecycleError";
  }
}

export type PlanRunner = (plan: Plan) => Promise<PlanExecutionResult>;

export interface PlanLifecycleSnapshot {
  state: PlanState;
  plan: Plan | null;
  result: PlanExecutionResult | null;
}

/**
 * Proposed -> approved -> executed, with discard from any non-empty state.
 * Every edge is an explicit call; running the plan is delegated to the runner.
 */
export class PlanLifecycle {
  private state: PlanState = "empty";

  private plan: Plan | null = null;

  private result: PlanExecutionResult | null = null;

  snapshot(): PlanLifecycleSnapshot {
    return { state: this.state, plan: this.plan, result: this.result };
  }

  get currentState(): PlanState {
    return this.state;
  }

  get lastResult(): PlanExecutionResult | null {
    return this.result;
  }

  propose(plan: Plan): void {
    this.plan = plan;
    this.result = null;
    this.state = "proposed";
  }

  approve(): Plan {
    const plan = this.requirePlan();
    if (this.state !== "proposed") {
      throw new PlanLifecycleError(
        "PLAN_NOT_APPROVABLE",
        `Only a proposed plan can be approved (state: ${this.state})`,
        this.state,
      );
    }
    this.state = "approved";
    return plan;
  }

  async execute(runner: PlanRunner): Promise<PlanExecutionResult> {
    const plan = this.requirePlan();
    if (this.state !== "approved" && this.state !== "executed") {
      throw new PlanLifecycleError(
        "PLAN_NOT_EXECUTABLE",
        `Plan must be approved before execution (state: ${this.state})`,
        this.state,
      );
    }

    const result = await runner(plan);
    // A discard or new proposal while the runner was awaiting wins.
    if (this.plan === plan) {
      this.result = result;
      this.state = "executed";
    }
    return result;
  }

  discard(): void {
    if (this.state !== "proposed" && this.state !== "approved" && this.state !== "executed") {
      throw new PlanLifecycleError(
        "PLAN_NOT_DISCARDABLE",
        `There is no plan to discard (state: ${this.state})`,
        this.state,
      );
    }
    this.plan = null;
    this.result = null;
    this.state = "discarded";
  }

  private requirePlan(): Plan {
    if (!this.plan) {
      throw new PlanLifecycleError("PLAN_MISSING", "No plan has been proposed", this.state);
    }
    return this.plan;
  }
}
