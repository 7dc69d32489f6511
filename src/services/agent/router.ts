import type { LlmClient } from "../llm/ai-gateway.client";
import type { ToolSpec } from "../tools/tool.registry";
import { buildRouterMessages, stripCodeFences } from "./prompts";

export type RouteMode = "tool_qa" | "plan";

export interface RouteDecision {
  mode: RouteMode;
  why: string;
}

export const ROUTE_WHY_MAX_LENGTH = 120;

export class RoutingContractError extends Error {
  public readonly code = "ROUTING_CONTRACT_VIOLATION";

  constructor(message: string) {
    super(message);
    this.name = "RoutingContractError";
  }
}

function isRouteMode(value: unknown): value is RouteMode {
  return value === "tool_qa" || value === "plan";
}

export function parseRouteDecision(raw: string): RouteDecision {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new RoutingContractError("Router reply is not valid JSON");
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new RoutingContractError("Router reply must be a JSON object");
  }

  const keys = Object.keys(parsed).sort();
  if (keys.length !== 2 || keys[0] !== "mode" || keys[1] !== "why") {
    throw new RoutingContractError(`Router reply must have exactly the keys mode and why (got ${keys.join(", ")})`);
  }

  const { mode, why } = Object.fromEntries(Object.entries(parsed));
  if (!isRouteMode(mode)) {
    throw new RoutingContractError(`Unknown routing mode: ${String(mode)}`);
  }
  if (typeof why !== "string" || !why.trim()) {
    throw new RoutingContractError("Router why must be a non-empty string");
  }
  if (why.length > ROUTE_WHY_MAX_LENGTH) {
    throw new RoutingContractError(`Router why must be at most ${ROUTE_WHY_MAX_LENGTH} characters`);
  }

  return { mode, why };
}

export async function routeMode(
  llm: LlmClient,
  options: { model: string; maxTokens: number; requestId?: string },
  userText: string,
  specs: ToolSpec[],
): Promise<RouteDecision> {
  const completion = await llm.completeChat({
    requestId: options.requestId,
    model: options.model,
    maxTokens: options.maxTokens,
    messages: buildRouterMessages(userText, specs),
  });
  return parseRouteDecision(completion.content);
}
