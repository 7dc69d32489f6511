export class PlanParseError extends Error {
  constructor(
    public readonly code:
      | "PLAN_PARSE_NONJSON"
      | "PLAN_PARSE_MULTIBLOCK"
      | "PLAN_SCHEMA_INVALID",
    message: string,
  ) {
    super(message);
    this.name = "PlanParseError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function parseJsonObject(value: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new PlanParseError("PLAN_PARSE_NONJSON", "Plan output is not valid JSON");
  }

  if (!isRecord(parsed)) {
    throw new PlanParseError("PLAN_SCHEMA_INVALID", "Plan output must be a JSON object");
  }

  return parsed;
}

/** Index just past the `}` closing the object that opens at `start`, or -1. */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (char === "\\") {
        index += 1;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return index + 1;
      }
    }
  }
  return -1;
}

function embeddedObjects(text: string): string[] {
  const objects: string[] = [];
  let cursor = text.indexOf("{");
  while (cursor !== -1) {
    const end = matchingBrace(text, cursor);
    if (end === -1) {
      break;
    }
    objects.push(text.slice(cursor, end));
    cursor = text.indexOf("{", end);
  }
  return objects;
}

/**
 * Accepts the planner's structured arguments, raw JSON, a single fenced block,
 * or prose wrapped around exactly one fenced block or one JSON object.
 */
export function parsePlanOutput(rawOutput: string | Record<string, unknown>): Record<string, unknown> {
  if (typeof rawOutput !== "string") {
    return rawOutput;
  }

  const raw = rawOutput.trim();
  if (!raw) {
    throw new PlanParseError("PLAN_PARSE_NONJSON", "Plan output is empty");
  }

  if (raw.startsWith("{") && raw.endsWith("}")) {
    return parseJsonObject(raw);
  }

  const fences = [...raw.matchAll(/```([a-zA-Z0-9_-]*)\s*([\s\S]*?)```/g)];
  if (fences.length > 1) {
    throw new PlanParseError("PLAN_PARSE_MULTIBLOCK", "Plan output contains multiple fenced blocks");
  }

  const [single] = fences;
  if (single) {
    const language = String(single[1] ?? "").trim().toLowerCase();
    if (language && language !== "json") {
      throw new PlanParseError("PLAN_PARSE_NONJSON", "Fenced plan output must be JSON");
    }
    return parseJsonObject(String(single[2] ?? "").trim());
  }

  const objects = embeddedObjects(raw);
  if (objects.length > 1) {
    throw new PlanParseError("PLAN_PARSE_MULTIBLOCK", "Plan output contains multiple JSON objects");
  }

  const [object] = objects;
  if (!object) {
    throw new PlanParseError(
      "PLAN_PARSE_NONJSON",
      "Plan output must be raw JSON, a single fenced json block or prose around one JSON object",
    );
  }

  return parseJsonObject(object);
}
