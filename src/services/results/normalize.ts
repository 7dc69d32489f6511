import { DataTable } from "../data/table";
import type { Artifact, Observation } from "../../types/plan";

export interface NormalizeOptions {
  previewRows: number;
  textMaxChars: number;
}

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  previewRows: 20,
  textMaxChars: 20_000,
};

/** Closed classification of a raw tool return value. */
export type ToolResultKind =
  | { kind: "dataframe"; table: DataTable }
  | { kind: "json"; value: Record<string, unknown> | unknown[] }
  | { kind: "text"; value: string | Uint8Array }
  | { kind: "scalar"; value: number | boolean | bigint | null | undefined }
  | { kind: "unknown"; value: unknown };

export interface NormalizedResult {
  observation: Observation;
  artifact: Artifact;
}

export type ToolResultAdapter = (
  toolName: string,
  raw: unknown,
  options: NormalizeOptions,
) => NormalizedResult;

type Matcher = (raw: unknown) => ToolResultKind | null;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

const MATCHERS: Matcher[] = [
  (raw) => (raw instanceof DataTable ? { kind: "dataframe", table: raw } : null),
  (raw) => (isPlainObject(raw) || Array.isArray(raw) ? { kind: "json", value: raw } : null),
  (raw) =>
    raw instanceof Map
      ? { kind: "json", value: Object.fromEntries(Array.from(raw, ([key, value]) => [String(key), value])) }
      : null,
  (raw) => (raw instanceof Set ? { kind: "json", value: Array.from(raw) } : null),
  (raw) => (typeof raw === "string" || raw instanceof Uint8Array ? { kind: "text", value: raw } : null),
  (raw) =>
    raw === null
    || raw === undefined
    || typeof raw === "number"
    || typeof raw === "boolean"
    || typeof raw === "bigint"
      ? { kind: "scalar", value: raw }
      : null,
];

export function classifyToolResult(raw: unknown): ToolResultKind {
  for (const matcher of MATCHERS) {
    const kind = matcher(raw);
    if (kind) {
      return kind;
    }
  }
  return { kind: "unknown", value: raw };
}

function safeRepr(value: unknown): string {
  try {
    if (typeof value === "symbol") {
      return value.toString();
    }
    if (typeof value === "function") {
      return `[function ${value.name || "anonymous"}]`;
    }
    return String(value);
  } catch {
    return "<unrepresentable>";
  }
}

function normalizeKind(toolName: string, kind: ToolResultKind, options: NormalizeOptions): NormalizedResult {
  switch (kind.kind) {
    case "dataframe": {
      const table = kind.table;
      return {
        observation: {
          tool: toolName,
          status: "ok",
          type: "dataframe",
          shape: table.shape,
          columns: [...table.columns],
        },
        artifact: {
          columns: [...table.columns],
          preview: table.head(options.previewRows).toRecords(),
          df: table.clone(),
        },
      };
    }
    case "json": {
      const count = Array.isArray(kind.value) ? kind.value.length : Object.keys(kind.value).length;
      return {
        observation: { tool: toolName, status: "ok", type: "json", count },
        artifact: { value: kind.value },
      };
    }
    case "text": {
      const { value } = kind;
      // Strings are measured and cut by code point so surrogate pairs stay whole.
      const units = typeof value === "string" ? Array.from(value) : value;
      const truncated = units.length > options.textMaxChars;
      const stored = Array.isArray(units)
        ? units.slice(0, options.textMaxChars).join("")
        : units.slice(0, options.textMaxChars);
      return {
        observation: { tool: toolName, status: "ok", type: "text", length: units.length },
        artifact: { value: stored, truncated },
      };
    }
    case "scalar":
      return {
        observation: { tool: toolName, status: "ok", type: "scalar" },
        artifact: { value: kind.value },
      };
    case "unknown":
      return {
        observation: { tool: toolName, status: "ok", type: "unknown" },
        artifact: { repr: safeRepr(kind.value) },
      };
  }
}

function codeAdapter(toolName: string, raw: unknown, options: NormalizeOptions): NormalizedResult {
  const code = isPlainObject(raw) && typeof raw.code === "string" ? raw.code : null;
  if (code === null) {
    return normalizeKind(toolName, classifyToolResult(raw), options);
  }
  return {
    observation: { tool: toolName, status: "ok", type: "code", length: code.length },
    artifact: { code, value: raw },
  };
}

/**
 * Turns any tool return value into an observation/artifact pair. Per-tool
 * adapters win over the generic matchers. Never throws.
 */
export class ResultNormalizer {
  private readonly overrides = new Map<string, ToolResultAdapter>();

  constructor(private readonly options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS) {}

  registerOverride(toolName: string, adapter: ToolResultAdapter): this {
    this.overrides.set(toolName, adapter);
    return this;
  }

  normalize(toolName: string, raw: unknown): NormalizedResult {
    try {
      const override = this.overrides.get(toolName);
      if (override) {
        return override(toolName, raw, this.options);
      }
      return normalizeKind(toolName, classifyToolResult(raw), this.options);
    } catch {
      return {
        observation: { tool: toolName, status: "ok", type: "unknown" },
        artifact: { repr: safeRepr(raw) },
      };
    }
  }
}

export function createDefaultNormalizer(options: Partial<NormalizeOptions> = {}): ResultNormalizer {
  return new ResultNormalizer({ ...DEFAULT_NORMALIZE_OPTIONS, ...options }).registerOverride(
    "nl_to_code",
    codeAdapter,
  );
}

export function normalize(toolName: string, raw: unknown): NormalizedResult {
  return createDefaultNormalizer().normalize(toolName, raw);
}
