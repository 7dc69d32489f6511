import { generateText, jsonSchema, tool } from "ai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { JSONSchema7 } from "json-schema";
import { getConfig } from "../../config";

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequest {
  requestId?: string;
  model: string;
  messages: ChatCompletionMessage[];
  maxTokens: number;
}

export interface ChatCompletionResult {
  content: string;
  model: string;
  usageTokens: number;
  requestId?: string;
  providerRequestId?: string;
}

export interface ForcedToolDefinition {
  name: string;
  description: string;
  parameterSchema: JSONSchema7;
}

export interface ToolCallRequest extends ChatCompletionRequest {
  tool: ForcedToolDefinition;
}

export interface ToolCallResult {
  /** Arguments of the forced call, or null when the model answered in prose. */
  input: Record<string, unknown> | null;
  text: string;
  model: string;
  usageTokens: number;
  requestId?: string;
  providerRequestId?: string;
}

export interface LlmClient {
  completeChat(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
  completeToolCall(request: ToolCallRequest): Promise<ToolCallResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function normalizeProviderError(error: unknown): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }

  if (isRecord(error) && error.cause instanceof Error && error.cause.message.trim()) {
    return error.cause.message;
  }

  return "LLM request failed";
}

function headerValue(headers: Headers, key: string): string | undefined {
  const value = headers.get(key);
  return value ? value : undefined;
}

function firstId(record: Record<string, unknown>): string | undefined {
  return [record.requestId, record.request_id, record.id]
    .map((value) => String(value ?? "").trim())
    .find((value) => value.length > 0);
}

export function extractProviderRequestId(response: unknown): string | undefined {
  if (!isRecord(response)) {
    return undefined;
  }

  const direct = firstId(response);
  if (direct) {
    return direct;
  }

  const nested = isRecord(response.response) ? response.response.headers : undefined;
  for (const possible of [response.headers, nested]) {
    if (possible instanceof Headers) {
      return (
        headerValue(possible, "x-request-id")
        ?? headerValue(possible, "request-id")
        ?? headerValue(possible, "openai-request-id")
      );
    }
  }

  if (isRecord(response.providerMetadata)) {
    for (const value of Object.values(response.providerMetadata)) {
      if (!isRecord(value)) {
        continue;
      }

      const providerId = firstId(value);
      if (providerId) {
        return providerId;
      }
    }
  }

  return undefined;
}

function usageTokensOf(
  usage: { totalTokens?: number; inputTokens?: number; outputTokens?: number },
  fallbackText: string,
): number {
  return (
    usage.totalTokens
    ?? ((usage.inputTokens ?? 0) + (usage.outputTokens ?? 0))
  ) || Math.max(1, Math.ceil(fallbackText.length / 4));
}

export class AiGatewayClient implements LlmClient {
  private readonly provider;

  constructor(
    private readonly apiKey = getConfig().aiGatewayApiKey,
    private readonly baseUrl = getConfig().aiGatewayBaseUrl,
  ) {
    this.provider = createOpenAICompatible({
      name: "ai-gateway",
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
    });
  }

  async completeChat(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    if (!this.apiKey) {
      throw new Error("AI_GATEWAY_API_KEY is required for chat runtime");
    }

    try {
      const result = await generateText({
        model: this.provider(request.model),
        messages: request.messages,
        maxOutputTokens: request.maxTokens,
      });

      const content = result.text.trim();
      if (!content) {
        throw new Error("LLM returned an empty response");
      }

      return {
        content,
        model: result.response.modelId ?? request.model,
        usageTokens: usageTokensOf(result.usage, content),
        requestId: request.requestId,
        providerRequestId: extractProviderRequestId(result.response),
      };
    } catch (error) {
      throw new Error(normalizeProviderError(error));
    }
  }

  async completeToolCall(request: ToolCallRequest): Promise<ToolCallResult> {
    if (!this.apiKey) {
      throw new Error("AI_GATEWAY_API_KEY is required for chat runtime");
    }

    try {
      const result = await generateText({
        model: this.provider(request.model),
        messages: request.messages,
        maxOutputTokens: request.maxTokens,
        tools: {
          [request.tool.name]: tool({
            description: request.tool.description,
            inputSchema: jsonSchema<Record<string, unknown>>(request.tool.parameterSchema),
          }),
        },
        toolChoice: { type: "tool", toolName: request.tool.name },
      });

      const call = result.toolCalls.find((candidate) => candidate.toolName === request.tool.name);
      const input = call && isRecord(call.input) ? call.input : null;
      const text = result.text.trim();

      return {
        input,
        text,
        model: result.response.modelId ?? request.model,
        usageTokens: usageTokensOf(result.usage, text || JSON.stringify(input ?? {})),
        requestId: request.requestId,
        providerRequestId: extractProviderRequestId(result.response),
      };
    } catch (error) {
      throw new Error(normalizeProviderError(error));
    }
  }
}
