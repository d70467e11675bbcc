import { randomUUID } from 'crypto';
import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { FinishReason, GenerationParams, GeneratorResponse } from '../../core/entities/Generation.js';
import { Message, ToolCallRequest, contentParts, createMessage, messageText } from '../../core/entities/Message.js';
import { GeneratorError, RateLimitError } from '../../core/errors/WorkflowErrors.js';
import { toJsonSchema } from '../../utils/jsonSchema.js';
import { BaseGenerator, GeneratorOptions } from './BaseGenerator.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface OllamaGeneratorOptions extends GeneratorOptions {
  apiUrl: string;
  model: string;
  /** Keep the model loaded between calls, e.g. '10m' */
  keepAlive?: string;
  fetch?: FetchLike;
}

/**
 * Message as sent to /api/chat
 */
interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  thinking?: string;
  tool_calls?: Array<{ function: { name: string; arguments: unknown } }>;
  tool_name?: string;
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string().default(''),
    thinking: z.string().optional(),
    tool_calls: z
      .array(
        z.object({
          id: z.string().optional(),
          function: z.object({
            name: z.string(),
            arguments: z.union([z.record(z.unknown()), z.string()]).default({}),
          }),
        })
      )
      .optional(),
  }),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
});

type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;

/**
 * Generator backed by Ollama's /api/chat endpoint
 */
export class OllamaGenerator extends BaseGenerator {
  readonly apiUrl: string;
  readonly model: string;
  private readonly keepAlive?: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OllamaGeneratorOptions) {
    super(options);
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.keepAlive = options.keepAlive;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get backendName(): string {
    return `ollama:${this.model}`;
  }

  protected copy(options: GeneratorOptions): OllamaGenerator {
    return new OllamaGenerator({
      apiUrl: this.apiUrl,
      model: this.model,
      keepAlive: this.keepAlive,
      fetch: this.fetchImpl,
      ...options,
    });
  }

  protected async doComplete(
    messages: readonly Message[],
    params: GenerationParams
  ): Promise<GeneratorResponse> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: toOllamaMessages(messages),
      stream: false,
      options: {
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
        ...(params.maxTokens !== undefined ? { num_predict: params.maxTokens } : {}),
      },
    };
    if (params.tools && params.tools.length > 0) {
      body.tools = params.tools.map((tool) => tool.toFunctionDefinition());
    }
    if (params.responseFormat) {
      body.format = toJsonSchema(params.responseFormat);
    }
    if (this.keepAlive) {
      body.keep_alive = this.keepAlive;
    }

    const res = await this.fetchImpl(`${this.apiUrl}/api/chat`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });

    if (res.status === 429) {
      throw new RateLimitError(`Ollama rate limit: ${await res.text()}`);
    }
    if (!res.ok) {
      throw new GeneratorError(`Ollama HTTP error! status: ${res.status} ${await res.text()}`, res.status);
    }

    const json: unknown = await res.json();
    const parsed = OllamaChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new GeneratorError(`Unexpected Ollama response: ${parsed.error.message}`, res.status, {
        cause: parsed.error,
      });
    }

    return fromOllamaResponse(parsed.data);
  }
}

function toOllamaMessages(messages: readonly Message[]): OllamaChatMessage[] {
  const toolNames = new Map<string, string>();

  return messages.map((message) => {
    const out: OllamaChatMessage = {
      role: message.role === 'developer' ? 'system' : message.role,
      content: messageText(message),
    };

    const thinking = thinkingText(message);
    if (thinking) {
      out.thinking = thinking;
    }

    if (message.toolCalls) {
      out.tool_calls = message.toolCalls.map((call) => {
        toolNames.set(call.id, call.function.name);
        return { function: { name: call.function.name, arguments: decodeArguments(call.function.arguments) } };
      });
    }

    if (message.toolCallId !== undefined) {
      const name = toolNames.get(message.toolCallId);
      if (name) {
        out.tool_name = name;
      }
    }

    return out;
  });
}

function thinkingText(message: Message): string {
  return contentParts(message.content).map((part) => (part.type === 'thinking' ? part.thinking : '')).join('');
}

function decodeArguments(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    return payload;
  }
}

function fromOllamaResponse(data: OllamaChatResponse): GeneratorResponse {
  const toolCalls = (data.message.tool_calls ?? []).map((call): ToolCallRequest => ({
    id: call.id ?? `call_${randomUUID()}`,
    type: 'function',
    function: {
      name: call.function.name,
      arguments:
        typeof call.function.arguments === 'string'
          ? call.function.arguments
          : JSON.stringify(call.function.arguments),
    },
  }));

  const content = data.message.thinking
    ? [
        { type: 'thinking' as const, thinking: data.message.thinking },
        { type: 'text' as const, text: data.message.content },
      ]
    : data.message.content;

  return {
    message: createMessage('assistant', content, { toolCalls }),
    finishReason: finishReason(data, toolCalls.length > 0),
  };
}

function finishReason(data: OllamaChatResponse, hasToolCalls: boolean): FinishReason {
  if (hasToolCalls) return 'tool_calls';
  if (data.done_reason === 'stop' || data.done_reason === 'length') return data.done_reason;
  return null;
}
