/**
 * Shared fakes for workflow tests
 */

import { GenerationParams, GeneratorResponse } from '../src/core/entities/Generation.js';
import { Message, createMessage } from '../src/core/entities/Message.js';
import { IGenerator } from '../src/core/interfaces/IGenerator.js';

export type Responder = (messages: readonly Message[], call: number) => GeneratorResponse | Promise<GeneratorResponse>;

/**
 * Generator stub that answers through a callback and records every call
 */
export class FakeGenerator implements IGenerator {
  readonly calls: Array<{ messages: readonly Message[]; params?: GenerationParams }> = [];

  constructor(private readonly respond: Responder) {}

  async complete(messages: readonly Message[], params?: GenerationParams): Promise<GeneratorResponse> {
    const call = this.calls.length;
    this.calls.push({ messages, params });
    return this.respond(messages, call);
  }

  async batchComplete(
    conversations: ReadonlyArray<readonly Message[]>,
    params?: GenerationParams
  ): Promise<GeneratorResponse[]> {
    return Promise.all(conversations.map((messages) => this.complete(messages, params)));
  }
}

export function reply(text: string): GeneratorResponse {
  return { message: createMessage('assistant', text), finishReason: 'stop' };
}

export function toolCall(id: string, name: string, args: unknown): GeneratorResponse {
  return {
    message: createMessage('assistant', null, {
      toolCalls: [{ id, type: 'function', function: { name, arguments: JSON.stringify(args) } }],
    }),
    finishReason: 'tool_calls',
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of stream) {
    items.push(item);
  }
  return items;
}
