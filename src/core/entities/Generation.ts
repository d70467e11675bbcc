import { ZodTypeAny } from 'zod';
import { ITool } from '../interfaces/ITool.js';
import { Message } from './Message.js';

export type FinishReason = 'stop' | 'length' | 'tool_calls' | null;

/**
 * Parameters for one completion call
 */
export interface GenerationParams {
  temperature?: number;
  maxTokens?: number;
  tools?: readonly ITool[];
  /** Structured-output contract the response should follow */
  responseFormat?: ZodTypeAny;
}

export interface GeneratorResponse {
  message: Message;
  finishReason: FinishReason;
}

/**
 * Merge two parameter sets. Scalars from `override` win, tool lists are concatenated.
 */
export function mergeGenerationParams(
  base: GenerationParams,
  override: GenerationParams = {}
): GenerationParams {
  const tools = [...(base.tools ?? []), ...(override.tools ?? [])];
  const merged: GenerationParams = {
    ...base,
    ...override,
  };
  if (tools.length > 0) {
    merged.tools = tools;
  } else {
    delete merged.tools;
  }
  return merged;
}
