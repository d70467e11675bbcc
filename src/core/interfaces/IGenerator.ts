import { Message } from '../entities/Message.js';
import { GenerationParams, GeneratorResponse } from '../entities/Generation.js';

/**
 * Interface for model completion backends
 */
export interface IGenerator {
  /**
   * Complete one conversation
   */
  complete(messages: readonly Message[], params?: GenerationParams): Promise<GeneratorResponse>;

  /**
   * Complete several conversations concurrently
   */
  batchComplete(
    conversations: ReadonlyArray<readonly Message[]>,
    params?: GenerationParams
  ): Promise<GeneratorResponse[]>;
}
