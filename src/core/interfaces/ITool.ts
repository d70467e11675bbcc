import { RunContext } from '../entities/RunContext.js';

/**
 * Function definition advertised to a model
 */
export interface ToolFunctionDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/**
 * A named capability the model may ask to invoke
 */
export interface ITool {
  readonly name: string;
  readonly description: string;
  /** JSON schema of the argument object */
  readonly parametersSchema: Record<string, unknown>;

  run(args: unknown, context: RunContext): Promise<unknown>;

  toFunctionDefinition(): ToolFunctionDefinition;
}
