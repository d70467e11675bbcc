import { z, ZodRawShape } from 'zod';
import { RunContext } from '../../core/entities/RunContext.js';
import { ToolCallError } from '../../core/errors/WorkflowErrors.js';
import { ITool, ToolFunctionDefinition } from '../../core/interfaces/ITool.js';
import { toJsonSchema } from '../../utils/jsonSchema.js';

export interface ToolDefinition<S extends ZodRawShape, R> {
  name: string;
  description: string;
  parameters: z.ZodObject<S>;
  run: (args: z.infer<z.ZodObject<S>>, context: RunContext) => R | Promise<R>;
}

/**
 * Tool whose arguments are described and checked by a zod object schema
 */
export class Tool<S extends ZodRawShape, R> implements ITool {
  readonly name: string;
  readonly description: string;
  readonly parametersSchema: Record<string, unknown>;

  private readonly parameters: z.ZodObject<S>;
  private readonly fn: ToolDefinition<S, R>['run'];

  constructor(definition: ToolDefinition<S, R>) {
    this.name = definition.name;
    this.description = definition.description;
    this.parameters = definition.parameters;
    this.fn = definition.run;
    this.parametersSchema = toJsonSchema(definition.parameters);
  }

  async run(args: unknown, context: RunContext): Promise<R> {
    const parsed = this.parameters.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join('; ');
      throw new ToolCallError(this.name, `invalid arguments (${issues})`, { cause: parsed.error });
    }
    return this.fn(parsed.data, context);
  }

  toFunctionDefinition(): ToolFunctionDefinition {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: this.parametersSchema,
      },
    };
  }
}

export function defineTool<S extends ZodRawShape, R>(definition: ToolDefinition<S, R>): Tool<S, R> {
  return new Tool(definition);
}
