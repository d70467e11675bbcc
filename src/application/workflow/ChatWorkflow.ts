import { ZodType } from 'zod';
import { Chat } from '../../core/entities/Chat.js';
import { GenerationParams, mergeGenerationParams } from '../../core/entities/Generation.js';
import { Message, Role, ToolCallRequest, createMessage, hasToolCalls } from '../../core/entities/Message.js';
import { RunContext, cloneRunContext, createRunContext } from '../../core/entities/RunContext.js';
import {
  ConfigurationError,
  ToolCallError,
  ToolNotFoundError,
  WorkflowError,
} from '../../core/errors/WorkflowErrors.js';
import { IGenerator } from '../../core/interfaces/IGenerator.js';
import { ITool } from '../../core/interfaces/ITool.js';
import { MessageTemplate } from '../../core/templates/MessageTemplate.js';
import { IPromptRenderer, TemplateReference, TemplateVariables, templateReference } from '../../core/templates/types.js';
import { PromptsManager } from '../../infrastructure/templates/PromptsManager.js';
import { toJsonSchema } from '../../utils/jsonSchema.js';
import { createLogger } from '../../utils/logger.js';
import { ErrorMode, Step, StepOptions } from './Step.js';

const logger = createLogger('ChatWorkflow');

export type WorkflowInputs = TemplateVariables;

export type WorkflowMessage = Message | MessageTemplate | TemplateReference;

export type ConversationState =
  | 'rendering'
  | 'awaiting-completion'
  | 'tool-execution'
  | 'done'
  | 'step-budget-exhausted'
  | 'failed';

/**
 * Snapshot taken after a round of the conversation. Steps are linked
 * newest-first through `previous`.
 */
export interface ConversationStep<T> {
  /** Number of completions received so far */
  round: number;
  chat: Chat<T>;
  state: ConversationState;
  previous?: ConversationStep<T>;
}

export interface ChatWorkflowOptions<T> extends StepOptions {
  generator: IGenerator;
  messages?: readonly WorkflowMessage[];
  tools?: readonly ITool[];
  inputs?: WorkflowInputs;
  outputContract?: ZodType<T>;
  promptsManager?: IPromptRenderer;
  context?: RunContext;
  /** Maximum number of completions per run. Unset means no limit. */
  maxSteps?: number;
  params?: GenerationParams;
}

/**
 * Steps of a run, oldest first
 */
export function history<T>(step: ConversationStep<T>): ConversationStep<T>[] {
  const steps: ConversationStep<T>[] = [];
  for (let current: ConversationStep<T> | undefined = step; current; current = current.previous) {
    steps.push(current);
  }
  return steps.reverse();
}

/**
 * Conversation engine: alternates model completions and tool executions
 * until the model answers without tool calls or the step budget runs out.
 *
 * Builder methods return a new workflow; a configured workflow can be run
 * any number of times, concurrently, and each run works on its own snapshot.
 */
export class ChatWorkflow<T = unknown> extends Step<WorkflowInputs | undefined, Chat<T>> {
  readonly generator: IGenerator;
  readonly messages: readonly WorkflowMessage[];
  readonly tools: ReadonlyMap<string, ITool>;
  readonly inputs: WorkflowInputs;
  readonly outputContract?: ZodType<T>;
  readonly promptsManager: IPromptRenderer;
  readonly context: RunContext;
  readonly maxSteps?: number;
  readonly params: GenerationParams;

  constructor(options: ChatWorkflowOptions<T>) {
    super(options);
    if (options.maxSteps !== undefined && (!Number.isInteger(options.maxSteps) || options.maxSteps < 0)) {
      throw new ConfigurationError(`maxSteps must be a non-negative integer, got ${options.maxSteps}`);
    }

    this.generator = options.generator;
    this.messages = Object.freeze([...(options.messages ?? [])]);
    this.tools = new Map((options.tools ?? []).map((tool) => [tool.name, tool]));
    this.inputs = { ...(options.inputs ?? {}) };
    this.outputContract = options.outputContract;
    this.promptsManager = options.promptsManager ?? new PromptsManager();
    this.context = options.context ?? createRunContext();
    this.maxSteps = options.maxSteps;
    this.params = options.params ?? {};
  }

  chat(message: string | Message, role: Role = 'user'): ChatWorkflow<T> {
    const entry = typeof message === 'string' ? new MessageTemplate(role, message) : message;
    return this.derive({ messages: [...this.messages, entry] });
  }

  /**
   * Append the messages of a template file, rendered at run time
   */
  template(templateName: string): ChatWorkflow<T> {
    return this.derive({ messages: [...this.messages, templateReference(templateName)] });
  }

  withTools(...tools: ITool[]): ChatWorkflow<T> {
    return this.derive({ tools: [...this.tools.values(), ...tools] });
  }

  withOutput<N>(outputContract: ZodType<N>): ChatWorkflow<N> {
    return new ChatWorkflow<N>({ ...this.options(), outputContract });
  }

  withInputs(inputs: WorkflowInputs): ChatWorkflow<T> {
    return this.derive({ inputs: { ...this.inputs, ...inputs } });
  }

  withContext(context: RunContext): ChatWorkflow<T> {
    return this.derive({ context });
  }

  withMaxSteps(maxSteps: number): ChatWorkflow<T> {
    return this.derive({ maxSteps });
  }

  withParams(params: GenerationParams): ChatWorkflow<T> {
    return this.derive({ params: mergeGenerationParams(this.params, params) });
  }

  withErrorMode(errorMode: ErrorMode): ChatWorkflow<T> {
    return this.derive({ errorMode });
  }

  withPromptsManager(promptsManager: IPromptRenderer): ChatWorkflow<T> {
    return this.derive({ promptsManager });
  }

  /**
   * Drive one conversation, yielding a snapshot after every round.
   * The last step is always in state `done` or `step-budget-exhausted`;
   * on failure a `failed` step carrying the error record is yielded
   * before the error is rethrown.
   */
  async *runSteps(inputs?: WorkflowInputs): AsyncGenerator<ConversationStep<T>, void, undefined> {
    const context = cloneRunContext(this.context);
    context.inputs = { ...this.inputs, ...(inputs ?? {}) };

    const params = mergeGenerationParams(this.params, {
      ...(this.tools.size > 0 ? { tools: [...this.tools.values()] } : {}),
      ...(this.outputContract ? { responseFormat: this.outputContract } : {}),
    });

    let chat = new Chat<T>({
      messages: await this.renderMessages(context.inputs),
      context,
      outputContract: this.outputContract,
    });
    let previous: ConversationStep<T> | undefined;
    let round = 0;

    try {
      for (;;) {
        if (this.maxSteps !== undefined && round >= this.maxSteps) {
          logger.debug(`${this.describe()} stopped after ${round} round(s): step budget exhausted`);
          yield { round, chat, state: 'step-budget-exhausted', previous };
          return;
        }

        const response = await this.generator.complete(chat.messages, params);
        round++;
        chat = chat.append(response.message);

        if (!hasToolCalls(response.message)) {
          yield { round, chat, state: 'done', previous };
          return;
        }

        for (const call of response.message.toolCalls ?? []) {
          chat = chat.append(await this.executeToolCall(call, context));
        }

        previous = { round, chat, state: 'tool-execution', previous };
        yield previous;
      }
    } catch (error) {
      yield { round, chat: chat.withError(error), state: 'failed', previous };
      throw error;
    }
  }

  /**
   * Run one conversation to its end and return the final chat
   */
  async run(inputs?: WorkflowInputs): Promise<Chat<T>> {
    let last: ConversationStep<T> | undefined;
    for await (const step of this.runSteps(inputs)) {
      last = step;
    }
    if (!last) {
      throw new WorkflowError('Conversation ended without producing a chat');
    }
    return last.chat;
  }

  describe(): string {
    return this.name || `ChatWorkflow(${this.messages.length} messages, ${this.tools.size} tools)`;
  }

  private async renderMessages(inputs: WorkflowInputs): Promise<Message[]> {
    const variables: TemplateVariables = {
      ...(this.outputContract ? { _instr_output: outputInstructions(this.outputContract) } : {}),
      ...inputs,
    };

    const rendered: Message[] = [];
    for (const entry of this.messages) {
      if (entry instanceof MessageTemplate) {
        rendered.push(entry.render(variables));
      } else if ('kind' in entry) {
        rendered.push(...(await this.promptsManager.renderTemplate(entry.templateName, variables)));
      } else {
        rendered.push(entry);
      }
    }
    return rendered;
  }

  private async executeToolCall(call: ToolCallRequest, context: RunContext): Promise<Message> {
    const name = call.function.name;
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name, [...this.tools.keys()]);
    }

    let args: unknown;
    try {
      args = JSON.parse(call.function.arguments.trim() === '' ? '{}' : call.function.arguments);
    } catch (error) {
      throw new ToolCallError(name, 'arguments are not valid JSON', { cause: error });
    }

    logger.debug(`Calling tool ${name} (${call.id})`);
    let result: unknown;
    try {
      result = await tool.run(args, context);
    } catch (error) {
      if (error instanceof ToolCallError) {
        throw error;
      }
      throw new ToolCallError(name, error instanceof Error ? error.message : String(error), { cause: error });
    }

    return createMessage('tool', JSON.stringify(result ?? null), { toolCallId: call.id });
  }

  private options(): ChatWorkflowOptions<T> {
    return {
      name: this.name,
      errorMode: this.errorMode,
      generator: this.generator,
      messages: this.messages,
      tools: [...this.tools.values()],
      inputs: this.inputs,
      outputContract: this.outputContract,
      promptsManager: this.promptsManager,
      context: this.context,
      maxSteps: this.maxSteps,
      params: this.params,
    };
  }

  private derive(overrides: Partial<ChatWorkflowOptions<T>>): ChatWorkflow<T> {
    return new ChatWorkflow<T>({ ...this.options(), ...overrides });
  }
}

function outputInstructions(outputContract: ZodType<unknown>): string {
  return `Provide your answer in JSON format, respecting this schema:\n${JSON.stringify(toJsonSchema(outputContract))}`;
}
