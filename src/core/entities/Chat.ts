import { ZodType } from 'zod';
import { ConfigurationError, ErrorRecord, OutputParseError, WorkflowError, toErrorRecord } from '../errors/WorkflowErrors.js';
import { Message, messageText } from './Message.js';
import { RunContext, createRunContext } from './RunContext.js';

export interface ChatInit<T> {
  messages: readonly Message[];
  context?: RunContext;
  outputContract?: ZodType<T>;
  error?: ErrorRecord;
}

const FENCED_BLOCK = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/;

/**
 * Conversation snapshot. Every change produces a new Chat; the message list
 * of an existing snapshot never changes.
 */
export class Chat<T = unknown> {
  readonly messages: readonly Message[];
  readonly context: RunContext;
  readonly outputContract?: ZodType<T>;
  readonly error?: ErrorRecord;

  constructor(init: ChatInit<T>) {
    this.messages = Object.freeze([...init.messages]);
    this.context = init.context ?? createRunContext();
    this.outputContract = init.outputContract;
    this.error = init.error;
  }

  append(...messages: Message[]): Chat<T> {
    return new Chat<T>({
      messages: [...this.messages, ...messages],
      context: this.context,
      outputContract: this.outputContract,
      error: this.error,
    });
  }

  withError(error: unknown): Chat<T> {
    return new Chat<T>({
      messages: this.messages,
      context: this.context,
      outputContract: this.outputContract,
      error: toErrorRecord(error),
    });
  }

  get last(): Message {
    const message = this.messages[this.messages.length - 1];
    if (message === undefined) {
      throw new WorkflowError('Chat has no messages');
    }
    return message;
  }

  get transcript(): string {
    return this.messages.map((m) => `[${m.role}]: ${messageText(m)}`).join('\n');
  }

  /**
   * Last message parsed against the declared output contract
   */
  get output(): T {
    if (!this.outputContract) {
      throw new ConfigurationError('No output contract configured for this chat');
    }

    const raw = messageText(this.last).trim();
    const fenced = FENCED_BLOCK.exec(raw);
    const text = fenced ? fenced[1] : raw;

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new OutputParseError('Last message content is not valid JSON', { cause: error });
    }

    const result = this.outputContract.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ');
      throw new OutputParseError(`Content does not conform to the output contract (${issues})`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
