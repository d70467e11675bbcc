/**
 * Message domain entity
 */
export type Role = 'system' | 'user' | 'assistant' | 'tool' | 'developer';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ThinkingContent {
  type: 'thinking';
  thinking: string;
}

export type ContentPart = TextContent | ThinkingContent;

export type MessageContent = string | null | ContentPart | readonly ContentPart[];

export interface ToolCallRequest {
  id: string; // provider-assigned
  type: 'function';
  function: {
    name: string;
    arguments: string; // serialized payload, usually JSON
  };
}

export interface Message {
  readonly role: Role;
  readonly content: MessageContent;
  readonly toolCalls?: readonly ToolCallRequest[];
  readonly toolCallId?: string; // only on tool results
}

/**
 * Build a frozen message. Tool-call lists are copied so the caller's array
 * cannot change the message afterwards.
 */
export function createMessage(
  role: Role,
  content: MessageContent,
  extra: { toolCalls?: readonly ToolCallRequest[]; toolCallId?: string } = {}
): Message {
  const message: Message = {
    role,
    content,
    ...(extra.toolCalls && extra.toolCalls.length > 0
      ? { toolCalls: Object.freeze(extra.toolCalls.map((call) => ({ ...call, function: { ...call.function } }))) }
      : {}),
    ...(extra.toolCallId !== undefined ? { toolCallId: extra.toolCallId } : {}),
  };
  return Object.freeze(message);
}

/**
 * Plain text of a message. Thinking parts are left out.
 */
export function messageText(message: Message): string {
  const { content } = message;
  if (typeof content === 'string') return content;
  return contentParts(content)
    .filter((part): part is TextContent => part.type === 'text')
    .map((part) => part.text)
    .join('');
}

/**
 * Content as a list of parts; plain strings become a single text part
 */
export function contentParts(content: MessageContent): readonly ContentPart[] {
  if (content === null) return [];
  if (typeof content === 'string') return [{ type: 'text', text: content }];
  return isPartList(content) ? content : [content];
}

export function hasToolCalls(message: Message): boolean {
  return (message.toolCalls?.length ?? 0) > 0;
}

function isPartList(content: ContentPart | readonly ContentPart[]): content is readonly ContentPart[] {
  return Array.isArray(content);
}
