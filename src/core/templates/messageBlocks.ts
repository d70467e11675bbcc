import { TemplateError } from '../errors/WorkflowErrors.js';
import { Message, Role, createMessage } from '../entities/Message.js';
import { renderTemplateString } from './MessageTemplate.js';
import { TemplateVariables } from './types.js';

const MESSAGE_BLOCK = /\{%\s*message\s+([A-Za-z]+)\s*%\}([\s\S]*?)\{%\s*endmessage\s*%\}/g;
const ROLES: readonly Role[] = ['system', 'user', 'assistant', 'tool', 'developer'];

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Render a template made of `{% message role %} ... {% endmessage %}` blocks.
 *
 * With blocks, anything outside them must render to whitespace. Without
 * blocks, the whole rendered text becomes one user message.
 */
export function renderMessageBlocks(source: string, variables: TemplateVariables = {}): Message[] {
  const messages: Message[] = [];
  let residual = '';
  let cursor = 0;

  for (const match of source.matchAll(MESSAGE_BLOCK)) {
    const [block, role, body] = match;
    const start = match.index ?? 0;
    if (!isRole(role)) {
      throw new TemplateError(`Unknown message role "${role}"`);
    }
    residual += source.slice(cursor, start);
    cursor = start + block.length;
    messages.push(createMessage(role, renderTemplateString(body, variables).trim()));
  }
  residual += source.slice(cursor);

  const renderedResidual = renderTemplateString(residual, variables);
  if (messages.length === 0) {
    return [createMessage('user', renderedResidual.trim())];
  }
  if (renderedResidual.trim() !== '') {
    throw new TemplateError('Template contains message blocks but also text outside of them');
  }
  return messages;
}
