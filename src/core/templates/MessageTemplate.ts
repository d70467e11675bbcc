import { TemplateError } from '../errors/WorkflowErrors.js';
import { Message, Role, createMessage } from '../entities/Message.js';
import { TemplateVariables } from './types.js';

const VARIABLE = /\{\{\s*([A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*)\s*\}\}/g;

/**
 * Substitute `{{ name }}` and `{{ path.to.value }}` placeholders.
 * Unknown variables are an error rather than an empty string.
 */
export function renderTemplateString(template: string, variables: TemplateVariables = {}): string {
  return template.replace(VARIABLE, (_match, path: string) => formatValue(lookup(variables, path), path));
}

function lookup(variables: TemplateVariables, path: string): unknown {
  let current: unknown = variables;
  for (const key of path.split('.')) {
    if (current === null || typeof current !== 'object' || !(key in current)) {
      throw new TemplateError(`Undefined template variable: ${path}`);
    }
    current = Reflect.get(current, key);
  }
  return current;
}

function formatValue(value: unknown, path: string): string {
  if (value === undefined) {
    throw new TemplateError(`Undefined template variable: ${path}`);
  }
  if (typeof value === 'string') return value;
  if (value !== null && typeof value === 'object') return JSON.stringify(value, null, 4);
  return String(value);
}

/**
 * A single message whose content is rendered from the run's variables
 */
export class MessageTemplate {
  readonly kind = 'message-template';

  constructor(
    readonly role: Role,
    readonly contentTemplate: string
  ) {}

  render(variables: TemplateVariables = {}): Message {
    return createMessage(this.role, renderTemplateString(this.contentTemplate, variables));
  }
}
