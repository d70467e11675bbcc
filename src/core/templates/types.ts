import { Message } from '../entities/Message.js';

/**
 * Reference to a template file resolved at run time by a prompt renderer
 */
export interface TemplateReference {
  kind: 'template-reference';
  templateName: string;
}

export type TemplateVariables = Record<string, unknown>;

/**
 * Renders a named template into an ordered list of messages
 */
export interface IPromptRenderer {
  renderTemplate(templateName: string, variables?: TemplateVariables): Promise<Message[]>;
}

export function templateReference(templateName: string): TemplateReference {
  return { kind: 'template-reference', templateName };
}
