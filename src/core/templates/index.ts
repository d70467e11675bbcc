/**
 * Prompt templates: inline message templates and message-block documents
 */
export type { TemplateReference, TemplateVariables, IPromptRenderer } from './types.js';
export { templateReference } from './types.js';
export { MessageTemplate, renderTemplateString } from './MessageTemplate.js';
export { renderMessageBlocks } from './messageBlocks.js';
