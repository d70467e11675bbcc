import { readFile } from 'fs/promises';
import path from 'path';
import { Message } from '../../core/entities/Message.js';
import { TemplateError } from '../../core/errors/WorkflowErrors.js';
import { renderMessageBlocks } from '../../core/templates/messageBlocks.js';
import { IPromptRenderer, TemplateVariables } from '../../core/templates/types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('PromptsManager');

export interface PromptsManagerOptions {
  /** Directory holding template files. Defaults to `<cwd>/prompts`. */
  promptsPath?: string;
}

/**
 * Loads message-block templates from disk. Files are read on every render,
 * so edits are picked up without a restart.
 */
export class PromptsManager implements IPromptRenderer {
  private promptsPath: string;

  constructor(options: PromptsManagerOptions = {}) {
    this.promptsPath = path.resolve(options.promptsPath ?? path.join(process.cwd(), 'prompts'));
  }

  getPromptsPath(): string {
    return this.promptsPath;
  }

  setPromptsPath(promptsPath: string): void {
    this.promptsPath = path.resolve(promptsPath);
  }

  async renderTemplate(templateName: string, variables: TemplateVariables = {}): Promise<Message[]> {
    const file = this.resolveTemplate(templateName);

    let source: string;
    try {
      source = await readFile(file, 'utf8');
    } catch (error) {
      throw new TemplateError(`Template "${templateName}" could not be read from ${this.promptsPath}`, {
        cause: error,
      });
    }

    logger.debug(`Rendering ${templateName}`);
    return renderMessageBlocks(source, variables);
  }

  private resolveTemplate(templateName: string): string {
    const file = path.resolve(this.promptsPath, templateName);
    const relative = path.relative(this.promptsPath, file);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new TemplateError(`Template "${templateName}" is outside of ${this.promptsPath}`);
    }
    return file;
  }
}
