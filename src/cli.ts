#!/usr/bin/env node

/**
 * Tool Relay - command line entry point
 *
 * Usage: tool-relay ask "<question>" [--template name] [--mcp-command "cmd args"] [options]
 */

import { ChatWorkflow, ConversationStep } from './application/workflow/ChatWorkflow.js';
import { ConfigError, getConfig, parseArgs, printConfigInfo } from './config.js';
import { createMessage } from './core/entities/Message.js';
import { ITool } from './core/interfaces/ITool.js';
import { OllamaGenerator } from './infrastructure/generators/OllamaGenerator.js';
import { McpToolset } from './infrastructure/mcp/McpToolset.js';
import { RateLimiterRegistry } from './infrastructure/queue/RateLimiterRegistry.js';
import { PromptsManager } from './infrastructure/templates/PromptsManager.js';
import { createLogger, setDebugLogging } from './utils/logger.js';

const logger = createLogger('CLI');

const SYSTEM_PROMPT = 'You are a helpful assistant. Use the available tools when they help to answer the question.';

const USAGE = `Usage: tool-relay ask "<question>" [options]

Options:
  --ollama-url <url>           Ollama API URL (OLLAMA_API_URL)
  --model <name>               Model to chat with (OLLAMA_MODEL)
  --keep-alive <duration>      Keep the model loaded, e.g. 10m (OLLAMA_KEEP_ALIVE)
  --template <name>            Prompt template to render instead of the default messages
  --prompts-path <dir>         Directory holding prompt templates (PROMPTS_PATH)
  --max-steps <n>              Maximum completions per conversation (MAX_STEPS)
  --rpm <n>                    Requests per minute (RATE_LIMIT_RPM)
  --burst-size <n>             Concurrent requests (RATE_LIMIT_BURST_SIZE)
  --limiter-id <id>            Shared limiter name (RATE_LIMITER_ID)
  --cooldown-base <ms>         First cooldown after a rate-limit error
  --cooldown-max <ms>          Cooldown cap
  --retry-attempts <n>         Attempts per completion (RETRY_MAX_ATTEMPTS)
  --retry-initial-delay <ms>   First retry delay (RETRY_INITIAL_DELAY_MS)
  --retry-max-delay <ms>       Retry delay cap (RETRY_MAX_DELAY_MS)
  --request-timeout <ms>       Timeout per attempt (REQUEST_TIMEOUT_MS)
  --mcp-command "<cmd args>"   MCP server to spawn for tools (MCP_COMMAND)
  --debug                      Verbose logging (DEBUG)
`;

async function main() {
  const argv = process.argv.slice(2);
  const { flags, positionals } = parseArgs(argv);
  const [command, ...rest] = positionals;

  if (flags.help === true || command !== 'ask' || rest.length === 0) {
    console.error(USAGE);
    process.exit(command === undefined || flags.help === true ? 0 : 1);
  }

  let toolset: McpToolset | null = null;

  // Setup graceful shutdown
  const shutdown = async (signal: string) => {
    console.error(`\n📛 Received ${signal}, shutting down...`);
    if (toolset) {
      await toolset.close();
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => logger.error('Shutdown failed', error));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => logger.error('Shutdown failed', error));
  });

  try {
    const config = getConfig(argv);
    setDebugLogging(config.debug);
    printConfigInfo(config);

    const registry = new RateLimiterRegistry({
      cooldownBaseMs: config.rateLimit.cooldownBaseMs,
      maxCooldownMs: config.rateLimit.maxCooldownMs,
    });
    const generator = new OllamaGenerator({
      apiUrl: config.ollama.apiUrl,
      model: config.ollama.model,
      keepAlive: config.ollama.keepAlive,
      rateLimiter: registry.getOrCreate(config.rateLimit),
      retry: config.retry,
    });

    let tools: ITool[] = [];
    if (config.mcp.command) {
      toolset = await McpToolset.connectStdio(config.mcp.command, config.mcp.args);
      tools = await toolset.loadTools();
    }

    const question = rest.join(' ');
    let workflow = new ChatWorkflow({
      generator,
      promptsManager: new PromptsManager({ promptsPath: config.workflow.promptsPath }),
      maxSteps: config.workflow.maxSteps,
    }).withTools(...tools);

    workflow =
      typeof flags.template === 'string'
        ? workflow.template(flags.template).withInputs({ question })
        : workflow.chat(createMessage('system', SYSTEM_PROMPT)).chat(createMessage('user', question));

    let last: ConversationStep<unknown> | undefined;
    for await (const step of workflow.runSteps()) {
      logger.debug(`Round ${step.round}: ${step.state} (${step.chat.messages.length} messages)`);
      last = step;
    }

    if (last) {
      if (last.state === 'step-budget-exhausted') {
        logger.warn(`Stopped after ${last.round} round(s) without a final answer`);
      }
      console.log(last.chat.transcript);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error('Fatal error in main()', error);
    }
    process.exitCode = 1;
  } finally {
    if (toolset) {
      await toolset.close();
    }
  }
}

main().catch((error) => {
  logger.error('Unexpected failure', error);
  process.exit(1);
});
