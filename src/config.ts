import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './core/errors/WorkflowErrors.js';
import { DEFAULT_COOLDOWN_BASE_MS, DEFAULT_MAX_COOLDOWN_MS } from './infrastructure/queue/RateLimiter.js';
import { RateLimiterStrategySchema } from './infrastructure/queue/RateLimiterRegistry.js';
import { DEFAULT_RETRY_CONFIG } from './utils/retry.js';

// Load environment variables from .env file
dotenv.config();

const ConfigSchema = z.object({
  debug: z.boolean(),
  ollama: z.object({
    apiUrl: z.string().url('Invalid Ollama URL format'),
    model: z.string().min(1, 'Model must not be empty'),
    keepAlive: z.string().min(1).optional(),
  }),
  rateLimit: RateLimiterStrategySchema.extend({
    cooldownBaseMs: z.number().int().min(0, 'Cooldown base must not be negative'),
    maxCooldownMs: z.number().int().min(0, 'Maximum cooldown must not be negative'),
  }).refine((value) => value.maxCooldownMs >= value.cooldownBaseMs, {
    message: 'Maximum cooldown must be at least the cooldown base',
    path: ['maxCooldownMs'],
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(0).max(60000),
    maxDelayMs: z.number().int().min(0).max(600000),
    multiplier: z.number().min(1),
    timeoutMs: z.number().int().min(1000),
  }),
  workflow: z.object({
    maxSteps: z.number().int().min(1, 'Max steps must be at least 1').optional(),
    promptsPath: z.string().min(1),
  }),
  mcp: z.object({
    command: z.string().min(1).optional(),
    args: z.array(z.string()),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Invalid configuration. `issues` holds one line per problem found.
 */
export class ConfigError extends ConfigurationError {
  constructor(readonly issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  • ${issue}`).join('\n')}`);
  }
}

export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positionals: string[];
}

const BOOLEAN_FLAGS = new Set(['debug', 'help']);

/**
 * Parse command line arguments
 * Usage: tool-relay ask "What time is it?" --model llama3.2:1b --rpm 60 --debug
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const [key, inline] = splitFlag(arg.slice(2));
      const next = argv[i + 1];

      if (inline !== undefined) {
        flags[key] = inline;
      } else if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else {
      positionals.push(arg);
    }
  }

  return { flags, positionals };
}

function splitFlag(flag: string): [string, string | undefined] {
  const eq = flag.indexOf('=');
  return eq === -1 ? [flag, undefined] : [flag.slice(0, eq), flag.slice(eq + 1)];
}

/**
 * Build the configuration from CLI flags, environment variables and defaults,
 * in that order of precedence. Throws ConfigError listing every invalid field.
 */
export function getConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const { flags } = parseArgs(argv);

  // Helpers to get a value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const flag = flags[cliKey];
    if (typeof flag === 'string') return flag;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const flag = flags[cliKey];
    if (typeof flag === 'string') return flag;
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const flag = flags[cliKey];
    if (flag !== undefined) return flag === true || flag === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const raw = getOptionalString(cliKey, envKey);
    return raw === undefined ? defaultValue : Number(raw);
  };

  const getOptionalNumber = (cliKey: string, envKey: string): number | undefined => {
    const raw = getOptionalString(cliKey, envKey);
    return raw === undefined ? undefined : Number(raw);
  };

  const mcpCommand = getOptionalString('mcp-command', 'MCP_COMMAND')?.trim().split(/\s+/) ?? [];

  const rawConfig = {
    debug: getBoolean('debug', 'DEBUG', false),
    ollama: {
      apiUrl: getString('ollama-url', 'OLLAMA_API_URL', 'http://localhost:11434'),
      model: getString('model', 'OLLAMA_MODEL', 'llama3.2:1b'),
      keepAlive: getOptionalString('keep-alive', 'OLLAMA_KEEP_ALIVE'),
    },
    rateLimit: {
      limiterId: getString('limiter-id', 'RATE_LIMITER_ID', 'global'),
      rpm: getNumber('rpm', 'RATE_LIMIT_RPM', 500),
      burstSize: getNumber('burst-size', 'RATE_LIMIT_BURST_SIZE', 10),
      cooldownBaseMs: getNumber('cooldown-base', 'RATE_LIMIT_COOLDOWN_BASE_MS', DEFAULT_COOLDOWN_BASE_MS),
      maxCooldownMs: getNumber('cooldown-max', 'RATE_LIMIT_COOLDOWN_MAX_MS', DEFAULT_MAX_COOLDOWN_MS),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_CONFIG.maxAttempts),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', DEFAULT_RETRY_CONFIG.initialDelayMs),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_CONFIG.maxDelayMs),
      multiplier: DEFAULT_RETRY_CONFIG.multiplier,
      timeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', DEFAULT_RETRY_CONFIG.timeoutMs),
    },
    workflow: {
      maxSteps: getOptionalNumber('max-steps', 'MAX_STEPS'),
      promptsPath: path.resolve(getString('prompts-path', 'PROMPTS_PATH', 'prompts')),
    },
    mcp: {
      command: mcpCommand[0],
      args: mcpCommand.slice(1),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║                   Tool Relay - Configuration                     ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n🔗 Ollama: ${config.ollama.apiUrl} ${config.debug ? '(Debug Mode)' : ''}`);
  console.error(`🤖 Model: ${config.ollama.model}`);

  const { rateLimit, retry, workflow } = config;
  console.error(
    `\n⚙️  Limiter "${rateLimit.limiterId}": ${rateLimit.rpm} rpm | burst ${rateLimit.burstSize} | cooldown ${rateLimit.cooldownBaseMs}-${rateLimit.maxCooldownMs}ms`
  );
  console.error(`🔁 Retry: ${retry.maxAttempts}x (${retry.initialDelayMs}-${retry.maxDelayMs}ms)`);
  console.error(`💭 Max steps: ${workflow.maxSteps ?? 'unlimited'}`);
  console.error(`📝 Prompts: ${workflow.promptsPath}`);

  if (config.mcp.command) {
    console.error(`\n📡 MCP tools: ${[config.mcp.command, ...config.mcp.args].join(' ')}`);
  }

  console.error('\n' + '─'.repeat(68));
}
