/**
 * Tool Relay - library entry point
 */

export * from './core/errors/WorkflowErrors.js';
export * from './core/entities/Message.js';
export * from './core/entities/Chat.js';
export * from './core/entities/Generation.js';
export * from './core/entities/RunContext.js';
export type { IGenerator } from './core/interfaces/IGenerator.js';
export type { ITool, ToolFunctionDefinition } from './core/interfaces/ITool.js';
export * from './core/templates/index.js';

export * from './application/workflow/Step.js';
export * from './application/workflow/ChatWorkflow.js';
export * from './application/tools/Tool.js';

export * from './infrastructure/generators/BaseGenerator.js';
export * from './infrastructure/generators/OllamaGenerator.js';
export * from './infrastructure/mcp/McpToolset.js';
export * from './infrastructure/queue/AdmissionQueue.js';
export * from './infrastructure/queue/RateLimiter.js';
export * from './infrastructure/queue/RateLimiterRegistry.js';
export * from './infrastructure/templates/PromptsManager.js';

export { createLogger, setDebugLogging, isDebugLogging } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export * from './utils/retry.js';
export { getConfig, parseArgs, printConfigInfo, ConfigError } from './config.js';
export type { Config, ParsedArgs } from './config.js';
