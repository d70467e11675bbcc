/**
 * Component-prefixed logging to stderr.
 * stdout stays free for program output (the CLI prints transcripts there).
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

let debugEnabled = process.env.DEBUG === 'true';

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;

  return {
    debug(message: string) {
      if (debugEnabled) {
        console.error(`${prefix} [DEBUG] ${message}`);
      }
    },
    info(message: string) {
      console.error(`${prefix} ${message}`);
    },
    warn(message: string) {
      console.error(`${prefix} ⚠️  ${message}`);
    },
    error(message: string, error?: unknown) {
      if (error === undefined) {
        console.error(`${prefix} ✗ ${message}`);
      } else {
        console.error(`${prefix} ✗ ${message}:`, error);
      }
    },
  };
}
