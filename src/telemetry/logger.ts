type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export interface LoggerConfig {
  /** Emit debug-level lines (per-file probe decisions, record dumps). */
  verbose: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = { verbose: false };

let config: LoggerConfig = { ...DEFAULT_CONFIG };

export function configureLogger(overrides: Partial<LoggerConfig>): void {
  config = { ...config, ...overrides };
}

export function resetLoggerConfig(): void {
  config = { ...DEFAULT_CONFIG };
}

export function isVerbose(): boolean {
  return config.verbose;
}

const emit = (level: 'info' | 'warn' | 'error' | 'debug', message: string, context?: LogContext): void => {
  if (level === 'debug' && !config.verbose) return;
  // stdout is reserved for the scan/repair report (and `--json`); every log
  // line goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
