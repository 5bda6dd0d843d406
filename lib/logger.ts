// Console-backed logger. Debug output is only emitted when SPAMGRAPH_DEBUG is set.

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type Level = 'info' | 'warn' | 'error' | 'debug';

const emit = (level: Level, message: string, context?: LogContext): void => {
  if (level === 'debug' && !process.env.SPAMGRAPH_DEBUG) return;
  const logger = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  const line = `[spamgraph] ${level.toUpperCase()} ${message}`;
  if (context && Object.keys(context).length > 0) {
    logger(line, context);
    return;
  }
  logger(line);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
