export type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export interface Logger {
  debug: LoggerFn;
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
}

const noop: LoggerFn = () => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

const emit = (level: keyof Logger, message: string, context?: LogContext): void => {
  // stdout belongs to the host application; keep diagnostics on stderr.
  const write = level === 'warn' ? console.warn : console.error;
  const line = `[source-client] ${level}: ${message}`;
  if (context && Object.keys(context).length > 0) {
    write(line, context);
    return;
  }
  write(line);
};

export const consoleLogger: Logger = {
  debug: (message, context) => emit('debug', message, context),
  info: (message, context) => emit('info', message, context),
  warn: (message, context) => emit('warn', message, context),
  error: (message, context) => emit('error', message, context),
};
