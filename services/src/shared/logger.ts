type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type LogMeta = Record<string, unknown>;

export const log = (level: LogLevel, message: string, meta: LogMeta = {}) => {
  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...meta
  };

  // One JSON object per line so CloudWatch Insights can query the fields.
  console.log(JSON.stringify(entry));
};

export const logInfo = (message: string, meta?: LogMeta) => log('info', message, meta ?? {});
export const logWarn = (message: string, meta?: LogMeta) => log('warn', message, meta ?? {});
export const logError = (message: string, meta?: LogMeta) => log('error', message, meta ?? {});
export const logDebug = (message: string, meta?: LogMeta) => log('debug', message, meta ?? {});

export interface ScopedLogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

/** Binds `scope` (trace id, actor, tournament) into every entry. */
export const scopedLogger = (scope: LogMeta): ScopedLogger => ({
  info: (message, meta) => logInfo(message, { ...scope, ...meta }),
  warn: (message, meta) => logWarn(message, { ...scope, ...meta }),
  error: (message, meta) => logError(message, { ...scope, ...meta }),
  debug: (message, meta) => logDebug(message, { ...scope, ...meta })
});
