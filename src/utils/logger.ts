import winston from 'winston';

// Define log levels with colors
const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(logColors);

export type LogLevel = keyof typeof logLevels;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(logLevels, value);
}

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message }) => {
    // Only output the timestamp, level, and message - no metadata
    return `${timestamp} [${level}]: ${message}`;
  })
);

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
const logLevel: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : 'info';

// Everything goes to stderr so dry-run payloads on stdout stay pipeable
const logger = winston.createLogger({
  levels: logLevels,
  level: logLevel,
  defaultMeta: { service: 'starr-collector' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: Object.keys(logLevels),
    }),
  ],
});

export default logger;

export type Logger = winston.Logger;

export function updateLogLevel(level: LogLevel): void {
  logger.level = level;
  logger.debug(`📝 Log level set to ${level}`);
}

// Helper utility for consistent structured logging across the app
export function startOperation(name: string, meta: Record<string, unknown> = {}, log: Logger = logger) {
  const startTime = Date.now();
  log.debug(`▶️ START ${name}`, { ...meta, operation: name, phase: 'start', ts: new Date().toISOString() });
  return (resultMeta: Record<string, unknown> = {}, success = true) => {
    const duration = Date.now() - startTime;
    const level = success ? 'debug' : 'warn';
    log.log(level, `◀️ END ${name} (${duration}ms)`, { ...meta, ...resultMeta, operation: name, phase: 'end', durationMs: duration, ts: new Date().toISOString() });
  };
}
