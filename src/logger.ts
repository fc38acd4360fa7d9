import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

const lineFormat = winston.format.printf((info) => {
  const component = typeof info.component === 'string' ? ` [${info.component}]` : '';
  return `${String(info.timestamp)} ${info.level.toUpperCase().padEnd(5)}${component} ${String(info.message)}`;
});

// stdout carries reports; every log line goes to stderr.
export const logger = winston.createLogger({
  level: initialLevel(),
  format: winston.format.combine(winston.format.timestamp(), lineFormat),
  transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })]
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
