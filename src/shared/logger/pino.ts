import pino, { type Logger } from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function resolveLevel(value: string | undefined): string {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? 'warn';
}

// stdout belongs to the wizard, logs go to stderr.
const rootLogger: Logger = pino(
  {
    name: 'stillmotion',
    level: resolveLevel(process.env.LOG_LEVEL),
  },
  pino.destination(2),
);

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return rootLogger.child(bindings);
}

export function setLogLevel(level: string): void {
  rootLogger.level = resolveLevel(level);
}
