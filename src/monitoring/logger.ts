import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  level: config.logLevel,
  base: { service: 'signal-bridge', broker: config.broker, strategy: config.entryStrategy },
  transport: config.nodeEnv === 'development'
    ? { target: 'pino/file', options: { destination: 1 } }
    : undefined,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['privateKey', '*.privateKey', 'token', '*.token', 'headers.authorization'],
    censor: '[redacted]',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(name: string, bindings: Record<string, unknown> = {}) {
  return logger.child({ module: name, ...bindings });
}

export type Logger = ReturnType<typeof createChildLogger>;
