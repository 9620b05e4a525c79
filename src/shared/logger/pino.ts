import { pino, type Logger } from 'pino';

export const rootLogger: Logger = pino({
  name: 'qr-studio',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return rootLogger.child(bindings);
}
