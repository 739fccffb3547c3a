import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export function createLogger(level: LogLevel): Logger {
  return pino({
    level,
    transport: {
      target: 'pino/file',
      options: { destination: 1 }, // stdout
    },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** 테스트/스크립트용: 출력 없음 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function childLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
