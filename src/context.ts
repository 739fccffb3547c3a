import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import type { AuditLog } from './safety/audit-log.js';

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * 프로세스 수명 동안 하나: main에서 만들어 명시적으로 넘긴다
 */
export interface AppContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly audit: AuditLog;
  readonly clock: Clock;
}
