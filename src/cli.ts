import { ConfigError } from './errors.js';
import type { CliOverrides } from './config.js';

export interface CliArgs {
  readonly overrides: CliOverrides;
  readonly envFile?: string;
  readonly seedRefPrice: boolean;
}

const USAGE = 'usage: atr-bot [--paper | --live] [--once] [--env-file <path>] [--seed-ref-price]';

/**
 * argv (node, script 제외) 파싱
 * --paper와 --live를 같이 주면 뒤에 온 쪽이 이긴다
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  let paper: boolean | undefined;
  let once: boolean | undefined;
  let envFile: string | undefined;
  let seedRefPrice = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--paper':
        paper = true;
        break;
      case '--live':
        paper = false;
        break;
      case '--once':
        once = true;
        break;
      case '--seed-ref-price':
        seedRefPrice = true;
        break;
      case '--env-file': {
        const next = argv[i + 1];
        if (next === undefined || next.startsWith('--')) {
          throw new ConfigError([`--env-file: path required. ${USAGE}`]);
        }
        envFile = next;
        i++;
        break;
      }
      default:
        throw new ConfigError([`unknown argument "${arg ?? ''}". ${USAGE}`]);
    }
  }

  const overrides: CliOverrides = {
    ...(paper !== undefined ? { paper } : {}),
    ...(once !== undefined ? { once } : {}),
  };
  return envFile !== undefined ? { overrides, envFile, seedRefPrice } : { overrides, seedRefPrice };
}
