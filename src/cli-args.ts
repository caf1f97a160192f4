import { ConfigError } from './core/errors';
import { FaultPolicy } from './core/types';

export type Layer = 'bronze' | 'silver' | 'gold' | 'all';

export interface CliArguments {
  layer: Layer;
  policy?: FaultPolicy;
  report?: string;
  initSchema: boolean;
}

function isLayer(value: string): value is Layer {
  return value === 'bronze' || value === 'silver' || value === 'gold' || value === 'all';
}

function isPolicy(value: string): value is FaultPolicy {
  return value === 'continue' || value === 'abort';
}

export function parseArguments(args: readonly string[]): CliArguments {
  const parsed: CliArguments = { layer: 'all', initSchema: false };

  for (const arg of args) {
    const [flag, value = ''] = arg.split('=', 2);
    switch (flag) {
      case '--layer':
        if (!isLayer(value)) throw new ConfigError(`--layer must be bronze, silver, gold or all (got "${value}")`);
        parsed.layer = value;
        break;
      case '--policy':
        if (!isPolicy(value)) throw new ConfigError(`--policy must be continue or abort (got "${value}")`);
        parsed.policy = value;
        break;
      case '--report':
        if (!value) throw new ConfigError('--report needs a file path');
        parsed.report = value;
        break;
      case '--init-schema':
        parsed.initSchema = true;
        break;
      default:
        throw new ConfigError(`Unknown argument "${arg}"`);
    }
  }
  return parsed;
}
