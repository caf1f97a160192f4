import { describe, it, expect } from 'vitest';
import { parseArguments } from '../src/cli-args';
import { ConfigError } from '../src/core/errors';

describe('parseArguments', () => {
  it('runs every layer by default', () => {
    expect(parseArguments([])).toEqual({ layer: 'all', initSchema: false });
  });

  it('reads layer, policy, report and schema flags', () => {
    expect(parseArguments(['--layer=bronze', '--policy=abort', '--report=out/run.csv', '--init-schema'])).toEqual({
      layer: 'bronze',
      policy: 'abort',
      report: 'out/run.csv',
      initSchema: true
    });
  });

  it('rejects unknown values and flags', () => {
    expect(() => parseArguments(['--layer=platinum'])).toThrow(ConfigError);
    expect(() => parseArguments(['--policy=retry'])).toThrow('--policy must be continue or abort (got "retry")');
    expect(() => parseArguments(['--report'])).toThrow('--report needs a file path');
    expect(() => parseArguments(['--case=1'])).toThrow('Unknown argument "--case=1"');
  });
});
