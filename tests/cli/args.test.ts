import { describe, it, expect } from 'vitest';
import { parseCliOptions } from '../../src/cli/args.js';
import { ConfigError } from '../../src/config/errors.js';

describe('parseCliOptions', () => {
  it('should collect positional arguments', () => {
    expect(parseCliOptions(['in.ndjson', 'out.ndjson'])).toEqual({
      positional: ['in.ndjson', 'out.ndjson'],
      overrides: {},
      jsonLogs: false,
      verbose: false,
    });
  });

  it('should map flags to config overrides', () => {
    const options = parseCliOptions([
      'in.ndjson',
      '--max-loc=200',
      '--max-dirs=4',
      '--min-diffs=3',
      '--concurrency=8',
      '--group-root-files',
      '--no-cache',
      '--cache-dir=/tmp/diffs',
      '--no-rate-limit',
      '--seconds-between-requests=0.5',
      'out.ndjson',
    ]);

    expect(options.positional).toEqual(['in.ndjson', 'out.ndjson']);
    expect(options.overrides).toEqual({
      maxLoc: 200,
      maxDirs: 4,
      minDiffs: 3,
      concurrency: 8,
      groupRootFiles: true,
      cache: { enabled: false, dir: '/tmp/diffs' },
      rateLimit: { enabled: false, secondsBetweenRequests: 0.5 },
    });
  });

  it('should read output and config flags', () => {
    const options = parseCliOptions(['--config=./atomize.config.yaml', '--json-logs', '--verbose']);

    expect(options.configPath).toBe('./atomize.config.yaml');
    expect(options.jsonLogs).toBe(true);
    expect(options.verbose).toBe(true);
  });

  it.each([['--max-loc=abc'], ['--max-loc=-1'], ['--concurrency='], ['--min-diffs'], ['--max-dirs=1.5']])(
    'should reject %s',
    (arg) => {
      expect(() => parseCliOptions([arg])).toThrow(ConfigError);
    }
  );

  it('should reject a negative request spacing', () => {
    expect(() => parseCliOptions(['--seconds-between-requests=-1'])).toThrow(
      '--seconds-between-requests expects a non-negative number of seconds, got "-1"'
    );
  });

  it('should reject unknown options', () => {
    expect(() => parseCliOptions(['--fast'])).toThrow('Unknown option "--fast"');
  });
});
