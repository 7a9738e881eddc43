/**
 * Unit Tests for script argument parsing
 */

import { CliArgs, runCli } from '../cli-args';
import { ConfigError } from '../error-handler';

describe('CliArgs', () => {
  test('should separate positionals, flags and options', () => {
    const args = new CliArgs(['2024', '/data/2024', '--dry-run', '--step', 'views'], ['step']);

    expect(args.year(0)).toBe('2024');
    expect(args.positionalAt(1, 'data_dir')).toBe('/data/2024');
    expect(args.has('dry-run')).toBe(true);
    expect(args.has('strict')).toBe(false);
    expect(args.option('step')).toBe('views');
    expect(args.option('config')).toBeUndefined();
  });

  test('should collect list options given with commas or spaces', () => {
    const args = new CliArgs(['--years', '2016,2018', '2020', '--sections', 'a_reg'], [], ['years', 'sections']);
    expect(args.list('years')).toEqual(['2016', '2018', '2020']);
    expect(args.list('sections')).toEqual(['a_reg']);
    expect(args.list('missing')).toEqual([]);
  });

  test('should give a single-value option only the next token', () => {
    const args = new CliArgs(['2024', '--step', 'views', './data', '--years', '2016', '2018'], ['step'], ['years']);

    expect(args.option('step')).toBe('views');
    expect(args.positionalAt(1, 'data_dir')).toBe('./data');
    expect(args.list('years')).toEqual(['2016', '2018']);
  });

  test('should reject an option without a value', () => {
    expect(() => new CliArgs(['--step', '--dry-run'], ['step'])).toThrow('--step requires a value');
  });

  test('should reject missing and malformed positionals', () => {
    const args = new CliArgs(['24'], []);
    expect(() => args.year(0)).toThrow('Year must be four digits, got "24"');
    expect(() => args.positionalAt(1, 'data_dir')).toThrow(ConfigError);
  });
});

describe('runCli', () => {
  const originalExitCode = process.exitCode;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = originalExitCode;
  });

  function settle(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
  }

  test("should set the exit code to main's result", async () => {
    runCli(async () => 1);
    await settle();
    expect(process.exitCode).toBe(1);
  });

  test('should print configuration errors on one line and exit 1', async () => {
    runCli(async () => {
      throw new ConfigError('Missing required argument: year');
    });
    await settle();
    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('\n❌ Missing required argument: year');
  });
});
