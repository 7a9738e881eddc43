import { ConfigError, formatError } from './error-handler';
import { isYear } from './sections';

/**
 * Minimal argv reader for the scripts: `--flag`, `--option value`, positionals.
 * An option in `multiValueOptions` takes every value up to the next `--`; any
 * other value option takes exactly one.
 */
export class CliArgs {
  private readonly positional: string[] = [];
  private readonly options = new Map<string, string[]>();
  private readonly flags = new Set<string>();

  constructor(args: string[], valueOptions: string[], multiValueOptions: string[] = []) {
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (!arg.startsWith('--')) {
        this.positional.push(arg);
        continue;
      }
      const name = arg.slice(2);
      const multi = multiValueOptions.includes(name);
      if (!multi && !valueOptions.includes(name)) {
        this.flags.add(name);
        continue;
      }
      const values: string[] = [];
      while (i + 1 < args.length && !args[i + 1].startsWith('--') && (multi || values.length === 0)) {
        values.push(args[++i]);
      }
      if (values.length === 0) {
        throw new ConfigError(`--${name} requires a value`);
      }
      this.options.set(name, [...(this.options.get(name) ?? []), ...values]);
    }
  }

  static fromProcess(valueOptions: string[], multiValueOptions: string[] = []): CliArgs {
    return new CliArgs(process.argv.slice(2), valueOptions, multiValueOptions);
  }

  has(flag: string): boolean {
    return this.flags.has(flag);
  }

  option(name: string): string | undefined {
    return this.options.get(name)?.[0];
  }

  /** All values given for an option; comma-separated values are split. */
  list(name: string): string[] {
    return (this.options.get(name) ?? []).flatMap(v => v.split(',')).map(v => v.trim()).filter(Boolean);
  }

  positionalAt(index: number, label: string): string {
    const value = this.positional[index];
    if (value === undefined) {
      throw new ConfigError(`Missing required argument: ${label}`);
    }
    return value;
  }

  year(index: number): string {
    const year = this.positionalAt(index, 'year');
    if (!isYear(year)) {
      throw new ConfigError(`Year must be four digits, got "${year}"`);
    }
    return year;
  }
}

/**
 * Run a script's main function and set the exit code: main's result, or 1 when it throws.
 * Configuration errors print as one line; anything else prints the full error report.
 */
export function runCli(main: () => Promise<number>): void {
  void main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      if (error instanceof ConfigError) {
        console.error(`\n❌ ${error.message}`);
      } else {
        console.error(formatError(error));
      }
      process.exitCode = 1;
    }
  );
}
