import { parseArgs } from 'util';
import { CliOptionsSchema, type CliOptions } from '../schemas/cli.js';
import { ValidationError, errorMessage } from '../utils/errors.js';

export const USAGE = `Usage: portsweep [host] [options]

Scan a host for open TCP ports and identify the services behind them.
By default every port defined in the port list configuration is scanned.

Options:
  -p, --port <port>          Check a single port
  -r, --range <start> <end>  Scan an inclusive port range
  -l, --list <names>         Scan ports from named lists (comma-separated, 'all' for every list)
      --show-lists           Show available port lists and exit
      --show-closed          Include closed ports in the output
      --no-service-detection Skip service identification
  -t, --timeout <seconds>    Connection timeout (default: 3)
      --threads <n>          Concurrent connections (default: 50)
      --fast                 Use a 1 second timeout
      --check-deps           Show optional dependency status and exit
  -v, --verbose              Debug logging on stderr
      --version              Show version and exit
  -h, --help                 Show this help and exit`;

const RANGE_FLAGS = new Set(['-r', '--range']);

/**
 * Pull `--range <start> <end>` out of argv; parseArgs only takes single-value options.
 */
function extractRange(argv: readonly string[]): { rest: string[]; range: [string, string] | undefined } {
  const rest: string[] = [];
  let range: [string, string] | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]!;
    if (!RANGE_FLAGS.has(token)) {
      rest.push(token);
      continue;
    }

    const start = argv[i + 1];
    const end = argv[i + 2];
    if (start === undefined || end === undefined) {
      throw new ValidationError(`${token} requires two values: <start> <end>`);
    }
    range = [start, end];
    i += 2;
  }

  return { rest, range };
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { rest, range } = extractRange(argv);

  let parsed: ReturnType<typeof parseArgsStrict>;
  try {
    parsed = parseArgsStrict(rest);
  } catch (error) {
    throw new ValidationError(errorMessage(error));
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    throw new ValidationError(`Unexpected argument: ${positionals[1]}`);
  }

  const result = CliOptionsSchema.safeParse({
    host: positionals[0],
    port: values.port,
    range,
    list: values.list,
    showLists: values['show-lists'],
    showClosed: values['show-closed'],
    noServiceDetection: values['no-service-detection'],
    checkDeps: values['check-deps'],
    timeout: values.timeout,
    threads: values.threads,
    fast: values.fast,
    verbose: values.verbose,
    version: values.version,
    help: values.help,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid arguments');
  }

  return result.data;
}

function parseArgsStrict(args: string[]) {
  return parseArgs({
    args,
    strict: true,
    allowPositionals: true,
    options: {
      port: { type: 'string', short: 'p' },
      list: { type: 'string', short: 'l' },
      'show-lists': { type: 'boolean' },
      'show-closed': { type: 'boolean' },
      'no-service-detection': { type: 'boolean' },
      'check-deps': { type: 'boolean' },
      timeout: { type: 'string', short: 't' },
      threads: { type: 'string' },
      fast: { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      version: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
