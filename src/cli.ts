/**
 * Decimath – Command-line front end
 *
 *   decimath [--precision N] [--style standard|spreadsheet] [--digits N]
 *            [--trace] [expression ...]
 *
 * With expression arguments, their space-joined text is evaluated once.
 * Without, lines are read from stdin until EOF or `:quit`; `:precision N`
 * changes the process-wide precision between lines.
 *
 * Environment:
 *   DECIMATH_PRECISION  starting precision (overridden by --precision)
 *   LOG_LEVEL           pino level for the JSON log lines on stderr
 *                       (default: warn, or debug with --trace)
 *
 * License: Apache-2.0
 */

import { createInterface } from 'node:readline';

import pino from 'pino';
import type { Logger } from 'pino';

import type { CatalogStyle } from './core/catalog';
import { createEngine } from './core/engine';
import type { Engine } from './core/engine';
import { isDecimathError } from './core/errors';
import type { ApplyStep } from './core/evaluator';
import { formatNumber } from './core/format';
import { getPrecision, isValidPrecision, setPrecision } from './core/precision';
import { formatError } from './utils/inspect';

export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
}

export const USAGE = `Usage: decimath [options] [expression ...]

Options:
  --precision N     significant digits used for evaluation (default 64)
  --style NAME      operator precedence preset: standard | spreadsheet
  --digits N        significant digits shown in results
  --trace           log every operator, function and constant application
  -h, --help        show this message

Without an expression, lines are read from stdin.
Commands: ":precision N" changes the precision, ":quit" exits.
`;

/////////////////////////////
// Argument parsing        //
/////////////////////////////

export interface CliArgs {
  precision?: number;
  style: CatalogStyle;
  digits?: number;
  trace: boolean;
  help: boolean;
  expression: string[];
}

export class UsageError extends Error {
  public readonly name: string = 'UsageError';
}

/**
 * Parse command-line arguments. Anything that is not a known `--option` is
 * expression text, so `decimath -2^2` works without `--`.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    style: 'standard',
    trace: false,
    help: false,
    expression: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--') {
      args.expression.push(...argv.slice(i + 1));
      break;
    }

    if (arg === '-h' || arg === '--help') {
      args.help = true;
      continue;
    }

    if (arg === '--trace') {
      args.trace = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      args.expression.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      i++;
      value = argv[i];
    }
    if (value === undefined) {
      throw new UsageError(`${name} needs a value`);
    }

    switch (name) {
      case '--precision': {
        const precision = parseCount(value);
        if (precision === undefined || !isValidPrecision(precision)) {
          throw new UsageError(`invalid precision "${value}"`);
        }
        args.precision = precision;
        break;
      }
      case '--digits': {
        const digits = parseCount(value);
        if (digits === undefined || digits < 1) {
          throw new UsageError(`invalid digit count "${value}"`);
        }
        args.digits = digits;
        break;
      }
      case '--style':
        if (value !== 'standard' && value !== 'spreadsheet') {
          throw new UsageError(`unknown style "${value}"`);
        }
        args.style = value;
        break;
      default:
        throw new UsageError(`unknown option ${name}`);
    }
  }

  return args;
}

function parseCount(text: string): number | undefined {
  return /^\d+$/.test(text.trim()) ? Number(text.trim()) : undefined;
}

/////////////////////////////
// Logging                 //
/////////////////////////////

const LEVELS: readonly string[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function createCliLogger(io: CliIO, trace: boolean): Logger {
  const requested = io.env.LOG_LEVEL?.trim().toLowerCase();
  const level =
    requested !== undefined && LEVELS.includes(requested)
      ? requested
      : trace
        ? 'debug'
        : 'warn';
  return pino({ level, base: undefined }, io.stderr);
}

function traceStep(logger: Logger): (step: ApplyStep) => void {
  return (step) => {
    logger.debug(
      {
        kind: step.kind,
        id: step.descriptor.id,
        operands: step.operands.map((x) => x.toString()),
        result: step.result.toString(),
        index: step.index,
      },
      'apply',
    );
  };
}

/////////////////////////////
// Main                    //
/////////////////////////////

/**
 * Run the CLI and resolve with the process exit code:
 * 0 on success, 1 when an expression fails, 2 for usage errors.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr.write(`decimath: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  if (args.help) {
    io.stdout.write(USAGE);
    return 0;
  }

  const logger = createCliLogger(io, args.trace);

  const fromEnv = io.env.DECIMATH_PRECISION;
  if (fromEnv !== undefined && fromEnv.trim() !== '') {
    const precision = parseCount(fromEnv);
    if (precision !== undefined && isValidPrecision(precision)) {
      setPrecision(precision);
    } else {
      logger.warn({ value: fromEnv }, 'ignoring invalid DECIMATH_PRECISION');
    }
  }
  if (args.precision !== undefined) {
    setPrecision(args.precision);
  }

  const engine = createEngine({
    style: args.style,
    logger,
    onApply: args.trace ? traceStep(logger) : undefined,
  });
  const format = { significantDigits: args.digits };

  if (args.expression.length > 0) {
    const source = args.expression.join(' ');
    const result = engine.tryEvaluate(source);
    if (!result.ok) {
      io.stderr.write(`${formatError(result.error, source).detail}\n`);
      return 1;
    }
    io.stdout.write(`${formatNumber(result.value, format)}\n`);
    return 0;
  }

  return runLines(engine, io, format);
}

async function runLines(
  engine: Engine,
  io: CliIO,
  format: { significantDigits?: number },
): Promise<number> {
  const rl = createInterface({ input: io.stdin, crlfDelay: Infinity });
  let failed = false;

  try {
    for await (const raw of rl) {
      const line = raw.trim();
      if (line === '') continue;

      if (line === ':quit') break;

      if (line === ':precision' || line.startsWith(':precision ')) {
        const value = line.slice(':precision'.length).trim();
        if (value !== '') {
          const precision = parseCount(value);
          if (precision === undefined || !isValidPrecision(precision)) {
            io.stderr.write(`invalid precision "${value}"\n`);
            continue;
          }
          setPrecision(precision);
        }
        io.stdout.write(`precision = ${getPrecision()}\n`);
        continue;
      }

      try {
        const value = engine.evaluate(line);
        io.stdout.write(`= ${formatNumber(value, format)}\n`);
      } catch (err) {
        if (!isDecimathError(err)) throw err;
        failed = true;
        io.stdout.write(`${formatError(err, line).detail}\n`);
      }
    }
  } finally {
    rl.close();
  }

  return failed ? 1 : 0;
}
