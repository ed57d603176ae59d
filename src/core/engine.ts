/**
 * Decimath – Engine
 *
 * The public `createEngine` API. An engine binds a grammar catalog, a
 * precision policy, a logger and an optional `onApply` callback, and
 * evaluates expressions with them.
 *
 * Engines are immutable: `withPrecision` and `withOptions` return new
 * engines and leave the original unchanged.
 *
 * Precision: an engine created with `precision` always uses it. Otherwise
 * the process-wide setting (see `precision.ts`) is read once at the start
 * of every evaluation.
 *
 * License: Apache-2.0
 */

import type { Decimal } from 'decimal.js';
import pino from 'pino';
import type { Logger } from 'pino';

import { getDefaultCatalog } from './catalog';
import type { CatalogStyle, GrammarCatalog } from './catalog';
import {
  createStructuralError,
  isDecimathError,
} from './errors';
import type { DecimathError } from './errors';
import { evaluateTokens } from './evaluator';
import type { ApplyStep } from './evaluator';
import { formatNumber } from './format';
import type { FormatOptions } from './format';
import { getNumberSystem } from './number';
import { getPrecision, isValidPrecision } from './precision';
import { tokenize } from './tokenizer';
import type { TokenStream } from './tokenizer';

//////////////////////
// Public interfaces //
//////////////////////

/**
 * Callback invoked after every operator, function and constant
 * application, with the caller's evaluation context.
 */
export type ApplyHook<Context> = (
  step: ApplyStep,
  context: Context | undefined,
) => void;

export interface EngineOptions<Context = unknown> {
  /**
   * Built-in precedence preset. Ignored when `catalog` is given.
   * Default: 'standard'.
   */
  style?: CatalogStyle;

  /**
   * Custom catalog (reduced, localized, …).
   */
  catalog?: GrammarCatalog;

  /**
   * Fixed number of significant digits for this engine. When omitted, the
   * process-wide precision is read at each evaluation.
   */
  precision?: number;

  /**
   * Reject longer sources with a StructuralError before lexing.
   */
  maxExpressionLength?: number;

  /**
   * pino logger receiving one debug record per evaluation.
   * Default: a disabled logger.
   */
  logger?: Logger;

  onApply?: ApplyHook<Context>;
}

/**
 * Options with defaults applied.
 */
export interface NormalizedEngineOptions<Context = unknown> {
  catalog: GrammarCatalog;
  precision?: number;
  maxExpressionLength?: number;
  logger: Logger;
  onApply?: ApplyHook<Context>;
}

export type EvaluationResult =
  | { ok: true; value: Decimal }
  | { ok: false; error: DecimathError };

export interface Engine<Context = unknown> {
  readonly options: NormalizedEngineOptions<Context>;

  /**
   * Evaluate an expression.
   *
   * Throws a DecimathError subclass (LexicalError, StructuralError,
   * ArityError, InvalidOperandError) on failure, or whatever `onApply`
   * throws.
   */
  evaluate(source: string, context?: Context): Decimal;

  /**
   * Like `evaluate`, but returns DecimathErrors instead of throwing them.
   */
  tryEvaluate(source: string, context?: Context): EvaluationResult;

  /**
   * Evaluate and format the result (see `formatNumber`).
   */
  evaluateToString(
    source: string,
    context?: Context,
    format?: FormatOptions,
  ): string;

  /**
   * Token stream for `source` under this engine's catalog.
   */
  tokenize(source: string): TokenStream;

  withPrecision(precision: number): Engine<Context>;

  withOptions(patch: EngineOptions<Context>): Engine<Context>;
}

//////////////////////////////
// Default options & helpers //
//////////////////////////////

let disabledLogger: Logger | undefined;

function getDisabledLogger(): Logger {
  disabledLogger ??= pino({ enabled: false });
  return disabledLogger;
}

function normalizeOptions<Context>(
  opts: EngineOptions<Context> = {},
): NormalizedEngineOptions<Context> {
  if (opts.precision !== undefined && !isValidPrecision(opts.precision)) {
    throw new RangeError(
      `Decimath: precision must be a positive integer, got ${opts.precision}.`,
    );
  }
  if (
    opts.maxExpressionLength !== undefined &&
    !(Number.isInteger(opts.maxExpressionLength) && opts.maxExpressionLength >= 0)
  ) {
    throw new RangeError(
      `Decimath: maxExpressionLength must be a non-negative integer, got ${opts.maxExpressionLength}.`,
    );
  }

  return {
    catalog: opts.catalog ?? getDefaultCatalog(opts.style ?? 'standard'),
    precision: opts.precision,
    maxExpressionLength: opts.maxExpressionLength,
    logger: opts.logger ?? getDisabledLogger(),
    onApply: opts.onApply,
  };
}

///////////////////////////////
// Engine implementation core //
///////////////////////////////

class EngineImpl<Context> implements Engine<Context> {
  public readonly options: NormalizedEngineOptions<Context>;

  constructor(options: NormalizedEngineOptions<Context>) {
    this.options = options;
  }

  evaluate(source: string, context?: Context): Decimal {
    if (typeof source !== 'string') {
      throw new TypeError('Decimath: expression source must be a string.');
    }

    const { catalog, logger, maxExpressionLength, onApply } = this.options;

    if (maxExpressionLength !== undefined && source.length > maxExpressionLength) {
      throw createStructuralError({
        message: `expression is longer than ${maxExpressionLength} characters`,
        source,
        index: maxExpressionLength,
      });
    }

    // Read once: every step of this evaluation uses the same precision.
    const precision = this.options.precision ?? getPrecision();
    const started = performance.now();

    try {
      const value = evaluateTokens(tokenize(source, catalog), {
        catalog,
        numbers: getNumberSystem(precision),
        context,
        onApply,
      });
      logger.debug(
        {
          precision,
          length: source.length,
          durationMs: performance.now() - started,
        },
        'expression evaluated',
      );
      return value;
    } catch (err) {
      if (isDecimathError(err)) {
        logger.debug(
          {
            precision,
            length: source.length,
            code: err.code,
            index: err.index,
          },
          'expression rejected',
        );
      }
      throw err;
    }
  }

  tryEvaluate(source: string, context?: Context): EvaluationResult {
    try {
      return { ok: true, value: this.evaluate(source, context) };
    } catch (err) {
      if (isDecimathError(err)) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  evaluateToString(
    source: string,
    context?: Context,
    format?: FormatOptions,
  ): string {
    return formatNumber(this.evaluate(source, context), format);
  }

  tokenize(source: string): TokenStream {
    return tokenize(source, this.options.catalog);
  }

  withPrecision(precision: number): Engine<Context> {
    return this.withOptions({ precision });
  }

  withOptions(patch: EngineOptions<Context>): Engine<Context> {
    const { catalog, precision, maxExpressionLength, logger, onApply } =
      this.options;
    return new EngineImpl(
      normalizeOptions<Context>({
        catalog:
          patch.catalog ??
          (patch.style !== undefined ? getDefaultCatalog(patch.style) : catalog),
        precision: 'precision' in patch ? patch.precision : precision,
        maxExpressionLength:
          'maxExpressionLength' in patch
            ? patch.maxExpressionLength
            : maxExpressionLength,
        logger: patch.logger ?? logger,
        onApply: 'onApply' in patch ? patch.onApply : onApply,
      }),
    );
  }
}

////////////////////////
// Public entry point //
////////////////////////

/**
 * Create a new Decimath engine.
 *
 * ```ts
 * import { createEngine, formatNumber } from 'decimath';
 *
 * const engine = createEngine({ precision: 100 });
 * formatNumber(engine.evaluate('2 * asin(1)'), { significantDigits: 20 });
 * // "3.1415926535897932385"
 * ```
 */
export function createEngine<Context = unknown>(
  options?: EngineOptions<Context>,
): Engine<Context> {
  return new EngineImpl<Context>(normalizeOptions(options));
}
