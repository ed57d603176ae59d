/**
 * Decimath – Public entry point
 *
 * This file defines the public API surface of Decimath:
 *  - Engine factory (`createEngine`) and the one-shot helpers
 *    (`evaluateExpression`, `formatExpression`).
 *  - Grammar catalogs: built-in presets plus localized and restricted
 *    variants.
 *  - The process-wide precision setting.
 *  - Errors and error formatting.
 *
 * Typical usage:
 *
 *   import { createEngine, formatNumber, setPrecision } from 'decimath';
 *
 *   setPrecision(128);
 *   const engine = createEngine();
 *
 *   formatNumber(engine.evaluate('2 * asin(1)'), { significantDigits: 30 });
 *   // "3.14159265358979323846264338328"
 *
 *   engine.evaluateToString('7 % -3'); // "-2"
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Core engine & types     //
/////////////////////////////

import type { Decimal } from 'decimal.js';

import { createEngine } from './core/engine';
import type { EngineOptions } from './core/engine';
import { formatNumber } from './core/format';
import type { FormatOptions } from './core/format';

/////////////////////////////
// Convenience helpers     //
/////////////////////////////

/**
 * One-shot helper: evaluate with a fresh engine.
 *
 *   evaluateExpression('sum(1, 2, 3) / 4').toString(); // "1.5"
 */
export function evaluateExpression(
  source: string,
  options?: EngineOptions,
): Decimal {
  return createEngine(options).evaluate(source);
}

/**
 * One-shot helper: evaluate with a fresh engine and format the result.
 *
 *   formatExpression('1 / 3', { precision: 10 });               // "0.3333333333"
 *   formatExpression('pi', { maxFractionDigits: 4 });           // "3.1416"
 */
export function formatExpression(
  source: string,
  options: EngineOptions & FormatOptions = {},
): string {
  const { significantDigits, maxFractionDigits, ...engineOptions } = options;
  return formatNumber(evaluateExpression(source, engineOptions), {
    significantDigits,
    maxFractionDigits,
  });
}

/////////////////////////////
// Public exports          //
/////////////////////////////

// Engine
export { createEngine, formatNumber };

// Catalog
export {
  GrammarCatalog,
  createCatalog,
  getDefaultCatalog,
  getDefaultDefinition,
  localizeCatalog,
  restrictCatalog,
} from './core/catalog';

// Precision
export {
  DEFAULT_PRECISION,
  MAX_PRECISION,
  getPrecision,
  resetPrecision,
  setPrecision,
} from './core/precision';

// Lexing & evaluation building blocks
export { tokenize } from './core/tokenizer';
export { evaluateTokens } from './core/evaluator';
export type { EvalScope } from './core/evaluator';
export { getNumberSystem } from './core/number';
export type { NumberSystem, NumericOutcome } from './core/number';

// Errors
export {
  ArityError,
  DecimathError,
  InvalidOperandError,
  LexicalError,
  PrecisionLimitError,
  StructuralError,
  computeLineAndColumn,
  isDecimathError,
} from './core/errors';

// Utilities: inspection
export { formatError, toDiagnostic } from './utils/inspect';
export type { FormattedError } from './utils/inspect';

// Types
export type * from './core/types';
