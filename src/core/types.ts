/**
 * Decimath – Core / public types
 *
 * Collects the public type aliases so consumers can import them from one
 * place without knowing the internal file layout. Types only; nothing here
 * has runtime behavior.
 *
 *   import type {
 *     Engine,
 *     EngineOptions,
 *     ApplyStep,
 *     Token,
 *     DecimathErrorCode,
 *   } from 'decimath';
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Re-exports              //
/////////////////////////////

export type { Token, TokenType } from './tokens';

export type { DecimathErrorCode, DecimathErrorOptions } from './errors';

export type {
  Associativity,
  BracketPair,
  CatalogDefinition,
  CatalogLabels,
  CatalogSelection,
  CatalogStyle,
  ConstantDescriptor,
  ConstantId,
  FunctionDescriptor,
  FunctionId,
  OperatorDescriptor,
  OperatorId,
} from './catalog';

export type { ApplyStep } from './evaluator';

export type { FormatOptions } from './format';

export type { TokenStream } from './tokenizer';

export type {
  ApplyHook,
  Engine,
  EngineOptions,
  EvaluationResult,
  NormalizedEngineOptions,
} from './engine';

/////////////////////////////
// Convenience types       //
/////////////////////////////

import type { ApplyStep } from './evaluator';
import type { DecimathErrorCode } from './errors';

/**
 * Descriptor kind reported in an `ApplyStep`.
 */
export type ApplyKind = ApplyStep['kind'];

/**
 * A location in a source string, as carried by `DecimathError`.
 */
export interface DiagnosticLocation {
  /**
   * 0-based character offset.
   */
  index: number;

  /**
   * 1-based line and column; see `computeLineAndColumn`.
   */
  line?: number;
  column?: number;

  length?: number;
}

/**
 * Plain-data shape of an error, for tools that serialize diagnostics
 * (editor hints, JSON APIs).
 */
export interface Diagnostic {
  code: DecimathErrorCode;
  message: string;
  note?: string;
  location?: DiagnosticLocation;
}
