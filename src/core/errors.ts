/**
 * Decimath – Error types & helpers
 *
 * One base class (`DecimathError`) carries the diagnostics shared by every
 * failure: a stable code, the source offset, line/column and a caret
 * snippet. Each failure category has its own subclass so callers can branch
 * with `instanceof` or on `code`.
 *
 * Common usage:
 *
 *  - Tokenizer:
 *      throw createLexicalError({
 *        message: 'unexpected character "$"',
 *        source,
 *        index: offset,
 *        text: '$',
 *      });
 *
 *  - Evaluator:
 *      throw createOperandError({
 *        message: 'division by zero',
 *        source,
 *        index: token.start,
 *        subject: '/',
 *      });
 *
 * License: Apache-2.0
 */

//////////////////////
// Error code enum  //
//////////////////////

/**
 * High-level error categories.
 */
export type DecimathErrorCode =
  /**
   * A character or sequence that matches no token rule.
   */
  | 'E_LEXICAL'
  /**
   * The token sequence has the wrong shape:
   *  - unmatched brackets, missing operands, empty input
   *  - unknown identifiers, separators outside a call
   */
  | 'E_SYNTAX'
  /**
   * A function called with too few or too many arguments.
   */
  | 'E_ARITY'
  /**
   * A well-formed call whose result is undefined
   * (division by zero, out-of-domain input, unparsable literal).
   */
  | 'E_OPERAND'
  /**
   * The result exists, but decimal.js cannot compute it at the requested
   * precision (trigonometry above 1025 digits).
   */
  | 'E_PRECISION'
  /**
   * Invariants of the evaluator itself that should "never happen".
   */
  | 'E_INTERNAL';

/**
 * Options used when constructing a DecimathError.
 */
export interface DecimathErrorOptions {
  code: DecimathErrorCode;

  /**
   * Human-readable error message (short, single-line where possible).
   */
  message: string;

  /**
   * The full expression source, used to compute line/column and snippet.
   */
  source?: string;

  /**
   * 0-based character offset in the source string.
   */
  index?: number;

  /**
   * Length of the offending span, for a multi-character caret.
   */
  length?: number;

  /**
   * Optional hint appended by `formatError`.
   */
  note?: string;

  cause?: unknown;
}

export class DecimathError extends Error {
  public readonly name: string = 'DecimathError';
  public readonly code: DecimathErrorCode;

  /** 0-based offset in the source (if known). */
  public readonly index: number | null;

  /** 1-based line number (if known). */
  public readonly line: number | null;

  /** 1-based column number (if known). */
  public readonly column: number | null;

  /**
   * The source line and a caret under the offending span:
   *
   *   2 * (3 + 4
   *       ^ --- unclosed "("
   */
  public readonly snippet: string;

  public readonly note?: string;

  constructor(opts: DecimathErrorOptions) {
    super(
      opts.message,
      opts.cause !== undefined ? { cause: opts.cause } : undefined,
    );

    Object.setPrototypeOf(this, new.target.prototype);

    this.code = opts.code;

    const index =
      typeof opts.index === 'number' && opts.index >= 0 ? opts.index : null;

    let line: number | null = null;
    let column: number | null = null;
    let snippet = '';

    if (opts.source !== undefined && index != null) {
      const snip = buildSnippet(
        opts.source,
        index,
        opts.length ?? 1,
        opts.message,
      );
      line = snip.line;
      column = snip.column;
      snippet = snip.snippet;
    }

    this.index = index;
    this.line = line;
    this.column = column;
    this.snippet = snippet;
    this.note = opts.note;
  }
}

/**
 * No token rule matches the input at `index`.
 */
export class LexicalError extends DecimathError {
  public readonly name: string = 'LexicalError';

  /** The offending text. */
  public readonly text: string;

  constructor(opts: Omit<DecimathErrorOptions, 'code'> & { text: string }) {
    super({ ...opts, code: 'E_LEXICAL' });
    this.text = opts.text;
  }
}

/**
 * The token sequence violates the grammar shape.
 */
export class StructuralError extends DecimathError {
  public readonly name: string = 'StructuralError';

  constructor(opts: Omit<DecimathErrorOptions, 'code'>) {
    super({ ...opts, code: 'E_SYNTAX' });
  }
}

/**
 * A function received fewer arguments than its minimum or more than its
 * maximum. Raised before the function body runs.
 */
export class ArityError extends DecimathError {
  public readonly name: string = 'ArityError';
  public readonly functionName: string;
  public readonly expected: { readonly min: number; readonly max: number };
  public readonly received: number;

  constructor(
    opts: Omit<DecimathErrorOptions, 'code'> & {
      functionName: string;
      min: number;
      max: number;
      received: number;
    },
  ) {
    super({ ...opts, code: 'E_ARITY' });
    this.functionName = opts.functionName;
    this.expected = { min: opts.min, max: opts.max };
    this.received = opts.received;
  }
}

/**
 * An operator or function produced a mathematically undefined result.
 */
export class InvalidOperandError extends DecimathError {
  public readonly name: string = 'InvalidOperandError';

  /** Operator symbol or function name that failed. */
  public readonly subject: string;

  constructor(opts: Omit<DecimathErrorOptions, 'code'> & { subject: string }) {
    super({ ...opts, code: 'E_OPERAND' });
    this.subject = opts.subject;
  }
}

/**
 * The computation needs more digits than decimal.js can provide.
 */
export class PrecisionLimitError extends DecimathError {
  public readonly name: string = 'PrecisionLimitError';

  /** Operator symbol or function name that failed. */
  public readonly subject: string;

  /** Precision the evaluation ran at. */
  public readonly precision: number;

  constructor(
    opts: Omit<DecimathErrorOptions, 'code'> & { subject: string; precision: number },
  ) {
    super({ ...opts, code: 'E_PRECISION' });
    this.subject = opts.subject;
    this.precision = opts.precision;
  }
}

export function isDecimathError(err: unknown): err is DecimathError {
  return err instanceof DecimathError;
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

export function createLexicalError(
  opts: Omit<DecimathErrorOptions, 'code'> & { text: string },
): LexicalError {
  return new LexicalError(opts);
}

export function createStructuralError(
  opts: Omit<DecimathErrorOptions, 'code'>,
): StructuralError {
  return new StructuralError(opts);
}

export function createArityError(
  opts: Omit<DecimathErrorOptions, 'code'> & {
    functionName: string;
    min: number;
    max: number;
    received: number;
  },
): ArityError {
  return new ArityError(opts);
}

export function createOperandError(
  opts: Omit<DecimathErrorOptions, 'code'> & { subject: string },
): InvalidOperandError {
  return new InvalidOperandError(opts);
}

export function createPrecisionLimitError(
  opts: Omit<DecimathErrorOptions, 'code'> & { subject: string; precision: number },
): PrecisionLimitError {
  return new PrecisionLimitError(opts);
}

/**
 * Create an internal error (broken evaluator invariants).
 */
export function createInternalError(
  opts: Omit<DecimathErrorOptions, 'code'>,
): DecimathError {
  return new DecimathError({ ...opts, code: 'E_INTERNAL' });
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

interface SnippetInfo {
  line: number;
  column: number;
  snippet: string;
}

/**
 * Compute the 1-based line and column of `index` in `source`.
 * CRLF counts as a single line break.
 */
export function computeLineAndColumn(
  source: string,
  index: number,
): { line: number; column: number } {
  index = clamp(index, 0, source.length);

  let line = 1;
  let lastLineStart = 0;

  for (let i = 0; i < source.length && i < index; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 /* \n */) {
      line++;
      lastLineStart = i + 1;
    } else if (ch === 13 /* \r */) {
      line++;
      if (i + 1 < source.length && source.charCodeAt(i + 1) === 10) {
        i++;
      }
      lastLineStart = i + 1;
    }
  }

  const column = index - lastLineStart + 1;
  return { line, column };
}

/**
 * Build the offending line plus a caret line:
 *
 *   1 + $
 *       ^ --- unexpected character "$"
 */
export function buildSnippet(
  source: string,
  index: number,
  length: number,
  messageForArrow: string,
): SnippetInfo {
  const { line, column } = computeLineAndColumn(source, index);
  const lines = splitLines(source);
  const errorLine = lines[line - 1] ?? '';

  // The caret may sit one past the end of the line (end-of-input errors).
  const startCol = clamp(column, 1, errorLine.length + 1);
  const caretLength = Math.max(
    1,
    Math.min(length, errorLine.length - startCol + 1),
  );

  const spaces = ' '.repeat(startCol - 1);
  const carets = '^'.repeat(caretLength);
  const arrowMessage =
    messageForArrow.trim().length > 0 ? ` --- ${messageForArrow}` : '';

  return {
    line,
    column,
    snippet: `${errorLine}\n${spaces}${carets}${arrowMessage}`,
  };
}

function clamp(n: number, min: number, max: number): number {
  if (Number.isNaN(n)) return min;
  if (n < min) return min;
  if (n > max) return max;
  return n;
}

function splitLines(source: string): string[] {
  return source.split(/\r\n|\r|\n/);
}
