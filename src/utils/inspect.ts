/**
 * Decimath – Utils / inspect
 *
 * Rendering of errors for people (CLI output, logs) and for tools
 * (`toDiagnostic`).
 *
 * License: Apache-2.0
 */

import type { Diagnostic } from '../core/types';
import {
  buildSnippet,
  computeLineAndColumn,
  isDecimathError,
} from '../core/errors';

/////////////////////////////
// Error formatting        //
/////////////////////////////

export interface FormattedError {
  /**
   * Single line: `[E_SYNTAX] unclosed "(" at line 1, col 8`.
   */
  summary: string;

  /**
   * Summary, caret snippet and hint, separated by blank lines.
   */
  detail: string;

  error: unknown;
}

/**
 * Format a Decimath error (or any thrown value).
 *
 * When the error carries no snippet but `source` and an index are known,
 * the snippet is built from `source`.
 */
export function formatError(err: unknown, source?: string): FormattedError {
  if (!isDecimathError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    const summary = `Error: ${message}`;
    return { summary, detail: summary, error: err };
  }

  const { code, index, note } = err;
  const message = err.message || 'Decimath error';

  let { line, column, snippet } = err;

  if (snippet.trim() === '' && source !== undefined && index !== null) {
    const built = buildSnippet(source, index, 1, message);
    line = built.line;
    column = built.column;
    snippet = built.snippet;
  }

  const at: string[] = [];
  if (line !== null) at.push(`line ${line}`);
  if (column !== null) at.push(`col ${column}`);

  const summary = `[${code}] ${message}${at.length > 0 ? ` at ${at.join(', ')}` : ''}`;

  let detail = summary;
  if (snippet.trim() !== '') {
    detail += `\n\n${snippet}`;
  }
  if (note !== undefined && note.trim() !== '') {
    detail += `\n\nHint: ${note}`;
  }

  return { summary, detail, error: err };
}

/**
 * Plain-data diagnostic for a Decimath error, or `undefined` for anything
 * else.
 */
export function toDiagnostic(
  err: unknown,
  source?: string,
): Diagnostic | undefined {
  if (!isDecimathError(err)) return undefined;

  const diagnostic: Diagnostic = { code: err.code, message: err.message };
  if (err.note !== undefined) diagnostic.note = err.note;

  if (err.index !== null) {
    const position =
      err.line !== null && err.column !== null
        ? { line: err.line, column: err.column }
        : source !== undefined
          ? computeLineAndColumn(source, err.index)
          : {};
    diagnostic.location = { index: err.index, ...position };
  }

  return diagnostic;
}
