/**
 * Decimath – Process-wide precision setting
 *
 * The default number of significant digits used by evaluations that do not
 * fix their own precision. Engines read it once at the start of each
 * evaluation, so one evaluation never mixes precisions even if the setting
 * changes while it runs.
 *
 * Known limitation: the setting is shared by everything in the process.
 * Callers that need isolation should create engines with an explicit
 * `precision` option instead.
 *
 * License: Apache-2.0
 */

export const DEFAULT_PRECISION = 64;

/** decimal.js refuses more significant digits than this. */
export const MAX_PRECISION = 1e9;

let precision = DEFAULT_PRECISION;

export function isValidPrecision(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_PRECISION;
}

export function getPrecision(): number {
  return precision;
}

/**
 * Update the process-wide precision. Values that are not positive integers
 * within decimal.js' range are ignored and the previous setting is kept.
 */
export function setPrecision(value: number): void {
  if (isValidPrecision(value)) {
    precision = value;
  }
}

export function resetPrecision(): void {
  precision = DEFAULT_PRECISION;
}
