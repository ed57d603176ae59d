/**
 * Decimath – Number type
 *
 * Values are immutable decimal.js `Decimal` instances. Each precision gets
 * its own `Decimal` clone, so every operation performed through a
 * `NumberSystem` rounds to that system's significant digits:
 *
 *   const num = getNumberSystem(32);
 *   const third = num.Decimal.div(1, 3); // 32 significant digits
 *
 * Primitives never hand NaN or Infinity to their callers; they return a
 * `NumericOutcome` instead.
 *
 * License: Apache-2.0
 */

import { Decimal } from 'decimal.js';

import { MAX_PRECISION } from './precision';

export type DecimalConstructor = typeof Decimal;

export type NumericOutcome =
  | { readonly ok: true; readonly value: Decimal }
  | {
      readonly ok: false;
      readonly reason: string;
      readonly cause?: unknown;
      /** The result exists but decimal.js cannot reach this precision. */
      readonly limit?: true;
    };

export function success(value: Decimal): NumericOutcome {
  return { ok: true, value };
}

export function failure(reason: string, cause?: unknown): NumericOutcome {
  return cause === undefined
    ? { ok: false, reason }
    : { ok: false, reason, cause };
}

export function limitFailure(reason: string, cause: unknown): NumericOutcome {
  return { ok: false, reason, cause, limit: true };
}

/**
 * Wrap a computed value, rejecting non-finite results.
 */
export function finite(value: Decimal, reason: string): NumericOutcome {
  if (value.isNaN()) return failure(`${reason} (result is undefined)`);
  if (!value.isFinite()) return failure(`${reason} (result is not finite)`);
  return success(value);
}

export interface NumberSystem {
  readonly precision: number;

  /** `Decimal` clone configured for `precision`. */
  readonly Decimal: DecimalConstructor;

  /**
   * Parse a decimal literal and round it to `precision` digits.
   */
  parse(text: string): NumericOutcome;

  /**
   * pi rounded to `precision` digits (computed once per system).
   */
  pi(): Decimal;

  /**
   * Put the clone's configuration back. decimal.js raises its working
   * precision inside some operations and leaves it raised when it throws.
   */
  restore(): void;
}

/** Number systems kept alive; the least recently used one is dropped first. */
export const NUMBER_SYSTEM_CACHE_SIZE = 16;

const systems = new Map<number, NumberSystem>();

/**
 * Shared number system for a precision (created on first use).
 *
 * Rounding is half away from zero; `mod` is floored, so a remainder takes
 * the divisor's sign.
 */
export function getNumberSystem(precision: number): NumberSystem {
  const existing = systems.get(precision);
  if (existing) {
    systems.delete(precision);
    systems.set(precision, existing);
    return existing;
  }

  const system = createNumberSystem(precision);

  systems.set(precision, system);
  if (systems.size > NUMBER_SYSTEM_CACHE_SIZE) {
    const [oldest] = systems.keys();
    if (oldest !== undefined) systems.delete(oldest);
  }
  return system;
}

function createNumberSystem(precision: number): NumberSystem {
  const config: Decimal.Config = {
    precision,
    rounding: Decimal.ROUND_HALF_UP,
    modulo: Decimal.ROUND_FLOOR,
  };
  const Ctor = Decimal.clone(config);
  let pi: Decimal | undefined;

  return Object.freeze({
    precision,
    Decimal: Ctor,
    parse(text: string): NumericOutcome {
      let value: Decimal;
      try {
        value = new Ctor(text);
      } catch (err) {
        return failure(`"${text}" is not a number`, err);
      }
      return finite(value.toSignificantDigits(precision), `"${text}"`);
    },
    pi(): Decimal {
      if (pi === undefined) {
        pi = new Ctor(machinPi(precision)).toSignificantDigits(precision);
      }
      return pi;
    },
    restore(): void {
      Ctor.set(config);
    },
  });
}

/////////////////////
// Pi              //
/////////////////////

const PI_GUARD_DIGITS = 10;

/**
 * pi = 16 atan(1/5) - 4 atan(1/239), with guard digits on top of
 * `precision`.
 */
function machinPi(precision: number): Decimal {
  const digits = Math.min(precision + PI_GUARD_DIGITS, MAX_PRECISION);
  const W = Decimal.clone({ precision: digits, rounding: Decimal.ROUND_HALF_UP });
  const epsilon = new W(`1e-${digits}`);

  // atan(1/n) = 1/n - 1/(3 n^3) + 1/(5 n^5) - ...
  const arctanInverse = (n: number): Decimal => {
    const nSquared = n * n;
    let power = new W(1).div(n);
    let sum = power;
    for (let k = 1; ; k++) {
      power = power.div(nSquared);
      const term = power.div(2 * k + 1);
      if (term.lt(epsilon)) return sum;
      sum = k % 2 === 1 ? sum.minus(term) : sum.plus(term);
    }
  };

  return arctanInverse(5).times(16).minus(arctanInverse(239).times(4));
}
