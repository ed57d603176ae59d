/**
 * Decimath – Numeric semantics of the catalog
 *
 * Dispatches on the stable descriptor ids, so relabelled catalogs keep the
 * same meaning. Every primitive checks its domain up front and returns a
 * `NumericOutcome`; the evaluator turns failures into
 * `InvalidOperandError`s naming the operator or function.
 *
 * All trigonometric functions work in radians. `round` rounds away from
 * zero: round(2.1) = 3, round(-2.1) = -3.
 *
 * License: Apache-2.0
 */

import type { Decimal } from 'decimal.js';

import type {
  ConstantDescriptor,
  FunctionDescriptor,
  OperatorDescriptor,
} from './catalog';
import { failure, finite, limitFailure, success } from './number';
import type { NumberSystem, NumericOutcome } from './number';

/////////////////////
// Public API      //
/////////////////////

/**
 * Apply an operator to its operands (left to right).
 */
export function applyOperator(
  op: OperatorDescriptor,
  operands: readonly Decimal[],
  num: NumberSystem,
): NumericOutcome {
  const D = num.Decimal;
  const [a, b] = operands;
  if (a === undefined || (op.arity === 2 && b === undefined)) {
    return failure(`expected ${op.arity} operand(s), got ${operands.length}`);
  }

  return guard(num, () => {
    switch (op.id) {
      case 'negate':
        return success(new D(a).neg());

      case 'add':
        return finite(D.add(a, second(b)), 'addition overflowed');

      case 'subtract':
        return finite(D.sub(a, second(b)), 'subtraction overflowed');

      case 'multiply':
        return finite(D.mul(a, second(b)), 'multiplication overflowed');

      case 'divide': {
        const divisor = second(b);
        if (divisor.isZero()) return failure('division by zero');
        return finite(D.div(a, divisor), 'division overflowed');
      }

      case 'modulo': {
        const divisor = second(b);
        if (divisor.isZero()) return failure('modulo by zero');
        return finite(D.mod(a, divisor), 'modulo failed');
      }

      case 'power': {
        const exponent = second(b);
        if (a.isZero() && exponent.isNeg()) {
          return failure('zero cannot be raised to a negative power');
        }
        if (a.isNeg() && !exponent.isInteger()) {
          return failure('a negative base needs an integer exponent');
        }
        return finite(D.pow(a, exponent), 'power overflowed');
      }

      default: {
        const _exhaustive: never = op.id;
        return failure(`unsupported operator "${String(_exhaustive)}"`);
      }
    }
  });
}

/**
 * Apply a function to its arguments. Arity has already been checked
 * against the descriptor.
 */
export function applyFunction(
  fn: FunctionDescriptor,
  args: readonly Decimal[],
  num: NumberSystem,
): NumericOutcome {
  const D = num.Decimal;

  return guard(num, () => {
    switch (fn.id) {
      case 'abs':
        return unary(args, (x) => success(D.abs(x)));
      case 'ceil':
        return unary(args, (x) => success(D.ceil(x)));
      case 'floor':
        return unary(args, (x) => success(D.floor(x)));
      case 'round':
        return unary(args, (x) =>
          success(new D(x).toDecimalPlaces(0, D.ROUND_UP)),
        );

      case 'sin':
        return unary(args, (x) => finite(D.sin(x), 'sine failed'));
      case 'cos':
        return unary(args, (x) => finite(D.cos(x), 'cosine failed'));
      case 'tan':
        return unary(args, (x) => finite(D.tan(x), 'tangent failed'));

      case 'asin':
        return unary(args, (x) =>
          x.abs().gt(1)
            ? failure('argument must be within [-1, 1]')
            : finite(D.asin(x), 'arc sine failed'),
        );
      case 'acos':
        return unary(args, (x) =>
          x.abs().gt(1)
            ? failure('argument must be within [-1, 1]')
            : finite(D.acos(x), 'arc cosine failed'),
        );
      case 'atan':
        return unary(args, (x) => finite(D.atan(x), 'arc tangent failed'));

      case 'sinh':
        return unary(args, (x) => finite(D.sinh(x), 'hyperbolic sine overflowed'));
      case 'cosh':
        return unary(args, (x) =>
          finite(D.cosh(x), 'hyperbolic cosine overflowed'),
        );
      case 'tanh':
        return unary(args, (x) => finite(D.tanh(x), 'hyperbolic tangent failed'));

      case 'ln':
        return unary(args, (x) =>
          x.lte(0)
            ? failure('argument must be positive')
            : finite(D.ln(x), 'natural logarithm failed'),
        );
      case 'log':
        return unary(args, (x) =>
          x.lte(0)
            ? failure('argument must be positive')
            : finite(D.log(x, 10), 'logarithm failed'),
        );

      case 'min':
        return fold(args, (best, next) => (next.lt(best) ? next : best));
      case 'max':
        return fold(args, (best, next) => (next.gt(best) ? next : best));
      case 'sum':
        return args.length === 0
          ? failure('needs at least one argument')
          : finite(sumOf(D, args), 'sum overflowed');
      case 'average':
        return args.length === 0
          ? failure('needs at least one argument')
          : finite(
              D.div(sumOf(D, args), new D(args.length)),
              'average overflowed',
            );

      case 'random':
        return success(D.random());

      default: {
        const _exhaustive: never = fn.id;
        return failure(`unsupported function "${String(_exhaustive)}"`);
      }
    }
  });
}

/**
 * Produce a constant's value at the system's precision.
 */
export function resolveConstant(
  constant: ConstantDescriptor,
  num: NumberSystem,
): NumericOutcome {
  const D = num.Decimal;

  return guard(num, () => {
    switch (constant.id) {
      case 'pi':
        return success(num.pi());
      case 'e':
        return success(D.exp(1));
      default: {
        const _exhaustive: never = constant.id;
        return failure(`unsupported constant "${String(_exhaustive)}"`);
      }
    }
  });
}

/////////////////////
// Helpers         //
/////////////////////

/**
 * decimal.js throws for some inputs; those become failures carrying the
 * original error. Trigonometry needs decimal.js' stored pi, which ends
 * after 1025 digits; that case is reported as a precision limit.
 */
function guard(num: NumberSystem, compute: () => NumericOutcome): NumericOutcome {
  try {
    return compute();
  } catch (err) {
    num.restore();
    const message = err instanceof Error ? err.message : String(err);
    return message.includes(PRECISION_LIMIT_EXCEEDED)
      ? limitFailure(message, err)
      : failure(message, err);
  }
}

const PRECISION_LIMIT_EXCEEDED = 'Precision limit exceeded';

function unary(
  args: readonly Decimal[],
  compute: (x: Decimal) => NumericOutcome,
): NumericOutcome {
  const [x] = args;
  return x === undefined ? failure('missing argument') : compute(x);
}

function second(b: Decimal | undefined): Decimal {
  if (b === undefined) {
    throw new Error('missing right-hand operand');
  }
  return b;
}

/**
 * Left-to-right fold; `pick` keeps the current best on ties.
 */
function fold(
  args: readonly Decimal[],
  pick: (best: Decimal, next: Decimal) => Decimal,
): NumericOutcome {
  const [first, ...rest] = args;
  if (first === undefined) return failure('needs at least one argument');
  return success(rest.reduce(pick, first));
}

function sumOf(D: NumberSystem['Decimal'], args: readonly Decimal[]): Decimal {
  return args.reduce<Decimal>((acc, x) => acc.plus(x), new D(0));
}
