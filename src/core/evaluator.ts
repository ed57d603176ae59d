/**
 * Decimath – Shunting-yard evaluator
 *
 * Consumes a token stream and computes the result directly, without
 * building a tree. Two explicit stacks are kept:
 *
 *  - operands:  evaluated `Decimal` values
 *  - pending:   operators, function markers and group brackets
 *
 * Function markers and group brackets are barriers: reducing for a
 * separator or a closing bracket never pops past them.
 *
 * Parsing state is tracked with `previous`, the kind of the last token
 * consumed. An operator is unary unless it follows an operand.
 *
 * License: Apache-2.0
 */

import type { Decimal } from 'decimal.js';

import type {
  BracketPair,
  ConstantDescriptor,
  FunctionDescriptor,
  GrammarCatalog,
  OperatorDescriptor,
} from './catalog';
import {
  createArityError,
  createInternalError,
  createOperandError,
  createPrecisionLimitError,
  createStructuralError,
} from './errors';
import type { NumberSystem, NumericOutcome } from './number';
import { applyFunction, applyOperator, resolveConstant } from './operations';
import type {
  CloseBracketToken,
  IdentifierToken,
  OpenBracketToken,
  OperatorToken,
  SeparatorToken,
  Token,
} from './tokens';
import type { TokenStream } from './tokenizer';

/////////////////////
// Public types    //
/////////////////////

/**
 * One application of an operator, function or constant, reported to the
 * `onApply` callback.
 */
export type ApplyStep =
  | {
      readonly kind: 'operator';
      readonly descriptor: OperatorDescriptor;
      readonly operands: readonly Decimal[];
      readonly result: Decimal;
      readonly index: number;
    }
  | {
      readonly kind: 'function';
      readonly descriptor: FunctionDescriptor;
      readonly operands: readonly Decimal[];
      readonly result: Decimal;
      readonly index: number;
    }
  | {
      readonly kind: 'constant';
      readonly descriptor: ConstantDescriptor;
      readonly operands: readonly Decimal[];
      readonly result: Decimal;
      readonly index: number;
    };

/**
 * Everything one evaluation needs. `context` is passed through to `onApply`
 * untouched.
 */
export interface EvalScope<Context = unknown> {
  readonly catalog: GrammarCatalog;
  readonly numbers: NumberSystem;
  readonly context: Context;
  readonly onApply?: (step: ApplyStep, context: Context) => void;
}

/////////////////////
// Public API      //
/////////////////////

/**
 * Evaluate a token stream to a single value.
 *
 * Throws:
 *  - LexicalError while pulling tokens from the stream
 *  - StructuralError for malformed token sequences
 *  - ArityError for calls outside a function's argument bounds
 *  - InvalidOperandError for undefined numeric results
 */
export function evaluateTokens<Context>(
  stream: TokenStream,
  scope: EvalScope<Context>,
): Decimal {
  return new ShuntingYard(stream.source, scope).run(stream);
}

/////////////////////
// Internal types  //
/////////////////////

type Pending =
  | {
      type: 'operator';
      descriptor: OperatorDescriptor;
      token: OperatorToken;
    }
  | {
      type: 'function';
      descriptor: FunctionDescriptor;
      token: IdentifierToken;
      bracket: BracketPair;
      separators: number;
      /** Operand stack height when the call opened. */
      operandBase: number;
    }
  | {
      type: 'group';
      bracket: BracketPair;
      token: OpenBracketToken;
    };

type Barrier = Exclude<Pending, { type: 'operator' }>;

/**
 * Kind of the last consumed token.
 */
type Previous = 'start' | 'operand' | 'operator' | 'open' | 'separator';

///////////////////////////
// Evaluation            //
///////////////////////////

class ShuntingYard<Context> {
  private readonly operands: Decimal[] = [];
  private readonly pending: Pending[] = [];
  private previous: Previous = 'start';

  constructor(
    private readonly source: string,
    private readonly scope: EvalScope<Context>,
  ) {}

  run(stream: TokenStream): Decimal {
    const iterator = stream[Symbol.iterator]();
    let lookahead = iterator.next();

    while (!lookahead.done) {
      const token = lookahead.value;
      lookahead = iterator.next();

      switch (token.type) {
        case 'literal':
          this.expectOperandPosition(token);
          this.operands.push(
            this.unwrap(this.scope.numbers.parse(token.value), token.value, token),
          );
          this.previous = 'operand';
          break;

        case 'identifier': {
          this.expectOperandPosition(token);
          const next = lookahead.done ? undefined : lookahead.value;
          if (this.identifier(token, next)) {
            // The opening bracket was consumed with the name.
            lookahead = iterator.next();
          }
          break;
        }

        case 'operator':
          this.operator(token);
          break;

        case 'open-bracket':
          this.openGroup(token);
          break;

        case 'separator':
          this.separator(token);
          break;

        case 'close-bracket':
          this.close(token);
          break;

        default: {
          const _exhaustive: never = token;
          throw createInternalError({
            message: `unsupported token ${JSON.stringify(_exhaustive)}`,
          });
        }
      }
    }

    return this.finish();
  }

  ///////////////////////
  // Token handlers    //
  ///////////////////////

  /**
   * Push a constant's value or open a function call.
   * Returns true when `next` (the call's bracket) was consumed.
   */
  private identifier(token: IdentifierToken, next: Token | undefined): boolean {
    const { catalog } = this.scope;

    const fn = catalog.findFunction(token.value);
    if (fn) {
      const bracket =
        next?.type === 'open-bracket'
          ? catalog.findFunctionBracket(next.value)
          : undefined;
      if (!bracket) {
        const [call] = catalog.functionBrackets;
        throw createStructuralError({
          message: `function "${fn.name}" must be followed by an argument list`,
          source: this.source,
          index: token.end,
          note: call ? `write ${fn.name}${call.open}x${call.close}` : undefined,
        });
      }
      this.pending.push({
        type: 'function',
        descriptor: fn,
        token,
        bracket,
        separators: 0,
        operandBase: this.operands.length,
      });
      this.previous = 'open';
      return true;
    }

    const constant = catalog.findConstant(token.value);
    if (constant) {
      const value = this.unwrap(
        resolveConstant(constant, this.scope.numbers),
        constant.name,
        token,
      );
      this.report({
        kind: 'constant',
        descriptor: constant,
        operands: [],
        result: value,
        index: token.start,
      });
      this.operands.push(value);
      this.previous = 'operand';
      return false;
    }

    const similar = findCaseVariant(catalog, token.value);
    throw createStructuralError({
      message: `unknown identifier "${token.value}"`,
      source: this.source,
      index: token.start,
      length: token.value.length,
      note:
        similar === undefined
          ? undefined
          : `names are case-sensitive; did you mean "${similar}"?`,
    });
  }

  private operator(token: OperatorToken): void {
    const { catalog } = this.scope;

    if (this.previous === 'operand') {
      const descriptor = catalog.findOperator(token.value, 2);
      if (!descriptor) {
        throw createStructuralError({
          message: `"${token.value}" cannot be used as a binary operator`,
          source: this.source,
          index: token.start,
          length: token.value.length,
        });
      }
      this.reduceWhile((top) => shouldReduce(top, descriptor));
      this.pending.push({ type: 'operator', descriptor, token });
    } else {
      // Prefix position: there is no left operand, so nothing is reduced.
      const descriptor = catalog.findOperator(token.value, 1);
      if (!descriptor) {
        throw createStructuralError({
          message: `missing operand before "${token.value}"`,
          source: this.source,
          index: token.start,
          length: token.value.length,
        });
      }
      this.pending.push({ type: 'operator', descriptor, token });
    }

    this.previous = 'operator';
  }

  private openGroup(token: OpenBracketToken): void {
    if (this.previous === 'operand') {
      throw createStructuralError({
        message: `unexpected "${token.value}" after an operand`,
        source: this.source,
        index: token.start,
        length: token.value.length,
      });
    }

    const bracket = this.scope.catalog.findExpressionBracket(token.value);
    if (!bracket) {
      throw createStructuralError({
        message: `"${token.value}" can only open a function argument list`,
        source: this.source,
        index: token.start,
        length: token.value.length,
      });
    }

    this.pending.push({ type: 'group', bracket, token });
    this.previous = 'open';
  }

  private separator(token: SeparatorToken): void {
    if (this.previous !== 'operand') {
      throw createStructuralError({
        message: `missing argument before "${token.value}"`,
        source: this.source,
        index: token.start,
      });
    }

    const barrier = this.reduceToBarrier();
    if (barrier?.type !== 'function') {
      throw createStructuralError({
        message: `argument separator "${token.value}" outside of a function call`,
        source: this.source,
        index: token.start,
      });
    }

    barrier.separators++;
    this.previous = 'separator';
  }

  private close(token: CloseBracketToken): void {
    const top = this.pending[this.pending.length - 1];
    const emptyCall = this.previous === 'open' && top?.type === 'function';

    if (this.previous !== 'operand' && !emptyCall) {
      throw createStructuralError({
        message:
          this.previous === 'open'
            ? `empty brackets before "${token.value}"`
            : `missing operand before "${token.value}"`,
        source: this.source,
        index: token.start,
      });
    }

    const barrier = this.reduceToBarrier();
    if (!barrier) {
      throw createStructuralError({
        message: `unmatched "${token.value}"`,
        source: this.source,
        index: token.start,
      });
    }
    this.pending.pop();

    if (barrier.bracket.close !== token.value) {
      throw createStructuralError({
        message: `"${barrier.token.value}" is closed by "${token.value}", expected "${barrier.bracket.close}"`,
        source: this.source,
        index: token.start,
      });
    }

    if (barrier.type === 'function') {
      this.call(barrier, emptyCall);
    }

    this.previous = 'operand';
  }

  private finish(): Decimal {
    if (this.previous === 'start') {
      throw createStructuralError({
        message: 'empty expression',
        source: this.source,
        index: 0,
      });
    }

    if (this.previous !== 'operand') {
      throw createStructuralError({
        message: 'unexpected end of expression',
        source: this.source,
        index: this.source.length,
      });
    }

    for (let entry = this.pending.pop(); entry; entry = this.pending.pop()) {
      if (entry.type !== 'operator') {
        throw createStructuralError({
          message: `unclosed "${entry.bracket.open}"`,
          source: this.source,
          index: entry.token.type === 'identifier' ? entry.token.end : entry.token.start,
        });
      }
      this.apply(entry);
    }

    const [result, ...extra] = this.operands;
    if (result === undefined || extra.length > 0) {
      throw createInternalError({
        message: `expected a single result, found ${this.operands.length}`,
        source: this.source,
        index: 0,
      });
    }
    return result;
  }

  ///////////////////////
  // Reduction         //
  ///////////////////////

  /**
   * Apply stacked operators while `predicate` holds for the top one.
   */
  private reduceWhile(
    predicate: (top: OperatorDescriptor) => boolean,
  ): void {
    for (;;) {
      const top = this.pending[this.pending.length - 1];
      if (top?.type !== 'operator' || !predicate(top.descriptor)) return;
      this.pending.pop();
      this.apply(top);
    }
  }

  /**
   * Apply operators down to the nearest barrier and return it (still on
   * the stack), or `undefined` when there is none.
   */
  private reduceToBarrier(): Barrier | undefined {
    this.reduceWhile(() => true);
    const top = this.pending[this.pending.length - 1];
    return top?.type === 'operator' ? undefined : top;
  }

  private apply(entry: Extract<Pending, { type: 'operator' }>): void {
    const { descriptor, token } = entry;
    if (this.operands.length < descriptor.arity) {
      throw createStructuralError({
        message: `missing operand for "${descriptor.symbol}"`,
        source: this.source,
        index: token.start,
      });
    }

    const operands = this.operands.splice(
      this.operands.length - descriptor.arity,
      descriptor.arity,
    );
    const result = this.unwrap(
      applyOperator(descriptor, operands, this.scope.numbers),
      descriptor.symbol,
      token,
    );
    this.report({
      kind: 'operator',
      descriptor,
      operands,
      result,
      index: token.start,
    });
    this.operands.push(result);
  }

  private call(
    marker: Extract<Pending, { type: 'function' }>,
    empty: boolean,
  ): void {
    const { descriptor, token } = marker;
    const count = empty ? 0 : marker.separators + 1;

    if (this.operands.length - marker.operandBase !== count) {
      throw createInternalError({
        message: `argument bookkeeping for "${descriptor.name}" is out of sync`,
        source: this.source,
        index: token.start,
      });
    }

    if (count < descriptor.minArgs || count > descriptor.maxArgs) {
      throw createArityError({
        message: `${descriptor.name}() expects ${describeBounds(descriptor)}, got ${count}`,
        source: this.source,
        index: token.start,
        length: token.value.length,
        functionName: descriptor.name,
        min: descriptor.minArgs,
        max: descriptor.maxArgs,
        received: count,
      });
    }

    const args = this.operands.splice(marker.operandBase, count);
    const result = this.unwrap(
      applyFunction(descriptor, args, this.scope.numbers),
      descriptor.name,
      token,
    );
    this.report({
      kind: 'function',
      descriptor,
      operands: args,
      result,
      index: token.start,
    });
    this.operands.push(result);
  }

  ///////////////////////
  // Helpers           //
  ///////////////////////

  private expectOperandPosition(token: Token): void {
    if (this.previous === 'operand') {
      throw createStructuralError({
        message: `unexpected "${token.value}" after an operand`,
        source: this.source,
        index: token.start,
        length: token.value.length,
      });
    }
  }

  private unwrap(outcome: NumericOutcome, subject: string, token: Token): Decimal {
    if (outcome.ok) return outcome.value;
    if (outcome.limit) {
      const { precision } = this.scope.numbers;
      throw createPrecisionLimitError({
        message: `"${subject}" cannot be computed at ${precision} significant digits`,
        source: this.source,
        index: token.start,
        length: token.value.length,
        subject,
        precision,
        cause: outcome.cause,
      });
    }
    throw createOperandError({
      message: `invalid operand for "${subject}": ${outcome.reason}`,
      source: this.source,
      index: token.start,
      length: token.value.length,
      subject,
      cause: outcome.cause,
    });
  }

  private report(step: ApplyStep): void {
    this.scope.onApply?.(step, this.scope.context);
  }
}

/**
 * Whether a stacked operator is applied before pushing `incoming`.
 */
function shouldReduce(
  top: OperatorDescriptor,
  incoming: OperatorDescriptor,
): boolean {
  return (
    top.precedence > incoming.precedence ||
    (top.precedence === incoming.precedence &&
      incoming.associativity === 'left')
  );
}

function findCaseVariant(
  catalog: GrammarCatalog,
  name: string,
): string | undefined {
  const lower = name.toLowerCase();
  return [...catalog.functions, ...catalog.constants].find(
    (entry) => entry.name.toLowerCase() === lower,
  )?.name;
}

function describeBounds(fn: FunctionDescriptor): string {
  const plural = (n: number): string =>
    `${n} argument${n === 1 ? '' : 's'}`;
  if (fn.minArgs === fn.maxArgs) return plural(fn.minArgs);
  if (fn.maxArgs === Infinity) return `at least ${plural(fn.minArgs)}`;
  return `${fn.minArgs} to ${plural(fn.maxArgs)}`;
}
