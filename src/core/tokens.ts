/**
 * Decimath – Token definitions
 *
 * The canonical token shapes produced by the tokenizer and consumed by the
 * evaluator. Tokens are a discriminated union on `type`; every token also
 * carries its raw `value` and its `start`/`end` offsets (0-based, end
 * exclusive) for diagnostics.
 *
 * License: Apache-2.0
 */

/////////////////////
// Token categories //
/////////////////////

export type TokenType =
  | 'literal'
  | 'identifier'
  | 'operator'
  | 'open-bracket'
  | 'close-bracket'
  | 'separator';

export interface TokenBase<T extends TokenType> {
  readonly type: T;

  /**
   * Raw text of the token:
   *  - literal:       "3.14", "10"
   *  - identifier:    "sin", "pi"
   *  - operator:      "+", "^"
   *  - open/close:    "(", ")"
   *  - separator:     ","
   */
  readonly value: string;

  readonly start: number;
  readonly end: number;
}

export type LiteralToken = TokenBase<'literal'>;
export type IdentifierToken = TokenBase<'identifier'>;
export type OperatorToken = TokenBase<'operator'>;
export type OpenBracketToken = TokenBase<'open-bracket'>;
export type CloseBracketToken = TokenBase<'close-bracket'>;
export type SeparatorToken = TokenBase<'separator'>;

export type Token =
  | LiteralToken
  | IdentifierToken
  | OperatorToken
  | OpenBracketToken
  | CloseBracketToken
  | SeparatorToken;

//////////////////////////////
// Construction             //
//////////////////////////////

/**
 * Build a frozen token.
 *
 * Mostly useful in tests and tooling that synthesize tokens.
 */
export function createToken<T extends TokenType>(
  type: T,
  value: string,
  start: number,
  end: number = start + value.length,
): TokenBase<T> {
  return Object.freeze({ type, value, start, end });
}
