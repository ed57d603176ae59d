/**
 * Decimath – Tokenizer
 *
 * Turns a raw expression into a lazy stream of tokens. The stream can be
 * iterated any number of times; every iteration lexes again from the start.
 *
 * Token categories:
 *  - "literal"       – digits with an optional fractional part: 42, 3.14
 *  - "identifier"    – runs of letters: sin, pi (resolved by the evaluator)
 *  - "operator"      – operator symbols from the catalog
 *  - "open-bracket"  – opening brackets from the catalog
 *  - "close-bracket" – closing brackets from the catalog
 *  - "separator"     – the catalog's argument separator
 *
 * Fixed symbols are matched longest first, so a catalog may define symbols
 * that share a prefix.
 *
 * License: Apache-2.0
 */

import { getDefaultCatalog } from './catalog';
import type { GrammarCatalog } from './catalog';
import { createLexicalError } from './errors';
import { createToken } from './tokens';
import type { Token } from './tokens';

/////////////////////
// Public types    //
/////////////////////

export interface TokenStream extends Iterable<Token> {
  readonly source: string;

  /**
   * Lex the whole source eagerly.
   *
   * Throws a LexicalError on the first character no rule matches.
   */
  toArray(): Token[];
}

/////////////////////
// Public API      //
/////////////////////

/**
 * Create a token stream for `source`.
 *
 * Nothing is lexed until the stream is iterated, so lexical errors surface
 * during iteration.
 */
export function tokenize(
  source: string,
  catalog: GrammarCatalog = getDefaultCatalog(),
): TokenStream {
  return {
    source,
    *[Symbol.iterator](): Iterator<Token> {
      const tokenizer = new Tokenizer(source, catalog);
      for (;;) {
        const tok = tokenizer.next();
        if (tok === null) return;
        yield tok;
      }
    },
    toArray(): Token[] {
      return [...this];
    },
  };
}

/////////////////////
// Implementation  //
/////////////////////

class Tokenizer {
  private readonly src: string;
  private readonly len: number;
  private readonly catalog: GrammarCatalog;
  private pos = 0;

  constructor(source: string, catalog: GrammarCatalog) {
    this.src = source;
    this.len = source.length;
    this.catalog = catalog;
  }

  /**
   * Read the next token, or `null` at the end of input.
   */
  next(): Token | null {
    this.skipWhitespace();

    if (this.pos >= this.len) return null;

    const ch = this.src.charCodeAt(this.pos);

    if (isDigit(ch)) {
      return this.readLiteralToken();
    }

    if (isLetter(this.src.codePointAt(this.pos))) {
      return this.readIdentifierToken();
    }

    const start = this.pos;
    for (const symbol of this.catalog.symbols) {
      if (this.src.startsWith(symbol.text, start)) {
        this.pos += symbol.text.length;
        return createToken(symbol.type, symbol.text, start, this.pos);
      }
    }

    const text = String.fromCodePoint(this.src.codePointAt(start) ?? ch);
    throw createLexicalError({
      message: `unexpected character "${text}"`,
      source: this.src,
      index: start,
      length: text.length,
      text,
    });
  }

  private skipWhitespace(): void {
    while (this.pos < this.len && isWhitespace(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }
  }

  ///////////////////////
  // Token readers     //
  ///////////////////////

  /**
   * digits [ "." digits ]
   *
   * A dot is only consumed when a digit follows it; "1." lexes as "1"
   * followed by a stray ".".
   */
  private readLiteralToken(): Token {
    const start = this.pos;

    while (this.pos < this.len && isDigit(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }

    if (
      this.pos + 1 < this.len &&
      this.src.charCodeAt(this.pos) === 46 /* . */ &&
      isDigit(this.src.charCodeAt(this.pos + 1))
    ) {
      this.pos++;
      while (this.pos < this.len && isDigit(this.src.charCodeAt(this.pos))) {
        this.pos++;
      }
    }

    return createToken(
      'literal',
      this.src.slice(start, this.pos),
      start,
      this.pos,
    );
  }

  private readIdentifierToken(): Token {
    const start = this.pos;

    let cp = this.src.codePointAt(this.pos);
    while (cp !== undefined && isLetter(cp)) {
      this.pos += cp > 0xffff ? 2 : 1;
      cp = this.src.codePointAt(this.pos);
    }

    return createToken(
      'identifier',
      this.src.slice(start, this.pos),
      start,
      this.pos,
    );
  }
}

////////////////////////////
// Character classification
////////////////////////////

function isWhitespace(ch: number): boolean {
  return (
    ch === 32 || // space
    ch === 9 || // tab
    ch === 10 || // \n
    ch === 13 || // \r
    ch === 11 || // \v
    ch === 12 || // \f
    ch === 160 // NBSP
  );
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57; // 0-9
}

const LETTER = /\p{L}/u;

/** Letters outside the BMP take two UTF-16 units. */
function isLetter(cp: number | undefined): boolean {
  return cp !== undefined && LETTER.test(String.fromCodePoint(cp));
}
