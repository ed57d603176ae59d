// tests/unit/tokenizer.spec.ts
//
// Unit tests for the Decimath tokenizer.
//
// Tokens carry their raw text (`value`) and 0-based offsets (`start`
// inclusive, `end` exclusive). The stream is lazy and restartable.

import { describe, it, expect } from 'vitest';

import { getDefaultCatalog, localizeCatalog } from '../../src/core/catalog';
import { createEngine } from '../../src/core/engine';
import { LexicalError } from '../../src/core/errors';
import { tokenize } from '../../src/core/tokenizer';
import type { Token } from '../../src/core/tokens';

function lex(source: string): Token[] {
  return tokenize(source).toArray();
}

function kinds(tokens: Token[]): string[] {
  return tokens.map((t) => t.type);
}

function values(tokens: Token[]): string[] {
  return tokens.map((t) => t.value);
}

function lexError(source: string): LexicalError {
  try {
    lex(source);
  } catch (err) {
    if (err instanceof LexicalError) return err;
    throw err;
  }
  throw new Error(`expected "${source}" to fail lexing`);
}

// -----------------------------------------------------------------------------
// Literals
// -----------------------------------------------------------------------------

describe('Tokenizer – numeric literals', () => {
  it('reads integers and decimals with offsets', () => {
    const tokens = lex('12 + 3.5');

    expect(kinds(tokens)).toEqual(['literal', 'operator', 'literal']);
    expect(values(tokens)).toEqual(['12', '+', '3.5']);
    expect(tokens.map((t) => [t.start, t.end])).toEqual([
      [0, 2],
      [3, 4],
      [5, 8],
    ]);
  });

  it('keeps long digit runs intact', () => {
    const digits = '1234567890'.repeat(10);
    expect(values(lex(`${digits}.5`))).toEqual([`${digits}.5`]);
  });

  it('does not take a dot that no digit follows', () => {
    const err = lexError('1.');

    expect(err.text).toBe('.');
    expect(err.index).toBe(1);
  });

  it('rejects a leading dot', () => {
    const err = lexError('.5');

    expect(err.code).toBe('E_LEXICAL');
    expect(err.index).toBe(0);
  });

  it('never includes a sign in a literal', () => {
    expect(values(lex('-5'))).toEqual(['-', '5']);
  });
});

// -----------------------------------------------------------------------------
// Identifiers, operators, brackets
// -----------------------------------------------------------------------------

describe('Tokenizer – identifiers and symbols', () => {
  it('reads function calls', () => {
    const tokens = lex('sin(pi)');

    expect(kinds(tokens)).toEqual([
      'identifier',
      'open-bracket',
      'identifier',
      'close-bracket',
    ]);
    expect(values(tokens)).toEqual(['sin', '(', 'pi', ')']);
  });

  it('reads argument separators', () => {
    expect(kinds(lex('max(1,2)'))).toEqual([
      'identifier',
      'open-bracket',
      'literal',
      'separator',
      'literal',
      'close-bracket',
    ]);
  });

  it('accepts any Unicode letter in identifiers', () => {
    const [token] = lex('résumé');

    expect(token?.type).toBe('identifier');
    expect(token?.value).toBe('résumé');
  });

  it('reads letters outside the BMP as part of identifiers', () => {
    const catalog = localizeCatalog(getDefaultCatalog(), {
      constants: { pi: '\u{1D70B}' },
    });

    const tokens = tokenize('2*\u{1D70B}x', catalog).toArray();

    expect(kinds(tokens)).toEqual(['literal', 'operator', 'identifier']);
    expect(tokens[2]).toEqual({
      type: 'identifier',
      value: '\u{1D70B}x',
      start: 2,
      end: 5,
    });
    expect(
      createEngine({ catalog }).evaluateToString('2*\u{1D70B}', undefined, {
        maxFractionDigits: 2,
      }),
    ).toBe('6.28');
  });

  it('leaves unknown names to the evaluator', () => {
    expect(values(lex('2x'))).toEqual(['2', 'x']);
  });

  it('splits adjacent operators', () => {
    expect(values(lex('3--5'))).toEqual(['3', '-', '-', '5']);
  });

  it('skips spaces, tabs, newlines and NBSP', () => {
    expect(values(lex('\t1\n+\u00a02\r\n'))).toEqual(['1', '+', '2']);
  });

  it('matches the longest catalog symbol first', () => {
    const catalog = localizeCatalog(getDefaultCatalog(), {
      operators: { power: '**' },
    });

    expect(values(tokenize('2**3*4', catalog).toArray())).toEqual([
      '2',
      '**',
      '3',
      '*',
      '4',
    ]);
  });

  it('produces frozen tokens', () => {
    const [token] = lex('7');
    expect(Object.isFrozen(token)).toBe(true);
  });
});

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

describe('Tokenizer – lexical errors', () => {
  it('reports the offending character with position and snippet', () => {
    const err = lexError('1 $ 2');

    expect(err).toBeInstanceOf(LexicalError);
    expect(err.message).toBe('unexpected character "$"');
    expect(err.text).toBe('$');
    expect(err.index).toBe(2);
    expect(err.line).toBe(1);
    expect(err.column).toBe(3);
    expect(err.snippet).toBe('1 $ 2\n  ^ --- unexpected character "$"');
  });

  it('reports characters outside the BMP whole', () => {
    const err = lexError('1 + 😀');

    expect(err.text).toBe('😀');
    expect(err.index).toBe(4);
  });

  it('reports positions on later lines', () => {
    const err = lexError('1 +\n #');

    expect(err.line).toBe(2);
    expect(err.column).toBe(2);
  });
});

// -----------------------------------------------------------------------------
// Stream behavior
// -----------------------------------------------------------------------------

describe('Tokenizer – token stream', () => {
  it('lexes lazily', () => {
    const stream = tokenize('1 + $');
    const iterator = stream[Symbol.iterator]();

    expect(iterator.next().value).toMatchObject({ type: 'literal', value: '1' });
    expect(iterator.next().value).toMatchObject({ type: 'operator', value: '+' });
    expect(() => iterator.next()).toThrow(LexicalError);
  });

  it('restarts from the beginning on every iteration', () => {
    const stream = tokenize('abs(-1.5)');

    const first = [...stream];
    const second = [...stream];

    expect(second).toEqual(first);
    expect(first).toHaveLength(5);
  });

  it('exposes its source', () => {
    expect(tokenize('1+1').source).toBe('1+1');
  });

  it('yields nothing for blank input', () => {
    expect(lex('  \t ')).toEqual([]);
  });
});
