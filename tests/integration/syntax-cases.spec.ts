// tests/integration/syntax-cases.spec.ts
//
// End-to-end syntax coverage through the public entry point:
//  - every operator, function and constant of the built-in catalog
//  - precedence presets
//  - localized and restricted catalogs
//  - negative cases for each error category

import { describe, it, expect } from 'vitest';

import {
  ArityError,
  DecimathError,
  InvalidOperandError,
  LexicalError,
  StructuralError,
  createEngine,
  evaluateExpression,
  formatExpression,
  getDefaultCatalog,
  localizeCatalog,
  restrictCatalog,
} from '../../src';

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function fmt(source: string, digits = 20): string {
  return formatExpression(source, { significantDigits: digits });
}

function errorOf(source: string, engine = createEngine()): DecimathError {
  const result = engine.tryEvaluate(source);
  if (result.ok) throw new Error(`expected "${source}" to fail`);
  return result.error;
}

// -----------------------------------------------------------------------------
// Catalog coverage
// -----------------------------------------------------------------------------

describe('Syntax – arithmetic', () => {
  it.each([
    ['1 + 2 * 3 - 4 / 2', '5'],
    ['(1 + 2) * (3 - 4) / 2', '-1.5'],
    ['2 ^ 10 % 1000', '24'],
    ['-(-(-1))', '-1'],
    ['1.5 * 4', '6'],
    ['123456789012345678901234567890 + 1', '123456789012345678901234567891'],
    ['0.000000000000000000001 * 1000', '0.000000000000000001'],
  ])('%s = %s', (source, expected) => {
    expect(formatExpression(source)).toBe(expected);
  });
});

describe('Syntax – functions and constants', () => {
  it.each([
    ['abs(-7)', '7'],
    ['ceil(-0.5)', '0'],
    ['floor(2.999)', '2'],
    ['round(0.5)', '1'],
    ['sin(pi / 2)', '1'],
    ['cos(pi)', '-1'],
    ['tan(0)', '0'],
    ['atan(1) * 4', '3.1415926535897932385'],
    ['acos(0) * 2', '3.1415926535897932385'],
    ['sinh(0)', '0'],
    ['cosh(0)', '1'],
    ['tanh(0)', '0'],
    ['ln(e)', '1'],
    ['log(0.01)', '-2'],
  ])('%s = %s', (source, expected) => {
    expect(fmt(source)).toBe(expected);
  });

  it('evaluates variadic functions with many arguments', () => {
    const args = Array.from({ length: 100 }, (_, i) => String(i + 1)).join(', ');

    expect(formatExpression(`sum(${args})`)).toBe('5050');
    expect(formatExpression(`avg(${args})`)).toBe('50.5');
    expect(formatExpression(`min(${args})`)).toBe('1');
    expect(formatExpression(`max(${args})`)).toBe('100');
  });

  it('names the average function avg', () => {
    expect(formatExpression('avg(1, 2)')).toBe('1.5');
    expect(errorOf('average(1, 2)').message).toBe('unknown identifier "average"');
  });

  it('nests calls', () => {
    expect(formatExpression('max(abs(-3), min(10, sum(2, 2)), round(3.4))')).toBe('4');
  });
});

// -----------------------------------------------------------------------------
// Catalog variants
// -----------------------------------------------------------------------------

describe('Syntax – catalog variants', () => {
  it('switches precedence with the spreadsheet preset', () => {
    expect(formatExpression('-3^2')).toBe('-9');
    expect(formatExpression('-3^2', { style: 'spreadsheet' })).toBe('9');
    expect(formatExpression('2^-2', { style: 'spreadsheet' })).toBe('0.25');
  });

  it('evaluates localized names with the same semantics', () => {
    const catalog = localizeCatalog(getDefaultCatalog(), {
      functions: { average: 'moyenne', max: 'maximum' },
      constants: { pi: 'π' },
    });

    expect(formatExpression('moyenne(2, maximum(4, 8))', { catalog })).toBe('5');
    expect(formatExpression('π', { catalog, maxFractionDigits: 3 })).toBe('3.142');
    expect(errorOf('avg(1)', createEngine({ catalog })).message).toBe(
      'unknown identifier "avg"',
    );
  });

  it('restricts the language', () => {
    const catalog = restrictCatalog(getDefaultCatalog(), {
      operators: ['add', 'subtract', 'negate'],
      functions: [],
      constants: [],
    });
    const engine = createEngine({ catalog });

    expect(engine.evaluateToString('1 - -2 + 3')).toBe('6');
    expect(errorOf('2 * 3', engine)).toBeInstanceOf(LexicalError);
    expect(errorOf('abs(1)', engine).message).toBe('unknown identifier "abs"');
  });
});

// -----------------------------------------------------------------------------
// Negative cases
// -----------------------------------------------------------------------------

describe('Syntax – error categories', () => {
  it.each([
    ['1 # 2', LexicalError, 'E_LEXICAL'],
    ['(1+2', StructuralError, 'E_SYNTAX'],
    ['1+', StructuralError, 'E_SYNTAX'],
    ['', StructuralError, 'E_SYNTAX'],
    ['sum()', ArityError, 'E_ARITY'],
    ['abs(1, 2)', ArityError, 'E_ARITY'],
    ['1/0', InvalidOperandError, 'E_OPERAND'],
    ['log(-1)', InvalidOperandError, 'E_OPERAND'],
    ['asin(2)', InvalidOperandError, 'E_OPERAND'],
  ])('%j fails with %O', (source, type, code) => {
    const err = errorOf(source);

    expect(err).toBeInstanceOf(type);
    expect(err.code).toBe(code);
  });

  it('throws from evaluateExpression', () => {
    expect(() => evaluateExpression('1/(2-2)')).toThrow(InvalidOperandError);
  });
});
