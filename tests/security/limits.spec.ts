// tests/security/limits.spec.ts
//
// Input size limits and large inputs:
//  - maxExpressionLength rejects long sources before lexing
//  - deep nesting and very wide expressions evaluate without recursion
//  - identifiers that look like object members are not resolved

import { describe, it, expect } from 'vitest';

import { StructuralError, createEngine } from '../../src';

function buildWideExpression(count: number): string {
  return Array.from({ length: count }, () => '1').join(' + ');
}

function buildNestedExpression(depth: number): string {
  return `${'('.repeat(depth)}1${')'.repeat(depth)}`;
}

describe('Security – expression length', () => {
  it('accepts sources up to the limit', () => {
    const engine = createEngine({ maxExpressionLength: 9 });

    expect(engine.evaluateToString('1 + 1 + 1')).toBe('3');
  });

  it('rejects longer sources with a located error', () => {
    const engine = createEngine({ maxExpressionLength: 9 });
    const result = engine.tryEvaluate('1 + 1 + 11');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StructuralError);
    expect(result.error.message).toBe('expression is longer than 9 characters');
    expect(result.error.index).toBe(9);
  });
});

describe('Security – large inputs', () => {
  it('evaluates deeply nested brackets', () => {
    expect(createEngine().evaluateToString(buildNestedExpression(10_000))).toBe('1');
  });

  it('evaluates very wide expressions', () => {
    expect(createEngine().evaluateToString(buildWideExpression(10_000))).toBe('10000');
  });

  it('reports an unbalanced bracket deep inside', () => {
    const source = `${buildNestedExpression(5_000)})`;
    const result = createEngine().tryEvaluate(source);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.index).toBe(10_001);
  });
});

describe('Security – identifiers', () => {
  it.each(['constructor', 'toString', 'hasOwnProperty'])(
    'does not resolve %s',
    (name) => {
      const result = createEngine().tryEvaluate(`${name}(1)`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(`unknown identifier "${name}"`);
    },
  );

  it('rejects __proto__ at the underscore', () => {
    const result = createEngine().tryEvaluate('__proto__');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('E_LEXICAL');
    expect(result.error.index).toBe(0);
  });
});
