// tests/unit/catalog.spec.ts
//
// Grammar catalog: built-in presets, lookups, validation of custom
// definitions, localized and restricted variants.

import { describe, it, expect } from 'vitest';

import {
  PI,
  PLUS,
  SUM,
  createCatalog,
  getDefaultCatalog,
  getDefaultDefinition,
  localizeCatalog,
  restrictCatalog,
} from '../../src/core/catalog';
import type { CatalogDefinition } from '../../src/core/catalog';

function definitionWith(patch: Partial<CatalogDefinition>): CatalogDefinition {
  return { ...getDefaultDefinition(), ...patch };
}

describe('GrammarCatalog – built-in presets', () => {
  it('is shared and frozen', () => {
    const catalog = getDefaultCatalog();

    expect(getDefaultCatalog('standard')).toBe(catalog);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.operators)).toBe(true);
  });

  it('distinguishes unary and binary minus by arity', () => {
    const catalog = getDefaultCatalog();

    expect(catalog.findOperator('-', 1)?.id).toBe('negate');
    expect(catalog.findOperator('-', 2)?.id).toBe('subtract');
    expect(catalog.findOperator('*', 1)).toBeUndefined();
  });

  it('binds unary minus tighter than ^ only in the spreadsheet preset', () => {
    const power = getDefaultCatalog().findOperator('^', 2)?.precedence;

    expect(getDefaultCatalog('standard').findOperator('-', 1)?.precedence).toBe(3);
    expect(getDefaultCatalog('spreadsheet').findOperator('-', 1)?.precedence).toBe(5);
    expect(power).toBe(4);
  });

  it('uses the documented precedence table', () => {
    const catalog = getDefaultCatalog();
    const precedence = (symbol: string): number | undefined =>
      catalog.findOperator(symbol, 2)?.precedence;

    expect(['+', '-', '*', '/', '%', '^'].map(precedence)).toEqual([
      1, 1, 2, 2, 2, 4,
    ]);
  });

  it('looks functions and constants up by exact name', () => {
    const catalog = getDefaultCatalog();

    expect(catalog.findFunction('avg')?.id).toBe('average');
    expect(catalog.findFunction('AVG')).toBeUndefined();
    expect(catalog.findFunction('sum')).toMatchObject({
      minArgs: 1,
      maxArgs: Infinity,
    });
    expect(catalog.findFunction('random')).toMatchObject({
      minArgs: 0,
      maxArgs: 0,
    });
    expect(catalog.findConstant('e')?.id).toBe('e');
    expect(catalog.findConstant('sin')).toBeUndefined();
  });

  it('lists brackets and the separator as lexical symbols', () => {
    const symbols = getDefaultCatalog().symbols.map((s) => `${s.type}:${s.text}`);

    expect(symbols).toContain('open-bracket:(');
    expect(symbols).toContain('close-bracket:)');
    expect(symbols).toContain('separator:,');
    expect(symbols).toContain('operator:-');
  });
});

describe('GrammarCatalog – validation', () => {
  it('rejects duplicate operators of the same arity', () => {
    expect(() => createCatalog(definitionWith({ operators: [PLUS, PLUS] }))).toThrow(
      'Decimath catalog: duplicate binary operator "+".',
    );
  });

  it('rejects names that are not letters', () => {
    expect(() =>
      createCatalog(definitionWith({ functions: [{ ...SUM, name: 'sum2' }] })),
    ).toThrow('Decimath catalog: "sum2" is not a valid name (letters only).');
  });

  it('rejects inverted argument bounds', () => {
    expect(() =>
      createCatalog(
        definitionWith({ functions: [{ ...SUM, minArgs: 3, maxArgs: 2 }] }),
      ),
    ).toThrow('Decimath catalog: function "sum" has invalid argument bounds 3..2.');
  });

  it('rejects a constant that shares a function name', () => {
    expect(() =>
      createCatalog(definitionWith({ constants: [{ ...PI, name: 'sum' }] })),
    ).toThrow('Decimath catalog: name "sum" is already taken.');
  });

  it('rejects a symbol used for two purposes', () => {
    expect(() => createCatalog(definitionWith({ separator: '+' }))).toThrow(
      'Decimath catalog: symbol "+" is used both as operator and as separator.',
    );
  });

  it('rejects operator symbols made of letters', () => {
    expect(() =>
      createCatalog(definitionWith({ operators: [{ ...PLUS, symbol: 'plus' }] })),
    ).toThrow(/symbol "plus" must be non-empty/);
  });

  it('rejects brackets that open and close with the same symbol', () => {
    expect(() =>
      createCatalog(
        definitionWith({ expressionBrackets: [{ open: '|', close: '|' }] }),
      ),
    ).toThrow('Decimath catalog: bracket pair "||" needs distinct open and close symbols.');
  });
});

describe('GrammarCatalog – derived catalogs', () => {
  it('relabels descriptors and keeps their ids', () => {
    const french = localizeCatalog(getDefaultCatalog(), {
      functions: { sin: 'sinus', average: 'moyenne' },
      constants: { e: 'euler' },
    });

    expect(french.findFunction('sinus')?.id).toBe('sin');
    expect(french.findFunction('moyenne')?.id).toBe('average');
    expect(french.findFunction('sin')).toBeUndefined();
    expect(french.findConstant('euler')?.id).toBe('e');
    expect(french.findFunction('cos')?.name).toBe('cos');
  });

  it('keeps only the selected descriptors', () => {
    const trig = restrictCatalog(getDefaultCatalog(), {
      functions: ['sin', 'cos'],
      constants: ['pi'],
    });

    expect(trig.functions.map((f) => f.name)).toEqual(['sin', 'cos']);
    expect(trig.findConstant('e')).toBeUndefined();
    expect(trig.operators).toHaveLength(getDefaultCatalog().operators.length);
  });

  it('hands out independent definition copies', () => {
    const catalog = getDefaultCatalog();
    const definition = catalog.toDefinition();

    definition.functionBrackets = [];

    expect(catalog.functionBrackets).toHaveLength(1);
    expect(getDefaultDefinition('spreadsheet').operators).not.toBe(
      getDefaultDefinition('spreadsheet').operators,
    );
  });
});
