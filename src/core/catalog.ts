/**
 * Decimath – Grammar catalog
 *
 * The closed set of operators, functions, constants and brackets the
 * tokenizer and evaluator understand. A catalog is built once, validated,
 * frozen and then shared read-only by every evaluation.
 *
 * Every descriptor has a stable `id` that selects its semantics and a
 * surface `symbol`/`name` that the tokenizer matches. Relabelling a catalog
 * (localized names) only changes the surface text; the `id` stays.
 *
 * Typical usage:
 *
 *   const catalog = getDefaultCatalog('spreadsheet');
 *
 *   const french = localizeCatalog(getDefaultCatalog(), {
 *     functions: { sin: 'sinus', average: 'moyenne' },
 *   });
 *
 * License: Apache-2.0
 */

/////////////////////
// Descriptor types //
/////////////////////

export type OperatorId =
  | 'negate'
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'modulo'
  | 'power';

export type FunctionId =
  | 'abs'
  | 'ceil'
  | 'floor'
  | 'round'
  | 'sin'
  | 'cos'
  | 'tan'
  | 'asin'
  | 'acos'
  | 'atan'
  | 'sinh'
  | 'cosh'
  | 'tanh'
  | 'ln'
  | 'log'
  | 'min'
  | 'max'
  | 'sum'
  | 'average'
  | 'random';

export type ConstantId = 'pi' | 'e';

export type Associativity = 'left' | 'right';

/**
 * Precedence presets:
 *  - 'standard':    unary minus binds looser than `^`   (-2^2 = -4)
 *  - 'spreadsheet': unary minus binds tighter than `^`  (-2^2 = 4)
 */
export type CatalogStyle = 'standard' | 'spreadsheet';

export interface OperatorDescriptor {
  readonly kind: 'operator';
  readonly id: OperatorId;
  readonly symbol: string;
  readonly arity: 1 | 2;
  readonly associativity: Associativity;
  /** Higher binds tighter. */
  readonly precedence: number;
}

export interface FunctionDescriptor {
  readonly kind: 'function';
  readonly id: FunctionId;
  readonly name: string;
  readonly minArgs: number;
  /** `Infinity` for variadic functions. */
  readonly maxArgs: number;
}

export interface ConstantDescriptor {
  readonly kind: 'constant';
  readonly id: ConstantId;
  readonly name: string;
}

export interface BracketPair {
  readonly open: string;
  readonly close: string;
}

/**
 * Raw material for a catalog. Any subset of the built-in descriptors (or
 * relabelled copies of them) is a valid definition.
 */
export interface CatalogDefinition {
  operators: readonly OperatorDescriptor[];
  functions: readonly FunctionDescriptor[];
  constants: readonly ConstantDescriptor[];
  /** Brackets that may follow a function name. */
  functionBrackets: readonly BracketPair[];
  /** Brackets that group a sub-expression. */
  expressionBrackets: readonly BracketPair[];
  /** Argument separator, "," by default. */
  separator?: string;
}

/**
 * A fixed piece of text the tokenizer matches verbatim.
 */
export interface LexicalSymbol {
  readonly text: string;
  readonly type: 'operator' | 'open-bracket' | 'close-bracket' | 'separator';
}

//////////////////////////
// Built-in descriptors //
//////////////////////////

function defineOperator(
  id: OperatorId,
  symbol: string,
  arity: 1 | 2,
  associativity: Associativity,
  precedence: number,
): OperatorDescriptor {
  return Object.freeze({
    kind: 'operator',
    id,
    symbol,
    arity,
    associativity,
    precedence,
  });
}

function defineFunction(
  id: FunctionId,
  name: string,
  minArgs: number,
  maxArgs: number = minArgs,
): FunctionDescriptor {
  return Object.freeze({ kind: 'function', id, name, minArgs, maxArgs });
}

function defineConstant(id: ConstantId, name: string): ConstantDescriptor {
  return Object.freeze({ kind: 'constant', id, name });
}

/** Unary minus, standard precedence. */
export const NEGATE = defineOperator('negate', '-', 1, 'right', 3);
/** Unary minus, spreadsheet precedence. */
export const NEGATE_HIGH = defineOperator('negate', '-', 1, 'right', 5);
export const MINUS = defineOperator('subtract', '-', 2, 'left', 1);
export const PLUS = defineOperator('add', '+', 2, 'left', 1);
export const MULTIPLY = defineOperator('multiply', '*', 2, 'left', 2);
export const DIVIDE = defineOperator('divide', '/', 2, 'left', 2);
export const MODULO = defineOperator('modulo', '%', 2, 'left', 2);
export const EXPONENT = defineOperator('power', '^', 2, 'left', 4);

export const ABS = defineFunction('abs', 'abs', 1);
export const CEIL = defineFunction('ceil', 'ceil', 1);
export const FLOOR = defineFunction('floor', 'floor', 1);
export const ROUND = defineFunction('round', 'round', 1);
export const SINE = defineFunction('sin', 'sin', 1);
export const COSINE = defineFunction('cos', 'cos', 1);
export const TANGENT = defineFunction('tan', 'tan', 1);
export const ASINE = defineFunction('asin', 'asin', 1);
export const ACOSINE = defineFunction('acos', 'acos', 1);
export const ATAN = defineFunction('atan', 'atan', 1);
export const SINEH = defineFunction('sinh', 'sinh', 1);
export const COSINEH = defineFunction('cosh', 'cosh', 1);
export const TANGENTH = defineFunction('tanh', 'tanh', 1);
export const LN = defineFunction('ln', 'ln', 1);
export const LOG = defineFunction('log', 'log', 1);
export const MIN = defineFunction('min', 'min', 1, Infinity);
export const MAX = defineFunction('max', 'max', 1, Infinity);
export const SUM = defineFunction('sum', 'sum', 1, Infinity);
export const AVERAGE = defineFunction('average', 'avg', 1, Infinity);
export const RANDOM = defineFunction('random', 'random', 0);

export const PI = defineConstant('pi', 'pi');
export const E = defineConstant('e', 'e');

export const PARENTHESES: BracketPair = Object.freeze({ open: '(', close: ')' });

const STANDARD_OPERATORS: readonly OperatorDescriptor[] = [
  NEGATE,
  MINUS,
  PLUS,
  MULTIPLY,
  DIVIDE,
  EXPONENT,
  MODULO,
];

const SPREADSHEET_OPERATORS: readonly OperatorDescriptor[] = [
  NEGATE_HIGH,
  MINUS,
  PLUS,
  MULTIPLY,
  DIVIDE,
  EXPONENT,
  MODULO,
];

const FUNCTIONS: readonly FunctionDescriptor[] = [
  SINE,
  COSINE,
  TANGENT,
  ASINE,
  ACOSINE,
  ATAN,
  SINEH,
  COSINEH,
  TANGENTH,
  MIN,
  MAX,
  SUM,
  AVERAGE,
  LN,
  LOG,
  ROUND,
  CEIL,
  FLOOR,
  ABS,
  RANDOM,
];

const CONSTANTS: readonly ConstantDescriptor[] = [PI, E];

///////////////////////
// Catalog           //
///////////////////////

const IDENTIFIER_PATTERN = /^\p{L}+$/u;
const RESERVED_SYMBOL_CHAR = /[\p{L}\d\s.]/u;

/**
 * A validated, frozen catalog.
 *
 * Construction throws a plain `Error` when the definition breaks an
 * invariant; that is a programming error in the caller, not an evaluation
 * failure.
 */
export class GrammarCatalog {
  public readonly operators: readonly OperatorDescriptor[];
  public readonly functions: readonly FunctionDescriptor[];
  public readonly constants: readonly ConstantDescriptor[];
  public readonly functionBrackets: readonly BracketPair[];
  public readonly expressionBrackets: readonly BracketPair[];
  public readonly separator: string;

  /** Every fixed symbol, longest first. */
  public readonly symbols: readonly LexicalSymbol[];

  private readonly unary = new Map<string, OperatorDescriptor>();
  private readonly binary = new Map<string, OperatorDescriptor>();
  private readonly functionsByName = new Map<string, FunctionDescriptor>();
  private readonly constantsByName = new Map<string, ConstantDescriptor>();

  constructor(definition: CatalogDefinition) {
    this.operators = Object.freeze([...definition.operators]);
    this.functions = Object.freeze([...definition.functions]);
    this.constants = Object.freeze([...definition.constants]);
    this.functionBrackets = Object.freeze([...definition.functionBrackets]);
    this.expressionBrackets = Object.freeze([
      ...definition.expressionBrackets,
    ]);
    this.separator = definition.separator ?? ',';

    const symbolTypes = new Map<string, LexicalSymbol['type']>();
    const claim = (text: string, type: LexicalSymbol['type']): void => {
      if (text === '' || RESERVED_SYMBOL_CHAR.test(text)) {
        throw new Error(
          `Decimath catalog: symbol "${text}" must be non-empty and must not contain letters, digits, dots or whitespace.`,
        );
      }
      const existing = symbolTypes.get(text);
      if (existing !== undefined && existing !== type) {
        throw new Error(
          `Decimath catalog: symbol "${text}" is used both as ${existing} and as ${type}.`,
        );
      }
      symbolTypes.set(text, type);
    };

    for (const op of this.operators) {
      if (!Number.isFinite(op.precedence)) {
        throw new Error(
          `Decimath catalog: operator "${op.symbol}" needs a finite precedence.`,
        );
      }
      const table = op.arity === 1 ? this.unary : this.binary;
      if (table.has(op.symbol)) {
        throw new Error(
          `Decimath catalog: duplicate ${op.arity === 1 ? 'unary' : 'binary'} operator "${op.symbol}".`,
        );
      }
      table.set(op.symbol, op);
      claim(op.symbol, 'operator');
    }

    for (const fn of this.functions) {
      assertIdentifier(fn.name);
      if (
        !Number.isInteger(fn.minArgs) ||
        fn.minArgs < 0 ||
        !(Number.isInteger(fn.maxArgs) || fn.maxArgs === Infinity) ||
        fn.minArgs > fn.maxArgs
      ) {
        throw new Error(
          `Decimath catalog: function "${fn.name}" has invalid argument bounds ${fn.minArgs}..${fn.maxArgs}.`,
        );
      }
      if (this.functionsByName.has(fn.name)) {
        throw new Error(`Decimath catalog: duplicate function "${fn.name}".`);
      }
      this.functionsByName.set(fn.name, fn);
    }

    for (const constant of this.constants) {
      assertIdentifier(constant.name);
      if (
        this.constantsByName.has(constant.name) ||
        this.functionsByName.has(constant.name)
      ) {
        throw new Error(
          `Decimath catalog: name "${constant.name}" is already taken.`,
        );
      }
      this.constantsByName.set(constant.name, constant);
    }

    for (const pair of [...this.functionBrackets, ...this.expressionBrackets]) {
      if (pair.open === pair.close) {
        throw new Error(
          `Decimath catalog: bracket pair "${pair.open}${pair.close}" needs distinct open and close symbols.`,
        );
      }
      claim(pair.open, 'open-bracket');
      claim(pair.close, 'close-bracket');
    }

    claim(this.separator, 'separator');

    this.symbols = Object.freeze(
      [...symbolTypes.entries()]
        .map(([text, type]): LexicalSymbol => Object.freeze({ text, type }))
        .sort((a, b) => b.text.length - a.text.length),
    );

    Object.freeze(this);
  }

  findOperator(symbol: string, arity: 1 | 2): OperatorDescriptor | undefined {
    return (arity === 1 ? this.unary : this.binary).get(symbol);
  }

  findFunction(name: string): FunctionDescriptor | undefined {
    return this.functionsByName.get(name);
  }

  findConstant(name: string): ConstantDescriptor | undefined {
    return this.constantsByName.get(name);
  }

  findFunctionBracket(open: string): BracketPair | undefined {
    return this.functionBrackets.find((pair) => pair.open === open);
  }

  findExpressionBracket(open: string): BracketPair | undefined {
    return this.expressionBrackets.find((pair) => pair.open === open);
  }

  /**
   * A fresh, mutable copy of the definition this catalog was built from.
   */
  toDefinition(): CatalogDefinition {
    return {
      operators: [...this.operators],
      functions: [...this.functions],
      constants: [...this.constants],
      functionBrackets: [...this.functionBrackets],
      expressionBrackets: [...this.expressionBrackets],
      separator: this.separator,
    };
  }
}

function assertIdentifier(name: string): void {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(
      `Decimath catalog: "${name}" is not a valid name (letters only).`,
    );
  }
}

/////////////////////////////
// Factories               //
/////////////////////////////

export function createCatalog(definition: CatalogDefinition): GrammarCatalog {
  return new GrammarCatalog(definition);
}

/**
 * A new copy of the built-in definition for the given style. Each call
 * returns fresh arrays, so callers can filter or relabel them freely.
 */
export function getDefaultDefinition(
  style: CatalogStyle = 'standard',
): CatalogDefinition {
  return {
    operators: [
      ...(style === 'standard' ? STANDARD_OPERATORS : SPREADSHEET_OPERATORS),
    ],
    functions: [...FUNCTIONS],
    constants: [...CONSTANTS],
    functionBrackets: [PARENTHESES],
    expressionBrackets: [PARENTHESES],
    separator: ',',
  };
}

const defaultCatalogs = new Map<CatalogStyle, GrammarCatalog>();

/**
 * Shared built-in catalog for a style (built lazily, once).
 */
export function getDefaultCatalog(
  style: CatalogStyle = 'standard',
): GrammarCatalog {
  let catalog = defaultCatalogs.get(style);
  if (!catalog) {
    catalog = createCatalog(getDefaultDefinition(style));
    defaultCatalogs.set(style, catalog);
  }
  return catalog;
}

/**
 * Surface names keyed by stable id.
 */
export interface CatalogLabels {
  operators?: Partial<Record<OperatorId, string>>;
  functions?: Partial<Record<FunctionId, string>>;
  constants?: Partial<Record<ConstantId, string>>;
}

/**
 * Derive a catalog whose descriptors carry new surface names.
 */
export function localizeCatalog(
  base: GrammarCatalog,
  labels: CatalogLabels,
): GrammarCatalog {
  const def = base.toDefinition();
  return createCatalog({
    ...def,
    operators: def.operators.map((op) => {
      const symbol = labels.operators?.[op.id];
      return symbol === undefined ? op : Object.freeze({ ...op, symbol });
    }),
    functions: def.functions.map((fn) => {
      const name = labels.functions?.[fn.id];
      return name === undefined ? fn : Object.freeze({ ...fn, name });
    }),
    constants: def.constants.map((constant) => {
      const name = labels.constants?.[constant.id];
      return name === undefined ? constant : Object.freeze({ ...constant, name });
    }),
  });
}

/**
 * Which ids survive in a restricted catalog. Omitted groups are kept whole.
 */
export interface CatalogSelection {
  operators?: readonly OperatorId[];
  functions?: readonly FunctionId[];
  constants?: readonly ConstantId[];
}

/**
 * Derive a catalog that only keeps the selected descriptors.
 */
export function restrictCatalog(
  base: GrammarCatalog,
  selection: CatalogSelection,
): GrammarCatalog {
  const def = base.toDefinition();
  const keep = <T extends { id: string }>(
    items: readonly T[],
    ids: readonly string[] | undefined,
  ): T[] =>
    ids === undefined ? [...items] : items.filter((item) => ids.includes(item.id));

  return createCatalog({
    ...def,
    operators: keep(def.operators, selection.operators),
    functions: keep(def.functions, selection.functions),
    constants: keep(def.constants, selection.constants),
  });
}
