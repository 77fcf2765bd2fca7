import {
  add,
  divide,
  floorDivide,
  identity,
  isInteger,
  modulo,
  multiply,
  negate,
  power,
  subtract,
} from "./numeric.js";
import {
  InvalidExpressionError,
  type IntValue,
  type NumericValue,
  type OperatorDescriptor,
  type OperatorId,
} from "./types.js";

function integerOnly(
  symbol: string,
  apply: (left: IntValue, right: IntValue) => IntValue,
): (left: NumericValue, right: NumericValue) => NumericValue {
  return (left, right) => {
    if (!isInteger(left) || !isInteger(right)) {
      throw new InvalidExpressionError("INTEGER_OPERATION", { operator: symbol });
    }
    return apply(left, right);
  };
}

// Higher precedence binds tighter. Unary +/- outrank **, so `-2 ** 2` reads as
// `(-2) ** 2`; `2 ** -1` still works because the unary is pushed above `**`.
const TABLE: Record<OperatorId, OperatorDescriptor> = {
  pos: { id: "pos", symbol: "+", precedence: 5, associativity: "right", arity: "unary", apply: identity },
  neg: { id: "neg", symbol: "-", precedence: 5, associativity: "right", arity: "unary", apply: negate },
  pow: { id: "pow", symbol: "**", precedence: 4, associativity: "right", arity: "binary", apply: power },
  mul: { id: "mul", symbol: "*", precedence: 3, associativity: "left", arity: "binary", apply: multiply },
  div: { id: "div", symbol: "/", precedence: 3, associativity: "left", arity: "binary", apply: divide },
  floordiv: { id: "floordiv", symbol: "//", precedence: 3, associativity: "left", arity: "binary", apply: integerOnly("//", floorDivide) },
  mod: { id: "mod", symbol: "%", precedence: 3, associativity: "left", arity: "binary", apply: integerOnly("%", modulo) },
  add: { id: "add", symbol: "+", precedence: 2, associativity: "left", arity: "binary", apply: add },
  sub: { id: "sub", symbol: "-", precedence: 2, associativity: "left", arity: "binary", apply: subtract },
};

for (const descriptor of Object.values(TABLE)) {
  Object.freeze(descriptor);
}

export const OPERATORS: Readonly<Record<OperatorId, OperatorDescriptor>> = Object.freeze(TABLE);

function indexBySymbol(arity: OperatorDescriptor["arity"]): ReadonlyMap<string, OperatorId> {
  const index = new Map<string, OperatorId>();
  for (const op of Object.values(OPERATORS)) {
    if (op.arity === arity) index.set(op.symbol, op.id);
  }
  return index;
}

const BINARY_BY_SYMBOL = indexBySymbol("binary");
const UNARY_BY_SYMBOL = indexBySymbol("unary");

/** Longest first, so `**` and `//` win over `*` and `/`. */
export const OPERATOR_SYMBOLS: readonly string[] = [...BINARY_BY_SYMBOL.keys()].sort((a, b) => b.length - a.length);

export function getOperator(id: OperatorId): OperatorDescriptor {
  return OPERATORS[id];
}

export function binaryOperatorForSymbol(symbol: string): OperatorId | undefined {
  return BINARY_BY_SYMBOL.get(symbol);
}

export function unaryOperatorForSymbol(symbol: string): OperatorId | undefined {
  return UNARY_BY_SYMBOL.get(symbol);
}

export function isUnary(id: OperatorId): boolean {
  return OPERATORS[id].arity === "unary";
}

/**
 * Shunting-yard pop rule: pop the stacked operator when it binds tighter than
 * the incoming one, or equally tight and the incoming one is left-associative.
 */
export function shouldPopOperator(stackTop: OperatorId, incoming: OperatorId): boolean {
  const top = OPERATORS[stackTop];
  const current = OPERATORS[incoming];

  if (top.precedence > current.precedence) return true;
  return top.precedence === current.precedence && current.associativity === "left";
}
