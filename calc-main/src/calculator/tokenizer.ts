import { binaryOperatorForSymbol, OPERATOR_SYMBOLS, OPERATORS, unaryOperatorForSymbol } from "./operators.js";
import { InvalidExpressionError, type OperatorId, type Token } from "./types.js";

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

const WHITESPACE = /\s/;

function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

function isTokenStart(ch: string): boolean {
  return isDigit(ch) || ch === "." || ch === "(" || ch === ")" || OPERATOR_SYMBOLS.some((sym) => sym.startsWith(ch));
}

function readNumber(input: string, start: number): string {
  let i = start;
  while (i < input.length && isDigit(input.charAt(i))) i++;
  if (input.charAt(i) === ".") {
    i++;
    while (i < input.length && isDigit(input.charAt(i))) i++;
  }
  return input.slice(start, i);
}

function readInvalidSymbol(input: string, start: number): string {
  let i = start + 1;
  while (i < input.length && !isWhitespace(input.charAt(i)) && !isTokenStart(input.charAt(i))) i++;
  return input.slice(start, i);
}

function matchOperatorSymbol(input: string, start: number): string | undefined {
  return OPERATOR_SYMBOLS.find((sym) => input.startsWith(sym, start));
}

/**
 * A `+` or `-` is unary at the start, after `(`, or after another operator.
 * A preceding unary operator counts too, so `--5` is two negations.
 */
function isUnaryPosition(previous: Token | undefined): boolean {
  return previous === undefined || previous.kind === "lparen" || previous.kind === "operator";
}

function resolveOperator(symbol: string, previous: Token | undefined): OperatorId | undefined {
  if (isUnaryPosition(previous)) {
    const unary = unaryOperatorForSymbol(symbol);
    if (unary) return unary;
  }
  return binaryOperatorForSymbol(symbol);
}

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    if (isDigit(ch) || (ch === "." && isDigit(input.charAt(i + 1)))) {
      const text = readNumber(input, i);
      tokens.push({ kind: "number", text });
      i += text.length;
      continue;
    }

    if (ch === "(") {
      tokens.push({ kind: "lparen" });
      i++;
      continue;
    }

    if (ch === ")") {
      tokens.push({ kind: "rparen" });
      i++;
      continue;
    }

    const symbol = matchOperatorSymbol(input, i);
    const op = symbol === undefined ? undefined : resolveOperator(symbol, tokens.at(-1));
    if (symbol !== undefined && op !== undefined) {
      tokens.push({ kind: "operator", op });
      i += symbol.length;
      continue;
    }

    const invalid = readInvalidSymbol(input, i);
    throw new InvalidExpressionError("INVALID_SYMBOL", { symbol: invalid }, i);
  }

  return tokens;
}

/** Display form: numbers and binary operators as written, unary operators by name. */
export function formatTokens(tokens: readonly Token[]): string[] {
  return tokens.map((token) => {
    switch (token.kind) {
      case "number":
        return token.text;
      case "lparen":
        return "(";
      case "rparen":
        return ")";
      case "operator": {
        const op = OPERATORS[token.op];
        return op.arity === "unary" ? op.id : op.symbol;
      }
    }
  });
}
