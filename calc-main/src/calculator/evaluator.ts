import { getOperator } from "./operators.js";
import { isZero, parseNumberLiteral } from "./numeric.js";
import {
  DivisionByZeroError,
  InvalidExpressionError,
  type NumericValue,
  type OperatorDescriptor,
  type OperatorId,
  type Token,
} from "./types.js";

const ZERO_CHECKED: ReadonlySet<OperatorId> = new Set(["div", "floordiv", "mod"]);

// Runs before `apply`: a zero divisor wins over the integer-only check in `//` and `%`.
function checkDivisor(op: OperatorDescriptor, right: NumericValue): void {
  if (ZERO_CHECKED.has(op.id) && isZero(right)) {
    throw new DivisionByZeroError(op.symbol);
  }
}

function applyOperator(stack: NumericValue[], op: OperatorDescriptor): void {
  if (op.arity === "unary") {
    const operand = stack.pop();
    if (operand === undefined) {
      throw new InvalidExpressionError("NOT_ENOUGH_OPERANDS", { operator: op.symbol });
    }
    stack.push(op.apply(operand));
    return;
  }

  // Right was pushed last, so it comes off first.
  const right = stack.pop();
  const left = stack.pop();
  if (left === undefined || right === undefined) {
    throw new InvalidExpressionError("NOT_ENOUGH_OPERANDS", { operator: op.symbol });
  }

  checkDivisor(op, right);
  stack.push(op.apply(left, right));
}

export function evaluatePostfix(tokens: readonly Token[]): NumericValue {
  const stack: NumericValue[] = [];

  for (const token of tokens) {
    switch (token.kind) {
      case "number": {
        const value = parseNumberLiteral(token.text);
        if (value === null) {
          throw new InvalidExpressionError("INVALID_SYMBOL", { symbol: token.text });
        }
        stack.push(value);
        break;
      }

      case "operator":
        applyOperator(stack, getOperator(token.op));
        break;

      case "lparen":
      case "rparen":
        throw new InvalidExpressionError("UNBALANCED_PARENTHESES");
    }
  }

  const result = stack.pop();
  if (result === undefined || stack.length > 0) {
    throw new InvalidExpressionError("INVALID_EXPRESSION");
  }
  return result;
}
