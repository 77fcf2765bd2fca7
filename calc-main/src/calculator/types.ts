import { formatMessage, type MessageContext } from "./messages.js";

export type OperatorId =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "floordiv"
  | "mod"
  | "pow"
  | "pos"
  | "neg";

export type Token =
  | { kind: "number"; text: string }
  | { kind: "operator"; op: OperatorId }
  | { kind: "lparen" }
  | { kind: "rparen" };

export type NumericValue =
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number };

export type IntValue = Extract<NumericValue, { kind: "int" }>;

export type Associativity = "left" | "right";

export type OperatorDescriptor =
  | {
      readonly id: OperatorId;
      readonly symbol: string;
      readonly precedence: number;
      readonly associativity: Associativity;
      readonly arity: "unary";
      readonly apply: (operand: NumericValue) => NumericValue;
    }
  | {
      readonly id: OperatorId;
      readonly symbol: string;
      readonly precedence: number;
      readonly associativity: Associativity;
      readonly arity: "binary";
      readonly apply: (left: NumericValue, right: NumericValue) => NumericValue;
    };

export type InvalidExpressionCode =
  | "EMPTY_EXPRESSION"
  | "INVALID_SYMBOL"
  | "UNBALANCED_PARENTHESES"
  | "NOT_ENOUGH_OPERANDS"
  | "INVALID_EXPRESSION"
  | "INTEGER_OPERATION";

export type CalcErrorCode = InvalidExpressionCode | "DIVISION_BY_ZERO" | "UNKNOWN";

export class CalculatorError extends Error {
  /** Offset into the text handed to the tokenizer, when the failure has one. */
  public readonly pos: number | undefined;

  constructor(
    public readonly code: CalcErrorCode,
    public readonly context: MessageContext = {},
    options?: { cause?: unknown; pos?: number },
  ) {
    super(formatMessage(code, context), options && options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CalculatorError";
    this.pos = options?.pos;
  }
}

export class InvalidExpressionError extends CalculatorError {
  constructor(code: InvalidExpressionCode, context: MessageContext = {}, pos?: number) {
    super(code, context, { pos });
    this.name = "InvalidExpressionError";
  }
}

export class DivisionByZeroError extends CalculatorError {
  constructor(operator: string) {
    super("DIVISION_BY_ZERO", { operator });
    this.name = "DivisionByZeroError";
  }
}
