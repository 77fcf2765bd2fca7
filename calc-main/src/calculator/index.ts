export {
  calculate,
  calculateExpression,
  prepareExpression,
  tryCalculate,
  type CalcMeta,
  type CalcResult,
} from "./calculate.js";
export { tokenize, formatTokens } from "./tokenizer.js";
export { toPostfix } from "./converter.js";
export { evaluatePostfix } from "./evaluator.js";
export {
  OPERATORS,
  getOperator,
  binaryOperatorForSymbol,
  unaryOperatorForSymbol,
  isUnary,
  shouldPopOperator,
} from "./operators.js";
export { parseNumberLiteral, isNumberLiteral, formatValue, toFloat } from "./numeric.js";
export {
  formatMessage,
  DEFAULT_EXIT_COMMANDS,
  HELP_MESSAGE,
  WELCOME_MESSAGE,
  type MessageContext,
} from "./messages.js";
export {
  CalculatorError,
  DivisionByZeroError,
  InvalidExpressionError,
  type Associativity,
  type CalcErrorCode,
  type IntValue,
  type InvalidExpressionCode,
  type NumericValue,
  type OperatorDescriptor,
  type OperatorId,
  type Token,
} from "./types.js";
