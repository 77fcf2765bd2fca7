import type { CalcErrorCode } from "./types.js";

export interface MessageContext {
  symbol?: string;
  operator?: string;
  error?: string;
}

const ERROR_TEMPLATES: Record<CalcErrorCode, string> = {
  EMPTY_EXPRESSION: "Expression is empty",
  INVALID_SYMBOL: "Invalid symbol: '{symbol}'",
  UNBALANCED_PARENTHESES: "Unbalanced parentheses",
  NOT_ENOUGH_OPERANDS: "Not enough operands for operator '{operator}'",
  INVALID_EXPRESSION: "Invalid or incomplete expression",
  INTEGER_OPERATION: "Operator '{operator}' requires integer operands",
  DIVISION_BY_ZERO: "Division by zero",
  UNKNOWN: "Unexpected error: {error}",
};

export function formatMessage(code: CalcErrorCode, context: MessageContext = {}): string {
  return ERROR_TEMPLATES[code].replace(/\{(symbol|operator|error)\}/g, (_, key: keyof MessageContext) => {
    return context[key] ?? "?";
  });
}

export const DEFAULT_EXIT_COMMANDS = ["exit", "quit", "q"] as const;

export const WELCOME_MESSAGE = [
  "Calculator ready.",
  "Operators: + - * / // % ** and parentheses. Unary + and - are supported.",
  "Type /help for commands, or exit to quit.",
].join("\n");

export const HELP_MESSAGE = [
  "Enter an expression to evaluate it, e.g. (2 + 3) * 4",
  "/tokens <expr>  show the token stream",
  "/rpn <expr>     show the postfix (RPN) form",
  "/clear          clear the history",
  "/help           show this help",
].join("\n");
