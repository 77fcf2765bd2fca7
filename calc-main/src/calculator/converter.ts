import { shouldPopOperator } from "./operators.js";
import { InvalidExpressionError, type Token } from "./types.js";

type StackEntry = Extract<Token, { kind: "operator" | "lparen" }>;

/**
 * Converts an infix token stream to postfix order (shunting-yard).
 * The input array is left untouched.
 */
export function toPostfix(tokens: readonly Token[]): Token[] {
  const output: Token[] = [];
  const stack: StackEntry[] = [];

  for (const token of tokens) {
    switch (token.kind) {
      case "number":
        output.push(token);
        break;

      case "operator": {
        let top = stack.at(-1);
        while (top?.kind === "operator" && shouldPopOperator(top.op, token.op)) {
          output.push(top);
          stack.pop();
          top = stack.at(-1);
        }
        stack.push(token);
        break;
      }

      case "lparen":
        stack.push(token);
        break;

      case "rparen": {
        let top = stack.pop();
        while (top !== undefined && top.kind !== "lparen") {
          output.push(top);
          top = stack.pop();
        }
        if (top === undefined) {
          throw new InvalidExpressionError("UNBALANCED_PARENTHESES");
        }
        break;
      }
    }
  }

  for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
    if (top.kind === "lparen") {
      throw new InvalidExpressionError("UNBALANCED_PARENTHESES");
    }
    output.push(top);
  }

  return output;
}
