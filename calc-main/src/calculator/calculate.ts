import { devError, devLog, devWarn } from "../shared/index.js";
import { toPostfix } from "./converter.js";
import { evaluatePostfix } from "./evaluator.js";
import { formatValue } from "./numeric.js";
import { formatTokens, tokenize } from "./tokenizer.js";
import {
  CalculatorError,
  InvalidExpressionError,
  type CalcErrorCode,
  type NumericValue,
} from "./types.js";

export interface CalcMeta {
  expression: string;
  durationMs: number;
  /** Offset into `expression` as the user typed it, whitespace included. */
  errorPos?: number;
}

export type CalcResult =
  | { ok: true; value: NumericValue; output: string; meta: CalcMeta }
  | { ok: false; error: string; code: CalcErrorCode; meta: CalcMeta };

function hasBalancedParentheses(expression: string): boolean {
  let depth = 0;
  for (const ch of expression) {
    if (ch === "(") depth++;
    else if (ch === ")") {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

const WHITESPACE = /\s/;

/** Maps an offset in the whitespace-stripped text back to `source`. */
function toSourceOffset(source: string, strippedOffset: number): number {
  let seen = 0;
  for (let i = 0; i < source.length; i++) {
    if (WHITESPACE.test(source.charAt(i))) continue;
    if (seen === strippedOffset) return i;
    seen++;
  }
  return source.length;
}

/**
 * Strips all whitespace and runs the checks that need the whole string:
 * emptiness and bracket balance. The result is what the tokenizer sees.
 */
export function prepareExpression(expression: string): string {
  const stripped = expression.replace(/\s+/g, "");

  if (stripped.length === 0) {
    throw new InvalidExpressionError("EMPTY_EXPRESSION");
  }

  if (!hasBalancedParentheses(stripped)) {
    throw new InvalidExpressionError("UNBALANCED_PARENTHESES");
  }

  return stripped;
}

function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function calculate(expression: string): NumericValue {
  try {
    const tokens = tokenize(prepareExpression(expression));
    const postfix = toPostfix(tokens);
    devLog("calculate", { tokens: formatTokens(tokens), postfix: formatTokens(postfix) });

    return evaluatePostfix(postfix);
  } catch (err) {
    if (err instanceof CalculatorError) throw err;

    devError("calculate: wrapping unexpected failure", err);
    throw new CalculatorError("UNKNOWN", { error: describeCause(err) }, { cause: err });
  }
}

export function calculateExpression(expression: string): string {
  return formatValue(calculate(expression));
}

/** Non-throwing form of `calculate` for front ends that render the outcome. */
export function tryCalculate(expression: string): CalcResult {
  const start = Date.now();

  try {
    const value = calculate(expression);
    return {
      ok: true,
      value,
      output: formatValue(value),
      meta: { expression, durationMs: Date.now() - start },
    };
  } catch (err) {
    if (!(err instanceof CalculatorError)) throw err;

    devWarn("tryCalculate", err.code, err.message);
    return {
      ok: false,
      error: err.message,
      code: err.code,
      meta: {
        expression,
        durationMs: Date.now() - start,
        ...(err.pos === undefined ? {} : { errorPos: toSourceOffset(expression, err.pos) }),
      },
    };
  }
}
