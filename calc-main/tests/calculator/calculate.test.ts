import { afterEach, describe, expect, it, vi } from "vitest";
import { calculate, calculateExpression, prepareExpression, tryCalculate } from "../../src/calculator/calculate.js";
import {
  CalculatorError,
  DivisionByZeroError,
  InvalidExpressionError,
} from "../../src/calculator/types.js";

function errorOf(fn: () => unknown): CalculatorError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CalculatorError) return e;
    throw e;
  }
  throw new Error("expected a CalculatorError");
}

describe("calculate", () => {
  describe("simple expressions", () => {
    it.each([
      ["2 + 2", "4"],
      ["10 - 5", "5"],
      ["3 * 4", "12"],
      ["15 / 3", "5.0"],
      ["7 / 2", "3.5"],
      ["10 // 3", "3"],
      ["10 % 3", "1"],
      ["2 ** 4", "16"],
    ])("%s = %s", (expression, expected) => {
      expect(calculateExpression(expression)).toBe(expected);
    });
  });

  it("tags true division as float and floor division as int", () => {
    expect(calculate("15 / 3")).toEqual({ kind: "float", value: 5 });
    expect(calculate("10 // 3")).toEqual({ kind: "int", value: 3n });
  });

  describe("precedence and associativity", () => {
    it.each([
      ["2 + 3 * 4", "14"],
      ["(2 + 3) * 4", "20"],
      ["2 ** 3 ** 2", "512"],
      ["10 // 3 + 10 % 3", "4"],
      ["2 + 3 * (4 - 1)", "11"],
      ["(2 + 3) * (4 - 1)", "15"],
      ["10 + 20 * 30", "610"],
      ["2 * 3 + 4 * 5", "26"],
      ["100 - 10 - 1", "89"],
    ])("%s = %s", (expression, expected) => {
      expect(calculateExpression(expression)).toBe(expected);
    });
  });

  describe("unary operators", () => {
    it.each([
      ["-5", "-5"],
      ["+3", "3"],
      ["2 + -3", "-1"],
      ["-(2 + 3)", "-5"],
      ["-2 * -3", "6"],
      ["--5", "5"],
      ["-2 ** 3", "-8"],
      ["(-2) ** 3", "-8"],
      ["2 ** -1", "0.5"],
    ])("%s = %s", (expression, expected) => {
      expect(calculateExpression(expression)).toBe(expected);
    });

    it("binds unary minus tighter than exponentiation", () => {
      expect(calculateExpression("-2 ** 2")).toBe("4");
      expect(calculateExpression("-(2 ** 2)")).toBe("-4");
    });
  });

  describe("floats", () => {
    it("computes float results", () => {
      expect(calculateExpression("2.5 * 2")).toBe("5.0");
      expect(calculateExpression("10.0 / 4.0")).toBe("2.5");
    });

    it("keeps binary floating-point rounding", () => {
      const value = calculate("0.1 + 0.2");
      expect(value.kind).toBe("float");
      expect(value.kind === "float" ? value.value : Number.NaN).toBeCloseTo(0.3);
    });
  });

  describe("edge cases", () => {
    it.each([
      ["0", "0"],
      ["1", "1"],
      ["-0", "0"],
      ["2 ** 0", "1"],
      ["0 * 5", "0"],
      ["2 ** 64", "18446744073709551616"],
    ])("%s = %s", (expression, expected) => {
      expect(calculateExpression(expression)).toBe(expected);
    });
  });

  describe("whitespace", () => {
    it("ignores surrounding and inner whitespace", () => {
      expect(calculateExpression("  2 + 2  ")).toBe("4");
      expect(calculateExpression("2+2")).toBe("4");
      expect(calculateExpression(" ( 2 + 3 ) * 4 ")).toBe("20");
      expect(calculateExpression("\t3 *\n4")).toBe("12");
    });

    it("strips whitespace before tokenizing, joining split digits", () => {
      expect(calculateExpression("1 2 + 3")).toBe("15");
    });
  });

  describe("errors", () => {
    it.each([
      ["", "EMPTY_EXPRESSION"],
      ["   ", "EMPTY_EXPRESSION"],
      ["2 + ", "NOT_ENOUGH_OPERANDS"],
      ["(2 + 3", "UNBALANCED_PARENTHESES"],
      ["2 + 3)", "UNBALANCED_PARENTHESES"],
      [")2(", "UNBALANCED_PARENTHESES"],
      ["2 + * 3", "NOT_ENOUGH_OPERANDS"],
      ["2 @ 3", "INVALID_SYMBOL"],
      ["()", "INVALID_EXPRESSION"],
      ["(2)(3)", "INVALID_EXPRESSION"],
      ["10.5 // 3", "INTEGER_OPERATION"],
    ])("%j raises InvalidExpressionError %s", (expression, code) => {
      const err = errorOf(() => calculate(expression));
      expect(err).toBeInstanceOf(InvalidExpressionError);
      expect(err.code).toBe(code);
    });

    it("raises DivisionByZeroError", () => {
      const err = errorOf(() => calculate("5 / 0"));
      expect(err).toBeInstanceOf(DivisionByZeroError);
      expect(err).toBeInstanceOf(CalculatorError);
      expect(err.message).toBe("Division by zero");
      expect(err.context.operator).toBe("/");
    });

    it("reports the invalid symbol", () => {
      const err = errorOf(() => calculate("2 @ 3"));
      expect(err.message).toBe("Invalid symbol: '@'");
      expect(err.name).toBe("InvalidExpressionError");
    });

    it("wraps arithmetic failures into a generic CalculatorError", () => {
      const err = errorOf(() => calculate("0 ** -1"));
      expect(err).not.toBeInstanceOf(InvalidExpressionError);
      expect(err).not.toBeInstanceOf(DivisionByZeroError);
      expect(err.code).toBe("UNKNOWN");
      expect(err.message).toBe("Unexpected error: 0 cannot be raised to a negative power");
      expect(err.cause).toBeInstanceOf(RangeError);
    });

    it("wraps results that are not real numbers", () => {
      const err = errorOf(() => calculate("(-8) ** 0.5"));
      expect(err.code).toBe("UNKNOWN");
      expect(err.message).toBe("Unexpected error: -8 ** 0.5 is not a real number");
    });

    it("wraps float overflow", () => {
      expect(() => calculate("10.0 ** 400")).toThrow("Unexpected error: Numerical result out of range");
    });

    it("wraps an int too large to mix with a float", () => {
      const err = errorOf(() => calculate("10 ** 400 * 1.0"));
      expect(err.code).toBe("UNKNOWN");
      expect(err.message).toBe("Unexpected error: int too large to convert to float");
      expect(err.cause).toBeInstanceOf(RangeError);
    });
  });

  describe("integers beyond the float range", () => {
    it("divides them exactly before rounding", () => {
      expect(calculateExpression("10 ** 400 / 10 ** 399")).toBe("10.0");
    });

    it("keeps integer-only operators exact", () => {
      expect(calculateExpression("10 ** 400 // 10 ** 399")).toBe("10");
      expect(calculateExpression("(10 ** 400 + 7) % 10")).toBe("7");
    });
  });
});

describe("prepareExpression", () => {
  it("removes every kind of whitespace", () => {
    expect(prepareExpression(" 1 2\t+\u00a03 ")).toBe("12+3");
  });

  it("rejects empty and unbalanced input before tokenizing", () => {
    expect(errorOf(() => prepareExpression(" \n ")).code).toBe("EMPTY_EXPRESSION");
    expect(errorOf(() => prepareExpression("(1 + 2")).code).toBe("UNBALANCED_PARENTHESES");
  });
});

describe("tryCalculate", () => {
  it("returns the value and its display form", () => {
    const result = tryCalculate("6 * 7");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual({ kind: "int", value: 42n });
      expect(result.output).toBe("42");
      expect(result.meta.expression).toBe("6 * 7");
      expect(typeof result.meta.durationMs).toBe("number");
    }
  });

  it("returns the error code and position instead of throwing", () => {
    const result = tryCalculate("2 @ 3");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe("INVALID_SYMBOL");
      expect(result.error).toBe("Invalid symbol: '@'");
      expect(result.meta.errorPos).toBe(2);
    }
  });

  it("points at the symbol in the text as typed", () => {
    const result = tryCalculate("  12 +  3 $ 4");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe("Invalid symbol: '$'");
      expect(result.meta.errorPos).toBe(10);
    }
  });

  it("omits the position when the error has none", () => {
    const result = tryCalculate("1 / 0");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.code).toBe("DIVISION_BY_ZERO");
      expect(result.meta).not.toHaveProperty("errorPos");
    }
  });
});

describe("debug logging", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("logs the token stream and postfix form when CALC_DEBUG=1", () => {
    vi.stubEnv("CALC_DEBUG", "1");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    calculate("1 + 2");

    expect(logSpy).toHaveBeenCalledWith(
      expect.stringContaining("[DEBUG]"),
      expect.stringContaining("INFO"),
      "calculate",
      { tokens: ["1", "+", "2"], postfix: ["1", "2", "+"] },
    );
  });

  it("stays silent by default", () => {
    vi.stubEnv("CALC_DEBUG", "");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    calculate("1 + 2");
    tryCalculate("1 / 0");

    expect(logSpy).not.toHaveBeenCalled();
  });
});
