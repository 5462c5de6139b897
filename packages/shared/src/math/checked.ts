/**
 * Checked u64 Arithmetic
 *
 * Each step returns an ArithmeticResult instead of wrapping or truncating.
 * Values must stay inside [0, U64_MAX]; division truncates toward zero.
 */

import { U64_MAX } from "../constants/index.js";
import { StakelineError, type ErrorCode } from "../errors/index.js";

// ============================================
// RESULT TYPE
// ============================================

export type ArithmeticFaultCode = Extract<
  ErrorCode,
  "ArithmeticOverflow" | "ArithmeticUnderflow" | "DivisionByZero"
>;

export interface ArithmeticFault {
  code: ArithmeticFaultCode;
  operator: "+" | "-" | "*" | "/";
  left: bigint;
  right: bigint;
}

export type ArithmeticResult =
  | { ok: true; value: bigint }
  | { ok: false; fault: ArithmeticFault };

function fault(
  code: ArithmeticFaultCode,
  operator: ArithmeticFault["operator"],
  left: bigint,
  right: bigint
): ArithmeticResult {
  return { ok: false, fault: { code, operator, left, right } };
}

function bounded(
  value: bigint,
  operator: ArithmeticFault["operator"],
  left: bigint,
  right: bigint
): ArithmeticResult {
  if (value < 0n) return fault("ArithmeticUnderflow", operator, left, right);
  if (value > U64_MAX) return fault("ArithmeticOverflow", operator, left, right);
  return { ok: true, value };
}

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

// ============================================
// OPERATIONS
// ============================================

export function checkedAdd(left: bigint, right: bigint): ArithmeticResult {
  return bounded(left + right, "+", left, right);
}

export function checkedSub(left: bigint, right: bigint): ArithmeticResult {
  return bounded(left - right, "-", left, right);
}

export function checkedMul(left: bigint, right: bigint): ArithmeticResult {
  return bounded(left * right, "*", left, right);
}

export function checkedDiv(left: bigint, right: bigint): ArithmeticResult {
  if (right === 0n) return fault("DivisionByZero", "/", left, right);
  // bigint division already truncates toward zero
  return bounded(left / right, "/", left, right);
}

// ============================================
// UNWRAPPING
// ============================================

/**
 * Returns the value or throws the fault as a StakelineError
 */
export function unwrapArithmetic(result: ArithmeticResult): bigint {
  if (result.ok) return result.value;
  const { code, operator, left, right } = result.fault;
  throw new StakelineError(code, undefined, {
    expression: `${left.toString()} ${operator} ${right.toString()}`,
  });
}

/**
 * Fluent checked computation: u64(a).mul(b).div(c).value()
 * The first fault short-circuits the chain.
 */
export class CheckedU64 {
  private constructor(private readonly result: ArithmeticResult) {}

  static of(value: bigint): CheckedU64 {
    return new CheckedU64(bounded(value, "+", value, 0n));
  }

  add(right: bigint): CheckedU64 {
    return this.then((left) => checkedAdd(left, right));
  }

  sub(right: bigint): CheckedU64 {
    return this.then((left) => checkedSub(left, right));
  }

  mul(right: bigint): CheckedU64 {
    return this.then((left) => checkedMul(left, right));
  }

  div(right: bigint): CheckedU64 {
    return this.then((left) => checkedDiv(left, right));
  }

  toResult(): ArithmeticResult {
    return this.result;
  }

  value(): bigint {
    return unwrapArithmetic(this.result);
  }

  private then(step: (left: bigint) => ArithmeticResult): CheckedU64 {
    return this.result.ok ? new CheckedU64(step(this.result.value)) : this;
  }
}

export function u64(value: bigint): CheckedU64 {
  return CheckedU64.of(value);
}
