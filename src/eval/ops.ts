import type { BinaryOp, UnaryOp } from '../ast'
import { RuntimeError } from '../errors'
import type { Span } from '../span'
import {
  compareNumbers,
  describeType,
  isNumeric,
  isTruthy,
  toFloat,
  valueEquals,
  type Value,
} from '../value'

export const binaryOpSymbols: Record<BinaryOp, string> = {
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
  '**': '**',
  Eq: '==',
  Neq: '!=',
  Lt: '<',
  Lte: '<=',
  Gt: '>',
  Gte: '>=',
}

/**
 * Applies `-` or `not` to an evaluated operand.
 */
export const applyUnary = (op: UnaryOp, value: Value, span: Span): Value => {
  switch (op) {
    case 'Not':
      return !isTruthy(value)
    case 'Neg':
      if (typeof value === 'bigint') return -value
      if (typeof value === 'number') return -value
      throw new RuntimeError('TypeMismatch', `Cannot negate ${describeType(value)}`, span)
  }
}

/**
 * Applies an arithmetic or comparison operator to two evaluated operands.
 *
 * Int with Int stays Int except for `/`, which always yields Float. Mixed
 * Int/Float operands are promoted to Float.
 */
export const applyBinaryOp = (op: BinaryOp, left: Value, right: Value, span: Span): Value => {
  switch (op) {
    case '+':
      if (typeof left === 'string' && typeof right === 'string') return left + right
      return arithmetic(op, left, right, span)
    case '-':
    case '*':
    case '/':
    case '%':
    case '**':
      return arithmetic(op, left, right, span)
    case 'Eq':
      return valueEquals(left, right)
    case 'Neq':
      return !valueEquals(left, right)
    case 'Lt':
      return compare(op, left, right, span) < 0
    case 'Lte':
      return compare(op, left, right, span) <= 0
    case 'Gt':
      return compare(op, left, right, span) > 0
    case 'Gte':
      return compare(op, left, right, span) >= 0
  }
}

type ArithmeticOp = '+' | '-' | '*' | '/' | '%' | '**'

type Operands =
  | { kind: 'int'; left: bigint; right: bigint }
  | { kind: 'float'; left: number; right: number }

const numericOperands = (op: BinaryOp, left: Value, right: Value, span: Span): Operands => {
  if (typeof left === 'bigint' && typeof right === 'bigint') {
    return { kind: 'int', left, right }
  }
  if (isNumeric(left) && isNumeric(right)) {
    return { kind: 'float', left: toFloat(left), right: toFloat(right) }
  }
  throw new RuntimeError(
    'TypeMismatch',
    `Cannot apply ${binaryOpSymbols[op]} to ${describeType(left)} and ${describeType(right)}`,
    span
  )
}

const arithmetic = (op: ArithmeticOp, left: Value, right: Value, span: Span): Value => {
  const operands = numericOperands(op, left, right, span)
  switch (op) {
    case '+':
      return operands.kind === 'int'
        ? fitInt(operands.left + operands.right)
        : operands.left + operands.right
    case '-':
      return operands.kind === 'int'
        ? fitInt(operands.left - operands.right)
        : operands.left - operands.right
    case '*':
      return operands.kind === 'int'
        ? fitInt(operands.left * operands.right)
        : operands.left * operands.right
    case '/':
      if (isZero(operands)) throw new RuntimeError('DivisionByZero', 'Division by zero', span)
      return toFloat(operands.left) / toFloat(operands.right)
    case '%':
      if (isZero(operands)) throw new RuntimeError('DivisionByZero', 'Modulo by zero', span)
      return operands.kind === 'int'
        ? operands.left % operands.right
        : operands.left % operands.right
    case '**':
      return power(operands)
  }
}

/**
 * Ints are kept below 2^MAX_INT_BITS in magnitude. A result past that bound
 * becomes an infinite Float of the same sign.
 */
const MAX_INT_BITS = 1_048_576

const INT_LIMIT = 1n << BigInt(MAX_INT_BITS)

const fitInt = (value: bigint): bigint | number =>
  value < INT_LIMIT && value > -INT_LIMIT ? value : Number(value)

const bitLength = (value: bigint): number => (value < 0n ? -value : value).toString(2).length

const isZero = (operands: Operands): boolean =>
  operands.kind === 'int' ? operands.right === 0n : operands.right === 0

const power = (operands: Operands): Value => {
  if (operands.kind === 'int' && operands.right >= 0n) {
    const { left, right } = operands
    // |left| ** right has at least (bits - 1) * right + 1 bits
    if (BigInt(bitLength(left) - 1) * right >= BigInt(MAX_INT_BITS)) {
      return toFloat(left) ** toFloat(right)
    }
    return fitInt(left ** right)
  }
  return toFloat(operands.left) ** toFloat(operands.right)
}

/**
 * Orders numbers (of either kind) or strings. Any other pairing is a type
 * mismatch. NaN compares as unordered, so every ordering test is false.
 */
const compare = (op: BinaryOp, left: Value, right: Value, span: Span): number => {
  if (isNumeric(left) && isNumeric(right)) {
    return compareNumbers(left, right) ?? Number.NaN
  }
  if (typeof left === 'string' && typeof right === 'string') {
    if (left === right) return 0
    return left < right ? -1 : 1
  }
  throw new RuntimeError(
    'TypeMismatch',
    `Cannot compare ${describeType(left)} with ${describeType(right)} using ${binaryOpSymbols[op]}`,
    span
  )
}
