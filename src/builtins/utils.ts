import { RuntimeError } from '../errors'
import type { Span } from '../span'
import { describeType, type Value } from '../value'

export const typeMismatch = (name: string, expected: string, got: Value, span: Span) =>
  new RuntimeError('TypeMismatch', `${name} expects ${expected}, got ${describeType(got)}`, span)

/**
 * Reads a numeric argument as a Float.
 */
export const expectNumber = (name: string, value: Value | undefined, span: Span): number => {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  throw typeMismatch(name, 'a number', value ?? null, span)
}

export const expectNumeric = (
  name: string,
  value: Value | undefined,
  span: Span
): bigint | number => {
  if (typeof value === 'number' || typeof value === 'bigint') return value
  throw typeMismatch(name, 'a number', value ?? null, span)
}

/**
 * Converts a finite Float to Int. Infinities and NaN have no Int form.
 */
export const floatToInt = (name: string, value: number, span: Span): bigint => {
  if (!Number.isFinite(value)) {
    throw new RuntimeError('TypeMismatch', `${name} cannot convert ${value} to int`, span)
  }
  return BigInt(Math.trunc(value))
}
