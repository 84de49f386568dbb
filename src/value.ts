import type { Node } from './ast'
import type { Environment } from './eval/env'
import type { Span } from './span'

/**
 * A user-defined function together with the environment it was created in.
 */
export interface Closure {
  kind: 'Closure'
  name: string | null
  params: readonly string[]
  body: Node
  /** Captured by reference: later writes to outer variables are visible. */
  env: Environment
}

/**
 * The host-side body of a builtin. Receives already-evaluated arguments and
 * the call site's span for error reporting.
 */
export type NativeImplementation = (args: readonly Value[], span: Span) => Value

/**
 * A builtin implemented in TypeScript.
 */
export interface NativeFunction {
  kind: 'Native'
  name: string
  arity: number
  apply: NativeImplementation
}

export type FunctionValue = Closure | NativeFunction

/**
 * Any runtime value.
 *
 * - `null` is Nil
 * - `bigint` is Int (exact, unbounded)
 * - `number` is Float
 */
export type Value = null | boolean | bigint | number | string | FunctionValue

export type ValueKind = 'nil' | 'bool' | 'int' | 'float' | 'string' | 'function'

/**
 * Only `false` and `nil` are falsy. `0` and `""` are truthy.
 */
export const isTruthy = (value: Value): boolean => !(value === false || value === null)

export const isFunction = (value: Value): value is FunctionValue =>
  typeof value === 'object' && value !== null

export const isNumeric = (value: Value): value is bigint | number =>
  typeof value === 'bigint' || typeof value === 'number'

/**
 * Returns the kind name of a value, as reported by the `type` builtin.
 */
export const describeType = (value: Value): ValueKind => {
  if (value === null) return 'nil'
  switch (typeof value) {
    case 'boolean':
      return 'bool'
    case 'bigint':
      return 'int'
    case 'number':
      return 'float'
    case 'string':
      return 'string'
    default:
      return 'function'
  }
}

/**
 * Equality used by `==` and `!=`.
 *
 * Values of different kinds are unequal rather than an error, except that Int
 * and Float compare by numeric value. Functions compare by identity.
 */
export const valueEquals = (a: Value, b: Value): boolean => {
  if (typeof a === 'bigint' && typeof b === 'number') return intEqualsFloat(a, b)
  if (typeof a === 'number' && typeof b === 'bigint') return intEqualsFloat(b, a)
  return a === b
}

const intEqualsFloat = (int: bigint, float: number): boolean =>
  Number.isInteger(float) && BigInt(float) === int

/**
 * Orders two numbers of either kind. Returns `null` when either is NaN.
 */
export const compareNumbers = (a: bigint | number, b: bigint | number): -1 | 0 | 1 | null => {
  if (Number.isNaN(a) || Number.isNaN(b)) return null
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export const toFloat = (value: bigint | number): number =>
  typeof value === 'bigint' ? Number(value) : value

const formatFloat = (value: number): string => {
  if (Number.isInteger(value) && Math.abs(value) < 1e21) {
    // keep floats visibly distinct from ints; -0 stays "-0.0"
    return `${Object.is(value, -0) ? '-0' : String(value)}.0`
  }
  return String(value)
}

/**
 * Renders a value for display. With `quoted`, strings are rendered as
 * escaped literals (used by the REPL); otherwise they are returned raw.
 */
export const formatValue = (value: Value, options: { quoted?: boolean } = {}): string => {
  if (value === null) return 'nil'
  switch (typeof value) {
    case 'boolean':
    case 'bigint':
      return String(value)
    case 'number':
      return formatFloat(value)
    case 'string':
      return options.quoted ? JSON.stringify(value) : value
    default:
      if (value.kind === 'Native') return `<native ${value.name}>`
      return value.name === null ? '<func>' : `<func ${value.name}>`
  }
}
