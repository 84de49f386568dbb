import { applyBinaryOp } from '../eval/ops'
import { compareNumbers, type Value } from '../value'
import type { BuiltinSpec } from './types'
import { expectNumber, expectNumeric, floatToInt } from './utils'

// Float in, Float out. Ints are widened first.
const floatFunction = (name: string, fn: (x: number) => number): BuiltinSpec => ({
  name,
  arity: 1,
  apply: ([x], span) => fn(expectNumber(name, x, span)),
})

const floatFunction2 = (name: string, fn: (a: number, b: number) => number): BuiltinSpec => ({
  name,
  arity: 2,
  apply: ([a, b], span) => fn(expectNumber(name, a, span), expectNumber(name, b, span)),
})

// Ints pass through unchanged; Floats are rounded and converted to Int.
const roundingFunction = (name: string, fn: (x: number) => number): BuiltinSpec => ({
  name,
  arity: 1,
  apply: ([x], span) => {
    const value = expectNumeric(name, x, span)
    return typeof value === 'bigint' ? value : floatToInt(name, fn(value), span)
  },
})

const pick = (name: string, wantGreater: boolean): BuiltinSpec => ({
  name,
  arity: 2,
  apply: ([a, b], span) => {
    const left = expectNumeric(name, a, span)
    const right = expectNumeric(name, b, span)
    const order = compareNumbers(left, right)
    if (order === null) return Number.NaN
    return (wantGreater ? order >= 0 : order <= 0) ? left : right
  },
})

export const mathBuiltins: BuiltinSpec[] = [
  floatFunction('sqrt', Math.sqrt),
  floatFunction('sin', Math.sin),
  floatFunction('cos', Math.cos),
  floatFunction('tan', Math.tan),
  floatFunction('asin', Math.asin),
  floatFunction('acos', Math.acos),
  floatFunction('atan', Math.atan),
  floatFunction('exp', Math.exp),
  floatFunction('ln', Math.log),
  floatFunction('log2', Math.log2),
  floatFunction('log10', Math.log10),
  floatFunction2('atan2', Math.atan2),
  floatFunction2('hypot', Math.hypot),
  {
    name: 'abs',
    arity: 1,
    apply: ([x], span) => {
      const value = expectNumeric('abs', x, span)
      if (typeof value === 'bigint') return value < 0n ? -value : value
      return Math.abs(value)
    },
  },
  roundingFunction('floor', Math.floor),
  roundingFunction('ceil', Math.ceil),
  // half away from zero: round(-2.5) is -3
  roundingFunction('round', (x) => Math.sign(x) * Math.round(Math.abs(x))),
  {
    name: 'pow',
    arity: 2,
    apply: ([base, exponent], span) =>
      applyBinaryOp(
        '**',
        expectNumeric('pow', base, span),
        expectNumeric('pow', exponent, span),
        span
      ),
  },
  pick('min', false),
  pick('max', true),
]

export const mathConstants: Record<string, Value> = {
  pi: Math.PI,
  e: Math.E,
  tau: 2 * Math.PI,
  inf: Number.POSITIVE_INFINITY,
}
