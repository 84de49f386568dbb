import { describeType, formatValue } from '../value'
import type { BuiltinSpec } from './types'
import { expectNumeric, floatToInt, typeMismatch } from './utils'

/**
 * Writes one line of program output.
 */
export type OutputSink = (text: string) => void

/**
 * Core builtins. `print` writes through the given sink, so each interpreter
 * can route its output independently.
 */
export const createStdBuiltins = (write: OutputSink): BuiltinSpec[] => [
  {
    name: 'print',
    arity: 1,
    apply: ([value]) => {
      write(formatValue(value ?? null))
      return null
    },
  },
  {
    name: 'type',
    arity: 1,
    apply: ([value]) => describeType(value ?? null),
  },
  {
    name: 'str',
    arity: 1,
    apply: ([value]) => formatValue(value ?? null),
  },
  {
    name: 'len',
    arity: 1,
    apply: ([value], span) => {
      if (typeof value !== 'string') throw typeMismatch('len', 'a string', value ?? null, span)
      return BigInt(value.length)
    },
  },
  {
    name: 'int',
    arity: 1,
    apply: ([value], span) => {
      const number = expectNumeric('int', value, span)
      return typeof number === 'bigint' ? number : floatToInt('int', number, span)
    },
  },
  {
    name: 'float',
    arity: 1,
    apply: ([value], span) => {
      const number = expectNumeric('float', value, span)
      return typeof number === 'bigint' ? Number(number) : number
    },
  },
]
