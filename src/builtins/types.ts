import type { NativeImplementation } from '../value'

/**
 * Declares one native function: its global name, fixed arity and body.
 */
export interface BuiltinSpec {
  name: string
  arity: number
  apply: NativeImplementation
}
