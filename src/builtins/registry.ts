import type { Environment } from '../eval/env'
import type { NativeFunction, Value } from '../value'
import type { BuiltinSpec } from './types'

export const defineNative = (spec: BuiltinSpec): NativeFunction => ({
  kind: 'Native',
  name: spec.name,
  arity: spec.arity,
  apply: spec.apply,
})

/**
 * Binds each builtin as an ordinary variable in `env`.
 * A later entry with the same name replaces an earlier one.
 */
export const registerBuiltins = (env: Environment, specs: readonly BuiltinSpec[]) => {
  for (const spec of specs) {
    env.define(spec.name, defineNative(spec))
  }
}

export const registerConstants = (env: Environment, constants: Record<string, Value>) => {
  for (const [name, value] of Object.entries(constants)) {
    env.define(name, value)
  }
}
