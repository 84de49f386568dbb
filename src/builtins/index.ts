import type { Environment } from '../eval/env'
import { mathBuiltins, mathConstants } from './math'
import { registerBuiltins, registerConstants } from './registry'
import { createStdBuiltins, type OutputSink } from './std'

export const registerAllBuiltins = (env: Environment, write: OutputSink) => {
  registerBuiltins(env, createStdBuiltins(write))
  registerBuiltins(env, mathBuiltins)
  registerConstants(env, mathConstants)
}

export * from './types'
export { defineNative, registerBuiltins, registerConstants } from './registry'
export { createStdBuiltins, type OutputSink } from './std'
export { mathBuiltins, mathConstants } from './math'
