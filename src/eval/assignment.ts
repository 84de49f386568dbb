import type { AssignmentNode, VarBindingNode } from '../ast'
import { RuntimeError } from '../errors'
import type { LimitTracker } from '../limits'
import type { Value } from '../value'
import type { Environment } from './env'
import type { Evaluator } from './types'

/**
 * Evaluates `let name = initializer`. The initializer runs before the name is
 * bound, so it sees any outer binding of the same name.
 */
export const evalVarBinding = (
  node: VarBindingNode,
  env: Environment,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => {
  const value = evaluate(node.initializer, env, tracker)
  env.define(node.name, value)
  return null
}

/**
 * Evaluates `name = value` against the nearest existing binding and yields the
 * assigned value.
 */
export const evalAssignment = (
  node: AssignmentNode,
  env: Environment,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => {
  const value = evaluate(node.value, env, tracker)
  if (!env.assign(node.target.name, value)) {
    throw new RuntimeError(
      'UndefinedVariable',
      `Cannot assign to undeclared variable "${node.target.name}"`,
      node.target.span
    )
  }
  return value
}
