import type { BlockNode, IfNode, LogicalNode, Node } from '../ast'
import type { LimitTracker } from '../limits'
import { isTruthy, type Value } from '../value'
import type { Environment } from './env'
import type { Evaluator } from './types'

/**
 * Evaluates `if`. Only the taken branch runs; a false condition without an
 * else branch yields `nil`.
 */
export const evalIf = (
  node: IfNode,
  env: Environment,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => {
  if (isTruthy(evaluate(node.condition, env, tracker))) {
    return evaluate(node.then, env, tracker)
  }
  return node.else === null ? null : evaluate(node.else, env, tracker)
}

/**
 * Evaluates `and` / `or`, returning the deciding operand itself.
 */
export const evalLogical = (
  node: LogicalNode,
  env: Environment,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => {
  const left = evaluate(node.left, env, tracker)
  if (node.op === 'And' ? !isTruthy(left) : isTruthy(left)) {
    return left
  }
  return evaluate(node.right, env, tracker)
}

/**
 * Runs a block in a fresh child frame.
 */
export const evalBlock = (
  node: BlockNode,
  env: Environment,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => evalStatements(node.statements, env.child(), tracker, evaluate)

/**
 * Runs statements in order in the given frame. The result is the last
 * statement's value; `let` and declarations contribute `nil`.
 */
export const evalStatements = (
  statements: readonly Node[],
  env: Environment,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => {
  let result: Value = null
  for (const statement of statements) {
    result = evaluate(statement, env, tracker)
  }
  return result
}
