import type { CallNode, FunctionNode } from '../ast'
import { RuntimeError } from '../errors'
import type { LimitTracker } from '../limits'
import type { Span } from '../span'
import { describeType, isFunction, type Closure, type FunctionValue, type Value } from '../value'
import type { Environment } from './env'
import type { Evaluator } from './types'

/**
 * Creates a closure over `env`.
 *
 * A named function gets its own frame binding the name to itself, so the body
 * can recurse even if the outer name is later rebound.
 */
export const makeClosure = (node: FunctionNode, env: Environment): Closure => {
  if (node.name === null) {
    return { kind: 'Closure', name: null, params: node.params, body: node.body, env }
  }
  const scope = env.child()
  const closure: Closure = {
    kind: 'Closure',
    name: node.name,
    params: node.params,
    body: node.body,
    env: scope,
  }
  scope.define(node.name, closure)
  return closure
}

/**
 * Evaluates a call: callee first, then arguments left to right.
 */
export const evalCall = (
  node: CallNode,
  env: Environment,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => {
  const callee = evaluate(node.callee, env, tracker)
  if (!isFunction(callee)) {
    throw new RuntimeError('NotCallable', `Cannot call a value of type ${describeType(callee)}`, node.callee.span)
  }
  const args = node.args.map((arg) => evaluate(arg, env, tracker))
  return callFunction(callee, args, node.span, tracker, evaluate)
}

/**
 * Invokes a function value with evaluated arguments. Natives and closures get
 * the same arity check.
 *
 * A closure body runs in a new frame whose parent is the captured environment,
 * not the caller's. Each active closure call counts toward `maxDepth`.
 */
export const callFunction = (
  fn: FunctionValue,
  args: readonly Value[],
  span: Span,
  tracker: LimitTracker,
  evaluate: Evaluator
): Value => {
  const arity = fn.kind === 'Native' ? fn.arity : fn.params.length
  if (args.length !== arity) {
    throw new RuntimeError(
      'ArityMismatch',
      `${describeCallee(fn)} expects ${plural(arity, 'argument')} but got ${args.length}`,
      span
    )
  }
  if (fn.kind === 'Native') {
    return fn.apply(args, span)
  }
  const frame = fn.env.child()
  fn.params.forEach((param, i) => frame.define(param, args[i] ?? null))
  tracker.enter(span)
  try {
    return evaluate(fn.body, frame, tracker)
  } finally {
    tracker.exit()
  }
}

const describeCallee = (fn: FunctionValue): string => {
  if (fn.kind === 'Native') return `Builtin "${fn.name}"`
  return fn.name === null ? 'Anonymous function' : `Function "${fn.name}"`
}

const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? '' : 's'}`
