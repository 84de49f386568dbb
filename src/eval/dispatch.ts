import type { Node, ProgramNode } from '../ast'
import { RuntimeError } from '../errors'
import type { LimitTracker } from '../limits'
import type { Value } from '../value'
import type { Environment } from './env'
import { applyBinaryOp, applyUnary } from './ops'

// Sub-modules
import { evalAssignment, evalVarBinding } from './assignment'
import { evalBlock, evalIf, evalLogical, evalStatements } from './control_flow'
import { evalCall, makeClosure } from './functions'

/**
 * Runs a parsed program directly in `globals`.
 *
 * Host call-stack exhaustion, from deep recursion or a deeply nested
 * expression, is reported as `StackOverflow` at the program's span. Every
 * other error propagates unchanged.
 */
export const runProgram = (program: ProgramNode, globals: Environment, tracker: LimitTracker): Value => {
  try {
    return evalStatements(program.statements, globals, tracker, evaluate)
  } catch (err) {
    if (err instanceof RangeError && /call stack/i.test(err.message)) {
      throw new RuntimeError('StackOverflow', 'Maximum call stack size exceeded', program.span)
    }
    throw err
  }
}

/**
 * The core evaluator. Dispatches on the node kind; the switch is exhaustive,
 * so adding a node kind without handling it fails to compile.
 *
 * @param node - The node to evaluate.
 * @param env - The innermost frame.
 * @param tracker - Depth and step accounting for this run.
 */
export function evaluate(node: Node, env: Environment, tracker: LimitTracker): Value {
  tracker.step(node.span)
  switch (node.kind) {
    case 'Literal':
      return node.value
    case 'Identifier': {
      const value = env.lookup(node.name)
      if (value === undefined) {
        throw new RuntimeError('UndefinedVariable', `Undefined variable "${node.name}"`, node.span)
      }
      return value
    }
    case 'Unary':
      return applyUnary(node.op, evaluate(node.operand, env, tracker), node.span)
    case 'Binary': {
      const left = evaluate(node.left, env, tracker)
      const right = evaluate(node.right, env, tracker)
      return applyBinaryOp(node.op, left, right, node.span)
    }
    case 'Logical':
      return evalLogical(node, env, tracker, evaluate)
    case 'Assignment':
      return evalAssignment(node, env, tracker, evaluate)
    case 'VarBinding':
      return evalVarBinding(node, env, tracker, evaluate)
    case 'Block':
      return evalBlock(node, env, tracker, evaluate)
    case 'If':
      return evalIf(node, env, tracker, evaluate)
    case 'Function':
      return makeClosure(node, env)
    case 'Call':
      return evalCall(node, env, tracker, evaluate)
    default: {
      const exhaustive: never = node
      return exhaustive
    }
  }
}
