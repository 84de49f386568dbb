import type { Node } from '../ast'
import type { LimitTracker } from '../limits'
import type { Value } from '../value'
import type { Environment } from './env'

/**
 * The recursive entry point, passed to the per-node handlers so they do not
 * import the dispatcher directly.
 */
export type Evaluator = (node: Node, env: Environment, tracker: LimitTracker) => Value
