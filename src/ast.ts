import type { Span } from './span'

/**
 * A literal's value: Nil, Bool, Int, Float or String.
 */
export type LiteralValue = null | boolean | bigint | number | string

export type UnaryOp = 'Neg' | 'Not'

export type BinaryOp = '+' | '-' | '*' | '/' | '%' | '**' | 'Eq' | 'Neq' | 'Lt' | 'Lte' | 'Gt' | 'Gte'

export type LogicalOp = 'And' | 'Or'

/**
 * A literal such as `1`, `2.5`, `"hi"`, `true` or `nil`.
 */
export interface LiteralNode {
  kind: 'Literal'
  value: LiteralValue
  span: Span
}

/**
 * A reference to a variable by name.
 */
export interface IdentifierNode {
  kind: 'Identifier'
  name: string
  span: Span
}

export interface UnaryNode {
  kind: 'Unary'
  op: UnaryOp
  operand: Node
  span: Span
}

/**
 * Arithmetic and comparison operators. Both operands are always evaluated.
 */
export interface BinaryNode {
  kind: 'Binary'
  op: BinaryOp
  left: Node
  right: Node
  span: Span
}

/**
 * Short-circuiting `and` / `or`.
 */
export interface LogicalNode {
  kind: 'Logical'
  op: LogicalOp
  left: Node
  right: Node
  span: Span
}

/**
 * `target = value`. Compound forms are desugared by the parser.
 */
export interface AssignmentNode {
  kind: 'Assignment'
  target: IdentifierNode
  value: Node
  span: Span
}

/**
 * `let name = initializer`, or a `func name(...)` declaration.
 */
export interface VarBindingNode {
  kind: 'VarBinding'
  name: string
  initializer: Node
  span: Span
}

/**
 * `{ ... }`. Evaluates to its last statement's value.
 */
export interface BlockNode {
  kind: 'Block'
  statements: Node[]
  span: Span
}

/**
 * `if cond then a else b`. The else branch is optional.
 */
export interface IfNode {
  kind: 'If'
  condition: Node
  then: Node
  else: Node | null
  span: Span
}

/**
 * A function literal. `name` is bound inside the body for self-reference.
 */
export interface FunctionNode {
  kind: 'Function'
  name: string | null
  params: string[]
  body: Node
  span: Span
}

export interface CallNode {
  kind: 'Call'
  callee: Node
  args: Node[]
  span: Span
}

/**
 * Any node in the tram AST.
 */
export type Node =
  | LiteralNode
  | IdentifierNode
  | UnaryNode
  | BinaryNode
  | LogicalNode
  | AssignmentNode
  | VarBindingNode
  | BlockNode
  | IfNode
  | FunctionNode
  | CallNode

/**
 * The root of a parsed source file. Its statements run directly in the
 * global frame.
 */
export interface ProgramNode {
  kind: 'Program'
  statements: Node[]
  span: Span
}
