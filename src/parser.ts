import { ParseError } from './errors'
import { tokenize } from './lexer'
import { spanBetween, type Span } from './span'
import { describeToken, type Token, type TokenKind } from './tokens'
import type {
  BinaryOp,
  BlockNode,
  FunctionNode,
  IfNode,
  LiteralValue,
  LogicalOp,
  Node,
  ProgramNode,
} from './ast'

/**
 * Parses tram source into a {@link ProgramNode}.
 *
 * @throws {LexError} If the source contains invalid characters.
 * @throws {ParseError} On the first syntax error.
 */
export const parse = (source: string): ProgramNode => parseTokens(tokenize(source))

/**
 * Parses an already-produced token sequence. The sequence is consumed lazily,
 * so a lazy lexer's errors surface in source order.
 */
export const parseTokens = (tokens: Iterable<Token>): ProgramNode =>
  new Parser(tokens).parseProgram()

const MAX_NESTING = 256

type InfixRule =
  | { precedence: number; kind: 'Logical'; op: LogicalOp }
  | { precedence: number; kind: 'Binary'; op: BinaryOp }

// Loosest first. `**` and unary operators sit above these and are parsed separately.
const infixRules: Partial<Record<TokenKind, InfixRule>> = {
  Or: { precedence: 1, kind: 'Logical', op: 'Or' },
  BarBar: { precedence: 1, kind: 'Logical', op: 'Or' },
  And: { precedence: 2, kind: 'Logical', op: 'And' },
  AmpAmp: { precedence: 2, kind: 'Logical', op: 'And' },
  EqualEqual: { precedence: 3, kind: 'Binary', op: 'Eq' },
  BangEqual: { precedence: 3, kind: 'Binary', op: 'Neq' },
  Less: { precedence: 4, kind: 'Binary', op: 'Lt' },
  LessEqual: { precedence: 4, kind: 'Binary', op: 'Lte' },
  Greater: { precedence: 4, kind: 'Binary', op: 'Gt' },
  GreaterEqual: { precedence: 4, kind: 'Binary', op: 'Gte' },
  Plus: { precedence: 5, kind: 'Binary', op: '+' },
  Minus: { precedence: 5, kind: 'Binary', op: '-' },
  Star: { precedence: 6, kind: 'Binary', op: '*' },
  Slash: { precedence: 6, kind: 'Binary', op: '/' },
  Percent: { precedence: 6, kind: 'Binary', op: '%' },
}

// `null` marks plain assignment.
const assignmentOps: Partial<Record<TokenKind, BinaryOp | null>> = {
  Eq: null,
  PlusEq: '+',
  MinusEq: '-',
  StarEq: '*',
  SlashEq: '/',
  PercentEq: '%',
  StarStarEq: '**',
}

class Parser {
  private readonly iterator: Iterator<Token>
  private readonly lookahead: Token[] = []
  private last: Token | undefined
  private eof: Token | undefined
  private depth = 0

  constructor(tokens: Iterable<Token>) {
    this.iterator = tokens[Symbol.iterator]()
  }

  parseProgram(): ProgramNode {
    const start = this.peek()
    const statements: Node[] = []
    while (!this.check('EOF')) {
      if (this.match('Semicolon')) continue
      statements.push(this.parseStatement())
    }
    const end = this.peek()
    return {
      kind: 'Program',
      statements,
      span: spanBetween(start.span, end.span),
    }
  }

  private parseStatement(): Node {
    let statement: Node
    if (this.match('Let')) {
      statement = this.parseLet(this.previous())
    } else if (this.check('Func') && this.check('Identifier', 1)) {
      const start = this.advance()
      const name = this.peek().lexeme
      const fn = this.parseFunction(start)
      statement = {
        kind: 'VarBinding',
        name,
        initializer: fn,
        span: fn.span,
      }
    } else {
      statement = this.parseExpression()
    }
    while (this.match('Semicolon')) {
      // separators are optional and may repeat
    }
    return statement
  }

  private parseLet(start: Token): Node {
    const name = this.consume('Identifier', 'variable name', 'after "let"')
    this.consume('Eq', '"="', 'after variable name')
    const initializer = this.parseExpression()
    return {
      kind: 'VarBinding',
      name: name.lexeme,
      initializer,
      span: spanBetween(start.span, initializer.span),
    }
  }

  private parseExpression(): Node {
    return this.nested(() => this.parseAssignment())
  }

  private parseAssignment(): Node {
    const startToken = this.peek()
    const expr = this.parseBinary(1)
    const compound = assignmentOps[this.peek().kind]
    if (compound === undefined) {
      return expr
    }
    this.advance()
    if (expr.kind !== 'Identifier') {
      throw new ParseError(
        'Invalid assignment target',
        expr.span,
        startToken.position,
        'identifier',
        'expression'
      )
    }
    // right-associative: a = b = c
    const rhs = this.nested(() => this.parseAssignment())
    const value: Node =
      compound === null
        ? rhs
        : { kind: 'Binary', op: compound, left: expr, right: rhs, span: spanBetween(expr.span, rhs.span) }
    return {
      kind: 'Assignment',
      target: expr,
      value,
      span: spanBetween(expr.span, rhs.span),
    }
  }

  private parseBinary(minPrecedence: number): Node {
    let left = this.parseUnary()
    while (true) {
      const rule = infixRules[this.peek().kind]
      if (!rule || rule.precedence < minPrecedence) break
      this.advance()
      const right = this.parseBinary(rule.precedence + 1)
      const span = spanBetween(left.span, right.span)
      left =
        rule.kind === 'Logical'
          ? { kind: 'Logical', op: rule.op, left, right, span }
          : { kind: 'Binary', op: rule.op, left, right, span }
    }
    return left
  }

  private parseUnary(): Node {
    if (this.match('Minus')) {
      const op = this.previous()
      const operand = this.nested(() => this.parseUnary())
      return { kind: 'Unary', op: 'Neg', operand, span: spanBetween(op.span, operand.span) }
    }
    if (this.match('Not') || this.match('Bang')) {
      const op = this.previous()
      const operand = this.nested(() => this.parseUnary())
      return { kind: 'Unary', op: 'Not', operand, span: spanBetween(op.span, operand.span) }
    }
    return this.parsePower()
  }

  private parsePower(): Node {
    const base = this.parseCall()
    if (!this.match('StarStar')) {
      return base
    }
    const exponent = this.nested(() => this.parseUnary())
    return {
      kind: 'Binary',
      op: '**',
      left: base,
      right: exponent,
      span: spanBetween(base.span, exponent.span),
    }
  }

  private parseCall(): Node {
    let expr = this.parsePrimary()
    while (this.match('LParen')) {
      const args: Node[] = []
      if (!this.check('RParen')) {
        do {
          args.push(this.parseExpression())
        } while (this.match('Comma'))
      }
      const closing = this.consume('RParen', '")"', 'after arguments')
      expr = {
        kind: 'Call',
        callee: expr,
        args,
        span: spanBetween(expr.span, closing.span),
      }
    }
    return expr
  }

  private parsePrimary(): Node {
    if (this.match('Integer') || this.match('Float') || this.match('String')) {
      const token = this.previous()
      return this.literalNode(token.value ?? null, token.span)
    }
    if (this.match('True')) return this.literalNode(true, this.previous().span)
    if (this.match('False')) return this.literalNode(false, this.previous().span)
    if (this.match('Nil')) return this.literalNode(null, this.previous().span)
    if (this.match('Identifier')) {
      const token = this.previous()
      return { kind: 'Identifier', name: token.lexeme, span: token.span }
    }
    if (this.match('LParen')) {
      const start = this.previous()
      const expr = this.parseExpression()
      const close = this.consume('RParen', '")"', 'after expression')
      return { ...expr, span: spanBetween(start.span, close.span) }
    }
    if (this.match('LBrace')) return this.parseBlock(this.previous())
    if (this.match('If')) return this.parseIf(this.previous())
    if (this.match('Func')) return this.parseFunction(this.previous())
    throw this.error(this.peek(), 'expression')
  }

  private parseBlock(start: Token): BlockNode {
    return this.nested(() => {
      const statements: Node[] = []
      while (!this.check('RBrace')) {
        if (this.check('EOF')) {
          throw this.error(this.peek(), '"}"', 'to close block')
        }
        if (this.match('Semicolon')) continue
        statements.push(this.parseStatement())
      }
      const close = this.advance()
      return { kind: 'Block', statements, span: spanBetween(start.span, close.span) }
    })
  }

  private parseIf(start: Token): IfNode {
    const condition = this.parseExpression()
    this.consume('Then', '"then"', 'after if condition')
    const thenBranch = this.parseExpression()
    let elseBranch: Node | null = null
    if (this.match('Else')) {
      elseBranch = this.parseExpression()
    }
    return {
      kind: 'If',
      condition,
      then: thenBranch,
      else: elseBranch,
      span: spanBetween(start.span, (elseBranch ?? thenBranch).span),
    }
  }

  /**
   * Parses the rest of a function literal after `func`. The name is optional.
   */
  private parseFunction(start: Token): FunctionNode {
    const name = this.match('Identifier') ? this.previous().lexeme : null
    this.consume('LParen', '"("', 'to start parameter list')
    const params: string[] = []
    if (!this.check('RParen')) {
      do {
        const param = this.consume('Identifier', 'parameter name')
        if (params.includes(param.lexeme)) {
          throw new ParseError(
            `Duplicate parameter "${param.lexeme}"`,
            param.span,
            param.position,
            'unique parameter name',
            describeToken(param)
          )
        }
        params.push(param.lexeme)
      } while (this.match('Comma'))
    }
    this.consume('RParen', '")"', 'after parameters')
    const body = this.check('LBrace') ? this.parseBlock(this.advance()) : this.parseExpression()
    return {
      kind: 'Function',
      name,
      params,
      body,
      span: spanBetween(start.span, body.span),
    }
  }

  private literalNode(value: LiteralValue, span: Span): Node {
    return { kind: 'Literal', value, span }
  }

  private nested<T>(parse: () => T): T {
    this.depth += 1
    try {
      if (this.depth > MAX_NESTING) {
        throw this.error(this.peek(), 'shallower nesting', undefined, 'Expression nested too deeply')
      }
      return parse()
    } finally {
      this.depth -= 1
    }
  }

  private match(kind: TokenKind): boolean {
    if (this.check(kind)) {
      this.advance()
      return true
    }
    return false
  }

  private consume(kind: TokenKind, expected: string, context?: string): Token {
    if (this.check(kind)) return this.advance()
    throw this.error(this.peek(), expected, context)
  }

  private check(kind: TokenKind, offset = 0): boolean {
    return this.peek(offset).kind === kind
  }

  private advance(): Token {
    const token = this.peek()
    if (token.kind !== 'EOF') this.lookahead.shift()
    this.last = token
    return token
  }

  private peek(offset = 0): Token {
    let token = this.lookahead[offset]
    while (token === undefined) {
      this.lookahead.push(this.pull())
      token = this.lookahead[offset]
    }
    return token
  }

  private pull(): Token {
    if (this.eof) return this.eof
    const next = this.iterator.next()
    if (!next.done && next.value.kind !== 'EOF') {
      return next.value
    }
    this.eof = next.done ? this.syntheticEof() : next.value
    return this.eof
  }

  // Used when a caller hands over a token sequence without a closing EOF.
  private syntheticEof(): Token {
    const anchor = this.lookahead[this.lookahead.length - 1] ?? this.last
    const end = anchor?.span.end ?? 0
    return {
      kind: 'EOF',
      lexeme: '',
      span: { start: end, end },
      position: anchor?.position ?? { line: 1, column: 1 },
    }
  }

  private previous(): Token {
    return this.last ?? this.peek()
  }

  private error(token: Token, expected: string, context?: string, message?: string): ParseError {
    const found = describeToken(token)
    const text = message ?? `Expected ${expected}${context ? ` ${context}` : ''}, found ${found}`
    return new ParseError(text, token.span, token.position, expected, found)
  }
}
