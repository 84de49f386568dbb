import type { Location, Span } from './span'

export type TokenKind =
  // literals
  | 'Integer'
  | 'Float'
  | 'String'
  | 'True'
  | 'False'
  | 'Nil'
  // names
  | 'Identifier'
  // keywords
  | 'Let'
  | 'Func'
  | 'If'
  | 'Then'
  | 'Else'
  | 'And'
  | 'Or'
  | 'Not'
  // operators
  | 'Plus'
  | 'Minus'
  | 'Star'
  | 'StarStar'
  | 'Slash'
  | 'Percent'
  | 'Bang'
  | 'Eq'
  | 'EqualEqual'
  | 'BangEqual'
  | 'Less'
  | 'LessEqual'
  | 'Greater'
  | 'GreaterEqual'
  | 'PlusEq'
  | 'MinusEq'
  | 'StarEq'
  | 'StarStarEq'
  | 'SlashEq'
  | 'PercentEq'
  | 'AmpAmp'
  | 'BarBar'
  // punctuation
  | 'LParen'
  | 'RParen'
  | 'LBrace'
  | 'RBrace'
  | 'Comma'
  | 'Semicolon'
  | 'EOF'

export type TokenCategory =
  | 'literal'
  | 'identifier'
  | 'keyword'
  | 'operator'
  | 'punctuation'
  | 'end'

export interface Token {
  kind: TokenKind
  /** The exact source slice the token was read from. */
  lexeme: string
  span: Span
  /** Location of the first character. */
  position: Location
  /** Decoded payload for numbers, strings and identifiers. */
  value?: string | number | bigint
}

const keywordKinds: Record<string, TokenKind> = {
  let: 'Let',
  func: 'Func',
  if: 'If',
  then: 'Then',
  else: 'Else',
  and: 'And',
  or: 'Or',
  not: 'Not',
  true: 'True',
  false: 'False',
  nil: 'Nil',
}

/**
 * Returns the token kind of a reserved word, or `undefined` for an ordinary
 * identifier. Names inherited from `Object.prototype` are identifiers.
 */
export const keywordKind = (word: string): TokenKind | undefined =>
  Object.hasOwn(keywordKinds, word) ? keywordKinds[word] : undefined

export const tokenCategory = (kind: TokenKind): TokenCategory => {
  switch (kind) {
    case 'Integer':
    case 'Float':
    case 'String':
    case 'True':
    case 'False':
    case 'Nil':
      return 'literal'
    case 'Identifier':
      return 'identifier'
    case 'Let':
    case 'Func':
    case 'If':
    case 'Then':
    case 'Else':
    case 'And':
    case 'Or':
    case 'Not':
      return 'keyword'
    case 'LParen':
    case 'RParen':
    case 'LBrace':
    case 'RBrace':
    case 'Comma':
    case 'Semicolon':
      return 'punctuation'
    case 'EOF':
      return 'end'
    default:
      return 'operator'
  }
}

/**
 * Renders a token for "found ..." parse diagnostics.
 */
export const describeToken = (token: Token): string => {
  switch (tokenCategory(token.kind)) {
    case 'end':
      return 'end of input'
    case 'identifier':
      return `identifier "${token.lexeme}"`
    case 'literal':
      return token.kind === 'String' ? 'string literal' : `"${token.lexeme}"`
    default:
      return `"${token.lexeme}"`
  }
}
