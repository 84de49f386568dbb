import { describe, expect, it } from 'vitest'
import { LexError } from '../src/errors'
import { lex, tokenize } from '../src/lexer'
import { catchError } from './helpers'

const kinds = (code: string) => lex(code).map((t) => t.kind)
const lexError = (code: string) => catchError(() => lex(code), LexError)

describe('lexer', () => {
  it('lexes a declaration', () => {
    expect(kinds('let x = 1 + 2.5')).toEqual([
      'Let',
      'Identifier',
      'Eq',
      'Integer',
      'Plus',
      'Float',
      'EOF',
    ])
  })

  it('prefers the longest operator', () => {
    expect(kinds('** **= += -= *= /= %= == != <= >= && || !')).toEqual([
      'StarStar',
      'StarStarEq',
      'PlusEq',
      'MinusEq',
      'StarEq',
      'SlashEq',
      'PercentEq',
      'EqualEqual',
      'BangEqual',
      'LessEqual',
      'GreaterEqual',
      'AmpAmp',
      'BarBar',
      'Bang',
      'EOF',
    ])
  })

  it('lexes keywords', () => {
    expect(kinds('let func if then else and or not true false nil')).toEqual([
      'Let',
      'Func',
      'If',
      'Then',
      'Else',
      'And',
      'Or',
      'Not',
      'True',
      'False',
      'Nil',
      'EOF',
    ])
    expect(kinds('lets iffy _nil')).toEqual(['Identifier', 'Identifier', 'Identifier', 'EOF'])
  })

  it('lexes names inherited from Object.prototype as identifiers', () => {
    expect(kinds('toString constructor __proto__ valueOf hasOwnProperty')).toEqual([
      'Identifier',
      'Identifier',
      'Identifier',
      'Identifier',
      'Identifier',
      'EOF',
    ])
  })

  it('decodes integers as exact values', () => {
    expect(lex('42')[0]).toMatchObject({ kind: 'Integer', value: 42n })
    expect(lex('123456789012345678901234567890')[0]?.value).toBe(123456789012345678901234567890n)
  })

  it('decodes floats', () => {
    expect(lex('2.5')[0]).toMatchObject({ kind: 'Float', value: 2.5 })
    expect(lex('1e3')[0]).toMatchObject({ kind: 'Float', value: 1000 })
    expect(lex('1.5e-2')[0]).toMatchObject({ kind: 'Float', value: 0.015 })
  })

  it('skips both comment styles', () => {
    expect(kinds('1 # note\n// another\n2')).toEqual(['Integer', 'Integer', 'EOF'])
  })

  it('decodes string escapes', () => {
    expect(lex('"a\\n\\u0041\\t\\"q\\""')[0]).toMatchObject({
      kind: 'String',
      value: 'a\nA\t"q"',
    })
  })

  it('tracks spans and positions across newlines', () => {
    const tokens = lex('foo\n  bar')
    expect(tokens[0]?.span).toEqual({ start: 0, end: 3 })
    expect(tokens[1]?.span).toEqual({ start: 6, end: 9 })
    expect(tokens[1]?.position).toEqual({ line: 2, column: 3 })
    expect(tokens[2]).toMatchObject({ kind: 'EOF', span: { start: 9, end: 9 } })
  })

  it('produces tokens lazily', () => {
    const tokens = tokenize('1 @')
    expect(tokens.next().value).toMatchObject({ kind: 'Integer', value: 1n })
    expect(() => tokens.next()).toThrow(LexError)
  })

  describe('errors', () => {
    it('rejects an unterminated string', () => {
      const err = lexError('"abc')
      expect(err.message).toBe('Unterminated string literal')
      expect(err.span).toEqual({ start: 0, end: 4 })
      expect(err.phase).toBe('lex')
    })

    it('suggests the doubled operator for a lone ampersand', () => {
      const err = lexError('a & b')
      expect(err.message).toBe('Unexpected character "&" (did you mean "&&"?)')
      expect(err.span).toEqual({ start: 2, end: 3 })
    })

    it('reports the position of an unknown character', () => {
      const err = lexError('x\n  @')
      expect(err.message).toBe('Unexpected character "@"')
      expect(err.position).toEqual({ line: 2, column: 3 })
    })

    it('rejects unknown escapes', () => {
      expect(lexError('"\\q"').message).toBe('Invalid escape sequence "\\q"')
      expect(lexError('"\\u12"').message).toBe('Invalid Unicode escape')
    })

    it('rejects an exponent without digits', () => {
      expect(lexError('1e').message).toBe('Invalid exponent in number literal')
    })
  })
})
