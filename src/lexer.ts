import { LexError } from './errors'
import { makeSourceInfo, offsetToLocation, type Span } from './span'
import { keywordKind, type Token, type TokenKind } from './tokens'

/**
 * Lazily tokenizes tram source text.
 *
 * Tokens are produced on demand; a lexical error surfaces when the consumer
 * reaches it. The sequence always ends with a single `EOF` token. Restarting
 * means calling `tokenize` again.
 *
 * @throws {@link LexError} on an unterminated string, a bad escape or number,
 * or an unrecognized character.
 */
export function* tokenize(text: string): Generator<Token, void, undefined> {
  const source = makeSourceInfo(text)
  const length = text.length
  let pos = 0

  const peek = (offset = 0) => text[pos + offset]
  const advance = () => text.charAt(pos++)
  const pick = (expected: string) => {
    if (peek() !== expected) return false
    pos += 1
    return true
  }
  const makeSpan = (start: number, end: number): Span => ({ start, end })
  const makeToken = (kind: TokenKind, start: number, value?: Token['value']): Token => ({
    kind,
    lexeme: text.slice(start, pos),
    span: makeSpan(start, pos),
    position: offsetToLocation(source, start),
    value,
  })
  const fail = (message: string, start: number, end = pos) =>
    new LexError(message, makeSpan(start, Math.max(end, start + 1)), offsetToLocation(source, start))

  while (pos < length) {
    const ch = peek()

    if (isWhitespace(ch)) {
      advance()
      continue
    }
    if (ch === '#' || (ch === '/' && peek(1) === '/')) {
      while (pos < length && peek() !== '\n') advance()
      continue
    }

    const start = pos

    switch (ch) {
      case '(':
        advance()
        yield makeToken('LParen', start)
        continue
      case ')':
        advance()
        yield makeToken('RParen', start)
        continue
      case '{':
        advance()
        yield makeToken('LBrace', start)
        continue
      case '}':
        advance()
        yield makeToken('RBrace', start)
        continue
      case ',':
        advance()
        yield makeToken('Comma', start)
        continue
      case ';':
        advance()
        yield makeToken('Semicolon', start)
        continue
      case '+':
        advance()
        yield makeToken(pick('=') ? 'PlusEq' : 'Plus', start)
        continue
      case '-':
        advance()
        yield makeToken(pick('=') ? 'MinusEq' : 'Minus', start)
        continue
      case '*': {
        advance()
        let kind: TokenKind
        if (pick('*')) {
          kind = pick('=') ? 'StarStarEq' : 'StarStar'
        } else {
          kind = pick('=') ? 'StarEq' : 'Star'
        }
        yield makeToken(kind, start)
        continue
      }
      case '/':
        advance()
        yield makeToken(pick('=') ? 'SlashEq' : 'Slash', start)
        continue
      case '%':
        advance()
        yield makeToken(pick('=') ? 'PercentEq' : 'Percent', start)
        continue
      case '=':
        advance()
        yield makeToken(pick('=') ? 'EqualEqual' : 'Eq', start)
        continue
      case '!':
        advance()
        yield makeToken(pick('=') ? 'BangEqual' : 'Bang', start)
        continue
      case '<':
        advance()
        yield makeToken(pick('=') ? 'LessEqual' : 'Less', start)
        continue
      case '>':
        advance()
        yield makeToken(pick('=') ? 'GreaterEqual' : 'Greater', start)
        continue
      case '&':
      case '|':
        advance()
        if (!pick(ch)) {
          throw fail(`Unexpected character "${ch}" (did you mean "${ch}${ch}"?)`, start)
        }
        yield makeToken(ch === '&' ? 'AmpAmp' : 'BarBar', start)
        continue
      case '"': {
        const value = readString(start)
        yield makeToken('String', start, value)
        continue
      }
      default:
        break
    }

    if (isDigit(ch)) {
      yield readNumber(start)
      continue
    }

    if (isIdentifierStart(ch)) {
      while (isIdentifierPart(peek())) advance()
      const raw = text.slice(start, pos)
      const keyword = keywordKind(raw)
      yield keyword ? makeToken(keyword, start) : makeToken('Identifier', start, raw)
      continue
    }

    throw fail(`Unexpected character "${ch ?? ''}"`, start, start + 1)
  }

  yield makeToken('EOF', pos)

  function readNumber(tokenStart: number): Token {
    let isFloat = false
    while (isDigit(peek())) advance()
    if (peek() === '.' && isDigit(peek(1))) {
      isFloat = true
      advance()
      while (isDigit(peek())) advance()
    }
    if (peek() === 'e' || peek() === 'E') {
      isFloat = true
      advance()
      if (peek() === '+' || peek() === '-') advance()
      if (!isDigit(peek())) {
        throw fail('Invalid exponent in number literal', tokenStart)
      }
      while (isDigit(peek())) advance()
    }
    const raw = text.slice(tokenStart, pos)
    if (!isFloat) {
      return makeToken('Integer', tokenStart, BigInt(raw))
    }
    const value = Number(raw)
    if (!Number.isFinite(value)) {
      throw fail(`Invalid number literal: ${raw}`, tokenStart)
    }
    return makeToken('Float', tokenStart, value)
  }

  function readString(tokenStart: number): string {
    advance() // opening quote
    let result = ''
    while (pos < length) {
      const current = advance()
      if (current === '"') {
        return result
      }
      if (current !== '\\') {
        result += current
        continue
      }
      if (pos >= length) break
      const escapeStart = pos - 1
      const esc = advance()
      switch (esc) {
        case '"':
        case '\\':
        case '/':
          result += esc
          break
        case 'b':
          result += '\b'
          break
        case 'f':
          result += '\f'
          break
        case 'n':
          result += '\n'
          break
        case 'r':
          result += '\r'
          break
        case 't':
          result += '\t'
          break
        case '0':
          result += '\0'
          break
        case 'u': {
          const hex = text.slice(pos, pos + 4)
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
            throw fail('Invalid Unicode escape', escapeStart, Math.min(pos + 4, length))
          }
          result += String.fromCharCode(parseInt(hex, 16))
          pos += 4
          break
        }
        default:
          throw fail(`Invalid escape sequence "\\${esc}"`, escapeStart)
      }
    }
    throw fail('Unterminated string literal', tokenStart)
  }
}

/**
 * Eagerly tokenizes the whole source.
 */
export const lex = (text: string): Token[] => Array.from(tokenize(text))

const isWhitespace = (ch: string | undefined) =>
  ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r'
const isDigit = (ch: string | undefined) => !!ch && ch >= '0' && ch <= '9'
const isIdentifierStart = (ch: string | undefined) =>
  !!ch && ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_')
const isIdentifierPart = (ch: string | undefined) => isIdentifierStart(ch) || isDigit(ch)
