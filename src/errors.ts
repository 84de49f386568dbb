import type { Location, Span } from './span'

/**
 * The pipeline stage an error was raised in.
 * - `lex`: invalid characters or malformed literals.
 * - `parse`: syntax errors.
 * - `runtime`: errors while evaluating the tree.
 */
export type ErrorPhase = 'lex' | 'parse' | 'runtime'

/**
 * The ways evaluation can fail.
 */
export type RuntimeErrorKind =
  | 'TypeMismatch'
  | 'UndefinedVariable'
  | 'DivisionByZero'
  | 'NotCallable'
  | 'ArityMismatch'
  | 'StackOverflow'
  | 'StepLimitExceeded'

/**
 * Common interface for every error thrown by the interpreter.
 */
export interface TramError extends Error {
  /** The stage that raised the error. */
  phase: ErrorPhase
  /** The source range the error points at. */
  span: Span
}

class BaseError extends Error implements TramError {
  phase: ErrorPhase
  span: Span

  constructor(phase: ErrorPhase, message: string, span: Span) {
    super(message)
    this.phase = phase
    this.span = span
    const pascalPhase = phase.charAt(0).toUpperCase() + phase.slice(1)
    this.name = `${pascalPhase}Error`
  }
}

/**
 * Thrown when the lexer meets a character or literal it cannot tokenize.
 */
export class LexError extends BaseError {
  readonly position: Location

  constructor(message: string, span: Span, position: Location) {
    super('lex', message, span)
    this.position = position
  }
}

/**
 * Thrown on the first syntax error. The parser does not recover.
 */
export class ParseError extends BaseError {
  readonly position: Location
  /** What the grammar required at this point, e.g. `")"` or `expression`. */
  readonly expected: string
  /** Description of the token actually found, e.g. `end of input`. */
  readonly found: string

  constructor(message: string, span: Span, position: Location, expected: string, found: string) {
    super('parse', message, span)
    this.position = position
    this.expected = expected
    this.found = found
  }
}

/**
 * Thrown during evaluation. Propagates unchanged to the caller of `run`.
 */
export class RuntimeError extends BaseError {
  readonly kind: RuntimeErrorKind

  constructor(kind: RuntimeErrorKind, message: string, span: Span) {
    super('runtime', message, span)
    this.kind = kind
  }
}

export const isTramError = (err: unknown): err is TramError =>
  err instanceof LexError || err instanceof ParseError || err instanceof RuntimeError
