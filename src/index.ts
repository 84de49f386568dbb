import { Interpreter, type InterpreterOptions } from './interpreter'
import { lex, tokenize } from './lexer'
import { parse, parseTokens } from './parser'
import { evaluate, runProgram } from './eval/dispatch'
import { Environment } from './eval/env'
import { LimitTracker, resolveLimits, type LimitsConfig, type ResolvedLimits } from './limits'
import { LexError, ParseError, RuntimeError, isTramError } from './errors'
import { describeError, formatDiagnostic, toDiagnostic, type Diagnostic } from './diagnostic'
import { formatValue, describeType, isTruthy, valueEquals, type Value } from './value'

export { Interpreter, tokenize, lex, parse, parseTokens, evaluate, runProgram, Environment }
export { LimitTracker, resolveLimits, formatValue, describeType, isTruthy, valueEquals }
export { LexError, ParseError, RuntimeError, isTramError }
export { formatDiagnostic, toDiagnostic, describeError }
export type { InterpreterOptions, LimitsConfig, ResolvedLimits, Diagnostic, Value }
export type { TramError, ErrorPhase, RuntimeErrorKind } from './errors'
export type { Closure, NativeFunction, NativeImplementation, FunctionValue, ValueKind } from './value'
export type { Token, TokenKind } from './tokens'
export type { Node, ProgramNode } from './ast'
export type { BuiltinSpec } from './builtins'

/**
 * Runs a tram program in a fresh interpreter.
 *
 * @param source - The program text.
 * @param options - Limits, extra globals and the `print` sink.
 * @returns The value of the last top-level statement, or `nil` (`null`).
 * @throws {LexError} If the source contains invalid characters.
 * @throws {ParseError} If the syntax is invalid.
 * @throws {RuntimeError} If evaluation fails or exceeds a limit.
 */
export const run = (source: string, options: InterpreterOptions = {}): Value =>
  new Interpreter(options).run(source)
