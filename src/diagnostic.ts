import { RuntimeError, isTramError, type TramError } from './errors'
import { lineText, makeSourceInfo, offsetToLocation, type Location } from './span'

/**
 * A resolved, display-ready description of an error.
 */
export interface Diagnostic {
  /** `LexError`, `ParseError` or `RuntimeError`. */
  name: string
  /** The runtime error kind, when there is one. */
  kind?: string
  message: string
  location: Location
  /** The source line containing the error start. */
  excerpt: string
  /** Number of characters to underline on that line. */
  width: number
}

export const toDiagnostic = (source: string, error: TramError): Diagnostic => {
  const info = makeSourceInfo(source)
  const location = offsetToLocation(info, error.span.start)
  const excerpt = lineText(info, location.line)
  const remainder = excerpt.length - (location.column - 1)
  return {
    name: error.name,
    kind: error instanceof RuntimeError ? error.kind : undefined,
    message: error.message,
    location,
    excerpt,
    width: Math.max(1, Math.min(error.span.end - error.span.start, remainder)),
  }
}

/**
 * Renders an error with a pointer into the source:
 *
 * ```text
 * ParseError: Expected ")" after arguments, found end of input
 *  --> line 1, column 4
 *   |
 * 1 | f(1
 *   |    ^
 * ```
 */
export const formatDiagnostic = (source: string, error: TramError): string => {
  const diagnostic = toDiagnostic(source, error)
  const { line, column } = diagnostic.location
  const pad = ' '.repeat(String(line).length)
  const header = diagnostic.kind
    ? `${diagnostic.name}[${diagnostic.kind}]: ${diagnostic.message}`
    : `${diagnostic.name}: ${diagnostic.message}`
  return [
    header,
    `${pad}--> line ${line}, column ${column}`,
    `${pad} |`,
    `${line} | ${diagnostic.excerpt}`,
    `${pad} | ${' '.repeat(column - 1)}${'^'.repeat(diagnostic.width)}`,
  ].join('\n')
}

/**
 * Formats anything thrown out of `run`. Errors that are not interpreter
 * errors are rendered by name and message only.
 */
export const describeError = (source: string, error: unknown): string => {
  if (isTramError(error)) return formatDiagnostic(source, error)
  if (error instanceof Error) return `${error.name}: ${error.message}`
  return String(error)
}
