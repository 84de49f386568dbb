import { RuntimeError } from '../src/errors'
import { run, type InterpreterOptions, type Value } from '../src/index'

export const evalCode = (code: string, options: InterpreterOptions = {}): Value =>
  run(code, { write: () => {}, ...options })

export const evalWithOutput = (code: string, options: InterpreterOptions = {}) => {
  const lines: string[] = []
  const value = run(code, { ...options, write: (text) => lines.push(text) })
  return { value, lines }
}

export const catchError = <T extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => T
): T => {
  try {
    fn()
  } catch (err) {
    if (err instanceof type) return err
    throw err
  }
  throw new Error(`Expected ${type.name} to be thrown`)
}

export const runtimeError = (code: string, options: InterpreterOptions = {}): RuntimeError =>
  catchError(() => evalCode(code, options), RuntimeError)
