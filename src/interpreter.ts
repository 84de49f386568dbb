import type { ProgramNode } from './ast'
import { registerAllBuiltins, defineNative, type OutputSink } from './builtins'
import { runProgram } from './eval/dispatch'
import { Environment } from './eval/env'
import { LimitTracker, resolveLimits, type LimitsConfig, type ResolvedLimits } from './limits'
import { parse } from './parser'
import type { NativeImplementation, Value } from './value'

/**
 * Options for constructing an {@link Interpreter}.
 */
export interface InterpreterOptions {
  /** Depth and step limits applied to every run. */
  limits?: LimitsConfig
  /** Extra global bindings, applied after the builtins. */
  globals?: Record<string, Value>
  /** Receives each line written by `print`. Defaults to stdout. */
  write?: OutputSink
}

const writeStdout: OutputSink = (text) => {
  process.stdout.write(`${text}\n`)
}

/**
 * Owns one global environment and runs sources against it.
 *
 * Top-level declarations persist between runs; nothing else does. Separate
 * instances share no state.
 */
export class Interpreter {
  readonly globals: Environment
  private readonly limits: ResolvedLimits

  constructor(options: InterpreterOptions = {}) {
    this.limits = resolveLimits(options.limits)
    this.globals = new Environment()
    registerAllBuiltins(this.globals, options.write ?? writeStdout)
    for (const [name, value] of Object.entries(options.globals ?? {})) {
      this.globals.define(name, value)
    }
  }

  /**
   * Exposes a native function as a global. Calls go through the same arity
   * check and argument evaluation as user functions.
   */
  register(name: string, arity: number, implementation: NativeImplementation): void {
    this.globals.define(name, defineNative({ name, arity, apply: implementation }))
  }

  /**
   * Binds a global value, such as a constant.
   */
  define(name: string, value: Value): void {
    this.globals.define(name, value)
  }

  /**
   * Parses and evaluates `source` in the global frame.
   *
   * @returns The value of the last top-level statement, or `nil`.
   * @throws {LexError} If the source contains invalid characters.
   * @throws {ParseError} If the syntax is invalid.
   * @throws {RuntimeError} If evaluation fails.
   */
  run(source: string): Value {
    return this.execute(parse(source))
  }

  /**
   * Evaluates an already-parsed program in the global frame.
   */
  execute(program: ProgramNode): Value {
    return runProgram(program, this.globals, new LimitTracker(this.limits))
  }
}
