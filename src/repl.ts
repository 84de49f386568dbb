import * as readline from 'readline'
import { describeError } from './diagnostic'
import { Interpreter, type InterpreterOptions } from './interpreter'
import { formatValue } from './value'

export const PROMPT = '> '
export const CONTINUATION_PROMPT = '... '

const HELP = [
  'Commands:',
  '  :help          Show this message',
  '  :reset         Discard all definitions and start over',
  '  :quit, quit    Leave the REPL',
  '',
  'Input continues on the next line while a brace, parenthesis or string is open.',
].join('\n')

/**
 * What the REPL should show after one line of input.
 */
export interface ReplResponse {
  /** Lines for stdout: `print` output followed by the result, if any. */
  output: string[]
  /** Lines for stderr: formatted diagnostics. */
  errors: string[]
  /** The prompt to show next. */
  prompt: string
  /** `true` once the user asked to quit. */
  done: boolean
}

/**
 * The line-at-a-time state of an interactive session, independent of any
 * terminal. Definitions persist across inputs until `:reset`.
 *
 * `print` output is collected into the next response, so any `write` in the
 * given options is ignored.
 */
export class ReplSession {
  private interpreter: Interpreter
  private buffer: string[] = []
  private printed: string[] = []

  constructor(private readonly options: InterpreterOptions = {}) {
    this.interpreter = this.createInterpreter()
  }

  /**
   * Feeds one line of input and returns what to display.
   */
  feed(line: string): ReplResponse {
    if (this.buffer.length === 0) {
      const command = this.runCommand(line.trim())
      if (command) return command
    }

    this.buffer.push(line)
    const input = this.buffer.join('\n')
    if (hasUnclosedDelimiters(input)) {
      return this.respond([], [], CONTINUATION_PROMPT)
    }
    this.buffer = []
    if (input.trim() === '') {
      return this.respond([], [])
    }

    try {
      const value = this.interpreter.run(input)
      const output = value === null ? [] : [formatValue(value, { quoted: true })]
      return this.respond(output, [])
    } catch (err) {
      return this.respond([], [describeError(input, err)])
    }
  }

  /**
   * `true` while a multi-line input is being collected.
   */
  get pending(): boolean {
    return this.buffer.length > 0
  }

  private runCommand(command: string): ReplResponse | null {
    switch (command) {
      case ':quit':
      case 'quit':
        return { output: [], errors: [], prompt: PROMPT, done: true }
      case ':help':
        return this.respond(HELP.split('\n'), [])
      case ':reset':
        this.interpreter = this.createInterpreter()
        return this.respond(['Environment reset.'], [])
      default:
        if (command.startsWith(':')) {
          return this.respond([], [`Unknown command "${command}". Type :help for commands.`])
        }
        return null
    }
  }

  private respond(output: string[], errors: string[], prompt = PROMPT): ReplResponse {
    const printed = this.printed
    this.printed = []
    return { output: [...printed, ...output], errors, prompt, done: false }
  }

  private createInterpreter(): Interpreter {
    return new Interpreter({
      ...this.options,
      write: (text) => {
        this.printed.push(text)
      },
    })
  }
}

/**
 * Reports whether `input` ends inside an open brace, parenthesis or string.
 * Delimiters inside strings and comments do not count. Surplus closers are
 * left for the parser to report.
 */
export const hasUnclosedDelimiters = (input: string): boolean => {
  let depth = 0
  let inString = false
  let escaped = false

  for (let i = 0; i < input.length; i += 1) {
    const ch = input[i]

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === '"') {
        inString = false
      }
      continue
    }

    if (ch === '#' || (ch === '/' && input[i + 1] === '/')) {
      while (i < input.length && input[i] !== '\n') i += 1
      continue
    }

    switch (ch) {
      case '"':
        inString = true
        break
      case '(':
      case '{':
        depth += 1
        break
      case ')':
      case '}':
        depth -= 1
        break
      default:
        break
    }
  }

  return inString || depth > 0
}

/**
 * Runs an interactive session on stdin/stdout. Resolves when input ends or
 * the user quits.
 */
export const startRepl = (options: InterpreterOptions = {}): Promise<void> => {
  const session = new ReplSession(options)
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: PROMPT,
  })

  console.log('tram REPL. Type :help for commands, :quit to exit.')

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      const response = session.feed(line)
      for (const text of response.output) console.log(text)
      for (const text of response.errors) console.error(text)
      if (response.done) {
        rl.close()
        return
      }
      rl.setPrompt(response.prompt)
      rl.prompt()
    })
    rl.on('close', () => resolve())
    rl.prompt()
  })
}
