import { readFileSync } from 'fs'
import { describeError } from './diagnostic'
import { Interpreter } from './interpreter'
import type { LimitsConfig } from './limits'
import { startRepl } from './repl'

const USAGE = 'usage: tram [--max-depth N] [--max-steps N] [file]'

export interface CliArgs {
  /** Script to run; `null` starts the REPL. */
  file: string | null
  limits: LimitsConfig
  help: boolean
}

/**
 * Where the driver writes program output and diagnostics.
 */
export interface CliIo {
  out: (text: string) => void
  err: (text: string) => void
}

const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const limitFlags: Record<string, keyof LimitsConfig> = {
  '--max-depth': 'maxDepth',
  '--max-steps': 'maxSteps',
}

/**
 * Parses command-line arguments (without the node and script paths).
 *
 * @throws {UsageError} On an unknown flag, a missing or non-positive limit,
 * or more than one file.
 */
export const parseCliArgs = (argv: readonly string[]): CliArgs => {
  const args: CliArgs = { file: null, limits: {}, help: false }
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? ''
    if (arg === '--help' || arg === '-h') {
      args.help = true
      continue
    }
    const limit = Object.hasOwn(limitFlags, arg) ? limitFlags[arg] : undefined
    if (limit) {
      const raw = argv[i + 1]
      i += 1
      if (raw === undefined || !/^[1-9]\d*$/.test(raw)) {
        throw new UsageError(`${arg} expects a positive integer`)
      }
      args.limits[limit] = Number(raw)
      continue
    }
    if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option "${arg}"`)
    }
    if (args.file !== null) {
      throw new UsageError('Only one file can be run at a time')
    }
    args.file = arg
  }
  return args
}

/**
 * Runs one script file and returns the process exit code: 0 on success, 1 on
 * a lex, parse or runtime error, 2 when the file cannot be read.
 */
export const runFile = (path: string, limits: LimitsConfig, io: CliIo = consoleIo): number => {
  let source: string
  try {
    source = readFileSync(path, 'utf8')
  } catch (err) {
    io.err(`tram: cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`)
    return 2
  }
  try {
    new Interpreter({ limits, write: io.out }).run(source)
    return 0
  } catch (err) {
    io.err(describeError(source, err))
    return 1
  }
}

export const main = async (argv: readonly string[], io: CliIo = consoleIo): Promise<number> => {
  let args: CliArgs
  try {
    args = parseCliArgs(argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    io.err(`tram: ${err.message}`)
    io.err(USAGE)
    return 2
  }
  if (args.help) {
    io.out(USAGE)
    return 0
  }
  if (args.file === null) {
    await startRepl({ limits: args.limits })
    return 0
  }
  return runFile(args.file, args.limits, io)
}
