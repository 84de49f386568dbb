import { RuntimeError } from './errors'
import type { Span } from './span'

/**
 * Resource limits for a single run. Omitted fields take their defaults.
 */
export interface LimitsConfig {
  /** Maximum number of active function calls before `StackOverflow`. Default: 1,500. */
  maxDepth?: number
  /** Maximum number of AST nodes visited per run. Default: unlimited. */
  maxSteps?: number
}

export interface ResolvedLimits {
  maxDepth: number
  maxSteps: number
}

const DEFAULT_LIMITS: ResolvedLimits = {
  maxDepth: 1_500,
  maxSteps: Number.POSITIVE_INFINITY,
}

export const resolveLimits = (config: LimitsConfig = {}): ResolvedLimits => ({
  maxDepth: config.maxDepth ?? DEFAULT_LIMITS.maxDepth,
  maxSteps: config.maxSteps ?? DEFAULT_LIMITS.maxSteps,
})

/**
 * Counts call depth and evaluation steps against the configured limits.
 * One tracker serves one run; it is not shared between interpreters.
 */
export class LimitTracker {
  private steps = 0
  private depth = 0

  constructor(private readonly limits: ResolvedLimits) {}

  /**
   * Records one node visit.
   */
  step(span: Span): void {
    this.steps += 1
    if (this.steps > this.limits.maxSteps) {
      throw new RuntimeError(
        'StepLimitExceeded',
        `Step limit of ${this.limits.maxSteps} exceeded`,
        span
      )
    }
  }

  /**
   * Enters one function call. Pair with {@link exit}.
   */
  enter(span: Span): void {
    this.depth += 1
    if (this.depth > this.limits.maxDepth) {
      throw new RuntimeError(
        'StackOverflow',
        `Maximum call depth of ${this.limits.maxDepth} exceeded`,
        span
      )
    }
  }

  exit(): void {
    this.depth = Math.max(0, this.depth - 1)
  }
}
