import type { Value } from '../value'

/**
 * One lexical scope frame. Frames link outward to their parent and never to
 * their children, so a closure holding a frame keeps only its ancestors alive.
 */
export class Environment {
  private readonly slots = new Map<string, Value>()

  constructor(readonly parent: Environment | null = null) {}

  /**
   * Looks a name up from this frame outward.
   * Returns `undefined` when no frame binds it.
   */
  lookup(name: string): Value | undefined {
    let frame: Environment | null = this
    while (frame !== null) {
      if (frame.slots.has(name)) {
        return frame.slots.get(name)
      }
      frame = frame.parent
    }
    return undefined
  }

  /**
   * Binds a name in this frame, overwriting an existing slot of the same frame.
   */
  define(name: string, value: Value): void {
    this.slots.set(name, value)
  }

  /**
   * Writes the nearest existing slot for `name`.
   * Returns `false` when the name is unbound in every frame.
   */
  assign(name: string, value: Value): boolean {
    let frame: Environment | null = this
    while (frame !== null) {
      if (frame.slots.has(name)) {
        frame.slots.set(name, value)
        return true
      }
      frame = frame.parent
    }
    return false
  }

  child(): Environment {
    return new Environment(this)
  }
}
