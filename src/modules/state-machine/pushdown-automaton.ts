/**
 * PushdownAutomaton: LIFO stack of (state, context) entries for nested
 * state contexts, kept apart from the primary state.
 */

import { createLogger } from '../../utils/logger.js'
import { deepClone } from '../../utils/helpers.js'
import type { ArtemisState, StackEntry } from './types.js'

const logger = createLogger('state-machine:stack')

export class PushdownAutomaton {
  private readonly _stack: StackEntry[] = []
  private readonly _now: () => Date

  constructor(now: () => Date = () => new Date()) {
    this._now = now
  }

  push(state: ArtemisState, context: Record<string, unknown> = {}): void {
    this._stack.push({ state, timestamp: this._now().toISOString(), context: deepClone(context) })
    logger.debug({ state, depth: this._stack.length }, 'State pushed')
  }

  pop(): StackEntry | undefined {
    const entry = this._stack.pop()
    if (entry !== undefined) logger.debug({ state: entry.state, depth: this._stack.length }, 'State popped')
    return entry
  }

  peek(): StackEntry | undefined {
    return this._stack[this._stack.length - 1]
  }

  get depth(): number {
    return this._stack.length
  }

  /** Copy of the stack, bottom first */
  entries(): StackEntry[] {
    return deepClone(this._stack)
  }

  /**
   * Pop down to the topmost entry holding `target`, leaving it on top.
   * Returns the popped entries (top first), or null when `target` is not on
   * the stack, in which case nothing is popped.
   */
  rollbackTo(target: ArtemisState): StackEntry[] | null {
    let index = -1
    for (let i = this._stack.length - 1; i >= 0; i--) {
      if (this._stack[i]?.state === target) {
        index = i
        break
      }
    }
    if (index === -1) {
      logger.warn({ target, depth: this._stack.length }, 'Rollback target not on the stack')
      return null
    }

    const popped = this._stack.splice(index + 1).reverse()
    logger.info({ target, popped: popped.length }, 'Rolled back state stack')
    return popped
  }

  clear(): void {
    this._stack.length = 0
  }
}
