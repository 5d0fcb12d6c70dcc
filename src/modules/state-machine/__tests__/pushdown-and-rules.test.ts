/**
 * Unit tests for the transition table and the pushdown state stack.
 */

import { describe, it, expect } from 'vitest'
import { PushdownAutomaton } from '../pushdown-automaton.js'
import { TRANSITION_RULES, isValidTransition } from '../transition-rules.js'
import { ARTEMIS_STATES } from '../types.js'

describe('transition rules', () => {
  it('covers every state', () => {
    expect(Object.keys(TRANSITION_RULES).sort()).toEqual([...ARTEMIS_STATES].sort())
  })

  it('allows listed edges and self-transitions only', () => {
    expect(isValidTransition('idle', 'initializing')).toBe(true)
    expect(isValidTransition('stage_failed', 'recovering')).toBe(true)
    expect(isValidTransition('running', 'running')).toBe(true)
    expect(isValidTransition('idle', 'running')).toBe(false)
    expect(isValidTransition('paused', 'completed')).toBe(false)
  })

  it('treats completed and aborted as final', () => {
    for (const to of ARTEMIS_STATES) {
      if (to !== 'completed') expect(isValidTransition('completed', to)).toBe(false)
      if (to !== 'aborted') expect(isValidTransition('aborted', to)).toBe(false)
    }
  })
})

describe('PushdownAutomaton', () => {
  const clock = (): Date => new Date('2026-01-01T00:00:00.000Z')

  it('pushes, peeks and pops in LIFO order', () => {
    const stack = new PushdownAutomaton(clock)
    stack.push('running', { step: 1 })
    stack.push('stage_running', { stage: 'build' })

    expect(stack.depth).toBe(2)
    expect(stack.peek()).toEqual({
      state: 'stage_running',
      timestamp: '2026-01-01T00:00:00.000Z',
      context: { stage: 'build' },
    })
    expect(stack.pop()?.state).toBe('stage_running')
    expect(stack.pop()?.state).toBe('running')
    expect(stack.pop()).toBeUndefined()
    expect(stack.peek()).toBeUndefined()
  })

  it('copies pushed contexts', () => {
    const stack = new PushdownAutomaton(clock)
    const context = { files: ['a.ts'] }
    stack.push('running', context)
    context.files.push('b.ts')

    expect(stack.peek()?.context).toEqual({ files: ['a.ts'] })
  })

  it('rolls back to the topmost matching entry and leaves it on top', () => {
    const stack = new PushdownAutomaton(clock)
    stack.push('running', { n: 1 })
    stack.push('stage_running', { n: 2 })
    stack.push('running', { n: 3 })
    stack.push('stage_running', { n: 4 })
    stack.push('stage_failed', { n: 5 })

    const popped = stack.rollbackTo('running')

    expect(popped?.map((e) => e.context.n)).toEqual([5, 4])
    expect(stack.depth).toBe(3)
    expect(stack.peek()?.context).toEqual({ n: 3 })
  })

  it('leaves the stack alone when the target is absent', () => {
    const stack = new PushdownAutomaton(clock)
    stack.push('running')
    stack.push('stage_running')

    expect(stack.rollbackTo('paused')).toBeNull()
    expect(stack.depth).toBe(2)
  })
})
