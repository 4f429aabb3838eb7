/**
 * Decision Tree Engine Tests
 *
 * Traversal, trace contents, sub-tree delegation and error location.
 */

import { describe, it, expect } from 'vitest'
import { delegateTo, isTrue, predicate } from '../../src/engine/conditions'
import { TreeBuilder } from '../../src/engine/builder'
import { MAX_DELEGATION_DEPTH, evaluateTree } from '../../src/engine/evaluate'
import { renderTrace } from '../../src/engine/render'
import { DepthExceededError, MissingFactError } from '../../src/model/errors'
import { createFactSet } from '../../src/model/facts'
import { ageTree, delegationChain, linearTree } from '../fixtures/trees'

function thrownBy(run: () => unknown): unknown {
  try {
    run()
  } catch (err) {
    return err
  }
  throw new Error('expected an error')
}

// ── Traversal ───────────────────────────────────────────────────

describe('evaluateTree', () => {
  it('returns the outcome and one entry per visited node', () => {
    const result = evaluateTree(ageTree(), createFactSet({ age: 20 }))
    expect(result.treeId).toBe('age-check')
    expect(result.outcome).toBe('adult')
    expect(result.trace).toEqual([
      {
        step: 0,
        treeId: 'age-check',
        nodeId: 'is-adult',
        depth: 0,
        kind: 'decision',
        description: 'Is the person 18 or older?',
        result: true,
        branch: 'yes',
        rationale: 'age 20 >= 18: true',
      },
      {
        step: 1,
        treeId: 'age-check',
        nodeId: 'adult',
        depth: 0,
        kind: 'outcome',
        description: 'Adult',
        outcome: 'adult',
      },
    ])
  })

  it('follows the no branch', () => {
    expect(evaluateTree(ageTree(), createFactSet({ age: 17 })).outcome).toBe('minor')
  })

  it('records at most depth + 1 entries', () => {
    const tree = linearTree(4).build()
    const full = evaluateTree(tree, createFactSet({ go: true }))
    const short = evaluateTree(tree, createFactSet({ go: false }))
    expect(full.trace).toHaveLength(tree.depth + 1)
    expect(short.trace).toHaveLength(2)
    expect(short.outcome).toBe('other')
  })

  it('gives the same result for the same facts', () => {
    const tree = ageTree()
    const facts = createFactSet({ age: 30 })
    expect(evaluateTree(tree, facts)).toEqual(evaluateTree(tree, facts))
  })

  it('returns a frozen result', () => {
    const result = evaluateTree(ageTree(), createFactSet({ age: 30 }))
    expect(Object.isFrozen(result)).toBe(true)
    expect(Object.isFrozen(result.trace)).toBe(true)
    expect(Object.isFrozen(result.trace[0])).toBe(true)
  })

  it('ignores facts no condition reads', () => {
    const result = evaluateTree(ageTree(), createFactSet({ age: 30, name: 'Test Person' }))
    expect(result.outcome).toBe('adult')
  })
})

// ── Delegation ──────────────────────────────────────────────────

describe('evaluateTree — sub-trees', () => {
  it('splices nested entries in before the delegating node', () => {
    const [, , chain2] = delegationChain(3)
    const result = evaluateTree(chain2, createFactSet({ go: true }))

    expect(result.outcome).toBe('done')
    expect(result.trace.map(e => [e.step, e.treeId, e.nodeId, e.depth])).toEqual([
      [0, 'chain-0', 'go', 2],
      [1, 'chain-0', 'done', 2],
      [2, 'chain-1', 'delegate', 1],
      [3, 'chain-1', 'done', 1],
      [4, 'chain-2', 'delegate', 0],
      [5, 'chain-2', 'done', 0],
    ])
    expect(renderTrace(result.trace)).toBe([
      '    |- [0] Go? -> yes (go: true)',
      '    |- [1] Done => done',
      '  |- [2] Does chain-0 finish? -> yes (chain-0 => done: true)',
      '  |- [3] Done => done',
      '[4] Does chain-1 finish? -> yes (chain-1 => done: true)',
      '[5] Done => done',
    ].join('\n'))
  })

  it('takes the no branch when the nested outcome is not accepted', () => {
    const [, chain1] = delegationChain(2)
    const result = evaluateTree(chain1, createFactSet({ go: false }))
    expect(result.outcome).toBe('other')
    expect(result.trace[2].rationale).toBe('chain-0 => other: false')
  })

  it(`allows ${MAX_DELEGATION_DEPTH} levels of nesting`, () => {
    const chain = delegationChain(MAX_DELEGATION_DEPTH + 1)
    const result = evaluateTree(chain[MAX_DELEGATION_DEPTH], createFactSet({ go: true }))
    expect(result.outcome).toBe('done')
    expect(result.trace).toHaveLength(2 * (MAX_DELEGATION_DEPTH + 1))
  })

  it('throws DepthExceededError past that', () => {
    const chain = delegationChain(MAX_DELEGATION_DEPTH + 2)
    const err = thrownBy(() => evaluateTree(chain[MAX_DELEGATION_DEPTH + 1], createFactSet({ go: true })))

    expect(err).toBeInstanceOf(DepthExceededError)
    if (!(err instanceof DepthExceededError)) return
    expect(err.limit).toBe(16)
    expect(err.message).toBe('Evaluation of "chain-0" exceeded 16 nested sub-trees')
    expect(err.treeId).toBe('chain-1')
    expect(err.nodeId).toBe('delegate')
  })
})

// ── Errors ──────────────────────────────────────────────────────

describe('evaluateTree — errors', () => {
  const twoStep = new TreeBuilder<'y' | 'n'>('two-step')
    .decision('first', 'First?', isTrue('a'), { yes: 'second', no: 'n' })
    .decision('second', 'Second?', isTrue('b'), { yes: 'y', no: 'n' })
    .outcome('y', 'Yes', 'y')
    .outcome('n', 'No', 'n')
    .build()

  it('locates a missing fact at its node and step', () => {
    const err = thrownBy(() => evaluateTree(twoStep, createFactSet({ a: true })))
    expect(err).toBeInstanceOf(MissingFactError)
    if (!(err instanceof MissingFactError)) return
    expect(err.field).toBe('b')
    expect(err.treeId).toBe('two-step')
    expect(err.nodeId).toBe('second')
    expect(err.step).toBe(1)
  })

  it('locates a failure inside a sub-tree at the sub-tree node', () => {
    const [chain0] = delegationChain(1)
    const outer = new TreeBuilder<'y' | 'n'>('outer')
      .decision('first', 'First?', isTrue('a'), { yes: 'sub', no: 'n' })
      .decision('sub', 'Sub?', delegateTo(chain0, ['done']), { yes: 'y', no: 'n' })
      .outcome('y', 'Yes', 'y')
      .outcome('n', 'No', 'n')
      .build()

    const err = thrownBy(() => evaluateTree(outer, createFactSet({ a: true })))
    expect(err).toBeInstanceOf(MissingFactError)
    if (!(err instanceof MissingFactError)) return
    expect(err.field).toBe('go')
    expect(err.treeId).toBe('chain-0')
    expect(err.nodeId).toBe('go')
    expect(err.step).toBe(1)
  })

  it('passes other errors through untouched', () => {
    const tree = new TreeBuilder<'y' | 'n'>('throws', {
      predicates: {
        boom: () => {
          throw new Error('predicate failed')
        },
      },
    })
      .decision('q', 'Q?', predicate('boom'), { yes: 'y', no: 'n' })
      .outcome('y', 'Yes', 'y')
      .outcome('n', 'No', 'n')
      .build()

    expect(() => evaluateTree(tree, createFactSet({}))).toThrow('predicate failed')
  })
})
