/**
 * Small trees shared by the engine tests, and a compact view of a trace
 * for the determination tree tests.
 */

import { compare, constant, delegateTo, fact, isTrue } from '../../src/engine/conditions'
import { TreeBuilder } from '../../src/engine/builder'
import type { DecisionTree } from '../../src/engine/node'
import type { TraceEntry } from '../../src/engine/recorder'

export type AgeOutcome = 'adult' | 'minor'

/** One decision: age >= 18. */
export function ageTree(): DecisionTree<AgeOutcome> {
  return new TreeBuilder<AgeOutcome>('age-check')
    .decision('is-adult', 'Is the person 18 or older?',
      compare(fact('age'), 'gte', constant(18)), { yes: 'adult', no: 'minor' })
    .outcome('adult', 'Adult', 'adult')
    .outcome('minor', 'Minor', 'minor')
    .build()
}

export type ChainOutcome = 'done' | 'other'

/**
 * `length` trees, each delegating to the one before it; chain-0 tests
 * the boolean fact `go`. Returns them in order, chain-0 first.
 */
export function delegationChain(length: number): DecisionTree<ChainOutcome>[] {
  const trees: DecisionTree<ChainOutcome>[] = [
    new TreeBuilder<ChainOutcome>('chain-0')
      .decision('go', 'Go?', isTrue('go'), { yes: 'done', no: 'other' })
      .outcome('done', 'Done', 'done')
      .outcome('other', 'Other', 'other')
      .build(),
  ]
  for (let i = 1; i < length; i++) {
    trees.push(
      new TreeBuilder<ChainOutcome>(`chain-${i}`)
        .decision('delegate', `Does chain-${i - 1} finish?`,
          delegateTo(trees[i - 1], ['done']), { yes: 'done', no: 'other' })
        .outcome('done', 'Done', 'done')
        .outcome('other', 'Other', 'other')
        .build(),
    )
  }
  return trees
}

/** `length` decision nodes on `go`, each yes leading to the next. */
export function linearTree(length: number, maxDepth?: number): TreeBuilder<ChainOutcome> {
  const builder = new TreeBuilder<ChainOutcome>('linear', { maxDepth })
  for (let i = 1; i <= length; i++) {
    builder.decision(`d${i}`, `Step ${i}?`, isTrue('go'), { yes: i === length ? 'done' : `d${i + 1}`, no: 'other' })
  }
  return builder
    .outcome('done', 'Done', 'done')
    .outcome('other', 'Other', 'other')
}

/** `depth:nodeId` per entry, e.g. ['1:relationship', '1:not-qualifying', '0:is-qualifying-child']. */
export function tracePath(trace: readonly TraceEntry[]): string[] {
  return trace.map(entry => `${entry.depth}:${entry.nodeId}`)
}
