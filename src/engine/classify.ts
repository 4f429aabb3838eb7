/**
 * Batch classification: route many fact sets through one tree and bin
 * them by the leaf they reach. Used to sort line items (income, support
 * payments) before totalling the ones that count.
 */

import type { FactSet } from '../model/facts'
import { evaluateTree } from './evaluate'
import type { DecisionTree } from './node'

/**
 * Groups keep input order. Outcomes no item reached are absent from the
 * map; any DecisionError from an item propagates.
 */
export function classifyAll<O extends string>(
  tree: DecisionTree<O>,
  items: readonly FactSet[],
): Map<O, FactSet[]> {
  const groups = new Map<O, FactSet[]>()
  for (const item of items) {
    const { outcome } = evaluateTree(tree, item)
    const group = groups.get(outcome)
    if (group) {
      group.push(item)
    } else {
      groups.set(outcome, [item])
    }
  }
  return groups
}
