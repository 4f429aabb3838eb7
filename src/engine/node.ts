/**
 * Decision nodes and built trees.
 *
 * A determination is a tree value, not a subclass: internal nodes hold a
 * condition and two children, leaves hold an outcome tag. Nodes are
 * frozen once built, so a sub-tree may be shared between parents (or
 * between trees) as a plain reference.
 */

import type { Condition, PredicateRegistry } from './conditions'

export interface InternalNode<O extends string = string> {
  readonly kind: 'decision'
  readonly id: string
  readonly description: string
  readonly condition: Condition
  readonly yes: DecisionNode<O>
  readonly no: DecisionNode<O>
}

export interface LeafNode<O extends string = string> {
  readonly kind: 'outcome'
  readonly id: string
  readonly description: string
  readonly outcome: O
}

export type DecisionNode<O extends string = string> = InternalNode<O> | LeafNode<O>

export interface DecisionTree<O extends string = string> {
  readonly id: string
  readonly root: DecisionNode<O>
  /** Most decision nodes one evaluation may visit. */
  readonly maxDepth: number
  /** Decision nodes on the longest root-to-leaf path. */
  readonly depth: number
  readonly nodeCount: number
  /** Every outcome some leaf can produce, in declaration order. */
  readonly outcomes: readonly O[]
  readonly predicates: PredicateRegistry
}

export const DEFAULT_MAX_DEPTH = 32

export function isLeaf<O extends string>(node: DecisionNode<O>): node is LeafNode<O> {
  return node.kind === 'outcome'
}
