/**
 * Decision Tree Engine — evaluateTree(tree, facts)
 *
 * Walks from the root: at each decision node the condition is evaluated,
 * an entry is recorded, and the walk continues down the yes or no child;
 * at the leaf the outcome is recorded and returned with the trace.
 *
 * A `subtree` condition evaluates the nested tree into its own recorder.
 * Its entries (one nesting level deeper) are spliced in before the
 * delegating node's own entry, so the trace stays one contiguous
 * sequence and the parent's numbering continues after the nested block.
 *
 * Failures are atomic: the DecisionError is stamped with the tree, node
 * and step where it happened, and no trace is returned.
 */

import { DecisionError, DepthExceededError } from '../model/errors'
import type { FactSet } from '../model/facts'
import { logger } from '../utils/logger'
import { evaluateCondition } from './conditions'
import type { ConditionContext, ConditionOutcome } from './conditions'
import type { DecisionNode, DecisionTree } from './node'
import { TraceRecorder } from './recorder'
import type { TraceEntry } from './recorder'

const log = logger.child({ component: 'decision-engine' })

/** Deepest chain of trees delegating to trees. */
export const MAX_DELEGATION_DEPTH = 16

export interface EvaluationResult<O extends string = string> {
  readonly treeId: string
  readonly outcome: O
  readonly trace: readonly TraceEntry[]
}

export function evaluateTree<O extends string>(tree: DecisionTree<O>, facts: FactSet): EvaluationResult<O> {
  const recorder = new TraceRecorder()
  const outcome = walk(tree, facts, recorder, 0, 0)
  const trace = recorder.finalize()

  log.debug('Decision tree evaluated', { treeId: tree.id, outcome, steps: trace.length })

  return Object.freeze({ treeId: tree.id, outcome, trace })
}

/**
 * @param nesting  delegation level of `tree`
 * @param firstStep  global step index of `recorder`'s first entry
 */
function walk<O extends string>(
  tree: DecisionTree<O>,
  facts: FactSet,
  recorder: TraceRecorder,
  nesting: number,
  firstStep: number,
): O {
  if (nesting > MAX_DELEGATION_DEPTH) {
    throw new DepthExceededError(tree.id, MAX_DELEGATION_DEPTH, 'nested sub-trees')
  }

  const context: ConditionContext = {
    treeId: tree.id,
    predicates: tree.predicates,
    delegate: subtree => {
      const nested = new TraceRecorder()
      const outcome = walk(subtree, facts, nested, nesting + 1, firstStep + recorder.size)
      recorder.splice(nested.finalize())
      return outcome
    },
  }

  let node: DecisionNode<O> = tree.root
  let visited = 0

  while (node.kind === 'decision') {
    const location = { treeId: tree.id, nodeId: node.id, step: firstStep + recorder.size }

    visited += 1
    if (visited > tree.maxDepth) {
      throw new DepthExceededError(tree.id, tree.maxDepth).locate(location)
    }

    let evaluated: ConditionOutcome
    try {
      evaluated = evaluateCondition(node.condition, facts, context)
    } catch (error) {
      if (error instanceof DecisionError) {
        // a failure inside a delegated sub-tree is already located there
        throw error.locate({ ...location, step: firstStep + recorder.size })
      }
      throw error
    }

    const { result, rationale } = evaluated
    const branch = result ? 'yes' : 'no'
    recorder.record({
      treeId: tree.id,
      nodeId: node.id,
      depth: nesting,
      kind: 'decision',
      description: node.description,
      result,
      branch,
      rationale,
    })
    node = result ? node.yes : node.no
  }

  recorder.record({
    treeId: tree.id,
    nodeId: node.id,
    depth: nesting,
    kind: 'outcome',
    description: node.description,
    outcome: node.outcome,
  })
  return node.outcome
}
