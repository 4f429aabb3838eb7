/**
 * Tree Builder — node-by-node construction.
 *
 *   const tree = new TreeBuilder<'adult' | 'minor'>('age-check')
 *     .decision('is-adult', 'Is the person 18 or older?',
 *       compare(fact('age'), 'gte', constant(18)), { yes: 'adult', no: 'minor' })
 *     .outcome('adult', 'Adult', 'adult')
 *     .outcome('minor', 'Minor', 'minor')
 *     .build()
 *
 * Children are referenced by id and may be declared in any order. build()
 * checks the whole structure, reports every defect it finds in a single
 * MalformedTreeError, and otherwise returns a frozen tree. Nothing is
 * returned half-built.
 */

import { MalformedTreeError } from '../model/errors'
import { createFactSet } from '../model/facts'
import { isoDateSchema } from '../model/schemas'
import { logger } from '../utils/logger'
import type { Condition, DateOperand, NumericOperand, PredicateRegistry } from './conditions'
import { DEFAULT_MAX_DEPTH } from './node'
import type { DecisionNode, DecisionTree } from './node'

const log = logger.child({ component: 'tree-builder' })

export type Branch = 'yes' | 'no'

export interface TreeBuilderOptions {
  /** Most decision nodes on any root-to-leaf path (default 32). */
  maxDepth?: number
  predicates?: PredicateRegistry
}

interface PendingDecision {
  kind: 'decision'
  id: string
  description: string
  condition: Condition
  yes?: string
  no?: string
}

interface PendingOutcome<O extends string> {
  kind: 'outcome'
  id: string
  description: string
  outcome: O
}

type PendingNode<O extends string> = PendingDecision | PendingOutcome<O>

export class TreeBuilder<O extends string = string> {
  private readonly nodes = new Map<string, PendingNode<O>>()
  private readonly declarationIssues: string[] = []
  private readonly maxDepth: number
  private readonly predicates: PredicateRegistry
  private rootId?: string

  constructor(
    readonly treeId: string,
    options: TreeBuilderOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
    this.predicates = options.predicates ?? {}
  }

  decision(
    id: string,
    description: string,
    condition: Condition,
    children: { yes?: string; no?: string } = {},
  ): this {
    return this.declare({ kind: 'decision', id, description, condition, yes: children.yes, no: children.no })
  }

  outcome(id: string, description: string, outcome: O): this {
    return this.declare({ kind: 'outcome', id, description, outcome })
  }

  /** Connect an already declared decision node to a child. */
  branch(parentId: string, side: Branch, childId: string): this {
    const parent = this.nodes.get(parentId)
    if (!parent) {
      this.declarationIssues.push(`${side} branch from unknown node "${parentId}"`)
    } else if (parent.kind === 'outcome') {
      this.declarationIssues.push(`outcome "${parentId}" cannot have a ${side} branch`)
    } else if (parent[side] !== undefined) {
      this.declarationIssues.push(`decision "${parentId}" already has a ${side} branch`)
    } else {
      parent[side] = childId
    }
    return this
  }

  /** Defaults to the first node declared. */
  root(id: string): this {
    this.rootId = id
    return this
  }

  build(): DecisionTree<O> {
    const issues = [...this.declarationIssues]

    if (!Number.isInteger(this.maxDepth) || this.maxDepth < 1) {
      issues.push(`maxDepth must be a positive integer, got ${this.maxDepth}`)
    }

    if (this.nodes.size === 0) {
      throw new MalformedTreeError(this.treeId, [...issues, 'tree has no nodes'])
    }
    const rootId = this.rootId ?? [...this.nodes.keys()][0]
    if (!this.nodes.has(rootId)) {
      issues.push(`root "${rootId}" is not a declared node`)
    }

    for (const node of this.nodes.values()) {
      if (node.kind === 'outcome') continue
      for (const side of ['yes', 'no'] as const) {
        const childId = node[side]
        if (childId === undefined) {
          issues.push(`decision "${node.id}" is missing its ${side} branch`)
        } else if (!this.nodes.has(childId)) {
          issues.push(`decision "${node.id}" ${side} branch refers to unknown node "${childId}"`)
        }
      }
      this.checkCondition(node.id, node.condition, issues)
    }

    const reachable = new Set<string>()
    if (this.nodes.has(rootId)) {
      this.checkStructure(rootId, reachable, issues)
    }

    if (issues.length > 0) {
      throw new MalformedTreeError(this.treeId, issues)
    }

    const unreachable = [...this.nodes.keys()].filter(id => !reachable.has(id))
    if (unreachable.length > 0) {
      log.warn('Dropping unreachable nodes', { treeId: this.treeId, nodeIds: unreachable })
    }

    const built = new Map<string, DecisionNode<O>>()
    const root = this.freezeNode(rootId, built)

    const outcomes: O[] = []
    for (const node of this.nodes.values()) {
      if (node.kind === 'outcome' && reachable.has(node.id) && !outcomes.includes(node.outcome)) {
        outcomes.push(node.outcome)
      }
    }

    return Object.freeze({
      id: this.treeId,
      root,
      maxDepth: this.maxDepth,
      depth: this.depthOf(rootId, new Map()),
      nodeCount: reachable.size,
      outcomes: Object.freeze(outcomes),
      predicates: Object.freeze({ ...this.predicates }),
    })
  }

  // ── Checks ─────────────────────────────────────────────────────

  private declare(node: PendingNode<O>): this {
    if (this.nodes.has(node.id)) {
      this.declarationIssues.push(`duplicate node id "${node.id}"`)
    } else {
      this.nodes.set(node.id, node)
    }
    return this
  }

  private checkCondition(nodeId: string, condition: Condition, issues: string[]): void {
    switch (condition.kind) {
      case 'is':
      case 'known':
        return
      case 'compare':
        return
      case 'oneOf':
        if (condition.values.length === 0) {
          issues.push(`decision "${nodeId}" tests ${condition.field} against an empty set`)
        }
        return
      case 'dateCompare':
        for (const operand of [condition.left, condition.right]) {
          if (!isValidDateOperand(operand)) {
            issues.push(`decision "${nodeId}" compares against an invalid date`)
          }
        }
        return
      case 'all':
      case 'any':
        if (condition.conditions.length === 0) {
          issues.push(`decision "${nodeId}" has an empty ${condition.kind}()`)
        }
        for (const inner of condition.conditions) this.checkCondition(nodeId, inner, issues)
        return
      case 'not':
        this.checkCondition(nodeId, condition.condition, issues)
        return
      case 'predicate':
        if (!Object.hasOwn(this.predicates, condition.name)) {
          issues.push(`decision "${nodeId}" uses unknown predicate "${condition.name}"`)
        }
        return
      case 'subtree': {
        if (condition.outcomes.length === 0) {
          issues.push(`decision "${nodeId}" delegates to "${condition.tree.id}" without accepted outcomes`)
        }
        const possible: readonly string[] = condition.tree.outcomes
        for (const outcome of condition.outcomes) {
          if (!possible.includes(outcome)) {
            issues.push(`decision "${nodeId}" expects outcome "${outcome}" that "${condition.tree.id}" never produces`)
          }
        }
        return
      }
    }
  }

  /**
   * Depth-first walk from the root: records every reachable id and
   * reports cycles and paths longer than maxDepth.
   */
  private checkStructure(rootId: string, reachable: Set<string>, issues: string[]): void {
    const onPath: string[] = []
    const done = new Set<string>()
    let cyclic = false

    const visit = (id: string): void => {
      const node = this.nodes.get(id)
      if (!node) return
      const seenAt = onPath.indexOf(id)
      if (seenAt >= 0) {
        issues.push(`cycle ${[...onPath.slice(seenAt), id].map(n => `"${n}"`).join(' -> ')}`)
        cyclic = true
        return
      }
      if (done.has(id)) return
      reachable.add(id)
      if (node.kind === 'decision') {
        onPath.push(id)
        if (node.yes !== undefined) visit(node.yes)
        if (node.no !== undefined) visit(node.no)
        onPath.pop()
      }
      done.add(id)
    }
    visit(rootId)

    if (!cyclic) {
      const depth = this.depthOf(rootId, new Map())
      if (depth > this.maxDepth) {
        issues.push(`depth ${depth} exceeds maxDepth ${this.maxDepth}`)
      }
    }
  }

  /** Decision nodes on the longest path below `id`; the graph must be acyclic. */
  private depthOf(id: string, memo: Map<string, number>): number {
    const known = memo.get(id)
    if (known !== undefined) return known
    const node = this.nodes.get(id)
    let depth = 0
    if (node?.kind === 'decision') {
      const yes = node.yes === undefined ? 0 : this.depthOf(node.yes, memo)
      const no = node.no === undefined ? 0 : this.depthOf(node.no, memo)
      depth = 1 + Math.max(yes, no)
    }
    memo.set(id, depth)
    return depth
  }

  // ── Freezing ───────────────────────────────────────────────────

  /** Bottom-up; a node reached twice is built once and shared. */
  private freezeNode(id: string, built: Map<string, DecisionNode<O>>): DecisionNode<O> {
    const existing = built.get(id)
    if (existing) return existing

    const node = this.nodes.get(id)
    if (!node) {
      throw new MalformedTreeError(this.treeId, [`unknown node "${id}"`])
    }

    let frozen: DecisionNode<O>
    if (node.kind === 'outcome') {
      frozen = Object.freeze({ kind: 'outcome', id, description: node.description, outcome: node.outcome })
    } else {
      if (node.yes === undefined || node.no === undefined) {
        throw new MalformedTreeError(this.treeId, [`decision "${id}" is missing a branch`])
      }
      frozen = Object.freeze({
        kind: 'decision',
        id,
        description: node.description,
        condition: freezeCondition(node.condition),
        yes: this.freezeNode(node.yes, built),
        no: this.freezeNode(node.no, built),
      })
    }
    built.set(id, frozen)
    return frozen
  }
}

function isValidDateOperand(operand: DateOperand): boolean {
  return operand.kind === 'fact' || isoDateSchema.safeParse(operand.value).success
}

/** A frozen copy; a delegated tree is already frozen and is kept by reference. */
export function freezeCondition(condition: Condition): Condition {
  switch (condition.kind) {
    case 'is':
    case 'known':
      return Object.freeze({ ...condition })
    case 'compare':
      return Object.freeze({
        ...condition,
        left: freezeOperand(condition.left),
        right: freezeOperand(condition.right),
      })
    case 'oneOf':
      return Object.freeze({ ...condition, values: Object.freeze([...condition.values]) })
    case 'dateCompare':
      return Object.freeze({
        ...condition,
        left: Object.freeze({ ...condition.left }),
        right: Object.freeze({ ...condition.right }),
      })
    case 'all':
    case 'any':
      return Object.freeze({ ...condition, conditions: Object.freeze(condition.conditions.map(freezeCondition)) })
    case 'not':
      return Object.freeze({ ...condition, condition: freezeCondition(condition.condition) })
    case 'predicate':
      return Object.freeze({
        ...condition,
        params: condition.params ? createFactSet(condition.params) : undefined,
      })
    case 'subtree':
      return Object.freeze({ ...condition, outcomes: Object.freeze([...condition.outcomes]) })
  }
}

function freezeOperand(operand: NumericOperand): NumericOperand {
  switch (operand.kind) {
    case 'fact':
    case 'const':
      return Object.freeze({ ...operand })
    case 'sum':
      return Object.freeze({ ...operand, terms: Object.freeze(operand.terms.map(freezeOperand)) })
    case 'difference':
      return Object.freeze({ ...operand, left: freezeOperand(operand.left), right: freezeOperand(operand.right) })
    case 'scale':
      return Object.freeze({ ...operand, operand: freezeOperand(operand.operand) })
    case 'ratio':
      return Object.freeze({
        ...operand,
        numerator: freezeOperand(operand.numerator),
        denominator: freezeOperand(operand.denominator),
      })
  }
}
