/**
 * Declarative tree construction.
 *
 * A tree can be written as one nested value (and so loaded from JSON):
 *
 *   {
 *     "id": "age-check",
 *     "root": {
 *       "id": "is-adult", "description": "Is the person 18 or older?",
 *       "condition": { "kind": "compare", "left": { "kind": "fact", "field": "age" },
 *                      "op": "gte", "right": { "kind": "const", "value": 18 } },
 *       "yes": { "id": "adult", "description": "Adult", "outcome": "adult" },
 *       "no":  { "ref": "minor" }
 *     },
 *     "shared": [{ "id": "minor", "description": "Minor", "outcome": "minor" }]
 *   }
 *
 * `{ "ref": id }` points at any node declared elsewhere in the value,
 * usually under `shared`. Sub-tree conditions name other trees by id and
 * are resolved against the trees passed as `subtrees`. Structure checks
 * are the TreeBuilder's.
 */

import { MalformedTreeError } from '../model/errors'
import { treeSpecSchema } from '../model/schemas'
import type { Condition, PredicateRegistry } from './conditions'
import { TreeBuilder } from './builder'
import type { DecisionTree } from './node'

// ── Spec types ───────────────────────────────────────────────────

export type ConditionSpec =
  | Exclude<Condition, { kind: 'all' | 'any' | 'not' | 'subtree' }>
  | { kind: 'all'; conditions: readonly ConditionSpec[] }
  | { kind: 'any'; conditions: readonly ConditionSpec[] }
  | { kind: 'not'; condition: ConditionSpec }
  | { kind: 'subtree'; tree: string; outcomes: readonly string[] }

export interface NodeRef {
  ref: string
}

export interface LeafSpec {
  id: string
  description: string
  outcome: string
}

export interface DecisionSpec {
  id: string
  description: string
  condition: ConditionSpec
  yes?: NodeRef | NodeSpec
  no?: NodeRef | NodeSpec
}

export type NodeSpec = DecisionSpec | LeafSpec

export interface TreeSpec {
  id: string
  maxDepth?: number
  root: NodeSpec
  shared?: readonly NodeSpec[]
}

export interface BuildTreeOptions {
  /** Trees that `subtree` conditions may name (by their id). */
  subtrees?: readonly DecisionTree[]
  predicates?: PredicateRegistry
}

// ── Construction ─────────────────────────────────────────────────

export function buildTree(spec: TreeSpec, options: BuildTreeOptions = {}): DecisionTree<string> {
  const subtrees = new Map<string, DecisionTree>()
  for (const tree of options.subtrees ?? []) subtrees.set(tree.id, tree)

  const unknown = new Set<string>()
  forEachNode(spec, node => {
    if ('condition' in node) collectSubtreeIds(node.condition, id => {
      if (!subtrees.has(id)) unknown.add(id)
    })
  })
  if (unknown.size > 0) {
    throw new MalformedTreeError(spec.id, [...unknown].map(id => `unknown sub-tree "${id}"`))
  }

  const builder = new TreeBuilder<string>(spec.id, { maxDepth: spec.maxDepth, predicates: options.predicates })

  const childId = (child: NodeRef | NodeSpec | undefined): string | undefined => {
    if (child === undefined) return undefined
    if ('ref' in child) return child.ref
    declare(child)
    return child.id
  }

  const declare = (node: NodeSpec): void => {
    if ('outcome' in node) {
      builder.outcome(node.id, node.description, node.outcome)
      return
    }
    const yes = childId(node.yes)
    const no = childId(node.no)
    builder.decision(node.id, node.description, resolveCondition(node.condition, subtrees), { yes, no })
  }

  declare(spec.root)
  for (const node of spec.shared ?? []) declare(node)

  return builder.root(spec.root.id).build()
}

/**
 * Validate an untrusted value (e.g. parsed JSON) as a tree spec. Each
 * schema issue becomes one MalformedTreeError issue, prefixed with its
 * path: "root.condition.op: Invalid enum value...".
 */
export function parseTreeSpec(raw: unknown): TreeSpec {
  const parsed = treeSpecSchema.safeParse(raw)
  if (parsed.success) return parsed.data

  const id = typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string'
    ? raw.id
    : '(unnamed)'
  const issues = parsed.error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
  throw new MalformedTreeError(id, issues)
}

/** parseTreeSpec, then buildTree. */
export function loadTree(raw: unknown, options: BuildTreeOptions = {}): DecisionTree<string> {
  return buildTree(parseTreeSpec(raw), options)
}

// ── Helpers ──────────────────────────────────────────────────────

function forEachNode(spec: TreeSpec, visit: (node: NodeSpec) => void): void {
  const walk = (node: NodeRef | NodeSpec | undefined): void => {
    if (node === undefined || 'ref' in node) return
    visit(node)
    if ('condition' in node) {
      walk(node.yes)
      walk(node.no)
    }
  }
  walk(spec.root)
  for (const node of spec.shared ?? []) walk(node)
}

function collectSubtreeIds(condition: ConditionSpec, found: (id: string) => void): void {
  switch (condition.kind) {
    case 'subtree':
      found(condition.tree)
      return
    case 'all':
    case 'any':
      for (const inner of condition.conditions) collectSubtreeIds(inner, found)
      return
    case 'not':
      collectSubtreeIds(condition.condition, found)
      return
    default:
      return
  }
}

function resolveCondition(condition: ConditionSpec, subtrees: ReadonlyMap<string, DecisionTree>): Condition {
  switch (condition.kind) {
    case 'subtree': {
      const tree = subtrees.get(condition.tree)
      if (!tree) throw new MalformedTreeError('(sub-tree)', [`unknown sub-tree "${condition.tree}"`])
      return { kind: 'subtree', tree, outcomes: condition.outcomes }
    }
    case 'all':
    case 'any':
      return { kind: condition.kind, conditions: condition.conditions.map(c => resolveCondition(c, subtrees)) }
    case 'not':
      return { kind: 'not', condition: resolveCondition(condition.condition, subtrees) }
    default:
      return condition
  }
}
