// ── Engine ───────────────────────────────────────────────────────

export * from './engine/conditions'
export type { DecisionNode, DecisionTree, InternalNode, LeafNode } from './engine/node'
export { DEFAULT_MAX_DEPTH, isLeaf } from './engine/node'
export type { Branch, TreeBuilderOptions } from './engine/builder'
export { TreeBuilder } from './engine/builder'
export type {
  BuildTreeOptions,
  ConditionSpec,
  DecisionSpec,
  LeafSpec,
  NodeRef,
  NodeSpec,
  TreeSpec,
} from './engine/declarative'
export { buildTree, loadTree, parseTreeSpec } from './engine/declarative'
export type { EvaluationResult } from './engine/evaluate'
export { MAX_DELEGATION_DEPTH, evaluateTree } from './engine/evaluate'
export { classifyAll } from './engine/classify'
export type { TraceEntry, TraceEntryInput } from './engine/recorder'
export { TraceRecorder } from './engine/recorder'
export { explainDecision, renderTrace, renderTraceEntry } from './engine/render'

// ── Model ────────────────────────────────────────────────────────

export * from './model/errors'
export * from './model/facts'
export * from './model/traced'
export * from './model/types'

// ── Procedures and tables ────────────────────────────────────────

export * from './rules/capitalGainNetting'
export * from './rules/qbiDeduction'
export * from './rules/socialSecurityBenefits'
export * from './rules/section179'
export * from './rules/yearTables'

// ── Determination trees ──────────────────────────────────────────

export * from './rules/trees/incomeTest'
export * from './rules/trees/supportTest'
export * from './rules/trees/qualifyingChild'
export * from './rules/trees/qualifyingRelative'
export * from './rules/trees/dependent'
export * from './rules/trees/childOfDivorcedParents'
export * from './rules/trees/tiebreaker'
export * from './rules/trees/eicQualifyingChild'
export * from './rules/trees/dependentCare'
export * from './rules/trees/headOfHousehold'
export * from './rules/trees/residentAlien'
export * from './rules/trees/depreciation'
