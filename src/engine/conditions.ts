/**
 * Condition Evaluator
 *
 * A condition is a plain descriptor (predicate kind + parameters). It is
 * evaluated against one fact set and yields a boolean plus a one-line
 * rationale that says which facts were read and how they compared:
 *
 *   gross_income 4200 >= threshold 4700: false
 *
 * Evaluation is pure. The two kinds that reach outside the descriptor go
 * through the context: `predicate` looks its function up in the tree's
 * registry, `subtree` hands the nested tree to the engine's delegate.
 */

import { MalformedTreeError } from '../model/errors'
import type { FactSet, FactValue } from '../model/facts'
import {
  formatDate,
  formatNumber,
  hasFact,
  requireBoolean,
  requireCategory,
  requireDate,
  requireNumber,
} from '../model/facts'
import type { DecisionTree } from './node'

// ── Descriptors ──────────────────────────────────────────────────

export type Comparator = 'eq' | 'ne' | 'lt' | 'lte' | 'gt' | 'gte'

export interface FactOperand {
  kind: 'fact'
  field: string
}

export type NumericOperand =
  | FactOperand
  | { kind: 'const'; value: number; label?: string }
  | { kind: 'sum'; terms: readonly NumericOperand[]; label?: string }
  | { kind: 'difference'; left: NumericOperand; right: NumericOperand; label?: string }
  | { kind: 'scale'; operand: NumericOperand; factor: number; label?: string }
  | { kind: 'ratio'; numerator: NumericOperand; denominator: NumericOperand; label?: string }

export type DateOperand =
  | FactOperand
  | { kind: 'date'; value: string; label?: string }   // ISO YYYY-MM-DD

export type Condition =
  | { kind: 'is'; field: string }
  | { kind: 'known'; field: string }
  | { kind: 'compare'; left: NumericOperand; op: Comparator; right: NumericOperand }
  | { kind: 'oneOf'; field: string; values: readonly string[] }
  | { kind: 'dateCompare'; left: DateOperand; op: Comparator; right: DateOperand }
  | { kind: 'all'; conditions: readonly Condition[] }
  | { kind: 'any'; conditions: readonly Condition[] }
  | { kind: 'not'; condition: Condition }
  | { kind: 'predicate'; name: string; params?: Readonly<Record<string, FactValue>> }
  | { kind: 'subtree'; tree: DecisionTree; outcomes: readonly string[] }

export interface ConditionOutcome {
  result: boolean
  rationale: string
}

/** A named, parameterised test that the descriptor kinds cannot express. */
export type Predicate = (facts: FactSet, params: Readonly<Record<string, FactValue>>) => ConditionOutcome

export type PredicateRegistry = Readonly<Record<string, Predicate>>

export interface ConditionContext {
  treeId?: string
  predicates?: PredicateRegistry
  /** Evaluate a nested tree against the same facts; returns its outcome. */
  delegate?: (tree: DecisionTree) => string
}

// ── Constructors ─────────────────────────────────────────────────
// Shorthand for tree authors; each returns a plain descriptor.

export const fact = (field: string): FactOperand => ({ kind: 'fact', field })

export const constant = (value: number, label?: string): NumericOperand => ({ kind: 'const', value, label })

export const sumOf = (terms: readonly NumericOperand[], label?: string): NumericOperand =>
  ({ kind: 'sum', terms, label })

export const difference = (left: NumericOperand, right: NumericOperand, label?: string): NumericOperand =>
  ({ kind: 'difference', left, right, label })

export const scaled = (operand: NumericOperand, factor: number, label?: string): NumericOperand =>
  ({ kind: 'scale', operand, factor, label })

export const ratio = (numerator: NumericOperand, denominator: NumericOperand, label?: string): NumericOperand =>
  ({ kind: 'ratio', numerator, denominator, label })

export const onDate = (value: string, label?: string): DateOperand => ({ kind: 'date', value, label })

export const isTrue = (field: string): Condition => ({ kind: 'is', field })

export const isKnown = (field: string): Condition => ({ kind: 'known', field })

export const compare = (left: NumericOperand, op: Comparator, right: NumericOperand): Condition =>
  ({ kind: 'compare', left, op, right })

export const oneOf = (field: string, values: readonly string[]): Condition => ({ kind: 'oneOf', field, values })

export const compareDates = (left: DateOperand, op: Comparator, right: DateOperand): Condition =>
  ({ kind: 'dateCompare', left, op, right })

export const allOf = (...conditions: Condition[]): Condition => ({ kind: 'all', conditions })

export const anyOf = (...conditions: Condition[]): Condition => ({ kind: 'any', conditions })

export const not = (condition: Condition): Condition => ({ kind: 'not', condition })

export const predicate = (name: string, params?: Readonly<Record<string, FactValue>>): Condition =>
  ({ kind: 'predicate', name, params })

export const delegateTo = (tree: DecisionTree, outcomes: readonly string[]): Condition =>
  ({ kind: 'subtree', tree, outcomes })

// ── Evaluation ───────────────────────────────────────────────────

const SYMBOLS: Record<Comparator, string> = {
  eq: '==',
  ne: '!=',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
}

export function comparatorSymbol(op: Comparator): string {
  return SYMBOLS[op]
}

export function applyComparator(left: number, op: Comparator, right: number): boolean {
  switch (op) {
    case 'eq': return left === right
    case 'ne': return left !== right
    case 'lt': return left < right
    case 'lte': return left <= right
    case 'gt': return left > right
    case 'gte': return left >= right
  }
}

export function evaluateCondition(
  condition: Condition,
  facts: FactSet,
  context: ConditionContext = {},
): ConditionOutcome {
  switch (condition.kind) {
    case 'is': {
      const value = requireBoolean(facts, condition.field)
      return { result: value, rationale: `${condition.field}: ${value}` }
    }

    case 'known': {
      const present = hasFact(facts, condition.field)
      return { result: present, rationale: `${condition.field} present: ${present}` }
    }

    case 'compare': {
      const left = evaluateOperand(condition.left, facts)
      const right = evaluateOperand(condition.right, facts)
      const result = applyComparator(left.value, condition.op, right.value)
      return {
        result,
        rationale: `${left.text} ${SYMBOLS[condition.op]} ${right.text}: ${result}`,
      }
    }

    case 'oneOf': {
      const value = requireCategory(facts, condition.field)
      const result = condition.values.includes(value)
      return {
        result,
        rationale: `${condition.field} ${value} in [${condition.values.join(', ')}]: ${result}`,
      }
    }

    case 'dateCompare': {
      const left = evaluateDateOperand(condition.left, facts)
      const right = evaluateDateOperand(condition.right, facts)
      const result = applyComparator(left.time, condition.op, right.time)
      return {
        result,
        rationale: `${left.text} ${SYMBOLS[condition.op]} ${right.text}: ${result}`,
      }
    }

    case 'all': {
      const parts: string[] = []
      for (const inner of condition.conditions) {
        const evaluated = evaluateCondition(inner, facts, context)
        parts.push(evaluated.rationale)
        if (!evaluated.result) {
          return { result: false, rationale: `all(${parts.join('; ')}): false` }
        }
      }
      return { result: true, rationale: `all(${parts.join('; ')}): true` }
    }

    case 'any': {
      const parts: string[] = []
      for (const inner of condition.conditions) {
        const evaluated = evaluateCondition(inner, facts, context)
        parts.push(evaluated.rationale)
        if (evaluated.result) {
          return { result: true, rationale: `any(${parts.join('; ')}): true` }
        }
      }
      return { result: false, rationale: `any(${parts.join('; ')}): false` }
    }

    case 'not': {
      const inner = evaluateCondition(condition.condition, facts, context)
      return { result: !inner.result, rationale: `not(${inner.rationale}): ${!inner.result}` }
    }

    case 'predicate': {
      const fn = context.predicates?.[condition.name]
      if (!fn) {
        throw new MalformedTreeError(context.treeId ?? '(unknown)', [`unknown predicate "${condition.name}"`])
      }
      const evaluated = fn(facts, condition.params ?? {})
      return { result: evaluated.result, rationale: `${condition.name}: ${evaluated.rationale}` }
    }

    case 'subtree': {
      if (!context.delegate) {
        throw new MalformedTreeError(context.treeId ?? '(unknown)', [
          `sub-tree "${condition.tree.id}" can only be evaluated by the engine`,
        ])
      }
      const outcome = context.delegate(condition.tree)
      const result = condition.outcomes.includes(outcome)
      return { result, rationale: `${condition.tree.id} => ${outcome}: ${result}` }
    }
  }
}

// ── Operands ─────────────────────────────────────────────────────

interface EvaluatedOperand {
  value: number
  text: string
}

/** How an operand is named inside a larger expression. */
export function operandName(operand: NumericOperand): string {
  switch (operand.kind) {
    case 'fact': return operand.field
    case 'const': return operand.label ?? formatNumber(operand.value)
    case 'sum': return operand.label ?? `(${operand.terms.map(operandName).join(' + ')})`
    case 'difference': return operand.label ?? `(${operandName(operand.left)} - ${operandName(operand.right)})`
    case 'scale': return operand.label ?? `${formatNumber(operand.factor)} × ${operandName(operand.operand)}`
    case 'ratio': return operand.label ?? `${operandName(operand.numerator)} / ${operandName(operand.denominator)}`
  }
}

/** Decimal places a computed operand keeps before it is compared. */
export const OPERAND_PRECISION = 9

/**
 * A ratio over a zero denominator is 0: an empty base (no support paid,
 * no days counted) means the share is nil, not undefined.
 *
 * Computed operands are rounded to OPERAND_PRECISION places so binary
 * fractions compare as the decimals they stand for: 100 + 151/3 + 196/6
 * is 183, not 182.99999999999997.
 */
export function evaluateOperand(operand: NumericOperand, facts: FactSet): EvaluatedOperand {
  const raw = operandValue(operand, facts)
  const value = operand.kind === 'fact' || operand.kind === 'const'
    ? raw
    : Number(raw.toFixed(OPERAND_PRECISION))
  if (operand.kind === 'const' && operand.label === undefined) {
    return { value, text: formatNumber(value) }
  }
  return { value, text: `${operandName(operand)} ${formatNumber(value)}` }
}

function operandValue(operand: NumericOperand, facts: FactSet): number {
  switch (operand.kind) {
    case 'fact': return requireNumber(facts, operand.field)
    case 'const': return operand.value
    case 'sum': return operand.terms.reduce((total, term) => total + operandValue(term, facts), 0)
    case 'difference': return operandValue(operand.left, facts) - operandValue(operand.right, facts)
    case 'scale': return operandValue(operand.operand, facts) * operand.factor
    case 'ratio': {
      const denominator = operandValue(operand.denominator, facts)
      if (denominator === 0) return 0
      return operandValue(operand.numerator, facts) / denominator
    }
  }
}

function evaluateDateOperand(operand: DateOperand, facts: FactSet): { time: number; text: string } {
  if (operand.kind === 'fact') {
    const date = requireDate(facts, operand.field)
    return { time: date.getTime(), text: `${operand.field} ${formatDate(date)}` }
  }
  const date = parseIsoDate(operand.value)
  const prefix = operand.label ? `${operand.label} ` : ''
  return { time: date.getTime(), text: `${prefix}${operand.value}` }
}

/** Midnight UTC on the given YYYY-MM-DD. */
export function parseIsoDate(value: string): Date {
  return new Date(`${value}T00:00:00Z`)
}
