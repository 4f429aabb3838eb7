/**
 * Error kinds raised by the decision engine and the worksheet procedures.
 *
 * All of them are deterministic: the same input fails the same way, so
 * nothing here is retried. Decision errors carry where they happened
 * (tree, node, step) once the engine has seen them.
 */

// ── Decision errors ──────────────────────────────────────────────

export interface DecisionErrorLocation {
  treeId: string
  nodeId: string
  step: number
}

export class DecisionError extends Error {
  treeId?: string
  nodeId?: string
  step?: number

  constructor(message: string) {
    super(message)
    this.name = 'DecisionError'
  }

  /**
   * Attach the innermost location only: an error raised inside a
   * delegated sub-tree keeps the sub-tree's node, not the delegating one.
   */
  locate(location: DecisionErrorLocation): this {
    if (this.nodeId === undefined) {
      this.treeId = location.treeId
      this.nodeId = location.nodeId
      this.step = location.step
    }
    return this
  }
}

/** A condition needs a fact the fact set does not have. */
export class MissingFactError extends DecisionError {
  readonly field: string

  constructor(field: string) {
    super(`Missing fact "${field}"`)
    this.name = 'MissingFactError'
    this.field = field
  }
}

/** A fact has a type the condition cannot use. */
export class TypeMismatchError extends DecisionError {
  readonly field: string
  readonly expected: string
  readonly actual: string

  constructor(field: string, expected: string, actual: string) {
    super(`Fact "${field}" must be ${expected}, got ${actual}`)
    this.name = 'TypeMismatchError'
    this.field = field
    this.expected = expected
    this.actual = actual
  }
}

/** Tree construction found one or more structural defects. */
export class MalformedTreeError extends DecisionError {
  readonly issues: string[]

  constructor(treeId: string, issues: string[]) {
    super(`Malformed tree "${treeId}": ${issues.join('; ')}`)
    this.name = 'MalformedTreeError'
    this.treeId = treeId
    this.issues = issues
  }
}

/** Traversal went deeper than the tree (or delegation chain) allows. */
export class DepthExceededError extends DecisionError {
  readonly limit: number

  constructor(treeId: string, limit: number, what = 'decision nodes') {
    super(`Evaluation of "${treeId}" exceeded ${limit} ${what}`)
    this.name = 'DepthExceededError'
    this.treeId = treeId
    this.limit = limit
  }
}

// ── Procedure errors ─────────────────────────────────────────────

/** A worksheet figure that must be non-negative was negative. */
export class NegativeInputError extends Error {
  readonly field: string
  readonly value: number

  constructor(field: string, value: number) {
    super(`${field} must be non-negative, got ${value}`)
    this.name = 'NegativeInputError'
    this.field = field
    this.value = value
  }
}

/** Throws NegativeInputError when `value` is below zero. */
export function requireNonNegative(field: string, value: number): number {
  if (value < 0) throw new NegativeInputError(field, value)
  return value
}
