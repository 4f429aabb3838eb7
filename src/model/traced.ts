/**
 * TracedValue and ValueSource — how worksheet figures show their work.
 *
 * Every intermediate amount a procedure produces carries the node it
 * was computed at and the nodes it was computed from, so a breakdown
 * can be rendered as a derivation rather than a bare number.
 */

// ── Value sources ──────────────────────────────────────────────

/** A figure supplied by the caller. */
export interface InputSource {
  kind: 'input'
  field: string          // e.g., "grossBenefits"
}

/** A figure produced by a computation step */
export interface ComputedSource {
  kind: 'computed'
  nodeId: string         // e.g., "socialSecurity.combinedIncome"
  inputs: string[]       // node IDs / input fields this was derived from
}

export type ValueSource = InputSource | ComputedSource

// ── TracedValue ────────────────────────────────────────────────

/**
 * An amount with provenance.
 * `amount` is always in integer cents to avoid floating-point errors.
 */
export interface TracedValue {
  amount: number
  source: ValueSource
  citation?: string      // e.g., "IRC §86(a)(1)"
}

// ── Helpers ────────────────────────────────────────────────────

/**
 * Convert a dollar amount to integer cents.
 * Rounds to nearest cent to handle floating-point imprecision.
 *
 *   cents(100.10) → 10010
 *   cents(-50.5)  → -5050
 */
export function cents(dollars: number): number {
  return Math.round(dollars * 100)
}

/** Convert integer cents back to dollars. */
export function dollars(amountInCents: number): number {
  return amountInCents / 100
}

/**
 * Format cents for display.
 *
 *   formatDollars(123456)  → "$1,234.56"
 *   formatDollars(-5050)   → "-$50.50"
 */
export function formatDollars(amountInCents: number): string {
  const d = amountInCents / 100
  const abs = Math.abs(d)
  const formatted = abs.toFixed(2).replace(/\B(?=(\d{3})+(?!\d))/g, ',')
  return d < 0 ? `-$${formatted}` : `$${formatted}`
}

export function tracedFromInput(amount: number, field: string, citation?: string): TracedValue {
  return { amount, source: { kind: 'input', field }, citation }
}

export function tracedFromComputation(
  amount: number,
  nodeId: string,
  inputs: string[],
  citation?: string,
): TracedValue {
  return {
    amount,
    source: { kind: 'computed', nodeId, inputs },
    citation,
  }
}

/** The id a breakdown line is known by: its node id, or the input field. */
export function tracedId(value: TracedValue): string {
  return value.source.kind === 'computed' ? value.source.nodeId : value.source.field
}

/** Look a line up in a breakdown by id. */
export function findTraced(breakdown: readonly TracedValue[], id: string): TracedValue | undefined {
  return breakdown.find(v => tracedId(v) === id)
}

/**
 * Render a breakdown one line per figure:
 *
 *   socialSecurity.combinedIncome = $30,000.00 ← otherIncome, halfBenefits [IRC §86(b)(1)]
 */
export function formatBreakdown(breakdown: readonly TracedValue[]): string {
  return breakdown.map(v => {
    const inputs = v.source.kind === 'computed' && v.source.inputs.length > 0
      ? ` ← ${v.source.inputs.join(', ')}`
      : ''
    const citation = v.citation ? ` [${v.citation}]` : ''
    return `${tracedId(v)} = ${formatDollars(v.amount)}${inputs}${citation}`
  }).join('\n')
}
