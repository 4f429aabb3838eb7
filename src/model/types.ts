/**
 * Shared domain types for determinations and worksheet procedures.
 *
 * Monetary values are in integer cents unless noted otherwise.
 */

// ── Filing status ──────────────────────────────────────────────

export type FilingStatus = 'single' | 'mfj' | 'mfs' | 'hoh' | 'qw'

export const FILING_STATUSES: readonly FilingStatus[] = ['single', 'mfj', 'mfs', 'hoh', 'qw']

/** A per-filing-status amount table (cents). */
export type ByFilingStatus<T = number> = Record<FilingStatus, T>

// ── Relationships ──────────────────────────────────────────────

/**
 * Relationship of a person to the taxpayer. Step- and adoptive
 * relationships are listed explicitly; in-laws are `in_law`.
 * Relationships survive divorce or the death of a spouse.
 */
export type Relationship =
  | 'child'
  | 'stepchild'
  | 'adopted_child'
  | 'foster_child'
  | 'sibling'
  | 'stepsibling'
  | 'half_sibling'
  | 'grandchild'
  | 'niece_nephew'
  | 'parent'
  | 'stepparent'
  | 'grandparent'
  | 'aunt_uncle'
  | 'in_law'
  | 'cousin'
  | 'spouse'
  | 'unrelated'

/** Child, sibling, or a descendant of either (IRC §152(c)(2)). */
export const QUALIFYING_CHILD_RELATIONSHIPS: readonly Relationship[] = [
  'child', 'stepchild', 'adopted_child', 'foster_child',
  'sibling', 'stepsibling', 'half_sibling',
  'grandchild', 'niece_nephew',
]

/** Relatives who need not live with the taxpayer (IRC §152(d)(2)(A)–(G)). */
export const QUALIFYING_RELATIVE_RELATIONSHIPS: readonly Relationship[] = [
  ...QUALIFYING_CHILD_RELATIONSHIPS,
  'parent', 'stepparent', 'grandparent', 'aunt_uncle', 'in_law',
]
