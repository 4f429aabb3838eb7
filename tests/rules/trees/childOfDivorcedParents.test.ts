/**
 * Child of Divorced or Separated Parents Tests — IRC §152(e)
 *
 * Tests when the special rule replaces the support test, and the
 * written declaration that releases the claim.
 */

import { describe, it, expect } from 'vitest'
import { evaluateTree } from '../../../src/engine/evaluate'
import { createFactSet } from '../../../src/model/facts'
import type { FactValue } from '../../../src/model/facts'
import { childOfDivorcedParentsTree } from '../../../src/rules/trees/childOfDivorcedParents'
import { tracePath } from '../../fixtures/trees'

function parentsFacts(overrides: Record<string, FactValue | undefined> = {}) {
  return createFactSet({
    relationship: 'child',
    parents_separated: true,
    parents_support_share: 0.9,
    months_in_parents_custody: 12,
    parents_lived_apart_last_six_months: true,
    has_written_declaration: false,
    ...overrides,
  })
}

describe('childOfDivorcedParentsTree', () => {
  it('skips the support test when the special rule applies', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, parentsFacts())
    expect(result.outcome).toBe('support_test_waived')
    expect(tracePath(result.trace)).toEqual([
      '0:separated-parents',
      '0:parents-support',
      '0:parents-custody',
      '0:lived-apart',
      '0:written-declaration',
      '0:skip-test',
    ])
    expect(result.trace[0].rationale).toBe(
      'all(relationship child in [child, adopted_child]: true; parents_separated: true): true',
    )
  })

  it('follows a written declaration naming the taxpayer', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, parentsFacts({
      has_written_declaration: true,
      declaration_names_taxpayer: true,
    }))
    expect(result.outcome).toBe('may_claim')
  })

  it('follows a written declaration naming the other parent', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, parentsFacts({
      has_written_declaration: true,
      declaration_names_taxpayer: false,
    }))
    expect(result.outcome).toBe('may_not_claim')
    expect(tracePath(result.trace).slice(-2)).toEqual(['0:declaration-names-taxpayer', '0:may-not-claim'])
  })

  it('needs the support test when the parents are together', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, parentsFacts({ parents_separated: false }))
    expect(result.outcome).toBe('support_test_required')
    expect(tracePath(result.trace)).toEqual(['0:separated-parents', '0:do-test'])
  })

  it('needs the support test for anyone but the taxpayer\'s child', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, createFactSet({ relationship: 'parent' }))
    expect(result.outcome).toBe('support_test_required')
    expect(result.trace[0].rationale).toBe('all(relationship parent in [child, adopted_child]: false): false')
  })

  it('requires the parents to provide over half the support', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, parentsFacts({ parents_support_share: 0.5 }))
    expect(result.outcome).toBe('support_test_required')
    expect(result.trace[1].rationale).toBe('parents_support_share 0.5 > half 0.5: false')
  })

  it('requires custody for more than half the year', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, parentsFacts({ months_in_parents_custody: 6 }))
    expect(result.outcome).toBe('support_test_required')
    expect(result.trace[2].rationale).toBe('months_in_parents_custody 6 > half year 6: false')
  })

  it('requires the parents to have lived apart', () => {
    const result = evaluateTree(childOfDivorcedParentsTree, parentsFacts({ parents_lived_apart_last_six_months: false }))
    expect(result.outcome).toBe('support_test_required')
    expect(tracePath(result.trace).slice(-2)).toEqual(['0:lived-apart', '0:do-test'])
  })
})
