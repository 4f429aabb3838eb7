/**
 * EIC Qualifying Child Tests — IRC §32(c)(3)
 *
 * Tests:
 * - The shared age test, and no self-support test
 * - Younger than the taxpayer or the spouse, unless disabled
 * - Joint return, residency and SSN tests
 * - Delegation to the tie-breaker rules
 */

import { describe, it, expect } from 'vitest'
import { evaluateTree } from '../../../src/engine/evaluate'
import { createFactSet } from '../../../src/model/facts'
import type { FactValue } from '../../../src/model/facts'
import { eicQualifyingChildTree } from '../../../src/rules/trees/eicQualifyingChild'
import { qualifyingChildTree } from '../../../src/rules/trees/qualifyingChild'
import { tracePath } from '../../fixtures/trees'

function childFacts(overrides: Record<string, FactValue | undefined> = {}) {
  return createFactSet({
    relationship: 'child',
    age: 10,
    taxpayer_age: 35,
    files_joint_return: false,
    months_lived_with_taxpayer: 12,
    has_ssn: true,
    claimed_by_others: false,
    ...overrides,
  })
}

describe('eicQualifyingChildTree', () => {
  it('qualifies a young child living at home', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts())
    expect(result.outcome).toBe('eic_qualifying_child')
    expect(tracePath(result.trace)).toEqual([
      '0:relationship',
      '1:age-under-19',
      '1:meets',
      '0:age',
      '0:younger',
      '0:joint-return',
      '0:residence',
      '0:has-ssn',
      '0:claimed-by-others',
      '0:qualifying',
    ])
    expect(result.trace[4].rationale).toBe('any(age 10 < taxpayer_age 35: true): true')
  })

  it('has no self-support test', () => {
    const facts = childFacts({ own_support_share: 0.9 })
    expect(evaluateTree(eicQualifyingChildTree, facts).outcome).toBe('eic_qualifying_child')
    expect(evaluateTree(qualifyingChildTree, facts).outcome).toBe('not_qualifying_child')
  })

  it('accepts a child younger than the spouse on a joint return', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts({
      age: 22,
      permanently_disabled: false,
      student_months: 6,
      taxpayer_age: 21,
      spouse_age: 25,
    }))
    expect(result.outcome).toBe('eic_qualifying_child')
    expect(result.trace[7].rationale).toBe(
      'any(age 22 < taxpayer_age 21: false; all(spouse_age present: true; age 22 < spouse_age 25: true): true): true',
    )
  })

  it('rejects a child who is not younger than the taxpayer', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts({
      age: 20,
      permanently_disabled: false,
      student_months: 8,
      taxpayer_age: 19,
    }))
    expect(result.outcome).toBe('not_eic_qualifying_child')
    expect(tracePath(result.trace).slice(-3)).toEqual(['0:younger', '0:disabled', '0:not-qualifying'])
    expect(result.trace.at(-3)?.rationale).toBe(
      'any(age 20 < taxpayer_age 19: false; all(spouse_age present: false): false): false',
    )
  })

  it('accepts a permanently disabled person of any age', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts({
      relationship: 'sibling',
      age: 40,
      permanently_disabled: true,
    }))
    expect(result.outcome).toBe('eic_qualifying_child')
  })

  it('rejects a joint return filed for more than a refund', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts({
      files_joint_return: true,
      joint_return_only_for_refund: false,
    }))
    expect(result.outcome).toBe('not_eic_qualifying_child')
    expect(tracePath(result.trace).slice(-2)).toEqual(['0:joint-return', '0:not-qualifying'])
  })

  it('requires more than half a year in the taxpayer\'s home', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts({ months_lived_with_taxpayer: 6 }))
    expect(result.outcome).toBe('not_eic_qualifying_child')
    expect(result.trace.at(-2)?.rationale).toBe('months_lived_with_taxpayer 6 > half year 6: false')
  })

  it('requires an SSN', () => {
    expect(evaluateTree(eicQualifyingChildTree, childFacts({ has_ssn: false })).outcome)
      .toBe('not_eic_qualifying_child')
  })

  it('keeps the child when the tie-breaker favours the taxpayer', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts({
      claimed_by_others: true,
      taxpayer_is_parent: true,
      other_parents_claiming: 1,
      most_months_with_other_parent: 4,
    }))
    expect(result.outcome).toBe('eic_qualifying_child')
    expect(tracePath(result.trace).slice(-7)).toEqual([
      '0:claimed-by-others',
      '1:is-parent',
      '1:only-parent',
      '1:longer-residence',
      '1:taxpayer-claims',
      '0:tiebreaker',
      '0:qualifying',
    ])
    expect(result.trace.at(-2)?.rationale).toBe('tiebreaker => taxpayer_claims: true')
  })

  it('loses the child to a parent when the taxpayer is not one', () => {
    const result = evaluateTree(eicQualifyingChildTree, childFacts({
      relationship: 'grandchild',
      claimed_by_others: true,
      taxpayer_is_parent: false,
      other_parents_claiming: 1,
    }))
    expect(result.outcome).toBe('not_eic_qualifying_child')
    expect(result.trace.at(-2)?.rationale).toBe('tiebreaker => other_claims: false')
  })
})
