/**
 * Dependent Tests — IRC §152
 *
 * Tests the tests for all dependents (TIN, citizenship, joint return)
 * and the two levels of delegation to the qualifying child and
 * qualifying relative trees.
 */

import { describe, it, expect } from 'vitest'
import { evaluateTree } from '../../../src/engine/evaluate'
import { renderTrace } from '../../../src/engine/render'
import { MissingFactError } from '../../../src/model/errors'
import { createFactSet } from '../../../src/model/facts'
import type { FactValue } from '../../../src/model/facts'
import { cents } from '../../../src/model/traced'
import { tables2025 } from '../../../src/rules/2025/tables'
import { buildDependentTree } from '../../../src/rules/trees/dependent'
import { tracePath } from '../../fixtures/trees'

const tree = buildDependentTree(tables2025)

function personFacts(overrides: Record<string, FactValue | undefined> = {}) {
  return createFactSet({
    has_tin: true,
    citizen_or_resident_of: 'us',
    files_joint_return: false,
    relationship: 'child',
    age: 8,
    months_lived_with_taxpayer: 12,
    own_support_share: 0,
    ...overrides,
  })
}

const parentFacts = {
  relationship: 'parent',
  age: 70,
  months_lived_with_taxpayer: 0,
  gross_income: cents(2000),
  taxpayer_support_share: 0.75,
}

describe('buildDependentTree', () => {
  it('finds a qualifying child', () => {
    const result = evaluateTree(tree, personFacts())
    expect(result.treeId).toBe('dependent-2025')
    expect(result.outcome).toBe('qualifying_child')
    expect(result.trace.at(-1)?.nodeId).toBe('dependent-child')
  })

  it('requires a taxpayer identification number', () => {
    const result = evaluateTree(tree, personFacts({ has_tin: false }))
    expect(result.outcome).toBe('not_dependent')
    expect(tracePath(result.trace)).toEqual(['0:has-tin', '0:not-dependent'])
  })

  it('requires North American citizenship or residence', () => {
    expect(evaluateTree(tree, personFacts({ citizen_or_resident_of: 'canada' })).outcome).toBe('qualifying_child')
    expect(evaluateTree(tree, personFacts({ citizen_or_resident_of: 'france' })).outcome).toBe('not_dependent')
  })

  it('rejects a person filing a joint return', () => {
    const result = evaluateTree(tree, personFacts({ files_joint_return: true, joint_return_only_for_refund: false }))
    expect(result.outcome).toBe('not_dependent')
    expect(tracePath(result.trace)).toEqual(['0:has-tin', '0:citizenship', '0:joint-return', '0:medical-only', '0:not-dependent'])
  })

  it('waives the joint return test for the medical expense deduction', () => {
    const result = evaluateTree(tree, personFacts({
      files_joint_return: true,
      joint_return_only_for_refund: false,
      for_medical_deduction: true,
    }))
    expect(result.outcome).toBe('qualifying_child')
    expect(tracePath(result.trace).slice(2, 4)).toEqual(['0:joint-return', '0:medical-only'])
    expect(result.trace[3].rationale).toBe(
      'all(for_medical_deduction present: true; for_medical_deduction: true): true',
    )
  })

  it('ignores a joint return filed only for a refund', () => {
    const result = evaluateTree(tree, personFacts({ files_joint_return: true, joint_return_only_for_refund: true }))
    expect(result.outcome).toBe('qualifying_child')
  })

  it('falls through to a qualifying relative two levels deep', () => {
    const result = evaluateTree(tree, personFacts(parentFacts))
    expect(result.outcome).toBe('qualifying_relative')
    expect(tracePath(result.trace)).toEqual([
      '0:has-tin',
      '0:citizenship',
      '0:joint-return',
      '1:relationship',
      '1:not-qualifying',
      '0:qualifying-child',
      '2:relationship',
      '2:not-qualifying',
      '1:is-qualifying-child',
      '1:is-spouse',
      '1:relationship-or-household',
      '1:medical-only',
      '1:gross-income',
      '1:support',
      '1:qualifying',
      '0:qualifying-relative',
      '0:dependent-relative',
    ])
    expect(result.trace.map(e => e.step)).toEqual([...Array(17).keys()])
  })

  it('renders the nested trace indented', () => {
    const result = evaluateTree(tree, personFacts(parentFacts))
    const lines = renderTrace(result.trace).split('\n')
    expect(lines[3]).toBe(
      '  |- [3] Is the person a child, sibling, or a descendant of either? -> no '
      + '(relationship parent in [child, stepchild, adopted_child, foster_child, sibling, stepsibling, '
      + 'half_sibling, grandchild, niece_nephew]: false)',
    )
    expect(lines[6]).toBe(
      '    |- [6] Is the person a child, sibling, or a descendant of either? -> no '
      + '(relationship parent in [child, stepchild, adopted_child, foster_child, sibling, stepsibling, '
      + 'half_sibling, grandchild, niece_nephew]: false)',
    )
    expect(lines[16]).toBe('[16] Dependent (qualifying relative) => qualifying_relative')
  })

  it('locates a missing fact inside the delegated tree', () => {
    try {
      evaluateTree(tree, personFacts({ age: undefined }))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(MissingFactError)
      expect(err).toMatchObject({ field: 'age', treeId: 'child-age', nodeId: 'age-under-19', step: 4 })
    }
  })
})
