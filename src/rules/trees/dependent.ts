/**
 * Dependent — IRC §152
 *
 * Tests that apply to every dependent come first; the person is then a
 * qualifying child or, failing that, a qualifying relative.
 *
 * Facts:
 *   has_tin                       SSN, ITIN or ATIN
 *   citizen_or_resident_of        'us' | 'canada' | 'mexico' | other country code
 *   files_joint_return            boolean
 *   joint_return_only_for_refund  boolean, asked only when filing jointly
 *   for_medical_deduction         optional; waives the joint return test
 *                                 (§213(a)) as well as the gross income test
 *   ...plus the qualifying child and qualifying relative facts
 *
 * Source: IRS Publication 501, Table 2 "Tests To Claim a Dependent"
 */

import { allOf, delegateTo, isKnown, isTrue, not, oneOf } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import type { YearTables } from '../yearTables'
import { qualifyingChildTree } from './qualifyingChild'
import { buildQualifyingRelativeTree } from './qualifyingRelative'

export type DependentOutcome = 'qualifying_child' | 'qualifying_relative' | 'not_dependent'

export function buildDependentTree(tables: YearTables): DecisionTree<DependentOutcome> {
  const qualifyingRelativeTree = buildQualifyingRelativeTree(tables)

  return new TreeBuilder<DependentOutcome>(`dependent-${tables.taxYear}`)
    .decision('has-tin', 'Does the person have an SSN, ITIN or ATIN?',
      isTrue('has_tin'), { yes: 'citizenship', no: 'not-dependent' })
    .decision('citizenship', 'Is the person a citizen, national or resident of the US, Canada or Mexico?',
      oneOf('citizen_or_resident_of', ['us', 'canada', 'mexico']),
      { yes: 'joint-return', no: 'not-dependent' })
    // A joint return filed only to claim a refund does not disqualify
    .decision('joint-return', 'Does the person file a joint return for anything other than a refund?',
      allOf(isTrue('files_joint_return'), not(isTrue('joint_return_only_for_refund'))),
      { yes: 'medical-only', no: 'qualifying-child' })
    .decision('medical-only', 'Is the test for the medical expense deduction only?',
      allOf(isKnown('for_medical_deduction'), isTrue('for_medical_deduction')),
      { yes: 'qualifying-child', no: 'not-dependent' })
    .decision('qualifying-child', 'Is the person a qualifying child?',
      delegateTo(qualifyingChildTree, ['qualifying_child']),
      { yes: 'dependent-child', no: 'qualifying-relative' })
    .decision('qualifying-relative', 'Is the person a qualifying relative?',
      delegateTo(qualifyingRelativeTree, ['qualifying_relative']),
      { yes: 'dependent-relative', no: 'not-dependent' })
    .outcome('dependent-child', 'Dependent (qualifying child)', 'qualifying_child')
    .outcome('dependent-relative', 'Dependent (qualifying relative)', 'qualifying_relative')
    .outcome('not-dependent', 'Not a dependent', 'not_dependent')
    .build()
}
