/**
 * Qualifying Relative — IRC §152(d)
 *
 * Facts (on top of the qualifying child facts):
 *   for_medical_deduction     optional; true when testing a dependent for
 *                             the medical expense deduction only, which
 *                             waives the gross income test (§213(a))
 *   gross_income              cents, see countableGrossIncome()
 *   taxpayer_support_share    0–1, see supportShare()
 *
 * Cousins are not on the relationship list: they qualify only as members
 * of the household.
 */

import {
  allOf,
  anyOf,
  compare,
  constant,
  delegateTo,
  fact,
  isKnown,
  isTrue,
  oneOf,
} from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import { QUALIFYING_RELATIVE_RELATIONSHIPS } from '../../model/types'
import type { YearTables } from '../yearTables'
import { qualifyingChildTree } from './qualifyingChild'

export type QualifyingRelativeOutcome = 'qualifying_relative' | 'not_qualifying_relative'

export function buildQualifyingRelativeTree(tables: YearTables): DecisionTree<QualifyingRelativeOutcome> {
  return new TreeBuilder<QualifyingRelativeOutcome>(`qualifying-relative-${tables.taxYear}`)
    .decision('is-qualifying-child', 'Is the person a qualifying child of the taxpayer?',
      delegateTo(qualifyingChildTree, ['qualifying_child']),
      { yes: 'not-qualifying', no: 'is-spouse' })
    .decision('is-spouse', 'Is the person the taxpayer\'s spouse?',
      oneOf('relationship', ['spouse']), { yes: 'not-qualifying', no: 'relationship-or-household' })

    // ── Member of household or relationship test ──
    .decision('relationship-or-household', 'Is the person a listed relative, or a member of the household all year?',
      anyOf(
        oneOf('relationship', QUALIFYING_RELATIVE_RELATIONSHIPS),
        compare(fact('months_lived_with_taxpayer'), 'gte', constant(12, 'full year')),
      ),
      { yes: 'medical-only', no: 'not-qualifying' })

    // ── Gross income test ──
    .decision('medical-only', 'Is the test for the medical expense deduction only?',
      allOf(isKnown('for_medical_deduction'), isTrue('for_medical_deduction')),
      { yes: 'support', no: 'gross-income' })
    .decision('gross-income', 'Was the person\'s gross income below the exemption amount?',
      compare(fact('gross_income'), 'lt', constant(tables.dependentGrossIncomeLimit, 'exemption amount')),
      { yes: 'support', no: 'not-qualifying' })

    // ── Support test ──
    .decision('support', 'Did the taxpayer provide more than half of the person\'s support?',
      compare(fact('taxpayer_support_share'), 'gt', constant(0.5, 'half')),
      { yes: 'qualifying', no: 'not-qualifying' })

    .outcome('qualifying', 'Qualifying relative', 'qualifying_relative')
    .outcome('not-qualifying', 'Not a qualifying relative', 'not_qualifying_relative')
    .build()
}
