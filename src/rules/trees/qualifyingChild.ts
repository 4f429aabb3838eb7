/**
 * Qualifying Child — IRC §152(c)
 *
 * Facts:
 *   relationship                 Relationship to the taxpayer
 *   age                          at the end of the tax year
 *   permanently_disabled         boolean
 *   student_months               months enrolled full time (asked only at 19–23)
 *   months_lived_with_taxpayer   0–12, temporary absences count as lived with
 *   own_support_share            0–1, share of support the person provided
 *
 * Source: IRS Publication 501, Table 2 "Tests To Claim a Dependent"
 */

import { compare, constant, delegateTo, fact, isTrue, oneOf } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import { QUALIFYING_CHILD_RELATIONSHIPS } from '../../model/types'

export type ChildAgeOutcome = 'meets_age_test' | 'fails_age_test'

export type QualifyingChildOutcome = 'qualifying_child' | 'not_qualifying_child'

// ── Age test ──

/** Under 19, under 24 and a student, or permanently disabled at any age. Shared with the EIC. */
export const childAgeTree: DecisionTree<ChildAgeOutcome> = new TreeBuilder<ChildAgeOutcome>('child-age')
  .decision('age-under-19', 'Was the person under 19 at the end of the year?',
    compare(fact('age'), 'lt', constant(19)), { yes: 'meets', no: 'permanently-disabled' })
  .decision('permanently-disabled', 'Was the person permanently and totally disabled?',
    isTrue('permanently_disabled'), { yes: 'meets', no: 'age-under-24' })
  .decision('age-under-24', 'Was the person under 24 at the end of the year?',
    compare(fact('age'), 'lt', constant(24)), { yes: 'full-time-student', no: 'fails' })
  .decision('full-time-student', 'Was the person a full-time student for some part of 5 months?',
    compare(fact('student_months'), 'gte', constant(5, 'five months')),
    { yes: 'meets', no: 'fails' })
  .outcome('meets', 'Meets the age test', 'meets_age_test')
  .outcome('fails', 'Fails the age test', 'fails_age_test')
  .build()

export const qualifyingChildTree: DecisionTree<QualifyingChildOutcome> = new TreeBuilder<QualifyingChildOutcome>('qualifying-child')
  // ── Relationship test ──
  .decision('relationship', 'Is the person a child, sibling, or a descendant of either?',
    oneOf('relationship', QUALIFYING_CHILD_RELATIONSHIPS), { yes: 'age', no: 'not-qualifying' })

  .decision('age', 'Does the person meet the age test?',
    delegateTo(childAgeTree, ['meets_age_test']), { yes: 'residence', no: 'not-qualifying' })

  // ── Residency test ──
  .decision('residence', 'Did the person live with the taxpayer for more than half the year?',
    compare(fact('months_lived_with_taxpayer'), 'gt', constant(6, 'half year')),
    { yes: 'self-support', no: 'not-qualifying' })

  // ── Support test ──
  .decision('self-support', 'Did the person provide over half of their own support?',
    compare(fact('own_support_share'), 'gt', constant(0.5, 'half')),
    { yes: 'not-qualifying', no: 'qualifying' })

  .outcome('qualifying', 'Qualifying child', 'qualifying_child')
  .outcome('not-qualifying', 'Not a qualifying child', 'not_qualifying_child')
  .build()
