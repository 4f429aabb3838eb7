/**
 * Qualifying Child for the Earned Income Credit — IRC §32(c)(3)
 *
 * The qualifying child relationship and age tests without the
 * self-support test, and in their place:
 * - younger than the taxpayer, or the spouse on a joint return, unless
 *   permanently disabled
 * - no joint return except one filed only for a refund
 * - a main home in the United States with the taxpayer for over half the year
 * - an SSN
 * - the tie-breaker rules when someone else claims the same child
 *
 * Facts (on top of the age test facts):
 *   taxpayer_age, spouse_age     spouse_age only on a joint return
 *   claimed_by_others            boolean; the tie-breaker facts when true
 *
 * Source: IRS Publication 596, Rule 8 and Rule 9
 */

import { allOf, anyOf, compare, constant, delegateTo, fact, isKnown, isTrue, not, oneOf } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import { QUALIFYING_CHILD_RELATIONSHIPS } from '../../model/types'
import { childAgeTree } from './qualifyingChild'
import { tiebreakerTree } from './tiebreaker'

export type EicQualifyingChildOutcome = 'eic_qualifying_child' | 'not_eic_qualifying_child'

export const eicQualifyingChildTree: DecisionTree<EicQualifyingChildOutcome> = new TreeBuilder<EicQualifyingChildOutcome>('eic-qualifying-child')
  .decision('relationship', 'Is the person a child, sibling, or a descendant of either?',
    oneOf('relationship', QUALIFYING_CHILD_RELATIONSHIPS), { yes: 'age', no: 'not-qualifying' })

  // ── Age test ──
  .decision('age', 'Does the person meet the age test?',
    delegateTo(childAgeTree, ['meets_age_test']), { yes: 'younger', no: 'not-qualifying' })
  .decision('younger', 'Is the person younger than the taxpayer or the spouse?',
    anyOf(
      compare(fact('age'), 'lt', fact('taxpayer_age')),
      allOf(isKnown('spouse_age'), compare(fact('age'), 'lt', fact('spouse_age'))),
    ),
    { yes: 'joint-return', no: 'disabled' })
  .decision('disabled', 'Was the person permanently and totally disabled?',
    isTrue('permanently_disabled'), { yes: 'joint-return', no: 'not-qualifying' })

  // ── Joint return test ──
  .decision('joint-return', 'Does the person file a joint return for anything other than a refund?',
    allOf(isTrue('files_joint_return'), not(isTrue('joint_return_only_for_refund'))),
    { yes: 'not-qualifying', no: 'residence' })

  // ── Residency test ──
  .decision('residence', 'Did the person live with the taxpayer in the United States for more than half the year?',
    compare(fact('months_lived_with_taxpayer'), 'gt', constant(6, 'half year')),
    { yes: 'has-ssn', no: 'not-qualifying' })
  .decision('has-ssn', 'Does the person have an SSN valid for employment?',
    isTrue('has_ssn'), { yes: 'claimed-by-others', no: 'not-qualifying' })

  // ── Tie-breaker ──
  .decision('claimed-by-others', 'Does anyone else claim the person as a qualifying child?',
    isTrue('claimed_by_others'), { yes: 'tiebreaker', no: 'qualifying' })
  .decision('tiebreaker', 'Do the tie-breaker rules give the child to the taxpayer?',
    delegateTo(tiebreakerTree, ['taxpayer_claims']), { yes: 'qualifying', no: 'not-qualifying' })

  .outcome('qualifying', 'Qualifying child for the EIC', 'eic_qualifying_child')
  .outcome('not-qualifying', 'Not a qualifying child for the EIC', 'not_eic_qualifying_child')
  .build()
