/**
 * Tie-Breaker Rules — IRC §152(c)(4)
 *
 * When more than one person can claim the same qualifying child, only
 * one of them gets the child for the dependency exemption, head of
 * household, the child tax and dependent care credits, and the EIC.
 * The other claimants are summarised as facts:
 *
 *   taxpayer_is_parent             boolean
 *   other_parents_claiming         other claimants who are the child's parents
 *   months_lived_with_taxpayer     0–12
 *   most_months_with_other_parent  0–12, longest stay with a parent claiming
 *   taxpayer_agi                   cents
 *   highest_other_parent_agi       cents, among the parents claiming
 *   highest_other_agi              cents, among every other claimant
 *   highest_parent_agi             optional, cents; a parent who could claim
 *                                  the child but does not
 *
 * Source: IRS Publication 501, "Special Rule for Qualifying Child of More Than One Person"
 */

import { anyOf, compare, constant, fact, isKnown, isTrue, not } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'

export type TiebreakerOutcome = 'taxpayer_claims' | 'other_claims'

export const tiebreakerTree: DecisionTree<TiebreakerOutcome> = new TreeBuilder<TiebreakerOutcome>('tiebreaker')
  .decision('is-parent', 'Is the taxpayer the child\'s parent?',
    isTrue('taxpayer_is_parent'), { yes: 'only-parent', no: 'parent-claims' })

  // ── Parents ──
  .decision('only-parent', 'Is the taxpayer the only parent claiming the child?',
    compare(fact('other_parents_claiming'), 'eq', constant(0)), { yes: 'taxpayer-claims', no: 'longer-residence' })
  .decision('longer-residence', 'Did the child live longer with the taxpayer than with the other parent?',
    compare(fact('months_lived_with_taxpayer'), 'gt', fact('most_months_with_other_parent')),
    { yes: 'taxpayer-claims', no: 'equal-residence' })
  .decision('equal-residence', 'Did the child live with each parent for the same time?',
    compare(fact('months_lived_with_taxpayer'), 'eq', fact('most_months_with_other_parent')),
    { yes: 'higher-parent-agi', no: 'other-claims' })
  .decision('higher-parent-agi', 'Is the taxpayer\'s AGI higher than the other parent\'s?',
    compare(fact('taxpayer_agi'), 'gt', fact('highest_other_parent_agi')),
    { yes: 'taxpayer-claims', no: 'other-claims' })

  // ── Everyone else ──
  .decision('parent-claims', 'Does a parent claim the child?',
    compare(fact('other_parents_claiming'), 'gt', constant(0)), { yes: 'other-claims', no: 'highest-agi' })
  .decision('highest-agi', 'Is the taxpayer\'s AGI the highest of everyone claiming?',
    compare(fact('taxpayer_agi'), 'gt', fact('highest_other_agi')), { yes: 'above-parents', no: 'other-claims' })
  .decision('above-parents', 'Is the taxpayer\'s AGI higher than that of any parent who could claim?',
    anyOf(not(isKnown('highest_parent_agi')), compare(fact('taxpayer_agi'), 'gt', fact('highest_parent_agi'))),
    { yes: 'taxpayer-claims', no: 'other-claims' })

  .outcome('taxpayer-claims', 'Taxpayer claims the child', 'taxpayer_claims')
  .outcome('other-claims', 'Another person claims the child', 'other_claims')
  .build()
