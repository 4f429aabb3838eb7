/**
 * Child of Divorced or Separated Parents — IRC §152(e)
 *
 * Decides whether the ordinary support test is needed at all. When the
 * parents together provided over half the support, had custody for over
 * half the year and lived apart for the last six months, the child is
 * the custodial parent's unless a written declaration releases the
 * claim to the other parent.
 *
 * Facts:
 *   relationship                         Relationship to the taxpayer
 *   parents_separated                    divorced, legally separated or under a written separation agreement
 *   parents_support_share                0–1, support the two parents provided together
 *   months_in_parents_custody            0–12, custody of one or both parents
 *   parents_lived_apart_last_six_months  boolean
 *   has_written_declaration              Form 8332 or an equivalent decree
 *   declaration_names_taxpayer           asked only when there is a declaration
 *
 * Source: IRS Publication 501, "Children of divorced or separated parents"
 */

import { allOf, compare, constant, fact, isTrue, oneOf } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'

export type DivorcedParentsOutcome =
  | 'support_test_required'
  | 'support_test_waived'
  | 'may_claim'
  | 'may_not_claim'

export const childOfDivorcedParentsTree: DecisionTree<DivorcedParentsOutcome> = new TreeBuilder<DivorcedParentsOutcome>('child-of-divorced-parents')
  .decision('separated-parents', 'Is the person the taxpayer\'s child, with parents divorced or separated?',
    allOf(oneOf('relationship', ['child', 'adopted_child']), isTrue('parents_separated')),
    { yes: 'parents-support', no: 'do-test' })

  // ── Special rule conditions ──
  .decision('parents-support', 'Did the parents together provide over half of the child\'s support?',
    compare(fact('parents_support_share'), 'gt', constant(0.5, 'half')),
    { yes: 'parents-custody', no: 'do-test' })
  .decision('parents-custody', 'Was the child in the custody of one or both parents for more than half the year?',
    compare(fact('months_in_parents_custody'), 'gt', constant(6, 'half year')),
    { yes: 'lived-apart', no: 'do-test' })
  .decision('lived-apart', 'Did the parents live apart at all times during the last 6 months of the year?',
    isTrue('parents_lived_apart_last_six_months'), { yes: 'written-declaration', no: 'do-test' })

  // ── Release of claim ──
  .decision('written-declaration', 'Is there a written declaration releasing the claim to the child?',
    isTrue('has_written_declaration'), { yes: 'declaration-names-taxpayer', no: 'skip-test' })
  .decision('declaration-names-taxpayer', 'Does the declaration let the taxpayer claim the child?',
    isTrue('declaration_names_taxpayer'), { yes: 'may-claim', no: 'may-not-claim' })

  .outcome('do-test', 'Support test required', 'support_test_required')
  .outcome('skip-test', 'Support test does not apply', 'support_test_waived')
  .outcome('may-claim', 'May claim the child', 'may_claim')
  .outcome('may-not-claim', 'May not claim the child', 'may_not_claim')
  .build()
