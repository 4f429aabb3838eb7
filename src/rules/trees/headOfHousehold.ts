/**
 * Head of Household — IRC §2(b), §7703(b)
 *
 * Facts about the taxpayer:
 *   marriage_date, divorce_date   optional dates; married on the last day
 *                                 of the year when married by then and not
 *                                 divorced by then
 *   spouse_nonresident_alien      asked only when married
 *   lived_apart_last_six_months   asked only when married
 *   files_separately              asked only when married
 *   household_cost_share          0–1, see supportShare(..., 'household')
 *
 * Facts about the qualifying person: relationship,
 * months_lived_with_taxpayer, files_joint_return, plus the dependent
 * facts when the person has to be a dependent.
 *
 * Source: IRS Publication 501, "Head of Household" and Table 4
 */

import type { ConditionOutcome, Predicate } from '../../engine/conditions'
import { compare, constant, delegateTo, fact, isTrue, oneOf, parseIsoDate, predicate } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import type { FactSet, FactValue } from '../../model/facts'
import { formatDate, hasFact, requireDate } from '../../model/facts'
import type { YearTables } from '../yearTables'
import { buildDependentTree } from './dependent'

export type HeadOfHouseholdOutcome = 'head_of_household' | 'not_head_of_household'

const CHILD_RELATIONSHIPS: readonly string[] = ['child', 'stepchild', 'adopted_child', 'foster_child']

/** Relatives who can make the taxpayer head of household; cousins are not among them. */
const HOUSEHOLD_RELATIVES: readonly string[] = [
  'sibling', 'stepsibling', 'half_sibling', 'grandchild', 'niece_nephew',
  'stepparent', 'grandparent', 'aunt_uncle', 'in_law',
]

/**
 * Married at the end of the year: married on or before it, and either
 * never divorced or divorced after it.
 */
export const marriedAtYearEnd: Predicate = (
  facts: FactSet,
  params: Readonly<Record<string, FactValue>>,
): ConditionOutcome => {
  const yearEnd = requireDate(params, 'year_end')
  if (!hasFact(facts, 'marriage_date')) {
    return { result: false, rationale: 'no marriage_date' }
  }
  const married = requireDate(facts, 'marriage_date')
  if (married.getTime() > yearEnd.getTime()) {
    return { result: false, rationale: `married ${formatDate(married)} after ${formatDate(yearEnd)}` }
  }
  if (!hasFact(facts, 'divorce_date')) {
    return { result: true, rationale: `married ${formatDate(married)}, not divorced` }
  }
  const divorced = requireDate(facts, 'divorce_date')
  const result = divorced.getTime() > yearEnd.getTime()
  return { result, rationale: `divorced ${formatDate(divorced)} ${result ? 'after' : 'by'} ${formatDate(yearEnd)}` }
}

export function buildHeadOfHouseholdTree(tables: YearTables): DecisionTree<HeadOfHouseholdOutcome> {
  const dependentTree = buildDependentTree(tables)
  const halfYear = constant(6, 'half year')

  return new TreeBuilder<HeadOfHouseholdOutcome>(`head-of-household-${tables.taxYear}`, {
    predicates: { married_at_year_end: marriedAtYearEnd },
  })
    // ── Considered unmarried ──
    .decision('married', 'Was the taxpayer married on the last day of the year?',
      predicate('married_at_year_end', { year_end: parseIsoDate(`${tables.taxYear}-12-31`) }),
      { yes: 'spouse-nonresident-alien', no: 'household-cost' })
    .decision('spouse-nonresident-alien', 'Was the spouse a nonresident alien at any time during the year?',
      isTrue('spouse_nonresident_alien'), { yes: 'household-cost', no: 'lived-apart' })
    .decision('lived-apart', 'Did the spouse live elsewhere during the last 6 months of the year?',
      isTrue('lived_apart_last_six_months'), { yes: 'files-separately', no: 'not-hoh' })
    .decision('files-separately', 'Does the taxpayer file a separate return?',
      isTrue('files_separately'), { yes: 'child-resided', no: 'not-hoh' })
    .decision('child-resided', 'Was the home the main home of the qualifying person for more than half the year?',
      compare(fact('months_lived_with_taxpayer'), 'gt', halfYear), { yes: 'household-cost', no: 'not-hoh' })

    // ── Keeping up a home ──
    .decision('household-cost', 'Did the taxpayer pay more than half the cost of keeping up the home?',
      compare(fact('household_cost_share'), 'gt', constant(0.5, 'half')), { yes: 'is-parent', no: 'not-hoh' })

    // ── Qualifying person ──
    .decision('is-parent', 'Is the qualifying person the taxpayer\'s parent?',
      oneOf('relationship', ['parent']), { yes: 'is-dependent', no: 'is-child' })
    .decision('is-child', 'Is the qualifying person the taxpayer\'s child?',
      oneOf('relationship', CHILD_RELATIONSHIPS), { yes: 'child-married', no: 'lived-with-taxpayer' })
    .decision('child-married', 'Does the child file a joint return?',
      isTrue('files_joint_return'), { yes: 'is-dependent', no: 'child-lived-with-taxpayer' })
    .decision('child-lived-with-taxpayer', 'Did the child live with the taxpayer for more than half the year?',
      compare(fact('months_lived_with_taxpayer'), 'gt', halfYear), { yes: 'hoh', no: 'not-hoh' })
    .decision('lived-with-taxpayer', 'Did the person live with the taxpayer for more than half the year?',
      compare(fact('months_lived_with_taxpayer'), 'gt', halfYear), { yes: 'is-relative', no: 'not-hoh' })
    .decision('is-relative', 'Is the person a relative who can be a qualifying person?',
      oneOf('relationship', HOUSEHOLD_RELATIVES), { yes: 'is-dependent', no: 'not-hoh' })
    .decision('is-dependent', 'Can the taxpayer claim the person as a dependent?',
      delegateTo(dependentTree, ['qualifying_child', 'qualifying_relative']),
      { yes: 'hoh', no: 'not-hoh' })

    .outcome('hoh', 'Head of household', 'head_of_household')
    .outcome('not-hoh', 'Not head of household', 'not_head_of_household')
    .build()
}
