/**
 * Resident or Nonresident Alien — IRC §7701(b), Reg. §301.7701(b)-1
 *
 * Green card test: a lawful permanent resident at any time in the year.
 * Substantial presence test: at least 31 days in the US this year, and
 * 183 days over three years counting all days this year, 1/3 of last
 * year's and 1/6 of the year before.
 *
 * Facts:
 *   green_card_date                optional; date permanent residence began
 *   days_present_current_year
 *   days_present_prior_year
 *   days_present_two_years_prior
 *
 * Days that do not count (in transit, crew of a foreign vessel, a medical
 * condition that prevented leaving, regular commuting from Canada or
 * Mexico) are left out by the caller.
 *
 * Source: IRS Publication 519, chapter 1
 */

import {
  allOf,
  compare,
  compareDates,
  constant,
  fact,
  isKnown,
  onDate,
  scaled,
  sumOf,
} from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import type { YearTables } from '../yearTables'

export type ResidencyOutcome = 'resident_alien' | 'nonresident_alien'

export function buildResidentAlienTree(tables: YearTables): DecisionTree<ResidencyOutcome> {
  const weightedDays = sumOf([
    fact('days_present_current_year'),
    scaled(fact('days_present_prior_year'), 1 / 3),
    scaled(fact('days_present_two_years_prior'), 1 / 6),
  ], 'weighted days')

  return new TreeBuilder<ResidencyOutcome>(`resident-alien-${tables.taxYear}`)
    .decision('green-card', 'Was the person a lawful permanent resident at any time during the year?',
      allOf(
        isKnown('green_card_date'),
        compareDates(fact('green_card_date'), 'lte', onDate(`${tables.taxYear}-12-31`, 'year_end')),
      ),
      { yes: 'resident', no: 'current-year-days' })
    .decision('current-year-days', 'Was the person in the US at least 31 days this year?',
      compare(fact('days_present_current_year'), 'gte', constant(31, 'minimum days')),
      { yes: 'weighted-days', no: 'nonresident' })
    .decision('weighted-days', 'Do the weighted days over three years reach 183?',
      compare(weightedDays, 'gte', constant(183, 'required days')),
      { yes: 'resident', no: 'nonresident' })
    .outcome('resident', 'Resident alien', 'resident_alien')
    .outcome('nonresident', 'Nonresident alien', 'nonresident_alien')
    .build()
}
