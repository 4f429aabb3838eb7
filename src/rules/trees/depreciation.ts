/**
 * Depreciation Method — which cost recovery applies to an asset placed
 * in service this year.
 *
 *   section_179  expensed under §179 (amount: computeSection179Deduction)
 *   ads          listed property used 50% or less for business, §280F(b)
 *   bonus        §168(k) special allowance at the year's rate
 *   macrs        regular GDS MACRS
 *
 * Asset facts:
 *   property_type          'tangible_personal' | 'off_the_shelf_software'
 *                          | 'qualified_improvement' | 'building' | 'land' | ...
 *   business_use_share     0–1
 *   acquired_by_purchase   boolean
 *   from_related_party     boolean
 *   elects_section_179     boolean
 *   listed_property        boolean (cars, other transportation, ...)
 *   recovery_period        years
 *   elects_out_of_bonus    boolean
 *
 * Source: IRS Publication 946, chapters 2–4; Form 4562 instructions
 */

import { allOf, compare, constant, delegateTo, fact, isTrue, not, oneOf } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import type { YearTables } from '../yearTables'

export type Section179EligibilityOutcome = 'eligible' | 'not_eligible'

export type DepreciationOutcome = 'section_179' | 'ads' | 'bonus' | 'macrs'

export const SECTION_179_PROPERTY_TYPES: readonly string[] = [
  'tangible_personal',
  'off_the_shelf_software',
  'qualified_improvement',
]

const halfUse = constant(0.5, 'half')

export const section179EligibilityTree: DecisionTree<Section179EligibilityOutcome> =
  new TreeBuilder<Section179EligibilityOutcome>('section-179-eligibility')
    .decision('property-type', 'Is it §179 property (tangible personal, software, qualified improvement)?',
      oneOf('property_type', SECTION_179_PROPERTY_TYPES), { yes: 'business-use', no: 'not-eligible' })
    .decision('business-use', 'Is the property used more than 50% in an active trade or business?',
      compare(fact('business_use_share'), 'gt', halfUse), { yes: 'acquired', no: 'not-eligible' })
    .decision('acquired', 'Was it purchased, and not from a related party?',
      allOf(isTrue('acquired_by_purchase'), not(isTrue('from_related_party'))),
      { yes: 'eligible', no: 'not-eligible' })
    .outcome('eligible', 'Eligible for the §179 deduction', 'eligible')
    .outcome('not-eligible', 'Not eligible for the §179 deduction', 'not_eligible')
    .build()

export function buildDepreciationTree(tables: YearTables): DecisionTree<DepreciationOutcome> {
  return new TreeBuilder<DepreciationOutcome>(`depreciation-method-${tables.taxYear}`)
    .decision('elects-section-179', 'Does the taxpayer elect to expense the asset under §179?',
      isTrue('elects_section_179'), { yes: 'section-179-eligible', no: 'listed-property' })
    .decision('section-179-eligible', 'Is the asset §179 property?',
      delegateTo(section179EligibilityTree, ['eligible']), { yes: 'section-179', no: 'listed-property' })
    .decision('listed-property', 'Is it listed property used 50% or less for business?',
      allOf(isTrue('listed_property'), compare(fact('business_use_share'), 'lte', halfUse)),
      { yes: 'ads', no: 'bonus-eligible' })
    .decision('bonus-eligible', 'Does the special depreciation allowance apply?',
      allOf(
        compare(fact('recovery_period'), 'lte', constant(20, 'twenty years')),
        compare(constant(tables.bonusDepreciationRate, 'bonus rate'), 'gt', constant(0)),
        not(isTrue('elects_out_of_bonus')),
      ),
      { yes: 'bonus', no: 'macrs' })
    .outcome('section-179', 'Section 179 expense', 'section_179')
    .outcome('ads', 'Alternative depreciation system', 'ads')
    .outcome('bonus', 'Special depreciation allowance', 'bonus')
    .outcome('macrs', 'MACRS (general depreciation system)', 'macrs')
    .build()
}
