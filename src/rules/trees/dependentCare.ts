/**
 * Qualifying Person for the Child and Dependent Care Credit — IRC §21(b)(1)
 *
 * A qualifying child under 13, or a spouse or dependent who cannot care
 * for themselves and lived with the taxpayer for over half the year.
 * The care must let the taxpayer work or look for work.
 *
 * Facts (on top of the dependent facts):
 *   taxpayer_working          working or looking for work
 *   incapable_of_self_care    physically or mentally, asked only from age 13
 *
 * Source: IRS Publication 503, "Qualifying Person Test"
 */

import { compare, constant, delegateTo, fact, isTrue, oneOf } from '../../engine/conditions'
import { TreeBuilder } from '../../engine/builder'
import type { DecisionTree } from '../../engine/node'
import type { YearTables } from '../yearTables'
import { buildDependentTree } from './dependent'

export type DependentCareOutcome = 'qualifying_person' | 'not_qualifying_person'

export function buildDependentCareTree(tables: YearTables): DecisionTree<DependentCareOutcome> {
  const dependentTree = buildDependentTree(tables)

  return new TreeBuilder<DependentCareOutcome>(`dependent-care-${tables.taxYear}`)
    .decision('taxpayer-working', 'Is the care needed so the taxpayer can work or look for work?',
      isTrue('taxpayer_working'), { yes: 'under-13', no: 'not-qualifying' })

    // ── Child under 13 ──
    .decision('under-13', 'Was the person under 13 when the care was provided?',
      compare(fact('age'), 'lt', constant(13)), { yes: 'child-dependent', no: 'self-care' })
    .decision('child-dependent', 'Is the person the taxpayer\'s dependent qualifying child?',
      delegateTo(dependentTree, ['qualifying_child']), { yes: 'qualifying', no: 'self-care' })

    // ── Spouse or dependent incapable of self-care ──
    .decision('self-care', 'Is the person physically or mentally incapable of self-care?',
      isTrue('incapable_of_self_care'), { yes: 'is-spouse', no: 'not-qualifying' })
    .decision('is-spouse', 'Is the person the taxpayer\'s spouse?',
      oneOf('relationship', ['spouse']), { yes: 'lived-with', no: 'is-dependent' })
    .decision('is-dependent', 'Is the person the taxpayer\'s dependent?',
      delegateTo(dependentTree, ['qualifying_child', 'qualifying_relative']),
      { yes: 'lived-with', no: 'not-qualifying' })
    .decision('lived-with', 'Did the person live with the taxpayer for more than half the year?',
      compare(fact('months_lived_with_taxpayer'), 'gt', constant(6, 'half year')),
      { yes: 'qualifying', no: 'not-qualifying' })

    .outcome('qualifying', 'Qualifying person', 'qualifying_person')
    .outcome('not-qualifying', 'Not a qualifying person', 'not_qualifying_person')
    .build()
}
