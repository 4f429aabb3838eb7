/**
 * Section 179 Expense Deduction — IRC §179(b) (Form 4562, Part I)
 *
 *   Line 1  dollar limit
 *   Line 2  total cost of §179 property placed in service
 *   Line 3  investment threshold
 *   Line 4  reduction = max(0, Line 2 − Line 3)
 *   Line 5  limit for the year = max(0, Line 1 − Line 4)
 *   Line 9  tentative deduction = min(elected cost, Line 5)
 *   Line 10 carryover of disallowed deduction from the prior year
 *   Line 11 business income limitation = min(max(0, business income), Line 5)
 *   Line 12 deduction = min(Line 9 + Line 10, Line 11)
 *   Line 13 carryover to next year = Line 9 + Line 10 − Line 12
 *
 * All amounts in integer cents.
 */

import { requireNonNegative } from '../model/errors'
import type { TracedValue } from '../model/traced'
import { tracedFromComputation } from '../model/traced'
import type { Section179Table } from './yearTables'

export interface Section179Input {
  /** Cost of the property the taxpayer elects to expense */
  electedCost: number
  /** Cost of all §179 property placed in service this year */
  totalPropertyCost: number
  /** Taxable income from the active conduct of any trade or business (may be negative) */
  businessIncome: number
  priorCarryover?: number
}

export interface Section179Result {
  dollarLimit: number             // Line 5
  tentativeDeduction: number      // Line 9
  businessIncomeLimit: number     // Line 11
  deduction: number               // Line 12
  carryover: number               // Line 13
  breakdown: TracedValue[]
}

export function computeSection179Deduction(input: Section179Input, table: Section179Table): Section179Result {
  const electedCost = requireNonNegative('electedCost', input.electedCost)
  const totalPropertyCost = requireNonNegative('totalPropertyCost', input.totalPropertyCost)
  const priorCarryover = requireNonNegative('priorCarryover', input.priorCarryover ?? 0)

  const reduction = Math.max(0, totalPropertyCost - table.investmentThreshold)
  const dollarLimit = Math.max(0, table.dollarLimit - reduction)
  const tentativeDeduction = Math.min(electedCost, dollarLimit)
  const businessIncomeLimit = Math.min(Math.max(0, input.businessIncome), dollarLimit)
  const deduction = Math.min(tentativeDeduction + priorCarryover, businessIncomeLimit)
  const carryover = tentativeDeduction + priorCarryover - deduction

  return {
    dollarLimit,
    tentativeDeduction,
    businessIncomeLimit,
    deduction,
    carryover,
    breakdown: [
      tracedFromComputation(dollarLimit, 'section179.dollarLimit',
        ['totalPropertyCost'], 'Form 4562, Line 5'),
      tracedFromComputation(tentativeDeduction, 'section179.tentativeDeduction',
        ['electedCost', 'section179.dollarLimit'], 'Form 4562, Line 9'),
      tracedFromComputation(businessIncomeLimit, 'section179.businessIncomeLimit',
        ['businessIncome', 'section179.dollarLimit'], 'Form 4562, Line 11'),
      tracedFromComputation(deduction, 'section179.deduction',
        ['section179.tentativeDeduction', 'priorCarryover', 'section179.businessIncomeLimit'], 'Form 4562, Line 12'),
      tracedFromComputation(carryover, 'section179.carryover',
        ['section179.tentativeDeduction', 'priorCarryover', 'section179.deduction'], 'Form 4562, Line 13'),
    ],
  }
}
