import { describe, it, expect } from 'vitest'
import {
  cents,
  dollars,
  findTraced,
  formatBreakdown,
  formatDollars,
  tracedFromComputation,
  tracedFromInput,
  tracedId,
} from '../../src/model/traced'

describe('cents / dollars', () => {
  it('rounds dollars to whole cents', () => {
    expect(cents(100.1)).toBe(10010)
    expect(cents(-50.5)).toBe(-5050)
    expect(dollars(10010)).toBe(100.1)
  })

  it('formats with separators and sign', () => {
    expect(formatDollars(123456)).toBe('$1,234.56')
    expect(formatDollars(-5050)).toBe('-$50.50')
    expect(formatDollars(0)).toBe('$0.00')
  })
})

describe('breakdowns', () => {
  const breakdown = [
    tracedFromInput(cents(20000), 'grossBenefits', 'SSA-1099, Box 5'),
    tracedFromComputation(cents(10000), 'socialSecurity.halfBenefits', ['grossBenefits'], 'Pub 915, Worksheet 1, Line 2'),
  ]

  it('identifies lines by node id or input field', () => {
    expect(breakdown.map(tracedId)).toEqual(['grossBenefits', 'socialSecurity.halfBenefits'])
  })

  it('finds a line by id', () => {
    expect(findTraced(breakdown, 'socialSecurity.halfBenefits')?.amount).toBe(1000000)
    expect(findTraced(breakdown, 'missing')).toBeUndefined()
  })

  it('renders one line per figure', () => {
    expect(formatBreakdown(breakdown)).toBe([
      'grossBenefits = $20,000.00 [SSA-1099, Box 5]',
      'socialSecurity.halfBenefits = $10,000.00 ← grossBenefits [Pub 915, Worksheet 1, Line 2]',
    ].join('\n'))
  })
})
