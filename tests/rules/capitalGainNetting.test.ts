/**
 * Capital Gain Netting Tests — Schedule D, IRC §1(h), §1211(b), §1212(b)
 *
 * Tests:
 * - Netting within holding periods and the combined net
 * - Capital loss limit by filing status
 * - Carryforward character (short-term loss used first)
 * - Cross-netting of the 28% / 25% / long-term / short-term buckets
 * - Input validation
 */

import { describe, it, expect } from 'vitest'
import { NegativeInputError } from '../../src/model/errors'
import { cents, findTraced } from '../../src/model/traced'
import { tables2025 } from '../../src/rules/2025/tables'
import { crossNet, netCapitalGains } from '../../src/rules/capitalGainNetting'
import type { CapitalGainNettingInput } from '../../src/rules/capitalGainNetting'

const table = tables2025.capitalGains

function makeInput(overrides: Partial<CapitalGainNettingInput>): CapitalGainNettingInput {
  return {
    filingStatus: 'single',
    shortTermGain: 0,
    shortTermLoss: 0,
    longTermGain: 0,
    longTermLoss: 0,
    ...overrides,
  }
}

// ── Holding periods ─────────────────────────────────────────────

describe('netCapitalGains — holding periods', () => {
  it('offsets a short-term gain with a long-term loss', () => {
    const result = netCapitalGains(makeInput({
      shortTermGain: cents(5000),
      shortTermLoss: cents(2000),
      longTermLoss: cents(3000),
    }), table)

    expect(result.netShortTerm).toBe(cents(3000))
    expect(result.netLongTerm).toBe(cents(-3000))
    expect(result.combinedNet).toBe(0)
    expect(result.allowedNet).toBe(0)
    expect(result.deductibleLoss).toBe(0)
    expect(result.carryforward).toEqual({ shortTerm: 0, longTerm: 0 })
  })

  it('subtracts prior-year carryovers in their own period', () => {
    const result = netCapitalGains(makeInput({
      shortTermGain: cents(4000),
      shortTermCarryover: cents(1000),
      longTermGain: cents(2000),
      longTermCarryover: cents(500),
    }), table)

    expect(result.netShortTerm).toBe(cents(3000))
    expect(result.netLongTerm).toBe(cents(1500))
    expect(result.combinedNet).toBe(cents(4500))
    expect(result.allowedNet).toBe(cents(4500))
  })

  it('passes ordinary income through untouched', () => {
    const result = netCapitalGains(makeInput({ ordinaryIncome: cents(-50) }), table)
    expect(result.ordinaryIncome).toBe(cents(-50))
  })
})

// ── Loss limit and carryforward ─────────────────────────────────

describe('netCapitalGains — loss limit', () => {
  it('allows $3,000 and carries the short-term rest forward', () => {
    const result = netCapitalGains(makeInput({
      shortTermLoss: cents(10000),
      longTermGain: cents(2000),
    }), table)

    expect(result.combinedNet).toBe(cents(-8000))
    expect(result.deductibleLoss).toBe(cents(3000))
    expect(result.allowedNet).toBe(cents(-3000))
    expect(result.carryforward).toEqual({ shortTerm: cents(5000), longTerm: 0 })
  })

  it('limits MFS to $1,500', () => {
    const result = netCapitalGains(makeInput({
      filingStatus: 'mfs',
      longTermLoss: cents(5000),
    }), table)

    expect(result.deductibleLoss).toBe(cents(1500))
    expect(result.carryforward).toEqual({ shortTerm: 0, longTerm: cents(3500) })
  })

  it('keeps a long-term loss long-term after a short-term gain absorbs part of it', () => {
    const result = netCapitalGains(makeInput({
      shortTermGain: cents(1000),
      longTermLoss: cents(8000),
    }), table)

    expect(result.combinedNet).toBe(cents(-7000))
    expect(result.carryforward).toEqual({ shortTerm: 0, longTerm: cents(4000) })
  })

  it('uses the short-term loss first when both periods lost', () => {
    const result = netCapitalGains(makeInput({
      shortTermLoss: cents(2000),
      longTermLoss: cents(5000),
    }), table)

    expect(result.deductibleLoss).toBe(cents(3000))
    expect(result.carryforward).toEqual({ shortTerm: 0, longTerm: cents(4000) })
  })

  it('carries forward the loss not allowed', () => {
    const result = netCapitalGains(makeInput({
      shortTermLoss: cents(2500),
      longTermLoss: cents(2500),
    }), table)

    // 5,000 loss: 3,000 allowed; 2,500 ST loss fully used, 2,000 LT left
    expect(result.carryforward.shortTerm + result.carryforward.longTerm).toBe(cents(2000))
    expect(result.carryforward).toEqual({ shortTerm: 0, longTerm: cents(2000) })
  })
})

// ── Rate buckets ────────────────────────────────────────────────

describe('netCapitalGains — rate buckets', () => {
  it('absorbs losses against the 28% collectibles gain first', () => {
    const result = netCapitalGains(makeInput({
      collectiblesGain: cents(5000),
      longTermLoss: cents(2000),
      shortTermLoss: cents(1000),
    }), table)

    expect(result.netLongTerm).toBe(cents(3000))
    expect(result.combinedNet).toBe(cents(2000))
    expect(result.netted).toEqual({
      collectibles: cents(2000),
      unrecaptured1250: 0,
      longTerm: 0,
      shortTerm: 0,
    })
  })

  it('nets a long-term loss against unrecaptured §1250 gain', () => {
    const result = netCapitalGains(makeInput({
      unrecaptured1250Gain: cents(3000),
      longTermLoss: cents(1000),
    }), table)

    expect(result.netted).toEqual({
      collectibles: 0,
      unrecaptured1250: cents(2000),
      longTerm: 0,
      shortTerm: 0,
    })
  })

  it('records each netted bucket in the breakdown', () => {
    const result = netCapitalGains(makeInput({
      unrecaptured1250Gain: cents(3000),
      longTermLoss: cents(1000),
    }), table)

    expect(findTraced(result.breakdown, 'capitalGains.netted.unrecaptured1250')?.amount).toBe(cents(2000))
    expect(findTraced(result.breakdown, 'capitalGains.combinedNet')?.amount).toBe(cents(2000))
    expect(findTraced(result.breakdown, 'capitalGains.combinedNet')?.citation).toBe('Schedule D, Line 16')
  })
})

describe('crossNet', () => {
  it('nets a gain against earlier losses in stack order', () => {
    expect(crossNet({ shortTerm: 500, longTerm: -200, unrecaptured1250: 0, collectibles: -100 })).toEqual({
      shortTerm: 200,
      longTerm: 0,
      unrecaptured1250: 0,
      collectibles: 0,
    })
  })

  it('leaves same-sign buckets alone', () => {
    const buckets = { shortTerm: 100, longTerm: 200, unrecaptured1250: 300, collectibles: 400 }
    expect(crossNet(buckets)).toEqual(buckets)
  })
})

// ── Validation ──────────────────────────────────────────────────

describe('netCapitalGains — validation', () => {
  it('rejects a negative amount', () => {
    expect(() => netCapitalGains(makeInput({ shortTermGain: -1 }), table)).toThrow(NegativeInputError)
    expect(() => netCapitalGains(makeInput({ collectiblesLoss: -5 }), table))
      .toThrow('collectiblesLoss must be non-negative, got -5')
  })
})
