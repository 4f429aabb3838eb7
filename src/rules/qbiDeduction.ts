/**
 * QBI Deduction — IRC §199A (Form 8995 & Form 8995-A)
 *
 * Per business:
 *   component = 20% × QBI, limited by the greater of
 *     (a) 50% × W-2 wages, or
 *     (b) 25% × W-2 wages + 2.5% × UBIA of qualified property
 *
 *   Taxable income at or below the threshold: no limitation.
 *   Within the phase-in range (threshold to threshold + $50K/$100K MFJ):
 *     the excess of 20% × QBI over the limitation is phased in linearly.
 *   At or above threshold + range: full limitation.
 *
 * SSTB Handling:
 *   Within the phase-in range, QBI, W-2 wages and UBIA of a Specified
 *   Service Trade or Business are reduced to the applicable percentage
 *   (1 − phase-in fraction). Above the range the business is excluded.
 *
 * Losses: negative QBI is allocated to the profitable businesses in
 * proportion to their QBI before any per-business limitation (Reg.
 * §1.199A-1(d)(2)(iii)). An overall loss carries forward.
 *
 * Deduction = min(Σ components, 20% × max(0, taxable income − net capital gain))
 *
 * Boundary policy: the phase-in fraction is 0 at the threshold and 1 at
 * threshold + range, so both ends give the same amount whichever tier
 * claims them.
 *
 * Source: IRC §199A, Form 8995/8995-A instructions, Reg. §1.199A
 * All amounts in integer cents.
 */

import { requireNonNegative } from '../model/errors'
import type { TracedValue } from '../model/traced'
import { tracedFromComputation } from '../model/traced'
import type { FilingStatus } from '../model/types'
import type { QBITable } from './yearTables'

// ── Per-business QBI input ──────────────────────────────────────

export interface QBIBusinessInput {
  /** Unique business identifier, used in breakdown node ids */
  id: string
  /** Qualified business income (cents, can be negative) */
  qbi: number
  /** W-2 wages paid by this business (cents) */
  w2Wages: number
  /** UBIA of qualified property (cents) */
  ubia: number
  /** Whether this is a Specified Service Trade or Business */
  isSSTB: boolean
}

export interface QBIDeductionInput {
  filingStatus: FilingStatus
  /** Taxable income before the QBI deduction (cents) */
  taxableIncome: number
  /** Net capital gain, including qualified dividends (cents) */
  netCapitalGain: number
  businesses: QBIBusinessInput[]
}

// ── Per-business QBI result ─────────────────────────────────────

export interface QBIBusinessResult {
  id: string
  /** QBI as entered */
  qbi: number
  /** After the SSTB applicable percentage */
  applicableQBI: number
  /** After loss allocation; what the 20% is taken of */
  netQBI: number
  twentyPercentQBI: number
  /** max(50% × W-2, 25% × W-2 + 2.5% × UBIA), after the SSTB percentage */
  wageLimitation: number
  /** This business's QBI component */
  component: number
  sstbExcluded: boolean
  sstbReduced: boolean
}

// ── Result type ──────────────────────────────────────────────────

export interface QBIDeductionResult {
  totalQBI: number
  /** Fraction of the phase-in range consumed, 0–1 */
  phaseInFactor: number
  /** Taxable income is past the threshold (Form 8995-A territory) */
  aboveThreshold: boolean
  businesses: QBIBusinessResult[]
  combinedQBIAmount: number
  /** 20% × (taxable income − net capital gain), floored at 0 */
  incomeLimitation: number
  deduction: number
  /** Overall QBI loss carried to next year (positive) */
  lossCarryforward: number
  breakdown: TracedValue[]
}

// ── Helpers ──────────────────────────────────────────────────────

/**
 * Compute the W-2/UBIA wage limitation for a single business.
 * Limitation = max(50% × W-2 wages, 25% × W-2 wages + 2.5% × UBIA)
 */
export function computeWageLimitation(w2Wages: number, ubia: number): number {
  const fiftyPercentW2 = Math.round(w2Wages * 0.50)
  const twentyFivePercentW2PlusUBIA = Math.round(w2Wages * 0.25) + Math.round(ubia * 0.025)
  return Math.max(fiftyPercentW2, twentyFivePercentW2PlusUBIA)
}

/**
 * Compute phase-in factor: fraction of phase-in range consumed.
 * Returns 0 at threshold, 1 at threshold + phase-in range.
 * Clamped to [0, 1].
 */
export function computePhaseInFactor(
  taxableIncome: number,
  filingStatus: FilingStatus,
  table: QBITable,
): number {
  const threshold = table.threshold[filingStatus]
  const range = table.phaseInRange[filingStatus]
  if (taxableIncome <= threshold) return 0
  if (taxableIncome >= threshold + range) return 1
  return (taxableIncome - threshold) / range
}

/**
 * Spread the total loss over the positive amounts pro rata; the last
 * positive amount takes the rounding remainder.
 */
function allocateLoss(amounts: number[]): { net: number[]; carryforward: number } {
  const totalPositive = amounts.filter(a => a > 0).reduce((s, a) => s + a, 0)
  const totalLoss = -amounts.filter(a => a < 0).reduce((s, a) => s + a, 0)

  if (totalLoss === 0) return { net: amounts.map(a => Math.max(0, a)), carryforward: 0 }
  if (totalLoss >= totalPositive) {
    return { net: amounts.map(() => 0), carryforward: totalLoss - totalPositive }
  }

  const lastPositive = amounts.reduce((last, a, i) => (a > 0 ? i : last), -1)
  let allocated = 0
  const net = amounts.map((a, i) => {
    if (a <= 0) return 0
    const share = i === lastPositive ? totalLoss - allocated : Math.round(totalLoss * a / totalPositive)
    allocated += share
    return a - share
  })
  return { net, carryforward: 0 }
}

// ── Main computation ─────────────────────────────────────────────

export function computeQBIDeduction(input: QBIDeductionInput, table: QBITable): QBIDeductionResult {
  const netCapitalGain = requireNonNegative('netCapitalGain', input.netCapitalGain)
  for (const biz of input.businesses) {
    requireNonNegative(`businesses.${biz.id}.w2Wages`, biz.w2Wages)
    requireNonNegative(`businesses.${biz.id}.ubia`, biz.ubia)
  }

  const rate = table.deductionRate
  const phaseInFactor = computePhaseInFactor(input.taxableIncome, input.filingStatus, table)
  const fullyAbove = phaseInFactor === 1
  const totalQBI = input.businesses.reduce((s, b) => s + b.qbi, 0)

  // ── SSTB applicable percentage ──
  const applicable = input.businesses.map(biz => {
    if (!biz.isSSTB || phaseInFactor === 0) {
      return { qbi: biz.qbi, w2Wages: biz.w2Wages, ubia: biz.ubia, excluded: false, reduced: false }
    }
    if (fullyAbove) {
      return { qbi: 0, w2Wages: 0, ubia: 0, excluded: true, reduced: false }
    }
    const pct = 1 - phaseInFactor
    return {
      qbi: Math.round(biz.qbi * pct),
      w2Wages: Math.round(biz.w2Wages * pct),
      ubia: Math.round(biz.ubia * pct),
      excluded: false,
      reduced: true,
    }
  })

  // ── Loss allocation ──
  const { net, carryforward } = allocateLoss(applicable.map(a => a.qbi))

  // ── Per-business component ──
  const businesses: QBIBusinessResult[] = input.businesses.map((biz, i) => {
    const adj = applicable[i]
    const twentyPercentQBI = Math.round(net[i] * rate)
    const wageLimitation = computeWageLimitation(adj.w2Wages, adj.ubia)

    let component: number
    if (phaseInFactor === 0) {
      component = twentyPercentQBI
    } else if (fullyAbove) {
      component = Math.min(twentyPercentQBI, wageLimitation)
    } else {
      const excess = Math.max(0, twentyPercentQBI - wageLimitation)
      component = Math.round(twentyPercentQBI - phaseInFactor * excess)
    }

    return {
      id: biz.id,
      qbi: biz.qbi,
      applicableQBI: adj.qbi,
      netQBI: net[i],
      twentyPercentQBI,
      wageLimitation,
      component,
      sstbExcluded: adj.excluded,
      sstbReduced: adj.reduced,
    }
  })

  const combinedQBIAmount = businesses.reduce((s, b) => s + b.component, 0)
  const incomeLimitation = Math.round(Math.max(0, input.taxableIncome - netCapitalGain) * rate)
  const deduction = Math.min(combinedQBIAmount, incomeLimitation)

  const breakdown: TracedValue[] = [
    ...businesses.map(b =>
      tracedFromComputation(b.component, `qbi.business.${b.id}.component`,
        [`businesses.${b.id}.qbi`, `businesses.${b.id}.w2Wages`, `businesses.${b.id}.ubia`],
        'Form 8995-A, Part II'),
    ),
    tracedFromComputation(combinedQBIAmount, 'qbi.combinedAmount',
      businesses.map(b => `qbi.business.${b.id}.component`), 'IRC §199A(b)(1)(A)'),
    tracedFromComputation(incomeLimitation, 'qbi.incomeLimitation',
      ['taxableIncome', 'netCapitalGain'], 'IRC §199A(a)(1)(B)'),
    tracedFromComputation(deduction, 'qbi.deduction',
      ['qbi.combinedAmount', 'qbi.incomeLimitation'], 'Form 1040, Line 13'),
  ]
  if (carryforward > 0) {
    breakdown.push(tracedFromComputation(carryforward, 'qbi.lossCarryforward',
      businesses.map(b => `businesses.${b.id}.qbi`), 'IRC §199A(c)(2)'))
  }

  return {
    totalQBI,
    phaseInFactor,
    aboveThreshold: phaseInFactor > 0,
    businesses,
    combinedQBIAmount,
    incomeLimitation,
    deduction,
    lossCarryforward: carryforward,
    breakdown,
  }
}
