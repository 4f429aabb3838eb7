/**
 * Capital Gain and Loss Netting — IRC §1(h), §1211(b), §1212(b)
 *
 * 1. Net within each holding period (Schedule D, Parts I and II):
 *      net short-term = ST gains − ST losses − ST carryover
 *      net long-term  = LT gains − LT losses − LT carryover
 *                       + 28% collectibles net + 25% unrecaptured §1250 gain
 * 2. Cross-net the rate buckets so a loss in one bucket absorbs the gain
 *    taxed at the highest rate first. Buckets are taken from a stack
 *    (collectibles, unrecaptured §1250, long-term, short-term); each one
 *    popped is netted against every already-netted bucket of the opposite
 *    sign, in the order those were netted.
 * 3. Combined net = net short-term + net long-term, signed.
 * 4. A combined loss is deductible up to the capital loss limit; the rest
 *    carries forward, short-term loss absorbed first.
 *
 * Ordinary income riding along with a sale (e.g. §1245 recapture) is
 * passed through untouched.
 *
 * Source: Schedule D (Form 1040) instructions; Capital Loss Carryover
 * Worksheet. All amounts in integer cents; losses are entered positive.
 */

import { requireNonNegative } from '../model/errors'
import type { TracedValue } from '../model/traced'
import { tracedFromComputation } from '../model/traced'
import type { FilingStatus } from '../model/types'
import type { CapitalGainsTable } from './yearTables'

// ── Input / result ───────────────────────────────────────────────

export interface CapitalGainNettingInput {
  filingStatus: FilingStatus
  shortTermGain: number
  shortTermLoss: number
  longTermGain: number
  longTermLoss: number
  /** Prior-year carryovers, entered positive */
  shortTermCarryover?: number
  longTermCarryover?: number
  /** 25% rate gain (IRC §1(h)(6)) */
  unrecaptured1250Gain?: number
  /** 28% rate gain and loss (IRC §1(h)(5)) */
  collectiblesGain?: number
  collectiblesLoss?: number
  /** Passed through unchanged; may be negative */
  ordinaryIncome?: number
}

export type RateBucket = 'shortTerm' | 'longTerm' | 'unrecaptured1250' | 'collectibles'

export type RateBuckets = Record<RateBucket, number>

/** Netted from the last entry backwards: the highest-rate bucket comes off the stack first. */
export const NETTING_STACK: readonly RateBucket[] = ['shortTerm', 'longTerm', 'unrecaptured1250', 'collectibles']

export interface CapitalGainNettingResult {
  netShortTerm: number               // Schedule D Line 7
  netLongTerm: number                // Schedule D Line 15
  combinedNet: number                // Schedule D Line 16 (gain +, loss −)
  /** Each rate bucket before and after cross-netting */
  buckets: RateBuckets
  netted: RateBuckets
  /** Loss allowed against other income this year (positive) */
  deductibleLoss: number
  /** Amount reported: the combined gain, or minus the deductible loss */
  allowedNet: number                 // Schedule D Line 21
  carryforward: { shortTerm: number; longTerm: number }
  ordinaryIncome: number
  breakdown: TracedValue[]
}

// ── Computation ──────────────────────────────────────────────────

export function netCapitalGains(
  input: CapitalGainNettingInput,
  table: CapitalGainsTable,
): CapitalGainNettingResult {
  const stGain = requireNonNegative('shortTermGain', input.shortTermGain)
  const stLoss = requireNonNegative('shortTermLoss', input.shortTermLoss)
  const ltGain = requireNonNegative('longTermGain', input.longTermGain)
  const ltLoss = requireNonNegative('longTermLoss', input.longTermLoss)
  const stCarryover = requireNonNegative('shortTermCarryover', input.shortTermCarryover ?? 0)
  const ltCarryover = requireNonNegative('longTermCarryover', input.longTermCarryover ?? 0)
  const unrecaptured1250 = requireNonNegative('unrecaptured1250Gain', input.unrecaptured1250Gain ?? 0)
  const collGain = requireNonNegative('collectiblesGain', input.collectiblesGain ?? 0)
  const collLoss = requireNonNegative('collectiblesLoss', input.collectiblesLoss ?? 0)

  // ── Within each holding period ──
  const buckets: RateBuckets = {
    shortTerm: stGain - stLoss - stCarryover,
    longTerm: ltGain - ltLoss - ltCarryover,
    unrecaptured1250,
    collectibles: collGain - collLoss,
  }
  const netShortTerm = buckets.shortTerm
  const netLongTerm = buckets.longTerm + buckets.unrecaptured1250 + buckets.collectibles

  // ── Across rate buckets ──
  const netted = crossNet(buckets)

  // ── Combined and loss limitation ──
  const combinedNet = netShortTerm + netLongTerm
  const limit = table.capitalLossLimit[input.filingStatus]
  const deductibleLoss = combinedNet < 0 ? Math.min(-combinedNet, limit) : 0
  const allowedNet = combinedNet < 0 ? -deductibleLoss : combinedNet

  const carryforward = splitCarryforward(netShortTerm, netLongTerm, combinedNet, deductibleLoss)

  const breakdown: TracedValue[] = [
    tracedFromComputation(netShortTerm, 'capitalGains.netShortTerm',
      ['shortTermGain', 'shortTermLoss', 'shortTermCarryover'], 'Schedule D, Line 7'),
    tracedFromComputation(netLongTerm, 'capitalGains.netLongTerm',
      ['longTermGain', 'longTermLoss', 'longTermCarryover', 'unrecaptured1250Gain', 'collectiblesGain', 'collectiblesLoss'],
      'Schedule D, Line 15'),
    ...[...NETTING_STACK].reverse().map(bucket =>
      tracedFromComputation(netted[bucket], `capitalGains.netted.${bucket}`,
        ['capitalGains.netShortTerm', 'capitalGains.netLongTerm'], 'IRC §1(h)'),
    ),
    tracedFromComputation(combinedNet, 'capitalGains.combinedNet',
      ['capitalGains.netShortTerm', 'capitalGains.netLongTerm'], 'Schedule D, Line 16'),
    tracedFromComputation(allowedNet, 'capitalGains.allowedNet',
      ['capitalGains.combinedNet'], 'Schedule D, Line 21; IRC §1211(b)'),
    tracedFromComputation(carryforward.shortTerm, 'capitalGains.carryforward.shortTerm',
      ['capitalGains.combinedNet', 'capitalGains.allowedNet'], 'IRC §1212(b)(1)(A)'),
    tracedFromComputation(carryforward.longTerm, 'capitalGains.carryforward.longTerm',
      ['capitalGains.combinedNet', 'capitalGains.allowedNet'], 'IRC §1212(b)(1)(B)'),
  ]

  return {
    netShortTerm,
    netLongTerm,
    combinedNet,
    buckets,
    netted,
    deductibleLoss,
    allowedNet,
    carryforward,
    ordinaryIncome: input.ordinaryIncome ?? 0,
    breakdown,
  }
}

// ── Helpers ──────────────────────────────────────────────────────

/**
 * Pop buckets off NETTING_STACK and net each against the buckets already
 * netted. Zero never nets: it has no sign.
 */
export function crossNet(buckets: RateBuckets): RateBuckets {
  const amounts: RateBuckets = { ...buckets }
  const done: RateBucket[] = []

  for (const next of [...NETTING_STACK].reverse()) {
    for (const prior of done) {
      if (!oppositeSigns(amounts[prior], amounts[next])) continue
      const net = amounts[prior] + amounts[next]
      const [positive, negative] = amounts[prior] > 0 ? [prior, next] : [next, prior]
      // the remainder stays with whichever side was larger
      amounts[positive] = net > 0 ? net : 0
      amounts[negative] = net > 0 ? 0 : net
    }
    done.push(next)
  }
  return amounts
}

function oppositeSigns(a: number, b: number): boolean {
  return (a > 0 && b < 0) || (a < 0 && b > 0)
}

/**
 * Capital Loss Carryover Worksheet: the deductible loss and any net gain
 * in the other period absorb short-term loss before long-term loss.
 */
function splitCarryforward(
  netShortTerm: number,
  netLongTerm: number,
  combinedNet: number,
  deductibleLoss: number,
): { shortTerm: number; longTerm: number } {
  if (combinedNet >= 0) return { shortTerm: 0, longTerm: 0 }

  const excess = -combinedNet - deductibleLoss
  const shortTermRemaining = Math.max(0, -netShortTerm - Math.max(0, netLongTerm))
  const shortTerm = Math.max(0, shortTermRemaining - deductibleLoss)
  return { shortTerm, longTerm: excess - shortTerm }
}
