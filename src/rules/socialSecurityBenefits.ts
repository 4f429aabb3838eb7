/**
 * Social Security Benefits — Taxable Amount Computation
 *
 * Implements the IRS worksheet from Publication 915 to determine
 * the taxable portion of Social Security benefits (Form 1040 Lines 6a/6b).
 *
 * Three-tier system:
 *   Tier 0: Combined income ≤ base amount → $0 taxable
 *   Tier 1: Base < combined income ≤ additional amount → up to 50% taxable
 *   Tier 2: Combined income > additional amount → up to 85% taxable
 *
 * Combined income = Modified AGI + ½ × gross SS benefits
 * Modified AGI = income (excluding SS benefits) + tax-exempt interest
 *              + excluded foreign income + employer adoption benefits
 *              − adjustments to income
 *
 * A combined income exactly at a threshold is taxed under the lower tier
 * by default (the statute's "exceeds"); `boundary: 'upper-tier'` moves it
 * up. Either way the amount is the same, only the reported tier differs.
 *
 * Source: IRS Publication 915, Worksheet 1
 * Source: IRC §86
 */

import { requireNonNegative } from '../model/errors'
import type { TracedValue } from '../model/traced'
import { tracedFromComputation } from '../model/traced'
import type { FilingStatus } from '../model/types'
import type { SocialSecurityTable } from './yearTables'

// ── Input / options ────────────────────────────────────────────

export interface SocialSecurityInput {
  filingStatus: FilingStatus
  /** SSA-1099 Box 5 total (cents) */
  grossBenefits: number
  /** All other income before adjustments, excluding benefits (cents; may be negative) */
  otherIncome: number
  taxExemptInterest: number
  /** Foreign earned income / housing exclusions (Form 2555) */
  excludedForeignIncome?: number
  /** Employer-provided adoption benefits excluded under §137 */
  adoptionBenefits?: number
  /** Adjustments to income other than student loan interest */
  adjustments?: number
  /** MFS only: lived apart from the spouse for the entire year */
  livedApartAllYear?: boolean
}

export type TierBoundary = 'lower-tier' | 'upper-tier'

export interface SocialSecurityOptions {
  boundary?: TierBoundary
}

// ── Result ─────────────────────────────────────────────────────

export interface SocialSecurityBenefitsResult {
  grossBenefits: number           // Line 6a
  halfBenefits: number
  modifiedAGI: number
  combinedIncome: number
  baseAmount: number              // Tier 1 threshold
  additionalAmount: number        // Tier 2 threshold
  taxableBenefits: number         // Line 6b
  tier: 0 | 1 | 2
  mfsLivedApart: boolean
  breakdown: TracedValue[]
}

// ── Computation ────────────────────────────────────────────────

export function computeTaxableSocialSecurity(
  input: SocialSecurityInput,
  table: SocialSecurityTable,
  options: SocialSecurityOptions = {},
): SocialSecurityBenefitsResult {
  const grossBenefits = requireNonNegative('grossBenefits', input.grossBenefits)
  const taxExemptInterest = requireNonNegative('taxExemptInterest', input.taxExemptInterest)
  const excludedForeignIncome = requireNonNegative('excludedForeignIncome', input.excludedForeignIncome ?? 0)
  const adoptionBenefits = requireNonNegative('adoptionBenefits', input.adoptionBenefits ?? 0)
  const adjustments = requireNonNegative('adjustments', input.adjustments ?? 0)
  const boundary = options.boundary ?? 'lower-tier'

  // MFS lived-apart uses the lived-apart (single-like) thresholds, IRC §86(c)(1)(C)(ii)
  const mfsLivedApart = input.filingStatus === 'mfs' && (input.livedApartAllYear ?? false)
  const baseAmount = mfsLivedApart ? table.mfsLivedApartBase : table.baseAmount[input.filingStatus]
  const additionalAmount = mfsLivedApart ? table.mfsLivedApartAdditional : table.additionalAmount[input.filingStatus]

  const halfBenefits = Math.round(grossBenefits / 2)
  const modifiedAGI = input.otherIncome + taxExemptInterest + excludedForeignIncome + adoptionBenefits - adjustments
  const combinedIncome = modifiedAGI + halfBenefits

  const withinTier = (limit: number): boolean =>
    boundary === 'lower-tier' ? combinedIncome <= limit : combinedIncome < limit

  const excessOverBase = Math.max(0, combinedIncome - baseAmount)
  const tierRange = additionalAmount - baseAmount  // $9K single, $12K MFJ

  let tier: 0 | 1 | 2
  let taxableBenefits: number

  if (grossBenefits === 0 || withinTier(baseAmount)) {
    // Tier 0: combined income ≤ base amount → nothing taxable
    tier = 0
    taxableBenefits = 0
  } else if (withinTier(additionalAmount)) {
    // Tier 1: taxable = min(50% × excess over base, 50% × gross benefits)
    tier = 1
    taxableBenefits = Math.min(
      Math.round(excessOverBase * 0.50),
      Math.round(grossBenefits * 0.50),
    )
  } else {
    // Tier 2: tier1Max = min(50% × tier range, 50% × gross benefits)
    // taxable = min(85% × excess over additional + tier1Max, 85% × gross benefits)
    tier = 2
    const excessOverAdditional = Math.max(0, combinedIncome - additionalAmount)
    const tier1Max = Math.min(
      Math.round(tierRange * 0.50),
      Math.round(grossBenefits * 0.50),
    )
    taxableBenefits = Math.min(
      Math.round(excessOverAdditional * 0.85) + tier1Max,
      Math.round(grossBenefits * 0.85),
    )
  }

  const breakdown: TracedValue[] = [
    tracedFromComputation(halfBenefits, 'socialSecurity.halfBenefits',
      ['grossBenefits'], 'Pub 915, Worksheet 1, Line 2'),
    tracedFromComputation(modifiedAGI, 'socialSecurity.modifiedAGI',
      ['otherIncome', 'taxExemptInterest', 'excludedForeignIncome', 'adoptionBenefits', 'adjustments'],
      'Pub 915, Worksheet 1, Lines 3–7'),
    tracedFromComputation(combinedIncome, 'socialSecurity.combinedIncome',
      ['socialSecurity.modifiedAGI', 'socialSecurity.halfBenefits'], 'IRC §86(b)(1)'),
    tracedFromComputation(taxableBenefits, 'socialSecurity.taxableBenefits',
      ['socialSecurity.combinedIncome', 'grossBenefits'], 'Form 1040, Line 6b'),
  ]

  return {
    grossBenefits,
    halfBenefits,
    modifiedAGI,
    combinedIncome,
    baseAmount,
    additionalAmount,
    taxableBenefits,
    tier,
    mfsLivedApart,
    breakdown,
  }
}
