/**
 * 2024 Tax Year Tables
 *
 * All monetary amounts are in integer cents.
 *
 * Primary source: IRS Revenue Procedure 2023-34
 * https://www.irs.gov/pub/irs-drop/rp-23-34.pdf
 */

import type { YearTables } from '../yearTables'

/** Convert dollars to cents for readability in this file. */
function c(dollars: number): number {
  return Math.round(dollars * 100)
}

export const tables2024: YearTables = {
  taxYear: 2024,

  // IRC §86(c) — not indexed for inflation
  socialSecurity: {
    baseAmount: {
      single: c(25000),
      mfj:    c(32000),
      mfs:    0,           // lived with spouse at any time during the year
      hoh:    c(25000),
      qw:     c(25000),
    },
    additionalAmount: {
      single: c(34000),
      mfj:    c(44000),
      mfs:    0,
      hoh:    c(34000),
      qw:     c(34000),
    },
    mfsLivedApartBase:       c(25000),
    mfsLivedApartAdditional: c(34000),
  },

  // Rev. Proc. 2023-34, §3.27
  qbi: {
    deductionRate: 0.20,
    threshold: {
      single: c(191950),
      mfj:    c(383900),
      mfs:    c(191950),
      hoh:    c(191950),
      qw:     c(191950),
    },
    phaseInRange: {
      single: c(50000),
      mfj:    c(100000),
      mfs:    c(50000),
      hoh:    c(50000),
      qw:     c(50000),
    },
  },

  // IRC §1211(b)
  capitalGains: {
    capitalLossLimit: {
      single: c(3000),
      mfj:    c(3000),
      mfs:    c(1500),
      hoh:    c(3000),
      qw:     c(3000),
    },
  },

  // Rev. Proc. 2023-34, §3.24
  section179: {
    dollarLimit:         c(1220000),
    investmentThreshold: c(3050000),
  },

  bonusDepreciationRate: 0.60,      // IRC §168(k)(6)(A)(iv)

  dependentGrossIncomeLimit: c(5050),
}
