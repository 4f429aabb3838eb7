/**
 * Tax-Year Tables Registry
 *
 * The procedures and determination trees never hard-code a threshold:
 * they take a YearTables value. This registry ships tables for the
 * years below; callers with other numbers pass their own, validated by
 * parseYearTables().
 *
 * Adding a tax year:
 * 1. Create src/rules/<year>/tables.ts exporting a YearTables value
 * 2. Register it in YEAR_TABLES below
 *
 * All monetary amounts are in integer cents.
 */

import type { ByFilingStatus } from '../model/types'
import { yearTablesSchema } from '../model/schemas'
import { tables2024 } from './2024/tables'
import { tables2025 } from './2025/tables'

// ── Table shapes ─────────────────────────────────────────────────

/** IRC §86(c) base and adjusted base amounts. */
export interface SocialSecurityTable {
  baseAmount: ByFilingStatus
  additionalAmount: ByFilingStatus
  /** Used instead of the mfs amounts when the spouses lived apart all year. */
  mfsLivedApartBase: number
  mfsLivedApartAdditional: number
}

/** IRC §199A(b)(3), (d)(3), (e)(2). */
export interface QBITable {
  deductionRate: number
  threshold: ByFilingStatus
  phaseInRange: ByFilingStatus
}

/** IRC §1211(b). */
export interface CapitalGainsTable {
  capitalLossLimit: ByFilingStatus
}

/** IRC §179(b)(1)–(2). */
export interface Section179Table {
  dollarLimit: number
  investmentThreshold: number
}

export interface YearTables {
  taxYear: number
  socialSecurity: SocialSecurityTable
  qbi: QBITable
  capitalGains: CapitalGainsTable
  section179: Section179Table
  /** IRC §168(k) applicable percentage for property placed in service this year. */
  bonusDepreciationRate: number
  /** IRC §151(d) exemption amount, the qualifying relative gross income limit. */
  dependentGrossIncomeLimit: number
}

// ── Registry ─────────────────────────────────────────────────────

const YEAR_TABLES: Map<number, YearTables> = new Map([
  [2024, tables2024],
  [2025, tables2025],
])

/**
 * Resolve the tables for a given tax year.
 * Throws if the year is not registered.
 */
export function getYearTables(year: number): YearTables {
  const tables = YEAR_TABLES.get(year)
  if (!tables) {
    const supported = getSupportedTaxYears().join(', ')
    throw new Error(
      `No tables registered for tax year ${year}. Supported years: ${supported}`,
    )
  }
  return tables
}

/** List all tax years with registered tables. */
export function getSupportedTaxYears(): number[] {
  return [...YEAR_TABLES.keys()].sort((a, b) => a - b)
}

/**
 * Validate caller-supplied tables (e.g. parsed JSON).
 * Throws the zod error listing every invalid field.
 */
export function parseYearTables(raw: unknown): YearTables {
  return yearTablesSchema.parse(raw)
}
