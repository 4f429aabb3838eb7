/**
 * Zod runtime validation schemas — mirror the TypeScript types used by the
 * engine and the procedures.
 *
 * They validate what comes from outside the type system: fact values,
 * declarative tree descriptions loaded from JSON, and tax-year tables
 * supplied by callers.
 *
 * Conventions:
 *  - Monetary amounts are in integer cents.
 *  - Rates are decimals (0.2 = 20%).
 *  - Dates in JSON are ISO strings (YYYY-MM-DD).
 */

import { z } from 'zod'
import type { Comparator, DateOperand, NumericOperand } from '../engine/conditions'
import type { ConditionSpec, NodeRef, NodeSpec, TreeSpec } from '../engine/declarative'
import type { YearTables } from '../rules/yearTables'
import { FILING_STATUSES } from './types'
import type { ByFilingStatus } from './types'

// ── Reusable validators ──────────────────────────────────────────

/** Non-negative integer (cents). */
const centsNonNeg = z.number().int().min(0, 'Amount must be non-negative')

/** Decimal rate in [0, 1]. */
const rate = z.number().min(0).max(1)

const byFilingStatus = (value: z.ZodType<number>): z.ZodType<ByFilingStatus> =>
  z.object({
    single: value,
    mfj: value,
    mfs: value,
    hoh: value,
    qw: value,
  })

/** Rejects dates that roll over, such as 2025-02-30. */
function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value
}

/** YYYY-MM-DD that is also a real calendar date. */
export const isoDateSchema = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine(isCalendarDate, 'Date must be a valid calendar date')

// ── Fact values ──────────────────────────────────────────────────

/** boolean, finite number, category string, or a valid Date. */
export const factValueSchema = z.union([
  z.boolean(),
  z.number().finite(),
  z.string(),
  z.date(),
])

export const rawFactsSchema = z.record(z.string(), z.unknown())

// ── Conditions ───────────────────────────────────────────────────

const comparatorSchema: z.ZodType<Comparator> = z.enum(['eq', 'ne', 'lt', 'lte', 'gt', 'gte'])

const factOperandSchema = z.object({ kind: z.literal('fact'), field: z.string().min(1) })

export const numericOperandSchema: z.ZodType<NumericOperand> = z.lazy(() =>
  z.union([
    factOperandSchema,
    z.object({ kind: z.literal('const'), value: z.number().finite(), label: z.string().optional() }),
    z.object({ kind: z.literal('sum'), terms: z.array(numericOperandSchema).min(1), label: z.string().optional() }),
    z.object({
      kind: z.literal('difference'),
      left: numericOperandSchema,
      right: numericOperandSchema,
      label: z.string().optional(),
    }),
    z.object({
      kind: z.literal('scale'),
      operand: numericOperandSchema,
      factor: z.number().finite(),
      label: z.string().optional(),
    }),
    z.object({
      kind: z.literal('ratio'),
      numerator: numericOperandSchema,
      denominator: numericOperandSchema,
      label: z.string().optional(),
    }),
  ]),
)

const dateOperandSchema: z.ZodType<DateOperand> = z.union([
  factOperandSchema,
  z.object({ kind: z.literal('date'), value: isoDateSchema, label: z.string().optional() }),
])

export const conditionSpecSchema: z.ZodType<ConditionSpec> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('is'), field: z.string().min(1) }),
    z.object({ kind: z.literal('known'), field: z.string().min(1) }),
    z.object({
      kind: z.literal('compare'),
      left: numericOperandSchema,
      op: comparatorSchema,
      right: numericOperandSchema,
    }),
    z.object({ kind: z.literal('oneOf'), field: z.string().min(1), values: z.array(z.string()).min(1) }),
    z.object({
      kind: z.literal('dateCompare'),
      left: dateOperandSchema,
      op: comparatorSchema,
      right: dateOperandSchema,
    }),
    z.object({ kind: z.literal('all'), conditions: z.array(conditionSpecSchema).min(1) }),
    z.object({ kind: z.literal('any'), conditions: z.array(conditionSpecSchema).min(1) }),
    z.object({ kind: z.literal('not'), condition: conditionSpecSchema }),
    z.object({
      kind: z.literal('predicate'),
      name: z.string().min(1),
      params: z.record(z.string(), factValueSchema).optional(),
    }),
    z.object({ kind: z.literal('subtree'), tree: z.string().min(1), outcomes: z.array(z.string()).min(1) }),
  ]),
)

// ── Declarative trees ────────────────────────────────────────────

const nodeRefSchema: z.ZodType<NodeRef> = z.object({ ref: z.string().min(1) })

// Decision first: a leaf object never has a condition, so it falls through.
export const nodeSpecSchema: z.ZodType<NodeSpec> = z.lazy(() =>
  z.union([
    z.object({
      id: z.string().min(1),
      description: z.string(),
      condition: conditionSpecSchema,
      yes: z.union([nodeRefSchema, nodeSpecSchema]).optional(),
      no: z.union([nodeRefSchema, nodeSpecSchema]).optional(),
    }),
    z.object({
      id: z.string().min(1),
      description: z.string(),
      outcome: z.string().min(1),
    }),
  ]),
)

export const treeSpecSchema: z.ZodType<TreeSpec> = z.object({
  id: z.string().min(1),
  maxDepth: z.number().int().positive().optional(),
  root: nodeSpecSchema,
  shared: z.array(nodeSpecSchema).optional(),
})

// ── Year tables ──────────────────────────────────────────────────

export const yearTablesSchema: z.ZodType<YearTables> = z.object({
  taxYear: z.number().int().min(2018),
  socialSecurity: z.object({
    baseAmount: byFilingStatus(centsNonNeg),
    additionalAmount: byFilingStatus(centsNonNeg),
    mfsLivedApartBase: centsNonNeg,
    mfsLivedApartAdditional: centsNonNeg,
  }),
  qbi: z.object({
    deductionRate: rate,
    threshold: byFilingStatus(centsNonNeg),
    phaseInRange: byFilingStatus(z.number().int().positive()),
  }),
  capitalGains: z.object({
    capitalLossLimit: byFilingStatus(centsNonNeg),
  }),
  section179: z.object({
    dollarLimit: centsNonNeg,
    investmentThreshold: centsNonNeg,
  }),
  bonusDepreciationRate: rate,
  dependentGrossIncomeLimit: centsNonNeg,
}).superRefine((tables, ctx) => {
  for (const status of FILING_STATUSES) {
    if (tables.socialSecurity.additionalAmount[status] < tables.socialSecurity.baseAmount[status]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['socialSecurity', 'additionalAmount', status],
        message: 'Additional amount must not be below the base amount',
      })
    }
  }
})
