/**
 * Fact sets — the case-specific input to one evaluation.
 *
 * A fact set is a frozen record of named values. Conditions and
 * predicates never index it directly; they go through the `require*`
 * accessors so that an absent or wrongly typed fact always surfaces as
 * MissingFactError / TypeMismatchError naming the field.
 */

import { MissingFactError, TypeMismatchError } from './errors'
import { factValueSchema, isoDateSchema, rawFactsSchema } from './schemas'

// ── Types ────────────────────────────────────────────────────────

/** boolean, number (integer or decimal), category, or date */
export type FactValue = boolean | number | string | Date

export type FactSet = Readonly<Record<string, FactValue>>

export type FactType = 'boolean' | 'number' | 'category' | 'date'

// ── Construction ─────────────────────────────────────────────────

/**
 * Build a frozen fact set. `undefined` entries are dropped so optional
 * facts can be spread in without filtering first.
 */
export function createFactSet(input: Readonly<Record<string, FactValue | undefined>>): FactSet {
  const facts: Record<string, FactValue> = {}
  for (const [field, value] of Object.entries(input)) {
    if (value === undefined) continue
    const parsed = factValueSchema.safeParse(value)
    if (!parsed.success) {
      throw new TypeMismatchError(field, 'a boolean, finite number, string or valid date', describeValue(value))
    }
    facts[field] = parsed.data instanceof Date ? new Date(parsed.data.getTime()) : parsed.data
  }
  return Object.freeze(facts)
}

/** A new fact set with `extra` layered over `facts`. */
export function withFacts(facts: FactSet, extra: Readonly<Record<string, FactValue | undefined>>): FactSet {
  return createFactSet({ ...facts, ...extra })
}

/**
 * Parse facts from untyped JSON. Fields listed in `dateFields` must be
 * ISO dates and become Date values; everything else must already be a
 * boolean, number or string.
 */
export function parseFactSet(raw: unknown, dateFields: readonly string[] = []): FactSet {
  const record = rawFactsSchema.safeParse(raw)
  if (!record.success) {
    throw new TypeMismatchError('(facts)', 'an object', describeValue(raw))
  }

  const input: Record<string, FactValue> = {}
  for (const [field, value] of Object.entries(record.data)) {
    if (dateFields.includes(field)) {
      const iso = isoDateSchema.safeParse(value)
      if (!iso.success) throw new TypeMismatchError(field, 'an ISO date', describeValue(value))
      input[field] = new Date(`${iso.data}T00:00:00Z`)
      continue
    }
    const parsed = factValueSchema.safeParse(value)
    if (!parsed.success) {
      throw new TypeMismatchError(field, 'a boolean, finite number or string', describeValue(value))
    }
    input[field] = parsed.data
  }
  return createFactSet(input)
}

// ── Accessors ────────────────────────────────────────────────────

export function hasFact(facts: FactSet, field: string): boolean {
  return Object.hasOwn(facts, field)
}

export function requireFact(facts: FactSet, field: string): FactValue {
  if (!hasFact(facts, field)) throw new MissingFactError(field)
  return facts[field]
}

export function requireBoolean(facts: FactSet, field: string): boolean {
  const value = requireFact(facts, field)
  if (typeof value !== 'boolean') throw new TypeMismatchError(field, 'a boolean', describeValue(value))
  return value
}

export function requireNumber(facts: FactSet, field: string): number {
  const value = requireFact(facts, field)
  if (typeof value !== 'number') throw new TypeMismatchError(field, 'a number', describeValue(value))
  return value
}

export function requireCategory(facts: FactSet, field: string): string {
  const value = requireFact(facts, field)
  if (typeof value !== 'string') throw new TypeMismatchError(field, 'a category', describeValue(value))
  return value
}

export function requireDate(facts: FactSet, field: string): Date {
  const value = requireFact(facts, field)
  if (!(value instanceof Date)) throw new TypeMismatchError(field, 'a date', describeValue(value))
  // Date is mutable; the stored instance never leaves the fact set
  return new Date(value.getTime())
}

// ── Formatting ───────────────────────────────────────────────────

export function factType(value: FactValue): FactType {
  if (value instanceof Date) return 'date'
  if (typeof value === 'boolean') return 'boolean'
  if (typeof value === 'number') return 'number'
  return 'category'
}

/** ISO date for dates, shortest round-trip text for everything else. */
export function formatFactValue(value: FactValue): string {
  if (value instanceof Date) return formatDate(value)
  if (typeof value === 'number') return formatNumber(value)
  return String(value)
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10)
}

/** Integers as-is, decimals to at most four places. */
export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(4)))
}

/** Short type description for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'an invalid date' : 'a date'
  if (Array.isArray(value)) return 'an array'
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN'
    if (!Number.isFinite(value)) return 'a non-finite number'
    return 'a number'
  }
  if (typeof value === 'string') return 'a category'
  if (typeof value === 'boolean') return 'a boolean'
  if (typeof value === 'undefined') return 'undefined'
  return typeof value === 'object' ? 'an object' : `a ${typeof value}`
}
