/**
 * Pattern table: the read-only registry of recognised transcript forms.
 *
 * Loaded once from formPatterns.json at module load, validated with zod and
 * compiled to RegExps. Entry order is significant: header lookup is
 * first-match-wins, so specific codes sit before the codes they extend
 * (W-2G before W-2, 1098-E/1098-T before 1098, 5498-SA before 5498), and
 * the shorter patterns carry negative lookaheads as a second guard.
 *
 * Field patterns are written with placeholders for the value part:
 *   {amount}  dollar amount, optional `$`, thousands separators, sign
 *   {id}      EIN / FIN, digits with masking X's and dashes
 *   {code}    one or two character box code
 *   {text}    a single word (indicator boxes)
 */

import { readFileSync } from 'node:fs'
import { formPatternTableSchema } from '../model/schemas.ts'
import type { FormPatternData } from '../model/schemas.ts'
import type { PatternEntry } from '../model/types.ts'
import { CALCULATION_RULES } from './calculationRules.ts'

const PLACEHOLDERS: Record<string, string> = {
  '{amount}': String.raw`[:\s]*\$?\s*(-?[\d,]*\d(?:\.\d+)?)`,
  '{id}': String.raw`[:\s]*([\dX][\dX-]+)`,
  '{code}': String.raw`[:\s]*([0-9A-Z]{1,2})\b`,
  '{text}': String.raw`[:\s]*([A-Za-z0-9]+)`,
}

/** Lines that open a block even when no entry recognises the form. */
const GENERIC_HEADERS = [/^\s*Form\s+[A-Z0-9][\w-]*/, /^\s*Schedule\s+K-1\b/]

export class PatternTableError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PatternTableError'
  }
}

export function expandPlaceholders(source: string): string {
  let out = source
  for (const [token, replacement] of Object.entries(PLACEHOLDERS)) {
    out = out.split(token).join(replacement)
  }
  return out
}

/** Number of capture groups in a pattern source. */
export function captureGroupCount(source: string): number {
  // An empty alternative guarantees a match, so the result length is 1 + groups.
  const match = new RegExp(`${source}|`).exec('')
  return match === null ? 0 : match.length - 1
}

function compileRegex(source: string, where: string): RegExp {
  try {
    return new RegExp(source, 'i')
  } catch (err) {
    throw new PatternTableError(`${where}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

function compileEntry(form: FormPatternData): PatternEntry {
  const fields = new Map<string, RegExp | null>()
  for (const [name, raw] of Object.entries(form.fields)) {
    if (raw === null) {
      fields.set(name, null)
      continue
    }
    const where = `${form.formCode}.${name}`
    const regex = compileRegex(expandPlaceholders(raw), where)
    const groups = captureGroupCount(regex.source)
    if (groups !== 1) {
      throw new PatternTableError(`${where}: expected exactly one capture group, found ${groups}`)
    }
    fields.set(name, regex)
  }

  return {
    formCode: form.formCode,
    headerPattern: compileRegex(form.header, `${form.formCode} header`),
    fields,
    category: form.category,
    calculation: CALCULATION_RULES.get(form.formCode) ?? null,
    idField: form.idField,
    label: form.label,
    reliability: form.reliability,
  }
}

export interface PatternTable {
  readonly entries: readonly PatternEntry[]
  /** First entry whose header pattern matches, in table order. */
  lookup(headerText: string): PatternEntry | null
  byCode(formCode: string): PatternEntry | null
}

/** Validate and compile raw table data. Throws PatternTableError on bad input. */
export function compilePatternTable(data: unknown): PatternTable {
  const parsed = formPatternTableSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new PatternTableError(`Invalid pattern table at ${issue.path.join('.')}: ${issue.message}`)
  }

  const entries = Object.freeze(parsed.data.forms.map(compileEntry))
  const byCode = new Map(entries.map((entry) => [entry.formCode, entry]))

  return {
    entries,
    lookup(headerText) {
      return entries.find((entry) => entry.headerPattern.test(headerText)) ?? null
    },
    byCode(formCode) {
      return byCode.get(formCode) ?? null
    },
  }
}

function loadDefaultTable(): PatternTable {
  const raw = readFileSync(new URL('./formPatterns.json', import.meta.url), 'utf-8')
  return compilePatternTable(JSON.parse(raw))
}

/** The shipped table, shared by every parse. */
export const PATTERN_TABLE: PatternTable = loadDefaultTable()

export function lookupPattern(headerText: string): PatternEntry | null {
  return PATTERN_TABLE.lookup(headerText)
}

/** True when the line opens a form block, recognised or not. */
export function isFormHeader(line: string, table: PatternTable = PATTERN_TABLE): boolean {
  return table.lookup(line) !== null || GENERIC_HEADERS.some((re) => re.test(line))
}
