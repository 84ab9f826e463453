/**
 * Zod runtime validation schemas.
 *
 * Three kinds of untrusted input pass through here: the JSON data tables
 * shipped next to the parsers (form patterns, AT transaction codes), HTTP
 * request bodies, and rows read back from SQLite.
 */

import { z } from 'zod'

// ── Reusable validators ──────────────────────────────────────────

const incomeCategorySchema = z.enum(['SE', 'NonSE', 'Other'])

const issuerLabelSchema = z.enum(['E', 'P'])

/** snake_case field name, as emitted in parse results. */
const fieldNameSchema = z.string().regex(/^[a-z][a-z0-9_]*$/, 'Field names must be snake_case')

/** Three-digit IRS transaction code. */
const transactionCodeSchema = z.string().regex(/^\d{3}$/, 'Transaction codes are 3 digits')

// ── Data tables ──────────────────────────────────────────────────

const formPatternSchema = z.object({
  formCode: z.string().min(1),
  header: z.string().min(1),
  category: incomeCategorySchema,
  reliability: z.number().min(0).max(1),
  label: issuerLabelSchema.nullable(),
  idField: fieldNameSchema.nullable(),
  /** A null pattern declares a field the form carries but the transcript never prints. */
  fields: z.record(fieldNameSchema, z.string().min(1).nullable()),
}).refine(
  (form) => form.idField === null || form.fields[form.idField] != null,
  { message: 'idField must name a field with a pattern' },
)

const formPatternTableSchema = z.object({
  version: z.literal(1),
  forms: z.array(formPatternSchema).min(1),
}).superRefine((table, ctx) => {
  const seen = new Set<string>()
  table.forms.forEach((form, index) => {
    if (seen.has(form.formCode)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['forms', index, 'formCode'],
        message: `Duplicate form code ${form.formCode}`,
      })
    }
    seen.add(form.formCode)
  })
})

const atCodeTableSchema = z.object({
  codes: z.record(transactionCodeSchema, z.string().min(1)),
})

// ── HTTP request bodies ──────────────────────────────────────────

const transcriptDocumentSchema = z.object({
  fileName: z.string().min(1),
  text: z.string(),
})

const parseRequestSchema = transcriptDocumentSchema

const pdfTextRequestSchema = z.object({
  fileName: z.string().min(1),
  pdfBase64: z.string().min(1),
})

const ownerRequestSchema = z.object({
  fileName: z.string().min(1),
})

const caseRequestSchema = z.object({
  documents: z.array(transcriptDocumentSchema).min(1),
  filingStatus: z.string().nullable().optional(),
  includeOwnerAnalysis: z.boolean().optional(),
})

const feedbackRequestSchema = z.object({
  extractionId: z.string().min(1),
  patternId: z.string().min(1),
  isCorrect: z.boolean(),
  correctValue: z.string().optional(),
  comments: z.string().optional(),
})

// ── Stored rows ──────────────────────────────────────────────────

const caseAnalysisRowSchema = z.object({
  id: z.number().int(),
  case_id: z.string(),
  kind: z.string(),
  data: z.string(),
  created_at: z.string(),
})

const feedbackRowSchema = z.object({
  id: z.number().int(),
  extraction_id: z.string(),
  pattern_id: z.string(),
  is_correct: z.number().int(),
  correct_value: z.string().nullable(),
  comments: z.string().nullable(),
  created_at: z.string(),
})

const patternStatsRowSchema = z.object({
  pattern_id: z.string(),
  attempts: z.number().int(),
  correct: z.number().int(),
})

export type FormPatternData = z.infer<typeof formPatternSchema>
export type FormPatternTableData = z.infer<typeof formPatternTableSchema>
export type CaseRequest = z.infer<typeof caseRequestSchema>
export type FeedbackRequest = z.infer<typeof feedbackRequestSchema>
export type FeedbackRow = z.infer<typeof feedbackRowSchema>

export {
  incomeCategorySchema,
  issuerLabelSchema,
  fieldNameSchema,
  transactionCodeSchema,
  formPatternSchema,
  formPatternTableSchema,
  atCodeTableSchema,
  transcriptDocumentSchema,
  parseRequestSchema,
  pdfTextRequestSchema,
  ownerRequestSchema,
  caseRequestSchema,
  feedbackRequestSchema,
  caseAnalysisRowSchema,
  feedbackRowSchema,
  patternStatsRowSchema,
}
