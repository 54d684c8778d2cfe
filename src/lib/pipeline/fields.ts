import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { z } from 'zod'
import { FieldSourceError } from '../utils/errors'
import type { DecisionAction, DocumentResolution, FieldDocument, FieldKind, FormField } from '../../types'

const FIELD_KINDS: Record<string, FieldKind> = {
  text: 'text',
  checkbox: 'checkbox',
  radiobutton: 'radio',
  combobox: 'combobox',
  listbox: 'listbox',
  signature: 'signature',
  button: 'button',
}

const rectSchema = z.object({
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
})

const extractedFieldSchema = z.object({
  field_name: z.string().nullish(),
  field_type: z.string().nullish(),
  field_context_on_pdf: z.string().nullish(),
  field_context_detected: z.string().nullish(),
  field_context_all_directions: z.record(z.string()).nullish(),
  page: z.number().int().nullish(),
  rect: rectSchema.nullish(),
})

const fieldsFileSchema = z.object({
  filename: z.string().optional(),
  error: z.string().optional(),
  pages: z
    .array(
      z.object({
        page_number: z.number().int().optional(),
        fields: z.array(extractedFieldSchema).default([]),
      })
    )
    .default([]),
})

type ExtractedField = z.infer<typeof extractedFieldSchema>

export function fieldKindOf(fieldType: string | null | undefined): FieldKind {
  const key = (fieldType ?? '').toLowerCase()
  return Object.hasOwn(FIELD_KINDS, key) ? FIELD_KINDS[key] : 'unknown'
}

function contextOf(field: ExtractedField): string {
  const builtin = field.field_context_on_pdf?.trim()
  if (builtin) return builtin
  const detected = field.field_context_detected?.trim()
  if (detected) return detected
  const around = field.field_context_all_directions ?? {}
  return ['left', 'top', 'right', 'bottom']
    .map(direction => around[direction]?.trim() ?? '')
    .filter(Boolean)
    .join(' ')
}

/** Flattens the extractor's page list into fields numbered in document order. */
export function parseFieldsDocument(json: unknown, fallbackName: string): FieldDocument {
  const parsed = fieldsFileSchema.safeParse(json)
  if (!parsed.success) {
    throw new FieldSourceError(fallbackName, `Unrecognized fields file: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  }
  const data = parsed.data
  if (data.error && !data.pages.length) {
    throw new FieldSourceError(fallbackName, `Extractor reported: ${data.error}`)
  }

  const fields: FormField[] = []
  for (const page of data.pages) {
    for (const raw of page.fields) {
      const field: FormField = {
        index: fields.length,
        rawName: raw.field_name ?? '',
        kind: fieldKindOf(raw.field_type),
        context: contextOf(raw),
      }
      const heading = raw.field_context_all_directions?.top?.trim()
      if (heading) field.sectionHeading = heading
      const pageNumber = raw.page ?? page.page_number
      if (pageNumber !== undefined) field.page = pageNumber
      if (raw.rect) field.rect = raw.rect
      fields.push(field)
    }
  }

  return { fileName: data.filename ?? fallbackName, fields }
}

export async function loadFieldsFile(path: string): Promise<FieldDocument> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    throw new FieldSourceError(path, 'Cannot read fields file', { cause: err })
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (err) {
    throw new FieldSourceError(path, 'Fields file is not valid JSON', { cause: err })
  }
  return parseFieldsDocument(json, basename(path).replace(/_fields\.json$/, '.pdf'))
}

// ── Standardized output ─────────────────────────────────────

export interface StandardizedField {
  field_index: number
  original_field_name: string
  standardized_label: string
  action: DecisionAction | null
  status: 'resolved' | 'failed'
  description?: string
  candidates: string[]
  attempts: number
  error?: string
}

const standardizedFileSchema = z.object({
  filename: z.string(),
  generated_at: z.string(),
  summary: z
    .object({
      total_fields: z.number(),
      kept: z.number(),
      matched: z.number(),
      created: z.number(),
      failed: z.number(),
      unique_labels: z.number(),
      duplicated_labels: z.array(z.object({ label: z.string(), count: z.number() })),
    }),
  fields: z.array(
    z.object({
      field_index: z.number().int(),
      original_field_name: z.string(),
      standardized_label: z.string(),
      action: z.enum(['keep', 'match_existing', 'create_new']).nullable(),
      status: z.enum(['resolved', 'failed']),
      description: z.string().optional(),
      candidates: z.array(z.string()).default([]),
      attempts: z.number().int(),
      error: z.string().optional(),
    })
  ),
})

export type StandardizedOutput = z.infer<typeof standardizedFileSchema>

export function standardizedPathFor(fieldsPath: string, outputDir: string): string {
  const name = basename(fieldsPath)
  const stem = name.endsWith('_fields.json')
    ? name.slice(0, -'_fields.json'.length)
    : name.replace(/\.json$/, '')
  return join(outputDir, `${stem}_standardized.json`)
}

export function toStandardizedOutput(resolution: DocumentResolution, now: Date = new Date()): StandardizedOutput {
  const { summary } = resolution
  return {
    filename: resolution.fileName,
    generated_at: now.toISOString(),
    summary: {
      total_fields: summary.totalFields,
      kept: summary.kept,
      matched: summary.matched,
      created: summary.created,
      failed: summary.failed,
      unique_labels: summary.uniqueLabels.length,
      duplicated_labels: summary.duplicatedLabels,
    },
    fields: resolution.results.map((result): StandardizedField => {
      if (result.status === 'failed') {
        return {
          field_index: result.fieldIndex,
          original_field_name: result.rawName,
          standardized_label: result.rawName,
          action: null,
          status: 'failed',
          candidates: result.candidates,
          attempts: result.attempts,
          error: result.error,
        }
      }
      const field: StandardizedField = {
        field_index: result.fieldIndex,
        original_field_name: result.rawName,
        standardized_label: result.label,
        action: result.action,
        status: 'resolved',
        candidates: result.candidates,
        attempts: result.attempts,
      }
      if (result.description) field.description = result.description
      return field
    }),
  }
}

export async function writeStandardizedOutput(path: string, resolution: DocumentResolution): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(toStandardizedOutput(resolution), null, 2)}\n`, 'utf8')
}

export async function readStandardizedFile(path: string): Promise<StandardizedOutput> {
  let json: unknown
  try {
    json = JSON.parse(await readFile(path, 'utf8'))
  } catch (err) {
    throw new FieldSourceError(path, 'Cannot read standardized output', { cause: err })
  }
  const parsed = standardizedFileSchema.safeParse(json)
  if (!parsed.success) {
    throw new FieldSourceError(path, `Unrecognized standardized output: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  }
  return parsed.data
}
