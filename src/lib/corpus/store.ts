import { copyFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { LabelCorpus } from './corpus'
import { cleanLabel } from '../labels/format'
import { createLogger } from '../utils/logger'
import { CorpusStorageUnavailableError, CorpusWriteConflictError } from '../utils/errors'
import type { LabelEntry } from '../../types'

const CORPUS_VERSION = '1.0'
const SAVE_ATTEMPTS = 3
const RETRY_DELAY_MS = 100

const log = createLogger('corpus')

const entrySchema = z.object({
  label: z.string(),
  description: z.string().optional(),
  examples: z.array(z.string()).default([]),
})

const corpusFileSchema = z.object({
  version: z.string().optional(),
  updatedAt: z.string().optional(),
  labels: z.array(entrySchema),
})

const legacyCorpusSchema = z.object({
  standardized_field_labels: z.array(z.string()),
  metadata: z.record(z.unknown()).optional(),
})

export interface CorpusFile {
  version: string
  updatedAt: string
  labels: LabelEntry[]
}

export interface CorpusCleanReport {
  original: number
  cleaned: number
  conversions: Array<{ original: string; cleaned: string; reason: string }>
  problematic: Array<{ original: string; attempted: string; reason: string }>
  duplicatesRemoved: number
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/** Entries in file order, or null when the file does not exist. */
async function readCorpusEntries(filePath: string): Promise<LabelEntry[] | null> {
  let text: string
  try {
    text = await readFile(filePath, 'utf8')
  } catch (err) {
    if (isMissingFile(err)) return null
    throw new CorpusStorageUnavailableError(filePath, { cause: err })
  }
  if (!text.trim()) return []

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (err) {
    throw new CorpusStorageUnavailableError(filePath, { cause: err })
  }

  const current = corpusFileSchema.safeParse(json)
  if (current.success) {
    return current.data.labels.map(entry => {
      const result: LabelEntry = { label: entry.label, examples: entry.examples }
      if (entry.description) result.description = entry.description
      return result
    })
  }

  const legacy = legacyCorpusSchema.safeParse(json)
  if (legacy.success) {
    return legacy.data.standardized_field_labels.map(label => ({ label, examples: [] }))
  }

  throw new CorpusStorageUnavailableError(filePath, {
    cause: new Error('Unrecognized corpus format'),
  })
}

/**
 * Snake-cases every key, drops keys that cannot be repaired and collapses
 * duplicates onto their first occurrence.
 */
export function cleanEntries(entries: LabelEntry[]): { entries: LabelEntry[]; report: CorpusCleanReport } {
  const report: CorpusCleanReport = {
    original: entries.length,
    cleaned: 0,
    conversions: [],
    problematic: [],
    duplicatesRemoved: 0,
  }
  const byLabel = new Map<string, LabelEntry>()

  for (const entry of entries) {
    const result = cleanLabel(entry.label)
    if (!result.ok) {
      report.problematic.push({ original: entry.label, attempted: result.label, reason: result.reason })
      continue
    }
    if (result.label !== entry.label) {
      report.conversions.push({ original: entry.label, cleaned: result.label, reason: result.reason })
    }

    const existing = byLabel.get(result.label)
    if (existing) {
      report.duplicatesRemoved++
      for (const example of entry.examples) {
        if (!existing.examples.includes(example)) existing.examples.push(example)
      }
      if (!existing.description && entry.description) existing.description = entry.description
      continue
    }
    const cleaned: LabelEntry = { label: result.label, examples: [...entry.examples] }
    if (entry.description) cleaned.description = entry.description
    byLabel.set(result.label, cleaned)
  }

  const cleanedEntries = [...byLabel.values()]
  report.cleaned = cleanedEntries.length
  return { entries: cleanedEntries, report }
}

export async function loadCorpus(filePath: string): Promise<LabelCorpus> {
  const entries = await readCorpusEntries(filePath)
  if (entries === null) {
    log.warn('Label corpus not found, starting empty', { path: filePath })
    return new LabelCorpus()
  }

  const { entries: cleaned, report } = cleanEntries(entries)
  for (const problem of report.problematic) {
    log.warn('Skipping unusable corpus label', { label: problem.original, reason: problem.reason })
  }
  log.info(`Loaded ${cleaned.length} existing standardized labels`, { path: filePath })
  return new LabelCorpus(cleaned)
}

async function writeCorpusFile(filePath: string, labels: LabelEntry[]): Promise<void> {
  const payload: CorpusFile = {
    version: CORPUS_VERSION,
    updatedAt: new Date().toISOString(),
    labels,
  }
  await mkdir(path.dirname(filePath), { recursive: true })
  const tmpPath = `${filePath}.${process.pid}.tmp`
  await writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8')
  await rename(tmpPath, filePath)
}

/**
 * Writes the corpus in insertion order. Labels another writer put on disk
 * since load are kept and appended after ours. Call through
 * `corpus.exclusive` when documents run concurrently.
 */
export async function saveCorpus(filePath: string, corpus: LabelCorpus): Promise<void> {
  let lastError: CorpusWriteConflictError | undefined

  for (let attempt = 1; attempt <= SAVE_ATTEMPTS; attempt++) {
    try {
      const onDisk = (await readCorpusEntries(filePath)) ?? []
      const merged = corpus.toEntries()
      for (const entry of cleanEntries(onDisk).entries) {
        if (!corpus.has(entry.label)) merged.push(entry)
      }
      await writeCorpusFile(filePath, merged)
      log.debug(`Saved ${merged.length} labels`, { path: filePath, attempt })
      return
    } catch (err) {
      lastError = new CorpusWriteConflictError(filePath, attempt, { cause: err })
      log.warn(lastError.message)
      if (attempt < SAVE_ATTEMPTS) {
        await new Promise(resolve => setTimeout(resolve, RETRY_DELAY_MS * attempt))
      }
    }
  }

  throw new CorpusStorageUnavailableError(filePath, { cause: lastError })
}

export function backupPathFor(filePath: string): string {
  const parsed = path.parse(filePath)
  return path.join(parsed.dir, `${parsed.name}_backup${parsed.ext || '.json'}`)
}

/** Rewrites the corpus file cleaned, keeping a backup of the original. */
export async function cleanCorpusFile(filePath: string): Promise<CorpusCleanReport> {
  const entries = await readCorpusEntries(filePath)
  if (entries === null) {
    throw new CorpusStorageUnavailableError(filePath, { cause: new Error('file not found') })
  }

  const backupPath = backupPathFor(filePath)
  await copyFile(filePath, backupPath)
  log.info('Created corpus backup', { path: backupPath })

  const { entries: cleaned, report } = cleanEntries(entries)
  await writeCorpusFile(filePath, cleaned)
  log.info(`Cleaned corpus: ${report.original} → ${report.cleaned} labels`, {
    conversions: report.conversions.length,
    problematic: report.problematic.length,
    duplicatesRemoved: report.duplicatesRemoved,
  })
  return report
}
