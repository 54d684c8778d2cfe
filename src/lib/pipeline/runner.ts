import { access, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import pLimit from 'p-limit'
import { loadCorpus, saveCorpus } from '../corpus/store'
import { LabelResolver } from '../resolution/resolver'
import { findDuplicateLabels } from '../resolution/report'
import { createLogger } from '../utils/logger'
import { CorpusStorageUnavailableError, FieldSourceError, toErrorMessage } from '../utils/errors'
import {
  loadFieldsFile,
  readStandardizedFile,
  standardizedPathFor,
  writeStandardizedOutput,
} from './fields'
import type { ResolverOptions } from '../resolution/resolver'
import type { DecisionOracle, DuplicatedLabel, ResolutionSummary } from '../../types'

export const DEFAULT_CONCURRENCY = 2
const FIELDS_SUFFIX = '_fields.json'

const log = createLogger('runner')

export interface MatchRunOptions {
  /** Explicit `_fields.json` inputs; when empty every one in `fieldsDir` is used. */
  files?: string[]
  fieldsDir: string
  outputDir: string
  corpusPath: string
  oracle: DecisionOracle
  resolver?: ResolverOptions
  /** Re-resolve documents whose standardized output already exists. */
  force?: boolean
  concurrency?: number
}

export interface DocumentOutcome {
  source: string
  outputPath: string
  status: 'resolved' | 'skipped' | 'failed'
  summary?: ResolutionSummary
  error?: string
}

export interface MatchRunReport {
  documents: DocumentOutcome[]
  processed: number
  skipped: number
  failed: number
  fieldsTotal: number
  fieldsFailed: number
  duplicatedLabels: number
  newLabels: string[]
  ok: boolean
}

export interface VerifyReport {
  fileName: string
  totalFields: number
  uniqueLabels: number
  duplicatedLabels: DuplicatedLabel[]
  failed: number
  ok: boolean
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export async function listFieldFiles(dir: string): Promise<string[]> {
  let names: string[]
  try {
    names = await readdir(dir)
  } catch (err) {
    throw new FieldSourceError(dir, 'Fields directory not readable', { cause: err })
  }
  return names
    .filter(name => name.endsWith(FIELDS_SUFFIX))
    .sort()
    .map(name => join(dir, name))
}

/**
 * Resolves every fields document against one shared corpus. Each document
 * gets its own usage ledger; the corpus is saved after each one. A corpus
 * that cannot be saved aborts the run once in-flight documents settle.
 */
export async function runLabelMatching(options: MatchRunOptions): Promise<MatchRunReport> {
  const inputs = options.files?.length ? options.files : await listFieldFiles(options.fieldsDir)
  if (!inputs.length) log.warn('No fields documents to process', { dir: options.fieldsDir })

  const corpus = await loadCorpus(options.corpusPath)
  const resolver = new LabelResolver(corpus, options.oracle, options.resolver)
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY)
  // Once storage is gone, queued and in-flight documents write nothing
  const halt: { error?: CorpusStorageUnavailableError } = {}

  const abandoned = (source: string, outputPath: string): DocumentOutcome => {
    log.warn('Run aborted, document abandoned', { source })
    return { source, outputPath, status: 'failed', error: 'Run aborted: corpus storage unavailable' }
  }

  const processDocument = async (source: string): Promise<DocumentOutcome> => {
    const outputPath = standardizedPathFor(source, options.outputDir)
    if (halt.error) return abandoned(source, outputPath)
    if (!options.force && (await fileExists(outputPath))) {
      log.info('Already processed, skipping', { source, outputPath })
      return { source, outputPath, status: 'skipped' }
    }

    try {
      const document = await loadFieldsFile(source)
      log.info(`Processing ${document.fields.length} fields from ${document.fileName}`)
      const resolution = await resolver.resolveDocument(document)
      if (halt.error) return abandoned(source, outputPath)
      // Corpus first: a document whose labels were not saved has no output and reruns
      await corpus.exclusive(() => saveCorpus(options.corpusPath, corpus))
      await writeStandardizedOutput(outputPath, resolution)
      return { source, outputPath, status: 'resolved', summary: resolution.summary }
    } catch (err) {
      if (err instanceof CorpusStorageUnavailableError) {
        halt.error ??= err
        throw err
      }
      log.error('Document failed', { source, error: toErrorMessage(err) })
      return { source, outputPath, status: 'failed', error: toErrorMessage(err) }
    }
  }

  const settled = await Promise.allSettled(inputs.map(source => limit(() => processDocument(source))))
  if (halt.error) {
    log.error('Corpus storage unavailable, run aborted', { path: options.corpusPath })
    throw halt.error
  }
  const documents = settled.map(result => {
    if (result.status === 'rejected') throw result.reason
    return result.value
  })

  const report: MatchRunReport = {
    documents,
    processed: 0,
    skipped: 0,
    failed: 0,
    fieldsTotal: 0,
    fieldsFailed: 0,
    duplicatedLabels: 0,
    newLabels: corpus.appendedLabels(),
    ok: true,
  }
  for (const doc of documents) {
    if (doc.status === 'skipped') report.skipped++
    else if (doc.status === 'failed') report.failed++
    else report.processed++
    if (doc.summary) {
      report.fieldsTotal += doc.summary.totalFields
      report.fieldsFailed += doc.summary.failed
      report.duplicatedLabels += doc.summary.duplicatedLabels.length
    }
  }
  report.ok = report.failed === 0 && report.fieldsFailed === 0 && report.duplicatedLabels === 0

  log.info('Label matching finished', {
    processed: report.processed,
    skipped: report.skipped,
    failed: report.failed,
    newLabels: report.newLabels.length,
  })
  return report
}

/** Re-reads a standardized output and checks its labels are unique. */
export async function verifyStandardizedFile(filePath: string): Promise<VerifyReport> {
  const output = await readStandardizedFile(filePath)
  const resolved = output.fields.filter(field => field.status === 'resolved')
  const { unique, duplicated } = findDuplicateLabels(resolved.map(field => field.standardized_label))
  const failed = output.fields.length - resolved.length

  if (duplicated.length) {
    log.warn('Duplicate labels in standardized output', { path: filePath, duplicated })
  }
  return {
    fileName: output.filename,
    totalFields: output.fields.length,
    uniqueLabels: unique.length,
    duplicatedLabels: duplicated,
    failed,
    ok: duplicated.length === 0 && failed === 0,
  }
}
