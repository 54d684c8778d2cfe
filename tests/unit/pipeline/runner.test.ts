import { access, copyFile, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { loadCorpus } from '../../../src/lib/corpus/store'
import { readStandardizedFile } from '../../../src/lib/pipeline/fields'
import { listFieldFiles, runLabelMatching, verifyStandardizedFile } from '../../../src/lib/pipeline/runner'
import { CorpusStorageUnavailableError, FieldSourceError } from '../../../src/lib/utils/errors'
import { ScriptedOracle, create, match } from '../../mocks/oracle'

const fixture = fileURLToPath(new URL('../../fixtures/marriage_form_fields.json', import.meta.url))

let dir: string
let fieldsDir: string
let outputDir: string
let corpusPath: string

function firstCandidateOracle(): ScriptedOracle {
  return new ScriptedOracle([], request =>
    request.candidateLabels.length ? match(request.candidateLabels[0]) : create(request.fieldContext)
  )
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'label-run-'))
  fieldsDir = join(dir, 'fields')
  outputDir = join(dir, 'out')
  corpusPath = join(dir, 'labels', 'label_list.json')
  await mkdir(fieldsDir)
  await mkdir(join(dir, 'labels'))
  await copyFile(fixture, join(fieldsDir, 'marriage_form_fields.json'))
  await writeFile(
    corpusPath,
    JSON.stringify({
      standardized_field_labels: ['spouse_name', 'previous_marriage_1_when', 'previous_marriage_2_when'],
    })
  )
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('runLabelMatching', () => {
  it('resolves a document, writes its result and grows the corpus', async () => {
    const report = await runLabelMatching({ fieldsDir, outputDir, corpusPath, oracle: firstCandidateOracle() })

    expect(report).toMatchObject({ processed: 1, skipped: 0, failed: 0, fieldsTotal: 4, ok: true })
    expect(report.newLabels).toEqual(['married_checkbox'])

    const output = await readStandardizedFile(join(outputDir, 'marriage_form_standardized.json'))
    expect(output.fields.map(field => field.standardized_label)).toEqual([
      'spouse_name',
      'married_checkbox',
      'previous_marriage_1_when',
      'previous_marriage_2_when',
    ])
    expect((await loadCorpus(corpusPath)).labels()).toEqual([
      'spouse_name',
      'previous_marriage_1_when',
      'previous_marriage_2_when',
      'married_checkbox',
    ])
  })

  it('skips processed documents unless forced', async () => {
    await runLabelMatching({ fieldsDir, outputDir, corpusPath, oracle: firstCandidateOracle() })

    const oracle = firstCandidateOracle()
    const skipped = await runLabelMatching({ fieldsDir, outputDir, corpusPath, oracle })
    expect(skipped).toMatchObject({ processed: 0, skipped: 1 })
    expect(oracle.requests).toHaveLength(0)

    const forced = await runLabelMatching({ fieldsDir, outputDir, corpusPath, oracle, force: true })
    expect(forced).toMatchObject({ processed: 1, skipped: 0, newLabels: [] })
    expect(oracle.requests).toHaveLength(4)
  })

  it('reports a broken document without stopping the others', async () => {
    await writeFile(join(fieldsDir, 'broken_fields.json'), '{')

    const report = await runLabelMatching({
      fieldsDir,
      outputDir,
      corpusPath,
      oracle: firstCandidateOracle(),
      concurrency: 2,
    })

    expect(report.documents.map(doc => doc.status)).toEqual(['failed', 'resolved'])
    expect(report.documents[0].error).toContain('Fields file is not valid JSON')
    expect(report.ok).toBe(false)
  })

  it('aborts without writing results when the corpus cannot be saved', async () => {
    await copyFile(fixture, join(fieldsDir, 'census_fields.json'))
    // A directory where the temp file goes makes every save attempt fail
    await mkdir(`${corpusPath}.${process.pid}.tmp`)
    const oracle = firstCandidateOracle()

    await expect(
      runLabelMatching({ fieldsDir, outputDir, corpusPath, oracle, concurrency: 1 })
    ).rejects.toBeInstanceOf(CorpusStorageUnavailableError)

    expect(oracle.requests).toHaveLength(4)
    await expect(access(join(outputDir, 'census_standardized.json'))).rejects.toThrow()
    await expect(access(join(outputDir, 'marriage_form_standardized.json'))).rejects.toThrow()
    expect((await loadCorpus(corpusPath)).labels()).toEqual([
      'spouse_name',
      'previous_marriage_1_when',
      'previous_marriage_2_when',
    ])
  })

  it('processes only the given files', async () => {
    await copyFile(fixture, join(fieldsDir, 'other_fields.json'))

    const report = await runLabelMatching({
      files: [join(fieldsDir, 'other_fields.json')],
      fieldsDir,
      outputDir,
      corpusPath,
      oracle: firstCandidateOracle(),
    })

    expect(report.documents.map(doc => doc.outputPath)).toEqual([join(outputDir, 'other_standardized.json')])
  })
})

describe('listFieldFiles', () => {
  it('lists fields documents in name order', async () => {
    await writeFile(join(fieldsDir, 'a_fields.json'), '{}')
    await writeFile(join(fieldsDir, 'notes.txt'), '')
    expect(await listFieldFiles(fieldsDir)).toEqual([
      join(fieldsDir, 'a_fields.json'),
      join(fieldsDir, 'marriage_form_fields.json'),
    ])
  })

  it('fails on a missing directory', async () => {
    await expect(listFieldFiles(join(dir, 'nope'))).rejects.toBeInstanceOf(FieldSourceError)
  })
})

describe('verifyStandardizedFile', () => {
  it('passes a freshly written result', async () => {
    await runLabelMatching({ fieldsDir, outputDir, corpusPath, oracle: firstCandidateOracle() })

    expect(await verifyStandardizedFile(join(outputDir, 'marriage_form_standardized.json'))).toEqual({
      fileName: 'marriage_form.pdf',
      totalFields: 4,
      uniqueLabels: 4,
      duplicatedLabels: [],
      failed: 0,
      ok: true,
    })
  })

  it('flags duplicated labels', async () => {
    const path = join(dir, 'dup_standardized.json')
    const fieldOf = (index: number, label: string) => ({
      field_index: index,
      original_field_name: `Text${index}`,
      standardized_label: label,
      action: 'match_existing',
      status: 'resolved',
      candidates: [],
      attempts: 1,
    })
    await writeFile(
      path,
      JSON.stringify({
        filename: 'dup.pdf',
        generated_at: '2025-01-01T00:00:00.000Z',
        summary: {
          total_fields: 3,
          kept: 0,
          matched: 3,
          created: 0,
          failed: 0,
          unique_labels: 1,
          duplicated_labels: [],
        },
        fields: [fieldOf(0, 'city'), fieldOf(1, 'city'), fieldOf(2, 'state')],
      })
    )

    const report = await verifyStandardizedFile(path)
    expect(report.duplicatedLabels).toEqual([{ label: 'city', count: 2 }])
    expect(report.ok).toBe(false)
  })
})
