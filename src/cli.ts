#!/usr/bin/env node
import { loadConfig, requireLLMConfig } from './lib/config/env'
import { cleanCorpusFile } from './lib/corpus/store'
import { createLLMOracle } from './lib/llm/oracle'
import { runLabelMatching, verifyStandardizedFile } from './lib/pipeline/runner'
import { formatSummary } from './lib/resolution/report'
import { logger } from './lib/utils/logger'
import { toErrorMessage } from './lib/utils/errors'

/**
 * Usage:
 *   npm start match [files...] [--force]   Resolve labels for fields documents
 *   npm start clean                        Normalize the label corpus file
 *   npm start verify <files...>            Check standardized outputs for duplicates
 */

const COMMANDS = ['match', 'clean', 'verify', 'help']

function printHelp(): void {
  console.log(`
Form label normalizer

USAGE:
  npm start <command> [options]

COMMANDS:
  match [files...] [--force]   Resolve every *_fields.json in FIELDS_DIR (or the given files)
                               and write *_standardized.json to OUTPUT_DIR.
                               Already processed documents are skipped unless --force.
  clean                        Convert the label corpus at LABEL_CORPUS_PATH to clean
                               snake_case, keeping a _backup.json copy.
  verify <files...>            Report duplicated labels in standardized outputs.
  help                         Show this help message

ENVIRONMENT:
  Configuration is loaded from .env (see .env.example)
    - LLM_PROVIDER (gemini | anthropic | openai), LLM_MODEL, LLM_API_KEY
    - ORACLE_TIMEOUT_MS, RESOLVER_MAX_RETRIES, SIMILARITY_TOP_K, DOCUMENT_CONCURRENCY
    - LABEL_CORPUS_PATH, FIELDS_DIR, OUTPUT_DIR, LOG_LEVEL
`)
}

async function match(files: string[], force: boolean): Promise<boolean> {
  const config = loadConfig()
  const oracle = createLLMOracle(requireLLMConfig(config))

  const report = await runLabelMatching({
    files,
    force,
    oracle,
    fieldsDir: config.paths.fieldsDir,
    outputDir: config.paths.outputDir,
    corpusPath: config.paths.corpus,
    concurrency: config.concurrency,
    resolver: {
      maxRetries: config.resolver.maxRetries,
      topK: config.resolver.topK,
      oracleTimeoutMs: config.llm.timeoutMs,
    },
  })

  for (const doc of report.documents) {
    if (doc.summary) console.log(`\n${formatSummary(doc.summary)}`)
    else if (doc.status === 'failed') console.log(`\n${doc.source}\n  FAILED ${doc.error ?? ''}`)
  }
  console.log(`
Documents processed: ${report.processed}
Documents skipped:   ${report.skipped}
Documents failed:    ${report.failed}
Fields resolved:     ${report.fieldsTotal - report.fieldsFailed}/${report.fieldsTotal}
New labels:          ${report.newLabels.length}`)
  return report.ok
}

async function clean(): Promise<boolean> {
  const config = loadConfig()
  const report = await cleanCorpusFile(config.paths.corpus)

  console.log(`\nOriginal labels:    ${report.original}`)
  console.log(`Cleaned labels:     ${report.cleaned}`)
  console.log(`Converted:          ${report.conversions.length}`)
  console.log(`Duplicates removed: ${report.duplicatesRemoved}`)
  for (const item of report.conversions) {
    console.log(`  ${item.original} -> ${item.cleaned} (${item.reason})`)
  }
  for (const item of report.problematic) {
    console.log(`  SKIPPED ${item.original}: ${item.reason}`)
  }
  return report.problematic.length === 0
}

async function verify(files: string[]): Promise<boolean> {
  let ok = true
  for (const file of files) {
    const report = await verifyStandardizedFile(file)
    console.log(`\n${report.fileName}`)
    console.log(`  Fields:        ${report.totalFields}`)
    console.log(`  Unique labels: ${report.uniqueLabels}`)
    console.log(`  Failed:        ${report.failed}`)
    for (const dup of report.duplicatedLabels) {
      console.log(`  WARNING duplicate label ${dup.label} (${dup.count}x)`)
    }
    ok = ok && report.ok
  }
  return ok
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)
  const command = args[0]

  if (!command || command === 'help') {
    printHelp()
    return
  }

  const rest = args.slice(1)
  const files = rest.filter(arg => !arg.startsWith('--'))
  let ok: boolean

  switch (command) {
    case 'match':
      ok = await match(files, rest.includes('--force'))
      break
    case 'clean':
      ok = await clean()
      break
    case 'verify':
      if (!files.length) {
        console.error('Error: at least one standardized file is required')
        console.error('Usage: npm start verify <files...>')
        process.exitCode = 1
        return
      }
      ok = await verify(files)
      break
    default:
      console.error(`Unknown command: ${command}`)
      console.error(`Valid commands: ${COMMANDS.join(', ')}`)
      printHelp()
      process.exitCode = 1
      return
  }

  if (!ok) process.exitCode = 1
}

main().catch((err: unknown) => {
  logger.error('Command failed', { error: toErrorMessage(err) })
  console.error(`\nCommand failed: ${toErrorMessage(err)}`)
  process.exitCode = 1
})
