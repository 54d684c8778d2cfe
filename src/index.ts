export * from './types'
export * from './lib/utils/errors'
export { createLogger } from './lib/utils/logger'
export { loadConfig, requireLLMConfig, DEFAULT_MODELS } from './lib/config/env'
export type { AppConfig } from './lib/config/env'
export {
  autoFixLabel,
  cleanLabel,
  humanizeRawName,
  isDescriptiveName,
  toSnakeCase,
  validateLabelFormat,
} from './lib/labels/format'
export { LabelCorpus } from './lib/corpus/corpus'
export { cleanCorpusFile, loadCorpus, saveCorpus } from './lib/corpus/store'
export type { CorpusCleanReport } from './lib/corpus/store'
export { SimilarityIndex } from './lib/matching/similarity'
export { VariationResolver } from './lib/matching/variations'
export { detectRepeatingCue } from './lib/matching/cues'
export { UsageTracker } from './lib/resolution/usage'
export { LabelResolver } from './lib/resolution/resolver'
export type { ResolverOptions } from './lib/resolution/resolver'
export { findDuplicateLabels, formatSummary, summarizeResolutions } from './lib/resolution/report'
export { createLLMOracle, parseOracleResponse } from './lib/llm/oracle'
export { callLLM } from './lib/llm/index'
export { loadFieldsFile, parseFieldsDocument, writeStandardizedOutput } from './lib/pipeline/fields'
export { runLabelMatching, verifyStandardizedFile } from './lib/pipeline/runner'
export type { MatchRunOptions, MatchRunReport, VerifyReport } from './lib/pipeline/runner'
