export type FieldKind =
  | 'text'
  | 'checkbox'
  | 'radio'
  | 'combobox'
  | 'listbox'
  | 'signature'
  | 'button'
  | 'date'
  | 'unknown';

export interface FieldRect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** One fillable element of a source document, in extraction order. */
export interface FormField {
  index: number;
  rawName: string;
  kind: FieldKind;
  context: string;
  sectionHeading?: string;
  page?: number;
  rect?: FieldRect;
}

export interface FieldDocument {
  fileName: string;
  fields: FormField[];
}

// ── Corpus ──────────────────────────────────────────────────

export interface LabelEntry {
  label: string;
  description?: string;
  examples: string[];
}

export interface RankedLabel {
  label: string;
  score: number;
}

export interface LabelVariation {
  label: string;
  index: number;
  /** Token position of the integer inside the label */
  position: number;
  /** The label's tokens with the integer removed, joined by `_` */
  stripped: string;
  exact: boolean;
}

export interface ProposedVariation {
  label: string;
  index: number;
  synthesized: boolean;
}

export interface VariationLookup {
  base: string;
  variations: LabelVariation[];
  labels: Set<string>;
  proposed?: ProposedVariation;
}

export interface RepeatingCue {
  base: string;
  index: number;
  source: 'numbered' | 'ordinal';
}

// ── Decisions ───────────────────────────────────────────────

export type DecisionAction = 'keep' | 'match_existing' | 'create_new';

export type Decision =
  | { action: 'keep'; label: string }
  | { action: 'match_existing'; label: string }
  | { action: 'create_new'; label: string; description?: string };

export interface OracleRequest {
  fieldContext: string;
  rawName: string;
  fieldKind: FieldKind;
  rawNameDescriptive: boolean;
  candidateLabels: string[];
  conflictNote?: string;
  createOnly: boolean;
}

export interface OracleResponse {
  action: DecisionAction;
  label: string;
  description?: string;
  confidence?: number;
  reasoning?: string;
}

/**
 * The external reasoning step. Implementations know nothing about
 * uniqueness; the resolver enforces it on every response.
 */
export interface DecisionOracle {
  decide(request: OracleRequest, signal?: AbortSignal): Promise<OracleResponse>;
}

export type ResolutionState =
  | 'analyzing'
  | 'candidates_gathered'
  | 'oracle_queried'
  | 'validated'
  | 'committed';

export interface ResolvedField {
  status: 'resolved';
  fieldIndex: number;
  rawName: string;
  label: string;
  action: DecisionAction;
  description?: string;
  candidates: string[];
  attempts: number;
  synthesized: boolean;
}

export interface FailedField {
  status: 'failed';
  fieldIndex: number;
  rawName: string;
  error: string;
  candidates: string[];
  attempts: number;
}

export type FieldResolution = ResolvedField | FailedField;

// ── Reporting ───────────────────────────────────────────────

export interface DuplicatedLabel {
  label: string;
  count: number;
}

export interface ResolutionSummary {
  fileName: string;
  totalFields: number;
  kept: number;
  matched: number;
  created: number;
  failed: number;
  synthesized: number;
  uniqueLabels: string[];
  duplicatedLabels: DuplicatedLabel[];
  newLabels: string[];
  failures: Array<{ fieldIndex: number; rawName: string; error: string }>;
  ok: boolean;
}

export interface DocumentResolution {
  fileName: string;
  results: FieldResolution[];
  summary: ResolutionSummary;
}

// ── LLM ─────────────────────────────────────────────────────

export type LLMProvider = 'anthropic' | 'openai' | 'gemini';

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
}
