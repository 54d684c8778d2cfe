const LABEL_PATTERN = /^[a-z][a-z0-9_]*$/
const MIN_LABEL_LENGTH = 2
const MAX_LABEL_LENGTH = 80

// Exact matches only
const SEMANTIC_MAP: Record<string, string> = {
  wage_earner_ssn: 'wage_earner_social_security_number',
  ssn: 'social_security_number',
  spouse_ssn: 'spouse_social_security_number',
  wage_earner: 'wage_earner_name',
  spouse: 'spouse_name',
}

const GIBBERISH_INDICATORS = ['topmostSubform', 'BodyPage', '[0]', '[1]', '[2]', '.', 'FLD[', 'CB[']

const DESCRIPTIVE_PATTERNS = [
  'first_name', 'last_name', 'middle_name', 'full_name', 'city', 'state', 'zip_code',
  'address', 'phone', 'email', 'date', 'signature', 'ssn', 'social_security',
  'yes', 'no', 'checkbox', 'check',
]

export interface LabelValidation {
  valid: boolean
  reason: string
}

export function validateLabelFormat(label: string): LabelValidation {
  if (label !== label.toLowerCase()) return { valid: false, reason: 'Label must be lowercase' }
  if (label.includes(' ')) return { valid: false, reason: 'Use underscores instead of spaces' }
  if (!LABEL_PATTERN.test(label)) return { valid: false, reason: 'Invalid characters' }
  if (label.length < MIN_LABEL_LENGTH || label.length > MAX_LABEL_LENGTH) {
    return { valid: false, reason: 'Invalid length' }
  }
  if (label.includes('__') || label.endsWith('_')) {
    return { valid: false, reason: 'Avoid underscores at edges or double underscores' }
  }
  return { valid: true, reason: 'Valid' }
}

export function toSnakeCase(text: string): string {
  return text
    .replace(/[^\w\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .toLowerCase()
    .trim()
    .replace(/ /g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
}

/**
 * Coerces a proposed label into snake_case, expands known abbreviations and
 * suffixes checkbox labels with `_checkbox`.
 */
export function autoFixLabel(label: string, options: { checkbox?: boolean } = {}): string {
  let fixed = label
    .trim()
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase()
    .replace(/_+/g, '_')

  if (Object.hasOwn(SEMANTIC_MAP, fixed)) fixed = SEMANTIC_MAP[fixed]

  if (options.checkbox && fixed && !fixed.endsWith('_checkbox')) {
    fixed += '_checkbox'
  }
  return fixed
}

export interface CleanedLabel {
  label: string
  ok: boolean
  reason: string
}

export function cleanLabel(label: string): CleanedLabel {
  if (validateLabelFormat(label).valid) return { label, ok: true, reason: 'Already clean' }

  const cleaned = toSnakeCase(label)
  if (!cleaned) return { label, ok: false, reason: 'Empty after cleaning' }

  const check = validateLabelFormat(cleaned)
  if (!check.valid) {
    return { label: cleaned, ok: false, reason: `${check.reason} after cleaning: ${cleaned}` }
  }
  return { label: cleaned, ok: true, reason: 'Converted to snake_case' }
}

/** Readable field names (as opposed to XFA paths) are candidates for KEEP. */
export function isDescriptiveName(rawName: string): boolean {
  if (GIBBERISH_INDICATORS.some(indicator => rawName.includes(indicator))) return false
  const lower = rawName.toLowerCase()
  return DESCRIPTIVE_PATTERNS.some(pattern => lower.includes(pattern))
}

export function humanizeRawName(rawName: string): string {
  const segment = rawName.split('.').filter(Boolean).pop() ?? rawName
  const humanized = segment
    .replace(/\[\d+\]/g, '')
    .replace(/^P\d+_/i, '')
    .replace(/_(FLD|CB\d*)$/i, '')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/[_-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
  return humanized || rawName.trim()
}
