/**
 * Central place for LLM prompts.
 * Editing the wording is safe; the JSON shape is parsed by `oracle.ts`.
 */

import type { OracleRequest } from '../../types'

export const LABEL_DECISION_PROMPT = `You are a form field normalization expert.
You map each fillable field of a form to a standardized snake_case label that is shared across many forms.

Return ONLY valid JSON with this exact structure:
{
  "action": "keep | match_existing | create_new",
  "label": "string",
  "description": "string",
  "confidence": 0-100,
  "reasoning": "string"
}

Actions:
- "keep": the raw field name is already a clear, descriptive label. Set "label" to the raw name.
- "match_existing": one of the candidate labels means the same thing as this field. Set "label" to that candidate exactly.
- "create_new": no candidate fits. Invent a concise label and describe it in one sentence in "description".

Label rules:
- lowercase snake_case only: letters, digits and single underscores, starting with a letter.
- Use the semantic meaning of the field, e.g.:
  - "P1_WageEarnerSSN_FLD" -> "wage_earner_social_security_number"
  - "FirstNameofSpouse" -> "spouse_first_name"
- Never include page or index artifacts such as "P1_", "[0]" or "_FLD".
- When the field is one occurrence of a repeated block (a second employer, marriage number 3), keep the occurrence number in the label, e.g. "previous_marriage_3_when".

Formatting constraints:
- Output plain JSON only.
- No markdown.
- No comments.
- No trailing text.`

export const CREATE_ONLY_NOTE =
  'There are no existing labels yet. You must answer with "create_new".'

export function buildDecisionMessage(request: OracleRequest): string {
  const lines = [
    'Standardize this field:',
    '',
    `Field Name: ${request.rawName || 'Not available'}`,
    `Field Type: ${request.fieldKind}`,
    `Context: ${request.fieldContext || 'Not available'}`,
    `Field name looks descriptive: ${request.rawNameDescriptive ? 'yes' : 'no'}`,
    '',
  ]

  if (request.createOnly) {
    lines.push(CREATE_ONLY_NOTE)
  } else if (request.candidateLabels.length) {
    lines.push('Candidate labels (best first):')
    for (const label of request.candidateLabels) lines.push(`- ${label}`)
  } else {
    lines.push('No candidate labels matched this field.')
  }

  if (request.conflictNote) {
    lines.push('', `IMPORTANT: ${request.conflictNote}`)
  }
  return lines.join('\n')
}
