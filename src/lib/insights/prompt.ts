/**
 * Risk Explanation Prompt Helpers
 *
 * Prompt builder and output safety check for the supplement risk
 * explanation endpoint. All functions are pure and testable.
 */

import type { RiskScoreInput, SupplementStackEntry } from '@/lib/schemas/risk-explanation'

export const PROMPT_VERSION = '1.0.0'

// ── Safety ───────────────────────────────────────────────────────

export const EXPLANATION_BLOCKED_PHRASES = Object.freeze([
  // Medical claims
  'will cure',
  'cures your',
  'guaranteed to',
  // Medication directives
  'stop taking your medication',
  'stop taking your prescription',
  'instead of your medication',
  'replace your prescription',
  // False reassurance
  'completely safe',
  'no risk at all',
] as const)

export function isExplanationSafe(text: string): boolean {
  const lower = text.toLowerCase()
  return !EXPLANATION_BLOCKED_PHRASES.some((phrase) => lower.includes(phrase))
}

// ── Prompt Builder ───────────────────────────────────────────────

export const RISK_EXPLANATION_SYSTEM_PROMPT = `You are a supplement safety expert. You explain precomputed interaction risk scores for a user's supplement stack in plain, everyday language.

RULES YOU MUST FOLLOW:
- Base the explanation on the compounds and scores provided. Do not invent compounds.
- Map the overall severity (0.0 to 1.0) to risk_level: below 0.34 is "low", below 0.67 is "moderate", otherwise "high".
- user_friendly_summary: 2-4 direct sentences explaining what the scores mean for this stack.
- warnings: one discrete caution per entry. Leave the list empty when nothing needs caution.
- next_steps: one actionable recommendation per entry (timing, spacing doses, talking to a clinician).
- affected_compounds: only names exactly as they appear in the stack.
- confidence_score: your certainty in this explanation, from 0.0 to 1.0.
- NEVER diagnose, promise cures, or tell the user to stop prescribed medication.
- NEVER describe a combination as completely safe.`

export function formatStack(stack: readonly SupplementStackEntry[]): string {
  return stack
    .map((entry) => {
      const dose = entry.dosage ? [entry.dosage, entry.unit].filter(Boolean).join(' ') : 'N/A'
      return `- ${entry.name}: ${dose} (${entry.timing ?? 'unspecified'})`
    })
    .join('\n')
}

export function formatScores(scores: RiskScoreInput): string {
  const lines = [`- severity: ${scores.severity}`]
  for (const [key, value] of Object.entries(scores.sub_scores)) {
    lines.push(`- ${key}: ${value}`)
  }
  return lines.join('\n')
}

export function buildExplanationPrompt(
  stack: readonly SupplementStackEntry[],
  scores: RiskScoreInput
): string {
  const parts: string[] = []

  parts.push(`User's current stack (${stack.length} compound${stack.length !== 1 ? 's' : ''}):`)
  parts.push(formatStack(stack))
  parts.push('')
  parts.push('Risk assessment scores (0.0 = no risk, 1.0 = maximum risk):')
  parts.push(formatScores(scores))

  const factors = scores.factors ?? []
  if (factors.length > 0) {
    parts.push('')
    parts.push('Contributing factors:')
    for (const factor of factors) {
      parts.push(`- ${factor}`)
    }
  }

  parts.push('')
  parts.push('Provide a clear, actionable risk explanation for this supplement combination.')

  return parts.join('\n')
}
