import { z } from 'zod'

export const RISK_LEVELS = ['low', 'moderate', 'high'] as const

export type RiskLevel = (typeof RISK_LEVELS)[number]

// ── Request schemas (caller → server) ───────────────────

export const supplementStackEntrySchema = z.object({
  name: z.string().trim().min(1, 'Compound name is required'),
  dosage: z.string().trim().min(1).optional(),
  unit: z.string().trim().min(1).optional(),
  timing: z.string().trim().min(1).optional(),
})

export type SupplementStackEntry = z.infer<typeof supplementStackEntrySchema>

export const supplementStackSchema = z
  .array(supplementStackEntrySchema)
  .min(1, 'Stack must contain at least one compound')

export interface RiskScoreInput {
  severity: number
  /** Every other numeric key the caller sent, in the order given. */
  sub_scores: Record<string, number>
  factors?: string[]
}

const NAMED_SCORE_KEYS = new Set(['severity', 'factors'])

// Any key besides severity and factors is a named sub-score,
// e.g. { severity: 0.7, cumulative_load: 0.5, timing_conflicts: 0.8 }
export const riskScoreInputSchema = z
  .object({
    severity: z.number({ required_error: 'Severity score is required' }).min(0).max(1),
    factors: z.array(z.string().trim().min(1)).optional(),
  })
  .passthrough()
  .superRefine((scores, ctx) => {
    for (const [key, value] of Object.entries(scores)) {
      if (NAMED_SCORE_KEYS.has(key)) continue
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'Sub-score must be a finite number',
        })
      }
    }
  })
  .transform(({ severity, factors, ...rest }): RiskScoreInput => {
    const subScores: Record<string, number> = {}
    for (const [key, value] of Object.entries(rest)) {
      if (typeof value === 'number') subScores[key] = value
    }
    return { severity, sub_scores: subScores, factors }
  })

export const explainRiskRequestSchema = z.object({
  stack: supplementStackSchema,
  risk_scores: riskScoreInputSchema,
})

export type ExplainRiskRequest = z.infer<typeof explainRiskRequestSchema>

// ── Response schema (AI output validation) ──────────────

export const riskExplanationSchema = z
  .object({
    risk_level: z.enum(RISK_LEVELS),
    user_friendly_summary: z.string().regex(/\S/, 'Summary must not be blank'),
    warnings: z.array(z.string().min(1)),
    next_steps: z.array(z.string().min(1)),
    affected_compounds: z
      .array(z.string().min(1))
      .refine((names) => new Set(names).size === names.length, 'Compound names must not repeat'),
    confidence_score: z.number().min(0).max(1),
  })
  .strict()

export type RiskExplanation = z.infer<typeof riskExplanationSchema>

// ── Response constraint (sent to the provider) ──────────

/**
 * JSON Schema handed to the model as its output contract. Compound
 * names are enumerated so the provider can only reference the stack.
 * String length keywords are left out: strict structured output does
 * not accept them, and riskExplanationSchema enforces them afterwards.
 */
export function buildResponseJsonSchema(compoundNames: readonly string[]): Record<string, unknown> {
  const names = [...new Set(compoundNames)]

  return {
    type: 'object',
    additionalProperties: false,
    required: [
      'risk_level',
      'user_friendly_summary',
      'warnings',
      'next_steps',
      'affected_compounds',
      'confidence_score',
    ],
    properties: {
      risk_level: { type: 'string', enum: [...RISK_LEVELS] },
      user_friendly_summary: { type: 'string' },
      warnings: { type: 'array', items: { type: 'string' } },
      next_steps: { type: 'array', items: { type: 'string' } },
      affected_compounds: { type: 'array', items: { type: 'string', enum: names } },
      confidence_score: { type: 'number', minimum: 0, maximum: 1 },
    },
  }
}
