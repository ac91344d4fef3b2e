/**
 * Supplement Risk Explanation
 *
 * Validates a stack and its precomputed risk scores, asks a structured
 * generator for a schema-constrained explanation, and validates what
 * comes back. A provider failure always surfaces as
 * ExplanationUnavailableError, never as a low-risk result.
 */

import {
  buildResponseJsonSchema,
  explainRiskRequestSchema,
  riskExplanationSchema,
  type RiskExplanation,
  type RiskScoreInput,
  type SupplementStackEntry,
} from '@/lib/schemas/risk-explanation'
import type { StructuredGenerator } from './structured-generator'
import { ExplanationUnavailableError, InvalidInputError } from './errors'
import { RISK_EXPLANATION_SYSTEM_PROMPT, buildExplanationPrompt, isExplanationSafe } from './prompt'

export const RESPONSE_SCHEMA_NAME = 'risk_explanation'

export interface RiskExplainerOptions {
  generator: StructuredGenerator
  model: string
  timeoutMs: number
  temperature?: number
}

export interface ExplainRiskOptions {
  /** Aborts the outbound call, e.g. when the client disconnects. */
  signal?: AbortSignal
}

export interface RiskExplainer {
  readonly model: string
  explainRisk(stack: unknown, riskScores: unknown, options?: ExplainRiskOptions): Promise<RiskExplanation>
}

// ── Helpers ──────────────────────────────────────────────────────

function parseInput(stack: unknown, riskScores: unknown): {
  stack: SupplementStackEntry[]
  riskScores: RiskScoreInput
} {
  const parsed = explainRiskRequestSchema.safeParse({ stack, risk_scores: riskScores })
  if (!parsed.success) {
    throw new InvalidInputError(parsed.error.issues)
  }
  return { stack: parsed.data.stack, riskScores: parsed.data.risk_scores }
}

export function validateExplanation(payload: unknown, compoundNames: readonly string[]): RiskExplanation {
  const validated = riskExplanationSchema.safeParse(payload)
  if (!validated.success) {
    const fields = validated.error.issues.map((i) => i.path.join('.') || 'root').join(', ')
    throw new ExplanationUnavailableError('invalid_response', `AI output failed validation: ${fields}`, {
      cause: validated.error,
    })
  }

  const known = new Set(compoundNames)
  const unknown = validated.data.affected_compounds.filter((name) => !known.has(name))
  if (unknown.length > 0) {
    throw new ExplanationUnavailableError(
      'invalid_response',
      `AI output references compounds outside the stack: ${unknown.join(', ')}`
    )
  }

  const allText = [
    validated.data.user_friendly_summary,
    ...validated.data.warnings,
    ...validated.data.next_steps,
  ].join(' ')
  if (!isExplanationSafe(allText)) {
    throw new ExplanationUnavailableError('unsafe_content', 'AI output contained blocked phrasing')
  }

  return validated.data
}

/**
 * Runs `task` with a signal that aborts after `timeoutMs` or when the
 * caller's signal fires. Rejects at that moment even if the task never
 * settles.
 */
async function withDeadline<T>(
  timeoutMs: number,
  callerSignal: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController()
  let rejectDeadline: (reason: ExplanationUnavailableError) => void = () => {}
  const deadline = new Promise<never>((_, reject) => {
    rejectDeadline = reject
  })

  const timer = setTimeout(() => {
    controller.abort()
    rejectDeadline(new ExplanationUnavailableError('timeout', `Explanation timed out after ${timeoutMs} ms`))
  }, timeoutMs)

  const onCallerAbort = () => {
    controller.abort()
    rejectDeadline(new ExplanationUnavailableError('aborted', 'Explanation request was aborted'))
  }
  if (callerSignal?.aborted) onCallerAbort()
  else callerSignal?.addEventListener('abort', onCallerAbort, { once: true })

  try {
    return await Promise.race([task(controller.signal), deadline])
  } finally {
    clearTimeout(timer)
    callerSignal?.removeEventListener('abort', onCallerAbort)
  }
}

// ── Explainer ────────────────────────────────────────────────────

export function createRiskExplainer(options: RiskExplainerOptions): RiskExplainer {
  const { generator, model, timeoutMs } = options
  const temperature = options.temperature ?? 0.2

  return {
    model,

    async explainRisk(stack, riskScores, callOptions = {}) {
      const input = parseInput(stack, riskScores)
      const compoundNames = input.stack.map((entry) => entry.name)

      const payload = await withDeadline(timeoutMs, callOptions.signal, (signal) =>
        generator.generateStructured({
          name: RESPONSE_SCHEMA_NAME,
          model,
          system: RISK_EXPLANATION_SYSTEM_PROMPT,
          prompt: buildExplanationPrompt(input.stack, input.riskScores),
          jsonSchema: buildResponseJsonSchema(compoundNames),
          temperature,
          signal,
        })
      ).catch((err: unknown) => {
        if (err instanceof ExplanationUnavailableError) throw err
        const message = err instanceof Error ? err.message : 'Unknown error'
        throw new ExplanationUnavailableError('upstream_error', `Explanation provider failed: ${message}`, {
          cause: err,
        })
      })

      return validateExplanation(payload, compoundNames)
    },
  }
}
