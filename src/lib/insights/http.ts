import { NextResponse } from 'next/server'
import type { RiskExplainer } from './explain-risk'
import {
  ConfigurationError,
  ExplanationUnavailableError,
  InvalidInputError,
  RateLimitedError,
} from './errors'
import { PROMPT_VERSION } from './prompt'

export const UNAVAILABLE_MESSAGE = 'Explanation is currently unavailable'

function unavailableResponse(err: ExplanationUnavailableError): NextResponse {
  const headers: Record<string, string> = {}
  if (err instanceof RateLimitedError && err.retryAfterMs !== null) {
    headers['retry-after'] = String(Math.max(1, Math.ceil(err.retryAfterMs / 1000)))
  }

  return NextResponse.json(
    { error: UNAVAILABLE_MESSAGE, reason: err.reason },
    { status: 503, headers }
  )
}

// Body: { stack, risk_scores }
export async function handleExplainRisk(
  request: Request,
  getExplainer: () => RiskExplainer
): Promise<NextResponse> {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    return NextResponse.json({ error: 'Invalid JSON body' }, { status: 400 })
  }

  const stack = typeof body === 'object' && body !== null && 'stack' in body ? body.stack : undefined
  const riskScores =
    typeof body === 'object' && body !== null && 'risk_scores' in body ? body.risk_scores : undefined

  try {
    const explainer = getExplainer()
    const explanation = await explainer.explainRisk(stack, riskScores, { signal: request.signal })

    return NextResponse.json(explanation, {
      headers: {
        'x-explanation-model': explainer.model,
        'x-prompt-version': PROMPT_VERSION,
      },
    })
  } catch (err) {
    if (err instanceof InvalidInputError) {
      return NextResponse.json(
        { error: 'Validation failed', details: err.issues },
        { status: 422 }
      )
    }

    if (err instanceof RateLimitedError) {
      console.warn('[explain-risk] rate limited:', err.message)
      return unavailableResponse(err)
    }

    if (err instanceof ExplanationUnavailableError) {
      console.error(`[explain-risk] explanation unavailable (${err.reason}):`, err.message)
      return unavailableResponse(err)
    }

    if (err instanceof ConfigurationError) {
      console.error('[explain-risk] not configured:', err.message)
      return NextResponse.json(
        { error: 'Risk explanations are not configured' },
        { status: 500 }
      )
    }

    console.error('[explain-risk] unexpected failure:', err instanceof Error ? err.message : err)
    return NextResponse.json(
      { error: 'Internal server error' },
      { status: 500 }
    )
  }
}
