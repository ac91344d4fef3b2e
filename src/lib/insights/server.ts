import OpenAI from 'openai'
import { loadInsightsConfig, type InsightsConfig } from './config'
import { createOpenAIGenerator } from './openai-generator'
import { createRiskExplainer, type RiskExplainer } from './explain-risk'

/**
 * Splits the explanation deadline across the first attempt and each
 * retry, so a timed-out attempt still leaves room for the next one.
 */
export function attemptTimeoutMs(timeoutMs: number, maxRetries: number): number {
  return Math.max(1, Math.floor(timeoutMs / (maxRetries + 1)))
}

export function createRiskExplainerFromConfig(config: InsightsConfig): RiskExplainer {
  const perAttempt = attemptTimeoutMs(config.timeoutMs, config.maxRetries)
  const client = new OpenAI({
    apiKey: config.apiKey,
    maxRetries: config.maxRetries,
    timeout: perAttempt,
  })

  return createRiskExplainer({
    generator: createOpenAIGenerator(client, { timeoutMs: perAttempt }),
    model: config.model,
    timeoutMs: config.timeoutMs,
    temperature: config.temperature,
  })
}

let explainer: RiskExplainer | null = null

/**
 * Process-wide explainer for route handlers. Built on first use from the
 * environment; instrumentation.ts loads the same config at startup so a
 * missing key fails there first.
 */
export function getRiskExplainer(): RiskExplainer {
  explainer ??= createRiskExplainerFromConfig(loadInsightsConfig())
  return explainer
}
