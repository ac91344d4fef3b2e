import { z } from 'zod'
import { ConfigurationError } from './errors'

export const DEFAULT_MODEL = 'gpt-4.1-mini'

const envSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1),
  INSIGHTS_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  INSIGHTS_TIMEOUT_MS: z.coerce.number().int().min(500).max(60_000).default(8_000),
  INSIGHTS_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  INSIGHTS_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.2),
})

export interface InsightsConfig {
  apiKey: string
  model: string
  timeoutMs: number
  maxRetries: number
  temperature: number
}

type Env = Record<string, string | undefined>

/**
 * Reads the insights settings from the environment. Empty strings are
 * treated as unset so defaults apply.
 */
export function loadInsightsConfig(env: Env = process.env): InsightsConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )
  const parsed = envSchema.safeParse(present)

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((i) => String(i.path[0])))]
    const missing = keys.filter((k) => !(k in present))
    const message = missing.length
      ? `Missing required env vars: ${missing.join(', ')}`
      : `Invalid env vars: ${keys.join(', ')}`
    throw new ConfigurationError(message, missing)
  }

  return {
    apiKey: parsed.data.OPENAI_API_KEY,
    model: parsed.data.INSIGHTS_MODEL,
    timeoutMs: parsed.data.INSIGHTS_TIMEOUT_MS,
    maxRetries: parsed.data.INSIGHTS_MAX_RETRIES,
    temperature: parsed.data.INSIGHTS_TEMPERATURE,
  }
}
