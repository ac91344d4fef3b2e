import { loadInsightsConfig } from '@/lib/insights/config'

// Runs once when the server starts. A missing OPENAI_API_KEY stops startup
// instead of surfacing on the first request.
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return

  const config = loadInsightsConfig()
  console.log(`[insights] risk explanations enabled (model: ${config.model}, timeout: ${config.timeoutMs} ms)`)
}
