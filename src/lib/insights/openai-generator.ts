import OpenAI from 'openai'
import type { StructuredGenerator, StructuredRequest } from './structured-generator'
import { ExplanationUnavailableError, RateLimitedError } from './errors'

export interface OpenAIGeneratorOptions {
  /** Per-request timeout passed to the SDK. */
  timeoutMs: number
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null
  const seconds = Number(value)
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000)
  const date = Date.parse(value)
  if (Number.isNaN(date)) return null
  return Math.max(0, date - Date.now())
}

function toUnavailableError(err: unknown): ExplanationUnavailableError {
  if (err instanceof ExplanationUnavailableError) return err

  // Subclasses first: timeout and abort both extend the connection/API error types
  if (err instanceof OpenAI.APIUserAbortError) {
    return new ExplanationUnavailableError('aborted', 'OpenAI request was aborted', { cause: err })
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new ExplanationUnavailableError('timeout', 'OpenAI request timed out', { cause: err })
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new ExplanationUnavailableError('network', 'Could not reach OpenAI', { cause: err })
  }
  if (err instanceof OpenAI.RateLimitError) {
    return new RateLimitedError('OpenAI rate limit or quota exceeded', {
      retryAfterMs: parseRetryAfter(err.headers?.get('retry-after') ?? null),
      cause: err,
    })
  }
  if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
    return new ExplanationUnavailableError('authentication', 'OpenAI rejected the API credentials', {
      status: err.status,
      cause: err,
    })
  }
  if (err instanceof OpenAI.APIError) {
    return new ExplanationUnavailableError('upstream_error', `OpenAI API error: ${err.message}`, {
      status: err.status ?? null,
      cause: err,
    })
  }

  const message = err instanceof Error ? err.message : 'Unknown error'
  return new ExplanationUnavailableError('upstream_error', `OpenAI call failed: ${message}`, { cause: err })
}

/**
 * StructuredGenerator backed by Chat Completions structured outputs.
 * Retries for transient failures are left to the client's maxRetries.
 */
export function createOpenAIGenerator(
  client: OpenAI,
  options: OpenAIGeneratorOptions
): StructuredGenerator {
  return {
    async generateStructured(request: StructuredRequest): Promise<unknown> {
      const completion = await client.chat.completions
        .create(
          {
            model: request.model,
            temperature: request.temperature,
            response_format: {
              type: 'json_schema',
              json_schema: {
                name: request.name,
                strict: true,
                schema: request.jsonSchema,
              },
            },
            messages: [
              { role: 'system', content: request.system },
              { role: 'user', content: request.prompt },
            ],
          },
          { signal: request.signal, timeout: options.timeoutMs }
        )
        .catch((err: unknown) => {
          throw toUnavailableError(err)
        })

      const choice = completion.choices[0]
      if (choice?.message.refusal) {
        throw new ExplanationUnavailableError('refused', `Model refused: ${choice.message.refusal}`)
      }
      if (choice?.finish_reason === 'length') {
        throw new ExplanationUnavailableError('invalid_response', 'AI response was truncated')
      }

      const raw = choice?.message.content
      if (!raw) {
        throw new ExplanationUnavailableError('invalid_response', 'AI returned empty response')
      }

      try {
        return JSON.parse(raw)
      } catch (err) {
        throw new ExplanationUnavailableError('invalid_response', 'AI returned invalid JSON', { cause: err })
      }
    },
  }
}
