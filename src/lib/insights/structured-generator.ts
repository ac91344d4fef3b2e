/**
 * Structured Generation Abstraction
 *
 * The explainer only needs "generate JSON matching this schema". Each
 * provider adapter turns that into its own request format and maps its
 * failures onto ExplanationUnavailableError.
 */

export interface StructuredRequest {
  /** Schema name reported to the provider. */
  name: string
  model: string
  system: string
  prompt: string
  jsonSchema: Record<string, unknown>
  temperature: number
  signal?: AbortSignal
}

export interface StructuredGenerator {
  /** Resolves with the decoded JSON payload, unvalidated. */
  generateStructured(request: StructuredRequest): Promise<unknown>
}
