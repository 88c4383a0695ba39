/**
 * TextGenerator interface: the single capability evaluators and statement
 * sources need from a language model backend.
 */

export interface GenerateRequest {
  model: string
  prompt: string
  temperature: number
  /** Aborts the in-flight request */
  signal?: AbortSignal
}

export interface TextGenerator {
  /**
   * Complete a prompt and return the raw model text.
   * @throws {GenerationError} on transport failure, timeout, abort or a malformed response
   */
  generate(request: GenerateRequest): Promise<string>
}
