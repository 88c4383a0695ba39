/**
 * OllamaGenerator: TextGenerator backed by an Ollama server's
 * non-streaming `/api/generate` endpoint.
 *
 * Uses Node.js built-in `http`/`https` modules (no extra HTTP dependency).
 */

import http from 'http'
import https from 'https'
import { z } from 'zod'
import { GenerationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { validateTimeoutMs } from '../../utils/helpers.js'
import type { GenerateRequest, TextGenerator } from './text-generator.js'

const logger = createLogger('evaluators:ollama')

export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000

const OllamaResponseSchema = z.object({ response: z.string() }).passthrough()

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface OllamaGeneratorOptions {
  /** Base URL, e.g. http://localhost:11434 */
  host: string
  requestTimeoutMs?: number
  /** Sent as a bearer token, for hosts behind an authenticating proxy */
  apiKey?: string
}

// ---------------------------------------------------------------------------
// OllamaGenerator
// ---------------------------------------------------------------------------

export class OllamaGenerator implements TextGenerator {
  private readonly _endpoint: string
  private readonly _timeoutMs: number
  private readonly _apiKey: string | undefined

  constructor(options: OllamaGeneratorOptions) {
    this._endpoint = `${options.host.replace(/\/+$/, '')}/api/generate`
    this._timeoutMs = validateTimeoutMs(
      options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      'requestTimeoutMs',
    )
    this._apiKey = options.apiKey
  }

  generate(request: GenerateRequest): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const { model, signal } = request

      if (signal?.aborted) {
        reject(new GenerationError('Generation aborted', { model }))
        return
      }

      let url: URL
      try {
        url = new URL(this._endpoint)
      } catch {
        reject(new GenerationError(`Invalid generator host: ${this._endpoint}`, { model }))
        return
      }
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        reject(new GenerationError(`Unsupported generator host protocol: ${url.protocol}`, { model }))
        return
      }

      const body = JSON.stringify({
        model,
        prompt: request.prompt,
        stream: false,
        options: { temperature: request.temperature },
      })
      const headers: http.OutgoingHttpHeaders = {
        'content-type': 'application/json',
        'content-length': Buffer.byteLength(body),
      }
      if (this._apiKey !== undefined) {
        headers.authorization = `Bearer ${this._apiKey}`
      }

      const startedAt = Date.now()
      let settled = false

      const cleanup = (): void => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
      }

      const safeReject = (err: GenerationError): void => {
        if (settled) return
        settled = true
        cleanup()
        reject(err)
      }

      const safeResolve = (text: string): void => {
        if (settled) return
        settled = true
        cleanup()
        logger.debug({ model, durationMs: Date.now() - startedAt, chars: text.length }, 'Generation completed')
        resolve(text)
      }

      const onResponse = (res: http.IncomingMessage): void => {
        collectBody(res, model, safeResolve, safeReject)
      }

      const options: http.RequestOptions = { method: 'POST', headers }
      const req =
        url.protocol === 'https:'
          ? https.request(url, options, onResponse)
          : http.request(url, options, onResponse)

      // The request callback API takes no AbortSignal for the timeout, so
      // the timer destroys the socket itself.
      const timer = setTimeout(() => {
        req.destroy()
        safeReject(
          new GenerationError(`Generation timed out after ${String(this._timeoutMs)}ms`, {
            model,
            timeoutMs: this._timeoutMs,
          }),
        )
      }, this._timeoutMs)

      const onAbort = (): void => {
        req.destroy()
        safeReject(new GenerationError('Generation aborted', { model }))
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      req.on('error', (err) => {
        // Also fires after destroy(); safeReject ignores it once settled
        safeReject(new GenerationError(`Generation request failed: ${err.message}`, { model }))
      })

      req.end(body)
    })
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function collectBody(
  res: http.IncomingMessage,
  model: string,
  resolve: (text: string) => void,
  reject: (err: GenerationError) => void,
): void {
  const chunks: Buffer[] = []
  const status = res.statusCode ?? 0

  res.on('data', (chunk: Buffer) => {
    chunks.push(chunk)
  })

  res.on('end', () => {
    const text = Buffer.concat(chunks).toString('utf-8')
    if (status < 200 || status >= 300) {
      reject(
        new GenerationError(`Ollama returned HTTP ${String(status)}: ${text.slice(0, 200)}`, {
          model,
          status,
        }),
      )
      return
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch {
      reject(new GenerationError('Failed to parse Ollama response as JSON', { model }))
      return
    }

    const parsed = OllamaResponseSchema.safeParse(raw)
    if (!parsed.success) {
      reject(new GenerationError('Ollama response missing "response" field', { model }))
      return
    }
    resolve(parsed.data.response)
  })

  res.on('error', (err: Error) => {
    reject(new GenerationError(`Response stream error: ${err.message}`, { model }))
  })
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createOllamaGenerator(options: OllamaGeneratorOptions): OllamaGenerator {
  return new OllamaGenerator(options)
}
