import { config } from '../config/index.js'
import { FetchError, isFetchError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

export interface FetchOptions {
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: string
  timeoutMs?: number
  userAgent?: string
  label?: string             // Shown in errors and logs instead of the URL
}

export interface HtmlResponse {
  body: string
  url: string                // Final URL after redirects
}

// Single attempt, no retries. The timer stays armed until `run` settles, so
// it covers both the headers and whatever `run` reads from the body.
async function withDeadline<T>(
  url: string,
  options: FetchOptions,
  run: (response: Response, signal: AbortSignal) => Promise<T>
): Promise<T> {
  const {
    method = 'GET',
    timeoutMs = config.requestTimeoutMs,
    userAgent = config.userAgent,
    label = url,
  } = options

  const headers: Record<string, string> = {
    'User-Agent': userAgent,
    ...options.headers,
  }

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const response = await fetch(url, {
      method,
      headers,
      body: options.body,
      redirect: 'follow',
      signal: controller.signal,
    })
    return await run(response, controller.signal)
  } catch (error) {
    if (isFetchError(error)) throw error
    const cause = error instanceof Error ? error : undefined
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : cause?.message ?? String(error)
    logger.debug({ target: label, method, reason }, 'Request failed')
    throw new FetchError(`${method} ${label} failed: ${reason}`, undefined, cause)
  } finally {
    clearTimeout(timeoutId)
  }
}

// Reads the body until it ends or the signal fires; an aborted read throws.
async function readText(response: Response, signal: AbortSignal): Promise<string> {
  if (!response.body) return ''

  const reader = response.body.getReader()
  const cancel = (): void => {
    reader.cancel().catch((error: unknown) => {
      logger.debug({ reason: String(error) }, 'Cancelling response body failed')
    })
  }
  signal.addEventListener('abort', cancel, { once: true })

  try {
    const chunks: Uint8Array[] = []
    for (;;) {
      if (signal.aborted) throw new Error('body read aborted')
      const { done, value } = await reader.read()
      if (done) break
      chunks.push(value)
    }
    if (signal.aborted) throw new Error('body read aborted')
    return Buffer.concat(chunks).toString('utf8')
  } finally {
    signal.removeEventListener('abort', cancel)
  }
}

export async function fetchWithTimeout(
  url: string,
  options: FetchOptions = {}
): Promise<Response> {
  return withDeadline(url, options, async response => response)
}

export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<HtmlResponse> {
  const requestOptions: FetchOptions = {
    ...options,
    headers: {
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      ...options.headers,
    },
  }

  return withDeadline(url, requestOptions, async (response, signal) => {
    if (!response.ok) {
      await response.body?.cancel()
      throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, response.status)
    }

    const body = await readText(response, signal)
    return { body, url: response.url || url }
  })
}

export async function postJson(
  url: string,
  payload: unknown,
  options: FetchOptions = {}
): Promise<Response> {
  return fetchWithTimeout(url, {
    ...options,
    method: 'POST',
    body: JSON.stringify(payload),
    headers: {
      'Content-Type': 'application/json',
      ...options.headers,
    },
  })
}
