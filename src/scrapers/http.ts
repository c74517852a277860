import type { ZodType, ZodTypeDef } from 'zod'
import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { FetchError, HttpStatusError, ResponseShapeError, toError } from '../utils/errors.js'

export interface RequestOptions {
  headers?: Record<string, string>
}

/**
 * The only network boundary of the tool. Components receive a client instead
 * of calling `fetch` themselves, so tests can substitute an in-process fake.
 */
export interface HttpClient {
  get(url: string, options?: RequestOptions): Promise<Response>
}

export interface FetchHttpClientOptions {
  timeoutMs?: number
  userAgent?: string
}

export class FetchHttpClient implements HttpClient {
  private readonly timeoutMs: number
  private readonly userAgent: string

  constructor(options: FetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs
    this.userAgent = options.userAgent ?? config.userAgent
  }

  async get(url: string, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'Accept': '*/*',
      ...options.headers,
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    logger.debug({ url }, 'GET')

    let response: Response
    try {
      response = await fetch(url, { headers, signal: controller.signal })
    } catch (error) {
      throw new FetchError(url, `Failed to fetch ${url}: ${toError(error).message}`, { cause: error })
    } finally {
      clearTimeout(timeoutId)
    }

    if (!response.ok) {
      await response.body?.cancel()
      throw new HttpStatusError(url, response.status, response.statusText)
    }

    return response
  }
}

export async function fetchJson<T>(client: HttpClient, url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  const response = await client.get(url, {
    headers: {
      'Accept': 'application/json',
    },
  })

  let body: unknown
  try {
    body = await response.json()
  } catch (error) {
    throw new ResponseShapeError(url, `Invalid JSON from ${url}`, { cause: error })
  }

  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ResponseShapeError(url, `Unexpected response from ${url}: ${issues.join('; ')}`, { cause: parsed.error })
  }

  return parsed.data
}

export async function fetchBytes(client: HttpClient, url: string): Promise<Buffer> {
  const response = await client.get(url)
  const arrayBuffer = await response.arrayBuffer()
  return Buffer.from(arrayBuffer)
}
