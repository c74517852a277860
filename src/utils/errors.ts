// Every failure the crawl can surface. None of them are retried.

export class CrawlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// Transport failure: DNS, connection refused, timeout
export class FetchError extends CrawlError {
  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

export class HttpStatusError extends FetchError {
  constructor(url: string, readonly status: number, statusText: string) {
    super(url, `HTTP ${status}: ${statusText} (${url})`)
  }
}

// JSON that could not be decoded or lacks a required field
export class ResponseShapeError extends CrawlError {
  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

export class NoImageFoundError extends CrawlError {
  constructor(readonly url: string) {
    super(`No image found in ${url}`)
  }
}

export class DownloadWriteError extends CrawlError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to write ${path}`, options)
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
