/**
 * Error types that end a run. Citation lookups never throw; see `CitationLookup`.
 */

export class FetchError extends Error {
  readonly url: string
  readonly status: number | null

  constructor(url: string, status: number | null, options?: { cause?: unknown }) {
    const detail = status === null ? 'network error' : `HTTP ${status}`
    super(`Failed to fetch ${url} (${detail})`, options)
    this.name = 'FetchError'
    this.url = url
    this.status = status
  }
}

export class IOError extends Error {
  readonly path: string

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
    super(`Failed to write ${path}${reason}`, options)
    this.name = 'IOError'
    this.path = path
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
