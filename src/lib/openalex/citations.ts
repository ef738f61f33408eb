import { delay, isTimeoutError, requestInit, type HttpOptions } from '../http'
import type { LookupFailureReason, RecentWindow } from '../paper-types'

const OPENALEX_WORK_BY_DOI = 'https://api.openalex.org/works/https://doi.org/'
const COUNT_ONLY_PARAMS = 'per-page=1&select=id'

export const BACKOFF_BASE_MS = 1000

export type CitationLookup =
  | { status: 'resolved'; total: number; recent: number }
  | { status: 'skipped'; total: 0; recent: 0 }
  | { status: 'failed'; reason: LookupFailureReason; total: 0; recent: 0 }

export interface ResolveCitationsOptions extends HttpOptions {
  maxRetries: number
  recentWindow: RecentWindow | null
  backoffBaseMs?: number
  sleep?: (ms: number) => Promise<void>
}

type JsonObject = Record<string, unknown>

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function failed(reason: LookupFailureReason): CitationLookup {
  return { status: 'failed', reason, total: 0, recent: 0 }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch (error) {
    return null
  }
}

async function discardBody(response: Response): Promise<void> {
  // Unread bodies keep the connection checked out until they are collected.
  await response.body?.cancel().catch(() => undefined)
}

export function toCount(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, Math.trunc(value))
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10)
  }
  return 0
}

export function lookupCounts(result: CitationLookup): { total: number; recent: number } {
  return { total: result.total, recent: result.recent }
}

function withFilter(url: string, filter: string): string {
  // OpenAlex takes a single `filter` parameter; extra conditions are comma-joined into it.
  if (url.includes('filter=')) {
    return url.replace('filter=', `filter=${filter},`)
  }
  return `${url}${url.includes('?') ? '&' : '?'}filter=${filter}`
}

/**
 * Count-only URLs for citing works inside the rolling window: a publication-year
 * filter first, then a publication-date filter for indexes that reject the former.
 */
export function recentCountUrls(citedByApiUrl: string, window: RecentWindow): string[] {
  return [
    withFilter(citedByApiUrl, `publication_year:>${window.cutoffYear}`),
    withFilter(citedByApiUrl, `from_publication_date:${window.cutoffDate}`),
  ].map((url) => `${url}&${COUNT_ONLY_PARAMS}`)
}

async function fetchRecentCount(
  citedByApiUrl: string,
  options: ResolveCitationsOptions & { recentWindow: RecentWindow }
): Promise<number> {
  const fetchImpl = options.fetchImpl ?? fetch

  for (const url of recentCountUrls(citedByApiUrl, options.recentWindow)) {
    try {
      const response = await fetchImpl(url, requestInit(options, 'application/json'))
      if (response.status !== 200) {
        await discardBody(response)
        continue
      }

      const payload: unknown = await response.json().catch(() => null)
      if (!isRecord(payload)) {
        continue
      }

      const meta = isRecord(payload.meta) ? payload.meta : {}
      return toCount(meta.count)
    } catch (error) {
      console.warn(`[openalex] Recent-window count failed for ${url}: ${describeError(error)}`)
    }
  }

  return 0
}

/**
 * Resolve total and rolling-window citation counts for a DOI.
 *
 * 429 and 5xx responses and transport failures are retried with exponential
 * backoff. Every other outcome is reported through the returned lookup, so the
 * caller decides whether to zero-fill or flag the paper.
 */
export async function resolveCitations(
  doi: string | null,
  options: ResolveCitationsOptions
): Promise<CitationLookup> {
  if (!doi) {
    return { status: 'skipped', total: 0, recent: 0 }
  }

  const fetchImpl = options.fetchImpl ?? fetch
  const sleep = options.sleep ?? delay
  const maxRetries = Math.max(1, options.maxRetries)
  const url = `${OPENALEX_WORK_BY_DOI}${doi}`

  let backoff = options.backoffBaseMs ?? BACKOFF_BASE_MS
  let lastFailure: LookupFailureReason = 'network'

  const backOff = async (attempt: number, reason: LookupFailureReason, detail: string) => {
    lastFailure = reason
    console.warn(`[openalex] Lookup for ${doi} ${detail}, attempt ${attempt}/${maxRetries}`)
    if (attempt < maxRetries) {
      await sleep(backoff)
      backoff *= 2
    }
  }

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    let response: Response
    try {
      response = await fetchImpl(url, requestInit(options, 'application/json'))
    } catch (error) {
      await backOff(attempt, isTimeoutError(error) ? 'timeout' : 'network', `failed (${describeError(error)})`)
      continue
    }

    if (response.status === 200) {
      let body: string
      try {
        body = await response.text()
      } catch (error) {
        await backOff(
          attempt,
          isTimeoutError(error) ? 'timeout' : 'network',
          `body read failed (${describeError(error)})`
        )
        continue
      }

      const work = parseJson(body)
      if (!isRecord(work)) {
        return failed('malformed-response')
      }

      const total = toCount(work.cited_by_count)
      const citedByApiUrl = typeof work.cited_by_api_url === 'string' ? work.cited_by_api_url : null

      let recent = 0
      if (options.recentWindow && citedByApiUrl) {
        recent = await fetchRecentCount(citedByApiUrl, { ...options, recentWindow: options.recentWindow })
      }

      // The citing-works index can run ahead of cited_by_count.
      return { status: 'resolved', total, recent: Math.min(recent, total) }
    }

    await discardBody(response)

    if (!isRetryableStatus(response.status)) {
      return failed(response.status === 404 ? 'not-found' : 'http-status')
    }

    await backOff(attempt, response.status === 429 ? 'rate-limited' : 'server-error', `returned ${response.status}`)
  }

  return failed(lastFailure)
}
