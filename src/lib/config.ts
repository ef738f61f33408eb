import { ConfigError } from './errors'
import type { RecentWindow } from './paper-types'

const DBLP_VENUE_BASE = 'https://dblp.org/db/conf'

export const DEFAULT_OUTPUT_FILE = 'citations_normalized.csv'
export const DEFAULT_USER_AGENT = 'VenueCitations/0.1 (+mailto:research@example.org)'
export const DEFAULT_INDEX_DELAY_MS = 200
export const DEFAULT_CITATION_DELAY_MS = 100
export const DEFAULT_MAX_RETRIES = 4
export const DEFAULT_TIMEOUT_MS = 45_000
export const RECENT_WINDOW_YEARS = 5

// Largest delay setTimeout and AbortSignal.timeout accept.
export const MAX_TIMER_MS = 2_147_483_647
// Keeps the doubling backoff under MAX_TIMER_MS.
export const MAX_RETRY_LIMIT = 20

export interface PipelineConfig {
  indexUrl: string
  outputPath: string
  yearMin: number | null
  yearMax: number | null
  userAgent: string
  indexDelayMs: number
  citationDelayMs: number
  maxRetries: number
  timeoutMs: number
  recentWindow: RecentWindow | null
}

type Env = Record<string, string | undefined>

function readString(env: Env, key: string): string | null {
  const value = env[key]
  if (typeof value !== 'string') {
    return null
  }
  const trimmed = value.trim()
  return trimmed || null
}

function readInteger(
  env: Env,
  key: string,
  fallback: number | null,
  min = 0,
  max = Number.MAX_SAFE_INTEGER
): number | null {
  const raw = readString(env, key)
  if (raw === null) {
    return fallback
  }

  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`)
  }

  const value = Number.parseInt(raw, 10)
  if (value < min) {
    throw new ConfigError(`${key} must be at least ${min}, got ${value}`)
  }
  if (value > max) {
    throw new ConfigError(`${key} must be at most ${max}, got ${raw}`)
  }
  return value
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)
  if (raw === null) {
    return fallback
  }

  const normalised = raw.toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalised)) {
    return true
  }
  if (['0', 'false', 'no', 'off'].includes(normalised)) {
    return false
  }
  throw new ConfigError(`${key} must be a boolean flag, got "${raw}"`)
}

function resolveIndexUrl(env: Env): string {
  const explicit = readString(env, 'VENUE_INDEX_URL')
  if (explicit) {
    try {
      return new URL(explicit).toString()
    } catch (error) {
      throw new ConfigError(`VENUE_INDEX_URL is not a valid URL: "${explicit}"`)
    }
  }

  const venue = readString(env, 'DBLP_VENUE')
  if (venue) {
    return `${DBLP_VENUE_BASE}/${encodeURIComponent(venue.toLowerCase())}/index`
  }

  throw new ConfigError('Set VENUE_INDEX_URL or DBLP_VENUE to choose the venue to report on')
}

/**
 * The rolling window covers the last five full calendar years up to `now`,
 * starting on January 1st of the year after the cutoff.
 */
export function rollingWindow(now: Date): RecentWindow {
  const cutoffYear = now.getFullYear() - RECENT_WINDOW_YEARS
  return {
    cutoffYear,
    cutoffDate: `${cutoffYear + 1}-01-01`,
  }
}

export function loadConfig(env: Env = process.env, now: Date = new Date()): PipelineConfig {
  const yearMin = readInteger(env, 'YEAR_MIN', null)
  const yearMax = readInteger(env, 'YEAR_MAX', null)

  if (yearMin !== null && yearMax !== null && yearMin > yearMax) {
    throw new ConfigError(`YEAR_MIN (${yearMin}) is after YEAR_MAX (${yearMax})`)
  }

  return {
    indexUrl: resolveIndexUrl(env),
    outputPath: readString(env, 'OUTPUT_FILE') ?? DEFAULT_OUTPUT_FILE,
    yearMin,
    yearMax,
    userAgent: readString(env, 'CITATIONS_USER_AGENT') ?? DEFAULT_USER_AGENT,
    indexDelayMs:
      readInteger(env, 'INDEX_DELAY_MS', DEFAULT_INDEX_DELAY_MS, 0, MAX_TIMER_MS) ?? DEFAULT_INDEX_DELAY_MS,
    citationDelayMs:
      readInteger(env, 'CITATION_DELAY_MS', DEFAULT_CITATION_DELAY_MS, 0, MAX_TIMER_MS) ?? DEFAULT_CITATION_DELAY_MS,
    maxRetries: readInteger(env, 'MAX_RETRIES', DEFAULT_MAX_RETRIES, 1, MAX_RETRY_LIMIT) ?? DEFAULT_MAX_RETRIES,
    timeoutMs: readInteger(env, 'REQUEST_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 1, MAX_TIMER_MS) ?? DEFAULT_TIMEOUT_MS,
    recentWindow: readFlag(env, 'RECENT_WINDOW', true) ? rollingWindow(now) : null,
  }
}
