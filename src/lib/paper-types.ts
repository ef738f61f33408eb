export interface ProceedingsLink {
  url: string
  year: number | null
}

export interface Paper {
  year: number | null
  title: string
  doi: string | null
}

export type LookupFailureReason =
  | 'timeout'
  | 'rate-limited'
  | 'server-error'
  | 'network'
  | 'not-found'
  | 'http-status'
  | 'malformed-response'

export interface ResolvedPaper extends Paper {
  citationsTotal: number
  citationsRecent: number
  lookupFailure: LookupFailureReason | null
}

export interface ScoredPaper extends ResolvedPaper {
  normalizedTotal: number
  normalizedRecent: number
  url: string
}

export interface RecentWindow {
  cutoffYear: number
  cutoffDate: string
}
