import { writeFile } from 'node:fs/promises'

import { csvFormatRows } from 'd3-dsv'

import { IOError } from '../errors'
import type { ScoredPaper } from '../paper-types'

export const SIMPLE_COLUMNS = ['year', 'title', 'doi', 'url', 'citations', 'normalized_citations'] as const

export const RECENT_WINDOW_COLUMNS = [
  'year',
  'title',
  'doi',
  'url',
  'citations_total',
  'citations_5y',
  'normalized_total_citations',
  'normalized_5y_citations',
] as const

export interface WriteCsvOptions {
  recentWindow: boolean
}

export function reportColumns({ recentWindow }: WriteCsvOptions): readonly string[] {
  return recentWindow ? RECENT_WINDOW_COLUMNS : SIMPLE_COLUMNS
}

function compareTitles(a: string, b: string): number {
  if (a === b) {
    return 0
  }
  return a < b ? -1 : 1
}

export function sortForReport(papers: ScoredPaper[]): ScoredPaper[] {
  return [...papers].sort(
    (a, b) => (a.year ?? 0) - (b.year ?? 0) || compareTitles(a.title, b.title)
  )
}

function formatScore(value: number): string {
  return value.toFixed(6)
}

function toRow(paper: ScoredPaper, { recentWindow }: WriteCsvOptions): string[] {
  const identity = [paper.year === null ? '' : String(paper.year), paper.title, paper.doi ?? '', paper.url]

  if (!recentWindow) {
    return [...identity, String(paper.citationsTotal), formatScore(paper.normalizedTotal)]
  }

  return [
    ...identity,
    String(paper.citationsTotal),
    String(paper.citationsRecent),
    formatScore(paper.normalizedTotal),
    formatScore(paper.normalizedRecent),
  ]
}

export function formatCsv(papers: ScoredPaper[], options: WriteCsvOptions): string {
  const rows = sortForReport(papers).map((paper) => toRow(paper, options))
  return `${csvFormatRows([[...reportColumns(options)], ...rows])}\n`
}

/**
 * Write the report and return the number of data rows.
 */
export async function writeCsv(path: string, papers: ScoredPaper[], options: WriteCsvOptions): Promise<number> {
  const contents = formatCsv(papers, options)

  try {
    await writeFile(path, contents, 'utf8')
  } catch (error) {
    throw new IOError(path, { cause: error })
  }

  return papers.length
}
