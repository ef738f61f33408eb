import type { ResolvedPaper, ScoredPaper } from '../paper-types'

export function median(values: number[]): number {
  if (!values.length) {
    return 0
  }

  const sorted = [...values].sort((a, b) => a - b)
  const middle = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 1) {
    return sorted[middle]
  }
  return (sorted[middle - 1] + sorted[middle]) / 2
}

/**
 * Median of log(1 + count) per publication year. Papers without a year are ignored.
 */
export function computeYearMedians(
  papers: ResolvedPaper[],
  pick: (paper: ResolvedPaper) => number
): Map<number, number> {
  const byYear = new Map<number, number[]>()

  for (const paper of papers) {
    if (paper.year === null) {
      continue
    }
    const bucket = byYear.get(paper.year) ?? []
    bucket.push(Math.log1p(pick(paper)))
    byYear.set(paper.year, bucket)
  }

  const medians = new Map<number, number>()
  for (const [year, values] of byYear) {
    medians.set(year, median(values))
  }
  return medians
}

function baseline(medians: Map<number, number>, year: number | null): number {
  return year === null ? 0 : medians.get(year) ?? 0
}

/**
 * Score each paper against its publication-year cohort. Positive means cited
 * more than the typical paper of that year, negative less, zero at the median.
 */
export function normalizePapers(papers: ResolvedPaper[]): ScoredPaper[] {
  const totalMedians = computeYearMedians(papers, (paper) => paper.citationsTotal)
  const recentMedians = computeYearMedians(papers, (paper) => paper.citationsRecent)

  return papers.map((paper) => ({
    ...paper,
    normalizedTotal: Math.log1p(paper.citationsTotal) - baseline(totalMedians, paper.year),
    normalizedRecent: Math.log1p(paper.citationsRecent) - baseline(recentMedians, paper.year),
    url: paper.doi ? `https://doi.org/${paper.doi}` : '',
  }))
}
