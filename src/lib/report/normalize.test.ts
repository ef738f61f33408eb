import { describe, expect, it } from 'vitest'

import type { ResolvedPaper } from '../paper-types'
import { computeYearMedians, median, normalizePapers } from './normalize'

function paper(overrides: Partial<ResolvedPaper> & Pick<ResolvedPaper, 'title'>): ResolvedPaper {
  return {
    year: 2022,
    doi: null,
    citationsTotal: 0,
    citationsRecent: 0,
    lookupFailure: null,
    ...overrides,
  }
}

describe('median', () => {
  it('takes the middle value of an odd-sized list', () => {
    expect(median([5, 1, 3])).toBe(3)
  })

  it('averages the two middle values of an even-sized list', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5)
  })

  it('is zero for an empty list', () => {
    expect(median([])).toBe(0)
  })
})

describe('computeYearMedians', () => {
  it('groups by year and ignores papers without one', () => {
    const medians = computeYearMedians(
      [
        paper({ title: 'A', year: 2020, citationsTotal: 0 }),
        paper({ title: 'B', year: 2020, citationsTotal: 2 }),
        paper({ title: 'C', year: 2020, citationsTotal: 6 }),
        paper({ title: 'D', year: null, citationsTotal: 1000 }),
      ],
      (entry) => entry.citationsTotal
    )

    expect([...medians.keys()]).toEqual([2020])
    expect(medians.get(2020)).toBeCloseTo(Math.log(3), 12)
  })
})

describe('normalizePapers', () => {
  it('centres two same-year papers around their median', () => {
    const [low, high] = normalizePapers([
      paper({ title: 'Low', citationsTotal: 3 }),
      paper({ title: 'High', citationsTotal: 27 }),
    ])

    expect(low.normalizedTotal).toBeCloseTo(-0.973, 3)
    expect(high.normalizedTotal).toBeCloseTo(0.973, 3)
  })

  it('scores a paper at the median as zero', () => {
    const scored = normalizePapers([
      paper({ title: 'A', year: 2021, citationsTotal: 0, doi: null }),
      paper({ title: 'B', year: 2021, citationsTotal: 10, doi: '10.1000/b' }),
      paper({ title: 'C', year: 2021, citationsTotal: 20, doi: '10.1000/c' }),
    ])

    expect(scored[1].normalizedTotal).toBeCloseTo(0, 12)
  })

  it('scores papers without a DOI against the year median like any other', () => {
    const scored = normalizePapers([
      paper({ title: 'No DOI', year: 2021 }),
      paper({ title: 'B', year: 2021, citationsTotal: 10, doi: '10.1000/b' }),
      paper({ title: 'C', year: 2021, citationsTotal: 20, doi: '10.1000/c' }),
    ])

    expect(scored[0].normalizedTotal).toBeCloseTo(0 - Math.log(11), 12)
    expect(scored[0].normalizedRecent).toBe(0)
    expect(scored[0].url).toBe('')
  })

  it('normalizes recent citations against their own medians', () => {
    const scored = normalizePapers([
      paper({ title: 'A', citationsTotal: 40, citationsRecent: 1 }),
      paper({ title: 'B', citationsTotal: 50, citationsRecent: 7 }),
    ])

    const recentMedian = (Math.log(2) + Math.log(8)) / 2
    expect(scored[0].normalizedRecent).toBeCloseTo(Math.log(2) - recentMedian, 12)
    expect(scored[1].normalizedRecent).toBeCloseTo(Math.log(8) - recentMedian, 12)
  })

  it('uses a zero baseline for papers with an unknown year', () => {
    const [scored] = normalizePapers([paper({ title: 'Undated', year: null, citationsTotal: 9 })])

    expect(scored.normalizedTotal).toBeCloseTo(Math.log(10), 12)
  })

  it('derives the DOI link', () => {
    const [scored] = normalizePapers([paper({ title: 'Linked', doi: '10.1145/1234567.1234568' })])

    expect(scored.url).toBe('https://doi.org/10.1145/1234567.1234568')
  })

  it('gives identical scores when run twice', () => {
    const papers = [
      paper({ title: 'A', year: 2019, citationsTotal: 4, citationsRecent: 1 }),
      paper({ title: 'B', year: 2019, citationsTotal: 15, citationsRecent: 6 }),
      paper({ title: 'C', year: 2020, citationsTotal: 2, citationsRecent: 2 }),
    ]

    const once = normalizePapers(papers)
    const twice = normalizePapers(once)

    expect(twice).toEqual(once)
  })
})
