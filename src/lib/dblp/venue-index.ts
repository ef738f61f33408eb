import { fetchPage, type HttpOptions } from '../http'
import type { ProceedingsLink } from '../paper-types'
import { domMarkupExtractor, type MarkupExtractor } from './markup-extractor'

export interface ListProceedingsOptions {
  http: HttpOptions
  yearMin?: number | null
  yearMax?: number | null
  extractor?: MarkupExtractor
}

export function isWithinYearRange(
  year: number | null,
  yearMin: number | null = null,
  yearMax: number | null = null
): boolean {
  // Links without a recognisable year are kept; only known years are range-checked.
  if (year === null) {
    return true
  }
  if (yearMin !== null && year < yearMin) {
    return false
  }
  if (yearMax !== null && year > yearMax) {
    return false
  }
  return true
}

/**
 * Read a venue index page and return its proceedings volumes, oldest first.
 */
export async function listProceedings(
  indexUrl: string,
  options: ListProceedingsOptions
): Promise<ProceedingsLink[]> {
  const extractor = options.extractor ?? domMarkupExtractor
  const html = await fetchPage(indexUrl, options.http)

  return extractor
    .listContentLinks(html, indexUrl)
    .filter((link) => isWithinYearRange(link.year, options.yearMin, options.yearMax))
    .sort((a, b) => (a.year ?? 0) - (b.year ?? 0))
}
