import { fetchPage, type HttpOptions } from '../http'
import type { Paper } from '../paper-types'
import { domMarkupExtractor, extractYear, type MarkupExtractor } from './markup-extractor'

export interface ParseProceedingsOptions {
  http: HttpOptions
  extractor?: MarkupExtractor
}

export async function parseProceedings(
  url: string,
  yearHint: number | null,
  options: ParseProceedingsOptions
): Promise<Paper[]> {
  const extractor = options.extractor ?? domMarkupExtractor
  const html = await fetchPage(url, options.http)
  const year = yearHint ?? extractYear(url)

  const papers: Paper[] = []
  for (const entry of extractor.listEntries(html)) {
    if (!entry.title) {
      continue
    }
    papers.push({ year, title: entry.title, doi: entry.doi })
  }

  return papers
}
