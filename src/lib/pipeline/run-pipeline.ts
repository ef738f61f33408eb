import type { PipelineConfig } from '../config'
import { domMarkupExtractor, type MarkupExtractor } from '../dblp/markup-extractor'
import { parseProceedings } from '../dblp/proceedings'
import { listProceedings } from '../dblp/venue-index'
import { delay, type HttpOptions } from '../http'
import { lookupCounts, resolveCitations } from '../openalex/citations'
import type { Paper, ResolvedPaper } from '../paper-types'
import { writeCsv } from '../report/csv-writer'
import { normalizePapers } from '../report/normalize'

const PROGRESS_EVERY = 25

export interface PipelineDeps {
  fetchImpl?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  extractor?: MarkupExtractor
}

export interface PipelineSummary {
  proceedings: number
  papers: number
  failedLookups: number
  outputPath: string
  written: boolean
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<PipelineSummary> {
  const sleep = deps.sleep ?? delay
  const extractor = deps.extractor ?? domMarkupExtractor
  const http: HttpOptions = {
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    fetchImpl: deps.fetchImpl,
  }

  const links = await listProceedings(config.indexUrl, {
    http,
    extractor,
    yearMin: config.yearMin,
    yearMax: config.yearMax,
  })

  if (!links.length) {
    console.log('No proceedings links found on the venue index.')
    return { proceedings: 0, papers: 0, failedLookups: 0, outputPath: config.outputPath, written: false }
  }

  const papers: Paper[] = []
  for (const link of links) {
    console.log(`Fetching proceedings ${link.year ?? 'unknown year'}: ${link.url}`)
    papers.push(...(await parseProceedings(link.url, link.year, { http, extractor })))
    await sleep(config.indexDelayMs)
  }

  console.log(`Found ${papers.length} papers across ${links.length} proceedings.`)

  const resolved: ResolvedPaper[] = []
  let failedLookups = 0

  for (const [index, paper] of papers.entries()) {
    const lookup = await resolveCitations(paper.doi, {
      ...http,
      maxRetries: config.maxRetries,
      recentWindow: config.recentWindow,
      sleep,
    })

    if (lookup.status === 'failed') {
      failedLookups += 1
      console.warn(`[openalex] No citation counts for ${paper.doi} (${lookup.reason}); recording zero`)
    }

    const counts = lookupCounts(lookup)
    resolved.push({
      ...paper,
      citationsTotal: counts.total,
      citationsRecent: counts.recent,
      lookupFailure: lookup.status === 'failed' ? lookup.reason : null,
    })

    await sleep(config.citationDelayMs)

    const processed = index + 1
    if (processed % PROGRESS_EVERY === 0) {
      console.log(`  ...processed ${processed}/${papers.length}`)
    }
  }

  const rows = await writeCsv(config.outputPath, normalizePapers(resolved), {
    recentWindow: config.recentWindow !== null,
  })

  console.log(`Saved ${config.outputPath} with ${rows} rows.`)

  return {
    proceedings: links.length,
    papers: rows,
    failedLookups,
    outputPath: config.outputPath,
    written: true,
  }
}
