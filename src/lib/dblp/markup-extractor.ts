import { JSDOM } from 'jsdom'

import type { ProceedingsLink } from '../paper-types'

const CONTENTS_LABEL = '[contents]'
const PRIMARY_ENTRY_SELECTOR = 'li.entry.inproceedings'
const FALLBACK_ENTRY_SELECTOR = 'li.entry'
const TITLE_SELECTOR = 'span.title'
const TEXT_NODE = 3

export const DOI_PATTERN = /10\.\d{4,9}\/[-._;()/:A-Z0-9]+/i
const YEAR_PATTERN = /(\d{4})/

export interface EntryFields {
  title: string | null
  doi: string | null
}

/**
 * Narrow view over catalog markup so the pipeline never touches selectors directly.
 */
export interface MarkupExtractor {
  listContentLinks(html: string, baseUrl: string): ProceedingsLink[]
  listEntries(html: string): EntryFields[]
}

export function extractYear(value: string): number | null {
  const match = value.match(YEAR_PATTERN)
  return match ? Number.parseInt(match[1], 10) : null
}

export function extractDoi(markup: string): string | null {
  const match = markup.match(DOI_PATTERN)
  return match ? match[0] : null
}

function textPieces(node: Node): string[] {
  const pieces: string[] = []
  node.childNodes.forEach((child) => {
    if (child.nodeType === TEXT_NODE) {
      const trimmed = (child.textContent ?? '').trim()
      if (trimmed) {
        pieces.push(trimmed)
      }
      return
    }
    pieces.push(...textPieces(child))
  })
  return pieces
}

function resolveHref(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString()
  } catch (error) {
    return null
  }
}

function parse(html: string): Document {
  return new JSDOM(html).window.document
}

export const domMarkupExtractor: MarkupExtractor = {
  listContentLinks(html, baseUrl) {
    const links: ProceedingsLink[] = []

    for (const anchor of Array.from(parse(html).querySelectorAll('a'))) {
      if (textPieces(anchor).join('') !== CONTENTS_LABEL) {
        continue
      }

      const href = anchor.getAttribute('href')
      if (!href) {
        continue
      }

      const url = resolveHref(href, baseUrl)
      if (!url) {
        continue
      }

      links.push({ url, year: extractYear(href) })
    }

    return links
  },

  listEntries(html) {
    const document = parse(html)
    let entries = Array.from(document.querySelectorAll(PRIMARY_ENTRY_SELECTOR))
    if (!entries.length) {
      entries = Array.from(document.querySelectorAll(FALLBACK_ENTRY_SELECTOR))
    }

    return entries.map((entry) => {
      const titleElement = entry.querySelector(TITLE_SELECTOR)
      const title = titleElement ? textPieces(titleElement).join(' ') : ''

      return {
        title: title || null,
        doi: extractDoi(entry.outerHTML),
      }
    })
  },
}
