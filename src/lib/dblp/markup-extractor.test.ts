import { describe, expect, it } from 'vitest'

import { domMarkupExtractor, extractDoi, extractYear } from './markup-extractor'

const INDEX_URL = 'https://dblp.org/db/conf/abc/index'

describe('domMarkupExtractor.listContentLinks', () => {
  it('keeps only anchors labelled [contents], in document order', () => {
    const html = `
      <ul>
        <li><a href="https://dblp.org/db/conf/abc/abc2021.html">[contents]</a></li>
        <li><a href="https://dblp.org/db/conf/abc/abc2020.html"> [contents] </a></li>
        <li><a href="https://dblp.org/db/conf/abc/abc2019.html">Workshop 2019</a></li>
        <li><a href="https://dblp.org/db/conf/abc/abc2018.html">[contents] and more</a></li>
      </ul>`

    expect(domMarkupExtractor.listContentLinks(html, INDEX_URL)).toEqual([
      { url: 'https://dblp.org/db/conf/abc/abc2021.html', year: 2021 },
      { url: 'https://dblp.org/db/conf/abc/abc2020.html', year: 2020 },
    ])
  })

  it('resolves relative links and leaves the year unknown when the link has none', () => {
    const html = `
      <a href="abc2017.html">[contents]</a>
      <a href="volume-a.html">[contents]</a>
      <a>[contents]</a>`

    expect(domMarkupExtractor.listContentLinks(html, INDEX_URL)).toEqual([
      { url: 'https://dblp.org/db/conf/abc/abc2017.html', year: 2017 },
      { url: 'https://dblp.org/db/conf/abc/volume-a.html', year: null },
    ])
  })
})

describe('domMarkupExtractor.listEntries', () => {
  it('reads titles and DOIs from inproceedings entries', () => {
    const html = `
      <ul class="publ-list">
        <li class="entry inproceedings" id="conf/abc/One20">
          <nav class="publ"><ul><li><a href="https://doi.org/10.1145/1234567.1234568">electronic edition via DOI</a></li></ul></nav>
          <cite class="data"><span itemprop="author">A. Author</span>:
            <span class="title" itemprop="name">Example Paper</span></cite>
        </li>
        <li class="entry inproceedings" id="conf/abc/Two20">
          <cite class="data"><span itemprop="author">B. Author</span></cite>
        </li>
        <li class="entry inproceedings" id="conf/abc/Three20">
          <cite class="data"><span class="title">Second <i>Study</i> of Things.</span></cite>
        </li>
      </ul>`

    expect(domMarkupExtractor.listEntries(html)).toEqual([
      { title: 'Example Paper', doi: '10.1145/1234567.1234568' },
      { title: null, doi: null },
      { title: 'Second Study of Things.', doi: null },
    ])
  })

  it('falls back to any entry when no inproceedings entries exist', () => {
    const html = `
      <li class="entry editor"><span class="title">Front Matter</span></li>
      <li class="entry informal"><span class="title">Keynote Abstract</span></li>`

    expect(domMarkupExtractor.listEntries(html)).toEqual([
      { title: 'Front Matter', doi: null },
      { title: 'Keynote Abstract', doi: null },
    ])
  })

  it('ignores other entry kinds when inproceedings entries are present', () => {
    const html = `
      <li class="entry editor"><span class="title">Front Matter</span></li>
      <li class="entry inproceedings"><span class="title">Main Track Paper</span></li>`

    expect(domMarkupExtractor.listEntries(html)).toEqual([{ title: 'Main Track Paper', doi: null }])
  })
})

describe('extractDoi', () => {
  it('returns the first DOI in the markup', () => {
    expect(extractDoi('<a href="https://doi.org/10.1109/ICSE.2020.00012">x</a> 10.1000/other')).toBe(
      '10.1109/ICSE.2020.00012'
    )
  })

  it('returns null when the registrant part is too short', () => {
    expect(extractDoi('see 10.123/abc')).toBeNull()
  })
})

describe('extractYear', () => {
  it('takes the first four-digit run', () => {
    expect(extractYear('https://dblp.org/db/conf/abc/abc2019-1.html')).toBe(2019)
    expect(extractYear('https://dblp.org/db/conf/abc/volume.html')).toBeNull()
  })
})
