import path from 'node:path'

import defaultKy, { type KyInstance } from 'ky'

import type { PageLayout, ReadingSession } from './types'
import {
  type CookieSource,
  getDefaultCookieSource,
  KINDLE_COOKIE_DOMAIN
} from './cookies'
import { KindleClient } from './kindle-client'
import { PageFetcher, type PageFetcherProgressHandler } from './page-fetcher'
import { assemblePdf } from './pdf-assembler'
import { ResponseRecorder, ResponseReplayer } from './response-capture'
import { sanitizeFilename } from './utils'

export interface ExportBookPdfResult {
  path: string
  numPages: number
  title: string
  authors: string[]
}

/**
 * Renders every page of a Kindle book and writes them to a PDF.
 */
export async function exportBookPdf({
  asin,
  output,
  fontSize,
  cookieSource = getDefaultCookieSource(),
  saveMock,
  loadMock,
  layout,
  throttle = true,
  ky = defaultKy,
  onBatch = logProgress
}: {
  asin: string
  /** Defaults to the book's title in the current directory */
  output?: string
  fontSize?: number
  cookieSource?: CookieSource
  /** Path of a capture file to write every response to */
  saveMock?: string
  /** Path of a capture file to answer every request from */
  loadMock?: string
  layout?: Partial<PageLayout>
  throttle?: boolean
  ky?: KyInstance
  onBatch?: PageFetcherProgressHandler
}): Promise<ExportBookPdfResult> {
  let http = ky
  if (loadMock) {
    const replayer = await ResponseReplayer.load(loadMock)
    http = http.extend({ hooks: replayer.hooks })
  } else if (saveMock) {
    const recorder = new ResponseRecorder({ path: saveMock })
    await recorder.open()
    http = http.extend({ hooks: recorder.hooks })
  }

  const session = await cookieSource.getCookiesForDomain(KINDLE_COOKIE_DOMAIN)
  const client = new KindleClient({
    session,
    layout: fontSize === undefined ? layout : { ...layout, fontSize },
    refreshSession: !!(saveMock || loadMock),
    throttle: throttle && !loadMock,
    ky: http
  })

  const fetcher = new PageFetcher({ client, asin, onBatch })
  const pages = fetcher.pages()

  // The title is only known once the reading session has started, so pull
  // the first page before deciding where the PDF goes.
  const first = await pages.next()
  const reading = requireReadingSession(fetcher.readingSession, asin)
  const outputPath =
    output ?? path.resolve(`${sanitizeFilename(reading.title) || asin}.pdf`)

  console.warn(`Rendering "${reading.title}" to ${outputPath}`)

  async function* allPages() {
    if (!first.done) {
      yield first.value
    }

    yield* pages
  }

  const { numPages } = await assemblePdf(allPages(), {
    outputPath,
    title: reading.title,
    author: reading.authors.join(', ') || undefined,
    getToc: () => fetcher.toc
  })

  return {
    path: outputPath,
    numPages,
    title: reading.title,
    authors: reading.authors
  }
}

function requireReadingSession(
  reading: ReadingSession | undefined,
  asin: string
): ReadingSession {
  if (!reading) {
    throw new Error(`No reading session was started for book ${asin}`)
  }

  return reading
}

const logProgress: PageFetcherProgressHandler = ({
  numPages,
  endPosition,
  bookEndPosition
}) => {
  const percent = bookEndPosition
    ? Math.min(100, Math.round((endPosition / bookEndPosition) * 100))
    : 100
  console.warn(`fetched ${numPages} pages (${percent}%)`)
}
