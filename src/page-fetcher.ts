import type { KindleClient } from './kindle-client'
import type { Page, ReadingSession, TocItem } from './types'
import { RenderError } from './errors'

export type PageFetcherProgressHandler = (event: {
  /** Pages fetched so far */
  numPages: number
  endPosition: number
  bookEndPosition: number
}) => void

/**
 * Produces the pages of one book, in order, by walking the Kindle renderer
 * from position 0 to the end of the book.
 *
 * Every call to `pages()` starts a new fetch at page 0; an iteration in
 * progress can only move forward.
 */
export class PageFetcher {
  readonly asin: string
  protected readonly client: KindleClient
  protected readonly pagesPerRequest: number
  protected readonly onBatch?: PageFetcherProgressHandler

  protected _toc?: TocItem[]
  protected _readingSession?: ReadingSession

  constructor({
    client,
    asin,
    pagesPerRequest = 6,
    onBatch
  }: {
    client: KindleClient
    asin: string
    pagesPerRequest?: number
    onBatch?: PageFetcherProgressHandler
  }) {
    this.client = client
    this.asin = asin
    this.pagesPerRequest = pagesPerRequest
    this.onBatch = onBatch
  }

  /** The book's table of contents, available once the first batch is in. */
  get toc(): TocItem[] {
    return this._toc ?? []
  }

  get readingSession(): ReadingSession | undefined {
    return this._readingSession
  }

  async *pages(): AsyncGenerator<Page, void, undefined> {
    const reading = await this.client.startReading(this.asin)
    const { dpi, pageWidth, pageHeight } = this.client.pageLayout
    this._readingSession = reading

    let index = 0
    let startingPosition = 0
    let lastEndPosition = -1

    while (startingPosition <= reading.endPosition) {
      const batch = await this.client.renderPages({
        asin: this.asin,
        startingPosition,
        numPages: this.pagesPerRequest
      })

      // An empty batch is the renderer's end of book signal.
      if (!batch.pages.length) {
        break
      }

      if (!this._toc && batch.toc) {
        this._toc = batch.toc
      }

      for (const rawPage of batch.pages) {
        if (rawPage.endPositionId <= lastEndPosition) {
          throw new RenderError(
            `Renderer returned page ending at position ${rawPage.endPositionId} after position ${lastEndPosition} (out of order or duplicate page)`
          )
        }

        const page: Page = {
          index: index++,
          startPositionId: lastEndPosition + 1,
          endPositionId: rawPage.endPositionId,
          width: pageWidth,
          height: pageHeight,
          dpi,
          elements: rawPage.children ?? [],
          fonts: batch.fonts,
          images: pickImages(rawPage.children ?? [], batch.images)
        }
        lastEndPosition = rawPage.endPositionId

        yield page
      }

      this.onBatch?.({
        numPages: index,
        endPosition: lastEndPosition,
        bookEndPosition: reading.endPosition
      })

      startingPosition = lastEndPosition + 1
    }
  }
}

function pickImages(
  elements: Page['elements'],
  images: Record<string, Buffer>
): Record<string, Buffer> {
  const result: Record<string, Buffer> = {}

  for (const element of elements) {
    if (element.type !== 'image') continue

    const image = images[element.imageReference]
    if (image) {
      result[element.imageReference] = image
    }
  }

  return result
}
