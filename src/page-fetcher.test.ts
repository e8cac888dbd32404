import { describe, expect, it } from 'vitest'

import type { Page } from './types'
import { AuthenticationError, RenderError } from './errors'
import { KindleClient } from './kindle-client'
import { PageFetcher } from './page-fetcher'
import {
  createFakeKindle,
  createPngImage,
  type FakeKindleOptions,
  TEST_SESSION,
  textPage
} from './test-fixtures'

const asin = 'B0182LFAIA'

function createFetcher(
  {
    images,
    ...options
  }: Partial<FakeKindleOptions> & { images?: Record<string, Buffer> } = {},
  pagesPerRequest = 2
) {
  const fake = createFakeKindle({
    book: {
      asin,
      title: 'Fetched Book',
      pages: [
        textPage(99),
        textPage(199),
        textPage(299, { imageReference: 'resource/img0' }),
        textPage(399),
        textPage(420)
      ],
      toc: [
        { label: 'Chapter 1', tocPositionId: 0 },
        { label: 'Chapter 2', tocPositionId: 250 }
      ],
      images
    },
    ...options
  })

  const client = new KindleClient({
    session: TEST_SESSION,
    throttle: false,
    ky: fake.ky
  })

  const batches: number[] = []
  const fetcher = new PageFetcher({
    client,
    asin,
    pagesPerRequest,
    onBatch: ({ numPages }) => batches.push(numPages)
  })

  return { fake, fetcher, batches }
}

async function collect(pages: AsyncIterable<Page>): Promise<Page[]> {
  const result: Page[] = []
  for await (const page of pages) {
    result.push(page)
  }

  return result
}

describe('PageFetcher', () => {
  it('fetches every page in order with dense indices', async () => {
    const image = await createPngImage()
    const { fake, fetcher, batches } = createFetcher({
      images: { 'resource/img0': image }
    })

    const pages = await collect(fetcher.pages())

    expect(pages.map((page) => page.index)).toEqual([0, 1, 2, 3, 4])
    expect(
      pages.map((page) => [page.startPositionId, page.endPositionId])
    ).toEqual([
      [0, 99],
      [100, 199],
      [200, 299],
      [300, 399],
      [400, 420]
    ])
    expect(pages[0]?.width).toBe(595.2755905511812)
    expect(pages[0]?.dpi).toBe(160)
    expect(pages[2]?.images['resource/img0']).toEqual(image)
    expect(pages[3]?.images).toEqual({})
    expect(batches).toEqual([2, 4, 5])

    expect(
      fake.renderRequests.map((url) => url.searchParams.get('startingPosition'))
    ).toEqual(['0', '200', '400'])

    expect(fetcher.readingSession?.title).toBe('Fetched Book')
    expect(fetcher.toc).toEqual([
      { label: 'Chapter 1', positionId: 0, depth: 0 },
      { label: 'Chapter 2', positionId: 250, depth: 0 }
    ])
  })

  it('ends at an empty batch', async () => {
    const { fake, fetcher } = createFetcher({
      selectPages: (startingPosition) =>
        startingPosition === 0 ? [textPage(99), textPage(199)] : []
    })

    const pages = await collect(fetcher.pages())

    expect(pages.map((page) => page.endPositionId)).toEqual([99, 199])
    expect(fake.renderRequests).toHaveLength(2)
  })

  it('rejects pages out of order', async () => {
    const { fetcher } = createFetcher({
      selectPages: (startingPosition) =>
        startingPosition === 0 ? [textPage(199), textPage(99)] : []
    })

    await expect(collect(fetcher.pages())).rejects.toThrow(
      new RenderError(
        'Renderer returned page ending at position 99 after position 199 (out of order or duplicate page)'
      )
    )
  })

  it('rejects a renderer which does not advance', async () => {
    const { fetcher } = createFetcher({
      selectPages: () => [textPage(99)]
    })

    await expect(collect(fetcher.pages())).rejects.toBeInstanceOf(RenderError)
  })

  it('surfaces an expired session', async () => {
    const { fetcher } = createFetcher({ renderStatus: 403 })

    await expect(collect(fetcher.pages())).rejects.toBeInstanceOf(
      AuthenticationError
    )
  })
})
