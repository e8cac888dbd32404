import { HTTPError } from 'ky'
import { describe, expect, it } from 'vitest'

import { AuthenticationError, NotOwnedError, RenderError } from './errors'
import { KindleClient } from './kindle-client'
import {
  createFakeKindle,
  createPngImage,
  type FakeBook,
  type FakeKindleOptions,
  TEST_SESSION,
  textPage
} from './test-fixtures'

const book: FakeBook = {
  asin: 'B000TEST01',
  title: 'A Test Book',
  authors: ['Ada Author', 'Bo Writer'],
  pages: [textPage(99), textPage(199, { imageReference: 'resource/img0' })]
}

async function createClient(options: Partial<FakeKindleOptions> = {}) {
  const fake = createFakeKindle({
    book: {
      ...book,
      images: { 'resource/img0': await createPngImage() }
    },
    ...options
  })

  const client = new KindleClient({
    session: TEST_SESSION,
    baseUrl: 'https://read.kindle.test',
    throttle: false,
    ky: fake.ky
  })

  return { client, fake }
}

describe('KindleClient', () => {
  it('starts a reading session', async () => {
    const { client, fake } = await createClient()

    const reading = await client.startReading(book.asin)

    expect(reading).toMatchObject({
      asin: 'B000TEST01',
      title: 'A Test Book',
      authors: ['Ada Author', 'Bo Writer'],
      revision: 'test-revision',
      startPosition: 0,
      endPosition: 199
    })

    const startReading = fake.requests[1]
    expect(new URL(startReading?.url ?? '').pathname).toBe(
      '/service/mobile/reader/startReading'
    )
    expect(startReading?.headers.get('x-adp-session-token')).toBe(
      'test-device-session'
    )
    expect(startReading?.headers.get('cookie')).toBe(
      'session-id=000-0000000-0000000; at-main=test-at-main'
    )
  })

  it('rejects a rejected session', async () => {
    const { client } = await createClient({ deviceTokenStatus: 401 })

    await expect(client.startReading(book.asin)).rejects.toBeInstanceOf(
      AuthenticationError
    )
  })

  it('rejects books which are not owned', async () => {
    const { client } = await createClient({ isOwned: false })

    await expect(client.startReading(book.asin)).rejects.toThrow(
      new NotOwnedError(book.asin)
    )
  })

  it('rejects samples', async () => {
    const { client } = await createClient({ isSample: true })

    await expect(client.startReading(book.asin)).rejects.toBeInstanceOf(
      NotOwnedError
    )
  })

  it('rejects books which cannot be downloaded', async () => {
    const { client } = await createClient({
      downloadRestrictionReason: 'DeviceLimitReached'
    })

    await expect(client.startReading(book.asin)).rejects.toThrow(
      'Book B000TEST01 is not available for download (DeviceLimitReached).'
    )
  })

  it('renders pages with the configured layout', async () => {
    const { client, fake } = await createClient()

    const batch = await client.renderPages({
      asin: book.asin,
      startingPosition: 0,
      numPages: 6
    })

    expect(batch.pages.map((page) => page.endPositionId)).toEqual([99, 199])
    expect(Object.keys(batch.fonts)).toEqual(['font-0'])

    const params = fake.renderRequests[0]?.searchParams
    expect(params?.get('width')).toBe('1322')
    expect(params?.get('height')).toBe('1870')
    expect(params?.get('dpi')).toBe('160')
    expect(params?.get('fontSize')).toBe('12')
    expect(params?.get('marginTop')).toBe('36')
    expect(params?.get('numPage')).toBe('6')
    expect(params?.get('revision')).toBe('test-revision')
  })

  it('downloads and decrypts images', async () => {
    const image = await createPngImage()
    const { client } = await createClient()

    const batch = await client.renderPages({
      asin: book.asin,
      startingPosition: 100,
      numPages: 6
    })

    expect(batch.pages.map((page) => page.endPositionId)).toEqual([199])
    expect(batch.images['resource/img0']).toEqual(image)
  })

  it('decrypts images bundled in the render package', async () => {
    const image = await createPngImage()
    const { client, fake } = await createClient({ bundleImages: true })

    const batch = await client.renderPages({
      asin: book.asin,
      startingPosition: 100,
      numPages: 6
    })

    expect(batch.images['resource/img0']).toEqual(image)
    expect(
      fake.requests.filter((request) => request.url.includes('cdn.kindle.test/images'))
    ).toHaveLength(0)
  })

  it('fails when an image is missing from the CDN', async () => {
    const fake = createFakeKindle({ book })
    const client = new KindleClient({
      session: TEST_SESSION,
      baseUrl: 'https://read.kindle.test',
      throttle: false,
      ky: fake.ky
    })

    await expect(
      client.renderPages({ asin: book.asin, startingPosition: 100, numPages: 6 })
    ).rejects.toThrow(new RenderError('Failed to download image resource/img0'))
  })

  it('maps an expired session while rendering to an AuthenticationError', async () => {
    const { client } = await createClient({ renderStatus: 401 })

    await expect(
      client.renderPages({ asin: book.asin, startingPosition: 0, numPages: 6 })
    ).rejects.toThrow(
      'Kindle session expired while rendering B000TEST01 (HTTP 401)'
    )
  })

  it('reports any other renderer failure as a RenderError', async () => {
    const { client } = await createClient({ renderStatus: 500 })

    const err = await client
      .renderPages({ asin: book.asin, startingPosition: 0, numPages: 6 })
      .catch((err: unknown) => err)

    expect(err).toBeInstanceOf(RenderError)
    expect(err).toMatchObject({
      message: 'Renderer request for B000TEST01 failed (HTTP 500)',
      cause: expect.any(HTTPError)
    })
  })

  it('maps a rejected metadata request to an AuthenticationError', async () => {
    const { client } = await createClient({ metadataStatus: 403 })

    const err = await client.startReading(book.asin).catch((err: unknown) => err)

    expect(err).toBeInstanceOf(AuthenticationError)
    expect(err).toMatchObject({
      message: 'Kindle session expired while opening B000TEST01 (HTTP 403)'
    })
  })

  it('reports a failed metadata request as a RenderError', async () => {
    const { client } = await createClient({ metadataStatus: 500 })

    await expect(client.startReading(book.asin)).rejects.toThrow(
      new RenderError('Failed to fetch metadata for book B000TEST01 (HTTP 500)')
    )
  })

  it('starts a new session per render request when asked to', async () => {
    const fake = createFakeKindle({ book })
    const client = new KindleClient({
      session: TEST_SESSION,
      baseUrl: 'https://read.kindle.test',
      refreshSession: true,
      throttle: false,
      ky: fake.ky
    })

    await client.renderPages({ asin: book.asin, startingPosition: 0, numPages: 1 })
    await client.renderPages({ asin: book.asin, startingPosition: 100, numPages: 1 })

    const startReadingRequests = fake.requests.filter((request) =>
      request.url.includes('/startReading')
    )
    expect(startReadingRequests).toHaveLength(2)
  })
})
