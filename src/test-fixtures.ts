import crypto from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'

import ky, { type KyInstance } from 'ky'
import sharp from 'sharp'
import { create } from 'tar'
import { temporaryDirectory } from 'tempy'

import type {
  AmazonRenderFont,
  AmazonRenderPage,
  AmazonRenderToc,
  KaramelToken,
  Session
} from './types'
import { getKeyMaterial } from './image-decryption'

// Helpers shared by the test suites: an in-process stand-in for the Kindle
// Cloud Reader and the reMarkable Cloud, and small fixture builders.

export const TEST_SESSION: Session = {
  domain: 'read.amazon.com',
  cookies: {
    'session-id': '000-0000000-0000000',
    'at-main': 'test-at-main'
  }
}

export const TEST_FONTS: AmazonRenderFont[] = [
  {
    fontKey: 'font-0',
    unitsPerEm: 1000,
    glyphs: {
      '1': { path: 'M0 0L500 0L500 700L0 700Z' },
      '2': { path: 'M0 0L400 0L400 700Z m10 10' }
    }
  }
]

export function testKaramelToken(
  expiresAt = Date.now() + 3_600_000
): KaramelToken {
  return {
    token: `test-karamel-${'abcdefghij'.repeat(12)}`,
    expiresAt
  }
}

/** A page with one line of text ending at `endPositionId`. */
export function textPage(
  endPositionId: number,
  {
    link,
    imageReference
  }: { link?: number; imageReference?: string } = {}
): AmazonRenderPage {
  const page: AmazonRenderPage = {
    endPositionId,
    children: [
      {
        type: 'run',
        fontKey: 'font-0',
        fontSize: 24,
        textColor: '#000000',
        glyphs: [1, 2],
        xPosition: [0, 12],
        transform: [1, 0, 0, 1, 100, 200],
        rect: { right: 50, bottom: 20 },
        ...(link === undefined ? {} : { link: { linkPositionId: link } })
      }
    ]
  }

  if (imageReference) {
    page.children.push({
      type: 'image',
      imageReference,
      transform: [1, 0, 0, 1, 100, 300],
      rect: { right: 200, bottom: 100 }
    })
  }

  return page
}

export async function createPngImage(
  width = 8,
  height = 8
): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 200, g: 40, b: 40 }
    }
  })
    .png()
    .toBuffer()
}

/** Encrypts image bytes the way the renderer CDN serves them. */
export function encryptImage(data: Buffer, karamelToken: KaramelToken): Buffer {
  const keyMaterial = getKeyMaterial(karamelToken)
  const salt = crypto.randomBytes(16)
  const iv = crypto.randomBytes(16)
  const key = crypto.pbkdf2Sync(keyMaterial, salt, 1000, 16, 'sha256')
  const cipher = crypto.createCipheriv('aes-128-gcm', key, iv)
  cipher.setAAD(keyMaterial.subarray(0, 9))
  const encrypted = Buffer.concat([
    cipher.update(data),
    cipher.final(),
    cipher.getAuthTag()
  ])

  return Buffer.from(
    `${salt.toString('base64')}${iv.toString('base64')}${encrypted.toString('base64')}`,
    'latin1'
  )
}

/** Packs `files` (relative path to contents) into an in-memory TAR. */
export async function createTar(
  files: Record<string, string | Buffer>
): Promise<Buffer> {
  const dir = temporaryDirectory()

  try {
    for (const [name, contents] of Object.entries(files)) {
      const filePath = path.join(dir, name)
      await fs.mkdir(path.dirname(filePath), { recursive: true })
      await fs.writeFile(filePath, contents)
    }

    const chunks: Buffer[] = []
    for await (const chunk of create({ cwd: dir, portable: true }, Object.keys(files))) {
      chunks.push(chunk)
    }

    return Buffer.concat(chunks)
  } finally {
    await fs.rm(dir, { recursive: true, force: true })
  }
}

export interface FakeBook {
  asin: string
  title: string
  authors?: string[]
  pages: AmazonRenderPage[]
  toc?: AmazonRenderToc
  /** Plain image bytes keyed by image reference */
  images?: Record<string, Buffer>
}

export interface FakeKindleOptions {
  book: FakeBook
  isOwned?: boolean
  isSample?: boolean
  downloadRestrictionReason?: string
  /** Serve images inside the render package instead of from the CDN */
  bundleImages?: boolean
  /** Status for every render request; defaults to 200 */
  renderStatus?: number
  /** Status for the device token request; defaults to 200 */
  deviceTokenStatus?: number
  /** Status for the JSONP metadata request; defaults to 200 */
  metadataStatus?: number
  karamelToken?: KaramelToken
  /** Overrides which pages a render request returns */
  selectPages?: (
    startingPosition: number,
    numPages: number
  ) => AmazonRenderPage[]
}

export interface FakeKindle {
  ky: KyInstance
  /** Every request received, in order */
  requests: Request[]
  renderRequests: URL[]
}

export const FAKE_CDN_BASE_URL = 'https://cdn.kindle.test/images'

/**
 * An in-process Kindle Cloud Reader, served through `ky`'s `fetch` option.
 */
export function createFakeKindle(options: FakeKindleOptions): FakeKindle {
  const {
    book,
    isOwned = true,
    isSample = false,
    downloadRestrictionReason,
    bundleImages = false,
    renderStatus = 200,
    deviceTokenStatus = 200,
    metadataStatus = 200,
    karamelToken = testKaramelToken(),
    selectPages = (startingPosition, numPages) =>
      book.pages
        .filter((page) => page.endPositionId >= startingPosition)
        .slice(0, numPages)
  } = options
  const images = book.images ?? {}
  const requests: Request[] = []
  const renderRequests: URL[] = []

  const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json;charset=UTF-8' }
    })

  const handle = async (request: Request): Promise<Response> => {
    const url = new URL(request.url)

    switch (url.pathname) {
      case '/service/web/register/getDeviceToken':
        if (deviceTokenStatus !== 200) {
          return new Response('<html>Sign in</html>', {
            status: deviceTokenStatus,
            headers: { 'content-type': 'text/html' }
          })
        }

        return json({
          deviceSessionToken: 'test-device-session',
          clientHashId: 'test-client-hash',
          eid: 'test-eid',
          expiresAt: karamelToken.expiresAt
        })

      case '/service/mobile/reader/startReading':
        return json({
          isOwned,
          isSample,
          karamelToken,
          kindleSessionId: 'test-kindle-session',
          metadataUrl: `https://cdn.kindle.test/metadata/${book.asin}.jsonp`,
          downloadRestrictionReason: downloadRestrictionReason
            ? { reasonCode: downloadRestrictionReason }
            : null
        })

      case `/metadata/${book.asin}.jsonp`:
        if (metadataStatus !== 200) {
          return new Response('', { status: metadataStatus })
        }

        return new Response(
          `loadMetadata(${JSON.stringify({
            asin: book.asin,
            title: book.title,
            authorList: book.authors ?? [],
            version: 'test-revision',
            startPosition: 0,
            endPosition: book.pages.at(-1)?.endPositionId ?? 0
          })});`,
          { headers: { 'content-type': 'application/javascript' } }
        )

      case '/renderer/render': {
        renderRequests.push(url)
        if (renderStatus !== 200) {
          return new Response('', { status: renderStatus })
        }

        const startingPosition = Number(url.searchParams.get('startingPosition'))
        const numPages = Number(url.searchParams.get('numPage'))
        const pages = selectPages(startingPosition, numPages)
        if (!pages.length) {
          return new Response(new Uint8Array(0), {
            headers: { 'content-type': 'application/x-tar' }
          })
        }

        const references = [
          ...new Set(
            pages.flatMap((page) =>
              page.children.flatMap((element) =>
                element.type === 'image' ? [element.imageReference] : []
              )
            )
          )
        ]

        const files: Record<string, string | Buffer> = {
          'manifest.json': JSON.stringify({
            cdn: {
              baseUrl: FAKE_CDN_BASE_URL,
              authParameter: 'Policy=test-policy&Signature=test-signature'
            },
            cdnResources: bundleImages
              ? []
              : references.map((reference) => ({ url: reference }))
          }),
          'metadata.json': JSON.stringify({ firstPositionId: 0 }),
          'glyphs.json': JSON.stringify(TEST_FONTS),
          [`page_data_0_${pages.length - 1}.json`]: JSON.stringify(pages)
        }

        if (book.toc) {
          files['toc.json'] = JSON.stringify(book.toc)
        }

        if (bundleImages) {
          for (const reference of references) {
            const image = images[reference]
            if (image) {
              files[`assets/${reference}`] = encryptImage(image, karamelToken)
            }
          }
        }

        return new Response(await createTar(files), {
          headers: { 'content-type': 'application/x-tar' }
        })
      }
    }

    const cdnPath = `${url.origin}${url.pathname}`
    if (cdnPath.startsWith(`${FAKE_CDN_BASE_URL}/`)) {
      const image = images[cdnPath.slice(FAKE_CDN_BASE_URL.length + 1)]
      if (image && url.searchParams.get('token') === karamelToken.token) {
        return new Response(encryptImage(image, karamelToken), {
          headers: { 'content-type': 'application/octet-stream' }
        })
      }
    }

    return new Response('Not Found', { status: 404 })
  }

  return {
    ky: ky.create({
      fetch: async (input: string | URL | Request, init?: RequestInit) => {
        const request = input instanceof Request ? input : new Request(input, init)
        requests.push(request)
        return handle(request)
      }
    }),
    requests,
    renderRequests
  }
}

export interface FakeRemarkableUpload {
  title: string
  size: number
}

export interface FakeRemarkable {
  ky: KyInstance
  /** Device tokens issued so far, in order */
  deviceTokens: string[]
  uploads: FakeRemarkableUpload[]
  /** Makes the cloud reject a previously issued device token */
  revoke(deviceToken: string): void
}

export const TEST_ONE_TIME_CODE = 'testcode'

/**
 * An in-process reMarkable Cloud which accepts `TEST_ONE_TIME_CODE`.
 */
export function createFakeRemarkable({
  uploadStatus = 200
}: { uploadStatus?: number } = {}): FakeRemarkable {
  const deviceTokens: string[] = []
  const revoked = new Set<string>()
  const accessTokens = new Set<string>()
  const uploads: FakeRemarkableUpload[] = []

  const bearer = (request: Request) =>
    request.headers.get('authorization')?.replace(/^Bearer /, '') ?? ''

  const handle = async (request: Request): Promise<Response> => {
    const url = new URL(request.url)

    if (request.method !== 'POST') {
      return new Response('Method Not Allowed', { status: 405 })
    }

    switch (url.pathname) {
      case '/token/json/2/device/new': {
        const body: unknown = await request.json()
        const code =
          body && typeof body === 'object' && 'code' in body ? body.code : undefined
        if (code !== TEST_ONE_TIME_CODE) {
          return new Response('Invalid code', { status: 400 })
        }

        const deviceToken = `test-device-token-${deviceTokens.length + 1}`
        deviceTokens.push(deviceToken)
        return new Response(deviceToken)
      }

      case '/token/json/2/user/new': {
        const deviceToken = bearer(request)
        if (!deviceTokens.includes(deviceToken) || revoked.has(deviceToken)) {
          return new Response('Unauthorized', { status: 401 })
        }

        const accessToken = `test-access-token-for-${deviceToken}`
        accessTokens.add(accessToken)
        return new Response(accessToken)
      }

      case '/doc/v2/files': {
        if (!accessTokens.has(bearer(request))) {
          return new Response('Unauthorized', { status: 401 })
        }

        if (uploadStatus !== 200) {
          return new Response('Upload failed', { status: uploadStatus })
        }

        const meta: unknown = JSON.parse(
          Buffer.from(request.headers.get('rm-meta') ?? '', 'base64').toString(
            'utf8'
          )
        )
        const title =
          meta && typeof meta === 'object' && 'file_name' in meta
            ? String(meta.file_name)
            : ''
        const size = (await request.arrayBuffer()).byteLength
        if (request.headers.get('content-type') !== 'application/pdf' || !size) {
          return new Response('Bad Request', { status: 400 })
        }

        uploads.push({ title, size })
        return new Response(
          JSON.stringify({ docID: `test-doc-${uploads.length}`, hash: 'test-hash' }),
          { headers: { 'content-type': 'application/json' } }
        )
      }
    }

    return new Response('Not Found', { status: 404 })
  }

  return {
    ky: ky.create({
      fetch: async (input: string | URL | Request, init?: RequestInit) =>
        handle(input instanceof Request ? input : new Request(input, init))
    }),
    deviceTokens,
    uploads,
    revoke: (deviceToken) => {
      revoked.add(deviceToken)
    }
  }
}
