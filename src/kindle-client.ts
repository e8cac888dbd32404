import defaultKy, { HTTPError, type KyInstance } from 'ky'
import pThrottle from 'p-throttle'

import type {
  AmazonBookMeta,
  AmazonRenderManifest,
  DeviceInfo,
  KaramelToken,
  PageLayout,
  ReadingSession,
  RenderBatch,
  Session,
  StartReadingBookResponse
} from './types'
import {
  AuthenticationError,
  type Kindle2PdfError,
  NotOwnedError,
  RenderError
} from './errors'
import { decryptImage } from './image-decryption'
import { readRenderPackage } from './render-package'
import {
  assert,
  getEnv,
  getHttpStatus,
  parseJsonpResponse,
  serializeCookies
} from './utils'

// Allow up to 3 requests per second by default.
const defaultThrottle = pThrottle({
  limit: 3,
  interval: 1000
})

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'

/** Device type (and serial number) used by the Kindle Cloud Reader web app. */
export const WEB_READER_DEVICE_TYPE = 'A2CTZ977SKFQZY'

/** A4 at 160 DPI with half inch margins. */
export const DEFAULT_PAGE_LAYOUT: PageLayout = {
  pageWidth: 595.2755905511812,
  pageHeight: 841.8897637795277,
  dpi: 160,
  fontSize: 12,
  marginTop: 0.5,
  marginRight: 0.5,
  marginBottom: 0.5,
  marginLeft: 0.5
}

// Refresh the karamel token this long before it expires.
const TOKEN_EXPIRY_MARGIN_MS = 5000

export class KindleClient {
  protected readonly session: Session
  protected readonly baseUrl: string
  protected readonly clientVersion: string
  protected readonly layout: PageLayout
  protected readonly refreshSession: boolean
  protected readonly ky: KyInstance

  protected adpSessionId?: string
  protected readingSession?: ReadingSession

  constructor({
    session,
    baseUrl = getEnv('KINDLE_BASE_URL') ?? 'https://read.amazon.com',
    clientVersion = '20000100',
    layout = {},
    refreshSession = false,
    throttle = true,
    ky = defaultKy
  }: {
    session: Session
    baseUrl?: string
    clientVersion?: string
    layout?: Partial<PageLayout>
    /**
     * Start a new reading session before every render request, so that a
     * captured sequence of responses can be replayed exactly.
     */
    refreshSession?: boolean
    throttle?: boolean
    ky?: KyInstance
  }) {
    assert(session, 'KindleClient missing required "session"')

    this.session = session
    this.baseUrl = baseUrl
    this.clientVersion = clientVersion
    this.layout = { ...DEFAULT_PAGE_LAYOUT, ...layout }
    this.refreshSession = refreshSession
    this.ky = ky.extend({
      retry: 0,
      timeout: 60_000,
      hooks: {
        ...(throttle
          ? {
              beforeRequest: [
                // Enforce a default rate-limit to help evade detection.
                defaultThrottle(() => Promise.resolve(undefined))
              ]
            }
          : undefined)
      }
    })
  }

  get pageLayout(): PageLayout {
    return this.layout
  }

  /**
   * Registers this reader with Amazon, which only succeeds for a logged in
   * session.
   */
  async getDeviceToken(): Promise<DeviceInfo> {
    const deviceInfo = await this._amazonJson<DeviceInfo>(
      `${this.baseUrl}/service/web/register/getDeviceToken`,
      {
        serialNumber: WEB_READER_DEVICE_TYPE,
        deviceType: WEB_READER_DEVICE_TYPE
      },
      'Unable to register a Kindle reader session: ensure you have logged in recently to https://read.amazon.com in Chrome'
    )

    // Captured responses have the token blanked, so only a missing token is
    // an error.
    if (typeof deviceInfo?.deviceSessionToken !== 'string') {
      throw new AuthenticationError(
        'Amazon did not return a device session token'
      )
    }

    this.adpSessionId = deviceInfo.deviceSessionToken
    return deviceInfo
  }

  /**
   * Starts a new reading session for a book, verifying that the account owns
   * it and fetching the book's metadata.
   */
  async startReading(asin: string): Promise<ReadingSession> {
    await this.getDeviceToken()

    const info = await this._amazonJson<StartReadingBookResponse>(
      `${this.baseUrl}/service/mobile/reader/startReading`,
      {
        asin,
        clientVersion: this.clientVersion
      },
      `Unable to open book ${asin}: your Amazon session may have expired`
    )

    if (info.downloadRestrictionReason) {
      throw new NotOwnedError(
        asin,
        `Book ${asin} is not available for download (${info.downloadRestrictionReason.reasonCode}).`
      )
    }

    if (!info.isOwned || info.isSample) {
      throw new NotOwnedError(asin)
    }

    let metadataBody: string
    try {
      metadataBody = await this.ky.get(info.metadataUrl).text()
    } catch (err) {
      throw toRequestError(err, {
        expired: `Kindle session expired while opening ${asin}`,
        failed: `Failed to fetch metadata for book ${asin}`
      })
    }

    const meta = parseJsonpResponse<AmazonBookMeta>(metadataBody)
    if (!meta?.title || meta.endPosition === undefined) {
      throw new RenderError(`Failed to fetch metadata for book ${asin}`)
    }

    this.readingSession = {
      asin,
      title: meta.title,
      authors: meta.authorList ?? [],
      revision: meta.version,
      startPosition: meta.startPosition ?? 0,
      endPosition: meta.endPosition,
      karamelToken: info.karamelToken
    }

    return this.readingSession
  }

  /**
   * Renders `numPages` pages starting at `startingPosition` and returns them
   * together with the fonts and decrypted images they reference.
   */
  async renderPages({
    asin,
    startingPosition,
    numPages
  }: {
    asin: string
    startingPosition: number
    numPages: number
  }): Promise<RenderBatch> {
    const reading = await this._ensureReadingSession(asin)
    const { karamelToken } = reading
    const layout = this.layout

    const searchParams = {
      version: '3.0',
      asin,
      contentType: 'FullBook',
      revision: reading.revision,
      fontFamily: 'Bookerly',
      fontSize: `${layout.fontSize}`,
      lineHeight: '1.4',
      dpi: `${layout.dpi}`,
      height: `${Math.trunc((layout.pageHeight * layout.dpi) / 72)}`,
      width: `${Math.trunc((layout.pageWidth * layout.dpi) / 72)}`,
      marginBottom: `${Math.trunc(layout.marginBottom * 72)}`,
      marginLeft: `${Math.trunc(layout.marginLeft * 72)}`,
      marginRight: `${Math.trunc(layout.marginRight * 72)}`,
      marginTop: `${Math.trunc(layout.marginTop * 72)}`,
      maxNumberColumns: '1',
      theme: 'default',
      locationMap: 'true',
      packageType: 'TAR',
      encryptionVersion: 'NONE',
      numPage: `${numPages}`,
      skipPageCount: '0',
      startingPosition: `${startingPosition}`,
      // Bundling images doesn't work for all books
      bundleImages: 'false',
      token: karamelToken.token
    }

    let body: ArrayBuffer
    try {
      body = await this.ky
        .get(`${this.baseUrl}/renderer/render`, {
          searchParams,
          headers: this._headers()
        })
        .arrayBuffer()
    } catch (err) {
      throw toRequestError(err, {
        expired: `Kindle session expired while rendering ${asin}`,
        failed: `Renderer request for ${asin} failed`
      })
    }

    const renderPackage = await readRenderPackage(new Uint8Array(body))
    const encryptedImages = Object.keys(renderPackage.assets).length
      ? renderPackage.assets
      : await this._downloadImages(renderPackage.manifest, karamelToken)

    const images: Record<string, Buffer> = {}
    for (const [reference, data] of Object.entries(encryptedImages)) {
      images[reference] = decryptImage(data, karamelToken, reference)
    }

    return {
      pages: renderPackage.pages,
      fonts: renderPackage.fonts,
      images,
      toc: renderPackage.toc,
      metadata: renderPackage.metadata
    }
  }

  protected async _ensureReadingSession(
    asin: string
  ): Promise<ReadingSession> {
    const reading = this.readingSession

    if (
      this.refreshSession ||
      !reading ||
      reading.asin !== asin ||
      Date.now() > reading.karamelToken.expiresAt - TOKEN_EXPIRY_MARGIN_MS
    ) {
      return this.startReading(asin)
    }

    return reading
  }

  protected async _downloadImages(
    manifest: AmazonRenderManifest | undefined,
    karamelToken: KaramelToken
  ): Promise<Record<string, Buffer>> {
    const images: Record<string, Buffer> = {}
    const resources = manifest?.cdnResources ?? []
    if (!resources.length) {
      return images
    }

    assert(
      manifest?.cdn,
      new RenderError('Render manifest is missing its CDN configuration')
    )

    const searchParams = new URLSearchParams(manifest.cdn.authParameter)
    searchParams.set('token', karamelToken.token)
    searchParams.set('expiration', `${karamelToken.expiresAt}`)

    for (const resource of resources) {
      try {
        const data = await this.ky
          .get(`${manifest.cdn.baseUrl}/${resource.url}`, { searchParams })
          .arrayBuffer()
        images[resource.url] = Buffer.from(data)
      } catch (err) {
        throw new RenderError(`Failed to download image ${resource.url}`, {
          cause: err
        })
      }
    }

    return images
  }

  /**
   * GETs a JSON endpoint on the Kindle Cloud Reader, mapping rejected or
   * non-JSON (e.g. sign-in page) responses to an `AuthenticationError`.
   */
  protected async _amazonJson<T>(
    url: string,
    searchParams: Record<string, string>,
    message: string
  ): Promise<T> {
    try {
      return await this.ky
        .get(url, { searchParams, headers: this._headers() })
        .json<T>()
    } catch (err) {
      if (err instanceof HTTPError || err instanceof SyntaxError) {
        throw new AuthenticationError(message, { cause: err })
      }

      throw err
    }
  }

  protected _headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Cookie: serializeCookies(this.session.cookies),
      'Accept-Language': 'en-US,en;q=0.9',
      'User-Agent': USER_AGENT
    }

    const sessionId = this.session.cookies['session-id']
    if (sessionId) {
      headers['x-amzn-sessionid'] = sessionId
    }

    if (this.adpSessionId) {
      headers['x-adp-session-token'] = this.adpSessionId
    }

    return headers
  }
}

/**
 * 401/403 mean the Amazon session is no longer valid; anything else is a
 * failure to render the book.
 */
function toRequestError(
  err: unknown,
  { expired, failed }: { expired: string; failed: string }
): Kindle2PdfError {
  const status = getHttpStatus(err)
  if (status === 401 || status === 403) {
    return new AuthenticationError(`${expired} (HTTP ${status})`, {
      cause: err
    })
  }

  return new RenderError(
    status === undefined ? failed : `${failed} (HTTP ${status})`,
    { cause: err }
  )
}
