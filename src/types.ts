/** Cookies for one domain, as sent by a logged in browser. */
export interface Session {
  domain: string
  cookies: Record<string, string>
}

export interface KaramelToken {
  token: string
  /** Epoch milliseconds */
  expiresAt: number
}

export interface DeviceInfo {
  deviceSessionToken: string
  clientHashId?: string
  eid?: string
  expiresAt?: number
}

/** Response of `/service/mobile/reader/startReading` */
export interface StartReadingBookResponse {
  clippingLimit?: number
  contentType?: string
  contentVersion?: string
  deliveredAsin?: string
  downloadRestrictionReason?: {
    reasonCode: string
  } | null
  format?: string
  formatVersion?: string
  hasAnnotations?: boolean
  isOwned: boolean
  isSample: boolean
  karamelToken: KaramelToken
  kindleSessionId?: string
  lastPageReadData?: {
    deviceName: string
    position: number
    syncTime: number
  }
  metadataUrl: string
  originType?: string
  requestedAsin?: string
  srl?: number
}

/** Amazon's YT Metadata */
export interface AmazonBookMeta {
  ACR?: string
  asin: string
  authorList?: Array<string>
  bookSize?: string
  bookType?: string
  cover?: string
  language?: string
  publisher?: string
  releaseDate?: string
  sample?: boolean
  title: string
  /** A hash unique to the book's version */
  version: string
  startPosition?: number
  endPosition: number
}

/** Everything needed to render pages of one book. */
export interface ReadingSession {
  asin: string
  title: string
  authors: string[]
  /** Content revision passed to the renderer */
  revision: string
  startPosition: number
  endPosition: number
  karamelToken: KaramelToken
}

export interface PageLayout {
  /** Page size in PDF points (1/72 inch) */
  pageWidth: number
  pageHeight: number
  dpi: number
  fontSize: number
  /** Margins in inches */
  marginTop: number
  marginRight: number
  marginBottom: number
  marginLeft: number
}

export interface AmazonRenderManifest {
  cdn?: {
    baseUrl: string
    /** Query string, e.g. `Policy=...&Signature=...` */
    authParameter: string
  }
  cdnResources?: Array<{
    url: string
  }>
}

export interface AmazonRenderGlyph {
  path?: string
}

export interface AmazonRenderFont {
  fontKey: string
  unitsPerEm: number
  glyphs: Record<string, AmazonRenderGlyph>
}

/** `[a, b, c, d, e, f]` affine matrix in renderer pixels */
export type AmazonRenderTransform = [
  number,
  number,
  number,
  number,
  number,
  number
]

interface AmazonRenderElementBase {
  startPositionId?: number
  transform: AmazonRenderTransform
  rect: {
    left?: number
    top?: number
    right: number
    bottom: number
  }
  link?: {
    linkPositionId: number
  }
}

export interface AmazonRenderRun extends AmazonRenderElementBase {
  type: 'run'
  fontKey: string
  fontSize: number
  textColor?: string
  glyphs?: number[]
  xPosition?: number[]
}

export interface AmazonRenderImage extends AmazonRenderElementBase {
  type: 'image'
  imageReference: string
}

export type AmazonRenderElement = AmazonRenderRun | AmazonRenderImage

export interface AmazonRenderPage {
  endPositionId: number
  children: AmazonRenderElement[]
}

export interface AmazonRenderMetadata {
  firstPositionId?: number
  lastPositionId?: number
}

export type AmazonRenderToc = Array<AmazonRenderTocItem>

export type AmazonRenderTocItem = {
  label: string
  tocPositionId: number
  entries?: AmazonRenderTocItem[]
}

export interface TocItem {
  label: string
  positionId: number
  depth: number
}

/** One render request's worth of pages. */
export interface RenderBatch {
  pages: AmazonRenderPage[]
  fonts: Record<string, AmazonRenderFont>
  /** Decrypted image bytes keyed by image reference */
  images: Record<string, Buffer>
  toc?: TocItem[]
  metadata?: AmazonRenderMetadata
}

/**
 * A single rendered page of a book. Immutable once fetched.
 */
export interface Page {
  /** 0-based, dense, ascending */
  index: number
  startPositionId: number
  endPositionId: number
  /** Page size in PDF points */
  width: number
  height: number
  dpi: number
  elements: AmazonRenderElement[]
  fonts: Record<string, AmazonRenderFont>
  images: Record<string, Buffer>
}

/** Contents of the persisted reMarkable token file. */
export interface DeviceTokenConfig {
  deviceToken: string
  deviceId?: string
  pairedAt?: string
}
