import { once } from 'node:events'
import fs from 'node:fs'
import fsp from 'node:fs/promises'

import PDFDocument from 'pdfkit'
import sharp from 'sharp'

import type {
  AmazonRenderFont,
  AmazonRenderImage,
  AmazonRenderRun,
  AmazonRenderTransform,
  Page,
  TocItem
} from './types'
import { OutputError, RenderError } from './errors'

export interface AssembledPdf {
  path: string
  numPages: number
}

interface PendingLink {
  pageIndex: number
  positionId: number
  x: number
  y: number
  width: number
  height: number
}

interface Rect {
  x: number
  y: number
  width: number
  height: number
}

// Relative move commands in Amazon's glyph paths produce stray lines.
const RELATIVE_MOVE_REGEX = /m[\d.,\-\s]+/g

/**
 * Writes the pages, in order, into a single PDF with one output page per
 * input page.
 *
 * The document is written to `<outputPath>.partial` and only renamed to
 * `outputPath` once every page has been rendered, so a failure never leaves a
 * PDF behind.
 */
export async function assemblePdf(
  pages: AsyncIterable<Page> | Iterable<Page>,
  {
    outputPath,
    title,
    author,
    getToc
  }: {
    outputPath: string
    title?: string
    author?: string
    /** Called once all pages are rendered */
    getToc?: () => readonly TocItem[]
  }
): Promise<AssembledPdf> {
  const tempPath = `${outputPath}.partial`
  const info: PDFKit.DocumentInfo = {}
  if (title) info.Title = title
  if (author) info.Author = author

  const doc = new PDFDocument({
    autoFirstPage: false,
    bufferPages: true,
    displayTitle: !!title,
    info
  })

  const stream = fs.createWriteStream(tempPath)
  let streamError: Error | undefined
  stream.on('error', (err) => {
    streamError = err
  })
  doc.pipe(stream)

  const pageStartPositions: number[] = []
  const links: PendingLink[] = []
  let lastEndPosition = -1
  let numPages = 0

  const outputError = (cause: unknown) =>
    new OutputError(`Unable to write ${outputPath}`, { cause })

  try {
    // Fail before pulling any page if the output can't be created.
    try {
      await once(stream, 'open')
    } catch (err) {
      throw outputError(err)
    }

    for await (const page of pages) {
      if (streamError) {
        throw outputError(streamError)
      }

      if (page.index !== numPages) {
        throw new RenderError(
          `Expected page ${numPages} but received page ${page.index}`
        )
      }

      doc.addPage({ size: [page.width, page.height], margin: 0 })
      doc.addNamedDestination(destinationName(page.index))
      links.push(...(await renderPage(doc, page)))

      pageStartPositions.push(page.startPositionId)
      lastEndPosition = page.endPositionId
      ++numPages
    }

    if (!numPages) {
      throw new RenderError('The book has no pages to render')
    }

    const findPage = (positionId: number) =>
      findPageForPosition(pageStartPositions, lastEndPosition, positionId)

    for (const link of links) {
      const targetPage = findPage(link.positionId)
      if (targetPage === undefined) continue

      doc.switchToPage(link.pageIndex)
      doc.goTo(
        link.x,
        link.y,
        link.width,
        link.height,
        destinationName(targetPage)
      )
    }

    addOutline(doc, getToc?.() ?? [], findPage)

    doc.end()
    await new Promise<void>((resolve, reject) => {
      if (streamError) {
        reject(outputError(streamError))
        return
      }

      stream.on('finish', resolve)
      stream.on('error', (err) => reject(outputError(err)))
    })

    try {
      await fsp.rename(tempPath, outputPath)
    } catch (err) {
      throw outputError(err)
    }
  } catch (err) {
    doc.unpipe(stream)
    stream.destroy()
    await fsp.rm(tempPath, { force: true })
    throw err
  }

  return { path: outputPath, numPages }
}

/**
 * Index of the page containing `positionId`, or `undefined` if the position
 * lies outside of the rendered pages.
 */
export function findPageForPosition(
  pageStartPositions: readonly number[],
  lastEndPosition: number,
  positionId: number
): number | undefined {
  const first = pageStartPositions[0]
  if (first === undefined || positionId < first || positionId > lastEndPosition) {
    return undefined
  }

  let lo = 0
  let hi = pageStartPositions.length - 1

  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2)
    const start = pageStartPositions[mid] ?? Infinity

    if (start <= positionId) {
      lo = mid
    } else {
      hi = mid - 1
    }
  }

  return lo
}

async function renderPage(
  doc: PDFKit.PDFDocument,
  page: Page
): Promise<PendingLink[]> {
  const links: PendingLink[] = []
  const scale = 72 / page.dpi

  for (const element of page.elements) {
    if (!hasGeometry(element)) {
      throw new RenderError(
        `Page ${page.index} has an element without a valid transform or rect`
      )
    }

    const transform = scaleTransform(element.transform, scale)
    const rect: Rect = {
      x: transform[4],
      y: transform[5],
      width: element.rect.right * transform[0],
      height: element.rect.bottom * transform[3]
    }

    switch (element.type) {
      case 'run':
        drawRun(doc, element, page.fonts, transform)
        break

      case 'image':
        await drawImage(doc, element, page, rect)
        break
    }

    if (element.link) {
      links.push({
        pageIndex: page.index,
        positionId: element.link.linkPositionId,
        ...rect
      })
    }
  }

  return links
}

function hasGeometry({
  transform,
  rect
}: {
  transform?: unknown
  rect?: unknown
}): boolean {
  return (
    Array.isArray(transform) &&
    transform.length === 6 &&
    transform.every((value) => Number.isFinite(value)) &&
    typeof rect === 'object' &&
    rect !== null &&
    'right' in rect &&
    typeof rect.right === 'number' &&
    'bottom' in rect &&
    typeof rect.bottom === 'number'
  )
}

function drawRun(
  doc: PDFKit.PDFDocument,
  run: AmazonRenderRun,
  fonts: Record<string, AmazonRenderFont>,
  transform: AmazonRenderTransform
) {
  const glyphs = run.glyphs ?? []
  if (!glyphs.length) return

  const font = fonts[run.fontKey]
  if (!font) {
    throw new RenderError(`Missing glyphs for font "${run.fontKey}"`)
  }

  const color = run.textColor ?? '#000000'
  const glyphScale = run.fontSize / font.unitsPerEm

  doc.save()
  doc.transform(...transform)

  glyphs.forEach((glyphId, i) => {
    const path = font.glyphs[`${glyphId}`]?.path
    if (!path) return

    doc.save()
    doc.translate(run.xPosition?.[i] ?? 0, 0)
    doc.scale(glyphScale)
    doc.path(path.replaceAll(RELATIVE_MOVE_REGEX, '')).fillAndStroke(color, color)
    doc.restore()
  })

  doc.restore()
}

async function drawImage(
  doc: PDFKit.PDFDocument,
  image: AmazonRenderImage,
  page: Page,
  { x, y, width, height }: Rect
) {
  const data = page.images[image.imageReference]
  if (!data) {
    throw new RenderError(
      `Page ${page.index} references missing image ${image.imageReference}`
    )
  }

  const source = await toEmbeddableImage(data, image.imageReference)

  try {
    doc.image(source, x, y, { width, height })
  } catch (err) {
    throw new RenderError(
      `Unable to decode image ${image.imageReference} on page ${page.index}`,
      { cause: err }
    )
  }
}

/**
 * PDFKit only embeds JPEG and PNG, so anything else is converted to PNG.
 */
export async function toEmbeddableImage(
  data: Buffer,
  reference: string
): Promise<Buffer> {
  try {
    const { format } = await sharp(data).metadata()
    if (format === 'jpeg' || format === 'png') {
      return data
    }

    return await sharp(data).png().toBuffer()
  } catch (err) {
    throw new RenderError(`Unable to decode image ${reference}`, {
      cause: err
    })
  }
}

function addOutline(
  doc: PDFKit.PDFDocument,
  toc: readonly TocItem[],
  findPage: (positionId: number) => number | undefined
) {
  // parents[depth] is the outline node which items of that depth go into
  const parents: Array<typeof doc.outline> = [doc.outline]

  for (const item of toc) {
    const pageIndex = findPage(item.positionId)
    if (pageIndex === undefined) continue

    const parentIndex = Math.min(item.depth, parents.length - 1)
    const parent = parents[parentIndex] ?? doc.outline

    doc.switchToPage(pageIndex)
    const outlineItem = parent.addItem(item.label)

    parents.length = parentIndex + 1
    parents.push(outlineItem)
  }
}

function scaleTransform(
  [a, b, c, d, e, f]: AmazonRenderTransform,
  scale: number
): AmazonRenderTransform {
  return [a * scale, b * scale, c * scale, d * scale, e * scale, f * scale]
}

function destinationName(pageIndex: number): string {
  return `page-${pageIndex}`
}
