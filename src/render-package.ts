import fs from 'node:fs/promises'
import path from 'node:path'

import { globby } from 'globby'

import type {
  AmazonRenderFont,
  AmazonRenderManifest,
  AmazonRenderMetadata,
  AmazonRenderPage,
  AmazonRenderToc,
  AmazonRenderTocItem,
  TocItem
} from './types'
import { RenderError } from './errors'
import { extractTar, readJsonFile, tryReadJsonFile } from './utils'

/** The parsed contents of a `/renderer/render` TAR package. */
export interface RenderPackage {
  manifest?: AmazonRenderManifest
  fonts: Record<string, AmazonRenderFont>
  pages: AmazonRenderPage[]
  toc?: TocItem[]
  metadata?: AmazonRenderMetadata
  /** Bundled (still encrypted) images keyed by image reference */
  assets: Record<string, Buffer>
}

export async function readRenderPackage(
  body: Uint8Array
): Promise<RenderPackage> {
  if (!body.length) {
    return { fonts: {}, pages: [], assets: {} }
  }

  let dir: string
  try {
    dir = await extractTar(body)
  } catch (err) {
    throw new RenderError('Unable to unpack render package', { cause: err })
  }

  try {
    const manifest = await tryReadJsonFile<AmazonRenderManifest>(
      path.join(dir, 'manifest.json')
    )
    const metadata = await tryReadJsonFile<AmazonRenderMetadata>(
      path.join(dir, 'metadata.json')
    )
    const rawFonts =
      (await tryReadJsonFile<AmazonRenderFont[]>(
        path.join(dir, 'glyphs.json')
      )) ?? []
    const rawToc = await tryReadJsonFile<AmazonRenderToc>(
      path.join(dir, 'toc.json')
    )

    const [pageDataFile] = await globby('page_data_0_*.json', { cwd: dir })
    let pages: AmazonRenderPage[] = []
    if (pageDataFile) {
      try {
        pages = await readJsonFile<AmazonRenderPage[]>(
          path.join(dir, pageDataFile)
        )
      } catch (err) {
        throw new RenderError(`Invalid page data in ${pageDataFile}`, {
          cause: err
        })
      }
    }

    const assets: Record<string, Buffer> = {}
    for (const file of await globby('assets/**/*', { cwd: dir })) {
      assets[file.slice('assets/'.length)] = await fs.readFile(
        path.join(dir, file)
      )
    }

    return {
      manifest,
      metadata,
      fonts: Object.fromEntries(rawFonts.map((font) => [font.fontKey, font])),
      pages,
      toc: rawToc ? flattenToc(rawToc) : undefined,
      assets
    }
  } finally {
    await fs.rm(dir, { recursive: true, force: true })
  }
}

export function flattenToc(rawToc: AmazonRenderToc): TocItem[] {
  const toc: TocItem[] = []

  const visit = (item: AmazonRenderTocItem, depth: number) => {
    toc.push({ label: item.label, positionId: item.tocPositionId, depth })

    for (const entry of item.entries ?? []) {
      visit(entry, depth + 1)
    }
  }

  for (const item of rawToc) {
    visit(item, 0)
  }

  return toc
}
