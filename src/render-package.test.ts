import { describe, expect, it } from 'vitest'

import { flattenToc, readRenderPackage } from './render-package'
import { createTar, TEST_FONTS, textPage } from './test-fixtures'

describe('readRenderPackage', () => {
  it('reads pages, fonts, toc and bundled assets', async () => {
    const pages = [textPage(99), textPage(199)]
    const tar = await createTar({
      'manifest.json': JSON.stringify({ cdnResources: [] }),
      'glyphs.json': JSON.stringify(TEST_FONTS),
      'page_data_0_1.json': JSON.stringify(pages),
      'toc.json': JSON.stringify([{ label: 'Chapter 1', tocPositionId: 10 }]),
      'assets/resource/img0': Buffer.from('encrypted')
    })

    const renderPackage = await readRenderPackage(tar)

    expect(renderPackage.pages).toEqual(pages)
    expect(Object.keys(renderPackage.fonts)).toEqual(['font-0'])
    expect(renderPackage.toc).toEqual([
      { label: 'Chapter 1', positionId: 10, depth: 0 }
    ])
    expect(renderPackage.assets['resource/img0']?.toString()).toBe('encrypted')
  })

  it('treats an empty body as a package without pages', async () => {
    await expect(readRenderPackage(new Uint8Array(0))).resolves.toEqual({
      fonts: {},
      pages: [],
      assets: {}
    })
  })

  it('rejects invalid page data', async () => {
    const tar = await createTar({ 'page_data_0_0.json': '[{' })

    await expect(readRenderPackage(tar)).rejects.toThrow(
      'Invalid page data in page_data_0_0.json'
    )
  })
})

describe('flattenToc', () => {
  it('flattens nested entries with their depth', () => {
    expect(
      flattenToc([
        {
          label: 'Part 1',
          tocPositionId: 0,
          entries: [
            { label: 'Chapter 1', tocPositionId: 10 },
            {
              label: 'Chapter 2',
              tocPositionId: 500,
              entries: [{ label: 'Section 2.1', tocPositionId: 600 }]
            }
          ]
        },
        { label: 'Epilogue', tocPositionId: 900 }
      ])
    ).toEqual([
      { label: 'Part 1', positionId: 0, depth: 0 },
      { label: 'Chapter 1', positionId: 10, depth: 1 },
      { label: 'Chapter 2', positionId: 500, depth: 1 },
      { label: 'Section 2.1', positionId: 600, depth: 2 },
      { label: 'Epilogue', positionId: 900, depth: 0 }
    ])
  })
})
