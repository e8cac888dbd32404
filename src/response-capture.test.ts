import fs from 'node:fs/promises'
import path from 'node:path'

import ky from 'ky'
import { temporaryDirectory } from 'tempy'
import { describe, expect, it } from 'vitest'

import { KindleClient } from './kindle-client'
import {
  type CapturedResponse,
  hashRequest,
  redactSensitiveFields,
  ResponseRecorder,
  ResponseReplayer
} from './response-capture'
import {
  createFakeKindle,
  createPngImage,
  TEST_SESSION,
  textPage
} from './test-fixtures'

const asin = 'B000TEST02'

describe('hashRequest', () => {
  it('ignores the short-lived auth parameters', () => {
    const a = hashRequest({
      method: 'GET',
      url: 'https://read.kindle.test/renderer/render?asin=B1&token=one&startingPosition=0'
    })
    const b = hashRequest({
      method: 'get',
      url: 'https://read.kindle.test/renderer/render?asin=B1&token=two&startingPosition=0'
    })
    const c = hashRequest({
      method: 'GET',
      url: 'https://read.kindle.test/renderer/render?asin=B1&token=one&startingPosition=100'
    })

    expect(a).toBe(b)
    expect(a).not.toBe(c)
  })
})

describe('redactSensitiveFields', () => {
  it('blanks identifiers at any depth', () => {
    expect(
      redactSensitiveFields({
        title: 'Kept',
        eid: 'test-eid',
        nested: { list: [{ clientHashId: 'test-hash', isOwned: true }] }
      })
    ).toEqual({
      title: 'Kept',
      eid: '',
      nested: { list: [{ clientHashId: '', isOwned: true }] }
    })
  })
})

describe('ResponseRecorder and ResponseReplayer', () => {
  it('captures every response and replays them offline', async () => {
    const image = await createPngImage()
    const capturePath = path.join(temporaryDirectory(), 'responses.jsonl')
    const recorder = new ResponseRecorder({ path: capturePath })
    await recorder.open()

    const fake = createFakeKindle({
      book: {
        asin,
        title: 'Captured Book',
        pages: [textPage(99, { imageReference: 'resource/img0' })],
        images: { 'resource/img0': image }
      }
    })
    const client = new KindleClient({
      session: TEST_SESSION,
      refreshSession: true,
      throttle: false,
      ky: fake.ky.extend({ hooks: recorder.hooks })
    })

    const live = await client.renderPages({
      asin,
      startingPosition: 0,
      numPages: 6
    })

    const contents = await fs.readFile(capturePath, 'utf8')
    const entries = contents
      .trimEnd()
      .split('\n')
      .map((line) => JSON.parse(line) as CapturedResponse)

    // device token, start reading, metadata, render, image
    expect(fake.requests).toHaveLength(5)
    expect(entries).toHaveLength(5)

    expect(JSON.parse(entries[0]?.body ?? '')).toMatchObject({
      deviceSessionToken: '',
      clientHashId: '',
      eid: ''
    })
    expect(JSON.parse(entries[1]?.body ?? '')).toMatchObject({
      kindleSessionId: '',
      isOwned: true
    })
    expect(entries[3]).toMatchObject({
      status: 200,
      contentType: 'application/x-tar',
      encoding: 'base64'
    })
    for (const identifier of [
      'test-device-session',
      'test-client-hash',
      'test-eid',
      'test-kindle-session'
    ]) {
      expect(contents).not.toContain(identifier)
    }

    const replayer = await ResponseReplayer.load(capturePath)
    const offline = new KindleClient({
      session: TEST_SESSION,
      refreshSession: true,
      throttle: false,
      ky: ky.create({
        fetch: () => Promise.reject(new Error('network access')),
        hooks: replayer.hooks
      })
    })

    const replayed = await offline.renderPages({
      asin,
      startingPosition: 0,
      numPages: 6
    })

    expect(replayed.pages).toEqual(live.pages)
    expect(replayed.images['resource/img0']).toEqual(image)
  })

  it('fails for requests which were not captured', () => {
    const replayer = new ResponseReplayer([])

    expect(() =>
      replayer.replay(
        new Request('https://read.kindle.test/renderer/render?token=test-token')
      )
    ).toThrow(
      'No captured response left for GET https://read.kindle.test/renderer/render'
    )
  })

  it('rejects a truncated capture file', async () => {
    const capturePath = path.join(temporaryDirectory(), 'responses.jsonl')
    await fs.writeFile(
      capturePath,
      [
        JSON.stringify({
          hash: 'test-hash',
          status: 200,
          contentType: 'text/plain',
          encoding: 'utf8',
          body: 'ok'
        }),
        '{"hash":"test-hash","status":200,"conte'
      ].join('\n')
    )

    await expect(ResponseReplayer.load(capturePath)).rejects.toThrow(
      `Invalid captured response on line 2 of ${capturePath}`
    )
  })

  it('rejects captured responses with missing fields', async () => {
    const capturePath = path.join(temporaryDirectory(), 'responses.jsonl')
    await fs.writeFile(
      capturePath,
      `${JSON.stringify({
        hash: 'test-hash',
        status: 200,
        contentType: 'text/plain',
        encoding: 'utf8'
      })}\n`
    )

    await expect(ResponseReplayer.load(capturePath)).rejects.toThrow(
      `Invalid captured response on line 1 of ${capturePath}: body Required`
    )
  })
})
