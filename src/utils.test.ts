import fs from 'node:fs/promises'
import path from 'node:path'

import { create } from 'tar'
import { temporaryDirectory } from 'tempy'
import { describe, expect, it } from 'vitest'

import {
  deserializeCookies,
  extractTar,
  parseJsonpResponse,
  sanitizeFilename,
  serializeCookies,
  writeFileAtomic
} from './utils'

describe('parseJsonpResponse', () => {
  it('extracts the JSON payload', () => {
    expect(
      parseJsonpResponse('loadMetadata({"title":"Test Book","endPosition":42});')
    ).toEqual({ title: 'Test Book', endPosition: 42 })
  })

  it('returns undefined for anything else', () => {
    expect(parseJsonpResponse('<html></html>')).toBeUndefined()
    expect(parseJsonpResponse('loadMetadata({not json});')).toBeUndefined()
  })
})

describe('cookies', () => {
  it('parses a cookie header', () => {
    expect(deserializeCookies('session-id=123-456; at-main=Atza|abc=; empty=')).toEqual({
      'session-id': '123-456',
      'at-main': 'Atza|abc=',
      empty: ''
    })
  })

  it('serializes cookies', () => {
    expect(serializeCookies({ a: '1', b: '2' })).toBe('a=1; b=2')
  })
})

describe('sanitizeFilename', () => {
  it('removes reserved characters', () => {
    expect(sanitizeFilename('Why: A "Short" Guide / Part 1?')).toBe(
      'Why A Short Guide  Part 1'
    )
    expect(sanitizeFilename('...hidden. ')).toBe('hidden')
  })
})

describe('extractTar', () => {
  it('extracts an in-memory tar', async () => {
    const src = temporaryDirectory()
    await fs.writeFile(path.join(src, 'hello.txt'), 'hello')
    const tar = await streamToBuffer(create({ cwd: src }, ['hello.txt']))

    const dir = await extractTar(tar)
    expect(await fs.readFile(path.join(dir, 'hello.txt'), 'utf8')).toBe('hello')
  })
})

describe('writeFileAtomic', () => {
  it('writes the file with owner-only permissions', async () => {
    const dir = temporaryDirectory()
    const filePath = path.join(dir, 'secret')

    await writeFileAtomic(filePath, 'test-secret')

    expect(await fs.readFile(filePath, 'utf8')).toBe('test-secret')
    expect((await fs.stat(filePath)).mode & 0o777).toBe(0o600)
    expect(await fs.readdir(dir)).toEqual(['secret'])
  })
})

async function streamToBuffer(stream: AsyncIterable<Buffer>): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(chunk)
  }

  return Buffer.concat(chunks)
}
