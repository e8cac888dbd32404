import fs from 'node:fs/promises'
import path from 'node:path'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'

import hashObjectImpl from 'hash-object'
import { HTTPError } from 'ky'
import { extract } from 'tar'
import { temporaryDirectory } from 'tempy'

export function assert(
  value: unknown,
  message?: string | Error
): asserts value {
  if (value) {
    return
  }

  if (!message) {
    throw new Error('Assertion failed')
  }

  throw typeof message === 'string' ? new Error(message) : message
}

export function getEnv(name: string): string | undefined {
  try {
    return typeof process !== 'undefined'
      ? // eslint-disable-next-line no-process-env
        process.env?.[name] || undefined
      : undefined
  } catch {
    return undefined
  }
}

const JSONP_REGEX = /\(\s*({.*})\s*\)/s

export function parseJsonpResponse<T = unknown>(body: string): T | undefined {
  const content = body?.match(JSONP_REGEX)?.[1]
  if (!content) {
    return
  }

  try {
    return JSON.parse(content) as T
  } catch {
    return
  }
}

/**
 * Parses a `Cookie` header style string (`name=value; name2=value2`).
 */
export function deserializeCookies(cookies: string): Record<string, string> {
  const result: Record<string, string> = {}

  for (const pair of cookies.split(';')) {
    const index = pair.indexOf('=')
    if (index <= 0) continue

    const name = pair.slice(0, index).trim()
    const value = pair.slice(index + 1).trim()
    if (name) {
      result[name] = value
    }
  }

  return result
}

export function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ')
}

/**
 * Removes characters which are not allowed in file names on common platforms.
 */
export function sanitizeFilename(filename: string): string {
  return (
    filename
      // eslint-disable-next-line no-control-regex
      .replaceAll(/[<>:"/\\|?*\u0000-\u001F]/g, '')
      .trim()
      .replace(/^[.\s]+/, '')
      .replace(/[.\s]+$/, '')
  )
}

export async function fileExists(
  filePath: string,
  mode: number = fs.constants.F_OK | fs.constants.R_OK
): Promise<boolean> {
  try {
    await fs.access(filePath, mode)
    return true
  } catch {
    return false
  }
}

export function hashObject(obj: Record<string, unknown>): string {
  return hashObjectImpl(obj, {
    algorithm: 'sha1',
    encoding: 'hex'
  })
}

/**
 * Returns the HTTP status of a failed `ky` request, or `undefined` for
 * anything that isn't an HTTP error (network failures, timeouts, etc).
 */
export function getHttpStatus(err: unknown): number | undefined {
  return err instanceof HTTPError ? err.response.status : undefined
}

/**
 * Decompress a TAR (optionally .tar.gz/.tgz) Buffer to a fresh temp directory.
 * Returns the absolute path of the temp directory.
 */
export async function extractTar(
  buf: Uint8Array,
  {
    strip = 0,
    cwd = temporaryDirectory()
  }: { strip?: number; cwd?: string } = {}
): Promise<string> {
  const isGzip = buf.length >= 2 && buf[0] === 0x1f && buf[1] === 0x8b

  try {
    const extractor = extract({
      cwd,
      gzip: isGzip,
      strip
    })

    await pipeline(Readable.from([buf]), extractor)
    return cwd
  } catch (err) {
    // Clean up the temp dir if extraction fails
    await fs.rm(cwd, { recursive: true, force: true })
    throw err
  }
}

export async function readJsonFile<T = unknown>(filePath: string): Promise<T> {
  return JSON.parse(await fs.readFile(filePath, 'utf8')) as T
}

export async function tryReadJsonFile<T = unknown>(
  filePath: string
): Promise<T | undefined> {
  try {
    return await readJsonFile<T>(filePath)
  } catch {
    return undefined
  }
}

/**
 * Writes `data` to a sibling temp file and renames it over `filePath`, so an
 * interrupted write never leaves a truncated file behind.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
  { mode = 0o600 }: { mode?: number } = {}
): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  )

  try {
    await fs.writeFile(tempPath, data, { mode })
    await fs.rename(tempPath, filePath)
  } catch (err) {
    await fs.rm(tempPath, { force: true })
    throw err
  }
}
