import { execFile } from 'node:child_process'
import crypto from 'node:crypto'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { promisify } from 'node:util'

import initSqlJs, { type Database, type SqlValue } from 'sql.js'

import type { Session } from './types'
import { AuthenticationError } from './errors'
import { deserializeCookies, fileExists, getEnv } from './utils'

const execFileAsync = promisify(execFile)

export const KINDLE_COOKIE_DOMAIN = 'read.amazon.com'

/** Cookies which only exist once the user has signed in to Amazon. */
export const REQUIRED_COOKIES = ['session-id', 'at-main'] as const

/**
 * Narrow capability for obtaining a logged in browser session. Everything
 * downstream of session bootstrap only depends on this interface.
 */
export interface CookieSource {
  getCookiesForDomain(domain: string): Promise<Session>
}

/**
 * Uses a raw `Cookie` header value, typically copied from the browser's dev
 * tools into `KINDLE_COOKIES`.
 */
export class EnvCookieSource implements CookieSource {
  protected readonly cookies: string | undefined

  constructor({
    cookies = getEnv('KINDLE_COOKIES')
  }: { cookies?: string } = {}) {
    this.cookies = cookies
  }

  async getCookiesForDomain(domain: string): Promise<Session> {
    const cookies = deserializeCookies(this.cookies ?? '')
    return toSession(domain, cookies, 'KINDLE_COOKIES')
  }
}

interface CookieRow {
  host_key: string
  name: string
  value: string
  encrypted_value: Buffer
  expires_utc: number
}

// Chrome timestamps are microseconds since 1601-01-01.
const CHROME_EPOCH_OFFSET_MS = 11_644_473_600_000

/**
 * Reads cookies straight out of Chrome's `Cookies` SQLite database for the
 * current OS user.
 *
 * The database file is read into memory and opened there, so a running
 * Chrome doesn't block the read. On platforms where Chrome holds an exclusive
 * lock on the file the read itself fails, which is reported as an
 * `AuthenticationError` asking the user to close the browser.
 */
export class ChromeCookieSource implements CookieSource {
  protected readonly platform: NodeJS.Platform
  protected readonly profileDir: string
  protected readonly cookiesPath?: string
  protected readonly password?: string
  protected readonly key?: Buffer
  protected readonly now: () => number
  protected readonly readFile: (filePath: string) => Promise<Uint8Array>

  constructor({
    platform = process.platform,
    profileDir = getEnv('CHROME_PROFILE_DIR') ??
      getDefaultChromeProfileDir(platform),
    cookiesPath = getEnv('CHROME_COOKIES_PATH'),
    password = getEnv('CHROME_SAFE_STORAGE_PASSWORD'),
    key = decodeKey(getEnv('CHROME_COOKIE_KEY')),
    now = Date.now,
    readFile = (filePath) => fs.readFile(filePath)
  }: {
    platform?: NodeJS.Platform
    profileDir?: string
    cookiesPath?: string
    password?: string
    key?: Buffer
    now?: () => number
    readFile?: (filePath: string) => Promise<Uint8Array>
  } = {}) {
    this.platform = platform
    this.profileDir = profileDir
    this.cookiesPath = cookiesPath
    this.password = password
    this.key = key
    this.now = now
    this.readFile = readFile
  }

  async getCookiesForDomain(domain: string): Promise<Session> {
    const cookiesPath = await this._resolveCookiesPath()
    const data = await loadCookieDatabase(cookiesPath, this.readFile)
    const rows = await readCookieRows(data)
    const now = this.now()
    const cookies: Record<string, string> = {}
    const decryptor = new ChromeCookieDecryptor({
      platform: this.platform,
      password: this.password,
      key: this.key,
      metaVersion: rows.metaVersion
    })

    for (const row of rows.cookies) {
      if (!domainMatches(row.host_key, domain)) continue
      if (isExpired(row.expires_utc, now)) continue

      cookies[row.name] = row.value
        ? row.value
        : await decryptor.decrypt(row.encrypted_value)
    }

    return toSession(domain, cookies, 'Chrome')
  }

  protected async _resolveCookiesPath(): Promise<string> {
    const candidates = this.cookiesPath
      ? [this.cookiesPath]
      : [
          path.join(this.profileDir, 'Network', 'Cookies'),
          path.join(this.profileDir, 'Cookies')
        ]

    for (const candidate of candidates) {
      if (await fileExists(candidate, fs.constants.F_OK)) {
        return candidate
      }
    }

    throw new AuthenticationError(
      `Chrome cookie database not found (looked in ${candidates.join(', ')})`,
      {
        remedy:
          'Log in to https://read.amazon.com with Google Chrome, or point CHROME_PROFILE_DIR / CHROME_COOKIES_PATH at your Chrome profile.'
      }
    )
  }
}

/**
 * Decrypts `encrypted_value` blobs from Chrome's cookie database.
 *
 * - macOS / Linux: `v10` / `v11` prefix, AES-128-CBC with a PBKDF2 key
 *   derived from the "Chrome Safe Storage" password.
 * - Windows: `v10` / `v20` prefix, AES-256-GCM with the profile's key, which
 *   has to be supplied since it is itself protected by DPAPI.
 */
export class ChromeCookieDecryptor {
  protected readonly platform: NodeJS.Platform
  protected readonly password?: string
  protected readonly key?: Buffer
  protected readonly metaVersion: number
  protected readonly derivedKeys = new Map<string, Buffer>()

  constructor({
    platform,
    password,
    key,
    metaVersion = 0
  }: {
    platform: NodeJS.Platform
    password?: string
    key?: Buffer
    metaVersion?: number
  }) {
    this.platform = platform
    this.password = password
    this.key = key
    this.metaVersion = metaVersion
  }

  async decrypt(encrypted: Buffer): Promise<string> {
    if (!encrypted.length) {
      return ''
    }

    const version = encrypted.subarray(0, 3).toString('latin1')
    if (version !== 'v10' && version !== 'v11' && version !== 'v20') {
      throw new AuthenticationError(
        `Unsupported Chrome cookie encryption "${version}"`,
        {
          remedy:
            'Copy the cookie header for https://read.amazon.com from your browser into KINDLE_COOKIES and re-run the command.'
        }
      )
    }

    let plaintext: Buffer
    try {
      plaintext =
        this.platform === 'win32'
          ? this._decryptGcm(encrypted.subarray(3))
          : await this._decryptCbc(version, encrypted.subarray(3))
    } catch (err) {
      if (err instanceof AuthenticationError) throw err

      throw new AuthenticationError('Unable to decrypt Chrome cookies', {
        remedy:
          'Set CHROME_SAFE_STORAGE_PASSWORD (or KINDLE_COOKIES) and re-run the command.',
        cause: err
      })
    }

    // Since cookie database version 24, values are prefixed with the
    // SHA-256 digest of the cookie's host.
    if (this.metaVersion >= 24) {
      plaintext = plaintext.subarray(32)
    }

    return plaintext.toString('utf8')
  }

  protected _decryptGcm(payload: Buffer): Buffer {
    if (!this.key) {
      throw new AuthenticationError(
        'Reading Chrome cookies on Windows requires the profile key',
        {
          remedy:
            'Set CHROME_COOKIE_KEY (base64) or copy the cookie header for https://read.amazon.com into KINDLE_COOKIES.'
        }
      )
    }

    const nonce = payload.subarray(0, 12)
    const tag = payload.subarray(-16)
    const ciphertext = payload.subarray(12, -16)
    const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, nonce)
    decipher.setAuthTag(tag)
    return Buffer.concat([decipher.update(ciphertext), decipher.final()])
  }

  protected async _decryptCbc(
    version: string,
    payload: Buffer
  ): Promise<Buffer> {
    const key = await this._getCbcKey(version)
    const decipher = crypto.createDecipheriv(
      'aes-128-cbc',
      key,
      Buffer.alloc(16, ' ')
    )
    return Buffer.concat([decipher.update(payload), decipher.final()])
  }

  protected async _getCbcKey(version: string): Promise<Buffer> {
    const cached = this.derivedKeys.get(version)
    if (cached) return cached

    const password = await this._getPassword(version)
    const iterations = this.platform === 'darwin' ? 1003 : 1
    const key = crypto.pbkdf2Sync(password, 'saltysalt', iterations, 16, 'sha1')
    this.derivedKeys.set(version, key)
    return key
  }

  protected async _getPassword(version: string): Promise<string> {
    if (this.platform === 'linux' && version === 'v10') {
      // Chrome's hardcoded password when no keyring is available
      return 'peanuts'
    }

    if (this.password) {
      return this.password
    }

    const [command, args]: [string, string[]] =
      this.platform === 'darwin'
        ? [
            'security',
            ['find-generic-password', '-w', '-s', 'Chrome Safe Storage']
          ]
        : ['secret-tool', ['lookup', 'application', 'chrome']]

    try {
      const { stdout } = await execFileAsync(command, args)
      const password = stdout.trim()
      if (password) return password
    } catch (err) {
      throw new AuthenticationError(
        'Unable to read the Chrome Safe Storage password from the OS keychain',
        {
          remedy:
            'Allow keychain access for Chrome Safe Storage, or set CHROME_SAFE_STORAGE_PASSWORD, and re-run the command.',
          cause: err
        }
      )
    }

    throw new AuthenticationError('The Chrome Safe Storage password is empty', {
      remedy: 'Set CHROME_SAFE_STORAGE_PASSWORD and re-run the command.'
    })
  }
}

export function getDefaultCookieSource(): CookieSource {
  return getEnv('KINDLE_COOKIES')
    ? new EnvCookieSource()
    : new ChromeCookieSource()
}

export function getDefaultChromeProfileDir(platform: NodeJS.Platform): string {
  const home = os.homedir()

  switch (platform) {
    case 'darwin':
      return path.join(
        home,
        'Library',
        'Application Support',
        'Google',
        'Chrome',
        'Default'
      )

    case 'win32':
      return path.join(
        getEnv('LOCALAPPDATA') ?? path.join(home, 'AppData', 'Local'),
        'Google',
        'Chrome',
        'User Data',
        'Default'
      )

    default:
      return path.join(home, '.config', 'google-chrome', 'Default')
  }
}

/**
 * Whether a cookie stored for `hostKey` is sent to `domain`.
 */
export function domainMatches(hostKey: string, domain: string): boolean {
  const host = hostKey.replace(/^\./, '').toLowerCase()
  const target = domain.toLowerCase()
  return target === host || target.endsWith(`.${host}`)
}

/**
 * Whether reading the cookie database failed because Chrome holds a lock on
 * it (a busy file on Windows, or a locked SQLite database).
 */
export function isLockedError(err: unknown): boolean {
  if (!err || typeof err !== 'object') {
    return false
  }

  if (
    'code' in err &&
    (err.code === 'EBUSY' ||
      err.code === 'EPERM' ||
      err.code === 'EACCES' ||
      err.code === 'SQLITE_BUSY' ||
      err.code === 'SQLITE_LOCKED')
  ) {
    return true
  }

  return err instanceof Error && /database (table )?is locked/i.test(err.message)
}

function lockedProfileError(cause: unknown): AuthenticationError {
  return new AuthenticationError('The Chrome cookie database is locked', {
    remedy: 'Close Google Chrome completely, then re-run the command.',
    cause
  })
}

function isExpired(expiresUtc: number, now: number): boolean {
  if (!expiresUtc) {
    // session cookie
    return false
  }

  return expiresUtc / 1000 - CHROME_EPOCH_OFFSET_MS < now
}

async function loadCookieDatabase(
  cookiesPath: string,
  readFile: (filePath: string) => Promise<Uint8Array>
): Promise<Uint8Array> {
  try {
    return await readFile(cookiesPath)
  } catch (err) {
    if (isLockedError(err)) {
      throw lockedProfileError(err)
    }

    throw unreadableDatabaseError(err)
  }
}

async function readCookieRows(data: Uint8Array): Promise<{
  metaVersion: number
  cookies: CookieRow[]
}> {
  let db: Database | undefined

  try {
    const SQL = await initSqlJs()
    db = new SQL.Database(data)

    const meta = db.exec(`SELECT value FROM meta WHERE key = 'version'`)
    const metaValue = meta[0]?.values[0]?.[0]
    const cookies = db
      .exec(
        'SELECT host_key, name, value, encrypted_value, expires_utc FROM cookies'
      )
      .flatMap((result) => result.values.map(toCookieRow))

    return {
      metaVersion:
        metaValue === undefined ? 0 : Number.parseInt(`${metaValue}`, 10) || 0,
      cookies
    }
  } catch (err) {
    if (isLockedError(err)) {
      throw lockedProfileError(err)
    }

    throw unreadableDatabaseError(err)
  } finally {
    db?.close()
  }
}

function toCookieRow([
  hostKey,
  name,
  value,
  encryptedValue,
  expiresUtc
]: SqlValue[]): CookieRow {
  return {
    host_key: typeof hostKey === 'string' ? hostKey : '',
    name: typeof name === 'string' ? name : '',
    value: typeof value === 'string' ? value : '',
    encrypted_value:
      encryptedValue instanceof Uint8Array
        ? Buffer.from(encryptedValue)
        : Buffer.alloc(0),
    expires_utc: typeof expiresUtc === 'number' ? expiresUtc : 0
  }
}

function unreadableDatabaseError(cause: unknown): AuthenticationError {
  return new AuthenticationError('Unable to read the Chrome cookie database', {
    remedy:
      'Close Google Chrome, make sure you are logged in to https://read.amazon.com, and re-run the command.',
    cause
  })
}

function toSession(
  domain: string,
  cookies: Record<string, string>,
  source: string
): Session {
  const missing = REQUIRED_COOKIES.filter((name) => !cookies[name])

  if (missing.length) {
    throw new AuthenticationError(
      `No Amazon login found in ${source} for ${domain} (missing cookies: ${missing.join(', ')})`
    )
  }

  return { domain, cookies }
}

function decodeKey(value: string | undefined): Buffer | undefined {
  return value ? Buffer.from(value, 'base64') : undefined
}
