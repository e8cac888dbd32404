import defaultKy, { type KyInstance } from 'ky'
import { v4 as uuidv4 } from 'uuid'

import { PairingError, ReauthRequiredError, UploadError } from './errors'
import { getEnv, getHttpStatus } from './utils'

/** Where users get a one-time code for pairing a new device. */
export const REMARKABLE_CONNECT_URL =
  'https://my.remarkable.com/device/browser/connect'

export type RemarkableDeviceDesc =
  | 'desktop-windows'
  | 'desktop-macos'
  | 'desktop-linux'
  | 'mobile-android'
  | 'mobile-ios'
  | 'browser-chrome'
  | 'remarkable'

export interface RemarkableUploadResult {
  docID?: string
  hash?: string
}

/**
 * Minimal reMarkable Cloud client: device registration, access token
 * exchange and PDF upload.
 */
export class RemarkableClient {
  protected readonly authKy: KyInstance
  protected readonly uploadKy: KyInstance
  protected readonly tokenPath?: string

  constructor({
    authUrl = getEnv('REMARKABLE_AUTH_URL') ??
      'https://webapp.cloud.remarkable.com',
    uploadUrl = getEnv('REMARKABLE_UPLOAD_URL') ??
      'https://internal.cloud.remarkable.com',
    tokenPath,
    ky = defaultKy
  }: {
    authUrl?: string
    uploadUrl?: string
    /** Only used to point the user at the file to delete when re-pairing */
    tokenPath?: string
    ky?: KyInstance
  } = {}) {
    const base = ky.extend({ retry: 0, timeout: 300_000 })
    this.authKy = base.extend({ prefixUrl: authUrl })
    this.uploadKy = base.extend({ prefixUrl: uploadUrl })
    this.tokenPath = tokenPath
  }

  /**
   * Exchanges a one-time code for a long-lived device token.
   */
  async registerDevice(
    code: string,
    {
      deviceId = uuidv4(),
      deviceDesc = 'browser-chrome'
    }: { deviceId?: string; deviceDesc?: RemarkableDeviceDesc } = {}
  ): Promise<{ deviceToken: string; deviceId: string }> {
    const trimmedCode = code.trim()
    if (!trimmedCode) {
      throw new PairingError('No one-time code was entered')
    }

    let deviceToken: string
    try {
      deviceToken = await this.authKy
        .post('token/json/2/device/new', {
          json: {
            code: trimmedCode,
            deviceDesc,
            deviceID: deviceId
          }
        })
        .text()
    } catch (err) {
      const status = getHttpStatus(err)
      if (status === undefined) throw err

      throw new PairingError(
        `The reMarkable Cloud rejected the one-time code (HTTP ${status})`,
        { cause: err }
      )
    }

    deviceToken = deviceToken.trim()
    if (!deviceToken) {
      throw new PairingError('The reMarkable Cloud returned an empty device token')
    }

    return { deviceToken, deviceId }
  }

  /**
   * Exchanges the device token for a short-lived access token.
   */
  async getAccessToken(deviceToken: string): Promise<string> {
    let accessToken: string
    try {
      accessToken = await this.authKy
        .post('token/json/2/user/new', {
          headers: { Authorization: `Bearer ${deviceToken}` }
        })
        .text()
    } catch (err) {
      const status = getHttpStatus(err)
      if (status === undefined) throw err

      if (status === 400 || status === 401 || status === 403) {
        throw new ReauthRequiredError(
          `The reMarkable Cloud rejected the device token (HTTP ${status})`,
          { tokenPath: this.tokenPath, cause: err }
        )
      }

      throw new UploadError(
        `Unable to get a reMarkable access token (HTTP ${status})`,
        { status, cause: err }
      )
    }

    accessToken = accessToken.trim()
    if (!accessToken) {
      throw new ReauthRequiredError(
        'The reMarkable Cloud returned an empty access token',
        { tokenPath: this.tokenPath }
      )
    }

    return accessToken
  }

  /**
   * Uploads a PDF as a new document in the root folder.
   */
  async uploadPdf({
    accessToken,
    pdf,
    title
  }: {
    accessToken: string
    pdf: Uint8Array
    title: string
  }): Promise<RemarkableUploadResult> {
    const meta = Buffer.from(JSON.stringify({ file_name: title })).toString(
      'base64'
    )

    let body: string
    try {
      body = await this.uploadKy
        .post('doc/v2/files', {
          body: pdf,
          headers: {
            Authorization: `Bearer ${accessToken}`,
            'Content-Type': 'application/pdf',
            'rm-meta': meta
          }
        })
        .text()
    } catch (err) {
      const status = getHttpStatus(err)
      throw new UploadError(
        status === undefined
          ? `Uploading "${title}" failed`
          : `The reMarkable Cloud rejected "${title}" (HTTP ${status})`,
        { status, cause: err }
      )
    }

    return parseUploadResult(body)
  }
}

function parseUploadResult(body: string): RemarkableUploadResult {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    // the upload endpoint doesn't always answer with JSON
    return {}
  }

  if (!parsed || typeof parsed !== 'object') {
    return {}
  }

  const docID = 'docID' in parsed ? parsed.docID : undefined
  const hash = 'hash' in parsed ? parsed.hash : undefined

  return {
    docID: typeof docID === 'string' ? docID : undefined,
    hash: typeof hash === 'string' ? hash : undefined
  }
}
