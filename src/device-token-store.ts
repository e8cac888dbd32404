import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

import { z } from 'zod'

import type { DeviceTokenConfig } from './types'
import { ReauthRequiredError } from './errors'
import { getEnv, writeFileAtomic } from './utils'

export const DEFAULT_TOKEN_FILENAME = '.pdf2remarkable'

const deviceTokenConfigSchema = z.object({
  deviceToken: z.string().min(1),
  deviceId: z.string().optional(),
  pairedAt: z.string().optional()
})

export function getDefaultTokenPath(): string {
  return (
    getEnv('REMARKABLE_TOKEN_PATH') ??
    path.join(os.homedir(), DEFAULT_TOKEN_FILENAME)
  )
}

/**
 * The secret file holding the reMarkable device token. It is read once per
 * invocation and only written when a device is paired; deleting it forces a
 * new pairing.
 */
export class DeviceTokenStore {
  readonly path: string

  constructor({ path = getDefaultTokenPath() }: { path?: string } = {}) {
    this.path = path
  }

  async load(): Promise<DeviceTokenConfig | undefined> {
    let contents: string
    try {
      contents = await fs.readFile(this.path, 'utf8')
    } catch (err) {
      if (isNotFoundError(err)) return undefined
      throw err
    }

    return parseDeviceTokenConfig(contents, this.path)
  }

  async save(config: DeviceTokenConfig): Promise<void> {
    const validated = deviceTokenConfigSchema.parse(config)
    await writeFileAtomic(
      this.path,
      `${JSON.stringify(validated, null, 2)}\n`,
      { mode: 0o600 }
    )
  }

  async delete(): Promise<void> {
    await fs.rm(this.path, { force: true })
  }
}

/**
 * Accepts both the JSON config and a file holding nothing but the raw device
 * token.
 */
export function parseDeviceTokenConfig(
  contents: string,
  tokenPath?: string
): DeviceTokenConfig | undefined {
  const trimmed = contents.trim()
  if (!trimmed) return undefined

  if (!trimmed.startsWith('{')) {
    return { deviceToken: trimmed }
  }

  let json: unknown
  try {
    json = JSON.parse(trimmed)
  } catch (err) {
    throw new ReauthRequiredError('The device token file is not valid JSON', {
      tokenPath,
      cause: err
    })
  }

  const parsed = deviceTokenConfigSchema.safeParse(json)
  if (!parsed.success) {
    throw new ReauthRequiredError(
      `The device token file is invalid (${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')})`,
      { tokenPath, cause: parsed.error }
    )
  }

  return parsed.data
}

function isNotFoundError(err: unknown): boolean {
  return (
    !!err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT'
  )
}
