import crypto from 'node:crypto'

import type { KaramelToken } from './types'
import { RenderError } from './errors'

/**
 * Decrypts a page image downloaded from the Kindle renderer CDN.
 *
 * The payload is ASCII: base64 salt (24 chars), base64 IV (24 chars), then
 * base64 AES-128-GCM ciphertext with a trailing 16 byte auth tag. The key is
 * derived with PBKDF2-SHA256 from a 40 char slice of the karamel token whose
 * offset depends on the token's expiry.
 */
export function decryptImage(
  data: Uint8Array,
  karamelToken: KaramelToken,
  reference = 'image'
): Buffer {
  const keyMaterial = getKeyMaterial(karamelToken)
  const text = Buffer.from(data).toString('latin1')

  try {
    const salt = Buffer.from(text.slice(0, 24), 'base64')
    const iv = Buffer.from(text.slice(24, 48), 'base64')
    const encrypted = Buffer.from(text.slice(48), 'base64')
    const tag = encrypted.subarray(-16)
    const ciphertext = encrypted.subarray(0, -16)

    const key = crypto.pbkdf2Sync(keyMaterial, salt, 1000, 16, 'sha256')
    const decipher = crypto.createDecipheriv('aes-128-gcm', key, iv)
    decipher.setAAD(keyMaterial.subarray(0, 9))
    decipher.setAuthTag(tag)

    return Buffer.concat([decipher.update(ciphertext), decipher.final()])
  } catch (err) {
    throw new RenderError(`Unable to decrypt ${reference}`, { cause: err })
  }
}

export function getKeyMaterial({ token, expiresAt }: KaramelToken): Buffer {
  const offset = expiresAt % 60
  return Buffer.from(token.slice(offset, offset + 40), 'utf8')
}
