import { describe, expect, it } from 'vitest'

import { PairingError, ReauthRequiredError, UploadError } from './errors'
import { RemarkableClient } from './remarkable-client'
import {
  createFakeRemarkable,
  type FakeRemarkable,
  TEST_ONE_TIME_CODE
} from './test-fixtures'

function createClient(fake: FakeRemarkable) {
  return new RemarkableClient({
    authUrl: 'https://auth.remarkable.test',
    uploadUrl: 'https://upload.remarkable.test',
    tokenPath: '/home/test/.pdf2remarkable',
    ky: fake.ky
  })
}

describe('RemarkableClient', () => {
  it('registers a device with a one-time code', async () => {
    const fake = createFakeRemarkable()
    const client = createClient(fake)

    await expect(
      client.registerDevice(` ${TEST_ONE_TIME_CODE} `, { deviceId: 'test-device-id' })
    ).resolves.toEqual({
      deviceToken: 'test-device-token-1',
      deviceId: 'test-device-id'
    })
  })

  it('rejects an invalid one-time code', async () => {
    const client = createClient(createFakeRemarkable())

    await expect(client.registerDevice('wrongcode')).rejects.toThrow(
      new PairingError('The reMarkable Cloud rejected the one-time code (HTTP 400)')
    )
    await expect(client.registerDevice('  ')).rejects.toThrow(
      'No one-time code was entered'
    )
  })

  it('uploads a PDF', async () => {
    const fake = createFakeRemarkable()
    const client = createClient(fake)
    const { deviceToken } = await client.registerDevice(TEST_ONE_TIME_CODE)

    const accessToken = await client.getAccessToken(deviceToken)
    const result = await client.uploadPdf({
      accessToken,
      pdf: new TextEncoder().encode('%PDF-1.7 test'),
      title: 'Über Test'
    })

    expect(result).toEqual({ docID: 'test-doc-1', hash: 'test-hash' })
    expect(fake.uploads).toEqual([{ title: 'Über Test', size: 13 }])
  })

  it('asks to pair again when the device token is rejected', async () => {
    const fake = createFakeRemarkable()
    const client = createClient(fake)
    const { deviceToken } = await client.registerDevice(TEST_ONE_TIME_CODE)
    fake.revoke(deviceToken)

    const promise = client.getAccessToken(deviceToken)
    await expect(promise).rejects.toBeInstanceOf(ReauthRequiredError)
    await expect(promise).rejects.toMatchObject({
      remedy:
        'Delete /home/test/.pdf2remarkable to pair again, then re-run the command.'
    })
  })

  it('reports a rejected upload', async () => {
    const fake = createFakeRemarkable({ uploadStatus: 500 })
    const client = createClient(fake)
    const { deviceToken } = await client.registerDevice(TEST_ONE_TIME_CODE)
    const accessToken = await client.getAccessToken(deviceToken)

    const promise = client.uploadPdf({
      accessToken,
      pdf: new TextEncoder().encode('%PDF-1.7 test'),
      title: 'Test'
    })
    await expect(promise).rejects.toThrow(
      new UploadError('The reMarkable Cloud rejected "Test" (HTTP 500)')
    )
    await expect(promise).rejects.toMatchObject({ status: 500 })
    expect(fake.uploads).toEqual([])
  })
})
