import fs from 'node:fs/promises'
import path from 'node:path'

import { PDFDocument } from 'pdf-lib'

import type { RemarkableClient, RemarkableUploadResult } from './remarkable-client'
import { DevicePairing, type PromptForCode } from './device-pairing'
import type { DeviceTokenStore } from './device-token-store'
import { UploadError } from './errors'
import { sanitizeFilename } from './utils'

const PDF_MAGIC = '%PDF-'

/**
 * The document's title metadata, falling back to the file's name without its
 * extension.
 */
export async function getPdfTitle(
  pdf: Uint8Array,
  filePath: string
): Promise<string> {
  if (Buffer.from(pdf.subarray(0, PDF_MAGIC.length)).toString('latin1') !== PDF_MAGIC) {
    throw new UploadError(`${filePath} is not a PDF file`)
  }

  let title: string | undefined
  try {
    const doc = await PDFDocument.load(pdf, {
      updateMetadata: false,
      ignoreEncryption: true
    })
    title = doc.getTitle()?.trim()
  } catch (err) {
    throw new UploadError(`${filePath} is not a valid PDF file`, {
      cause: err
    })
  }

  return (
    title ||
    sanitizeFilename(path.basename(filePath, path.extname(filePath))) ||
    'Untitled'
  )
}

export async function uploadPdfFile(
  filePath: string,
  {
    client,
    deviceToken,
    title
  }: {
    client: RemarkableClient
    deviceToken: string
    /** Overrides the title read from the PDF */
    title?: string
  }
): Promise<RemarkableUploadResult & { title: string }> {
  let pdf: Buffer
  try {
    pdf = await fs.readFile(filePath)
  } catch (err) {
    throw new UploadError(`Unable to read ${filePath}`, { cause: err })
  }

  const pdfTitle = await getPdfTitle(pdf, filePath)
  const documentTitle = title?.trim() || pdfTitle
  const accessToken = await client.getAccessToken(deviceToken)
  const result = await client.uploadPdf({
    accessToken,
    pdf,
    title: documentTitle
  })

  return { ...result, title: documentTitle }
}

/**
 * Pairs this machine if it isn't paired yet, then uploads the PDF.
 */
export async function sendPdfToRemarkable(
  filePath: string,
  {
    client,
    store,
    promptForCode,
    title
  }: {
    client: RemarkableClient
    store: DeviceTokenStore
    promptForCode: PromptForCode
    title?: string
  }
): Promise<RemarkableUploadResult & { title: string }> {
  const pairing = await DevicePairing.load({ store, client })
  const deviceToken = await pairing.ensurePaired(promptForCode)

  return uploadPdfFile(filePath, { client, deviceToken, title })
}
