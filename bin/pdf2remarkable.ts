#!/usr/bin/env tsx
import 'dotenv/config'

import { parseArgs } from 'node:util'

import { input } from '@inquirer/prompts'

import { DeviceTokenStore } from '../src/device-token-store'
import { formatError } from '../src/errors'
import { RemarkableClient } from '../src/remarkable-client'
import { sendPdfToRemarkable } from '../src/upload-pdf'

const usage = `Usage: pdf2remarkable <file.pdf>

Uploads a PDF to the reMarkable Cloud, pairing this machine first if needed.`

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      help: { type: 'boolean', short: 'h', default: false }
    }
  })

  if (values.help) {
    console.log(usage)
    return
  }

  const [filePath] = positionals
  if (!filePath || positionals.length > 1) {
    console.error(usage)
    process.exit(2)
  }

  const store = new DeviceTokenStore()
  const client = new RemarkableClient({ tokenPath: store.path })

  const upload = await sendPdfToRemarkable(filePath, {
    client,
    store,
    promptForCode: (connectUrl) =>
      input({
        message: `Get a one-time code from ${connectUrl} and enter it here:`
      })
  })

  console.log(`Uploaded "${upload.title}" to the reMarkable Cloud`)
}

try {
  await main()
} catch (err) {
  console.error(formatError(err))
  process.exit(1)
}
