#!/usr/bin/env tsx
import 'dotenv/config'

import { parseArgs } from 'node:util'

import { input } from '@inquirer/prompts'

import { DeviceTokenStore } from '../src/device-token-store'
import { formatError } from '../src/errors'
import { exportBookPdf } from '../src/export-book-pdf'
import { RemarkableClient } from '../src/remarkable-client'
import { DEFAULT_CAPTURE_PATH } from '../src/response-capture'
import { sendPdfToRemarkable } from '../src/upload-pdf'

const usage = `Usage: kindle2pdf <ASIN> [options]

Options:
  -o, --output <path>    where to write the PDF (default: "<title>.pdf")
      --font-size <n>    font size the pages are rendered with (default: 12)
      --remarkable       upload the PDF to the reMarkable Cloud
      --save-mock        write every response to ${DEFAULT_CAPTURE_PATH}
      --load-mock        answer every request from ${DEFAULT_CAPTURE_PATH}
  -h, --help             show this help`

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      'font-size': { type: 'string' },
      remarkable: { type: 'boolean', default: false },
      'save-mock': { type: 'boolean', default: false },
      'load-mock': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  })

  if (values.help) {
    console.log(usage)
    return
  }

  const [asin] = positionals
  if (!asin || positionals.length > 1) {
    console.error(usage)
    process.exit(2)
  }

  let fontSize: number | undefined
  if (values['font-size'] !== undefined) {
    fontSize = Number(values['font-size'])
    if (!Number.isFinite(fontSize) || fontSize <= 0) {
      console.error(`invalid --font-size "${values['font-size']}"`)
      process.exit(2)
    }
  }

  const result = await exportBookPdf({
    asin,
    output: values.output,
    fontSize,
    saveMock: values['save-mock'] ? DEFAULT_CAPTURE_PATH : undefined,
    loadMock: values['load-mock'] ? DEFAULT_CAPTURE_PATH : undefined
  })

  console.log(result.path)

  if (values.remarkable) {
    const store = new DeviceTokenStore()
    const client = new RemarkableClient({ tokenPath: store.path })

    const upload = await sendPdfToRemarkable(result.path, {
      client,
      store,
      title: result.title,
      promptForCode: (connectUrl) =>
        input({
          message: `Get a one-time code from ${connectUrl} and enter it here:`
        })
    })

    console.log(`Uploaded "${upload.title}" to the reMarkable Cloud`)
  }
}

try {
  await main()
} catch (err) {
  console.error(formatError(err))
  process.exit(1)
}
