import fs from 'node:fs/promises'

import type { Hooks } from 'ky'
import { z } from 'zod'

import { hashObject } from './utils'

export const DEFAULT_CAPTURE_PATH = 'responses.jsonl'

/** Response fields which identify the account or outlive a single session. */
export const SENSITIVE_KEYS: readonly string[] = [
  'clientHashId',
  'deviceSessionToken',
  'eid',
  'kindleSessionId'
]

// Query parameters which change on every run and are ignored when matching
// captured responses to requests.
const VOLATILE_PARAMS = new Set(['token', 'expiration'])

const capturedResponseSchema = z.object({
  hash: z.string(),
  status: z.number().int(),
  contentType: z.string(),
  encoding: z.enum(['utf8', 'base64']),
  body: z.string()
})

export type CapturedResponse = z.infer<typeof capturedResponseSchema>

/**
 * Identifies a request by method, URL and query parameters, ignoring the
 * short-lived auth parameters.
 */
export function hashRequest(request: Pick<Request, 'method' | 'url'>): string {
  const url = new URL(request.url)
  const params: Record<string, string> = {}

  for (const [key, value] of url.searchParams) {
    params[key] = VOLATILE_PARAMS.has(key) ? '' : value
  }

  return hashObject({
    method: request.method.toUpperCase(),
    url: `${url.origin}${url.pathname}`,
    params
  })
}

/** Blanks every `SENSITIVE_KEYS` field, at any depth. */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item))
  }

  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        SENSITIVE_KEYS.includes(key) ? '' : redactSensitiveFields(item)
      ])
    )
  }

  return value
}

export async function toCapturedResponse(
  request: Pick<Request, 'method' | 'url'>,
  response: Response
): Promise<CapturedResponse> {
  const hash = hashRequest(request)
  const status = response.status
  const contentType = response.headers.get('content-type') ?? ''
  const data = Buffer.from(await response.arrayBuffer())

  if (/json/i.test(contentType)) {
    const text = data.toString('utf8')

    try {
      const body = JSON.stringify(redactSensitiveFields(JSON.parse(text)))
      return { hash, status, contentType, encoding: 'utf8', body }
    } catch {
      return { hash, status, contentType, encoding: 'utf8', body: text }
    }
  }

  if (/^text\/|javascript/i.test(contentType)) {
    return {
      hash,
      status,
      contentType,
      encoding: 'utf8',
      body: data.toString('utf8')
    }
  }

  return {
    hash,
    status,
    contentType,
    encoding: 'base64',
    body: data.toString('base64')
  }
}

/**
 * Appends every response received through its `hooks` to a line-delimited
 * JSON capture file, for debugging and offline replay.
 */
export class ResponseRecorder {
  readonly path: string
  readonly hooks: Hooks

  constructor({ path = DEFAULT_CAPTURE_PATH }: { path?: string } = {}) {
    this.path = path
    this.hooks = {
      afterResponse: [
        async (request, _options, response) => {
          await this.record(request, response)
        }
      ]
    }
  }

  /** Starts a new, empty capture file. */
  async open(): Promise<void> {
    await fs.writeFile(this.path, '')
  }

  async record(
    request: Pick<Request, 'method' | 'url'>,
    response: Response
  ): Promise<CapturedResponse> {
    const entry = await toCapturedResponse(request, response.clone())
    await fs.appendFile(this.path, `${JSON.stringify(entry)}\n`)
    return entry
  }
}

/**
 * Answers requests from a capture file written by `ResponseRecorder`, in the
 * order the responses were captured, without touching the network.
 */
export class ResponseReplayer {
  readonly hooks: Hooks
  protected readonly responses = new Map<string, CapturedResponse[]>()

  constructor(entries: CapturedResponse[]) {
    for (const entry of entries) {
      const queue = this.responses.get(entry.hash)
      if (queue) {
        queue.push(entry)
      } else {
        this.responses.set(entry.hash, [entry])
      }
    }

    this.hooks = {
      beforeRequest: [(request) => this.replay(request)]
    }
  }

  static async load(
    path: string = DEFAULT_CAPTURE_PATH
  ): Promise<ResponseReplayer> {
    const lines = (await fs.readFile(path, 'utf8')).split('\n')
    const entries: CapturedResponse[] = []

    for (const [index, line] of lines.entries()) {
      if (!line.trim()) continue

      entries.push(parseCapturedResponse(line, `line ${index + 1} of ${path}`))
    }

    return new ResponseReplayer(entries)
  }

  replay(request: Pick<Request, 'method' | 'url'>): Response {
    const entry = this.responses.get(hashRequest(request))?.shift()

    if (!entry) {
      const url = new URL(request.url)
      throw new Error(
        `No captured response left for ${request.method} ${url.origin}${url.pathname}`
      )
    }

    const body =
      entry.encoding === 'base64' ? Buffer.from(entry.body, 'base64') : entry.body

    return new Response(body, {
      status: entry.status,
      headers: { 'content-type': entry.contentType }
    })
  }
}

function parseCapturedResponse(line: string, location: string): CapturedResponse {
  let json: unknown
  try {
    json = JSON.parse(line)
  } catch (err) {
    throw new Error(`Invalid captured response on ${location}`, { cause: err })
  }

  const parsed = capturedResponseSchema.safeParse(json)
  if (!parsed.success) {
    throw new Error(
      `Invalid captured response on ${location}: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'entry'} ${issue.message}`)
        .join(', ')}`,
      { cause: parsed.error }
    )
  }

  return parsed.data
}
