export type Kindle2PdfErrorCode =
  | 'AUTHENTICATION'
  | 'NOT_OWNED'
  | 'RENDER'
  | 'PAIRING'
  | 'REAUTH_REQUIRED'
  | 'UPLOAD'
  | 'OUTPUT'

/**
 * Base class for all errors which terminate a `kindle2pdf` or
 * `pdf2remarkable` invocation.
 *
 * Every error carries a `remedy`: the action the user should take before
 * re-running the command.
 */
export class Kindle2PdfError extends Error {
  readonly code: Kindle2PdfErrorCode
  readonly remedy: string

  constructor(
    message: string,
    {
      code,
      remedy,
      cause
    }: { code: Kindle2PdfErrorCode; remedy: string; cause?: unknown }
  ) {
    super(message, { cause })
    this.name = 'Kindle2PdfError'
    this.code = code
    this.remedy = remedy
  }
}

/** No Amazon session could be bootstrapped, or the session expired. */
export class AuthenticationError extends Kindle2PdfError {
  constructor(
    message: string,
    {
      remedy = 'Log in to https://read.amazon.com in Chrome, then re-run the command.',
      cause
    }: { remedy?: string; cause?: unknown } = {}
  ) {
    super(message, { code: 'AUTHENTICATION', remedy, cause })
    this.name = 'AuthenticationError'
  }
}

/** The account does not hold a license for the full edition of the book. */
export class NotOwnedError extends Kindle2PdfError {
  readonly asin: string

  constructor(
    asin: string,
    message = `Full book ${asin} is not owned by this account.`,
    { cause }: { cause?: unknown } = {}
  ) {
    super(message, {
      code: 'NOT_OWNED',
      remedy:
        'Make sure the logged in Amazon account owns the full (non-sample) edition of the book.',
      cause
    })
    this.name = 'NotOwnedError'
    this.asin = asin
  }
}

/** Page content could not be fetched in order or decoded. */
export class RenderError extends Kindle2PdfError {
  constructor(message: string, { cause }: { cause?: unknown } = {}) {
    super(message, {
      code: 'RENDER',
      remedy: 'Re-run the command; if it keeps failing, the book cannot be rendered.',
      cause
    })
    this.name = 'RenderError'
  }
}

/** The reMarkable Cloud rejected the one-time code. */
export class PairingError extends Kindle2PdfError {
  constructor(message: string, { cause }: { cause?: unknown } = {}) {
    super(message, {
      code: 'PAIRING',
      remedy:
        'Get a fresh one-time code from https://my.remarkable.com/device/browser/connect and re-run the command.',
      cause
    })
    this.name = 'PairingError'
  }
}

/** The persisted device token was rejected by the reMarkable Cloud. */
export class ReauthRequiredError extends Kindle2PdfError {
  readonly tokenPath?: string

  constructor(
    message: string,
    { tokenPath, cause }: { tokenPath?: string; cause?: unknown } = {}
  ) {
    super(message, {
      code: 'REAUTH_REQUIRED',
      remedy: `Delete ${tokenPath ?? 'the device token file'} to pair again, then re-run the command.`,
      cause
    })
    this.name = 'ReauthRequiredError'
    this.tokenPath = tokenPath
  }
}

/** The reMarkable Cloud did not accept the document. */
export class UploadError extends Kindle2PdfError {
  readonly status?: number

  constructor(
    message: string,
    { status, cause }: { status?: number; cause?: unknown } = {}
  ) {
    super(message, {
      code: 'UPLOAD',
      remedy: 'Re-run the upload; nothing was stored in the reMarkable Cloud.',
      cause
    })
    this.name = 'UploadError'
    this.status = status
  }
}

/** The PDF could not be written to its output path. */
export class OutputError extends Kindle2PdfError {
  constructor(message: string, { cause }: { cause?: unknown } = {}) {
    super(message, {
      code: 'OUTPUT',
      remedy:
        'Check that the output directory exists and is writable, then re-run the command.',
      cause
    })
    this.name = 'OutputError'
  }
}

export function isKindle2PdfError(err: unknown): err is Kindle2PdfError {
  return err instanceof Kindle2PdfError
}

/**
 * Renders an error as the one or two lines printed by the command line tools.
 */
export function formatError(err: unknown): string {
  if (isKindle2PdfError(err)) {
    return `${err.name}: ${err.message}\n${err.remedy}`
  }

  if (err instanceof Error) {
    return `error: ${err.message}`
  }

  return `error: ${String(err)}`
}
