export * from './cookies'
export * from './device-pairing'
export * from './device-token-store'
export * from './errors'
export * from './export-book-pdf'
export * from './image-decryption'
export * from './kindle-client'
export * from './page-fetcher'
export * from './pdf-assembler'
export * from './remarkable-client'
export * from './render-package'
export * from './response-capture'
export type * from './types'
export * from './upload-pdf'
