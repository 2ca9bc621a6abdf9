export * from './types.js'
export { config, DEFAULT_BASE_LONG_URL, DEFAULT_BASE_SHORT_URL } from './config.js'
export { StandardParser, standardParser, VOID_TAGS } from './parser.js'
export * from './dom.js'
export * from './url-resolver.js'
export * from './sanitizer.js'
export * from './html-cleaner.js'
export * from './table-locator.js'
export * from './table-names.js'
export { createSlug } from './slug.js'
export * from './io.js'
export * from './extract-tables.js'
