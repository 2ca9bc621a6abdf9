/**
 * Document model and result types shared by the extractor
 */

export type HtmlNode = string | HtmlElement

export interface HtmlElement {
  /** Lowercased tag name, `#document` for the synthetic root */
  tag: string
  /** Attributes in source order */
  attrs: Record<string, string>
  children: HtmlNode[]
  parent: HtmlElement | null
}

export interface ResolverConfig {
  /** Base of the single-file rendering, e.g. `.../output/html/` */
  baseLongUrl: string
  /** Base of the chapter-split rendering, e.g. `.../output/chtml/` */
  baseShortUrl: string
}

export type LookupFailure = {
  ok: false
  reason: 'not-found' | 'malformed-input'
  message: string
}

export type Lookup<T> = { ok: true; value: T } | LookupFailure

export const found = <T>(value: T): Lookup<T> => ({ ok: true, value })

export const notFound = (message: string): LookupFailure => ({
  ok: false,
  reason: 'not-found',
  message
})

export const malformedInput = (message: string): LookupFailure => ({
  ok: false,
  reason: 'malformed-input',
  message
})

export type ExtractedTable = {
  id: string
  name: string
  slug: string
  /** Chapter-split page that holds the table's parent section */
  parentPage: string
  linkToStandard: string
  /** Cleaned `<table>` fragment */
  html: string
}
