/**
 * Rewrites in-document references to absolute URLs on the published standard
 *
 * Section references (`sect_*`, `chapter*`) point into the chapter-split
 * rendering, where every top-level section lives on its own page. Everything
 * else points into the single-file rendering.
 */

import { config as defaultConfig } from './config.js'
import type { ResolverConfig } from './types.js'

const DEFAULT_PAGE = 'part03.html'

export type Reference =
  | { kind: 'short'; chapter: string; sectionId: string }
  | { kind: 'long'; page: string; sectionId: string | null }

export const hasProtocolPrefix = (url: string): boolean => /^(http|ftp)/.test(url)

/**
 * `mailto:`, `data:` and other schemes are not references into the standard
 */
export const hasUriScheme = (url: string): boolean => /^[a-z][a-z0-9+.-]*:/i.test(url)

/**
 * Classify a relative reference as chapter-split or single-file
 */
export const classifyReference = (href: string): Reference => {
  const hashIndex = href.indexOf('#')
  if (hashIndex === -1) {
    return { kind: 'long', page: href || DEFAULT_PAGE, sectionId: null }
  }

  const page = href.slice(0, hashIndex) || DEFAULT_PAGE
  const sectionId = href.slice(hashIndex + 1)

  if (/sect_|chapter/.test(href)) {
    const chapter = page.split('.html')[0]
    return { kind: 'short', chapter, sectionId }
  }
  return { kind: 'long', page, sectionId }
}

/**
 * Page of the chapter-split rendering that holds a section.
 *
 * The id is cut before its first `1` component, so `sect_C.7.1.1` lives on
 * `sect_C.7`. A single remaining component is a whole chapter page:
 * `sect_10.1.2` lives on `chapter_10`. Ids without a `1` component are used as is.
 */
export const getStandardPage = (sectionId: string): string => {
  const sections = sectionId.split('.')
  const cutoffIndex = sections.indexOf('1')
  if (cutoffIndex === -1) return sectionId

  const cropped = sections.slice(0, cutoffIndex)
  const page = cropped.join('.')
  return cropped.length === 1 ? page.replaceAll('sect_', 'chapter_') : page
}

export const resolveHrefUrl = (href: string, config: ResolverConfig = defaultConfig): string => {
  if (hasProtocolPrefix(href) || hasUriScheme(href)) return href

  const reference = classifyReference(href)
  switch (reference.kind) {
    case 'short':
      return `${config.baseShortUrl}${reference.chapter}/${getStandardPage(reference.sectionId)}.html#${reference.sectionId}`
    case 'long':
      return reference.sectionId === null
        ? config.baseLongUrl + reference.page
        : `${config.baseLongUrl}${reference.page}#${reference.sectionId}`
  }
}

/**
 * Images and embedded equations are always relative to the single-file rendering
 */
export const resolveResourceUrl = (url: string, config: ResolverConfig = defaultConfig): string =>
  hasProtocolPrefix(url) || hasUriScheme(url) ? url : config.baseLongUrl + url

export const isStandardUrl = (url: string, config: ResolverConfig = defaultConfig): boolean =>
  url.startsWith(config.baseLongUrl) || url.startsWith(config.baseShortUrl)
