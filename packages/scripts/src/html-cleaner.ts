/**
 * Turns a fragment of the standard into embeddable HTML
 */

import { config as defaultConfig } from './config.js'
import { findAll, firstElement, textContent } from './dom.js'
import { standardParser } from './parser.js'
import { sanitizeSubtree } from './sanitizer.js'
import type { HtmlElement, ResolverConfig } from './types.js'
import { hasProtocolPrefix, isStandardUrl, resolveHrefUrl, resolveResourceUrl } from './url-resolver.js'

const withAttribute = (tag: string, attr: string) => (element: HtmlElement) =>
  element.tag === tag && attr in element.attrs

const updateAnchorHref = (anchor: HtmlElement, config: ResolverConfig): void => {
  const href = anchor.attrs['href']
  if (!hasProtocolPrefix(href)) {
    anchor.attrs['href'] = resolveHrefUrl(href, config)
  }
  // links into the standard open in a new tab, including ones resolved by an earlier pass
  if (isStandardUrl(anchor.attrs['href'], config)) {
    anchor.attrs['target'] = '_blank'
  }
}

const resolveResource = (element: HtmlElement, attr: string, config: ResolverConfig): void => {
  element.attrs[attr] = resolveResourceUrl(element.attrs[attr], config)
}

/**
 * Rewrite every `a[href]`, `img[src]` and `object[data]` in the markup to absolute URLs
 */
export const resolveRelativeResourceUrls = (html: string, config: ResolverConfig = defaultConfig): string => {
  const document = standardParser.parse(html)

  findAll(document, withAttribute('a', 'href')).forEach(anchor => updateAnchorHref(anchor, config))
  findAll(document, withAttribute('img', 'src')).forEach(img => resolveResource(img, 'src', config))
  findAll(document, withAttribute('object', 'data')).forEach(equation => resolveResource(equation, 'data', config))

  return standardParser.serialize(document)
}

/**
 * Keep the first element of the fragment, strip it down to allowed attributes
 * and text-bearing anchors, then make its references absolute
 */
export const cleanHtml = (html: string, config: ResolverConfig = defaultConfig): string => {
  const topLevelTag = firstElement(standardParser.parse(html))
  if (!topLevelTag) return ''

  sanitizeSubtree(topLevelTag)
  return resolveRelativeResourceUrls(standardParser.serialize(topLevelTag), config)
}

export const textFromHtmlString = (html: string): string =>
  textContent(standardParser.parse(html)).trim()
