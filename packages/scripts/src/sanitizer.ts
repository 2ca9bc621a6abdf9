/**
 * Attribute allow-listing and empty anchor removal, applied in place
 */

import { byTag, detach, findAll, isElement, textContent } from './dom.js'
import type { HtmlElement } from './types.js'

export const ALLOWED_ATTRIBUTES: ReadonlySet<string> = new Set(['href', 'src', 'type', 'data', 'colspan', 'rowspan'])

const cleanTagAttributes = (element: HtmlElement): void => {
  element.attrs = Object.fromEntries(
    Object.entries(element.attrs).filter(([name]) => ALLOWED_ATTRIBUTES.has(name))
  )
}

export const removeAttributesFromHtmlTags = (root: HtmlElement): void => {
  cleanTagAttributes(root)
  for (const child of root.children) {
    if (isElement(child)) removeAttributesFromHtmlTags(child)
  }
}

/**
 * Drops bare id targets (`<a id="..."></a>`); whitespace counts as text
 */
export const removeEmptyAnchors = (root: HtmlElement): void => {
  const emptyAnchors = findAll(root, byTag('a')).filter(anchor => textContent(anchor) === '')
  emptyAnchors.forEach(detach)
}

export const sanitizeSubtree = (root: HtmlElement): void => {
  removeAttributesFromHtmlTags(root)
  removeEmptyAnchors(root)
}
