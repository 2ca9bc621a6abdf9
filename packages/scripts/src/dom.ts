/**
 * Queries and mutations over the parsed element tree
 */

import type { HtmlElement, HtmlNode } from './types.js'

export type ElementPredicate = (element: HtmlElement) => boolean

export const isElement = (node: HtmlNode): node is HtmlElement =>
  typeof node === 'object' && node !== null

export const byTag = (tag: string): ElementPredicate => element => element.tag === tag

export const hasClass = (element: HtmlElement, className: string): boolean =>
  (element.attrs['class'] ?? '').split(/\s+/).includes(className)

/**
 * All descendant elements matching the predicate, in document order
 * (the starting element itself is not included)
 */
export const findAll = (root: HtmlElement, predicate: ElementPredicate): HtmlElement[] => {
  const results: HtmlElement[] = []
  for (const child of root.children) {
    if (!isElement(child)) continue
    if (predicate(child)) results.push(child)
    results.push(...findAll(child, predicate))
  }
  return results
}

/**
 * First descendant element with the given tag
 */
export const findFirst = (root: HtmlElement, tag: string): HtmlElement | null => {
  for (const child of root.children) {
    if (!isElement(child)) continue
    if (child.tag === tag) return child
    const nested = findFirst(child, tag)
    if (nested) return nested
  }
  return null
}

/**
 * Follow a chain of first-descendant lookups, e.g. `['div', 'div', 'h1', 'a']`
 */
export const findChain = (root: HtmlElement, tags: string[]): HtmlElement | null => {
  let current: HtmlElement | null = root
  for (const tag of tags) {
    if (!current) return null
    current = findFirst(current, tag)
  }
  return current
}

export const textContent = (node: HtmlNode): string => {
  if (typeof node === 'string') return node
  return node.children.map(textContent).join('')
}

export const firstElement = (root: HtmlElement): HtmlElement | null =>
  root.children.find(isElement) ?? null

/**
 * Remove an element and its subtree from its parent
 */
export const detach = (element: HtmlElement): void => {
  const parent = element.parent
  if (!parent) return
  parent.children = parent.children.filter(child => child !== element)
  element.parent = null
}
