/**
 * Finds table containers (`div.table`) inside the chapters of the standard
 */

import { findAll, findChain, findFirst, hasClass } from './dom.js'
import { found, notFound } from './types.js'
import type { HtmlElement, Lookup } from './types.js'

export type TableIdentifier = (tableDiv: HtmlElement) => string | undefined

const isDivWithClass = (className: string) => (element: HtmlElement) =>
  element.tag === 'div' && hasClass(element, className)

/**
 * Chapter id, read from the anchor of the chapter's `h1` heading
 */
export const chapterId = (chapterDiv: HtmlElement): string | undefined =>
  findChain(chapterDiv, ['div', 'div', 'div', 'h1', 'a'])?.attrs['id']

/**
 * The table id is carried by the first anchor of the container, e.g. `table_C.7-1`
 */
export const tableId: TableIdentifier = tableDiv => findFirst(tableDiv, 'a')?.attrs['id']

export const allTableDivsInChapter = (standard: HtmlElement, chapterName: string): Lookup<HtmlElement[]> => {
  const chapter = findAll(standard, isDivWithClass('chapter')).find(div => chapterId(div) === chapterName)
  if (!chapter) {
    return notFound(`Chapter ${chapterName} not found`)
  }
  return found(findAll(chapter, isDivWithClass('table')))
}

export const findTableDivById = (
  allTables: HtmlElement[],
  id: string,
  identify: TableIdentifier = tableId
): Lookup<HtmlElement> => {
  const table = allTables.find(tableDiv => identify(tableDiv) === id)
  return table ? found(table) : notFound(`Table ${id} not found`)
}
