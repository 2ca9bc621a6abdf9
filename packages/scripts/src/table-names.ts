/**
 * Table titles and the sections that hold them
 */

import { config as defaultConfig } from './config.js'
import { findChain } from './dom.js'
import { tableId } from './table-locator.js'
import { found, malformedInput, notFound } from './types.js'
import type { HtmlElement, Lookup, ResolverConfig } from './types.js'

const TITLE_SEPARATOR = '\u00a0'
const TABLE_SUFFIXES = /IOD Modules|Module Attributes|Macro Attributes|Module Table/

export class MalformedInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedInputError'
  }
}

/**
 * Headings read `Table C.7-1. Patient Module Attributes`;
 * the title is the third part without its boilerplate suffix
 */
export const parseTableName = (name: string): Lookup<string> => {
  const parts = name.split(TITLE_SEPARATOR)
  if (parts.length !== 3) {
    return malformedInput(`Expected 3 parts in table name, got ${parts.length}: ${JSON.stringify(name)}`)
  }
  const [cleanTitle] = parts[2].split(TABLE_SUFFIXES)
  return found(cleanTitle.trim())
}

export const cleanTableName = (name: string): string => {
  const result = parseTableName(name)
  if (!result.ok) {
    throw new MalformedInputError(result.message)
  }
  return result.value
}

/**
 * Id of the section heading that precedes the table, e.g. `sect_C.7.1.1`
 */
export const parentSectionId = (tableDiv: HtmlElement): Lookup<string> => {
  const parent = tableDiv.parent
  const anchor = parent ? findChain(parent, ['div', 'div', 'div', 'a']) : null
  const id = anchor?.attrs['id']
  return id === undefined ? notFound('Table has no parent section heading') : found(id)
}

/**
 * Chapter-split page of the table's parent section; section ids are cut
 * before their first `1` component and used whole when they have none
 */
export const tableParentPage = (tableDiv: HtmlElement): Lookup<string> => {
  const sectionId = parentSectionId(tableDiv)
  if (!sectionId.ok) return sectionId

  const sections = sectionId.value.split('.')
  const cutoffIndex = sections.indexOf('1')
  return found(cutoffIndex === -1 ? sectionId.value : sections.slice(0, cutoffIndex).join('.'))
}

/**
 * Direct link to the table on the chapter-split rendering of Part 3
 */
export const standardLink = (tableDiv: HtmlElement, config: ResolverConfig = defaultConfig): Lookup<string> => {
  const page = tableParentPage(tableDiv)
  if (!page.ok) return page

  const id = tableId(tableDiv)
  if (id === undefined) return notFound('Table has no id')
  return found(`${config.baseShortUrl}part03/${page.value}.html#${id}`)
}
