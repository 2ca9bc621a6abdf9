/**
 * Builds JSON records for the tables of one chapter of the standard
 */

import { config as defaultConfig } from './config.js'
import { findFirst, textContent } from './dom.js'
import { cleanHtml } from './html-cleaner.js'
import { standardParser } from './parser.js'
import { createSlug } from './slug.js'
import { allTableDivsInChapter, findTableDivById, tableId } from './table-locator.js'
import type { TableIdentifier } from './table-locator.js'
import { cleanTableName, standardLink, tableParentPage } from './table-names.js'
import { found } from './types.js'
import type { ExtractedTable, HtmlElement, Lookup, ResolverConfig } from './types.js'

export interface ExtractOptions {
  /** Only these tables, in this order */
  tableIds?: string[]
  identify?: TableIdentifier
  config?: ResolverConfig
}

/**
 * Record for a single table container
 */
export const extractTable = (
  tableDiv: HtmlElement,
  identify: TableIdentifier = tableId,
  config: ResolverConfig = defaultConfig
): ExtractedTable => {
  const id = identify(tableDiv)
  if (id === undefined) {
    throw new Error('Table container has no id')
  }

  const heading = findFirst(tableDiv, 'p')
  if (!heading) {
    throw new Error(`Table ${id} has no heading`)
  }
  const name = cleanTableName(textContent(heading))

  const parentPage = tableParentPage(tableDiv)
  if (!parentPage.ok) {
    throw new Error(`Table ${id}: ${parentPage.message}`)
  }
  const link = standardLink(tableDiv, config)
  if (!link.ok) {
    throw new Error(`Table ${id}: ${link.message}`)
  }

  const table = findFirst(tableDiv, 'table')

  return {
    id,
    name,
    slug: createSlug(name),
    parentPage: parentPage.value,
    linkToStandard: link.value,
    html: table ? cleanHtml(standardParser.serialize(table), config) : ''
  }
}

export const extractChapterTables = (
  standard: HtmlElement,
  chapterName: string,
  options: ExtractOptions = {}
): Lookup<ExtractedTable[]> => {
  const { tableIds, identify = tableId, config = defaultConfig } = options

  const tables = allTableDivsInChapter(standard, chapterName)
  if (!tables.ok) return tables

  let selected = tables.value
  if (tableIds) {
    selected = []
    for (const id of tableIds) {
      const table = findTableDivById(tables.value, id, identify)
      if (!table.ok) return table
      selected.push(table.value)
    }
  }

  return found(selected.map(tableDiv => extractTable(tableDiv, identify, config)))
}
