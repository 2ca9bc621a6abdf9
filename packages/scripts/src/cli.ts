#!/usr/bin/env node
/**
 * Extract the tables of one chapter of the standard as JSON
 */

import { extractChapterTables } from './extract-tables.js'
import { parseHtmlFile, readJsonFile, writePrettyJson } from './io.js'

const args = process.argv.slice(2)

if (args.length < 2) {
  console.error('Usage: tsx src/cli.ts <standard.html> <chapterId> [tableIds.json]')
  console.error('Example: tsx src/cli.ts part03.html chapter_C table-ids.json')
  process.exit(1)
}

const [htmlPath, chapterName, tableIdsPath] = args

const readTableIds = (filePath: string): string[] => {
  const ids = readJsonFile(filePath)
  if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
    throw new Error(`${filePath} must contain a JSON array of table ids`)
  }
  return ids
}

try {
  const tableIds = tableIdsPath ? readTableIds(tableIdsPath) : undefined

  console.error(`Parsing ${htmlPath}...`)
  const standard = parseHtmlFile(htmlPath)

  const result = extractChapterTables(standard, chapterName, { tableIds })
  if (!result.ok) {
    console.error(`Extraction failed: ${result.message}`)
    process.exit(1)
  }

  console.error(`Extracted ${result.value.length} tables from ${chapterName}`)
  writePrettyJson(result.value)
} catch (err) {
  console.error('Extraction failed:', err)
  process.exit(1)
}
