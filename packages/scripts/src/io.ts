/**
 * File and stdout helpers for the extraction scripts
 */

import { readFileSync } from 'fs'
import { standardParser } from './parser.js'
import type { HtmlElement } from './types.js'

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue | undefined }

const INDENT = '    '

export const parseHtmlFile = (filePath: string): HtmlElement => standardParser.parseFile(filePath)

export const readJsonFile = (filePath: string): unknown => JSON.parse(readFileSync(filePath, 'utf-8'))

/**
 * JSON string literal with every non-ASCII code unit escaped as \uXXXX
 */
const asciiString = (value: string): string =>
  JSON.stringify(value).replace(/[\u0080-\uffff]/g, char => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`)

/**
 * Four-space indented JSON with `,` and `:` separators (no space after the colon)
 */
export const formatPrettyJson = (value: JsonValue, depth = 0): string => {
  if (value === null || typeof value !== 'object') {
    return typeof value === 'string' ? asciiString(value) : JSON.stringify(value)
  }

  const inner = INDENT.repeat(depth + 1)
  const outer = INDENT.repeat(depth)

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]'
    const items = value.map(item => inner + formatPrettyJson(item, depth + 1))
    return `[\n${items.join(',\n')}\n${outer}]`
  }

  const entries = Object.entries(value).filter(
    (entry): entry is [string, JsonValue] => entry[1] !== undefined
  )
  if (entries.length === 0) return '{}'
  const members = entries.map(([key, member]) => `${inner}${asciiString(key)}:${formatPrettyJson(member, depth + 1)}`)
  return `{\n${members.join(',\n')}\n${outer}}`
}

export const writePrettyJson = (value: JsonValue): void => {
  process.stdout.write(formatPrettyJson(value))
}
