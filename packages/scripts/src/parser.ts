/**
 * DICOM standard HTML parser
 * Uses fast-xml-parser with preserveOrder so the element tree keeps document order
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser'
import { readFileSync } from 'fs'
import type { HtmlElement, HtmlNode } from './types.js'

// HTML elements that never carry a closing tag
export const VOID_TAGS = ['area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'param', 'source', 'track', 'wbr']

const ATTR_PREFIX = '@_'
const ATTRS_KEY = ':@'
const TEXT_KEY = '#text'
const COMMENT_KEY = '#comment'

type RawNode = { [key: string]: unknown }

const isRawNode = (value: unknown): value is RawNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export class StandardParser {
  private parser: XMLParser
  private builder: XMLBuilder

  constructor() {
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: ATTR_PREFIX,
      preserveOrder: true,
      commentPropName: COMMENT_KEY,
      textNodeName: TEXT_KEY,
      trimValues: false,
      parseTagValue: false,
      parseAttributeValue: false,
      allowBooleanAttributes: true,
      processEntities: true,
      htmlEntities: true,
      // void tags are matched before tag names are lowercased
      unpairedTags: [...VOID_TAGS, ...VOID_TAGS.map(tag => tag.toUpperCase())],
      transformTagName: tagName => tagName.toLowerCase(),
      stopNodes: ['*.script', '*.style']
    })
    // htmlEntities turns these into a plain space
    this.parser.addEntity('nbsp', '\u00a0')
    this.parser.addEntity('#160', '\u00a0')
    this.builder = new XMLBuilder({
      ignoreAttributes: false,
      attributeNamePrefix: ATTR_PREFIX,
      preserveOrder: true,
      textNodeName: TEXT_KEY,
      format: false,
      processEntities: true,
      suppressEmptyNode: false,
      suppressBooleanAttributes: false,
      unpairedTags: VOID_TAGS,
      suppressUnpairedNode: true
    })
  }

  /**
   * Parse an HTML file into a document tree
   */
  parseFile(filePath: string): HtmlElement {
    return this.parse(readFileSync(filePath, 'utf-8'))
  }

  /**
   * Parse an HTML document or fragment; the result is a synthetic `#document` root
   */
  parse(html: string): HtmlElement {
    const parsed: unknown = this.parser.parse(html)
    const root: HtmlElement = { tag: '#document', attrs: {}, children: [], parent: null }
    root.children = Array.isArray(parsed) ? this.convertNodes(parsed, root) : []
    return root
  }

  /**
   * Serialize a node back to markup; the synthetic root serializes its children only
   */
  serialize(node: HtmlNode): string {
    const nodes = typeof node !== 'string' && node.tag === '#document'
      ? node.children.map(child => this.toRawNode(child))
      : [this.toRawNode(node)]
    return String(this.builder.build(nodes))
  }

  /**
   * Convert fast-xml-parser's ordered nodes into elements and text
   */
  private convertNodes(nodes: unknown[], parent: HtmlElement): HtmlNode[] {
    const result: HtmlNode[] = []

    for (const node of nodes) {
      if (!isRawNode(node)) continue

      if (TEXT_KEY in node) {
        const text = node[TEXT_KEY]
        if (text !== undefined && text !== null) {
          result.push(String(text))
        }
        continue
      }

      // comments, <?xml ...?> and <!DOCTYPE> are not kept
      const tagKeys = Object.keys(node).filter(
        k => k !== ATTRS_KEY && k !== COMMENT_KEY && !k.startsWith('?') && !k.startsWith('!')
      )
      for (const tagKey of tagKeys) {
        const element: HtmlElement = {
          tag: tagKey.toLowerCase(),
          attrs: this.extractAttrs(node[ATTRS_KEY]),
          children: [],
          parent
        }
        const children = node[tagKey]
        element.children = Array.isArray(children) ? this.convertNodes(children, element) : []
        result.push(element)
      }
    }

    return result
  }

  /**
   * Strip the attribute prefix; valueless attributes become empty strings
   */
  private extractAttrs(rawAttrs: unknown): Record<string, string> {
    const attrs: Record<string, string> = {}
    if (!isRawNode(rawAttrs)) return attrs

    for (const [key, value] of Object.entries(rawAttrs)) {
      if (!key.startsWith(ATTR_PREFIX)) continue
      attrs[key.slice(ATTR_PREFIX.length)] = value === true ? '' : String(value)
    }

    return attrs
  }

  private toRawNode(node: HtmlNode): RawNode {
    if (typeof node === 'string') {
      return { [TEXT_KEY]: node }
    }

    const raw: RawNode = { [node.tag]: node.children.map(child => this.toRawNode(child)) }
    const attrEntries = Object.entries(node.attrs)
    if (attrEntries.length > 0) {
      raw[ATTRS_KEY] = Object.fromEntries(attrEntries.map(([key, value]) => [ATTR_PREFIX + key, value]))
    }
    return raw
  }
}

export const standardParser = new StandardParser()
