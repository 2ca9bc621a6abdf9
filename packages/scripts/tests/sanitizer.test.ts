import { describe, it, expect } from 'vitest'
import { findAll } from '../src/dom.js'
import { StandardParser } from '../src/parser.js'
import { ALLOWED_ATTRIBUTES, removeAttributesFromHtmlTags, sanitizeSubtree } from '../src/sanitizer.js'
import type { HtmlElement } from '../src/types.js'

const parser = new StandardParser()

const parseTop = (html: string): HtmlElement => {
  const [top] = findAll(parser.parse(html), () => true)
  return top
}

describe('sanitizeSubtree', () => {
  it('keeps only allowed attributes and drops empty anchors', () => {
    const top = parseTop(
      '<div class="table" id="t1" style="clear: both"><table frame="box"><tr valign="top">' +
        '<td colspan="2" rowspan="1" align="left"><a id="para_1" shape="rect"></a>text' +
        '<a href="#sect_C.7.1.1" title="Patient Module">ref</a></td></tr></table></div>'
    )

    sanitizeSubtree(top)

    expect(parser.serialize(top)).toBe(
      '<div><table><tr><td colspan="2" rowspan="1">text<a href="#sect_C.7.1.1">ref</a></td></tr></table></div>'
    )
  })

  it('leaves no attribute outside the allow-list', () => {
    const top = parseTop(
      '<div lang="en" data-x="1"><object data="eq.svg" type="image/svg+xml" width="10">x</object>' +
        '<img src="a.svg" alt="a"/><a href="#x" class="link" target="_top">go</a></div>'
    )

    sanitizeSubtree(top)

    const keys = [top, ...findAll(top, () => true)].flatMap(element => Object.keys(element.attrs))
    expect(keys).toEqual(['data', 'type', 'src', 'href'])
    expect(keys.every(key => ALLOWED_ATTRIBUTES.has(key))).toBe(true)
  })

  it('removes empty anchors together with nested empty anchors', () => {
    const top = parseTop('<p><a id="outer"><a id="inner"></a></a>keep<a> </a></p>')

    sanitizeSubtree(top)

    expect(parser.serialize(top)).toBe('<p>keep<a> </a></p>')
  })
})

describe('removeAttributesFromHtmlTags', () => {
  it('is idempotent', () => {
    const top = parseTop('<table border="1"><tr><td colspan="3" class="c">x</td></tr></table>')

    removeAttributesFromHtmlTags(top)
    const once = parser.serialize(top)
    removeAttributesFromHtmlTags(top)

    expect(parser.serialize(top)).toBe(once)
    expect(once).toBe('<table><tr><td colspan="3">x</td></tr></table>')
  })
})
