import { describe, it, expect } from 'vitest'
import { DEFAULT_BASE_LONG_URL, DEFAULT_BASE_SHORT_URL } from '../src/config.js'
import { cleanHtml, resolveRelativeResourceUrls, textFromHtmlString } from '../src/html-cleaner.js'
import type { ResolverConfig } from '../src/types.js'

const config: ResolverConfig = {
  baseLongUrl: DEFAULT_BASE_LONG_URL,
  baseShortUrl: DEFAULT_BASE_SHORT_URL
}

const TABLE_FRAGMENT =
  '<table frame="box"><tbody><tr valign="top"><td align="left"><p><a id="para_1" shape="rect"></a>' +
  'See <a class="xref" href="#sect_C.7.1.1" title="C.7.1.1">C.7.1.1</a></p></td>' +
  '<td><img src="figures/a.svg" alt="a"/></td></tr></tbody></table>'

const CLEANED_TABLE =
  '<table><tbody><tr><td><p>See <a href="http://dicom.nema.org/medical/dicom/current/output/chtml/part03/sect_C.7.html#sect_C.7.1.1" target="_blank">C.7.1.1</a></p></td>' +
  '<td><img src="http://dicom.nema.org/medical/dicom/current/output/html/figures/a.svg"></td></tr></tbody></table>'

describe('cleanHtml', () => {
  it('strips attributes, drops empty anchors and resolves references', () => {
    expect(cleanHtml(TABLE_FRAGMENT, config)).toBe(CLEANED_TABLE)
  })

  it('is idempotent', () => {
    const once = cleanHtml(TABLE_FRAGMENT, config)
    expect(cleanHtml(once, config)).toBe(once)
  })

  it('resolves embedded equations', () => {
    expect(cleanHtml('<div><object data="eq/eq1.svg" type="image/svg+xml" class="m">x</object></div>', config)).toBe(
      '<div><object data="http://dicom.nema.org/medical/dicom/current/output/html/eq/eq1.svg" type="image/svg+xml">x</object></div>'
    )
  })

  it('leaves external links alone', () => {
    expect(cleanHtml('<p><a href="https://example.com/x" class="ulink">ext</a></p>', config)).toBe(
      '<p><a href="https://example.com/x">ext</a></p>'
    )
  })

  it('keeps non-breaking spaces written as entities', () => {
    expect(cleanHtml('<td>a&nbsp;b</td>', config)).toBe('<td>a\u00a0b</td>')
  })

  it('keeps text after an uppercase line break', () => {
    expect(cleanHtml('<table><tr><td>a<BR>b</td></tr></table>', config)).toBe('<table><tr><td>a<br>b</td></tr></table>')
  })

  it('leaves mailto links alone', () => {
    expect(cleanHtml('<p><a href="mailto:someone@example.com">mail</a></p>', config)).toBe(
      '<p><a href="mailto:someone@example.com">mail</a></p>'
    )
  })

  it('keeps only the first element of the fragment', () => {
    expect(cleanHtml('<p>first</p><p>second</p>', config)).toBe('<p>first</p>')
  })

  it('returns an empty string when there is no element', () => {
    expect(cleanHtml('', config)).toBe('')
  })
})

describe('resolveRelativeResourceUrls', () => {
  it('resolves cross-part section links and marks them to open in a new tab', () => {
    expect(resolveRelativeResourceUrls('<p><a href="part05.html#sect_6.2">PN</a></p>', config)).toBe(
      '<p><a href="http://dicom.nema.org/medical/dicom/current/output/chtml/part05/sect_6.2.html#sect_6.2" target="_blank">PN</a></p>'
    )
  })

  it('keeps attributes the sanitizer would remove', () => {
    expect(resolveRelativeResourceUrls('<p><img src="f.png" alt="f"/></p>', config)).toBe(
      '<p><img src="http://dicom.nema.org/medical/dicom/current/output/html/f.png" alt="f"></p>'
    )
  })
})

describe('textFromHtmlString', () => {
  it('returns the trimmed text content', () => {
    expect(textFromHtmlString('<p> Hello <b>world</b> </p>')).toBe('Hello world')
  })
})
