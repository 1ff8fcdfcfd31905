/**
 * Span helpers for highlighting and overlap tests.
 */

import type { Span } from './types'

export function spanLength(span: Span): number {
  return span.end - span.start
}

/** True when the spans share at least one position. Empty spans overlap nothing. */
export function spansOverlap(a: Span, b: Span): boolean {
  return a.start < a.end && b.start < b.end && a.start < b.end && b.start < a.end
}

export function sliceSpan(text: string, span: Span): string {
  return text.slice(span.start, span.end)
}

function utf8Length(text: string, from: number, to: number): number {
  let bytes = 0
  for (let i = from; i < to; i++) {
    const code = text.charCodeAt(i)
    if (code < 0x80) bytes += 1
    else if (code < 0x800) bytes += 2
    else if (code >= 0xd800 && code <= 0xdbff && i + 1 < to) {
      const next = text.charCodeAt(i + 1)
      if (next >= 0xdc00 && next <= 0xdfff) {
        bytes += 4
        i++
      } else {
        bytes += 3
      }
    } else bytes += 3
  }
  return bytes
}

/**
 * Converts a code-unit span into UTF-8 byte offsets of the same text,
 * for consumers that address the buffer as bytes.
 */
export function toByteSpan(text: string, span: Span): Span {
  const start = utf8Length(text, 0, span.start)
  return { start, end: start + utf8Length(text, span.start, span.end) }
}
