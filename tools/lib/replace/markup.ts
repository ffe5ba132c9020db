/**
 * Minimal markup scanner for report definitions
 *
 * Splits a document into markup (tags, comments, declarations) and character
 * data, checking well-formedness along the way. Segments are contiguous and
 * cover the whole input, so callers can splice edits into the original string
 * without touching anything they did not mean to change.
 */

import { MalformedReportError } from "../core/errors"

export type Segment =
  | { kind: "markup"; start: number; end: number }
  | {
      kind: "text"
      start: number
      end: number
      element: string | null // local name of the enclosing element
      cdata: boolean
    }

const NAME_PATTERN = /^[A-Za-z_][\w.:-]*/

export function scanMarkup(content: string): Segment[] {
  const segments: Segment[] = []
  const stack: string[] = []
  let rootSeen = false
  let rootClosed = false
  let pos = 0

  const pushText = (start: number, end: number, cdata = false): void => {
    if (end <= start) return
    const top = stack[stack.length - 1]
    if (top === undefined && content.slice(start, end).trim() !== "") {
      throw new MalformedReportError("text outside the root element", start)
    }
    segments.push({ kind: "text", start, end, element: top === undefined ? null : localName(top), cdata })
  }

  while (pos < content.length) {
    const lt = content.indexOf("<", pos)
    if (lt === -1) {
      pushText(pos, content.length)
      break
    }
    pushText(pos, lt)

    if (content.startsWith("<!--", lt)) {
      const close = content.indexOf("-->", lt + 4)
      if (close === -1) throw new MalformedReportError("unterminated comment", lt)
      segments.push({ kind: "markup", start: lt, end: close + 3 })
      pos = close + 3
      continue
    }

    if (content.startsWith("<![CDATA[", lt)) {
      const close = content.indexOf("]]>", lt + 9)
      if (close === -1) throw new MalformedReportError("unterminated CDATA section", lt)
      if (stack.length === 0) throw new MalformedReportError("CDATA outside the root element", lt)
      segments.push({ kind: "markup", start: lt, end: lt + 9 })
      pushText(lt + 9, close, true)
      segments.push({ kind: "markup", start: close, end: close + 3 })
      pos = close + 3
      continue
    }

    if (content.startsWith("<?", lt)) {
      const close = content.indexOf("?>", lt + 2)
      if (close === -1) throw new MalformedReportError("unterminated processing instruction", lt)
      segments.push({ kind: "markup", start: lt, end: close + 2 })
      pos = close + 2
      continue
    }

    if (content.startsWith("<!", lt)) {
      // DOCTYPE and friends; internal subsets are not supported
      const close = content.indexOf(">", lt + 2)
      if (close === -1) throw new MalformedReportError("unterminated declaration", lt)
      segments.push({ kind: "markup", start: lt, end: close + 1 })
      pos = close + 1
      continue
    }

    const close = findTagEnd(content, lt + 1)
    if (close === -1) throw new MalformedReportError("unterminated tag", lt)
    const inner = content.slice(lt + 1, close)

    if (inner.startsWith("/")) {
      const name = inner.slice(1).trim()
      const open = stack.pop()
      if (open === undefined) throw new MalformedReportError(`unexpected closing tag </${name}>`, lt)
      if (open !== name) throw new MalformedReportError(`<${open}> closed by </${name}>`, lt)
      if (stack.length === 0) rootClosed = true
    } else {
      const match = NAME_PATTERN.exec(inner)
      if (!match) throw new MalformedReportError("invalid tag name", lt)
      if (rootClosed) throw new MalformedReportError("content after the root element", lt)
      rootSeen = true
      if (!inner.endsWith("/")) {
        stack.push(match[0])
      } else if (stack.length === 0) {
        rootClosed = true
      }
    }

    segments.push({ kind: "markup", start: lt, end: close + 1 })
    pos = close + 1
  }

  const unclosed = stack[stack.length - 1]
  if (unclosed !== undefined) throw new MalformedReportError(`<${unclosed}> is never closed`, content.length)
  if (!rootSeen) throw new MalformedReportError("no root element", 0)

  return segments
}

function localName(name: string): string {
  const colon = name.indexOf(":")
  return colon === -1 ? name : name.slice(colon + 1)
}

// Index of the ">" ending a tag, skipping quoted attribute values
function findTagEnd(content: string, from: number): number {
  let quote: string | null = null
  for (let i = from; i < content.length; i++) {
    const ch = content[i]
    if (quote) {
      if (ch === quote) quote = null
    } else if (ch === '"' || ch === "'") {
      quote = ch
    } else if (ch === ">") {
      return i
    } else if (ch === "<") {
      return -1
    }
  }
  return -1
}
