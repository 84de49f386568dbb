/**
 * A half-open range of UTF-16 offsets into the source text.
 */
export interface Span {
  start: number
  end: number
}

/**
 * A human-readable position in the source text.
 */
export interface Location {
  /** 1-based line number */
  line: number
  /** 1-based column number */
  column: number
}

/**
 * Source text plus the offsets where each line starts, so that spans can be
 * resolved to locations without rescanning the text.
 */
export interface SourceInfo {
  text: string
  lineStarts: number[]
}

export const makeSourceInfo = (text: string): SourceInfo => ({
  text,
  lineStarts: computeLineStarts(text),
})

const computeLineStarts = (text: string): number[] => {
  const starts = [0]
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) === 10) {
      starts.push(i + 1)
    }
  }
  return starts
}

/**
 * Converts a character offset into a line/column location.
 * Offsets past the end of the text resolve to the last line.
 */
export const offsetToLocation = (source: SourceInfo, offset: number): Location => {
  const idx = findLineIndex(source.lineStarts, offset)
  const lineStart = source.lineStarts[idx] ?? 0
  return {
    line: idx + 1,
    column: offset - lineStart + 1,
  }
}

const findLineIndex = (lineStarts: number[], offset: number): number => {
  let low = 0
  let high = lineStarts.length - 1
  while (low <= high) {
    const mid = Math.floor((low + high) / 2)
    const start = lineStarts[mid] ?? 0
    const next = lineStarts[mid + 1] ?? Number.POSITIVE_INFINITY
    if (offset < start) {
      high = mid - 1
    } else if (offset >= next) {
      low = mid + 1
    } else {
      return mid
    }
  }
  return Math.max(0, Math.min(lineStarts.length - 1, low))
}

/**
 * Returns the text of a 1-based line without its line terminator.
 */
export const lineText = (source: SourceInfo, line: number): string => {
  const start = source.lineStarts[line - 1]
  if (start === undefined) return ''
  const next = source.lineStarts[line]
  const end = next === undefined ? source.text.length : next - 1
  return source.text.slice(start, end).replace(/\r$/, '')
}

/**
 * Smallest span covering both inputs.
 */
export const spanBetween = (a: Span, b: Span): Span => ({
  start: Math.min(a.start, b.start),
  end: Math.max(a.end, b.end),
})
