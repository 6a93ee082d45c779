// CHANGE: scan numbers the way a general strtod-style float scanner does
// WHY: number parsing accepts whatever a general floating-point scan accepts, not only JSON's grammar
// QUOTE(TZ): "delegates to a general locale-independent floating-point scan starting at the current position"
// REF: req-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b,s: scan(b,s).consumed = 0 ↔ no numeric prefix at s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: start + consumed ≤ end
// COMPLEXITY: O(k) where k = consumed bytes

export interface ScannedNumber {
  readonly value: number
  readonly consumed: number
}

const INT32_MAX = 2_147_483_647
const INT32_MIN = -2_147_483_648

const CHAR_PLUS = 0x2b
const CHAR_MINUS = 0x2d
const CHAR_DOT = 0x2e
const CHAR_0 = 0x30
const CHAR_9 = 0x39

const isDigit = (byte: number | undefined): boolean => byte !== undefined && byte >= CHAR_0 && byte <= CHAR_9

const hexValue = (byte: number | undefined): number => {
  if (byte === undefined) {
    return -1
  }
  if (byte >= CHAR_0 && byte <= CHAR_9) {
    return byte - CHAR_0
  }
  const lower = byte | 0x20
  if (lower >= 0x61 && lower <= 0x66) {
    return lower - 0x61 + 10
  }
  return -1
}

const lowerAt = (bytes: Uint8Array, index: number, end: number): number =>
  index < end ? (bytes[index] ?? 0) | 0x20 : -1

const matchesWord = (bytes: Uint8Array, index: number, end: number, word: string): boolean => {
  for (let offset = 0; offset < word.length; offset++) {
    if (lowerAt(bytes, index + offset, end) !== word.charCodeAt(offset)) {
      return false
    }
  }
  return true
}

const NONE: ScannedNumber = { value: 0, consumed: 0 }

const scanSpecial = (
  bytes: Uint8Array,
  index: number,
  end: number,
  sign: number,
  start: number
): ScannedNumber | undefined => {
  if (matchesWord(bytes, index, end, "infinity")) {
    return { value: sign * Number.POSITIVE_INFINITY, consumed: index + 8 - start }
  }
  if (matchesWord(bytes, index, end, "inf")) {
    return { value: sign * Number.POSITIVE_INFINITY, consumed: index + 3 - start }
  }
  if (matchesWord(bytes, index, end, "nan")) {
    return { value: Number.NaN, consumed: index + 3 - start }
  }
  return undefined
}

const scanExponentDigits = (
  bytes: Uint8Array,
  index: number,
  end: number
): { readonly exponent: number; readonly next: number } | undefined => {
  let cursor = index
  let sign = 1
  if (cursor < end && (bytes[cursor] === CHAR_PLUS || bytes[cursor] === CHAR_MINUS)) {
    sign = bytes[cursor] === CHAR_MINUS ? -1 : 1
    cursor++
  }
  if (cursor >= end || !isDigit(bytes[cursor])) {
    return undefined
  }
  let exponent = 0
  while (cursor < end && isDigit(bytes[cursor])) {
    exponent = Math.min(exponent * 10 + ((bytes[cursor] ?? CHAR_0) - CHAR_0), 100_000)
    cursor++
  }
  return { exponent: sign * exponent, next: cursor }
}

const scanHex = (
  bytes: Uint8Array,
  index: number,
  end: number,
  sign: number,
  start: number
): ScannedNumber | undefined => {
  let cursor = index
  let mantissa = 0
  let digits = 0
  while (cursor < end && hexValue(bytes[cursor]) >= 0) {
    mantissa = mantissa * 16 + hexValue(bytes[cursor])
    digits++
    cursor++
  }
  let scale = 0
  if (cursor < end && bytes[cursor] === CHAR_DOT) {
    let fraction = cursor + 1
    while (fraction < end && hexValue(bytes[fraction]) >= 0) {
      mantissa = mantissa * 16 + hexValue(bytes[fraction])
      scale -= 4
      digits++
      fraction++
    }
    if (digits > 0) {
      cursor = fraction
    }
  }
  if (digits === 0) {
    return undefined
  }
  if (cursor < end && lowerAt(bytes, cursor, end) === 0x70) {
    const exponent = scanExponentDigits(bytes, cursor + 1, end)
    if (exponent !== undefined) {
      scale += exponent.exponent
      cursor = exponent.next
    }
  }
  return { value: sign * mantissa * Math.pow(2, scale), consumed: cursor - start }
}

const asciiSlice = (bytes: Uint8Array, from: number, to: number): string => {
  let text = ""
  for (let index = from; index < to; index++) {
    text += String.fromCharCode(bytes[index] ?? 0)
  }
  return text
}

/**
 * Scan the longest numeric prefix of bytes[start, end).
 *
 * @param bytes - Input buffer.
 * @param start - First byte to inspect.
 * @param end - Exclusive bound; never read past it.
 * @returns Parsed value and number of bytes consumed (0 when no number starts at start).
 *
 * @pure true
 * @invariant consumed = 0 → value = 0
 * @complexity O(k)
 */
export const scanNumber = (bytes: Uint8Array, start: number, end: number): ScannedNumber => {
  let cursor = start
  let sign = 1
  if (cursor < end && (bytes[cursor] === CHAR_PLUS || bytes[cursor] === CHAR_MINUS)) {
    sign = bytes[cursor] === CHAR_MINUS ? -1 : 1
    cursor++
  }
  const special = scanSpecial(bytes, cursor, end, sign, start)
  if (special !== undefined) {
    return special
  }
  if (cursor + 1 < end && bytes[cursor] === CHAR_0 && lowerAt(bytes, cursor + 1, end) === 0x78) {
    const hex = scanHex(bytes, cursor + 2, end, sign, start)
    if (hex !== undefined) {
      return hex
    }
  }
  const mantissaStart = cursor
  let digits = 0
  while (cursor < end && isDigit(bytes[cursor])) {
    cursor++
    digits++
  }
  if (cursor < end && bytes[cursor] === CHAR_DOT) {
    let fraction = cursor + 1
    while (fraction < end && isDigit(bytes[fraction])) {
      fraction++
      digits++
    }
    if (digits > 0) {
      cursor = fraction
    }
  }
  if (digits === 0) {
    return NONE
  }
  if (cursor < end && lowerAt(bytes, cursor, end) === 0x65) {
    const exponent = scanExponentDigits(bytes, cursor + 1, end)
    if (exponent !== undefined) {
      cursor = exponent.next
    }
  }
  const magnitude = Number.parseFloat(asciiSlice(bytes, mantissaStart, cursor))
  return { value: sign * magnitude, consumed: cursor - start }
}

/**
 * Integer cache kept beside every number: truncation toward zero,
 * saturated to the int32 range.
 *
 * @pure true
 * @complexity O(1)
 */
export const toIntCache = (value: number): number => {
  if (Number.isNaN(value)) {
    return 0
  }
  if (value >= INT32_MAX) {
    return INT32_MAX
  }
  if (value <= INT32_MIN) {
    return INT32_MIN
  }
  return Math.trunc(value)
}
