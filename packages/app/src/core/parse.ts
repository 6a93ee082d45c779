import * as Either from "effect/Either"

import { currentContext, type JsonContext } from "./allocator.js"
import type { ParseError } from "./errors.js"
import {
  allocationFailure,
  depthExceeded,
  endOfInput,
  expectedToken,
  invalidValue,
  malformedLiteral,
  trailingContent,
  unterminatedString
} from "./errors.js"
import type { JsonNode } from "./node.js"
import { allocateNode, deleteNode, encodeText } from "./node.js"
import { scanNumber, toIntCache } from "./number.js"

// CHANGE: parse a bounded byte buffer into a linked value tree
// WHY: responses arrive as bytes with an explicit length, not as terminated strings
// QUOTE(TZ): "all bounds checks must be against the explicit length, never by scanning for a terminator past it"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: parse(b) = Left(e) → outstanding(allocator) is unchanged
// PURITY: CORE
// EFFECT: allocator hooks
// INVARIANT: a failed container deletes every child it already linked
// COMPLEXITY: O(n) where n = input length; recursion depth ≤ context.maxDepth

export interface ParseOptions {
  /** Bytes of input to consider; defaults to the whole buffer. */
  readonly length?: number
  /** Reject anything but whitespace after the top-level value. */
  readonly requireEnd?: boolean
}

export interface ParsedDocument {
  readonly node: JsonNode
  /** Offset just past the top-level value. */
  readonly end: number
}

interface ParseBuffer {
  readonly content: Uint8Array
  readonly length: number
  readonly context: JsonContext
  offset: number
  depth: number
}

type Step = Either.Either<JsonNode, ParseError>

const QUOTE = 0x22
const BACKSLASH = 0x5c
const COMMA = 0x2c
const COLON = 0x3a
const MINUS = 0x2d
const OPEN_BRACKET = 0x5b
const CLOSE_BRACKET = 0x5d
const OPEN_BRACE = 0x7b
const CLOSE_BRACE = 0x7d
const PLACEHOLDER = 0x3f

const LITERAL_NULL = encodeText("null")
const LITERAL_FALSE = encodeText("false")
const LITERAL_TRUE = encodeText("true")

const canRead = (buffer: ParseBuffer, size: number): boolean => buffer.offset + size <= buffer.length

const byteAt = (buffer: ParseBuffer): number | undefined =>
  buffer.offset < buffer.length ? buffer.content[buffer.offset] : undefined

const skipWhitespace = (buffer: ParseBuffer): void => {
  while (buffer.offset < buffer.length && (buffer.content[buffer.offset] ?? 0) <= 32) {
    buffer.offset++
  }
}

const matchesLiteral = (buffer: ParseBuffer, literal: Uint8Array): boolean => {
  if (!canRead(buffer, literal.length)) {
    return false
  }
  for (let index = 0; index < literal.length; index++) {
    if (buffer.content[buffer.offset + index] !== literal[index]) {
      return false
    }
  }
  return true
}

const isDigit = (byte: number): boolean => byte >= 0x30 && byte <= 0x39

const unescapeByte = (escaped: number): number => {
  switch (escaped) {
    case 0x62:
      return 0x08
    case 0x66:
      return 0x0c
    case 0x6e:
      return 0x0a
    case 0x72:
      return 0x0d
    case 0x74:
      return 0x09
    default:
      return escaped
  }
}

/**
 * Decode the escapes of source[start, end) into out, or only count the
 * output bytes when out is absent.
 *
 * @returns Number of decoded bytes.
 *
 * @pure true (writes only into out)
 * @invariant every backslash in the span is followed by a byte inside the span
 * @complexity O(end - start)
 */
const decodeEscapes = (
  source: Uint8Array,
  start: number,
  end: number,
  out: Uint8Array | undefined
): number => {
  let read = start
  let written = 0
  while (read < end) {
    const byte = source[read] ?? 0
    if (byte !== BACKSLASH) {
      if (out !== undefined) {
        out[written] = byte
      }
      written++
      read++
      continue
    }
    const escaped = source[read + 1] ?? 0
    read += 2
    if (escaped === 0x75) {
      if (out !== undefined) {
        out[written] = PLACEHOLDER
      }
      read += Math.min(4, end - read)
    } else if (out !== undefined) {
      out[written] = unescapeByte(escaped)
    }
    written++
  }
  return written
}

const findClosingQuote = (buffer: ParseBuffer, start: number): number | undefined => {
  let cursor = start
  while (cursor < buffer.length) {
    const byte = buffer.content[cursor]
    if (byte === QUOTE) {
      return cursor
    }
    if (byte === 0) {
      return undefined
    }
    cursor += byte === BACKSLASH ? 2 : 1
  }
  return undefined
}

const parseString = (item: JsonNode, buffer: ParseBuffer): Step => {
  if (byteAt(buffer) !== QUOTE) {
    return Either.left(expectedToken(buffer.offset, "\""))
  }
  const start = buffer.offset + 1
  const close = findClosingQuote(buffer, start)
  if (close === undefined) {
    return Either.left(unterminatedString(buffer.offset))
  }
  const size = decodeEscapes(buffer.content, start, close, undefined)
  const block = buffer.context.allocator.allocate(size)
  if (block === undefined) {
    return Either.left(allocationFailure(buffer.offset))
  }
  decodeEscapes(buffer.content, start, close, block)
  item.kind = "String"
  item.valueString = block
  buffer.offset = close + 1
  return Either.right(item)
}

const parseNumber = (item: JsonNode, buffer: ParseBuffer): Step => {
  const scanned = scanNumber(buffer.content, buffer.offset, buffer.length)
  if (scanned.consumed === 0) {
    return Either.left(malformedLiteral(buffer.offset))
  }
  item.kind = "Number"
  item.valueNumber = scanned.value
  item.valueInt = toIntCache(scanned.value)
  buffer.offset += scanned.consumed
  return Either.right(item)
}

const parseMemberKey = (member: JsonNode, buffer: ParseBuffer): Either.Either<void, ParseError> => {
  const key = parseString(member, buffer)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  member.key = member.valueString
  member.valueString = undefined
  member.kind = "Invalid"
  skipWhitespace(buffer)
  if (byteAt(buffer) !== COLON) {
    return Either.left(expectedToken(buffer.offset, ":"))
  }
  buffer.offset++
  skipWhitespace(buffer)
  return Either.right(undefined)
}

interface ContainerShape {
  readonly kind: "Array" | "Object"
  readonly open: number
  readonly close: number
  readonly keyed: boolean
}

const ARRAY_SHAPE: ContainerShape = { kind: "Array", open: OPEN_BRACKET, close: CLOSE_BRACKET, keyed: false }
const OBJECT_SHAPE: ContainerShape = { kind: "Object", open: OPEN_BRACE, close: CLOSE_BRACE, keyed: true }

const parseMembers = (item: JsonNode, buffer: ParseBuffer, shape: ContainerShape): Step => {
  buffer.offset++
  skipWhitespace(buffer)
  if (byteAt(buffer) === shape.close) {
    buffer.offset++
    item.kind = shape.kind
    return Either.right(item)
  }
  let head: JsonNode | undefined
  let tail: JsonNode | undefined
  const fail = (error: ParseError): Step => {
    deleteNode(head)
    return Either.left(error)
  }
  for (;;) {
    skipWhitespace(buffer)
    const child = allocateNode(buffer.context.allocator)
    if (child === undefined) {
      return fail(allocationFailure(buffer.offset))
    }
    if (tail === undefined) {
      head = child
    } else {
      tail.next = child
      child.prev = tail
    }
    tail = child
    if (shape.keyed) {
      const key = parseMemberKey(child, buffer)
      if (Either.isLeft(key)) {
        return fail(key.left)
      }
    }
    const value = parseValue(child, buffer)
    if (Either.isLeft(value)) {
      return fail(value.left)
    }
    skipWhitespace(buffer)
    if (byteAt(buffer) !== COMMA) {
      break
    }
    buffer.offset++
  }
  if (byteAt(buffer) !== shape.close) {
    return fail(expectedToken(buffer.offset, String.fromCharCode(shape.close)))
  }
  buffer.offset++
  item.kind = shape.kind
  item.child = head
  return Either.right(item)
}

const parseContainer = (item: JsonNode, buffer: ParseBuffer, shape: ContainerShape): Step => {
  if (buffer.depth >= buffer.context.maxDepth) {
    return Either.left(depthExceeded(buffer.offset, buffer.context.maxDepth))
  }
  buffer.depth++
  const result = parseMembers(item, buffer, shape)
  buffer.depth--
  return result
}

const parseValue = (item: JsonNode, buffer: ParseBuffer): Step => {
  skipWhitespace(buffer)
  const byte = byteAt(buffer)
  if (byte === undefined) {
    return Either.left(endOfInput(buffer.offset))
  }
  if (matchesLiteral(buffer, LITERAL_NULL)) {
    item.kind = "Null"
    buffer.offset += LITERAL_NULL.length
    return Either.right(item)
  }
  if (matchesLiteral(buffer, LITERAL_FALSE)) {
    item.kind = "False"
    buffer.offset += LITERAL_FALSE.length
    return Either.right(item)
  }
  if (matchesLiteral(buffer, LITERAL_TRUE)) {
    item.kind = "True"
    buffer.offset += LITERAL_TRUE.length
    return Either.right(item)
  }
  if (byte === QUOTE) {
    return parseString(item, buffer)
  }
  if (byte === MINUS || isDigit(byte)) {
    return parseNumber(item, buffer)
  }
  if (byte === OPEN_BRACKET) {
    return parseContainer(item, buffer, ARRAY_SHAPE)
  }
  if (byte === OPEN_BRACE) {
    return parseContainer(item, buffer, OBJECT_SHAPE)
  }
  return Either.left(invalidValue(buffer.offset))
}

/**
 * Parse one JSON value from bytes and report where it ended.
 *
 * @param bytes - Input buffer; need not be terminated.
 * @param options - Explicit length and trailing-content policy.
 * @param context - Allocator and depth limit.
 * @returns Either with the document or the diagnostic of this call.
 *
 * @pure false
 * @effect allocator hooks
 * @invariant Left → every block allocated during the call has been released
 * @complexity O(n)
 */
export const parseWithOptions = (
  bytes: Uint8Array,
  options: ParseOptions = {},
  context: JsonContext = currentContext()
): Either.Either<ParsedDocument, ParseError> => {
  const length = Math.floor(Math.min(options.length ?? bytes.length, bytes.length))
  if (Number.isNaN(length) || length <= 0) {
    return Either.left(endOfInput(0))
  }
  const root = allocateNode(context.allocator)
  if (root === undefined) {
    return Either.left(allocationFailure(0))
  }
  const buffer: ParseBuffer = { content: bytes, length, context, offset: 0, depth: 0 }
  const parsed = parseValue(root, buffer)
  if (Either.isLeft(parsed)) {
    deleteNode(root)
    return Either.left(parsed.left)
  }
  const end = buffer.offset
  if (options.requireEnd === true) {
    skipWhitespace(buffer)
    if (buffer.offset < buffer.length) {
      deleteNode(root)
      return Either.left(trailingContent(buffer.offset))
    }
  }
  return Either.right({ node: root, end })
}

/**
 * Parse the first length bytes of bytes.
 *
 * Trailing bytes after the value are ignored.
 *
 * @pure false
 * @effect allocator hooks
 */
export const parse = (
  bytes: Uint8Array,
  length: number = bytes.length,
  context: JsonContext = currentContext()
): Either.Either<JsonNode, ParseError> =>
  Either.map(parseWithOptions(bytes, { length }, context), (document) => document.node)

export const parseText = (
  text: string,
  context: JsonContext = currentContext()
): Either.Either<JsonNode, ParseError> => parse(encodeText(text), undefined, context)
