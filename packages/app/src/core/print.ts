import { Match } from "effect"
import * as Either from "effect/Either"

import { type AllocatorHooks, type Block, currentContext, type JsonContext } from "./allocator.js"
import type { PrintError } from "./errors.js"
import { allocationFailure, depthExceeded, invalidValue } from "./errors.js"
import type { JsonNode } from "./node.js"
import { decodeText } from "./node.js"
import type { PrintBuffer } from "./print-buffer.js"
import {
  DEFAULT_PREBUFFER,
  discardPrintBuffer,
  openPrintBuffer,
  reserve,
  writeAscii,
  writeByte
} from "./print-buffer.js"

// CHANGE: serialize value trees to compact JSON bytes
// WHY: request documents are sent as compact text built from node trees
// QUOTE(TZ): "compact and \"formatted\" entry points must be behaviorally identical"
// REF: req-print-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parse(print(t)) ≅ t for trees with finite numbers and no \u escapes
// PURITY: CORE
// EFFECT: allocator hooks
// INVARIANT: Left → the print buffer has been released
// COMPLEXITY: O(n) where n = output bytes

export interface PrintedJson {
  readonly block: Block
  readonly length: number
  readonly allocator: AllocatorHooks
}

type Written = Either.Either<void, PrintError>

const WRITTEN: Written = Either.right(undefined)

const QUOTE = 0x22
const BACKSLASH = 0x5c

const SHORT_ESCAPES: ReadonlyMap<number, number> = new Map([
  [QUOTE, QUOTE],
  [BACKSLASH, BACKSLASH],
  [0x08, 0x62],
  [0x0c, 0x66],
  [0x0a, 0x6e],
  [0x0d, 0x72],
  [0x09, 0x74]
])

const shortEscape = (byte: number): number | undefined => SHORT_ESCAPES.get(byte)

const escapedLength = (bytes: Uint8Array): number => {
  let size = 0
  for (const byte of bytes) {
    if (shortEscape(byte) !== undefined) {
      size += 2
    } else if (byte < 0x20) {
      size += 6
    } else {
      size += 1
    }
  }
  return size
}

const HEX_DIGITS = "0123456789abcdef"

const printString = (bytes: Uint8Array | undefined, buffer: PrintBuffer): Written => {
  const source = bytes ?? new Uint8Array(0)
  if (!reserve(buffer, escapedLength(source) + 2)) {
    return Either.left(allocationFailure(buffer.offset))
  }
  const out = buffer.block
  let cursor = buffer.offset
  out[cursor++] = QUOTE
  for (const byte of source) {
    const short = shortEscape(byte)
    if (short !== undefined) {
      out[cursor++] = BACKSLASH
      out[cursor++] = short
    } else if (byte < 0x20) {
      out[cursor++] = BACKSLASH
      out[cursor++] = 0x75
      out[cursor++] = 0x30
      out[cursor++] = 0x30
      out[cursor++] = HEX_DIGITS.charCodeAt(byte >> 4)
      out[cursor++] = HEX_DIGITS.charCodeAt(byte & 0x0f)
    } else {
      out[cursor++] = byte
    }
  }
  out[cursor++] = QUOTE
  buffer.offset = cursor
  return WRITTEN
}

/**
 * Text of a number: integer digits when the value equals its integer cache,
 * the shortest round-trip decimal otherwise, null when not finite.
 *
 * @pure true
 */
export const formatNumber = (value: number, valueInt: number): string => {
  if (!Number.isFinite(value)) {
    return "null"
  }
  if (value === valueInt) {
    return String(valueInt)
  }
  return String(value)
}

const writeText = (buffer: PrintBuffer, text: string): Written =>
  writeAscii(buffer, text) ? WRITTEN : Either.left(allocationFailure(buffer.offset))

const writeSeparator = (buffer: PrintBuffer, byte: number): Written =>
  writeByte(buffer, byte) ? WRITTEN : Either.left(allocationFailure(buffer.offset))

interface PrintState {
  readonly buffer: PrintBuffer
  readonly maxDepth: number
}

const printChildren = (
  node: JsonNode,
  state: PrintState,
  depth: number,
  keyed: boolean
): Written => {
  const open = keyed ? 0x7b : 0x5b
  const close = keyed ? 0x7d : 0x5d
  if (depth >= state.maxDepth) {
    return Either.left(depthExceeded(state.buffer.offset, state.maxDepth))
  }
  const opened = writeSeparator(state.buffer, open)
  if (Either.isLeft(opened)) {
    return opened
  }
  let child = node.child
  while (child !== undefined) {
    if (keyed) {
      const key = printString(child.key, state.buffer)
      if (Either.isLeft(key)) {
        return key
      }
      const colon = writeSeparator(state.buffer, 0x3a)
      if (Either.isLeft(colon)) {
        return colon
      }
    }
    const value = printValue(child, state, depth + 1)
    if (Either.isLeft(value)) {
      return value
    }
    child = child.next
    if (child !== undefined) {
      const comma = writeSeparator(state.buffer, 0x2c)
      if (Either.isLeft(comma)) {
        return comma
      }
    }
  }
  return writeSeparator(state.buffer, close)
}

const printValue = (node: JsonNode, state: PrintState, depth: number): Written =>
  Match.value(node.kind).pipe(
    Match.when("Null", () => writeText(state.buffer, "null")),
    Match.when("False", () => writeText(state.buffer, "false")),
    Match.when("True", () => writeText(state.buffer, "true")),
    Match.when("Number", () => writeText(state.buffer, formatNumber(node.valueNumber, node.valueInt))),
    Match.when("String", () => printString(node.valueString, state.buffer)),
    Match.when("Raw", () => printString(node.valueString, state.buffer)),
    Match.when("Array", () => printChildren(node, state, depth, false)),
    Match.when("Object", () => printChildren(node, state, depth, true)),
    Match.when("Invalid", () => Either.left(invalidValue(state.buffer.offset))),
    Match.exhaustive
  )

/**
 * Print a tree into a buffer whose first block holds prebuffer bytes.
 *
 * @param node - Root of the tree; its own key, if any, is not printed.
 * @param prebuffer - Initial capacity of the output block.
 * @param context - Allocator and depth limit.
 * @returns Either with the caller-owned output or the failure.
 *
 * @pure false
 * @effect allocator hooks
 * @invariant Right(p) → p must be handed back through releasePrinted
 * @complexity O(n)
 */
export const printBuffered = (
  node: JsonNode,
  prebuffer: number,
  context: JsonContext = currentContext()
): Either.Either<PrintedJson, PrintError> => {
  const buffer = openPrintBuffer(context.allocator, prebuffer)
  if (buffer === undefined) {
    return Either.left(allocationFailure(0))
  }
  const written = printValue(node, { buffer, maxDepth: context.maxDepth }, 0)
  if (Either.isLeft(written)) {
    discardPrintBuffer(buffer)
    return Either.left(written.left)
  }
  return Either.right({ block: buffer.block, length: buffer.offset, allocator: buffer.allocator })
}

export const printUnformatted = (
  node: JsonNode,
  context: JsonContext = currentContext()
): Either.Either<PrintedJson, PrintError> => printBuffered(node, DEFAULT_PREBUFFER, context)

/**
 * Same output as printUnformatted: no indentation is produced.
 */
export const print = (
  node: JsonNode,
  context: JsonContext = currentContext()
): Either.Either<PrintedJson, PrintError> => printUnformatted(node, context)

export const printedBytes = (printed: PrintedJson): Uint8Array => printed.block.subarray(0, printed.length)

export const printedText = (printed: PrintedJson): string => decodeText(printedBytes(printed))

export const releasePrinted = (printed: PrintedJson): void => {
  printed.allocator.release(printed.block)
}

/**
 * Print, decode and release in one step.
 *
 * @pure false
 * @effect allocator hooks (balanced: nothing stays allocated)
 */
export const printToString = (
  node: JsonNode,
  context: JsonContext = currentContext()
): Either.Either<string, PrintError> =>
  Either.map(print(node, context), (printed) => {
    const text = printedText(printed)
    releasePrinted(printed)
    return text
  })
