import type { AllocatorHooks, Block } from "./allocator.js"

// CHANGE: give the printer an owned, doubling output buffer
// WHY: total copy cost stays linear in the final output size
// QUOTE(TZ): "allocate a new buffer of at least double the required size, copy existing content, release the old buffer"
// REF: req-print-buffer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n: reserve(n) = true → offset + n ≤ capacity
// PURITY: CORE
// EFFECT: allocator hooks
// INVARIANT: block is owned by the buffer until the printer hands it to the caller
// COMPLEXITY: amortized O(1) per byte

/** Initial capacity of a print buffer when the caller gives none. */
export const DEFAULT_PREBUFFER = 256

export interface PrintBuffer {
  readonly allocator: AllocatorHooks
  block: Block
  offset: number
}

export const openPrintBuffer = (allocator: AllocatorHooks, capacity: number): PrintBuffer | undefined => {
  const block = allocator.allocate(Math.max(1, Math.floor(capacity)))
  return block === undefined ? undefined : { allocator, block, offset: 0 }
}

/**
 * Make room for size more bytes.
 *
 * @returns false when a larger block cannot be allocated; the buffer is then unchanged.
 *
 * @pure false
 * @effect allocator.allocate, allocator.release
 */
export const reserve = (buffer: PrintBuffer, size: number): boolean => {
  const required = buffer.offset + size
  if (required <= buffer.block.length) {
    return true
  }
  const grown = buffer.allocator.allocate(required * 2)
  if (grown === undefined) {
    return false
  }
  grown.set(buffer.block.subarray(0, buffer.offset))
  buffer.allocator.release(buffer.block)
  buffer.block = grown
  return true
}

export const writeByte = (buffer: PrintBuffer, byte: number): boolean => {
  if (!reserve(buffer, 1)) {
    return false
  }
  buffer.block[buffer.offset] = byte
  buffer.offset++
  return true
}

/** Write an ASCII-only string. */
export const writeAscii = (buffer: PrintBuffer, text: string): boolean => {
  if (!reserve(buffer, text.length)) {
    return false
  }
  for (let index = 0; index < text.length; index++) {
    buffer.block[buffer.offset + index] = text.charCodeAt(index)
  }
  buffer.offset += text.length
  return true
}

export const discardPrintBuffer = (buffer: PrintBuffer): void => {
  buffer.allocator.release(buffer.block)
}
