import type { AllocatorHooks, Block } from "./allocator.js"

// CHANGE: model JSON values as linked nodes with explicit ownership flags
// WHY: sibling order is significant and containers own their children's lifetime
// QUOTE(TZ): "a node's kind fully determines which of first-child/string value/numeric value are meaningful"
// REF: req-node-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n: delete(n) releases exactly the blocks owned by n's sibling chain and subtrees
// PURITY: CORE
// EFFECT: allocator hooks
// INVARIANT: the child/sibling structure is acyclic
// COMPLEXITY: O(n) per delete where n = nodes reachable through owned links

export type JsonKind =
  | "Invalid"
  | "Null"
  | "False"
  | "True"
  | "Number"
  | "String"
  | "Array"
  | "Object"
  | "Raw"

/**
 * One JSON value, or one member of an object.
 *
 * Links and payload are mutable: the parser and the container operations
 * rewire them in place. Consumers read them, they do not assign them.
 */
export interface JsonNode {
  next: JsonNode | undefined
  prev: JsonNode | undefined
  child: JsonNode | undefined
  kind: JsonKind
  /** Child chain and valueString are borrowed when set. */
  isReference: boolean
  /** key is borrowed when set. */
  keyIsConstant: boolean
  key: Uint8Array | undefined
  valueString: Uint8Array | undefined
  valueNumber: number
  valueInt: number
  readonly cell: Block
  readonly allocator: AllocatorHooks
}

export type TextInput = string | Uint8Array

/** Bytes handed to the allocator for the node record itself. */
export const NODE_CELL_SIZE = 64

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8")

export const encodeText = (text: TextInput): Uint8Array => typeof text === "string" ? encoder.encode(text) : text

export const decodeText = (bytes: Uint8Array): string => decoder.decode(bytes)

/**
 * Allocate a zeroed node through the hooks.
 *
 * @returns Node of kind Invalid, or undefined when the allocator is exhausted.
 *
 * @pure false
 * @effect allocator.allocate
 */
export const allocateNode = (allocator: AllocatorHooks): JsonNode | undefined => {
  const cell = allocator.allocate(NODE_CELL_SIZE)
  if (cell === undefined) {
    return undefined
  }
  return {
    next: undefined,
    prev: undefined,
    child: undefined,
    kind: "Invalid",
    isReference: false,
    keyIsConstant: false,
    key: undefined,
    valueString: undefined,
    valueNumber: 0,
    valueInt: 0,
    cell,
    allocator
  }
}

/**
 * Copy text into a block owned by the caller.
 *
 * @returns Block with exactly the encoded bytes, or undefined on exhaustion.
 *
 * @pure false
 * @effect allocator.allocate
 */
export const duplicateText = (allocator: AllocatorHooks, text: TextInput): Block | undefined => {
  const source = encodeText(text)
  const block = allocator.allocate(source.length)
  if (block === undefined) {
    return undefined
  }
  block.set(source)
  return block
}

const releaseOwned = (node: JsonNode): void => {
  if (!node.isReference && node.valueString !== undefined) {
    node.allocator.release(node.valueString)
  }
  if (!node.keyIsConstant && node.key !== undefined) {
    node.allocator.release(node.key)
  }
  node.allocator.release(node.cell)
  node.next = undefined
  node.prev = undefined
  node.child = undefined
  node.key = undefined
  node.valueString = undefined
}

/**
 * Delete a node together with every sibling that follows it.
 *
 * Children are visited through an explicit work stack, so deletion depth is
 * not bounded by the native call stack. Reference nodes never descend into
 * the child chain they borrow.
 *
 * @param node - Head of the sibling chain; undefined is a no-op.
 *
 * @pure false
 * @effect allocator.release
 * @invariant every released block was owned by the visited node
 * @complexity O(n)
 */
export const deleteNode = (node: JsonNode | undefined): void => {
  const pending: Array<JsonNode> = []
  if (node !== undefined) {
    pending.push(node)
  }
  let chain = pending.pop()
  while (chain !== undefined) {
    let current: JsonNode | undefined = chain
    while (current !== undefined) {
      const next: JsonNode | undefined = current.next
      if (!current.isReference && current.child !== undefined) {
        pending.push(current.child)
      }
      releaseOwned(current)
      current = next
    }
    chain = pending.pop()
  }
}

const ASCII_A_UPPER = 0x41
const ASCII_Z_UPPER = 0x5a

const foldAscii = (byte: number): number =>
  byte >= ASCII_A_UPPER && byte <= ASCII_Z_UPPER ? byte + 0x20 : byte

export const bytesEqual = (left: Uint8Array, right: Uint8Array): boolean => {
  if (left.length !== right.length) {
    return false
  }
  for (let index = 0; index < left.length; index++) {
    if (left[index] !== right[index]) {
      return false
    }
  }
  return true
}

export const bytesEqualIgnoreCase = (left: Uint8Array, right: Uint8Array): boolean => {
  if (left.length !== right.length) {
    return false
  }
  for (let index = 0; index < left.length; index++) {
    if (foldAscii(left[index] ?? 0) !== foldAscii(right[index] ?? 0)) {
      return false
    }
  }
  return true
}
