import { currentContext, type JsonContext } from "./allocator.js"
import type { JsonNode } from "./node.js"
import { allocateNode, bytesEqual, bytesEqualIgnoreCase, deleteNode } from "./node.js"

// CHANGE: copy and compare value trees
// WHY: callers need independent copies; comparison keeps its historical shallow contract
// QUOTE(TZ): "returns true only when both nodes are present and have equal kind"
// REF: req-copy-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: compareDeep(t, duplicate(t), true) = true
// PURITY: CORE
// EFFECT: allocator hooks (duplicate)
// INVARIANT: a duplicate shares no block with its source
// COMPLEXITY: O(n)

const copyBlock = (context: JsonContext, source: Uint8Array): Uint8Array | undefined => {
  const block = context.allocator.allocate(source.length)
  if (block !== undefined) {
    block.set(source)
  }
  return block
}

const copyNode = (source: JsonNode, context: JsonContext, depth: number): JsonNode | undefined => {
  const target = allocateNode(context.allocator)
  if (target === undefined) {
    return undefined
  }
  target.kind = source.kind
  target.valueNumber = source.valueNumber
  target.valueInt = source.valueInt
  if (source.valueString !== undefined) {
    target.valueString = copyBlock(context, source.valueString)
    if (target.valueString === undefined) {
      deleteNode(target)
      return undefined
    }
  }
  if (source.kind !== "Array" && source.kind !== "Object") {
    return target
  }
  if (depth >= context.maxDepth) {
    deleteNode(target)
    return undefined
  }
  let tail: JsonNode | undefined
  let current = source.child
  while (current !== undefined) {
    const copied = copyNode(current, context, depth + 1)
    if (copied === undefined) {
      deleteNode(target)
      return undefined
    }
    if (current.key !== undefined) {
      copied.key = copyBlock(context, current.key)
      if (copied.key === undefined) {
        deleteNode(copied)
        deleteNode(target)
        return undefined
      }
    }
    if (tail === undefined) {
      target.child = copied
    } else {
      tail.next = copied
      copied.prev = tail
    }
    tail = copied
    current = current.next
  }
  return target
}

/**
 * Deep copy of node and everything below it.
 *
 * Borrowed payloads become owned copies; the copy's root has no key and no
 * siblings.
 *
 * @returns Independent tree, or undefined on allocation failure or nesting deeper than context.maxDepth.
 *
 * @pure false
 * @effect allocator hooks
 * @invariant undefined → nothing allocated during the call is left outstanding
 * @complexity O(n)
 */
export const duplicate = (
  node: JsonNode | undefined,
  context: JsonContext = currentContext()
): JsonNode | undefined => node === undefined ? undefined : copyNode(node, context, 0)

/**
 * Kind-only comparison: values, keys and children are not inspected.
 *
 * @see compareDeep for structural equality
 */
export const compare = (left: JsonNode | undefined, right: JsonNode | undefined): boolean =>
  left !== undefined && right !== undefined && left.kind === right.kind

const sameOptionalBytes = (
  left: Uint8Array | undefined,
  right: Uint8Array | undefined,
  equal: (a: Uint8Array, b: Uint8Array) => boolean
): boolean => {
  if (left === undefined || right === undefined) {
    return left === right
  }
  return equal(left, right)
}

const samePayload = (left: JsonNode, right: JsonNode): boolean => {
  if (left.kind !== right.kind) {
    return false
  }
  if (left.kind === "Number") {
    return left.valueNumber === right.valueNumber
  }
  if (left.kind === "String" || left.kind === "Raw") {
    return sameOptionalBytes(left.valueString, right.valueString, bytesEqual)
  }
  return true
}

/**
 * Structural equality: kinds, numbers, strings, child order and member keys.
 *
 * Keys fold ASCII case unless caseSensitive. The roots' own keys are ignored.
 *
 * @pure true
 * @complexity O(n)
 */
export const compareDeep = (
  left: JsonNode | undefined,
  right: JsonNode | undefined,
  caseSensitive = true
): boolean => {
  if (left === undefined || right === undefined) {
    return false
  }
  const keysEqual = caseSensitive ? bytesEqual : bytesEqualIgnoreCase
  const pending: Array<readonly [JsonNode, JsonNode]> = [[left, right]]
  let pair = pending.pop()
  while (pair !== undefined) {
    const [a, b] = pair
    if (!samePayload(a, b)) {
      return false
    }
    let childA = a.child
    let childB = b.child
    while (childA !== undefined && childB !== undefined) {
      if (a.kind === "Object" && !sameOptionalBytes(childA.key, childB.key, keysEqual)) {
        return false
      }
      pending.push([childA, childB])
      childA = childA.next
      childB = childB.next
    }
    if (childA !== childB) {
      return false
    }
    pair = pending.pop()
  }
  return true
}
