import { getArrayItem, getObjectItem, getObjectItemCaseSensitive } from "./access.js"
import { addItemToArray } from "./build.js"
import type { JsonNode, TextInput } from "./node.js"
import { deleteNode, duplicateText } from "./node.js"

// CHANGE: add container-level detach, insert and replace operations
// WHY: callers rewrite documents in place without rebuilding whole containers
// QUOTE(TZ): "the surrounding API may expose replace-operations at the container level"
// REF: req-mutate-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p,i: detach(p,i) = i → i ∉ children(p) ∧ i.next = i.prev = undefined
// PURITY: CORE
// EFFECT: allocator hooks (replaced and deleted nodes are released)
// INVARIANT: sibling links stay symmetric: a.next = b ↔ b.prev = a
// COMPLEXITY: O(n) where n = child count

const isChildOf = (parent: JsonNode, item: JsonNode): boolean => {
  let current = parent.child
  while (current !== undefined) {
    if (current === item) {
      return true
    }
    current = current.next
  }
  return false
}

/**
 * Unlink item from parent; the caller becomes its owner.
 *
 * @returns item, or undefined when it is not a child of parent.
 *
 * @pure false
 * @complexity O(n)
 */
export const detachItemViaPointer = (
  parent: JsonNode | undefined,
  item: JsonNode | undefined
): JsonNode | undefined => {
  if (parent === undefined || item === undefined || !isChildOf(parent, item)) {
    return undefined
  }
  if (item.prev === undefined) {
    parent.child = item.next
  } else {
    item.prev.next = item.next
  }
  if (item.next !== undefined) {
    item.next.prev = item.prev
  }
  item.next = undefined
  item.prev = undefined
  return item
}

export const detachItemFromArray = (array: JsonNode | undefined, index: number): JsonNode | undefined =>
  detachItemViaPointer(array, getArrayItem(array, index))

export const deleteItemFromArray = (array: JsonNode | undefined, index: number): void => {
  deleteNode(detachItemFromArray(array, index))
}

export const detachItemFromObject = (object: JsonNode | undefined, key: TextInput): JsonNode | undefined =>
  detachItemViaPointer(object, getObjectItem(object, key))

export const detachItemFromObjectCaseSensitive = (
  object: JsonNode | undefined,
  key: TextInput
): JsonNode | undefined => detachItemViaPointer(object, getObjectItemCaseSensitive(object, key))

export const deleteItemFromObject = (object: JsonNode | undefined, key: TextInput): void => {
  deleteNode(detachItemFromObject(object, key))
}

export const deleteItemFromObjectCaseSensitive = (object: JsonNode | undefined, key: TextInput): void => {
  deleteNode(detachItemFromObjectCaseSensitive(object, key))
}

/**
 * Insert item before the element at index; an index past the end appends.
 *
 * @returns false for an absent argument or a negative index.
 */
export const insertItemInArray = (
  array: JsonNode | undefined,
  index: number,
  item: JsonNode | undefined
): boolean => {
  if (array === undefined || item === undefined || index < 0 || array === item) {
    return false
  }
  const after = getArrayItem(array, index)
  if (after === undefined) {
    return addItemToArray(array, item)
  }
  item.next = after
  item.prev = after.prev
  after.prev = item
  if (item.prev === undefined) {
    array.child = item
  } else {
    item.prev.next = item
  }
  return true
}

/**
 * Put replacement where item stands and delete item.
 *
 * @returns false when item is not a child of parent.
 *
 * @pure false
 * @effect releases item and its subtree
 */
export const replaceItemViaPointer = (
  parent: JsonNode | undefined,
  item: JsonNode | undefined,
  replacement: JsonNode | undefined
): boolean => {
  if (parent === undefined || item === undefined || replacement === undefined || !isChildOf(parent, item)) {
    return false
  }
  if (replacement === item) {
    return true
  }
  replacement.next = item.next
  replacement.prev = item.prev
  if (replacement.next !== undefined) {
    replacement.next.prev = replacement
  }
  if (replacement.prev === undefined) {
    parent.child = replacement
  } else {
    replacement.prev.next = replacement
  }
  item.next = undefined
  item.prev = undefined
  deleteNode(item)
  return true
}

export const replaceItemInArray = (
  array: JsonNode | undefined,
  index: number,
  replacement: JsonNode | undefined
): boolean => {
  if (index < 0) {
    return false
  }
  return replaceItemViaPointer(array, getArrayItem(array, index), replacement)
}

const replaceMember = (
  object: JsonNode | undefined,
  key: TextInput,
  replacement: JsonNode | undefined,
  find: (node: JsonNode | undefined, key: TextInput) => JsonNode | undefined
): boolean => {
  if (object === undefined || replacement === undefined) {
    return false
  }
  const current = find(object, key)
  if (current === undefined) {
    return false
  }
  const ownedKey = duplicateText(replacement.allocator, key)
  if (ownedKey === undefined) {
    return false
  }
  if (!replacement.keyIsConstant && replacement.key !== undefined) {
    replacement.allocator.release(replacement.key)
  }
  replacement.key = ownedKey
  replacement.keyIsConstant = false
  return replaceItemViaPointer(object, current, replacement)
}

export const replaceItemInObject = (
  object: JsonNode | undefined,
  key: TextInput,
  replacement: JsonNode | undefined
): boolean => replaceMember(object, key, replacement, getObjectItem)

export const replaceItemInObjectCaseSensitive = (
  object: JsonNode | undefined,
  key: TextInput,
  replacement: JsonNode | undefined
): boolean => replaceMember(object, key, replacement, getObjectItemCaseSensitive)
