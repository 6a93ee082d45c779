import { currentContext, type JsonContext } from "./allocator.js"
import type { Json } from "./json.js"
import type { JsonKind, JsonNode, TextInput } from "./node.js"
import { allocateNode, deleteNode, duplicateText, encodeText } from "./node.js"
import { toIntCache } from "./number.js"

// CHANGE: provide the builder family for constructing value trees
// WHY: collaborators assemble request documents from structured fields
// QUOTE(TZ): "addItemToObject(container, key, item, constantKey)"
// REF: req-build-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c,i: addItemToArray(c,i) = true → i is the last child of c
// PURITY: CORE
// EFFECT: allocator hooks
// INVARIANT: a failed builder leaves no allocated block behind
// COMPLEXITY: O(n) per append where n = current child count

const createOfKind = (kind: JsonKind, context: JsonContext): JsonNode | undefined => {
  const node = allocateNode(context.allocator)
  if (node !== undefined) {
    node.kind = kind
  }
  return node
}

export const createNull = (context: JsonContext = currentContext()): JsonNode | undefined =>
  createOfKind("Null", context)

export const createTrue = (context: JsonContext = currentContext()): JsonNode | undefined =>
  createOfKind("True", context)

export const createFalse = (context: JsonContext = currentContext()): JsonNode | undefined =>
  createOfKind("False", context)

export const createBool = (value: boolean, context: JsonContext = currentContext()): JsonNode | undefined =>
  createOfKind(value ? "True" : "False", context)

export const createArray = (context: JsonContext = currentContext()): JsonNode | undefined =>
  createOfKind("Array", context)

export const createObject = (context: JsonContext = currentContext()): JsonNode | undefined =>
  createOfKind("Object", context)

export const createNumber = (value: number, context: JsonContext = currentContext()): JsonNode | undefined => {
  const node = createOfKind("Number", context)
  if (node !== undefined) {
    node.valueNumber = value
    node.valueInt = toIntCache(value)
  }
  return node
}

const createText = (
  kind: "String" | "Raw",
  text: TextInput,
  context: JsonContext
): JsonNode | undefined => {
  const node = createOfKind(kind, context)
  if (node === undefined) {
    return undefined
  }
  const owned = duplicateText(context.allocator, text)
  if (owned === undefined) {
    deleteNode(node)
    return undefined
  }
  node.valueString = owned
  return node
}

/**
 * Create a String node holding an owned copy of text.
 *
 * @returns Node, or undefined when either the node or the copy cannot be allocated.
 */
export const createString = (text: TextInput, context: JsonContext = currentContext()): JsonNode | undefined =>
  createText("String", text, context)

export const createRaw = (text: TextInput, context: JsonContext = currentContext()): JsonNode | undefined =>
  createText("Raw", text, context)

/**
 * Create a String node that borrows text instead of copying it.
 *
 * A Uint8Array argument is shared as-is; deleting the node never releases it.
 */
export const createStringReference = (
  text: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => {
  const node = createOfKind("String", context)
  if (node !== undefined) {
    node.valueString = encodeText(text)
    node.isReference = true
  }
  return node
}

const createContainerReference = (
  kind: "Array" | "Object",
  child: JsonNode | undefined,
  context: JsonContext
): JsonNode | undefined => {
  const node = createOfKind(kind, context)
  if (node !== undefined) {
    node.child = child
    node.isReference = true
  }
  return node
}

export const createArrayReference = (
  child: JsonNode | undefined,
  context: JsonContext = currentContext()
): JsonNode | undefined => createContainerReference("Array", child, context)

export const createObjectReference = (
  child: JsonNode | undefined,
  context: JsonContext = currentContext()
): JsonNode | undefined => createContainerReference("Object", child, context)

const lastChild = (container: JsonNode): JsonNode | undefined => {
  let current = container.child
  while (current?.next !== undefined) {
    current = current.next
  }
  return current
}

/**
 * Append item to the end of container's child list and hand it ownership.
 *
 * @returns false when either argument is absent or item is the container itself.
 *
 * @pure false
 * @invariant item.next = undefined after a successful append
 * @complexity O(n)
 */
export const addItemToArray = (container: JsonNode | undefined, item: JsonNode | undefined): boolean => {
  if (container === undefined || item === undefined || container === item) {
    return false
  }
  const tail = lastChild(container)
  item.next = undefined
  if (tail === undefined) {
    item.prev = undefined
    container.child = item
  } else {
    tail.next = item
    item.prev = tail
  }
  return true
}

/**
 * Name item with key and append it to container.
 *
 * @param constantKey - Borrow key instead of copying it; the member then never releases it.
 * @returns false when an argument is absent or the key copy cannot be allocated.
 *
 * @pure false
 * @invariant item.keyIsConstant = constantKey after success
 */
export const addItemToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  item: JsonNode | undefined,
  constantKey = false
): boolean => {
  if (container === undefined || item === undefined || container === item) {
    return false
  }
  const nextKey = constantKey ? encodeText(key) : duplicateText(item.allocator, key)
  if (nextKey === undefined) {
    return false
  }
  if (!item.keyIsConstant && item.key !== undefined) {
    item.allocator.release(item.key)
  }
  item.key = nextKey
  item.keyIsConstant = constantKey
  return addItemToArray(container, item)
}

export const addItemToObjectCS = (
  container: JsonNode | undefined,
  key: TextInput,
  item: JsonNode | undefined
): boolean => addItemToObject(container, key, item, true)

const createReferenceTo = (item: JsonNode, context: JsonContext): JsonNode | undefined => {
  const reference = allocateNode(context.allocator)
  if (reference === undefined) {
    return undefined
  }
  reference.kind = item.kind
  reference.child = item.child
  reference.valueString = item.valueString
  reference.valueNumber = item.valueNumber
  reference.valueInt = item.valueInt
  reference.isReference = true
  return reference
}

/**
 * Append a node that borrows item's payload; item keeps its own owner.
 */
export const addItemReferenceToArray = (
  container: JsonNode | undefined,
  item: JsonNode | undefined,
  context: JsonContext = currentContext()
): boolean => {
  if (container === undefined || item === undefined) {
    return false
  }
  const reference = createReferenceTo(item, context)
  if (reference === undefined) {
    return false
  }
  return addItemToArray(container, reference)
}

export const addItemReferenceToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  item: JsonNode | undefined,
  context: JsonContext = currentContext()
): boolean => {
  if (container === undefined || item === undefined) {
    return false
  }
  const reference = createReferenceTo(item, context)
  if (reference === undefined) {
    return false
  }
  if (!addItemToObject(container, key, reference)) {
    deleteNode(reference)
    return false
  }
  return true
}

const fillArray = <A>(
  values: ReadonlyArray<A>,
  create: (value: A) => JsonNode | undefined,
  context: JsonContext
): JsonNode | undefined => {
  const array = createArray(context)
  if (array === undefined) {
    return undefined
  }
  let tail: JsonNode | undefined
  for (const value of values) {
    const item = create(value)
    if (item === undefined) {
      deleteNode(array)
      return undefined
    }
    if (tail === undefined) {
      array.child = item
    } else {
      tail.next = item
      item.prev = tail
    }
    tail = item
  }
  return array
}

export const createNumberArray = (
  numbers: ReadonlyArray<number>,
  context: JsonContext = currentContext()
): JsonNode | undefined => fillArray(numbers, (value) => createNumber(value, context), context)

export const createStringArray = (
  strings: ReadonlyArray<TextInput>,
  context: JsonContext = currentContext()
): JsonNode | undefined => fillArray(strings, (value) => createString(value, context), context)

const addCreated = (
  container: JsonNode | undefined,
  key: TextInput,
  item: JsonNode | undefined
): JsonNode | undefined => {
  if (addItemToObject(container, key, item)) {
    return item
  }
  deleteNode(item)
  return undefined
}

export const addNullToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createNull(context))

export const addTrueToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createTrue(context))

export const addFalseToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createFalse(context))

export const addBoolToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  value: boolean,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createBool(value, context))

export const addNumberToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  value: number,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createNumber(value, context))

export const addStringToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  value: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createString(value, context))

export const addRawToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  value: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createRaw(value, context))

export const addObjectToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createObject(context))

export const addArrayToObject = (
  container: JsonNode | undefined,
  key: TextInput,
  context: JsonContext = currentContext()
): JsonNode | undefined => addCreated(container, key, createArray(context))

const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

const fromJsonAt = (value: Json, context: JsonContext, depth: number): JsonNode | undefined => {
  if (value === null) {
    return createNull(context)
  }
  if (typeof value === "boolean") {
    return createBool(value, context)
  }
  if (typeof value === "number") {
    return createNumber(value, context)
  }
  if (typeof value === "string") {
    return createString(value, context)
  }
  if (depth >= context.maxDepth) {
    return undefined
  }
  if (isJsonArray(value)) {
    return fillArray(value, (entry) => fromJsonAt(entry, context, depth + 1), context)
  }
  const object = createObject(context)
  if (object === undefined) {
    return undefined
  }
  for (const [key, entry] of Object.entries(value)) {
    const item = fromJsonAt(entry, context, depth + 1)
    if (!addItemToObject(object, key, item)) {
      deleteNode(item)
      deleteNode(object)
      return undefined
    }
  }
  return object
}

/**
 * Build a tree from a plain Json value.
 *
 * @returns Root node, or undefined on allocation failure or nesting deeper than context.maxDepth.
 *
 * @pure false
 * @effect allocator hooks
 * @complexity O(n)
 */
export const fromJson = (value: Json, context: JsonContext = currentContext()): JsonNode | undefined =>
  fromJsonAt(value, context, 0)
