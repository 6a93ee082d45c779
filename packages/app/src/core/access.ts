import { Match } from "effect"

import { currentContext, type JsonContext } from "./allocator.js"
import type { Json } from "./json.js"
import type { JsonNode, TextInput } from "./node.js"
import { bytesEqual, bytesEqualIgnoreCase, decodeText, encodeText } from "./node.js"

// CHANGE: expose read-only accessors over value trees
// WHY: collaborators extract a handful of named fields from parsed documents
// QUOTE(TZ): "linear scan over children returning the first key match"
// REF: req-access-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o,k: getObjectItem(o,k) = c → c is the first child of o whose key folds to k
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: accessors never mutate the tree
// COMPLEXITY: O(n) per lookup where n = child count

export const isInvalid = (node: JsonNode | undefined): boolean => node === undefined || node.kind === "Invalid"
export const isNull = (node: JsonNode | undefined): boolean => node?.kind === "Null"
export const isFalse = (node: JsonNode | undefined): boolean => node?.kind === "False"
export const isTrue = (node: JsonNode | undefined): boolean => node?.kind === "True"
export const isBool = (node: JsonNode | undefined): boolean => isTrue(node) || isFalse(node)
export const isNumber = (node: JsonNode | undefined): boolean => node?.kind === "Number"
export const isString = (node: JsonNode | undefined): boolean => node?.kind === "String"
export const isArray = (node: JsonNode | undefined): boolean => node?.kind === "Array"
export const isObject = (node: JsonNode | undefined): boolean => node?.kind === "Object"
export const isRaw = (node: JsonNode | undefined): boolean => node?.kind === "Raw"

export const getArraySize = (node: JsonNode | undefined): number => {
  let size = 0
  let current = node?.child
  while (current !== undefined) {
    size++
    current = current.next
  }
  return size
}

/**
 * Child at a zero-based position.
 *
 * @returns undefined for a negative or out-of-range index.
 *
 * @pure true
 * @complexity O(index)
 */
export const getArrayItem = (node: JsonNode | undefined, index: number): JsonNode | undefined => {
  if (node === undefined || index < 0 || !Number.isInteger(index)) {
    return undefined
  }
  let current = node.child
  let remaining = index
  while (current !== undefined && remaining > 0) {
    current = current.next
    remaining--
  }
  return current
}

const findMember = (
  node: JsonNode | undefined,
  key: TextInput,
  matches: (left: Uint8Array, right: Uint8Array) => boolean
): JsonNode | undefined => {
  if (node === undefined) {
    return undefined
  }
  const wanted = encodeText(key)
  let current = node.child
  while (current !== undefined) {
    if (current.key !== undefined && matches(current.key, wanted)) {
      return current
    }
    current = current.next
  }
  return undefined
}

/**
 * First member whose key equals key, ignoring ASCII case.
 *
 * @pure true
 * @complexity O(n)
 */
export const getObjectItem = (node: JsonNode | undefined, key: TextInput): JsonNode | undefined =>
  findMember(node, key, bytesEqualIgnoreCase)

export const getObjectItemCaseSensitive = (node: JsonNode | undefined, key: TextInput): JsonNode | undefined =>
  findMember(node, key, bytesEqual)

export const hasObjectItem = (node: JsonNode | undefined, key: TextInput): boolean =>
  getObjectItem(node, key) !== undefined

export const getStringValue = (node: JsonNode | undefined): string | undefined =>
  (isString(node) || isRaw(node)) && node?.valueString !== undefined ? decodeText(node.valueString) : undefined

export const getNumberValue = (node: JsonNode | undefined): number =>
  node !== undefined && node.kind === "Number" ? node.valueNumber : Number.NaN

export const getKey = (node: JsonNode | undefined): string | undefined =>
  node?.key === undefined ? undefined : decodeText(node.key)

export const listChildren = (node: JsonNode | undefined): ReadonlyArray<JsonNode> => {
  const children: Array<JsonNode> = []
  let current = node?.child
  while (current !== undefined) {
    children.push(current)
    current = current.next
  }
  return children
}

const TOO_DEEP: unique symbol = Symbol("TooDeep")

type Converted = Json | undefined | typeof TOO_DEEP

const convertChildren = (
  node: JsonNode,
  maxDepth: number,
  depth: number,
  keep: (child: JsonNode, value: Json) => void
): boolean => {
  for (const child of listChildren(node)) {
    const value = toJsonAt(child, maxDepth, depth + 1)
    if (value === TOO_DEEP) {
      return false
    }
    if (value !== undefined) {
      keep(child, value)
    }
  }
  return true
}

const convertArray = (node: JsonNode, maxDepth: number, depth: number): Converted => {
  if (depth >= maxDepth) {
    return TOO_DEEP
  }
  const items: Array<Json> = []
  return convertChildren(node, maxDepth, depth, (_, value) => items.push(value)) ? items : TOO_DEEP
}

const convertObject = (node: JsonNode, maxDepth: number, depth: number): Converted => {
  if (depth >= maxDepth) {
    return TOO_DEEP
  }
  const members: Array<readonly [string, Json]> = []
  return convertChildren(node, maxDepth, depth, (child, value) => members.push([getKey(child) ?? "", value]))
    ? Object.fromEntries(members)
    : TOO_DEEP
}

const toJsonAt = (node: JsonNode, maxDepth: number, depth: number): Converted =>
  Match.value(node.kind).pipe(
    Match.when("Invalid", (): Converted => undefined),
    Match.when("Null", (): Converted => null),
    Match.when("False", (): Converted => false),
    Match.when("True", (): Converted => true),
    Match.when("Number", (): Converted => node.valueNumber),
    Match.when("String", (): Converted => readText(node)),
    Match.when("Raw", (): Converted => readText(node)),
    Match.when("Array", () => convertArray(node, maxDepth, depth)),
    Match.when("Object", () => convertObject(node, maxDepth, depth)),
    Match.exhaustive
  )

const readText = (node: JsonNode): string => node.valueString === undefined ? "" : decodeText(node.valueString)

/**
 * Convert a tree into a plain Json value.
 *
 * Members with duplicate keys collapse to the last one; members and elements
 * of kind Invalid are skipped.
 *
 * @param context - Supplies the nesting limit.
 * @returns undefined for an absent or Invalid root, or when containers nest deeper than context.maxDepth.
 *
 * @pure true
 * @invariant containers are entered only while depth < context.maxDepth
 * @complexity O(n)
 */
export const toJson = (
  node: JsonNode | undefined,
  context: JsonContext = currentContext()
): Json | undefined => {
  if (node === undefined) {
    return undefined
  }
  const converted = toJsonAt(node, context.maxDepth, 0)
  return converted === TOO_DEEP ? undefined : converted
}
