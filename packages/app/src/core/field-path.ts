import * as Either from "effect/Either"

import { getArrayItem, getObjectItem, getObjectItemCaseSensitive } from "./access.js"
import type { JsonNode } from "./node.js"

// CHANGE: address nested values with dotted paths
// WHY: callers read fields such as message.content from parsed responses
// QUOTE(TZ): "parse responses and read fields by key"
// REF: req-field-path-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p ≠ "": parse(p) = Right(s) → s.join(".") = p
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no segment is empty
// COMPLEXITY: O(|path|)

export type FieldPath = ReadonlyArray<string>

export type FieldPathError = { readonly _tag: "FieldPathError"; readonly message: string }

const INDEX_PATTERN = /^\d+$/

/**
 * Split a dotted path into segments. The empty string names the root.
 *
 * @pure true
 * @invariant Right(s) → ∀x ∈ s: x.length > 0
 */
export const parseFieldPath = (path: string): Either.Either<FieldPath, FieldPathError> => {
  if (path.length === 0) {
    return Either.right([])
  }
  const segments = path.split(".")
  return segments.some((segment) => segment.length === 0)
    ? Either.left({ _tag: "FieldPathError", message: `Empty segment in field path: ${path}` })
    : Either.right(segments)
}

const step = (node: JsonNode, segment: string, caseSensitive: boolean): JsonNode | undefined => {
  if (node.kind === "Object") {
    return caseSensitive ? getObjectItemCaseSensitive(node, segment) : getObjectItem(node, segment)
  }
  if (node.kind === "Array" && INDEX_PATTERN.test(segment)) {
    return getArrayItem(node, Number(segment))
  }
  return undefined
}

/**
 * Walk objects by key and arrays by decimal index.
 *
 * @returns The addressed node (borrowed from the tree) or undefined.
 *
 * @pure true
 * @complexity O(Σ children visited)
 */
export const resolveFieldPath = (
  node: JsonNode | undefined,
  path: FieldPath,
  caseSensitive = false
): JsonNode | undefined => {
  let current = node
  for (const segment of path) {
    if (current === undefined) {
      return undefined
    }
    current = step(current, segment, caseSensitive)
  }
  return current
}

export const formatFieldPath = (path: FieldPath): string => path.join(".")
