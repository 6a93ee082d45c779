// CHANGE: keep a plain JSON value type for conversions to and from node trees
// WHY: callers often hold ordinary JS values and want a linked tree, or the reverse
// QUOTE(TZ): "build a request document from structured fields"
// REF: req-json-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: toJson(fromJson(x)) ≅ x for finite numbers
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | JsonArray
  | JsonObject

export type JsonArray = ReadonlyArray<Json>

export type JsonObject = { readonly [key: string]: Json }
