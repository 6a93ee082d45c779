// CHANGE: expose the engine as a library surface
// WHY: collaborators build, print and parse documents without the CLI
// QUOTE(TZ): "src/index.ts re-exports the engine surface"
// REF: req-index-1
// SOURCE: n/a
// FORMAT THEOREM: every exported name resolves to a core module
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no shell module is re-exported
// COMPLEXITY: O(1)

export {
  type AllocatorHooks,
  type Block,
  configureAllocators,
  currentContext,
  DEFAULT_MAX_DEPTH,
  defaultAllocator,
  type JsonContext,
  makeContext
} from "./core/allocator.js"
export * from "./core/access.js"
export * from "./core/build.js"
export * from "./core/copy.js"
export * from "./core/errors.js"
export * from "./core/field-path.js"
export type { Json, JsonArray, JsonObject } from "./core/json.js"
export * from "./core/mutate.js"
export {
  decodeText,
  deleteNode,
  encodeText,
  type JsonKind,
  type JsonNode,
  type TextInput
} from "./core/node.js"
export {
  type ParsedDocument,
  parse,
  type ParseOptions,
  parseText,
  parseWithOptions
} from "./core/parse.js"
export { DEFAULT_PREBUFFER } from "./core/print-buffer.js"
export * from "./core/print.js"
