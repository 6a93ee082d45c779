// CHANGE: route every engine allocation through a replaceable hook pair
// WHY: nodes, owned text and print buffers must share one allocation channel
// QUOTE(TZ): "A single configuration call replaces both (passing an absent configuration resets to defaults)."
// REF: req-alloc-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: allocate(n) = b → b.length = n ∧ release(b) returns b to the hooks that produced it
// PURITY: CORE
// EFFECT: process-wide hook slot (configureAllocators)
// INVARIANT: currentContext() always carries both hooks
// COMPLEXITY: O(1)/O(1)

export type Block = Uint8Array

export interface AllocatorHooks {
  readonly allocate: (size: number) => Block | undefined
  readonly release: (block: Block) => void
}

export interface JsonContext {
  readonly allocator: AllocatorHooks
  readonly maxDepth: number
}

/** Maximum container nesting accepted by the parser, printer and duplicate. */
export const DEFAULT_MAX_DEPTH = 512

export const defaultAllocator: AllocatorHooks = {
  allocate: (size) => new Uint8Array(size),
  release: () => {}
}

let globalHooks: AllocatorHooks = defaultAllocator

/**
 * Replace the process-wide allocator pair.
 *
 * Configure once, before any tree is built: nodes remember the hooks that
 * produced them, so trees built earlier keep releasing into the old pair.
 *
 * @param hooks - New pair; absent (or any absent member) falls back to the default.
 *
 * @pure false
 * @effect mutates the process-wide hook slot
 */
export const configureAllocators = (hooks: Partial<AllocatorHooks> | undefined): void => {
  globalHooks = hooks === undefined
    ? defaultAllocator
    : {
      allocate: hooks.allocate ?? defaultAllocator.allocate,
      release: hooks.release ?? defaultAllocator.release
    }
}

export const currentContext = (): JsonContext => ({
  allocator: globalHooks,
  maxDepth: DEFAULT_MAX_DEPTH
})

/**
 * Build an explicit context, independent of the process-wide slot.
 *
 * @pure true
 * @invariant maxDepth ≥ 1
 */
export const makeContext = (overrides: Partial<JsonContext> = {}): JsonContext => ({
  allocator: overrides.allocator ?? globalHooks,
  maxDepth: Math.max(1, overrides.maxDepth ?? DEFAULT_MAX_DEPTH)
})
