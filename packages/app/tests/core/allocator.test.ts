import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { afterEach } from "vitest"

import {
  configureAllocators,
  currentContext,
  DEFAULT_MAX_DEPTH,
  defaultAllocator,
  makeContext
} from "../../src/core/allocator.js"
import { addItemToArray, createArray, createNumber, createString, createStringReference } from "../../src/core/build.js"
import { deleteNode, NODE_CELL_SIZE } from "../../src/core/node.js"
import { createCountingAllocator, defined } from "./fixtures.js"

describe("configureAllocators", () => {
  afterEach(() => {
    configureAllocators(undefined)
  })

  it.effect("routes builder allocations through the configured hooks", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      configureAllocators(counting.hooks)
      const node = createString("hello")
      expect(node).toBeDefined()
      expect(counting.allocations).toBe(2)
      expect(counting.live.size).toBe(2)
      deleteNode(node)
      expect(counting.live.size).toBe(0)
      expect(counting.strayReleases).toBe(0)
    }))

  it.effect("resets to the default pair when configuration is absent", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      configureAllocators(counting.hooks)
      configureAllocators(undefined)
      expect(currentContext().allocator).toBe(defaultAllocator)
      createNumber(1)
      expect(counting.allocations).toBe(0)
    }))

  it.effect("fills a missing member with the default", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      configureAllocators({ allocate: counting.hooks.allocate })
      const context = currentContext()
      expect(context.allocator.allocate).toBe(counting.hooks.allocate)
      expect(context.allocator.release).toBe(defaultAllocator.release)
    }))

  it.effect("keeps the node cell size for node records", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const node = defined(createNumber(2, makeContext({ allocator: counting.hooks })))
      expect(node.cell.length).toBe(NODE_CELL_SIZE)
      deleteNode(node)
    }))
})

describe("makeContext", () => {
  it.effect("defaults and clamps the maximum depth", () =>
    Effect.sync(() => {
      expect(makeContext().maxDepth).toBe(DEFAULT_MAX_DEPTH)
      expect(makeContext({ maxDepth: 0 }).maxDepth).toBe(1)
      expect(makeContext({ maxDepth: 7 }).maxDepth).toBe(7)
    }))
})

describe("deleteNode", () => {
  it.effect("releases every block of a nested tree", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const context = makeContext({ allocator: counting.hooks })
      const root = defined(createArray(context))
      const inner = defined(createArray(context))
      expect(addItemToArray(inner, createString("a", context))).toBe(true)
      expect(addItemToArray(root, inner)).toBe(true)
      expect(addItemToArray(root, createNumber(1, context))).toBe(true)
      expect(counting.live.size).toBe(5)
      deleteNode(root)
      expect(counting.live.size).toBe(0)
      expect(counting.strayReleases).toBe(0)
    }))

  it.effect("never releases borrowed text", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const context = makeContext({ allocator: counting.hooks })
      const shared = defined(counting.hooks.allocate(3))
      const node = createStringReference(shared, context)
      deleteNode(node)
      expect(counting.live.has(shared)).toBe(true)
      expect(counting.live.size).toBe(1)
    }))

  it.effect("accepts an absent node", () =>
    Effect.sync(() => {
      expect(() => deleteNode(undefined)).not.toThrow()
    }))
})
