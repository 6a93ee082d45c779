import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { makeContext } from "../../src/core/allocator.js"
import { getNumberValue } from "../../src/core/access.js"
import { createNumber, createString, createTrue } from "../../src/core/build.js"
import {
  deleteItemFromArray,
  deleteItemFromObject,
  deleteItemFromObjectCaseSensitive,
  detachItemFromArray,
  detachItemFromObject,
  detachItemFromObjectCaseSensitive,
  detachItemViaPointer,
  insertItemInArray,
  replaceItemInArray,
  replaceItemInObject,
  replaceItemInObjectCaseSensitive
} from "../../src/core/mutate.js"
import type { JsonNode } from "../../src/core/node.js"
import { deleteNode } from "../../src/core/node.js"
import { parseText } from "../../src/core/parse.js"
import { printToString } from "../../src/core/print.js"
import { createCountingAllocator, defined, linksAreSymmetric, rightOf } from "./fixtures.js"

const printed = (node: JsonNode): string => rightOf(printToString(node))

describe("array mutation", () => {
  it.effect("detaches, inserts and replaces elements", () =>
    Effect.sync(() => {
      const array = rightOf(parseText("[1,2,3]"))
      const detached = defined(detachItemFromArray(array, 1))
      expect(getNumberValue(detached)).toBe(2)
      expect(detached.next).toBeUndefined()
      expect(detached.prev).toBeUndefined()
      expect(printed(array)).toBe("[1,3]")

      expect(insertItemInArray(array, 0, createNumber(0))).toBe(true)
      expect(printed(array)).toBe("[0,1,3]")
      expect(insertItemInArray(array, 2, detached)).toBe(true)
      expect(printed(array)).toBe("[0,1,2,3]")
      expect(insertItemInArray(array, 99, createNumber(4))).toBe(true)
      expect(printed(array)).toBe("[0,1,2,3,4]")
      expect(insertItemInArray(array, -1, createNumber(5))).toBe(false)

      expect(replaceItemInArray(array, 0, createString("x"))).toBe(true)
      expect(replaceItemInArray(array, 4, createTrue())).toBe(true)
      expect(replaceItemInArray(array, 9, createTrue())).toBe(false)
      expect(printed(array)).toBe("[\"x\",1,2,3,true]")
      expect(linksAreSymmetric(array)).toBe(true)

      deleteItemFromArray(array, 2)
      expect(printed(array)).toBe("[\"x\",1,3,true]")
      expect(linksAreSymmetric(array)).toBe(true)
    }))

  it.effect("refuses to detach a node that is not a child", () =>
    Effect.sync(() => {
      const array = rightOf(parseText("[1]"))
      const stranger = defined(createNumber(1))
      expect(detachItemViaPointer(array, stranger)).toBeUndefined()
      expect(detachItemFromArray(array, 5)).toBeUndefined()
      expect(printed(array)).toBe("[1]")
    }))

  it.effect("releases replaced and deleted elements", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const context = makeContext({ allocator: counting.hooks })
      const array = rightOf(parseText("[\"a\",\"b\",\"c\"]", context))
      expect(counting.live.size).toBe(7)
      expect(replaceItemInArray(array, 0, createNumber(1, context))).toBe(true)
      expect(counting.live.size).toBe(6)
      deleteItemFromArray(array, 1)
      expect(counting.live.size).toBe(4)
      deleteNode(array)
      expect(counting.live.size).toBe(0)
      expect(counting.strayReleases).toBe(0)
    }))
})

describe("object mutation", () => {
  it.effect("detaches and deletes members by key", () =>
    Effect.sync(() => {
      const object = rightOf(parseText("{\"a\":1,\"B\":2,\"c\":3}"))
      expect(detachItemFromObjectCaseSensitive(object, "b")).toBeUndefined()
      const member = defined(detachItemFromObject(object, "b"))
      expect(getNumberValue(member)).toBe(2)
      expect(printed(object)).toBe("{\"a\":1,\"c\":3}")
      deleteItemFromObjectCaseSensitive(object, "C")
      expect(printed(object)).toBe("{\"a\":1,\"c\":3}")
      deleteItemFromObject(object, "C")
      expect(printed(object)).toBe("{\"a\":1}")
      expect(linksAreSymmetric(object)).toBe(true)
    }))

  it.effect("replaces a member and names the replacement with the lookup key", () =>
    Effect.sync(() => {
      const object = rightOf(parseText("{\"a\":1,\"b\":2}"))
      expect(replaceItemInObject(object, "A", createTrue())).toBe(true)
      expect(printed(object)).toBe("{\"A\":true,\"b\":2}")
      expect(replaceItemInObjectCaseSensitive(object, "B", createTrue())).toBe(false)
      expect(replaceItemInObjectCaseSensitive(object, "b", createString("z"))).toBe(true)
      expect(printed(object)).toBe("{\"A\":true,\"b\":\"z\"}")
      expect(replaceItemInObject(object, "missing", createTrue())).toBe(false)
      expect(linksAreSymmetric(object)).toBe(true)
    }))
})
