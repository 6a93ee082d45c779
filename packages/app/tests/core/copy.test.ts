import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { makeContext } from "../../src/core/allocator.js"
import { getObjectItem, getStringValue } from "../../src/core/access.js"
import { addItemToObject, createNumber, createString, createStringReference } from "../../src/core/build.js"
import { compare, compareDeep, duplicate } from "../../src/core/copy.js"
import { replaceItemInObject } from "../../src/core/mutate.js"
import { deleteNode, encodeText } from "../../src/core/node.js"
import { parseText } from "../../src/core/parse.js"
import { printToString } from "../../src/core/print.js"
import { createCountingAllocator, defined, rightOf } from "./fixtures.js"

const SAMPLE = "{\"a\":[1,\"two\",{\"b\":null}],\"c\":true}"

describe("duplicate", () => {
  it.effect("produces an equal tree that shares no block with the source", () =>
    Effect.sync(() => {
      const source = rightOf(parseText(SAMPLE))
      const copy = defined(duplicate(source))
      expect(compareDeep(source, copy)).toBe(true)
      expect(copy).not.toBe(source)
      const sourceText = defined(getObjectItem(source, "a")?.child?.next)
      const copyText = defined(getObjectItem(copy, "a")?.child?.next)
      expect(copyText.valueString).not.toBe(sourceText.valueString)
      expect(replaceItemInObject(copy, "c", createNumber(0))).toBe(true)
      expect(rightOf(printToString(source))).toBe(SAMPLE)
      expect(rightOf(printToString(copy))).toBe("{\"a\":[1,\"two\",{\"b\":null}],\"c\":0}")
    }))

  it.effect("drops the root key and turns borrowed text into owned text", () =>
    Effect.sync(() => {
      const object = rightOf(parseText("{}"))
      const member = defined(createStringReference(encodeText("shared")))
      expect(addItemToObject(object, "k", member)).toBe(true)
      const copy = defined(duplicate(member))
      expect(copy.key).toBeUndefined()
      expect(copy.isReference).toBe(false)
      expect(getStringValue(copy)).toBe("shared")
      expect(copy.valueString).not.toBe(member.valueString)
    }))

  it.effect("releases partial copies at every allocation step", () =>
    Effect.sync(() => {
      const source = rightOf(parseText(SAMPLE))
      const dryRun = createCountingAllocator()
      deleteNode(duplicate(source, makeContext({ allocator: dryRun.hooks })))
      expect(dryRun.live.size).toBe(0)
      for (let budget = 0; budget < dryRun.allocations; budget++) {
        const counting = createCountingAllocator(budget)
        expect(duplicate(source, makeContext({ allocator: counting.hooks }))).toBeUndefined()
        expect(counting.live.size).toBe(0)
      }
    }))

  it.effect("stops at the depth limit", () =>
    Effect.sync(() => {
      const source = rightOf(parseText("[[[1]]]"))
      const counting = createCountingAllocator()
      expect(duplicate(source, makeContext({ allocator: counting.hooks, maxDepth: 2 }))).toBeUndefined()
      expect(counting.live.size).toBe(0)
      expect(duplicate(undefined)).toBeUndefined()
    }))
})

describe("compare", () => {
  it.effect("only looks at the kind", () =>
    Effect.sync(() => {
      expect(compare(rightOf(parseText("[1]")), rightOf(parseText("[2,3]")))).toBe(true)
      expect(compare(defined(createNumber(1)), defined(createString("1")))).toBe(false)
      expect(compare(undefined, defined(createNumber(1)))).toBe(false)
    }))
})

describe("compareDeep", () => {
  it.effect("compares values, order and keys", () =>
    Effect.sync(() => {
      const tree = (text: string) => rightOf(parseText(text))
      expect(compareDeep(tree("[1,\"a\",null]"), tree("[1,\"a\",null]"))).toBe(true)
      expect(compareDeep(tree("[1,2]"), tree("[2,1]"))).toBe(false)
      expect(compareDeep(tree("[1,2]"), tree("[1,2,3]"))).toBe(false)
      expect(compareDeep(tree("{\"a\":\"x\"}"), tree("{\"a\":\"y\"}"))).toBe(false)
      expect(compareDeep(tree("{\"A\":1}"), tree("{\"a\":1}"))).toBe(false)
      expect(compareDeep(tree("{\"A\":1}"), tree("{\"a\":1}"), false)).toBe(true)
      expect(compareDeep(tree("true"), tree("false"))).toBe(false)
      expect(compareDeep(undefined, undefined)).toBe(false)
    }))
})
