import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { makeContext } from "../../src/core/allocator.js"
import {
  addItemToArray,
  createArray,
  createNull,
  createNumber,
  createObject,
  createRaw,
  createString,
  fromJson
} from "../../src/core/build.js"
import { compareDeep } from "../../src/core/copy.js"
import { deleteNode } from "../../src/core/node.js"
import { parseText } from "../../src/core/parse.js"
import {
  formatNumber,
  print,
  printBuffered,
  printedBytes,
  printedText,
  printToString,
  printUnformatted,
  releasePrinted
} from "../../src/core/print.js"
import { createCountingAllocator, defined, leftOf, rightOf } from "./fixtures.js"

describe("formatNumber", () => {
  it.effect("prints integers from the cache and other values in shortest form", () =>
    Effect.sync(() => {
      expect(formatNumber(3, 3)).toBe("3")
      expect(formatNumber(-7, -7)).toBe("-7")
      expect(formatNumber(3.5, 3)).toBe("3.5")
      expect(formatNumber(0.1, 0)).toBe("0.1")
      expect(formatNumber(1e21, 2_147_483_647)).toBe("1e+21")
      expect(formatNumber(Number.NaN, 0)).toBe("null")
      expect(formatNumber(Number.POSITIVE_INFINITY, 2_147_483_647)).toBe("null")
    }))

  it.effect("prints built numbers the same way", () =>
    Effect.sync(() => {
      expect(rightOf(printToString(defined(createNumber(3.0))))).toBe("3")
      expect(rightOf(printToString(defined(createNumber(Number.NaN))))).toBe("null")
    }))
})

describe("string printing", () => {
  it.effect("escapes quotes, backslashes and control bytes", () =>
    Effect.sync(() => {
      const node = defined(createString("a\u0001b\"\\\n\t\u001f"))
      expect(rightOf(printToString(node))).toBe(String.raw`"a\u0001b\"\\\n\t\u001f"`)
    }))

  it.effect("prints raw text as a quoted string", () =>
    Effect.sync(() => {
      expect(rightOf(printToString(defined(createRaw("{x}"))))).toBe("\"{x}\"")
    }))

  it.effect("prints a member without a key as an empty key", () =>
    Effect.sync(() => {
      const object = defined(createObject())
      expect(addItemToArray(object, createNull())).toBe(true)
      expect(rightOf(printToString(object))).toBe("{\"\":null}")
    }))

  it.effect("keeps UTF-8 bytes as they are", () =>
    Effect.sync(() => {
      expect(rightOf(printToString(defined(createString("héllo"))))).toBe("\"héllo\"")
    }))
})

describe("print entry points", () => {
  it.effect("produce identical compact output", () =>
    Effect.sync(() => {
      const root = rightOf(parseText("{ \"a\" : [ 1, { \"b\" : null } ] }"))
      const compact = rightOf(printUnformatted(root))
      const formatted = rightOf(print(root))
      expect(printedText(compact)).toBe("{\"a\":[1,{\"b\":null}]}")
      expect(printedText(formatted)).toBe(printedText(compact))
      expect(printedBytes(compact).length).toBe(compact.length)
      releasePrinted(compact)
      releasePrinted(formatted)
    }))

  it.effect("grows a small buffer and hands back every block", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const context = makeContext({ allocator: counting.hooks })
      const node = defined(createString("x".repeat(1000), context))
      const before = counting.live.size
      const printed = rightOf(printBuffered(node, 1, context))
      expect(printed.length).toBe(1002)
      expect(printedText(printed)).toBe(`"${"x".repeat(1000)}"`)
      expect(counting.live.size).toBe(before + 1)
      releasePrinted(printed)
      expect(counting.live.size).toBe(before)
      expect(counting.strayReleases).toBe(0)
    }))
})

describe("round trip", () => {
  it.effect("reparses printed output into an equal tree and prints it identically", () =>
    Effect.sync(() => {
      const tree = defined(
        fromJson({ s: "tab\there", n: [0, -1.25, 1e-7], o: { e: [], f: {} }, b: [true, false, null] })
      )
      const first = rightOf(printToString(tree))
      const reparsed = rightOf(parseText(first))
      expect(compareDeep(tree, reparsed)).toBe(true)
      expect(rightOf(printToString(reparsed))).toBe(first)
      expect(first).toBe(
        "{\"s\":\"tab\\there\",\"n\":[0,-1.25,1e-7],\"o\":{\"e\":[],\"f\":{}},\"b\":[true,false,null]}"
      )
    }))
})

describe("print failures", () => {
  it.effect("rejects a node of kind Invalid and releases the buffer", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const context = makeContext({ allocator: counting.hooks })
      const array = defined(createArray(context))
      const bad = defined(createNull(context))
      bad.kind = "Invalid"
      expect(addItemToArray(array, bad)).toBe(true)
      const before = counting.live.size
      expect(leftOf(printBuffered(array, 16, context))).toEqual({
        _tag: "InvalidValue",
        offset: 1,
        message: "Invalid value"
      })
      expect(counting.live.size).toBe(before)
      deleteNode(array)
    }))

  it.effect("reports a buffer that cannot grow", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const context = makeContext({ allocator: counting.hooks })
      const node = defined(createString("long enough", context))
      counting.budget = 1
      expect(leftOf(printBuffered(node, 1, context))).toEqual({
        _tag: "AllocationFailure",
        offset: 0,
        message: "Memory error"
      })
      expect(counting.live.size).toBe(2)
      expect(counting.strayReleases).toBe(0)
    }))

  it.effect("reports an unavailable first block", () =>
    Effect.sync(() => {
      const counting = createCountingAllocator()
      const context = makeContext({ allocator: counting.hooks })
      const node = defined(createNull(context))
      counting.budget = 0
      expect(leftOf(printBuffered(node, 8, context))._tag).toBe("AllocationFailure")
    }))

  it.effect("bounds container nesting", () =>
    Effect.sync(() => {
      const node = defined(fromJson([[[1]]]))
      expect(leftOf(printBuffered(node, 16, makeContext({ maxDepth: 2 })))).toEqual({
        _tag: "DepthExceeded",
        offset: 2,
        message: "Nesting deeper than 2"
      })
      expect(rightOf(printToString(node, makeContext({ maxDepth: 3 })))).toBe("[[[1]]]")
    }))
})
