import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { CliArgs } from "../../src/core/cli.js"
import { DEFAULT_CONFIG_PATH, parseCliArgs } from "../../src/core/cli.js"
import { defaultConfig, resolveConfig } from "../../src/core/config.js"
import { leftOf, rightOf } from "./fixtures.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "jsonode", ...args]

describe("parseCliArgs", () => {
  it.effect("defaults to print with default settings", () =>
    Effect.sync(() => {
      const expected: CliArgs = {
        command: "print",
        input: "doc.json",
        path: undefined,
        configPath: DEFAULT_CONFIG_PATH,
        configExplicit: false,
        maxDepth: undefined,
        prebuffer: undefined,
        requireEnd: undefined,
        caseSensitive: undefined,
        raw: false,
        silent: false,
        verbose: false
      }
      expect(rightOf(parseCliArgs(argv("--input", "doc.json")))).toEqual(expected)
    }))

  it.effect("reads get with a path and switches", () =>
    Effect.sync(() => {
      const args = rightOf(
        parseCliArgs(
          argv(
            "get",
            "--input=doc.json",
            "--path",
            "a.0",
            "--raw",
            "--config",
            "custom.json",
            "--max-depth",
            "8",
            "--prebuffer=64",
            "--require-end",
            "--case-sensitive",
            "false",
            "--silent",
            "--verbose"
          )
        )
      )
      expect(args.command).toBe("get")
      expect(args.input).toBe("doc.json")
      expect(args.path).toEqual(["a", "0"])
      expect(args.raw).toBe(true)
      expect(args.configPath).toBe("custom.json")
      expect(args.configExplicit).toBe(true)
      expect(args.maxDepth).toBe(8)
      expect(args.prebuffer).toBe(64)
      expect(args.requireEnd).toBe(true)
      expect(args.caseSensitive).toBe(false)
      expect(args.silent).toBe(true)
      expect(args.verbose).toBe(true)
    }))

  it.effect("rejects invalid input", () =>
    Effect.sync(() => {
      expect(leftOf(parseCliArgs(argv()))).toEqual({ _tag: "CliError", message: "Missing required flag: --input" })
      expect(leftOf(parseCliArgs(argv("get", "--input", "d.json"))).message).toBe("Command get requires --path")
      expect(leftOf(parseCliArgs(argv("format", "--input", "d.json"))).message).toBe("Unknown command: format")
      expect(leftOf(parseCliArgs(argv("--input", "d.json", "--pretty"))).message).toBe("Unknown flag: --pretty")
      expect(leftOf(parseCliArgs(argv("--input", "d.json", "-v"))).message).toBe("Unknown flag: -v")
      expect(leftOf(parseCliArgs(argv("--input"))).message).toBe("Missing value for --input")
      expect(leftOf(parseCliArgs(argv("--input", "d.json", "--max-depth", "0"))).message).toBe(
        "Invalid value for --max-depth: 0"
      )
      expect(leftOf(parseCliArgs(argv("--input", "d.json", "--require-end", "maybe"))).message).toBe(
        "Invalid boolean value: maybe"
      )
      expect(leftOf(parseCliArgs(argv("get", "--input", "d.json", "--path", "a..b"))).message).toBe(
        "Empty segment in field path: a..b"
      )
      expect(leftOf(parseCliArgs(argv("print", "d.json"))).message).toBe("Unexpected positional argument: d.json")
    }))
})

describe("resolveConfig", () => {
  it.effect("prefers flags over the file and the file over defaults", () =>
    Effect.sync(() => {
      const cli = rightOf(parseCliArgs(argv("--input", "d.json", "--max-depth", "4")))
      expect(resolveConfig(cli, undefined)).toEqual({ ...defaultConfig, maxDepth: 4 })
      expect(resolveConfig(cli, { maxDepth: 9, prebuffer: 32, requireEnd: true })).toEqual({
        maxDepth: 4,
        prebuffer: 32,
        caseSensitive: false,
        requireEnd: true
      })
    }))

  it.effect("uses the engine defaults", () =>
    Effect.sync(() => {
      expect(defaultConfig).toEqual({ maxDepth: 512, prebuffer: 256, caseSensitive: false, requireEnd: false })
    }))
})
