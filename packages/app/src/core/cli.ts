import { Match } from "effect"
import * as Either from "effect/Either"

import type { FieldPath } from "./field-path.js"
import { parseFieldPath } from "./field-path.js"

// CHANGE: decode jsonode argv into typed arguments
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "commands: print (default), validate, get"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; get always carries a path
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "print" | "validate" | "get"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly path: FieldPath | undefined
  readonly configPath: string
  readonly configExplicit: boolean
  readonly maxDepth: number | undefined
  readonly prebuffer: number | undefined
  readonly requireEnd: boolean | undefined
  readonly caseSensitive: boolean | undefined
  readonly raw: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const DEFAULT_CONFIG_PATH = "./.jsonode.json"

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const POSITIVE_INTEGER = /^[1-9]\d*$/

const parsePositiveInteger = (flagName: string, value: string): Either.Either<number, CliError> =>
  POSITIVE_INTEGER.test(value) && Number.isSafeInteger(Number(value))
    ? Either.right(Number(value))
    : Either.left(cliError(`Invalid value for --${flagName}: ${value}`))

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("print", () => Either.right<CliCommand>("print")),
    Match.when("validate", () => Either.right<CliCommand>("validate")),
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: "",
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
})

type Parsed = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): Parsed => Either.right({ next, consumed })

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Parsed =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const asString = (value: string): Either.Either<string, CliError> => Either.right(value)

const asFieldPath = (value: string): Either.Either<FieldPath, CliError> =>
  Either.mapLeft(parseFieldPath(value), (error) => cliError(error.message))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Parsed => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Parsed

const flagParsers: Record<string, FlagParser> = {
  raw: (current) => setParsedFlag({ ...current, raw: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      input: value
    })),
  path: (current, inlineValue, nextValue) =>
    parseValueFlag("path", current, inlineValue, nextValue, asFieldPath, (args, value) => ({
      ...args,
      path: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      configPath: value,
      configExplicit: true
    })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag(
      "max-depth",
      current,
      inlineValue,
      nextValue,
      (value) => parsePositiveInteger("max-depth", value),
      (args, value) => ({ ...args, maxDepth: value })
    ),
  prebuffer: (current, inlineValue, nextValue) =>
    parseValueFlag(
      "prebuffer",
      current,
      inlineValue,
      nextValue,
      (value) => parsePositiveInteger("prebuffer", value),
      (args, value) => ({ ...args, prebuffer: value })
    ),
  "require-end": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      requireEnd: value
    })),
  "case-sensitive": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      caseSensitive: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Parsed => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator < 0 ? body : body.slice(0, separator)
  const inlineValue = separator < 0 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "print", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const checkRequired = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.input.length === 0) {
    return Either.left(cliError("Missing required flag: --input"))
  }
  if (args.command === "get" && args.path === undefined) {
    return Either.left(cliError("Command get requires --path"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to print when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return parseCommandFromArgs(rawArgs).pipe(
    Either.flatMap((parsed) => parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command))),
    Either.flatMap(checkRequired)
  )
}
