import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the engine and the CLI tool
// WHY: provide typed failures for parse/print flow and exit codes
// QUOTE(TZ): "AllocationFailure, MalformedLiteral, UnterminatedString, ExpectedToken, InvalidValue, EndOfInput"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ParseError ∪ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

interface Located<Tag extends string> {
  readonly _tag: Tag
  readonly offset: number
  readonly message: string
}

export type AllocationFailure = Located<"AllocationFailure">
export type MalformedLiteral = Located<"MalformedLiteral">
export type UnterminatedString = Located<"UnterminatedString">
export type ExpectedToken = Located<"ExpectedToken">
export type InvalidValue = Located<"InvalidValue">
export type EndOfInput = Located<"EndOfInput">
export type DepthExceeded = Located<"DepthExceeded">

export type ParseError =
  | AllocationFailure
  | MalformedLiteral
  | UnterminatedString
  | ExpectedToken
  | InvalidValue
  | EndOfInput
  | DepthExceeded

export type PrintError = AllocationFailure | InvalidValue | DepthExceeded

export const allocationFailure = (offset: number): AllocationFailure => ({
  _tag: "AllocationFailure",
  offset,
  message: "Memory error"
})

export const malformedLiteral = (offset: number): MalformedLiteral => ({
  _tag: "MalformedLiteral",
  offset,
  message: "Invalid number"
})

export const unterminatedString = (offset: number): UnterminatedString => ({
  _tag: "UnterminatedString",
  offset,
  message: "Unterminated string"
})

export const expectedToken = (offset: number, token: string): ExpectedToken => ({
  _tag: "ExpectedToken",
  offset,
  message: `Expected '${token}'`
})

export const trailingContent = (offset: number): ExpectedToken => ({
  _tag: "ExpectedToken",
  offset,
  message: "Expected end of input"
})

export const invalidValue = (offset: number): InvalidValue => ({
  _tag: "InvalidValue",
  offset,
  message: "Invalid value"
})

export const endOfInput = (offset: number): EndOfInput => ({
  _tag: "EndOfInput",
  offset,
  message: "Unexpected end"
})

export const depthExceeded = (offset: number, maxDepth: number): DepthExceeded => ({
  _tag: "DepthExceeded",
  offset,
  message: `Nesting deeper than ${maxDepth}`
})

/**
 * Render a parse or print diagnostic as a single line.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatParseError = (error: ParseError): string => `${error.message} at offset ${error.offset}`

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFailed = { readonly _tag: "ParseFailed"; readonly file: string; readonly error: string }
export type PrintFailed = { readonly _tag: "PrintFailed"; readonly error: string }
export type PathNotFound = { readonly _tag: "PathNotFound"; readonly path: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseFailed
  | PrintFailed
  | PathNotFound

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFailed = (file: string, error: ParseError): ParseFailed => ({
  _tag: "ParseFailed",
  file,
  error: formatParseError(error)
})

export const printFailed = (error: PrintError): PrintFailed => ({
  _tag: "PrintFailed",
  error: formatParseError(error)
})

export const pathNotFound = (path: string): PathNotFound => ({
  _tag: "PathNotFound",
  path
})

/**
 * One-line human rendering of an application error.
 *
 * @pure true
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (e) => e.message),
    Match.tag("ConfigError", (e) => `Invalid config: ${e.message}`),
    Match.tag("FileError", (e) => e.message),
    Match.tag("ParseFailed", (e) => `${e.file}: ${e.error}`),
    Match.tag("PrintFailed", (e) => `Print failed: ${e.error}`),
    Match.tag("PathNotFound", (e) => `Path not found: ${e.path}`),
    Match.exhaustive
  )
