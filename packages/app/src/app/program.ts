import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import { makeContext, type JsonContext } from "../core/allocator.js"
import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { resolveConfig, type ResolvedConfig } from "../core/config.js"
import { type AppError, parseFailed, pathNotFound, printFailed, renderAppError } from "../core/errors.js"
import type { FieldPath } from "../core/field-path.js"
import { formatFieldPath, resolveFieldPath } from "../core/field-path.js"
import type { JsonNode } from "../core/node.js"
import { decodeText, deleteNode } from "../core/node.js"
import { parseWithOptions } from "../core/parse.js"
import { printBuffered, printedText, releasePrinted } from "../core/print.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readInput } from "../shell/input.js"

// CHANGE: orchestrate jsonode commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "print writes compact JSON; validate writes valid or the formatted diagnostic"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0,1}; PathNotFound maps to 2 in main
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: every parsed tree is deleted before the command returns
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

interface Document {
  readonly file: string
  readonly bytes: Uint8Array
  readonly config: ResolvedConfig
  readonly context: JsonContext
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const parseDocument = (document: Document): Either.Either<JsonNode, AppError> =>
  Either.match(
    parseWithOptions(document.bytes, { requireEnd: document.config.requireEnd }, document.context),
    {
      onLeft: (error) => Either.left(parseFailed(document.file, error)),
      onRight: (parsed) => Either.right(parsed.node)
    }
  )

const renderNode = (node: JsonNode, document: Document): Either.Either<string, AppError> =>
  Either.match(printBuffered(node, document.config.prebuffer, document.context), {
    onLeft: (error) => Either.left(printFailed(error)),
    onRight: (printed) => {
      const text = printedText(printed)
      releasePrinted(printed)
      return Either.right(text)
    }
  })

/**
 * Parse the document, run use on the root and delete the tree afterwards.
 *
 * @pure false
 * @effect allocator hooks (balanced)
 */
const withDocument = <A>(
  document: Document,
  use: (root: JsonNode) => Either.Either<A, AppError>
): Either.Either<A, AppError> =>
  Either.flatMap(parseDocument(document), (root) => {
    const result = use(root)
    deleteNode(root)
    return result
  })

const selectField = (
  root: JsonNode,
  path: FieldPath,
  raw: boolean,
  document: Document
): Either.Either<string, AppError> => {
  const found = resolveFieldPath(root, path, document.config.caseSensitive)
  if (found === undefined) {
    return Either.left(pathNotFound(formatFieldPath(path)))
  }
  if (raw && (found.kind === "String" || found.kind === "Raw")) {
    return Either.right(decodeText(found.valueString ?? new Uint8Array(0)))
  }
  return renderNode(found, document)
}

const runPrint = (document: Document): Either.Either<ProgramResult, AppError> =>
  Either.map(withDocument(document, (root) => renderNode(root, document)), (output) => ({ output, exitCode: 0 }))

const runValidate = (document: Document): ProgramResult =>
  Either.match(withDocument(document, () => Either.right(undefined)), {
    onLeft: (error) => ({ output: renderAppError(error), exitCode: 1 }),
    onRight: () => ({ output: "valid", exitCode: 0 })
  })

const runGet = (document: Document, cli: CliArgs): Either.Either<ProgramResult, AppError> =>
  Either.map(
    withDocument(document, (root) => selectField(root, cli.path ?? [], cli.raw, document)),
    (output) => ({ output, exitCode: 0 })
  )

const executeCommand = (cli: CliArgs, document: Document): Either.Either<ProgramResult, AppError> =>
  Match.value(cli.command).pipe(
    Match.when("print", () => runPrint(document)),
    Match.when("validate", () => Either.right(runValidate(document))),
    Match.when("get", () => runGet(document, cli)),
    Match.exhaustive
  )

const runParsed = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configExplicit))
    const config = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug(`config: ${JSON.stringify(config)}`))
    const bytes = yield* _(readInput(cli.input))
    const document: Document = {
      file: cli.input,
      bytes,
      config,
      context: makeContext({ maxDepth: config.maxDepth })
    }
    const result = yield* _(fromEither(executeCommand(cli, document)))
    yield* _(Effect.logDebug(`${cli.command} finished with exit code ${result.exitCode}`))
    if (!cli.silent) {
      yield* _(writeStdout(result.output))
    }
    return result
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the command output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      runParsed(cli).pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })

/** Exit code for a failed run: 2 when get found nothing, 1 otherwise. */
export const exitCodeForError = (error: AppError): number => error._tag === "PathNotFound" ? 2 : 1
