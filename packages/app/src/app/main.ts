#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderAppError } from "../core/errors.js"
import { exitCodeForError, runCli } from "./program.js"

// CHANGE: wire the jsonode program into the Node runtime
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "exit codes: 0 success; 1 runtime error; 2 get path not found"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult or exitCodeForError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: non-zero exit codes terminate the process
// COMPLEXITY: O(1)

const setExitCode = (code: number): Effect.Effect<void> =>
  Effect.sync(() => {
    process.exitCode = code
  })

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) => result.exitCode === 0 ? Effect.void : setExitCode(result.exitCode)),
  Effect.catchAll((error) =>
    Effect.zipRight(
      Effect.sync(() => {
        process.stderr.write(`${renderAppError(error)}\n`)
      }),
      setExitCode(exitCodeForError(error))
    )
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
