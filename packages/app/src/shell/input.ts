import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read the input document as raw bytes
// WHY: the parser consumes a byte buffer with an explicit length
// QUOTE(TZ): "reads a JSON document from disk"
// REF: req-input-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(b) → b = bytes(file(p))
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, AppError, FileSystem>
// INVARIANT: missing files fail with FileError
// COMPLEXITY: O(n)

export const readInput = (path: string): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      return yield* _(Effect.fail(fileError(`Input file not found: ${path}`)))
    }
    const bytes = yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`read ${bytes.length} bytes from ${path}`))
    return bytes
  })
