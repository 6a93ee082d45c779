import { DEFAULT_MAX_DEPTH } from "./allocator.js"
import type { CliArgs } from "./cli.js"
import { DEFAULT_PREBUFFER } from "./print-buffer.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Precedence CLI > file > defaults"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: maxDepth ≥ 1 ∧ prebuffer ≥ 1
// COMPLEXITY: O(1)

export interface FileConfig {
  readonly maxDepth?: number
  readonly prebuffer?: number
  readonly caseSensitive?: boolean
  readonly requireEnd?: boolean
}

export interface ResolvedConfig {
  readonly maxDepth: number
  readonly prebuffer: number
  readonly caseSensitive: boolean
  readonly requireEnd: boolean
}

export const defaultConfig: ResolvedConfig = {
  maxDepth: DEFAULT_MAX_DEPTH,
  prebuffer: DEFAULT_PREBUFFER,
  caseSensitive: false,
  requireEnd: false
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .jsonode.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? defaultConfig.maxDepth,
  prebuffer: cli.prebuffer ?? fileConfig?.prebuffer ?? defaultConfig.prebuffer,
  caseSensitive: cli.caseSensitive ?? fileConfig?.caseSensitive ?? defaultConfig.caseSensitive,
  requireEnd: cli.requireEnd ?? fileConfig?.requireEnd ?? defaultConfig.requireEnd
})
