import * as Either from "effect/Either"

import type { AllocatorHooks, Block } from "../../src/core/allocator.js"
import type { JsonNode } from "../../src/core/node.js"

export interface CountingAllocator {
  readonly hooks: AllocatorHooks
  /** Blocks handed out and not yet released. */
  readonly live: Set<Block>
  /** Successful allocations so far. */
  allocations: number
  /** Releases of blocks this allocator never handed out (or already took back). */
  strayReleases: number
  /** Allocations still allowed before every further request fails; undefined = unlimited. */
  budget: number | undefined
}

export const createCountingAllocator = (budget?: number): CountingAllocator => {
  const state: CountingAllocator = {
    hooks: {
      allocate: (size) => {
        if (state.budget !== undefined) {
          if (state.budget <= 0) {
            return undefined
          }
          state.budget--
        }
        const block = new Uint8Array(size)
        state.live.add(block)
        state.allocations++
        return block
      },
      release: (block) => {
        if (!state.live.delete(block)) {
          state.strayReleases++
        }
      }
    },
    live: new Set<Block>(),
    allocations: 0,
    strayReleases: 0,
    budget
  }
  return state
}

export const rightOf = <A, E>(either: Either.Either<A, E>): A => {
  if (Either.isLeft(either)) {
    throw new Error(`expected Right, got ${JSON.stringify(either.left)}`)
  }
  return either.right
}

export const leftOf = <A, E>(either: Either.Either<A, E>): E => {
  if (Either.isRight(either)) {
    throw new Error("expected Left, got Right")
  }
  return either.left
}

export const defined = <A>(value: A | undefined): A => {
  if (value === undefined) {
    throw new Error("expected a value")
  }
  return value
}

/** Walk a child chain and check that every prev link mirrors its next link. */
export const linksAreSymmetric = (container: JsonNode): boolean => {
  let previous: JsonNode | undefined
  let current = container.child
  while (current !== undefined) {
    if (current.prev !== previous) {
      return false
    }
    previous = current
    current = current.next
  }
  return true
}
