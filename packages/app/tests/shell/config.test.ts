import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Option, pipe } from "effect"

import { decodeConfig, loadConfig } from "../../src/shell/config.js"

const withoutEnv = (name: string) =>
  Effect.acquireRelease(
    Effect.sync(() => {
      const previous = process.env[name]
      delete process.env[name]
      return previous
    }),
    (previous) =>
      Effect.sync(() => {
        if (previous === undefined) {
          delete process.env[name]
        } else {
          process.env[name] = previous
        }
      })
  )

const withCwd = (directory: string) =>
  Effect.acquireRelease(
    Effect.sync(() => {
      const previous = process.cwd()
      process.chdir(directory)
      return previous
    }),
    (previous) =>
      Effect.sync(() => {
        process.chdir(previous)
      })
  )

describe("config", () => {
  it.effect("defaults to the random filler without a seed", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig({}))
      expect(config.fillerMode).toBe("random")
      expect(Option.isNone(config.seed)).toBe(true)
    }))

  it.effect("reads the filler mode and seed", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig({ PESEL_FILLER: "zeros", PESEL_SEED: "42" }))
      expect(config.fillerMode).toBe("zeros")
      expect(Option.getOrNull(config.seed)).toBe(42)
    }))

  it.effect("rejects unknown filler modes and non-integer seeds", () =>
    Effect.gen(function*(_) {
      const badMode = yield* _(Effect.flip(decodeConfig({ PESEL_FILLER: "dice" })))
      const badSeed = yield* _(Effect.flip(decodeConfig({ PESEL_SEED: "abc" })))
      expect(badMode._tag).toBe("ConfigError")
      expect(badSeed._tag).toBe("ConfigError")
    }))

  it.effect("loads a .env file from the working directory", () =>
    pipe(
      Effect.scoped(
        Effect.gen(function*(_) {
          const fs = yield* _(FileSystem.FileSystem)
          const path = yield* _(Path.Path)
          const directory = yield* _(fs.makeTempDirectoryScoped())
          yield* _(fs.writeFileString(path.join(directory, ".env"), "PESEL_SEED=31\n"))
          yield* _(withoutEnv("PESEL_SEED"))
          yield* _(withCwd(directory))
          const config = yield* _(loadConfig)
          expect(Option.getOrNull(config.seed)).toBe(31)
        })
      ),
      Effect.provide(NodeContext.layer)
    ))
})
