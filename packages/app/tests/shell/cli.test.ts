import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeCommand } from "../../src/shell/cli.js"

describe("cli", () => {
  it.effect("decodes no arguments as the demo run", () =>
    Effect.gen(function*(_) {
      const command = yield* _(decodeCommand([]))
      expect(command).toEqual({ kind: "demo" })
    }))

  it.effect("decodes a parse command", () =>
    Effect.gen(function*(_) {
      const command = yield* _(decodeCommand(["parse", "44051401458"]))
      expect(command).toEqual({ kind: "parse", input: "44051401458" })
    }))

  it.effect("decodes a generate command with numeric date parts", () =>
    Effect.gen(function*(_) {
      const command = yield* _(decodeCommand(["generate", "1980", "05", "26", "female"]))
      expect(command).toEqual({
        kind: "generate",
        birth: { year: 1980, month: 5, day: 26, sex: "female" }
      })
    }))

  it.effect("rejects malformed invocations", () =>
    Effect.gen(function*(_) {
      const invocations: ReadonlyArray<ReadonlyArray<string>> = [
        ["parse"],
        ["check", "44051401458"],
        ["generate", "1980", "5", "26", "other"],
        ["generate", "1980", "5.5", "26", "male"],
        ["generate", "1980", "5", "26"]
      ]
      for (const args of invocations) {
        const error = yield* _(Effect.flip(decodeCommand(args)))
        expect(error._tag).toBe("CliError")
      }
    }))
})
