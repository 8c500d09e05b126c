import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCommand } from "../../src/app/commands.js"
import { RngSeed } from "../../src/core/brand.js"
import { seededFiller, zerosFiller } from "../../src/core/pesel.js"

const demoLines = [
  "PESEL: 44051401458\ndate of birth: 1944-05-14\nsex: male",
  "generated PESEL: 80052600014",
  "PESEL: 80052600014\ndate of birth: 1980-05-26\nsex: male"
]

describe("runCommand", () => {
  it.effect("describes a valid number", () =>
    Effect.gen(function*(_) {
      const output = yield* _(runCommand({ kind: "parse", input: "44051401458" }, zerosFiller))
      expect(output.lines).toEqual(["PESEL: 44051401458\ndate of birth: 1944-05-14\nsex: male"])
      expect(output.filler).toEqual(zerosFiller)
    }))

  it.effect("reports an invalid number without failing", () =>
    Effect.gen(function*(_) {
      const output = yield* _(runCommand({ kind: "parse", input: "44051401459" }, zerosFiller))
      expect(output.lines).toEqual(["invalid PESEL: checksum digit should be 8, got 9"])
    }))

  it.effect("reports an encoded month outside every century as an invalid date", () =>
    Effect.gen(function*(_) {
      const output = yield* _(runCommand({ kind: "parse", input: "44951201458" }, zerosFiller))
      expect(output.lines).toEqual(["invalid PESEL: 44-95-12 is not a calendar date"])
    }))

  it.effect("generates a number and its description", () =>
    Effect.gen(function*(_) {
      const output = yield* _(
        runCommand({ kind: "generate", birth: { year: 1980, month: 5, day: 26, sex: "male" } }, zerosFiller)
      )
      expect(output.lines).toEqual(demoLines.slice(1))
    }))

  it.effect("reports an impossible birth date and keeps the filler", () =>
    Effect.gen(function*(_) {
      const filler = seededFiller(RngSeed(99))
      const output = yield* _(
        runCommand({ kind: "generate", birth: { year: 2001, month: 2, day: 29, sex: "female" } }, filler)
      )
      expect(output.lines).toEqual(["cannot generate PESEL: 2001-2-29 is not a calendar date"])
      expect(output.filler).toEqual(filler)
    }))

  it.effect("advances a seeded filler after generating", () =>
    Effect.gen(function*(_) {
      const filler = seededFiller(RngSeed(99))
      const output = yield* _(
        runCommand({ kind: "generate", birth: { year: 2001, month: 2, day: 28, sex: "female" } }, filler)
      )
      expect(output.lines[0]?.startsWith("generated PESEL: 012228")).toBe(true)
      expect(output.filler).not.toEqual(filler)
    }))

  it.effect("runs the demo", () =>
    Effect.gen(function*(_) {
      const output = yield* _(runCommand({ kind: "demo" }, zerosFiller))
      expect(output.lines).toEqual(demoLines)
    }))
})
