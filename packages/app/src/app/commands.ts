import { Effect, Match, pipe } from "effect"

import {
  type BirthRequest,
  type Filler,
  formatPesel,
  type GeneratedPesel,
  generatePesel,
  parsePesel,
  type Pesel
} from "../core/pesel.js"
import { describePesel, formatGenerationError, formatParseError } from "../core/text.js"
import type { Command } from "../shell/cli.js"
import { logAndFallback } from "./diagnostics.js"

export const demoInput = "44051401458"

export const demoBirth: BirthRequest = { year: 1980, month: 5, day: 26, sex: "male" }

export type CommandOutput = {
  readonly lines: ReadonlyArray<string>
  readonly filler: Filler
}

const parseLines = (input: string): Effect.Effect<ReadonlyArray<string>> =>
  logAndFallback(
    pipe(
      parsePesel(input),
      Effect.map((pesel: Pesel) => [describePesel(pesel)])
    ),
    (error) => [`invalid PESEL: ${formatParseError(error)}`]
  )

const generateOutput = (birth: BirthRequest, filler: Filler): Effect.Effect<CommandOutput> =>
  logAndFallback(
    pipe(
      generatePesel(birth, filler),
      Effect.map((generated: GeneratedPesel): CommandOutput => ({
        lines: [`generated PESEL: ${formatPesel(generated.pesel)}`, describePesel(generated.pesel)],
        filler: generated.filler
      }))
    ),
    (error): CommandOutput => ({
      lines: [`cannot generate PESEL: ${formatGenerationError(error)}`],
      filler
    })
  )

// CHANGE: execute a decoded command against the codec
// WHY: keep the CLI a thin consumer of parsePesel and generatePesel
// QUOTE(TZ): "Callers decide user-visible presentation"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall c, f: runCommand(c, f) never fails
// PURITY: SHELL
// EFFECT: Effect<CommandOutput, never, never>
// INVARIANT: the returned filler has advanced once per generated number
// COMPLEXITY: O(1)/O(1)
export const runCommand = (command: Command, filler: Filler): Effect.Effect<CommandOutput> =>
  Match.value(command).pipe(
    Match.when({ kind: "parse" }, (value) =>
      pipe(
        parseLines(value.input),
        Effect.map((lines): CommandOutput => ({ lines, filler }))
      )),
    Match.when({ kind: "generate" }, (value) => generateOutput(value.birth, filler)),
    Match.when({ kind: "demo" }, () =>
      Effect.gen(function*(_) {
        const parsed = yield* _(parseLines(demoInput))
        const generated = yield* _(generateOutput(demoBirth, filler))
        return {
          lines: [...parsed, ...generated.lines],
          filler: generated.filler
        }
      })),
    Match.exhaustive
  )
