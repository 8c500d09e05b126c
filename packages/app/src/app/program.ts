import { Console, Effect, Option, pipe } from "effect"

import { RngSeed } from "../core/brand.js"
import { type Filler, seededFiller, zerosFiller } from "../core/pesel.js"
import { readCommand } from "../shell/cli.js"
import { type Config, loadConfig } from "../shell/config.js"
import { runCommand } from "./commands.js"
import { logAndFallback } from "./diagnostics.js"

const seedModulus = 2_147_483_647

export const usage = [
  "usage:",
  "  pesel parse <11 digits>",
  "  pesel generate <year> <month> <day> <male|female>"
].join("\n")

export const makeFiller = (config: Config): Effect.Effect<Filler> =>
  config.fillerMode === "zeros"
    ? Effect.succeed(zerosFiller)
    : pipe(
      Option.match(config.seed, {
        onNone: () => Effect.sync(() => Date.now()),
        onSome: (seed) => Effect.succeed(seed)
      }),
      Effect.map((seed) => seededFiller(RngSeed(seed % seedModulus)))
    )

// CHANGE: compose the CLI program from config, argv and the codec
// WHY: keep every effect in the shell while the codec stays pure
// QUOTE(TZ): "a thin external consumer calling into this core through its public operations"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall argv: program prints either command output or usage
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: malformed argv never aborts the program
// COMPLEXITY: O(1)/O(1)
export const program = pipe(
  loadConfig,
  Effect.flatMap((config) =>
    logAndFallback(
      pipe(
        readCommand,
        Effect.flatMap((command) =>
          pipe(
            makeFiller(config),
            Effect.flatMap((filler) => runCommand(command, filler)),
            Effect.map((output) => output.lines)
          )
        )
      ),
      (): ReadonlyArray<string> => [usage]
    )
  ),
  Effect.flatMap((lines) => Effect.forEach(lines, (line) => Console.log(line), { discard: true }))
)
