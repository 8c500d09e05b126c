import * as S from "@effect/schema/Schema"
import { Data, Effect, pipe } from "effect"

import type { BirthRequest } from "../core/pesel.js"

export class CliError extends Data.TaggedError("CliError")<{
  readonly message: string
}> {}

export type Command =
  | { readonly kind: "demo" }
  | { readonly kind: "parse"; readonly input: string }
  | { readonly kind: "generate"; readonly birth: BirthRequest }

const IntFromString = S.compose(S.NumberFromString, S.Int)

const argvSchema = S.Union(
  S.Tuple(),
  S.Tuple(S.Literal("parse"), S.String),
  S.Tuple(S.Literal("generate"), IntFromString, IntFromString, IntFromString, S.Literal("male", "female"))
)

type Argv = S.Schema.Type<typeof argvSchema>

const toCommand = (args: Argv): Command => {
  if (args.length === 0) {
    return { kind: "demo" }
  }
  if (args[0] === "parse") {
    return { kind: "parse", input: args[1] }
  }
  const [, year, month, day, sex] = args
  return { kind: "generate", birth: { year, month, day, sex } }
}

// CHANGE: decode command line arguments into a typed command
// WHY: reject malformed invocations before they reach the codec
// QUOTE(TZ): n/a
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall argv: decode(argv) in {demo, parse, generate} ∨ CliError
// PURITY: SHELL
// EFFECT: Effect<Command, CliError, never>
// INVARIANT: generate dates are integers, sex is male or female
// COMPLEXITY: O(1)/O(1)
export const decodeCommand = (args: ReadonlyArray<string>): Effect.Effect<Command, CliError> =>
  pipe(
    S.decodeUnknown(argvSchema)(args),
    Effect.map(toCommand),
    Effect.mapError((error) => new CliError({ message: error.message }))
  )

export const readCommand = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.flatMap(decodeCommand)
)
