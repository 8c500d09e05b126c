import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, Option, pipe } from "effect"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

export type FillerMode = "zeros" | "random"

const envSchema = S.Struct({
  PESEL_FILLER: S.optionalWith(S.Literal("zeros", "random"), { default: () => "random" as const }),
  PESEL_SEED: S.optional(S.compose(S.NumberFromString, S.Int))
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly fillerMode: FillerMode
  readonly seed: Option.Option<number>
}

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

// CHANGE: look for a .env file in the working directory, then beside the bundled CLI
// WHY: let the CLI pick up filler settings without exporting variables by hand
// QUOTE(TZ): n/a
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall dirs: loaded(env) -> first existing candidate wins
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: at most one .env file is loaded
// COMPLEXITY: O(n)/O(1)
const loadEnv = pipe(
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const candidates = [path.resolve(process.cwd(), ".env"), path.resolve(path.dirname(modulePath), ".env")]
    const found = yield* _(Effect.findFirst(candidates, (candidate) => fs.exists(candidate)))
    if (Option.isSome(found)) {
      dotenv.config({ path: found.value })
    }
  }),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error))),
  Effect.asVoid
)

export const decodeConfig = (env: Readonly<Record<string, string | undefined>>): Effect.Effect<Config, ConfigError> =>
  pipe(
    S.decodeUnknown(envSchema)(env),
    Effect.map((decoded: Env): Config => ({
      fillerMode: decoded.PESEL_FILLER,
      seed: Option.fromNullable(decoded.PESEL_SEED)
    })),
    Effect.mapError((error) => toConfigError(error.message))
  )

// CHANGE: decode generator configuration from environment variables
// WHY: keep boundary data validated before it reaches the codec
// QUOTE(TZ): "an implementation may use zeros or a pseudo-random source"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall env: decode(env) = config -> config.fillerMode in {zeros, random}
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, FileSystem | Path>
// INVARIANT: fillerMode defaults to random
// COMPLEXITY: O(1)/O(1)
export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(decodeConfig)
)
