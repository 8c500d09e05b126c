import { Effect, pipe } from "effect"

export type LoggableError = Error | string | TaggedError

type TaggedError = {
  readonly _tag?: string
  readonly message?: string
}

const formatTaggedError = (error: TaggedError): string => {
  const tag = error._tag ?? "UnknownError"
  const message = error.message ?? ""
  return message ? `${tag}: ${message}` : tag
}

export const formatError = (error: LoggableError): string => {
  if (typeof error === "string") {
    return error
  }
  if (error instanceof Error && !("_tag" in error)) {
    return `${error.name}: ${error.message}`
  }
  return formatTaggedError(error)
}

// CHANGE: log a failure and continue with a value derived from it
// WHY: validation failures are ordinary outcomes for the CLI, not crashes
// QUOTE(TZ): "validation failures are expected, ordinary outcomes, not exceptional conditions"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall e: logAndFallback(fail(e), f) = succeed(f(e))
// PURITY: SHELL
// EFFECT: Effect<A, never, R>
// INVARIANT: every failure is logged exactly once at error level
// COMPLEXITY: O(1)/O(1)
export const logAndFallback = <A, E extends LoggableError, R>(
  effect: Effect.Effect<A, E, R>,
  fallback: (error: E) => A
): Effect.Effect<A, never, R> =>
  effect.pipe(
    Effect.matchEffect({
      onFailure: (error) =>
        pipe(
          Effect.logError(formatError(error)),
          Effect.as(fallback(error))
        ),
      onSuccess: (value) => Effect.succeed(value)
    })
  )
