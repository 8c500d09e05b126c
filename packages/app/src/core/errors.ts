import { Data } from "effect"

export class InvalidLength extends Data.TaggedError("InvalidLength")<{
  readonly length: number
}> {}

export class NonDigitCharacter extends Data.TaggedError("NonDigitCharacter")<{
  readonly index: number
  readonly character: string
}> {}

// Carries the encoded month when raised by parsing and the requested month when raised by generation.
export class InvalidMonth extends Data.TaggedError("InvalidMonth")<{
  readonly month: number
}> {}

// An encoded month outside every century bucket is reported with the two-digit year and the encoded month.
export class InvalidDate extends Data.TaggedError("InvalidDate")<{
  readonly year: number
  readonly month: number
  readonly day: number
}> {}

export class ChecksumMismatch extends Data.TaggedError("ChecksumMismatch")<{
  readonly expected: number
  readonly actual: number
}> {}

export class YearOutOfRange extends Data.TaggedError("YearOutOfRange")<{
  readonly year: number
}> {}

export type PeselParseError =
  | InvalidLength
  | NonDigitCharacter
  | InvalidMonth
  | InvalidDate
  | ChecksumMismatch

export type PeselGenerationError =
  | YearOutOfRange
  | InvalidMonth
  | InvalidDate
