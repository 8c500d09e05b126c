import { Match } from "effect"

import { maxYear, minYear } from "./century.js"
import type { PeselGenerationError, PeselParseError } from "./errors.js"
import { birthDate, type Pesel } from "./pesel.js"

const formatPlacement = (index: number): string => `position ${index + 1}`

// CHANGE: render a validated number the way the demo binary prints it
// WHY: give the CLI a single, deterministic description of a decoded number
// QUOTE(TZ): n/a
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall p: lines(describe(p)) = 3
// PURITY: CORE
// INVARIANT: first line always carries the canonical digits
// COMPLEXITY: O(1)/O(1)
export const describePesel = (pesel: Pesel): string =>
  [
    `PESEL: ${pesel.digits}`,
    `date of birth: ${birthDate(pesel)}`,
    `sex: ${pesel.sex}`
  ].join("\n")

export const formatParseError = (error: PeselParseError): string =>
  Match.value(error).pipe(
    Match.tag("InvalidLength", (value) => `PESEL has to be 11 characters long, got ${value.length}`),
    Match.tag(
      "NonDigitCharacter",
      (value) => `PESEL may only contain digits, found "${value.character}" at ${formatPlacement(value.index)}`
    ),
    Match.tag("InvalidMonth", (value) => `encoded month ${value.month} leaves month 0 after removing the century offset`),
    Match.tag("InvalidDate", (value) => `${value.year}-${value.month}-${value.day} is not a calendar date`),
    Match.tag("ChecksumMismatch", (value) => `checksum digit should be ${value.expected}, got ${value.actual}`),
    Match.exhaustive
  )

export const formatGenerationError = (error: PeselGenerationError): string =>
  Match.value(error).pipe(
    Match.tag("YearOutOfRange", (value) => `year ${value.year} is outside ${minYear}-${maxYear}`),
    Match.tag("InvalidMonth", (value) => `month ${value.month} is outside 1-12`),
    Match.tag("InvalidDate", (value) => `${value.year}-${value.month}-${value.day} is not a calendar date`),
    Match.exhaustive
  )
