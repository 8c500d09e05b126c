import { Either, Match, Option } from "effect"

import type { BirthDateString, RngSeed } from "./brand.js"
import { PeselNumber } from "./brand.js"
import { type DateParts, formatBirthDate, isValidDate, isValidMonth } from "./calendar.js"
import { centuryOffset, resolveCentury } from "./century.js"
import { computeChecksum } from "./checksum.js"
import type { PeselGenerationError, PeselParseError } from "./errors.js"
import { ChecksumMismatch, InvalidDate, InvalidLength, InvalidMonth, NonDigitCharacter, YearOutOfRange } from "./errors.js"
import { randomDigits, randomInt } from "./rng.js"

export type Sex = "male" | "female"

export type Pesel = {
  readonly digits: PeselNumber
  readonly year: number
  readonly month: number
  readonly day: number
  readonly sex: Sex
}

export type BirthRequest = DateParts & {
  readonly sex: Sex
}

export type Filler =
  | { readonly kind: "zeros" }
  | { readonly kind: "seeded"; readonly seed: RngSeed }

export type GeneratedPesel = {
  readonly pesel: Pesel
  readonly filler: Filler
}

type SerialBlock = {
  readonly digits: ReadonlyArray<number>
  readonly next: Filler
}

export const peselLength = 11

export const zerosFiller: Filler = { kind: "zeros" }

export const seededFiller = (seed: RngSeed): Filler => ({ kind: "seeded", seed })

const digitPattern = /^\d$/

const findNonDigit = (input: string): number => input.split("").findIndex((char) => !digitPattern.test(char))

const toDigits = (input: string): ReadonlyArray<number> => Array.from(input, (char) => Number(char))

const pad2 = (value: number): string => value.toString().padStart(2, "0")

const sexFromDigit = (digit: number): Sex => digit % 2 === 1 ? "male" : "female"

const sexParity = (sex: Sex): number => sex === "male" ? 1 : 0

const makePesel = (digits: string, parts: DateParts, sex: Sex): Pesel =>
  Object.freeze({
    digits: PeselNumber(digits),
    year: parts.year,
    month: parts.month,
    day: parts.day,
    sex
  })

// CHANGE: validate a candidate string and decode it into a Pesel
// WHY: callers get either a fully consistent value or the first failing check
// QUOTE(TZ): "Constraints checked, in order (first failing check determines the error)"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall s: parse(s) = Right(p) -> p.digits = s ∧ checksum(s[0..10]) = s[10]
// PURITY: CORE
// INVARIANT: length, digits, century, month, date and checksum are checked in this order
// COMPLEXITY: O(1)/O(1)
export const parsePesel = (input: string): Either.Either<Pesel, PeselParseError> => {
  if (input.length !== peselLength) {
    return Either.left(new InvalidLength({ length: input.length }))
  }
  const index = findNonDigit(input)
  if (index !== -1) {
    return Either.left(new NonDigitCharacter({ index, character: input.charAt(index) }))
  }

  const yearLiteral = Number(input.slice(0, 2))
  const encodedMonth = Number(input.slice(2, 4))
  const day = Number(input.slice(4, 6))
  const bucket = resolveCentury(encodedMonth)
  if (Option.isNone(bucket)) {
    return Either.left(new InvalidDate({ year: yearLiteral, month: encodedMonth, day }))
  }
  const month = encodedMonth - bucket.value.offset
  if (!isValidMonth(month)) {
    return Either.left(new InvalidMonth({ month: encodedMonth }))
  }

  const parts: DateParts = {
    year: bucket.value.century + yearLiteral,
    month,
    day
  }
  if (!isValidDate(parts)) {
    return Either.left(new InvalidDate(parts))
  }

  const expected = computeChecksum(toDigits(input))
  const actual = Number(input.charAt(10))
  if (expected !== actual) {
    return Either.left(new ChecksumMismatch({ expected, actual }))
  }

  return Either.right(makePesel(input, parts, sexFromDigit(Number(input.charAt(9)))))
}

const zerosBlock = (sex: Sex, filler: Filler): SerialBlock => ({
  digits: [0, 0, 0, sexParity(sex)],
  next: filler
})

const seededBlock = (sex: Sex, seed: RngSeed): SerialBlock => {
  const serial = randomDigits(seed, 3)
  const half = randomInt(serial.seed, 5)
  return {
    digits: [...serial.digits, half.value * 2 + sexParity(sex)],
    next: seededFiller(half.seed)
  }
}

// CHANGE: fill digits 7-10 from the chosen strategy
// WHY: only the parity of the tenth digit is fixed by the sex
// QUOTE(TZ): "the only hard constraint is parity of position 10"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall s, f: serial(s, f).digits[3] % 2 = (s = male ? 1 : 0)
// PURITY: CORE
// INVARIANT: exactly four digits, each within 0..9
// COMPLEXITY: O(1)/O(1)
const serialBlock = (sex: Sex, filler: Filler): SerialBlock =>
  Match.value(filler).pipe(
    Match.when({ kind: "zeros" }, (value) => zerosBlock(sex, value)),
    Match.when({ kind: "seeded" }, (value) => seededBlock(sex, value.seed)),
    Match.exhaustive
  )

// CHANGE: encode a birth date and sex into a valid Pesel
// WHY: produce numbers that always pass parsePesel
// QUOTE(TZ): "never produces a structurally invalid identifier"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall b: generate(b) = Right(g) -> parse(g.pesel.digits) = Right(g.pesel)
// PURITY: CORE
// INVARIANT: the returned filler is the one to use for the next generation
// COMPLEXITY: O(1)/O(1)
export const generatePesel = (
  birth: BirthRequest,
  filler: Filler = zerosFiller
): Either.Either<GeneratedPesel, PeselGenerationError> => {
  const offset = centuryOffset(birth.year)
  if (Option.isNone(offset)) {
    return Either.left(new YearOutOfRange({ year: birth.year }))
  }
  if (!isValidMonth(birth.month)) {
    return Either.left(new InvalidMonth({ month: birth.month }))
  }
  if (!isValidDate(birth)) {
    return Either.left(new InvalidDate({ year: birth.year, month: birth.month, day: birth.day }))
  }

  const serial = serialBlock(birth.sex, filler)
  const head = [
    pad2(birth.year % 100),
    pad2(birth.month + offset.value),
    pad2(birth.day),
    serial.digits.join("")
  ].join("")
  const digits = `${head}${computeChecksum(toDigits(head))}`

  return Either.right({
    pesel: makePesel(digits, birth, birth.sex),
    filler: serial.next
  })
}

export const formatPesel = (pesel: Pesel): string => pesel.digits

export const birthDate = (pesel: Pesel): BirthDateString => formatBirthDate(pesel)

export const isMale = (pesel: Pesel): boolean => pesel.sex === "male"

export const isFemale = (pesel: Pesel): boolean => pesel.sex === "female"
