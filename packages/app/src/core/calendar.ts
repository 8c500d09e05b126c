import { BirthDateString } from "./brand.js"

export type DateParts = {
  readonly year: number
  readonly month: number
  readonly day: number
}

const monthLengths: ReadonlyArray<number> = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

// CHANGE: implement the Gregorian leap-year rule
// WHY: 29 February is only valid in leap years, including the 1800 and 2100 exceptions
// QUOTE(TZ): "divisible by 4, except centuries (divisible by 100) unless also divisible by 400"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall y: leap(y) <-> (y % 4 = 0 ∧ y % 100 != 0) ∨ y % 400 = 0
// PURITY: CORE
// INVARIANT: 1900 and 2100 are common years, 2000 is a leap year
// COMPLEXITY: O(1)/O(1)
export const isLeapYear = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

export const isValidMonth = (month: number): boolean => Number.isInteger(month) && month >= 1 && month <= 12

// CHANGE: compute month length for a given year
// WHY: share day validation between parsing and generation
// QUOTE(TZ): "reject day 0, day > days-in-month"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall y, m in 1..12: daysInMonth(y, m) in {28, 29, 30, 31}
// PURITY: CORE
// INVARIANT: returns 0 for a month outside 1..12
// COMPLEXITY: O(1)/O(1)
export const daysInMonth = (year: number, month: number): number => {
  if (!isValidMonth(month)) {
    return 0
  }
  if (month === 2 && isLeapYear(year)) {
    return 29
  }
  return monthLengths[month - 1] ?? 0
}

export const isValidDate = (parts: DateParts): boolean =>
  Number.isInteger(parts.year)
  && Number.isInteger(parts.day)
  && parts.day >= 1
  && parts.day <= daysInMonth(parts.year, parts.month)

// CHANGE: build a BirthDateString from parts
// WHY: render the decoded date of birth as YYYY-MM-DD
// QUOTE(TZ): n/a
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall p: format(p) matches YYYY-MM-DD
// PURITY: CORE
// INVARIANT: output is a valid BirthDateString
// COMPLEXITY: O(1)/O(1)
export const formatBirthDate = (parts: DateParts): BirthDateString => {
  const year = parts.year.toString().padStart(4, "0")
  const month = parts.month.toString().padStart(2, "0")
  const day = parts.day.toString().padStart(2, "0")
  return BirthDateString(`${year}-${month}-${day}`)
}
