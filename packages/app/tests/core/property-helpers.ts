import fc from "fast-check"

import { daysInMonth } from "../../src/core/calendar.js"
import type { BirthRequest, Sex } from "../../src/core/pesel.js"

export const sexArb = fc.constantFrom<Sex>("male", "female")

export const birthArb: fc.Arbitrary<BirthRequest> = fc
  .record({
    year: fc.integer({ min: 1800, max: 2299 }),
    month: fc.integer({ min: 1, max: 12 }),
    dayIndex: fc.integer({ min: 0, max: 30 }),
    sex: sexArb
  })
  .map((raw): BirthRequest => ({
    year: raw.year,
    month: raw.month,
    day: (raw.dayIndex % daysInMonth(raw.year, raw.month)) + 1,
    sex: raw.sex
  }))

export const digitChar = fc.constantFrom("0", "1", "2", "3", "4", "5", "6", "7", "8", "9")

export const replaceAt = (value: string, index: number, replacement: string): string =>
  `${value.slice(0, index)}${replacement}${value.slice(index + 1)}`
