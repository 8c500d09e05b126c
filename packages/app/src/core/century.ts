import { Option, pipe } from "effect"

export type CenturyBucket = {
  readonly century: number
  readonly offset: number
}

// CHANGE: define the month offset for every supported century
// WHY: the two-digit year only becomes unambiguous with the offset carried by the month
// QUOTE(TZ): "1800–1899 +80, 1900–1999 +0, 2000–2099 +20, 2100–2199 +40, 2200–2299 +60"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall b in buckets: b.offset % 20 = 0 ∧ b.offset < 100
// PURITY: CORE
// INVARIANT: offsets are pairwise distinct, so the reverse lookup is unique
// COMPLEXITY: O(1)/O(1)
export const centuryBuckets: ReadonlyArray<CenturyBucket> = [
  { century: 1800, offset: 80 },
  { century: 1900, offset: 0 },
  { century: 2000, offset: 20 },
  { century: 2100, offset: 40 },
  { century: 2200, offset: 60 }
]

export const minYear = 1800
export const maxYear = 2299

const centuryOf = (year: number): number => Math.floor(year / 100) * 100

export const centuryOffset = (year: number): Option.Option<number> =>
  pipe(
    Option.fromNullable(centuryBuckets.find((bucket) => bucket.century === centuryOf(year))),
    Option.filter(() => Number.isInteger(year)),
    Option.map((bucket) => bucket.offset)
  )

// CHANGE: find the century whose offset range covers an encoded month field
// WHY: a field outside every bucket names no century at all, unlike month 0 inside one
// QUOTE(TZ): "InvalidDate (covers both impossible calendar dates and unresolvable century offsets)"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall e: resolveCentury(e) = Some(b) -> 0 <= e - b.offset <= 12
// PURITY: CORE
// INVARIANT: buckets are 20 apart, so at most one covers a value
// COMPLEXITY: O(1)/O(1)
export const resolveCentury = (encoded: number): Option.Option<CenturyBucket> =>
  Option.fromNullable(
    centuryBuckets.find((bucket) => encoded >= bucket.offset && encoded - bucket.offset <= 12)
  )

// CHANGE: resolve the century and calendar month from the encoded month field
// WHY: parsing must enumerate every bucket instead of assuming the 1900s
// QUOTE(TZ): "implementers must enumerate all five buckets and pick the unique match"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall y, m: decodeMonth(m + offset(y)) = Some({ century(y), m })
// PURITY: CORE
// INVARIANT: result month is within 1..12
// COMPLEXITY: O(1)/O(1)
export const decodeMonth = (encoded: number): Option.Option<{ readonly century: number; readonly month: number }> =>
  pipe(
    resolveCentury(encoded),
    Option.map((bucket) => ({ century: bucket.century, month: encoded - bucket.offset })),
    Option.filter((decoded) => decoded.month >= 1)
  )
